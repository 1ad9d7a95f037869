import type { RequestDescriptor } from '../types/isolation.js';
import type { RequestIsolation } from './request-isolation.js';

/**
 * Run `handler` inside a fresh request context. The context is destroyed
 * when the handler settles, whether it resolved or threw.
 *
 * @example
 * ```typescript
 * const response = await withIsolation(isolation, { method: req.method, path: req.url }, () =>
 *   handle(req)
 * );
 * ```
 */
export async function withIsolation<T>(
  isolation: RequestIsolation,
  descriptor: RequestDescriptor,
  handler: (contextId: string) => T | Promise<T>
): Promise<T> {
  const contextId = isolation.createContext(descriptor);
  try {
    return await handler(contextId);
  } finally {
    isolation.destroyContext(contextId);
  }
}
