/**
 * Zod schema exports
 *
 * Runtime validation for configuration files and component options.
 *
 * @example
 * ```typescript
 * import { MemoryGuardOptionsSchema } from 'event-loop-guard';
 *
 * const result = MemoryGuardOptionsSchema.safeParse(options);
 * if (!result.success) {
 *   console.error(result.error.issues);
 * }
 * ```
 */

// Config schemas
export * from './config.js';

// Operation table schemas
export * from './operation-tables.js';
