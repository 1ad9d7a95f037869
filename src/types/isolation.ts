/**
 * Request Isolation Types
 *
 * @module types/isolation
 */

/**
 * JSON-like value allowed in shared state. Restricting slots to this shape
 * keeps snapshots cloneable.
 */
export type SharedValue =
  | string
  | number
  | boolean
  | null
  | SharedValue[]
  | { [key: string]: SharedValue };

export type SharedRecord = { [key: string]: SharedValue };

/**
 * Minimal description of the request a context is created for
 */
export interface RequestDescriptor {
  method: string;
  path: string;
}

/**
 * Read-only view of a live context
 */
export interface ContextInfo {
  id: string;
  descriptor: RequestDescriptor;
  startedAtMs: number;
  memoryAtStart: number;
  trackedMutations: number;
}

/**
 * A context that outlived its maximum duration or memory budget
 */
export interface ContextLeak {
  contextId: string;
  durationSeconds: number;
  memoryGrowthBytes: number;
}

export interface RequestIsolationConfig {
  /** Contexts older than this are reported as leaked */
  maxContextDurationMs: number;

  /** Optional memory growth budget per context */
  maxContextMemoryGrowthBytes?: number;

  /** Interval of the background leak sweep */
  leakSweepIntervalMs: number;
}
