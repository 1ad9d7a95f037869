/**
 * Memory Guard Types
 *
 * @module types/memory
 */

/**
 * One point in the memory guard's rolling window
 */
export interface MemorySnapshot {
  /** Monotonic time of the sample (ms) */
  timestampMs: number;
  currentBytes: number;
  peakBytes: number;
}

/**
 * Reading returned by a memory probe
 */
export interface MemoryReading {
  currentBytes: number;
  peakBytes: number;
}

/**
 * Source of process memory figures and garbage collection.
 *
 * `collect()` returns false when collection is unavailable (e.g. the
 * process was started without `--expose-gc`).
 */
export interface MemoryProbe {
  read(): MemoryReading;
  collect(): boolean;
}

/**
 * Memory guard configuration (camelCase form used by the component)
 */
export interface MemoryGuardConfig {
  /** Above this, a collection is triggered */
  gcThresholdBytes: number;

  /** Above this, caches are shrunk to half their limit */
  warningThresholdBytes: number;

  /** Above this, caches are cleared and a restart is requested */
  criticalThresholdBytes: number;

  /** Memory sampling interval */
  checkIntervalMs: number;

  /** Registered cache size sweep interval */
  cacheCheckIntervalMs: number;

  leakDetectionEnabled: boolean;

  /** Sustained growth above this rate is reported as a leak */
  leakGrowthBytesPerMinute: number;

  /** Capacity of the rolling snapshot window */
  snapshotWindowSize: number;

  /** Snapshots needed before the leak heuristic runs */
  minLeakSamples: number;

  /** Delay before the one-shot restart request fires */
  restartDelayMs: number;

  /** Limit applied to caches registered without an explicit one */
  defaultCacheLimitBytes: number;
}

export interface MemoryLeakEvent {
  type: 'MemoryLeak';
  growthBytesPerSecond: number;
  snapshots: readonly MemorySnapshot[];
}

export interface CriticalMemoryEvent {
  type: 'CriticalMemory';
  currentBytes: number;
  thresholdBytes: number;
}

export type MemoryAlert = MemoryLeakEvent | CriticalMemoryEvent;

export type MemoryAlertCallback = (alert: MemoryAlert) => void;

/**
 * Health-check view of the memory guard
 */
export interface MemoryGuardStats {
  currentBytes: number;
  peakBytes: number;
  gcRuns: number;
  uptimeSeconds: number;
  /** Human readable uptime, e.g. "2h 5m" */
  uptime: string;
  trackedCaches: number;
  snapshots: number;
  monitoring: boolean;
  restartRequested: boolean;
}
