/**
 * Memory Guard
 *
 * Samples process memory on a coarse interval, keeps a rolling window of
 * snapshots and acts on a threshold ladder:
 *
 * - above gc: request a collection
 * - above warning: collect, and shrink every registered cache to half its limit
 * - above critical: clear every cache, notify callbacks, request a restart
 *
 * Independently, sustained growth across the window is reported as a
 * suspected leak. The guard never terminates the process; restart is a
 * signal for an external supervisor.
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { SafetyError, zodErrorToSafetyError } from '../api/errors.js';
import { MEMORY_GUARD } from '../config/defaults.js';
import { describeCacheType, isMonitoredCache, suggestCacheAdapter } from '../cache/monitored-cache.js';
import { MemoryGuardOptionsSchema } from '../types/schemas/config.js';
import type { TrackedCache } from '../types/cache.js';
import type {
  CriticalMemoryEvent,
  MemoryAlert,
  MemoryAlertCallback,
  MemoryGuardConfig,
  MemoryGuardStats,
  MemoryLeakEvent,
  MemoryProbe,
  MemorySnapshot,
} from '../types/memory.js';
import type { Clock, Scheduler } from '../types/scheduler.js';
import { formatBytes, formatUptime } from '../utils/format.js';
import { invokeGuarded, lazyLog } from '../utils/logger-helpers.js';
import { createNodeScheduler, monotonicNow } from '../utils/scheduler.js';
import { MultiTimerGuard } from '../utils/timer-guard.js';
import { ProcessMemoryProbe } from './memory-probe.js';

export type CacheCleanReason = 'limit' | 'warning' | 'critical';

export interface CacheCleanedEvent {
  name: string;
  reason: CacheCleanReason;
  beforeBytes: number;
  afterBytes: number;
  /** 0 when the cache was cleared */
  targetBytes: number;
}

/**
 * Memory guard events
 */
export interface MemoryGuardEvents {
  leak: (event: MemoryLeakEvent) => void;
  critical: (event: CriticalMemoryEvent) => void;
  restartRequested: (stats: MemoryGuardStats) => void;
  cacheCleaned: (event: CacheCleanedEvent) => void;
}

export interface MemoryGuardOptions extends Partial<MemoryGuardConfig> {
  probe?: MemoryProbe;
  scheduler?: Scheduler;
  now?: Clock;
  logger?: Logger;
}

export function defaultMemoryGuardConfig(): MemoryGuardConfig {
  return {
    gcThresholdBytes: MEMORY_GUARD.GC_THRESHOLD_BYTES,
    warningThresholdBytes: MEMORY_GUARD.WARNING_THRESHOLD_BYTES,
    criticalThresholdBytes: MEMORY_GUARD.CRITICAL_THRESHOLD_BYTES,
    checkIntervalMs: MEMORY_GUARD.CHECK_INTERVAL_MS,
    cacheCheckIntervalMs: MEMORY_GUARD.CACHE_CHECK_INTERVAL_MS,
    leakDetectionEnabled: MEMORY_GUARD.LEAK_DETECTION_ENABLED,
    leakGrowthBytesPerMinute: MEMORY_GUARD.LEAK_GROWTH_BYTES_PER_MINUTE,
    snapshotWindowSize: MEMORY_GUARD.SNAPSHOT_WINDOW_SIZE,
    minLeakSamples: MEMORY_GUARD.MIN_LEAK_SAMPLES,
    restartDelayMs: MEMORY_GUARD.RESTART_DELAY_MS,
    defaultCacheLimitBytes: MEMORY_GUARD.DEFAULT_CACHE_LIMIT_BYTES,
  };
}

/**
 * Merge overrides over the defaults and validate the result.
 *
 * @throws {SafetyError} ConfigurationError on non-increasing thresholds or
 * non-positive intervals
 */
export function resolveMemoryGuardConfig(overrides: Partial<MemoryGuardConfig> = {}): MemoryGuardConfig {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );

  const result = MemoryGuardOptionsSchema.safeParse({ ...defaultMemoryGuardConfig(), ...defined });
  if (!result.success) {
    throw zodErrorToSafetyError(result.error, 'ConfigurationError', 'Invalid memory guard configuration');
  }
  return result.data;
}

export class MemoryGuard extends EventEmitter<MemoryGuardEvents> {
  private readonly config: MemoryGuardConfig;
  private readonly probe: MemoryProbe;
  private readonly now: Clock;
  private readonly logger?: Logger;
  private readonly timers: MultiTimerGuard;

  private readonly caches = new Map<string, TrackedCache>();
  private readonly callbacks: MemoryAlertCallback[] = [];
  private snapshots: MemorySnapshot[] = [];

  private readonly startedAtMs: number;
  private peakBytes = 0;
  private gcRuns = 0;
  private monitoring = false;
  private restartPending = false;
  private restartRequested = false;

  constructor(options: MemoryGuardOptions = {}) {
    super();
    const { probe, scheduler, now, logger, ...overrides } = options;

    this.config = resolveMemoryGuardConfig(overrides);
    this.probe = probe ?? new ProcessMemoryProbe();
    this.now = now ?? monotonicNow;
    this.logger = logger;
    this.timers = new MultiTimerGuard(scheduler ?? createNodeScheduler());
    this.startedAtMs = this.now();
  }

  /**
   * Start the memory sampling and cache sweep tasks. Idempotent.
   */
  public startMonitoring(): void {
    if (this.monitoring) {
      this.logger?.warn('Memory guard already monitoring');
      return;
    }

    this.timers.every('memory-check', () => this.checkMemory(), this.config.checkIntervalMs);
    this.timers.every('cache-check', () => this.checkCacheSizes(), this.config.cacheCheckIntervalMs);
    this.monitoring = true;

    this.logger?.info(
      {
        gcThreshold: formatBytes(this.config.gcThresholdBytes),
        warningThreshold: formatBytes(this.config.warningThresholdBytes),
        criticalThreshold: formatBytes(this.config.criticalThresholdBytes),
        checkIntervalMs: this.config.checkIntervalMs,
      },
      'Memory monitoring started'
    );
  }

  /**
   * Cancel every task, including a pending restart request
   */
  public stopMonitoring(): void {
    this.timers.clearAll();
    this.restartPending = false;

    if (this.monitoring) {
      this.monitoring = false;
      this.logger?.info('Memory monitoring stopped');
    }
  }

  /**
   * Track a cache. It must implement the Cache Monitoring Interface;
   * bare collections are rejected because the guard could neither measure
   * nor shrink them. Registering a name again replaces the entry.
   *
   * @throws {SafetyError} RegistrationError for uncooperative caches
   */
  public registerCache(name: string, cache: unknown, maxSizeBytes?: number): void {
    if (!isMonitoredCache(cache)) {
      const typeName = describeCacheType(cache);
      throw new SafetyError(
        'RegistrationError',
        `Cache "${name}" (${typeName}) does not implement the cache monitoring interface ` +
          `(size, clean, clear, stats): ${suggestCacheAdapter(typeName)}`,
        { cache: name, type: typeName }
      );
    }

    const limit = maxSizeBytes ?? this.config.defaultCacheLimitBytes;
    if (!Number.isFinite(limit) || limit <= 0) {
      throw new SafetyError('RegistrationError', `Cache "${name}" limit must be positive, got ${limit}`, {
        cache: name,
      });
    }

    this.caches.set(name, { name, cache, maxSizeBytes: limit });
    this.logger?.debug({ cache: name, maxSize: formatBytes(limit) }, 'Cache registered');
  }

  public unregisterCache(name: string): boolean {
    return this.caches.delete(name);
  }

  /**
   * Receive leak and critical memory alerts
   */
  public onMemoryLeak(callback: MemoryAlertCallback): void {
    this.callbacks.push(callback);
  }

  /**
   * Take one sample and act on it (what the periodic task runs)
   */
  public checkMemory(): MemorySnapshot {
    const reading = this.probe.read();
    const snapshot: MemorySnapshot = {
      timestampMs: this.now(),
      currentBytes: reading.currentBytes,
      peakBytes: reading.peakBytes,
    };

    this.snapshots.push(snapshot);
    if (this.snapshots.length > this.config.snapshotWindowSize) {
      this.snapshots = this.snapshots.slice(-this.config.snapshotWindowSize);
    }
    this.peakBytes = Math.max(this.peakBytes, reading.peakBytes, reading.currentBytes);

    // Sampling always requests a collection; only ladder collections count as gc runs
    this.probe.collect();

    lazyLog(
      this.logger,
      'debug',
      () => ({
        current: formatBytes(snapshot.currentBytes),
        peak: formatBytes(this.peakBytes),
        snapshots: this.snapshots.length,
      }),
      'Memory sampled'
    );

    const current = snapshot.currentBytes;
    if (current > this.config.criticalThresholdBytes) {
      this.handleCriticalMemory(current);
    } else if (current > this.config.warningThresholdBytes) {
      this.handleHighMemory(current);
    } else if (current > this.config.gcThresholdBytes) {
      this.triggerGarbageCollection();
    }

    if (this.config.leakDetectionEnabled) {
      this.detectMemoryLeak();
    }

    return snapshot;
  }

  /**
   * Shrink every cache that is over its own limit back to it
   */
  public checkCacheSizes(): void {
    for (const tracked of this.caches.values()) {
      const size = this.readCacheSize(tracked);
      if (size === undefined || size <= tracked.maxSizeBytes) {
        continue;
      }

      this.logger?.warn(
        {
          cache: tracked.name,
          currentSize: formatBytes(size),
          maxSize: formatBytes(tracked.maxSizeBytes),
        },
        'Cache size exceeded'
      );
      this.cleanCache(tracked, tracked.maxSizeBytes, 'limit');
    }
  }

  public getStats(): MemoryGuardStats {
    const latest = this.snapshots[this.snapshots.length - 1];
    const reading = latest ?? this.probe.read();
    const uptimeSeconds = (this.now() - this.startedAtMs) / 1000;

    return {
      currentBytes: reading.currentBytes,
      peakBytes: Math.max(this.peakBytes, reading.peakBytes, reading.currentBytes),
      gcRuns: this.gcRuns,
      uptimeSeconds,
      uptime: formatUptime(uptimeSeconds),
      trackedCaches: this.caches.size,
      snapshots: this.snapshots.length,
      monitoring: this.monitoring,
      restartRequested: this.restartRequested,
    };
  }

  /**
   * Copy of the rolling window, oldest first
   */
  public getSnapshots(): readonly MemorySnapshot[] {
    return [...this.snapshots];
  }

  public getConfig(): Readonly<MemoryGuardConfig> {
    return { ...this.config };
  }

  private triggerGarbageCollection(): void {
    const before = this.probe.read().currentBytes;
    const collected = this.probe.collect();
    this.gcRuns++;

    if (!collected) {
      lazyLog(this.logger, 'debug', () => ({ totalRuns: this.gcRuns }), 'Garbage collection unavailable');
      return;
    }

    const freed = before - this.probe.read().currentBytes;
    if (freed > 1024 * 1024) {
      this.logger?.info(
        { freed: formatBytes(freed), totalRuns: this.gcRuns },
        'Garbage collection completed'
      );
    }
  }

  private handleHighMemory(current: number): void {
    this.logger?.warn(
      {
        current: formatBytes(current),
        threshold: formatBytes(this.config.warningThresholdBytes),
        uptime: this.getStats().uptime,
      },
      'High memory usage detected'
    );

    this.triggerGarbageCollection();

    for (const tracked of this.caches.values()) {
      this.cleanCache(tracked, Math.floor(tracked.maxSizeBytes / 2), 'warning');
    }
  }

  private handleCriticalMemory(current: number): void {
    this.logger?.error(
      {
        current: formatBytes(current),
        threshold: formatBytes(this.config.criticalThresholdBytes),
        uptime: this.getStats().uptime,
      },
      'Critical memory usage - restart required'
    );

    for (const tracked of this.caches.values()) {
      this.clearCache(tracked);
    }

    const event: CriticalMemoryEvent = {
      type: 'CriticalMemory',
      currentBytes: current,
      thresholdBytes: this.config.criticalThresholdBytes,
    };
    this.notify(event);
    invokeGuarded(this.logger, 'critical-listener', () => this.emit('critical', event));

    // Final collection attempt
    this.probe.collect();

    this.scheduleRestartRequest();
  }

  private scheduleRestartRequest(): void {
    if (this.restartPending) {
      return;
    }
    this.restartPending = true;

    this.timers.after(
      'restart',
      () => {
        this.restartPending = false;
        this.restartRequested = true;
        this.logger?.fatal('Requesting graceful restart due to memory limit');
        const stats = this.getStats();
        invokeGuarded(this.logger, 'restart-listener', () => this.emit('restartRequested', stats));
      },
      this.config.restartDelayMs
    );
  }

  private detectMemoryLeak(): void {
    if (this.snapshots.length < this.config.minLeakSamples) {
      return;
    }

    const first = this.snapshots[0];
    const last = this.snapshots[this.snapshots.length - 1];
    if (!first || !last) {
      return;
    }

    const elapsedSeconds = (last.timestampMs - first.timestampMs) / 1000;
    if (elapsedSeconds <= 0) {
      return;
    }

    const growth = last.currentBytes - first.currentBytes;
    const growthBytesPerSecond = growth / elapsedSeconds;
    if (growthBytesPerSecond * 60 <= this.config.leakGrowthBytesPerMinute) {
      return;
    }

    this.logger?.warn(
      {
        growthRate: `${formatBytes(growthBytesPerSecond * 60)}/min`,
        totalGrowth: formatBytes(growth),
        timeElapsed: `${Math.round(elapsedSeconds)}s`,
      },
      'Potential memory leak detected'
    );

    const event: MemoryLeakEvent = {
      type: 'MemoryLeak',
      growthBytesPerSecond,
      snapshots: [...this.snapshots],
    };
    this.notify(event);
    invokeGuarded(this.logger, 'leak-listener', () => this.emit('leak', event));
  }

  private cleanCache(tracked: TrackedCache, targetBytes: number, reason: CacheCleanReason): void {
    const beforeBytes = this.readCacheSize(tracked);
    if (beforeBytes === undefined) {
      return;
    }

    try {
      tracked.cache.clean(targetBytes);
    } catch (err) {
      this.logger?.error({ err, cache: tracked.name }, 'Cache clean failed');
      return;
    }

    const afterBytes = this.readCacheSize(tracked);
    if (afterBytes === undefined) {
      return;
    }

    lazyLog(
      this.logger,
      'debug',
      () => ({
        cache: tracked.name,
        reason,
        before: formatBytes(beforeBytes),
        after: formatBytes(afterBytes),
      }),
      'Cache cleaned'
    );
    this.emitCacheCleaned({ name: tracked.name, reason, beforeBytes, afterBytes, targetBytes });
  }

  /**
   * Critical rung: the cache is cleared even when it cannot report its size
   */
  private clearCache(tracked: TrackedCache): void {
    const beforeBytes = this.readCacheSize(tracked);
    try {
      tracked.cache.clear();
    } catch (err) {
      this.logger?.error({ err, cache: tracked.name }, 'Cache clear failed');
      return;
    }

    const afterBytes = this.readCacheSize(tracked);
    if (beforeBytes === undefined || afterBytes === undefined) {
      return;
    }
    this.emitCacheCleaned({ name: tracked.name, reason: 'critical', beforeBytes, afterBytes, targetBytes: 0 });
  }

  /**
   * Cache size, or undefined (logged) when the cache throws. Callers skip
   * the cache for this tick.
   */
  private readCacheSize(tracked: TrackedCache): number | undefined {
    try {
      return tracked.cache.size();
    } catch (err) {
      this.logger?.error({ err, cache: tracked.name }, 'Cache size unavailable');
      return undefined;
    }
  }

  private emitCacheCleaned(event: CacheCleanedEvent): void {
    invokeGuarded(this.logger, 'cache-cleaned-listener', () => this.emit('cacheCleaned', event));
  }

  private notify(alert: MemoryAlert): void {
    for (const callback of this.callbacks) {
      invokeGuarded(this.logger, 'memory-alert', () => callback(alert));
    }
  }
}
