/**
 * Health Reporter
 *
 * Aggregates memory guard stats, sampler state, live request contexts,
 * request counts and durations, event loop lag and recent alerts into one
 * report for an external health endpoint.
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { HEALTH } from '../config/defaults.js';
import type { ContextLeak } from '../types/isolation.js';
import type { MemoryAlert, MemoryGuardStats } from '../types/memory.js';
import type { BlockingEvent, SamplerState } from '../types/sampler.js';
import type { Clock, Scheduler } from '../types/scheduler.js';
import { formatBytes } from '../utils/format.js';
import { invokeGuarded, lazyLog } from '../utils/logger-helpers.js';
import { createNodeScheduler, monotonicNow } from '../utils/scheduler.js';
import { TimerGuard } from '../utils/timer-guard.js';

export type HealthStatus = 'healthy' | 'degraded' | 'critical';

export type HealthAlertType = 'BlockingOperation' | 'MemoryLeak' | 'CriticalMemory' | 'ContextLeak';

export interface HealthAlert {
  type: HealthAlertType;
  severity: 'warning' | 'critical';
  message: string;
  timestampMs: number;
  details?: Record<string, unknown>;
}

export type HealthCounters = Record<HealthAlertType, number>;

export interface RequestCounters {
  total: number;
  success: number;
  errors: number;
  active: number;
}

/**
 * Over the bounded history of recent request durations; all 0 before the
 * first request ends
 */
export interface ResponseTimeStats {
  samples: number;
  averageMs: number;
  minMs: number;
  maxMs: number;
}

export interface EventLoopLagStats {
  /** Timer delay beyond the interval at the last check */
  currentMs: number;
  maxMs: number;
}

export interface HealthReport {
  status: HealthStatus;
  timestampMs: number;
  memory?: MemoryGuardStats;
  sampler?: SamplerState;
  activeContexts?: number;
  requests: RequestCounters;
  responseTimes: ResponseTimeStats;
  eventLoopLag: EventLoopLagStats;
  counters: HealthCounters;
  /** Newest last */
  recentAlerts: HealthAlert[];
}

/**
 * Components the reporter reads from. All optional.
 */
export interface HealthSources {
  memoryGuard?: { getStats(): MemoryGuardStats };
  sampler?: { getState(): SamplerState };
  isolation?: { activeContextCount(): number };
}

export interface HealthReporterOptions {
  maxAlertHistory?: number;
  statusWindowMs?: number;
  maxResponseTimeHistory?: number;
  lagCheckIntervalMs?: number;
  scheduler?: Scheduler;
  now?: Clock;
  logger?: Logger;
}

export interface HealthReporterEvents {
  alert: (alert: HealthAlert) => void;
}

export class HealthReporter extends EventEmitter<HealthReporterEvents> {
  private readonly sources: HealthSources;
  private readonly maxAlertHistory: number;
  private readonly statusWindowMs: number;
  private readonly maxResponseTimeHistory: number;
  private readonly lagCheckIntervalMs: number;
  private readonly lagTimer: TimerGuard;
  private readonly now: Clock;
  private readonly logger?: Logger;

  private requests: RequestCounters = { total: 0, success: 0, errors: 0, active: 0 };
  private responseTimes: number[] = [];
  private lastLagCheckMs = 0;
  private lag: EventLoopLagStats = { currentMs: 0, maxMs: 0 };

  private alerts: HealthAlert[] = [];
  private counters: HealthCounters = {
    BlockingOperation: 0,
    MemoryLeak: 0,
    CriticalMemory: 0,
    ContextLeak: 0,
  };

  constructor(sources: HealthSources = {}, options: HealthReporterOptions = {}) {
    super();
    this.sources = sources;
    this.maxAlertHistory = Math.max(1, options.maxAlertHistory ?? HEALTH.MAX_ALERT_HISTORY);
    this.statusWindowMs = options.statusWindowMs ?? HEALTH.STATUS_WINDOW_MS;
    this.maxResponseTimeHistory = Math.max(
      1,
      options.maxResponseTimeHistory ?? HEALTH.MAX_RESPONSE_TIME_HISTORY
    );
    this.lagCheckIntervalMs = options.lagCheckIntervalMs ?? HEALTH.LAG_CHECK_INTERVAL_MS;
    this.lagTimer = new TimerGuard('event-loop-lag', options.scheduler ?? createNodeScheduler());
    this.now = options.now ?? monotonicNow;
    this.logger = options.logger;
  }

  public recordRequestStart(): void {
    this.requests.total++;
    this.requests.active++;
  }

  public recordRequestEnd(durationMs: number, success = true): void {
    this.requests.active = Math.max(0, this.requests.active - 1);
    if (success) {
      this.requests.success++;
    } else {
      this.requests.errors++;
    }

    this.responseTimes.push(durationMs);
    if (this.responseTimes.length > this.maxResponseTimeHistory) {
      this.responseTimes.shift();
    }
  }

  /**
   * Measure event loop lag every `lagCheckIntervalMs`. Idempotent.
   */
  public startLagMonitor(): void {
    if (this.lagTimer.isActive()) {
      return;
    }
    this.lastLagCheckMs = this.now();
    this.lagTimer.every(() => {
      this.checkEventLoopLag();
    }, this.lagCheckIntervalMs);
  }

  public stopLagMonitor(): void {
    this.lagTimer.clear();
  }

  /**
   * One lag measurement: how much later than its interval this check ran
   */
  public checkEventLoopLag(): number {
    const nowMs = this.now();
    const lagMs = Math.max(0, nowMs - this.lastLagCheckMs - this.lagCheckIntervalMs);
    this.lastLagCheckMs = nowMs;

    this.lag = { currentMs: lagMs, maxMs: Math.max(this.lag.maxMs, lagMs) };
    if (lagMs > 0) {
      lazyLog(this.logger, 'debug', () => ({ lagMs, maxLagMs: this.lag.maxMs }), 'Event loop lag measured');
    }
    return lagMs;
  }

  public getResponseTimes(): ResponseTimeStats {
    if (this.responseTimes.length === 0) {
      return { samples: 0, averageMs: 0, minMs: 0, maxMs: 0 };
    }

    const total = this.responseTimes.reduce((sum, value) => sum + value, 0);
    return {
      samples: this.responseTimes.length,
      averageMs: total / this.responseTimes.length,
      minMs: Math.min(...this.responseTimes),
      maxMs: Math.max(...this.responseTimes),
    };
  }

  public recordAlert(alert: Omit<HealthAlert, 'timestampMs'>): HealthAlert {
    const recorded: HealthAlert = { ...alert, timestampMs: this.now() };

    this.alerts.push(recorded);
    if (this.alerts.length > this.maxAlertHistory) {
      this.alerts = this.alerts.slice(-this.maxAlertHistory);
    }
    this.counters[recorded.type]++;

    this.logger?.debug({ type: recorded.type, severity: recorded.severity }, 'Health alert recorded');
    invokeGuarded(this.logger, 'alert-listener', () => this.emit('alert', recorded));
    return recorded;
  }

  public recordBlocking(event: BlockingEvent): HealthAlert {
    const frame = event.capturedCallFrame;
    return this.recordAlert({
      type: 'BlockingOperation',
      severity: 'warning',
      message: event.violation.message,
      details: {
        durationSeconds: event.durationSeconds,
        consecutiveBlocks: event.consecutiveBlocks,
        frame: `${frame.functionName} (${frame.file}:${frame.line})`,
      },
    });
  }

  public recordMemoryAlert(alert: MemoryAlert): HealthAlert {
    if (alert.type === 'CriticalMemory') {
      return this.recordAlert({
        type: 'CriticalMemory',
        severity: 'critical',
        message: `Memory ${formatBytes(alert.currentBytes)} above critical threshold ${formatBytes(alert.thresholdBytes)}`,
        details: { currentBytes: alert.currentBytes, thresholdBytes: alert.thresholdBytes },
      });
    }

    return this.recordAlert({
      type: 'MemoryLeak',
      severity: 'warning',
      message: `Memory growing at ${formatBytes(alert.growthBytesPerSecond * 60)}/min`,
      details: {
        growthBytesPerSecond: alert.growthBytesPerSecond,
        snapshots: alert.snapshots.length,
      },
    });
  }

  public recordContextLeaks(leaks: readonly ContextLeak[]): HealthAlert | undefined {
    if (leaks.length === 0) {
      return undefined;
    }

    return this.recordAlert({
      type: 'ContextLeak',
      severity: 'warning',
      message: `${leaks.length} request context(s) outlived their budget`,
      details: { contextIds: leaks.map((leak) => leak.contextId) },
    });
  }

  public getAlerts(): readonly HealthAlert[] {
    return [...this.alerts];
  }

  public clearAlerts(): void {
    this.alerts = [];
  }

  /**
   * Critical when memory is past the critical rung (a restart was
   * requested or a recent critical alert exists), degraded on any recent
   * warning, healthy otherwise.
   */
  public getStatus(memory?: MemoryGuardStats): HealthStatus {
    const cutoff = this.now() - this.statusWindowMs;
    const recent = this.alerts.filter((alert) => alert.timestampMs >= cutoff);

    if (memory?.restartRequested || recent.some((alert) => alert.severity === 'critical')) {
      return 'critical';
    }
    return recent.length > 0 ? 'degraded' : 'healthy';
  }

  public getReport(): HealthReport {
    const memory = this.sources.memoryGuard?.getStats();

    return {
      status: this.getStatus(memory),
      timestampMs: this.now(),
      memory,
      sampler: this.sources.sampler?.getState(),
      activeContexts: this.sources.isolation?.activeContextCount(),
      requests: { ...this.requests },
      responseTimes: this.getResponseTimes(),
      eventLoopLag: { ...this.lag },
      counters: { ...this.counters },
      recentAlerts: [...this.alerts],
    };
  }
}
