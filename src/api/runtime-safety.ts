/**
 * Runtime Safety
 *
 * Composition root: builds every component from one validated
 * configuration, routes their alerts into the health reporter and exposes
 * a start/stop lifecycle for the host server's bootstrap.
 *
 * Events:
 * - 'alert' - Any alert recorded by the health reporter
 * - 'restartRequested' - Memory stayed critical; an external supervisor should restart
 */

import { readFile } from 'node:fs/promises';
import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { pino } from 'pino';
import { BlockingCodeAnalyzer } from '../analysis/blocking-analyzer.js';
import { GlobalStatePolicyChecker } from '../analysis/global-state-policy.js';
import { errorReport } from '../analysis/report.js';
import { toSafetyError } from './errors.js';
import {
  getBlockingSamplerConfig,
  getHealthConfig,
  getMemoryGuardConfig,
  getRequestIsolationConfig,
  getSharedStatePolicy,
  loadConfig,
  type Config,
  type Environment,
} from '../config/loader.js';
import { RequestIsolation } from '../isolation/request-isolation.js';
import { SharedStateStore } from '../isolation/shared-state.js';
import { withIsolation } from '../isolation/with-isolation.js';
import { RuntimeBlockingSampler } from '../monitoring/blocking-sampler.js';
import { HealthReporter, type HealthAlert, type HealthReport } from '../monitoring/health-reporter.js';
import { MemoryGuard } from '../monitoring/memory-guard.js';
import { ProcessMemoryProbe } from '../monitoring/memory-probe.js';
import type { RequestDescriptor } from '../types/isolation.js';
import type { MemoryGuardStats, MemoryProbe } from '../types/memory.js';
import type { Clock, Scheduler } from '../types/scheduler.js';
import type { ScanReport } from '../types/violations.js';
import { createNodeScheduler, monotonicNow } from '../utils/scheduler.js';

export interface RuntimeSafetyOptions {
  /** Validated configuration; loaded from runtime.yaml when omitted */
  config?: Config;
  configPath?: string;
  environment?: Environment;

  logger?: Logger;

  /** Shared-state store (default: seeded once from the running process) */
  store?: SharedStateStore;

  probe?: MemoryProbe;
  scheduler?: Scheduler;
  now?: Clock;
}

export interface RuntimeSafetyEvents {
  alert: (alert: HealthAlert) => void;
  restartRequested: (stats: MemoryGuardStats) => void;
}

export class RuntimeSafety extends EventEmitter<RuntimeSafetyEvents> {
  public readonly config: Config;
  public readonly logger: Logger;
  public readonly analyzer: BlockingCodeAnalyzer;
  public readonly policyChecker: GlobalStatePolicyChecker;
  public readonly sampler: RuntimeBlockingSampler;
  public readonly memoryGuard: MemoryGuard;
  public readonly isolation: RequestIsolation;
  public readonly health: HealthReporter;

  private readonly now: Clock;
  private started = false;

  constructor(options: RuntimeSafetyOptions = {}) {
    super();
    this.config = options.config ?? loadConfig(options.configPath, options.environment);
    this.logger = options.logger ?? pino({ level: this.config.logging.level });

    const probe = options.probe ?? new ProcessMemoryProbe();
    const scheduler = options.scheduler ?? createNodeScheduler();
    const now = options.now ?? monotonicNow;
    this.now = now;
    const samplerConfig = getBlockingSamplerConfig(this.config);

    this.analyzer = new BlockingCodeAnalyzer({ logger: this.logger });
    this.policyChecker = new GlobalStatePolicyChecker({ logger: this.logger });
    this.sampler = new RuntimeBlockingSampler({
      thresholdMs: samplerConfig.thresholdMs,
      samplingIntervalMs: samplerConfig.samplingIntervalMs,
      maxConsecutiveBlocks: samplerConfig.maxConsecutiveBlocks,
      scheduler,
      now,
      logger: this.logger,
    });
    this.memoryGuard = new MemoryGuard({
      ...getMemoryGuardConfig(this.config),
      probe,
      scheduler,
      now,
      logger: this.logger,
    });
    this.isolation = new RequestIsolation({
      ...getRequestIsolationConfig(this.config),
      store: options.store ?? SharedStateStore.fromProcess(),
      policy: getSharedStatePolicy(this.config),
      probe,
      scheduler,
      now,
      logger: this.logger,
    });
    this.health = new HealthReporter(
      { memoryGuard: this.memoryGuard, sampler: this.sampler, isolation: this.isolation },
      { ...getHealthConfig(this.config), scheduler, now, logger: this.logger }
    );

    this.memoryGuard.onMemoryLeak((alert) => this.health.recordMemoryAlert(alert));
    this.memoryGuard.on('restartRequested', (stats) => this.emit('restartRequested', stats));
    this.isolation.on('contextLeak', (leaks) => this.health.recordContextLeaks(leaks));
    this.health.on('alert', (alert) => this.emit('alert', alert));
  }

  /**
   * Start background monitoring. Idempotent.
   */
  public start(): void {
    if (this.started) {
      return;
    }

    this.memoryGuard.startMonitoring();
    this.isolation.startLeakSweep();
    this.health.startLagMonitor();
    if (this.config.blocking_sampler.enabled) {
      this.sampler.enable((event) => this.health.recordBlocking(event));
    }

    this.started = true;
    this.logger.info(
      { blockingSampler: this.config.blocking_sampler.enabled },
      'Runtime safety monitoring started'
    );
  }

  public stop(): void {
    if (!this.started) {
      return;
    }

    this.sampler.disable();
    this.health.stopLagMonitor();
    this.isolation.stopLeakSweep();
    this.memoryGuard.stopMonitoring();
    this.started = false;
    this.logger.info('Runtime safety monitoring stopped');
  }

  public isStarted(): boolean {
    return this.started;
  }

  /**
   * Blocking scan, plus the global-state policy report when
   * `analyzer.policy_check` is on
   */
  public scan(sourceText: string, contextLabel = '<inline>'): ScanReport[] {
    const reports = [this.analyzer.scan(sourceText, contextLabel)];
    if (this.config.analyzer.policy_check) {
      reports.push(this.policyChecker.check(sourceText, contextLabel));
    }
    return reports;
  }

  public async scanFile(path: string): Promise<ScanReport[]> {
    let sourceText: string;
    try {
      sourceText = await readFile(path, 'utf8');
    } catch (error) {
      return [errorReport(path, `Unable to read file: ${toSafetyError(error, 'AnalysisError').message}`)];
    }
    return this.scan(sourceText, path);
  }

  /**
   * Run a request handler inside an isolated context, recording sampler
   * activity around it and the request's outcome and duration in the
   * health report
   */
  public async handle<T>(
    descriptor: RequestDescriptor,
    handler: (contextId: string) => T | Promise<T>
  ): Promise<T> {
    const tracked = this.sampler.wrapAsync(
      async (contextId: string): Promise<T> => await handler(contextId)
    );
    const startedAtMs = this.now();
    let success = false;

    this.health.recordRequestStart();
    try {
      const result = await withIsolation(this.isolation, descriptor, tracked);
      success = true;
      return result;
    } finally {
      this.health.recordRequestEnd(this.now() - startedAtMs, success);
    }
  }

  public getHealth(): HealthReport {
    return this.health.getReport();
  }
}

/**
 * Build the runtime safety components from configuration
 *
 * @example
 * ```typescript
 * const safety = createRuntimeSafety({ environment: 'production' });
 * safety.memoryGuard.registerCache('sessions', new MemoryCache());
 * safety.on('restartRequested', () => supervisor.restart());
 * safety.start();
 * ```
 */
export function createRuntimeSafety(options: RuntimeSafetyOptions = {}): RuntimeSafety {
  return new RuntimeSafety(options);
}
