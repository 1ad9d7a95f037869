/**
 * Request Isolation Sandbox
 *
 * Brackets each request with a snapshot of the shared-state store: the
 * state is captured and reset at `createContext`, and restored from that
 * context's own snapshot at `destroyContext`. Because restore never looks
 * at the current state, interleaved contexts cannot hand mutations to one
 * another through it.
 *
 * The caller must destroy every context it creates, including on the
 * error path (see `withIsolation`).
 */

import { createHash, randomUUID } from 'node:crypto';
import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { zodErrorToSafetyError } from '../api/errors.js';
import { REQUEST_ISOLATION } from '../config/defaults.js';
import { ProcessMemoryProbe } from '../monitoring/memory-probe.js';
import { RequestIsolationOptionsSchema } from '../types/schemas/config.js';
import type {
  ContextInfo,
  ContextLeak,
  RequestDescriptor,
  RequestIsolationConfig,
} from '../types/isolation.js';
import type { MemoryProbe } from '../types/memory.js';
import type { Clock, Scheduler } from '../types/scheduler.js';
import { formatBytes } from '../utils/format.js';
import { invokeGuarded } from '../utils/logger-helpers.js';
import { createNodeScheduler, monotonicNow } from '../utils/scheduler.js';
import { TimerGuard } from '../utils/timer-guard.js';
import {
  SharedStateStore,
  captureSharedState,
  resetSharedState,
  restoreSharedState,
  type SharedStatePolicy,
  type SharedStateSnapshot,
} from './shared-state.js';

/**
 * Bookkeeping for one live context
 */
interface RequestContext {
  id: string;
  descriptor: RequestDescriptor;
  startedAtMs: number;
  stateBackup: SharedStateSnapshot;
  memoryAtStart: number;
  /** Restore closures for explicitly tracked mutations, in registration order */
  trackedMutations: Array<{ label: string; restore: () => void }>;
}

/**
 * Request isolation events
 */
export interface RequestIsolationEvents {
  contextCreated: (info: ContextInfo) => void;
  contextDestroyed: (info: ContextInfo, durationMs: number) => void;
  contextLeak: (leaks: ContextLeak[]) => void;
}

export interface RequestIsolationOptions extends Partial<RequestIsolationConfig> {
  /** Shared-state store the contexts guard (default: an empty store) */
  store?: SharedStateStore;
  policy?: SharedStatePolicy;
  probe?: MemoryProbe;
  scheduler?: Scheduler;
  now?: Clock;
  logger?: Logger;
}

export const DEFAULT_SHARED_STATE_POLICY: SharedStatePolicy = {
  serverAllowList: REQUEST_ISOLATION.SERVER_ALLOW_LIST,
  envAllowList: REQUEST_ISOLATION.ENV_ALLOW_LIST,
};

function resolveConfig(options: RequestIsolationOptions): RequestIsolationConfig {
  const result = RequestIsolationOptionsSchema.safeParse({
    maxContextDurationMs: options.maxContextDurationMs ?? REQUEST_ISOLATION.MAX_CONTEXT_DURATION_MS,
    maxContextMemoryGrowthBytes: options.maxContextMemoryGrowthBytes,
    leakSweepIntervalMs: options.leakSweepIntervalMs ?? REQUEST_ISOLATION.LEAK_SWEEP_INTERVAL_MS,
  });
  if (!result.success) {
    throw zodErrorToSafetyError(result.error, 'ConfigurationError', 'Invalid request isolation configuration');
  }
  return result.data;
}

function pathHash(path: string): string {
  return createHash('md5').update(path).digest('hex').slice(0, 8);
}

export class RequestIsolation extends EventEmitter<RequestIsolationEvents> {
  private readonly config: RequestIsolationConfig;
  private readonly store: SharedStateStore;
  private readonly policy: SharedStatePolicy;
  private readonly probe: MemoryProbe;
  private readonly now: Clock;
  private readonly logger?: Logger;
  private readonly sweepTimer: TimerGuard;

  private readonly contexts = new Map<string, RequestContext>();

  constructor(options: RequestIsolationOptions = {}) {
    super();
    this.config = resolveConfig(options);
    this.store = options.store ?? new SharedStateStore();
    this.policy = options.policy ?? DEFAULT_SHARED_STATE_POLICY;
    this.probe = options.probe ?? new ProcessMemoryProbe();
    this.now = options.now ?? monotonicNow;
    this.logger = options.logger;
    this.sweepTimer = new TimerGuard('context-leak-sweep', options.scheduler ?? createNodeScheduler());
  }

  /**
   * Snapshot and reset shared state for a new request.
   *
   * @returns Context id, `ctx_<uuid>_<METHOD>_<path hash>`
   */
  public createContext(descriptor: RequestDescriptor): string {
    const method = descriptor.method.toUpperCase();
    const id = `ctx_${randomUUID()}_${method}_${pathHash(descriptor.path)}`;

    const stateBackup = captureSharedState(this.store);
    resetSharedState(this.store, this.policy);

    const context: RequestContext = {
      id,
      descriptor: { method, path: descriptor.path },
      startedAtMs: this.now(),
      stateBackup,
      memoryAtStart: this.probe.read().currentBytes,
      trackedMutations: [],
    };
    this.contexts.set(id, context);

    this.logger?.debug({ contextId: id, method, path: descriptor.path }, 'Request context created');
    this.emit('contextCreated', this.toInfo(context));
    return id;
  }

  /**
   * Restore the context's snapshot, undo tracked mutations (newest first)
   * and request a collection. Unknown ids are ignored.
   */
  public destroyContext(contextId: string): void {
    const context = this.contexts.get(contextId);
    if (!context) {
      this.logger?.debug({ contextId }, 'Destroy of unknown request context ignored');
      return;
    }
    this.contexts.delete(contextId);

    restoreSharedState(this.store, context.stateBackup);

    for (const mutation of [...context.trackedMutations].reverse()) {
      try {
        mutation.restore();
      } catch (err) {
        this.logger?.error(
          { err, contextId, mutation: mutation.label },
          'Failed to restore tracked mutation'
        );
      }
    }

    this.probe.collect();

    const durationMs = this.now() - context.startedAtMs;
    this.logger?.debug({ contextId, durationMs: Math.round(durationMs) }, 'Request context destroyed');
    this.emit('contextDestroyed', this.toInfo(context), durationMs);
  }

  public hasContext(contextId: string): boolean {
    return this.contexts.has(contextId);
  }

  public getContextInfo(contextId: string): ContextInfo | undefined {
    const context = this.contexts.get(contextId);
    return context ? this.toInfo(context) : undefined;
  }

  public activeContextCount(): number {
    return this.contexts.size;
  }

  /**
   * The store these contexts snapshot and restore
   */
  public getStore(): SharedStateStore {
    return this.store;
  }

  /**
   * Register a field the request is about to reassign (typically a
   * class-level static). Its current value is put back when the context
   * is destroyed.
   *
   * @returns false when the context does not exist
   */
  public trackMutation<T extends object, K extends keyof T>(
    contextId: string,
    target: T,
    key: K
  ): boolean {
    const context = this.contexts.get(contextId);
    if (!context) {
      this.logger?.warn({ contextId, key: String(key) }, 'Mutation tracked for unknown request context');
      return false;
    }

    const original = target[key];
    context.trackedMutations.push({
      label: String(key),
      restore: () => {
        target[key] = original;
      },
    });
    return true;
  }

  /**
   * Contexts older than the maximum duration, or over the memory growth
   * budget when one is configured. Nothing is destroyed.
   */
  public checkContextLeaks(): ContextLeak[] {
    if (this.contexts.size === 0) {
      return [];
    }

    const now = this.now();
    const currentBytes = this.probe.read().currentBytes;
    const maxGrowth = this.config.maxContextMemoryGrowthBytes;
    const leaks: ContextLeak[] = [];

    for (const context of this.contexts.values()) {
      const durationMs = now - context.startedAtMs;
      const memoryGrowthBytes = currentBytes - context.memoryAtStart;
      const overDuration = durationMs > this.config.maxContextDurationMs;
      const overMemory = maxGrowth !== undefined && memoryGrowthBytes > maxGrowth;

      if (overDuration || overMemory) {
        leaks.push({
          contextId: context.id,
          durationSeconds: durationMs / 1000,
          memoryGrowthBytes,
        });
      }
    }

    return leaks;
  }

  /**
   * Run `checkContextLeaks` periodically, emitting `contextLeak` when it
   * finds any
   */
  public startLeakSweep(): void {
    this.sweepTimer.every(() => {
      const leaks = this.checkContextLeaks();
      if (leaks.length === 0) {
        return;
      }

      this.logger?.warn(
        {
          leaks: leaks.map((leak) => ({
            contextId: leak.contextId,
            durationSeconds: Math.round(leak.durationSeconds),
            memoryGrowth: formatBytes(leak.memoryGrowthBytes),
          })),
        },
        'Leaked request contexts detected'
      );
      invokeGuarded(this.logger, 'context-leak-listener', () => this.emit('contextLeak', leaks));
    }, this.config.leakSweepIntervalMs);
  }

  public stopLeakSweep(): void {
    this.sweepTimer.clear();
  }

  private toInfo(context: RequestContext): ContextInfo {
    return {
      id: context.id,
      descriptor: { ...context.descriptor },
      startedAtMs: context.startedAtMs,
      memoryAtStart: context.memoryAtStart,
      trackedMutations: context.trackedMutations.length,
    };
  }
}
