/**
 * Runtime Blocking Sampler
 *
 * Periodic task on the loop it watches. A tick that runs means control
 * reached the loop, so each tick measures the gap since the later of the
 * previous tick and the last recorded activity. A violation fires once
 * `maxConsecutiveBlocks` ticks in a row arrive later than the threshold,
 * then the counter resets. The sampler cannot interrupt blocking code,
 * only report it.
 *
 * Usage:
 * ```typescript
 * const sampler = new RuntimeBlockingSampler({ thresholdMs: 100, logger });
 * sampler.enable((event) => logger.warn(event, 'Event loop blocked'));
 * const handler = sampler.wrapAsync(handleRequest);
 * ```
 */

import { fileURLToPath } from 'node:url';
import type { Logger } from 'pino';
import { SafetyError } from '../api/errors.js';
import { BLOCKING_SAMPLER } from '../config/defaults.js';
import type { BlockingCallback, BlockingEvent, SamplerState } from '../types/sampler.js';
import type { Cancel, Clock, Scheduler } from '../types/scheduler.js';
import type { FrameLocation } from '../types/violations.js';
import { invokeGuarded } from '../utils/logger-helpers.js';
import { createNodeScheduler, monotonicNow } from '../utils/scheduler.js';

export interface BlockingSamplerOptions {
  /** Elapsed time since last activity that counts as blocked (default 100) */
  thresholdMs?: number;

  /** Tick interval (default 10) */
  samplingIntervalMs?: number;

  /** Consecutive blocked ticks before a violation fires (default 5, min 1) */
  maxConsecutiveBlocks?: number;

  scheduler?: Scheduler;
  now?: Clock;
  logger?: Logger;
}

const UNKNOWN_FRAME: FrameLocation = {
  type: 'frame',
  file: 'unknown',
  line: 0,
  functionName: 'unknown',
};

const FRAME_PATTERN = /^\s*at (?:(.+?) \()?(.+?):(\d+):\d+\)?$/;

const MODULE_URL = import.meta.url;
const MODULE_PATH = fileURLToPath(MODULE_URL);

/**
 * First stack frame outside this module and Node internals
 */
export function captureCallFrame(stack: string | undefined = new Error().stack): FrameLocation {
  for (const line of (stack ?? '').split('\n').slice(1)) {
    const match = FRAME_PATTERN.exec(line);
    if (!match) {
      continue;
    }

    const [, functionName, file = '', lineNumber = '0'] = match;
    if (file === MODULE_URL || file === MODULE_PATH || file.startsWith('node:')) {
      continue;
    }

    return {
      type: 'frame',
      file,
      line: Number(lineNumber),
      functionName: functionName ?? '<anonymous>',
    };
  }

  return UNKNOWN_FRAME;
}

function clampConsecutiveBlocks(value: number): number {
  return Number.isFinite(value) ? Math.max(1, Math.floor(value)) : 1;
}

function requirePositive(name: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new SafetyError('ConfigurationError', `${name} must be a positive number, got ${value}`, {
      [name]: value,
    });
  }
  return value;
}

export class RuntimeBlockingSampler {
  private readonly thresholdMs: number;
  private readonly samplingIntervalMs: number;
  private maxConsecutiveBlocks: number;
  private readonly scheduler: Scheduler;
  private readonly now: Clock;
  private readonly logger?: Logger;

  private enabled = false;
  private lastActivityMs: number;
  private lastTickMs: number;
  private consecutiveBlockCount = 0;
  private cancelTask?: Cancel;
  private onViolation?: BlockingCallback;

  constructor(options: BlockingSamplerOptions = {}) {
    this.thresholdMs = requirePositive('thresholdMs', options.thresholdMs ?? BLOCKING_SAMPLER.THRESHOLD_MS);
    this.samplingIntervalMs = requirePositive(
      'samplingIntervalMs',
      options.samplingIntervalMs ?? BLOCKING_SAMPLER.SAMPLING_INTERVAL_MS
    );
    this.maxConsecutiveBlocks = clampConsecutiveBlocks(
      options.maxConsecutiveBlocks ?? BLOCKING_SAMPLER.MAX_CONSECUTIVE_BLOCKS
    );
    this.scheduler = options.scheduler ?? createNodeScheduler();
    this.now = options.now ?? monotonicNow;
    this.logger = options.logger;
    this.lastActivityMs = this.now();
    this.lastTickMs = this.lastActivityMs;
  }

  /**
   * Start sampling. Enabling again replaces the callback and re-arms the
   * periodic task.
   *
   * @param scheduler - Overrides the scheduler given at construction
   */
  public enable(onViolation: BlockingCallback, scheduler?: Scheduler): void {
    this.stopTask();

    this.onViolation = onViolation;
    this.enabled = true;
    this.lastActivityMs = this.now();
    this.lastTickMs = this.lastActivityMs;
    this.consecutiveBlockCount = 0;
    this.cancelTask = (scheduler ?? this.scheduler).every(this.samplingIntervalMs, () => {
      this.sample();
    });

    this.logger?.debug(
      {
        thresholdMs: this.thresholdMs,
        samplingIntervalMs: this.samplingIntervalMs,
        maxConsecutiveBlocks: this.maxConsecutiveBlocks,
      },
      'Blocking sampler enabled'
    );
  }

  /**
   * Stop sampling. Idempotent.
   */
  public disable(): void {
    const wasEnabled = this.enabled;
    this.stopTask();
    this.enabled = false;
    this.consecutiveBlockCount = 0;
    this.onViolation = undefined;

    if (wasEnabled) {
      this.logger?.debug('Blocking sampler disabled');
    }
  }

  /**
   * Mark genuine progress: control returned to the loop. Ignored while
   * disabled.
   */
  public recordActivity(): void {
    if (!this.enabled) {
      return;
    }
    this.lastActivityMs = this.now();
    this.consecutiveBlockCount = 0;
  }

  /**
   * One sampling tick (what the scheduler invokes).
   *
   * @returns The violation event when one fired on this tick
   */
  public sample(): BlockingEvent | undefined {
    if (!this.enabled) {
      return undefined;
    }

    const nowMs = this.now();
    const elapsedMs = nowMs - Math.max(this.lastActivityMs, this.lastTickMs);
    this.lastTickMs = nowMs;

    if (elapsedMs <= this.thresholdMs) {
      this.consecutiveBlockCount = 0;
      return undefined;
    }

    this.consecutiveBlockCount++;
    if (this.consecutiveBlockCount < this.maxConsecutiveBlocks) {
      return undefined;
    }

    const event = this.buildEvent(elapsedMs, this.consecutiveBlockCount);
    this.consecutiveBlockCount = 0;

    this.logger?.warn(
      {
        durationMs: Math.round(elapsedMs),
        consecutiveBlocks: event.consecutiveBlocks,
        frame: event.capturedCallFrame,
      },
      'Event loop blocking detected'
    );

    const callback = this.onViolation;
    if (callback) {
      invokeGuarded(this.logger, 'blocking-sampler', () => callback(event));
    }
    return event;
  }

  /**
   * Decorate `fn` so activity is recorded before and after each call
   */
  public wrap<A extends unknown[], R>(fn: (...args: A) => R): (...args: A) => R {
    return (...args: A): R => {
      this.recordActivity();
      try {
        return fn(...args);
      } finally {
        this.recordActivity();
      }
    };
  }

  /**
   * Like `wrap`, recording activity again when the returned promise settles
   */
  public wrapAsync<A extends unknown[], R>(
    fn: (...args: A) => Promise<R>
  ): (...args: A) => Promise<R> {
    return async (...args: A): Promise<R> => {
      this.recordActivity();
      try {
        return await fn(...args);
      } finally {
        this.recordActivity();
      }
    };
  }

  /**
   * Values below 1 are clamped to 1
   */
  public setMaxConsecutiveBlocks(value: number): void {
    this.maxConsecutiveBlocks = clampConsecutiveBlocks(value);
  }

  public getState(): SamplerState {
    return {
      thresholdMs: this.thresholdMs,
      samplingIntervalMs: this.samplingIntervalMs,
      lastActivityMs: this.lastActivityMs,
      consecutiveBlockCount: this.consecutiveBlockCount,
      maxConsecutiveBlocks: this.maxConsecutiveBlocks,
      enabled: this.enabled,
    };
  }

  private buildEvent(elapsedMs: number, consecutiveBlocks: number): BlockingEvent {
    const frame = captureCallFrame();
    const durationMs = Math.round(elapsedMs);

    return {
      durationSeconds: elapsedMs / 1000,
      capturedCallFrame: frame,
      samplingIntervalSeconds: this.samplingIntervalMs / 1000,
      consecutiveBlocks,
      violation: {
        kind: 'BlockingCall',
        severity: 'error',
        symbol: frame.functionName,
        location: frame,
        message: `Event loop blocked for ${durationMs}ms (${consecutiveBlocks} consecutive samples)`,
        suggestion: 'Move synchronous work off the request path or split it across ticks with setImmediate',
      },
    };
  }

  private stopTask(): void {
    if (this.cancelTask) {
      this.cancelTask();
      this.cancelTask = undefined;
    }
  }
}
