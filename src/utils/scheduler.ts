/**
 * Node Scheduler
 *
 * Default Scheduler backed by Node timers. Timers are unref'd so that
 * background monitors never keep an otherwise finished process alive.
 */

import { performance } from 'node:perf_hooks';
import type { Cancel, Clock, Scheduler } from '../types/scheduler.js';

export function createNodeScheduler(): Scheduler {
  return {
    every(intervalMs: number, task: () => void): Cancel {
      const handle = setInterval(task, intervalMs);
      handle.unref();
      return () => clearInterval(handle);
    },
    after(delayMs: number, task: () => void): Cancel {
      const handle = setTimeout(task, delayMs);
      handle.unref();
      return () => clearTimeout(handle);
    },
  };
}

/**
 * Monotonic clock (ms since process start)
 */
export const monotonicNow: Clock = () => performance.now();
