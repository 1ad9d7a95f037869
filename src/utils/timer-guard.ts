/**
 * Timer Lifecycle Management Guards
 *
 * Wraps scheduler tasks so every component owns at most one live task per
 * name and can cancel all of them at shutdown.
 *
 * Usage:
 * ```typescript
 * const guard = new TimerGuard('memory-check', scheduler);
 * guard.every(() => this.checkMemory(), 10_000);
 * // Later...
 * guard.clear();
 * ```
 */

import type { Cancel, Scheduler } from '../types/scheduler.js';

/**
 * Single named task on a scheduler
 *
 * Scheduling again cancels the previous task first.
 */
export class TimerGuard {
  private cancel?: Cancel;
  private readonly name: string;
  private readonly scheduler: Scheduler;

  constructor(name: string, scheduler: Scheduler) {
    this.name = name;
    this.scheduler = scheduler;
  }

  /**
   * Run `task` once after `delayMs`. The guard becomes inactive once the
   * task has run.
   */
  after(task: () => void, delayMs: number): void {
    this.clear();
    const cancel = this.scheduler.after(delayMs, () => {
      if (this.cancel === cancel) {
        this.cancel = undefined;
      }
      task();
    });
    this.cancel = cancel;
  }

  /**
   * Run `task` every `intervalMs`
   */
  every(task: () => void, intervalMs: number): void {
    this.clear();
    this.cancel = this.scheduler.every(intervalMs, task);
  }

  /**
   * Cancel the task if set. Idempotent.
   */
  clear(): void {
    if (this.cancel) {
      this.cancel();
      this.cancel = undefined;
    }
  }

  isActive(): boolean {
    return this.cancel !== undefined;
  }

  getName(): string {
    return this.name;
  }
}

/**
 * Several named tasks on one scheduler
 *
 * Used by components that run more than one periodic task
 * (e.g. memory sampling plus cache size sweeps).
 */
export class MultiTimerGuard {
  private timers = new Map<string, TimerGuard>();
  private readonly scheduler: Scheduler;

  constructor(scheduler: Scheduler) {
    this.scheduler = scheduler;
  }

  after(name: string, task: () => void, delayMs: number): void {
    this.guardFor(name).after(task, delayMs);
  }

  every(name: string, task: () => void, intervalMs: number): void {
    this.guardFor(name).every(task, intervalMs);
  }

  clear(name: string): void {
    this.timers.get(name)?.clear();
    this.timers.delete(name);
  }

  clearAll(): void {
    for (const name of Array.from(this.timers.keys())) {
      this.clear(name);
    }
  }

  isActive(name: string): boolean {
    return this.timers.get(name)?.isActive() ?? false;
  }

  getActiveCount(): number {
    let count = 0;
    for (const guard of this.timers.values()) {
      if (guard.isActive()) {
        count++;
      }
    }
    return count;
  }

  private guardFor(name: string): TimerGuard {
    let guard = this.timers.get(name);
    if (!guard) {
      guard = new TimerGuard(name, this.scheduler);
      this.timers.set(name, guard);
    }
    return guard;
  }
}
