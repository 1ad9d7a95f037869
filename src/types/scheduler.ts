/**
 * Scheduler Types
 *
 * The monitors never create timers directly; they schedule lightweight
 * tasks through this handle so tests (and alternative loops) can drive them.
 *
 * @module types/scheduler
 */

/**
 * Cancels a scheduled task. Safe to call more than once.
 */
export type Cancel = () => void;

export interface Scheduler {
  /** Run `task` every `intervalMs` until cancelled */
  every(intervalMs: number, task: () => void): Cancel;

  /** Run `task` once after `delayMs` unless cancelled */
  after(delayMs: number, task: () => void): Cancel;
}

/**
 * Monotonic clock in milliseconds
 */
export type Clock = () => number;
