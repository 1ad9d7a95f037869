/**
 * Main type exports for event-loop-guard
 */

export type * from './violations.js';
export type * from './cache.js';
export type * from './memory.js';
export type * from './isolation.js';
export type * from './sampler.js';
export type * from './scheduler.js';
