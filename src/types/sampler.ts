/**
 * Runtime Blocking Sampler Types
 *
 * @module types/sampler
 */

import type { BlockingViolation, FrameLocation } from './violations.js';

export interface SamplerState {
  thresholdMs: number;
  samplingIntervalMs: number;
  lastActivityMs: number;
  consecutiveBlockCount: number;
  maxConsecutiveBlocks: number;
  enabled: boolean;
}

/**
 * Payload delivered to the violation callback
 */
export interface BlockingEvent {
  /** Time since the last recorded activity */
  durationSeconds: number;
  capturedCallFrame: FrameLocation;
  samplingIntervalSeconds: number;
  consecutiveBlocks: number;
  violation: BlockingViolation;
}

export type BlockingCallback = (event: BlockingEvent) => void;
