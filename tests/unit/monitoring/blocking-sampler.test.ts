import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  RuntimeBlockingSampler,
  captureCallFrame,
} from '../../../src/monitoring/blocking-sampler.js';
import { SafetyError } from '../../../src/api/errors.js';
import type { BlockingEvent } from '../../../src/types/sampler.js';
import { ManualScheduler } from '../../helpers/manual-scheduler.js';

describe('RuntimeBlockingSampler', () => {
  let scheduler: ManualScheduler;
  let sampler: RuntimeBlockingSampler;

  beforeEach(() => {
    scheduler = new ManualScheduler();
    sampler = new RuntimeBlockingSampler({
      thresholdMs: 100,
      samplingIntervalMs: 10,
      maxConsecutiveBlocks: 5,
      scheduler,
      now: scheduler.now,
    });
  });

  describe('configuration', () => {
    it('uses the defaults when constructed without options', () => {
      const state = new RuntimeBlockingSampler({ scheduler, now: scheduler.now }).getState();

      expect(state).toEqual({
        thresholdMs: 100,
        samplingIntervalMs: 10,
        lastActivityMs: 0,
        consecutiveBlockCount: 0,
        maxConsecutiveBlocks: 5,
        enabled: false,
      });
    });

    it('rejects a non-positive threshold or interval', () => {
      expect(() => new RuntimeBlockingSampler({ thresholdMs: 0, scheduler })).toThrow(SafetyError);
      expect(() => new RuntimeBlockingSampler({ thresholdMs: 0, scheduler })).toThrow(
        'thresholdMs must be a positive number, got 0'
      );
      expect(() => new RuntimeBlockingSampler({ samplingIntervalMs: -5, scheduler })).toThrow(
        'samplingIntervalMs must be a positive number, got -5'
      );
    });

    it('clamps the consecutive block limit to at least 1', () => {
      sampler.setMaxConsecutiveBlocks(0);
      expect(sampler.getState().maxConsecutiveBlocks).toBe(1);

      sampler.setMaxConsecutiveBlocks(Number.NaN);
      expect(sampler.getState().maxConsecutiveBlocks).toBe(1);

      sampler.setMaxConsecutiveBlocks(3.7);
      expect(sampler.getState().maxConsecutiveBlocks).toBe(3);
    });
  });

  describe('sampling', () => {
    it('does nothing while disabled', () => {
      scheduler.block(500);

      expect(sampler.sample()).toBeUndefined();
      expect(sampler.getState().consecutiveBlockCount).toBe(0);
    });

    it('fires once the limit of consecutive late samples is reached', () => {
      const onViolation = vi.fn<(event: BlockingEvent) => void>();
      sampler.enable(onViolation);

      for (let i = 1; i <= 4; i++) {
        scheduler.block(150);
        expect(sampler.sample()).toBeUndefined();
        expect(sampler.getState().consecutiveBlockCount).toBe(i);
      }

      scheduler.block(150);
      const event = sampler.sample();

      expect(event).toBeDefined();
      expect(onViolation).toHaveBeenCalledTimes(1);
      expect(onViolation).toHaveBeenCalledWith(event);
      expect(sampler.getState().consecutiveBlockCount).toBe(0);
    });

    it('describes the blocked interval in the event', () => {
      const events: BlockingEvent[] = [];
      sampler.enable((event) => events.push(event));

      // Every tick runs 150ms after the previous one
      for (let i = 0; i < 5; i++) {
        scheduler.block(150);
        scheduler.advance(0);
      }

      expect(events).toHaveLength(1);
      const [event] = events;
      expect(event?.durationSeconds).toBe(0.15);
      expect(event?.samplingIntervalSeconds).toBe(0.01);
      expect(event?.consecutiveBlocks).toBe(5);
      expect(event?.capturedCallFrame.type).toBe('frame');
      expect(event?.violation.kind).toBe('BlockingCall');
      expect(event?.violation.severity).toBe('error');
      expect(event?.violation.symbol).toBe(event?.capturedCallFrame.functionName);
      expect(event?.violation.message).toBe('Event loop blocked for 150ms (5 consecutive samples)');
    });

    it('never fires while ticks arrive on time', () => {
      const onViolation = vi.fn();
      sampler.enable(onViolation);

      scheduler.advance(1_000);

      expect(onViolation).not.toHaveBeenCalled();
      expect(sampler.getState().consecutiveBlockCount).toBe(0);
    });

    it('counts a single long block as one late sample', () => {
      const onViolation = vi.fn();
      sampler.enable(onViolation);

      scheduler.block(150);
      scheduler.advance(40);

      expect(onViolation).not.toHaveBeenCalled();
      expect(sampler.getState().consecutiveBlockCount).toBe(0);
    });

    it('resets the counter when a sample is under the threshold', () => {
      sampler.enable(() => undefined);
      scheduler.block(150);
      sampler.sample();
      scheduler.block(150);
      sampler.sample();
      expect(sampler.getState().consecutiveBlockCount).toBe(2);

      scheduler.block(50);
      expect(sampler.sample()).toBeUndefined();
      expect(sampler.getState().consecutiveBlockCount).toBe(0);
    });

    it('resets the counter when activity is recorded', () => {
      sampler.enable(() => undefined);
      scheduler.block(150);
      sampler.sample();

      sampler.recordActivity();

      expect(sampler.getState().consecutiveBlockCount).toBe(0);
      expect(sampler.getState().lastActivityMs).toBe(150);
    });

    it('measures from recorded activity inside a gap', () => {
      sampler.enable(() => undefined);
      scheduler.block(150);
      sampler.recordActivity();
      scheduler.block(20);

      expect(sampler.sample()).toBeUndefined();
      expect(sampler.getState().consecutiveBlockCount).toBe(0);
    });

    it('never fires while activity keeps being recorded', () => {
      const onViolation = vi.fn();
      sampler.enable(onViolation);

      for (let i = 0; i < 20; i++) {
        scheduler.advance(50);
        sampler.recordActivity();
      }

      expect(onViolation).not.toHaveBeenCalled();
    });

    it('fires on the first blocked sample when the limit is 1', () => {
      const onViolation = vi.fn();
      sampler.setMaxConsecutiveBlocks(1);
      sampler.enable(onViolation);
      scheduler.block(101);

      const event = sampler.sample();

      expect(event?.consecutiveBlocks).toBe(1);
      expect(onViolation).toHaveBeenCalledTimes(1);
    });

    it('keeps sampling when the callback throws', () => {
      sampler.setMaxConsecutiveBlocks(1);
      sampler.enable(() => {
        throw new Error('callback failure');
      });
      scheduler.block(200);

      expect(() => sampler.sample()).not.toThrow();
      expect(sampler.getState().enabled).toBe(true);
    });
  });

  describe('enable and disable', () => {
    it('schedules one periodic task', () => {
      sampler.enable(() => undefined);
      sampler.enable(() => undefined);

      expect(scheduler.pendingCount()).toBe(1);
      expect(sampler.getState().enabled).toBe(true);
    });

    it('replaces the callback when enabled again', () => {
      const first = vi.fn();
      const second = vi.fn();
      sampler.setMaxConsecutiveBlocks(1);

      sampler.enable(first);
      sampler.enable(second);
      scheduler.block(200);
      sampler.sample();

      expect(first).not.toHaveBeenCalled();
      expect(second).toHaveBeenCalledTimes(1);
    });

    it('uses a scheduler passed to enable', () => {
      const other = new ManualScheduler();

      sampler.enable(() => undefined, other);

      expect(other.pendingCount()).toBe(1);
      expect(scheduler.pendingCount()).toBe(0);
    });

    it('cancels the task and is idempotent', () => {
      sampler.enable(() => undefined);

      sampler.disable();
      sampler.disable();

      expect(scheduler.pendingCount()).toBe(0);
      expect(sampler.getState().enabled).toBe(false);
    });

    it('restarts the activity clock when enabled', () => {
      scheduler.block(1_000);

      sampler.enable(() => undefined);

      expect(sampler.getState().lastActivityMs).toBe(1_000);
    });
  });

  describe('wrap', () => {
    beforeEach(() => {
      sampler.enable(() => undefined);
    });

    it('ignores activity while the sampler is disabled', () => {
      sampler.disable();
      const wrapped = sampler.wrap(() => 'ok');
      scheduler.block(300);

      sampler.recordActivity();
      wrapped();

      expect(sampler.getState().lastActivityMs).toBe(0);
    });

    it('records activity around a synchronous call', () => {
      const double = sampler.wrap((value: number) => {
        scheduler.block(30);
        return value * 2;
      });
      scheduler.block(500);

      expect(double(21)).toBe(42);
      expect(sampler.getState().lastActivityMs).toBe(530);
    });

    it('records activity when a wrapped call throws', () => {
      const failing = sampler.wrap((): void => {
        scheduler.block(10);
        throw new Error('handler failure');
      });

      expect(() => failing()).toThrow('handler failure');
      expect(sampler.getState().lastActivityMs).toBe(10);
    });

    it('records activity after an async call settles', async () => {
      const handler = sampler.wrapAsync(async (name: string): Promise<string> => {
        await Promise.resolve();
        scheduler.block(75);
        return `hello ${name}`;
      });

      await expect(handler('world')).resolves.toBe('hello world');
      expect(sampler.getState().lastActivityMs).toBe(75);
    });
  });
});

describe('captureCallFrame', () => {
  const moduleUrl = new URL('../../../src/monitoring/blocking-sampler.ts', import.meta.url).href;

  it('skips this module and node internals', () => {
    const stack = [
      'Error',
      `    at RuntimeBlockingSampler.sample (${moduleUrl}:120:5)`,
      '    at listOnTimeout (node:internal/timers:573:17)',
      '    at handleRequest (/srv/app/routes.js:42:7)',
    ].join('\n');

    expect(captureCallFrame(stack)).toEqual({
      type: 'frame',
      file: '/srv/app/routes.js',
      line: 42,
      functionName: 'handleRequest',
    });
  });

  it('names anonymous frames', () => {
    expect(captureCallFrame('Error\n    at /srv/app/index.js:3:1')).toEqual({
      type: 'frame',
      file: '/srv/app/index.js',
      line: 3,
      functionName: '<anonymous>',
    });
  });

  it('falls back to an unknown frame', () => {
    expect(captureCallFrame('Error')).toEqual({
      type: 'frame',
      file: 'unknown',
      line: 0,
      functionName: 'unknown',
    });
  });
});
