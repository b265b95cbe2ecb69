import { describe, it, expect } from 'vitest';
import { BackoffPolicy, InvalidTransportConfigError } from '../../src/index.js';

describe('BackoffPolicy', () => {
  describe('constructor', () => {
    it('rejects a non-positive floor', () => {
      expect(() => new BackoffPolicy({ floorMs: 0, ceilingMs: 1000 })).toThrow(
        InvalidTransportConfigError,
      );
    });

    it('rejects a ceiling below the floor', () => {
      expect(() => new BackoffPolicy({ floorMs: 2000, ceilingMs: 1000 })).toThrow(
        'Invalid transport configuration: backoff ceiling must not be below the floor',
      );
    });

    it('accepts a ceiling equal to the floor', () => {
      const policy = new BackoffPolicy({ floorMs: 500, ceilingMs: 500 });
      expect(policy.nextDelay(policy.initial())).toBe(500);
    });
  });

  describe('nextDelay', () => {
    const policy = new BackoffPolicy({ floorMs: 1000, ceilingMs: 30000 });

    it('starts at the floor', () => {
      expect(policy.initial()).toBe(1000);
    });

    it('doubles until the ceiling and stays there', () => {
      const delays: number[] = [];
      let delay = policy.initial();
      for (let i = 0; i < 7; i++) {
        delay = policy.nextDelay(delay);
        delays.push(delay);
      }

      expect(delays).toEqual([2000, 4000, 8000, 16000, 30000, 30000, 30000]);
    });

    it('never decreases over consecutive failures', () => {
      let delay = policy.initial();
      for (let i = 0; i < 20; i++) {
        const next = policy.nextDelay(delay);
        expect(next).toBeGreaterThanOrEqual(delay);
        expect(next).toBeLessThanOrEqual(30000);
        delay = next;
      }
    });

    it('treats a delay below the floor as the floor', () => {
      expect(policy.nextDelay(0)).toBe(2000);
    });
  });

  describe('onSuccess', () => {
    it('resets to the floor', () => {
      const policy = new BackoffPolicy({ floorMs: 250, ceilingMs: 8000 });
      expect(policy.nextDelay(policy.nextDelay(policy.initial()))).toBe(1000);
      expect(policy.onSuccess()).toBe(250);
    });
  });

  describe('waitFor', () => {
    it('returns the delay unchanged without jitter', () => {
      const policy = new BackoffPolicy({ floorMs: 1000, ceilingMs: 30000, random: () => 0 });
      expect(policy.waitFor(8000)).toBe(8000);
    });

    it('shortens the delay by at most half with jitter', () => {
      const low = new BackoffPolicy({ floorMs: 1000, ceilingMs: 30000, jitter: true, random: () => 0 });
      const mid = new BackoffPolicy({ floorMs: 1000, ceilingMs: 30000, jitter: true, random: () => 0.5 });

      expect(low.waitFor(8000)).toBe(4000);
      expect(mid.waitFor(8000)).toBe(6000);
    });

    it('never waits less than the floor', () => {
      const policy = new BackoffPolicy({ floorMs: 1000, ceilingMs: 30000, jitter: true, random: () => 0 });
      expect(policy.waitFor(1000)).toBe(1000);
    });
  });
});
