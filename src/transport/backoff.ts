/**
 * Reconnect delay computation.
 *
 * @module transport/backoff
 */

import { InvalidTransportConfigError } from './types.js';

/**
 * Options for a BackoffPolicy.
 */
export interface BackoffOptions {
  readonly floorMs: number;
  readonly ceilingMs: number;

  /** Shorten each wait by a random factor in [0.5, 1.0], never below the floor */
  readonly jitter?: boolean;

  /** Source of randomness in [0, 1). Defaults to Math.random. */
  readonly random?: () => number;
}

/**
 * Doubling backoff with a ceiling, reset to the floor on success.
 *
 * The policy is stateless: callers keep the current delay and feed it back.
 *
 * @example
 * ```typescript
 * const policy = new BackoffPolicy({ floorMs: 1000, ceilingMs: 30000 });
 * let delay = policy.initial();       // 1000
 * delay = policy.nextDelay(delay);    // 2000
 * delay = policy.onSuccess();         // 1000
 * ```
 */
export class BackoffPolicy {
  readonly floorMs: number;
  readonly ceilingMs: number;
  private readonly jitter: boolean;
  private readonly random: () => number;

  constructor(options: BackoffOptions) {
    if (!Number.isFinite(options.floorMs) || options.floorMs <= 0) {
      throw new InvalidTransportConfigError('backoff floor must be a positive number');
    }
    if (!Number.isFinite(options.ceilingMs) || options.ceilingMs < options.floorMs) {
      throw new InvalidTransportConfigError('backoff ceiling must not be below the floor');
    }

    this.floorMs = options.floorMs;
    this.ceilingMs = options.ceilingMs;
    this.jitter = options.jitter ?? false;
    this.random = options.random ?? Math.random;
  }

  /**
   * Delay in effect before any attempt has been made.
   */
  initial(): number {
    return this.floorMs;
  }

  /**
   * Delay to apply after another failed attempt.
   *
   * Never decreases for a non-decreasing input and never exceeds the ceiling.
   */
  nextDelay(currentMs: number): number {
    return Math.min(Math.max(currentMs, this.floorMs) * 2, this.ceilingMs);
  }

  /**
   * Time to actually wait for a given delay. Equal to the delay unless
   * jitter is enabled, in which case it lies between half the delay and
   * the delay, and never below the floor.
   */
  waitFor(delayMs: number): number {
    if (!this.jitter) {
      return delayMs;
    }

    const factor = 0.5 + this.random() * 0.5;
    return Math.max(this.floorMs, Math.floor(delayMs * factor));
  }

  /**
   * Delay to apply after a successful attempt.
   */
  onSuccess(): number {
    return this.floorMs;
  }
}
