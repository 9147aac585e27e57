/**
 * Rate limiter for QuickBooks Time API requests
 *
 * QuickBooks Time allows a handful of requests per second and a few hundred
 * per minute. Each request takes a permit, recorded as a timestamp in every
 * window; a permit returns to the bucket once its timestamp ages out of the
 * window. Withdrawals are serialized so concurrent callers never take more
 * permits than a window holds.
 */

import { CancelledError } from '../errors.js';
import { systemClock, type Clock } from './clock.js';

export interface TokenBucketConfig {
  requestsPerSecond: number; // default: 3
  requestsPerMinute: number; // default: 300
}

export interface TokenBucketStatus {
  remaining_this_second: number;
  remaining_this_minute: number;
  paused_ms: number;
}

interface SlidingWindow {
  max: number;
  windowMs: number;
  timestamps: number[];
}

const DEFAULT_CONFIG: TokenBucketConfig = {
  requestsPerSecond: 3,
  requestsPerMinute: 300,
};

export class TokenBucket {
  private second: SlidingWindow;
  private minute: SlidingWindow;
  private pausedUntil = 0;
  private tail: Promise<void> = Promise.resolve();

  constructor(
    config: Partial<TokenBucketConfig> = {},
    private readonly clock: Clock = systemClock
  ) {
    const { requestsPerSecond, requestsPerMinute } = { ...DEFAULT_CONFIG, ...config };
    if (requestsPerSecond < 1 || requestsPerMinute < 1) {
      throw new RangeError('Token bucket limits must allow at least one request');
    }
    this.second = { max: requestsPerSecond, windowMs: 1000, timestamps: [] };
    this.minute = { max: requestsPerMinute, windowMs: 60_000, timestamps: [] };
  }

  /**
   * Wait for a permit and take it. Callers are served in arrival order.
   */
  acquire(signal?: AbortSignal): Promise<void> {
    const turn = this.tail.then(() => this.waitForPermit(signal));
    // A cancelled caller must not block the ones queued behind it
    this.tail = turn.catch(() => undefined);
    return turn;
  }

  /**
   * Stop handing out permits for `ms` (the upstream sent Retry-After)
   */
  pause(ms: number): void {
    this.pausedUntil = Math.max(this.pausedUntil, this.clock.now() + ms);
  }

  getStatus(): TokenBucketStatus {
    const now = this.clock.now();
    this.prune(now);
    return {
      remaining_this_second: this.second.max - this.second.timestamps.length,
      remaining_this_minute: this.minute.max - this.minute.timestamps.length,
      paused_ms: Math.max(0, this.pausedUntil - now),
    };
  }

  private async waitForPermit(signal?: AbortSignal): Promise<void> {
    for (;;) {
      if (signal?.aborted) {
        throw new CancelledError();
      }
      const now = this.clock.now();
      const waitMs = this.waitTime(now);
      if (waitMs <= 0) {
        this.second.timestamps.push(now);
        this.minute.timestamps.push(now);
        return;
      }
      await this.clock.sleep(waitMs, signal);
    }
  }

  private waitTime(now: number): number {
    this.prune(now);
    let waitMs = this.pausedUntil - now;
    for (const window of [this.second, this.minute]) {
      if (window.timestamps.length >= window.max) {
        // Timestamps are pushed in order, so the oldest is first
        waitMs = Math.max(waitMs, window.timestamps[0] + window.windowMs - now);
      }
    }
    return waitMs;
  }

  private prune(now: number): void {
    for (const window of [this.second, this.minute]) {
      const cutoff = now - window.windowMs;
      window.timestamps = window.timestamps.filter((ts) => ts > cutoff);
    }
  }
}
