import { CancelledError } from '../errors.js';
import { FakeClock } from '../testing/fake-clock.js';
import { TokenBucket } from './rate-limiter.js';

describe('TokenBucket', () => {
  let clock: FakeClock;
  let bucket: TokenBucket;

  beforeEach(() => {
    clock = new FakeClock(0);
    bucket = new TokenBucket({ requestsPerSecond: 3, requestsPerMinute: 300 }, clock);
  });

  it('should hand out three permits in the first second without waiting', async () => {
    await bucket.acquire();
    await bucket.acquire();
    await bucket.acquire();
    expect(clock.now()).toBe(0);
    expect(clock.sleeps).toEqual([]);
  });

  it('should take at least three seconds for ten requests at three per second', async () => {
    const grantedAt: number[] = [];
    await Promise.all(
      Array.from({ length: 10 }, () => bucket.acquire().then(() => grantedAt.push(clock.now())))
    );
    expect(grantedAt).toEqual([0, 0, 0, 1000, 1000, 1000, 2000, 2000, 2000, 3000]);
  });

  it('should never grant more than three permits inside any one-second window', async () => {
    const grantedAt: number[] = [];
    for (let i = 0; i < 12; i++) {
      await bucket.acquire();
      grantedAt.push(clock.now());
      clock.advance(150);
    }
    for (const start of grantedAt) {
      const inWindow = grantedAt.filter((ts) => ts >= start && ts < start + 1000);
      expect(inWindow.length).toBeLessThanOrEqual(3);
    }
  });

  it('should enforce the per-minute limit', async () => {
    const perMinute = new TokenBucket({ requestsPerSecond: 10, requestsPerMinute: 5 }, clock);
    for (let i = 0; i < 5; i++) {
      await perMinute.acquire();
    }
    await perMinute.acquire();
    expect(clock.now()).toBe(60_000);
  });

  it('should hold every caller while paused', async () => {
    bucket.pause(2000);
    await bucket.acquire();
    expect(clock.now()).toBe(2000);
  });

  it('should report remaining permits', async () => {
    await bucket.acquire();
    expect(bucket.getStatus()).toEqual({
      remaining_this_second: 2,
      remaining_this_minute: 299,
      paused_ms: 0,
    });
  });

  it('should reject a cancelled caller without blocking the next one', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(bucket.acquire(controller.signal)).rejects.toBeInstanceOf(CancelledError);
    await expect(bucket.acquire()).resolves.toBeUndefined();
    expect(bucket.getStatus().remaining_this_second).toBe(2);
  });
});
