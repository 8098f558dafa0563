import { describe, it, expect } from 'vitest';
import { createTokenBucket } from './ratelimit.js';

function fakeClock() {
  let t = 0;
  const waits: number[] = [];
  return {
    now: () => t,
    wait: async (ms: number) => {
      waits.push(ms);
      t += ms;
    },
    advance: (ms: number) => {
      t += ms;
    },
    waits,
  };
}

describe('createTokenBucket', () => {
  it('should start full and wait once the burst is spent', async () => {
    const clock = fakeClock();
    const bucket = createTokenBucket(2, { burstMultiplier: 1, now: clock.now, wait: clock.wait });
    expect(bucket.available()).toBe(2);
    await bucket.take();
    await bucket.take();
    expect(clock.waits).toEqual([]);
    await bucket.take();
    expect(clock.waits).toEqual([500]);
    expect(bucket.available()).toBe(0);
  });

  it('should refill with elapsed time up to capacity', () => {
    const clock = fakeClock();
    const bucket = createTokenBucket(10, { now: clock.now, wait: clock.wait });
    expect(bucket.available()).toBe(20);
    clock.advance(10_000);
    expect(bucket.available()).toBe(20);
  });

  it('should allow partial refills', async () => {
    const clock = fakeClock();
    const bucket = createTokenBucket(4, { burstMultiplier: 1, now: clock.now, wait: clock.wait });
    for (let i = 0; i < 4; i++) await bucket.take();
    clock.advance(250);
    expect(bucket.available()).toBe(1);
  });
});
