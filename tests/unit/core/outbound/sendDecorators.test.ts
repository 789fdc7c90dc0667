import { describe, it, expect, vi } from 'vitest';
import { TokenBucket } from '../../../../src/core/outbound/TokenBucket.js';
import {
  backoffDelayMs,
  rateLimitedWithRetry,
  withRetry,
} from '../../../../src/core/outbound/sendDecorators.js';

function fakeClock() {
  const clock = { now: 0, sleeps: [] as number[] };
  const sleep = async (ms: number) => {
    clock.sleeps.push(ms);
    clock.now += ms;
  };
  return { clock, now: () => clock.now, sleep };
}

describe('TokenBucket', () => {
  it('admits a burst and then paces by the refill interval', async () => {
    const { clock, now, sleep } = fakeClock();
    const bucket = new TokenBucket({ refillIntervalMs: 100, burst: 2 }, { now, sleep });

    await bucket.take();
    await bucket.take();
    expect(clock.sleeps).toEqual([]);

    await bucket.take();
    expect(clock.sleeps).toEqual([100]);
    expect(clock.now).toBe(100);
  });

  it('caps a single wait so aborts are noticed', async () => {
    const { clock, now, sleep } = fakeClock();
    const bucket = new TokenBucket({ refillIntervalMs: 1000, burst: 1 }, { now, sleep, maxSleepMs: 250 });
    await bucket.take();
    await bucket.take();
    expect(clock.sleeps).toEqual([250, 250, 250, 250]);
  });

  it('rejects once the signal is aborted', async () => {
    const bucket = new TokenBucket({ refillIntervalMs: 100, burst: 1 });
    const controller = new AbortController();
    controller.abort(new Error('stopping'));
    await expect(bucket.take(controller.signal)).rejects.toThrow('stopping');
  });
});

describe('backoffDelayMs', () => {
  it('doubles from the base and stops at the ceiling', () => {
    expect(backoffDelayMs(0, 250)).toBe(250);
    expect(backoffDelayMs(1, 250)).toBe(500);
    expect(backoffDelayMs(5, 250)).toBe(5000);
    expect(backoffDelayMs(0, 6000)).toBe(6000);
  });
});

describe('withRetry', () => {
  it('retries with backoff until the primitive succeeds', async () => {
    const { clock, sleep } = fakeClock();
    const onRetry = vi.fn();
    const base = vi
      .fn<(to: string, text: string) => Promise<string>>()
      .mockRejectedValueOnce(new Error('boom 1'))
      .mockRejectedValueOnce(new Error('boom 2'))
      .mockResolvedValueOnce('id-1');

    const send = withRetry({ attempts: 3, baseDelayMs: 250, sleep, onRetry }, base);

    await expect(send('chat', 'hi')).resolves.toBe('id-1');
    expect(base).toHaveBeenCalledTimes(3);
    expect(clock.sleeps).toEqual([250, 500]);
    expect(onRetry).toHaveBeenNthCalledWith(2, expect.any(Error), 2, 500);
  });

  it('throws the last error without sleeping after the final attempt', async () => {
    const { clock, sleep } = fakeClock();
    const base = vi
      .fn<(to: string, text: string) => Promise<string>>()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'))
      .mockRejectedValueOnce(new Error('third'));

    const send = withRetry({ attempts: 3, baseDelayMs: 250, sleep }, base);

    await expect(send('chat', 'hi')).rejects.toThrow('third');
    expect(clock.sleeps).toEqual([250, 500]);
  });

  it('stops before the next attempt when aborted', async () => {
    const controller = new AbortController();
    const base = vi.fn<(to: string, text: string) => Promise<string>>().mockImplementation(async () => {
      controller.abort(new Error('shutdown'));
      throw new Error('failed');
    });
    const send = withRetry({ attempts: 3, baseDelayMs: 10, sleep: async () => undefined }, base);

    await expect(send('chat', 'hi', controller.signal)).rejects.toThrow('shutdown');
    expect(base).toHaveBeenCalledTimes(1);
  });
});

describe('rateLimitedWithRetry', () => {
  it('takes one token per logical send, not per attempt', async () => {
    const { now, sleep } = fakeClock();
    const bucket = new TokenBucket({ refillIntervalMs: 1000, burst: 1 }, { now, sleep });
    const take = vi.spyOn(bucket, 'take');
    const base = vi
      .fn<(to: string, text: string) => Promise<string>>()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValueOnce('id-2');

    const send = rateLimitedWithRetry(bucket, { attempts: 3, baseDelayMs: 250, sleep }, base);

    await expect(send('chat', 'hi')).resolves.toBe('id-2');
    expect(take).toHaveBeenCalledTimes(1);
    expect(base).toHaveBeenCalledTimes(2);
  });
});
