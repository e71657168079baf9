import { describe, expect, it, vi } from 'vitest';
import { fail, ok, type Result } from '../core/errors.ts';
import { RateLimitHandler } from './rate-limit.ts';

function handler(overrides: { maxAttempts?: number } = {}) {
  const delays: number[] = [];
  const limiter = new RateLimitHandler({
    baseDelayMs: 100,
    maxDelayMs: 1_000,
    maxAttempts: overrides.maxAttempts ?? 4,
    sleep: async (ms) => {
      delays.push(ms);
    },
    now: () => 5_000,
  });
  return { limiter, delays };
}

const throttled = (retryAfterMs?: number): Result<string> =>
  fail('rate_limit_exceeded', 'Too many requests', { status: 429, retryAfterMs });

describe('RateLimitHandler', () => {
  it('retries three throttles and succeeds on the fourth attempt', async () => {
    const { limiter, delays } = handler();
    const fn = vi
      .fn<() => Promise<Result<string>>>()
      .mockResolvedValueOnce(throttled())
      .mockResolvedValueOnce(throttled())
      .mockResolvedValueOnce(throttled())
      .mockResolvedValueOnce(ok('done'));

    const result = await limiter.callWithBackoff('search', fn);

    expect(result).toEqual({ ok: true, value: 'done' });
    expect(fn).toHaveBeenCalledTimes(4);
    expect(delays).toEqual([100, 200, 400]);
    expect(limiter.snapshot()).toEqual({
      consecutiveThrottles: 0,
      lastThrottledAt: 5_000,
      nextAllowedAt: null,
    });
  });

  it('honours Retry-After but caps it at the maximum delay', async () => {
    const { limiter, delays } = handler();
    const fn = vi
      .fn<() => Promise<Result<string>>>()
      .mockResolvedValueOnce(throttled(250))
      .mockResolvedValueOnce(throttled(30_000))
      .mockResolvedValueOnce(ok('done'));

    await limiter.callWithBackoff('search', fn);

    expect(delays).toEqual([250, 1_000]);
  });

  it('gives up with rate_limit_exceeded after the last attempt', async () => {
    const { limiter, delays } = handler({ maxAttempts: 3 });
    const fn = vi.fn(async () => throttled(50));

    const result = await limiter.callWithBackoff('search', fn);

    expect(fn).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([50, 50]);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toMatchObject({
        kind: 'rate_limit_exceeded',
        status: 429,
        retryAfterMs: 50,
        attempts: 3,
      });
    }
    expect(limiter.snapshot().consecutiveThrottles).toBe(3);
  });

  it('returns non-transient failures immediately', async () => {
    const { limiter, delays } = handler();
    const fn = vi.fn(async (): Promise<Result<string>> => fail('not_found', 'gone', { status: 404 }));

    const result = await limiter.callWithBackoff('artist', fn);

    expect(fn).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
    expect(result).toEqual({ ok: false, error: { kind: 'not_found', message: 'gone', status: 404 } });
  });

  it('retries unavailability only for idempotent calls', async () => {
    const down = async (): Promise<Result<string>> => fail('upstream_unavailable', 'bad gateway');

    const idempotent = handler();
    const idempotentFn = vi.fn(down);
    const retried = await idempotent.limiter.callWithBackoff('pause', idempotentFn, 'idempotent');
    expect(idempotentFn).toHaveBeenCalledTimes(4);
    expect(retried.ok ? undefined : retried.error).toMatchObject({
      kind: 'upstream_unavailable',
      attempts: 4,
    });

    const throttleOnly = handler();
    const throttleOnlyFn = vi.fn(down);
    const once = await throttleOnly.limiter.callWithBackoff('next', throttleOnlyFn, 'throttle_only');
    expect(throttleOnlyFn).toHaveBeenCalledTimes(1);
    expect(once.ok ? undefined : once.error.kind).toBe('upstream_unavailable');
  });

  it('still retries throttling under throttle_only', async () => {
    const { limiter } = handler();
    const fn = vi
      .fn<() => Promise<Result<string>>>()
      .mockResolvedValueOnce(throttled())
      .mockResolvedValueOnce(ok('added'));

    const result = await limiter.callWithBackoff('add_tracks', fn, 'throttle_only');

    expect(result).toEqual({ ok: true, value: 'added' });
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('makes exactly one attempt under the never policy', async () => {
    const { limiter, delays } = handler();
    const fn = vi.fn(async () => throttled());

    const result = await limiter.callWithBackoff('create_playlist', fn, 'never');

    expect(fn).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
    expect(result.ok ? undefined : result.error).toMatchObject({
      kind: 'rate_limit_exceeded',
      attempts: 1,
    });
  });

  it('computes capped exponential delays', () => {
    const { limiter } = handler();
    expect([1, 2, 3, 4, 5].map((retry) => limiter.computeDelay(retry))).toEqual([
      100, 200, 400, 800, 1_000,
    ]);
  });
});
