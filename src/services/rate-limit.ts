import type { Config } from '../config/env.ts';
import { failWith, type GatewayError, type Result } from '../core/errors.ts';
import { logger } from '../utils/logger.ts';

/**
 * How a call may be repeated after a transient failure.
 * - `idempotent`: throttling and unavailability are both retried.
 * - `throttle_only`: only 429s, which Spotify rejects before applying anything.
 * - `never`: one attempt.
 */
export type RetryPolicy = 'idempotent' | 'throttle_only' | 'never';

export interface RateLimitOptions {
  baseDelayMs: number;
  maxDelayMs: number;
  maxAttempts: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export interface RateLimitState {
  consecutiveThrottles: number;
  lastThrottledAt: number | null;
  nextAllowedAt: number | null;
}

export function rateLimitOptionsFromConfig(config: Config): RateLimitOptions {
  return {
    baseDelayMs: config.RATE_LIMIT_BASE_DELAY_MS,
    maxDelayMs: config.RATE_LIMIT_MAX_DELAY_MS,
    maxAttempts: config.RATE_LIMIT_MAX_ATTEMPTS,
  };
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class RateLimitHandler {
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly maxAttempts: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private state: RateLimitState = {
    consecutiveThrottles: 0,
    lastThrottledAt: null,
    nextAllowedAt: null,
  };

  constructor(options: RateLimitOptions) {
    this.baseDelayMs = options.baseDelayMs;
    this.maxDelayMs = options.maxDelayMs;
    this.maxAttempts = Math.max(1, options.maxAttempts);
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => Date.now());
  }

  /** Delay before retry number `retry` (1-based). A server hint wins but is capped. */
  computeDelay(retry: number, hintMs?: number): number {
    if (hintMs !== undefined && Number.isFinite(hintMs) && hintMs >= 0) {
      return Math.min(hintMs, this.maxDelayMs);
    }
    return Math.min(this.baseDelayMs * 2 ** (retry - 1), this.maxDelayMs);
  }

  snapshot(): RateLimitState {
    return { ...this.state };
  }

  async callWithBackoff<T>(
    label: string,
    fn: () => Promise<Result<T>>,
    policy: RetryPolicy = 'idempotent',
  ): Promise<Result<T>> {
    const attempts = policy === 'never' ? 1 : this.maxAttempts;
    let lastError: GatewayError | undefined;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      const result = await fn();
      if (result.ok) {
        this.state.consecutiveThrottles = 0;
        this.state.nextAllowedAt = null;
        return result;
      }

      const { error } = result;
      if (!this.isRetryable(error, policy)) {
        return result;
      }
      lastError = error;

      if (error.kind === 'rate_limit_exceeded') {
        this.state.consecutiveThrottles++;
        this.state.lastThrottledAt = this.now();
      }
      if (attempt === attempts) {
        break;
      }

      const delay = this.computeDelay(attempt, error.retryAfterMs);
      this.state.nextAllowedAt = this.now() + delay;
      await logger.warning('rate_limit', {
        message: 'Transient upstream failure, backing off',
        call: label,
        kind: error.kind,
        attempt,
        delayMs: delay,
      });
      await this.sleep(delay);
    }

    if (!lastError) {
      return failWith({ kind: 'upstream_error', message: `${label}: no attempt was made` });
    }

    await logger.error('rate_limit', {
      message: 'Giving up after retries',
      call: label,
      kind: lastError.kind,
      attempts,
    });

    if (lastError.kind === 'upstream_unavailable') {
      return failWith({ ...lastError, attempts });
    }
    return failWith({
      kind: 'rate_limit_exceeded',
      message: `Spotify kept rate limiting ${label} after ${attempts} attempt(s)`,
      status: 429,
      retryAfterMs: lastError.retryAfterMs,
      attempts,
      cause: lastError,
    });
  }

  private isRetryable(error: GatewayError, policy: RetryPolicy): boolean {
    if (error.kind === 'rate_limit_exceeded') {
      return true;
    }
    return error.kind === 'upstream_unavailable' && policy === 'idempotent';
  }
}
