import { TokenBucket } from './TokenBucket.js';
import { sleep as abortableSleep } from '../util/async.js';
import { abortError } from '../../infra/errors.js';

/**
 * A send primitive: deliver `payload` to `to`, resolve with the protocol's
 * message id (or whatever the primitive returns).
 */
export type SendFn<TPayload, TResult = string> = (
  to: string,
  payload: TPayload,
  signal?: AbortSignal,
) => Promise<TResult>;

export interface RetryPolicy {
  attempts: number;
  baseDelayMs: number;
  /** Backoff growth stops here (default 5s). */
  maxDelayMs?: number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export function backoffDelayMs(attempt: number, baseDelayMs: number, maxDelayMs = 5000): number {
  const base = Math.max(0, baseDelayMs);
  return Math.min(Math.max(base, maxDelayMs), base * 2 ** Math.max(0, attempt));
}

export function withRateLimit<TPayload, TResult>(
  bucket: TokenBucket,
  next: SendFn<TPayload, TResult>,
): SendFn<TPayload, TResult> {
  return async (to, payload, signal) => {
    await bucket.take(signal);
    return next(to, payload, signal);
  };
}

export function withRetry<TPayload, TResult>(
  policy: RetryPolicy,
  next: SendFn<TPayload, TResult>,
): SendFn<TPayload, TResult> {
  const attempts = Math.max(1, Math.floor(policy.attempts));
  const sleep = policy.sleep ?? abortableSleep;

  return async (to, payload, signal) => {
    let lastError: unknown;
    for (let attempt = 0; attempt < attempts; attempt++) {
      if (signal?.aborted) throw abortError(signal);
      try {
        return await next(to, payload, signal);
      } catch (err) {
        lastError = err;
        if (attempt === attempts - 1) break;
        const delayMs = backoffDelayMs(attempt, policy.baseDelayMs, policy.maxDelayMs);
        policy.onRetry?.(err, attempt + 1, delayMs);
        await sleep(delayMs, signal);
      }
    }
    throw lastError;
  };
}

/**
 * Admission gate first, then the retry loop around the primitive.
 */
export function rateLimitedWithRetry<TPayload, TResult>(
  bucket: TokenBucket,
  policy: RetryPolicy,
  base: SendFn<TPayload, TResult>,
): SendFn<TPayload, TResult> {
  return withRateLimit(bucket, withRetry(policy, base));
}
