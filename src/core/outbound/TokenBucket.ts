import { sleep as abortableSleep } from '../util/async.js';
import { abortError } from '../../infra/errors.js';

export interface TokenBucketOptions {
  /** One token is added every `refillIntervalMs`. */
  refillIntervalMs: number;
  /** Bucket capacity; the bucket starts full. */
  burst: number;
}

export interface TokenBucketDeps {
  /** Time source (defaults to Date.now). */
  readonly now?: () => number;
  /** Sleep primitive (defaults to an abortable setTimeout). */
  readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** Upper bound per sleep so an abort is noticed promptly (default 250ms). */
  readonly maxSleepMs?: number;
}

/**
 * Admission gate for one class of outbound operation.
 */
export class TokenBucket {
  private tokens: number;
  private lastRefillMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly maxSleepMs: number;
  private readonly capacity: number;
  private readonly intervalMs: number;

  constructor(options: TokenBucketOptions, deps: TokenBucketDeps = {}) {
    this.capacity = Math.max(1, options.burst);
    this.intervalMs = Math.max(1, options.refillIntervalMs);
    this.tokens = this.capacity;
    this.now = deps.now ?? (() => Date.now());
    this.sleep = deps.sleep ?? abortableSleep;
    this.maxSleepMs = deps.maxSleepMs ?? 250;
    this.lastRefillMs = this.now();
  }

  private refill(nowMs: number): void {
    const elapsed = Math.max(0, nowMs - this.lastRefillMs);
    const refill = elapsed / this.intervalMs;
    if (refill <= 0) return;
    this.tokens = Math.min(this.capacity, this.tokens + refill);
    this.lastRefillMs = nowMs;
  }

  /**
   * Waits until one token is available and consumes it. Rejects when the
   * signal aborts before that.
   */
  async take(signal?: AbortSignal): Promise<void> {
    for (;;) {
      if (signal?.aborted) throw abortError(signal);
      this.refill(this.now());
      if (this.tokens >= 1) {
        this.tokens -= 1;
        return;
      }
      const waitMs = Math.ceil((1 - this.tokens) * this.intervalMs);
      await this.sleep(Math.min(this.maxSleepMs, Math.max(1, waitMs)), signal);
    }
  }
}
