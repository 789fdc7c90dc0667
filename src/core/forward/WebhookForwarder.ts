/**
 * WebhookForwarder: fire-and-forget signed POST of serialized envelopes.
 *
 * Delivery is at-least-once with a small retry budget. Callers never see the
 * outcome; failures end in a warning log.
 */

import { SIGNATURE_HEADER, TIMESTAMP_HEADER, formatTimestamp, signBody } from './signature.js';
import { TransportError } from '../../infra/errors.js';
import type { Logger } from '../../infra/logger/logger.js';
import { formatErrorMessage } from '../../infra/logger/logger.js';
import { sleep } from '../util/async.js';

export interface WebhookForwarderOptions {
  url: string;
  secret?: string;
  headers?: Record<string, string>;
  attempts?: number;
  baseDelayMs?: number;
  timeoutMs?: number;
  /** Aborting stops waiting between attempts. */
  signal?: AbortSignal;
  fetchImpl?: typeof fetch;
}

export class WebhookForwarder {
  private readonly inflight = new Set<Promise<void>>();
  private readonly attempts: number;
  private readonly baseDelayMs: number;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(
    private readonly options: WebhookForwarderOptions,
    private readonly logger: Logger,
  ) {
    this.attempts = options.attempts ?? 3;
    this.baseDelayMs = options.baseDelayMs ?? 250;
    this.timeoutMs = options.timeoutMs ?? 7000;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  /** Starts a delivery in the background. */
  forward(body: Buffer): void {
    const task = this.deliver(body)
      .catch((err: unknown) => {
        this.logger.warn('Webhook', `webhook post failed: ${formatErrorMessage(err)}`);
      })
      .finally(() => {
        this.inflight.delete(task);
      });
    this.inflight.add(task);
  }

  /** Resolves on the first 2xx; rejects with the last failure otherwise. */
  async deliver(body: Buffer): Promise<void> {
    const { signal } = this.options;
    let lastError: unknown = new TransportError('webhook not attempted');

    for (let attempt = 0; attempt < this.attempts; attempt++) {
      try {
        await this.postOnce(body);
        return;
      } catch (err) {
        lastError = err;
        this.logger.debug('Webhook', `attempt ${attempt + 1}/${this.attempts} failed: ${formatErrorMessage(err)}`);
      }
      if (attempt < this.attempts - 1) {
        await sleep(this.baseDelayMs * 2 ** attempt, signal);
      }
    }
    throw lastError;
  }

  private async postOnce(body: Buffer): Promise<void> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      [TIMESTAMP_HEADER]: formatTimestamp(),
      ...(this.options.headers ?? {}),
    };
    const sig = signBody(this.options.secret, body);
    if (sig) headers[SIGNATURE_HEADER] = sig;

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const res = await this.fetchImpl(this.options.url, {
        method: 'POST',
        headers,
        body,
        signal: controller.signal,
      });
      // read to the end so the connection goes back to the pool
      await res.arrayBuffer();
      if (res.status < 200 || res.status >= 300) {
        throw new TransportError(`webhook non-2xx: ${res.status}`, res.status);
      }
    } catch (err) {
      if (err instanceof TransportError) throw err;
      if (controller.signal.aborted) {
        throw new TransportError(`webhook timed out after ${this.timeoutMs}ms`);
      }
      throw new TransportError(formatErrorMessage(err));
    } finally {
      clearTimeout(timer);
    }
  }

  get pending(): number {
    return this.inflight.size;
  }

  /** Waits for in-flight deliveries, at most `timeoutMs`. */
  async drain(timeoutMs: number): Promise<boolean> {
    if (this.inflight.size === 0) return true;
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    const settled = Promise.allSettled([...this.inflight]).then(() => true as const);
    try {
      return await Promise.race([settled, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
