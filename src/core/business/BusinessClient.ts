import { z } from 'zod';
import type { Logger } from '../../infra/logger/logger.js';
import { formatErrorMessage } from '../../infra/logger/logger.js';

const BusinessReplySchema = z.object({
  reply: z.string(),
  leadScore: z.number().optional(),
  category: z.string().optional(),
});

export type BusinessReply = z.infer<typeof BusinessReplySchema>;

export interface BusinessPort {
  /** Resolves null when the backend gave no usable answer. */
  ask(sessionId: string, message: string, signal?: AbortSignal): Promise<BusinessReply | null>;
}

export interface BusinessClientOptions {
  url: string;
  channel: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

/**
 * Request/reply client for the business backend:
 * POST {sessionId, message, channel} -> {reply, leadScore?, category?}.
 */
export class BusinessClient implements BusinessPort {
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;

  constructor(
    private readonly options: BusinessClientOptions,
    private readonly logger: Logger,
  ) {
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.timeoutMs = options.timeoutMs ?? 15_000;
  }

  async ask(sessionId: string, message: string, signal?: AbortSignal): Promise<BusinessReply | null> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await this.fetchImpl(this.options.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
        body: JSON.stringify({ sessionId, message, channel: this.options.channel }),
        signal: controller.signal,
      });
      if (!response.ok) {
        this.logger.warn('business', `Backend returned ${response.status} for ${sessionId}`);
        return null;
      }

      const parsed = BusinessReplySchema.safeParse(await response.json());
      if (!parsed.success) {
        this.logger.warn('business', `Unexpected backend response for ${sessionId}`);
        return null;
      }
      if (parsed.data.leadScore !== undefined && parsed.data.category !== undefined) {
        this.logger.info(
          'business',
          `Reply for ${sessionId}: score=${Math.trunc(parsed.data.leadScore)} category=${parsed.data.category}`,
        );
      }
      return parsed.data;
    } catch (err) {
      const reason = controller.signal.aborted && !signal?.aborted ? `timed out after ${this.timeoutMs}ms` : formatErrorMessage(err);
      this.logger.warn('business', `Backend call failed for ${sessionId}: ${reason}`);
      return null;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
