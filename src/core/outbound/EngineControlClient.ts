import { TransportError } from '../../infra/errors.js';
import { formatErrorMessage } from '../../infra/logger/logger.js';

/** The engine operations the ingestion side drives. */
export interface EngineControlPort {
  sendText(to: string, text: string, signal?: AbortSignal): Promise<void>;
  setTyping(chat: string, typing: boolean, media: 'text' | 'audio', signal?: AbortSignal): Promise<void>;
  markRead(chat: string, ids: string[], sender?: string, signal?: AbortSignal): Promise<void>;
}

export interface EngineControlClientOptions {
  sendUrl: string;
  typingUrl: string;
  markReadUrl: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

/**
 * HTTP client for the engine's control API. Non-2xx answers and transport
 * failures reject with TransportError.
 */
export class EngineControlClient implements EngineControlPort {
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;

  constructor(private readonly options: EngineControlClientOptions) {
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.timeoutMs = options.timeoutMs ?? 5000;
  }

  async sendText(to: string, text: string, signal?: AbortSignal): Promise<void> {
    await this.post(this.options.sendUrl, { recipient: to, message: text }, signal);
  }

  async setTyping(chat: string, typing: boolean, media: 'text' | 'audio', signal?: AbortSignal): Promise<void> {
    await this.post(this.options.typingUrl, { recipient: chat, typing, media }, signal);
  }

  async markRead(chat: string, ids: string[], sender?: string, signal?: AbortSignal): Promise<void> {
    if (!chat || ids.length === 0) return;
    const body: Record<string, unknown> = { recipient: chat, message_ids: ids, receipt_type: 'read' };
    if (sender?.trim()) body.sender = sender;
    await this.post(this.options.markReadUrl, body, signal);
  }

  private async post(url: string, body: Record<string, unknown>, signal?: AbortSignal): Promise<void> {
    if (!url) throw new TransportError('engine endpoint not configured');
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    try {
      const res = await this.fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
      if (!res.ok) {
        const detail = await res.text().catch(() => '');
        throw new TransportError(`engine returned ${res.status}${detail ? `: ${detail}` : ''}`, res.status);
      }
    } catch (err) {
      if (err instanceof TransportError) throw err;
      if (controller.signal.aborted && !signal?.aborted) {
        throw new TransportError(`engine request timed out after ${this.timeoutMs}ms`);
      }
      throw new TransportError(formatErrorMessage(err));
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
