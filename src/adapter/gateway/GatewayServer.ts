import { randomUUID } from 'node:crypto';
import { URL } from 'node:url';
import { WebSocketServer, WebSocket, type RawData } from 'ws';
import { z } from 'zod';
import type { MediaKind, MediaTicket } from '../../core/envelope/Envelope.js';
import { GatewayError, abortError } from '../../infra/errors.js';
import type { Logger } from '../../infra/logger/logger.js';
import { formatErrorMessage } from '../../infra/logger/logger.js';
import { parseProtocolEvent, type ProtocolEvent } from './protocolEvents.js';
import type {
  ChatPresenceMedia,
  ChatPresenceState,
  OutgoingMessage,
  ProtocolClient,
  ReceiptType,
  UploadedMedia,
} from './ProtocolClient.js';

export type GatewayAction =
  | 'send_message'
  | 'upload_media'
  | 'send_chat_presence'
  | 'send_presence'
  | 'mark_read'
  | 'download_media';

const ActionResponseSchema = z.object({
  echo: z.string(),
  status: z.enum(['ok', 'failed']),
  data: z.unknown().optional(),
  message: z.string().optional(),
});

const SendResultSchema = z.object({ message_id: z.string().min(1) });

const UploadResultSchema = z.object({
  url: z.string(),
  direct_path: z.string(),
  media_key: z.string(),
  file_hash: z.string(),
  encrypted_file_hash: z.string(),
  file_length: z.number().nonnegative(),
});

const DownloadResultSchema = z.object({ base64: z.string() });

interface PendingCall {
  resolve: (data: unknown) => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout;
}

export interface GatewayServerOptions {
  port: number;
  path?: string;
  token?: string;
  callTimeoutMs?: number;
}

/**
 * Reverse WebSocket server the protocol gateway connects to.
 * Event frames ({type, ...}) are fanned out to listeners; action frames
 * ({action, params, echo}) go to the most recent connection and are answered
 * with {echo, status, data?, message?}.
 */
export class GatewayServer implements ProtocolClient {
  private wss: WebSocketServer | null = null;
  private connections: Set<WebSocket> = new Set();
  private active: WebSocket | null = null;
  private readonly listeners = new Set<(event: ProtocolEvent) => void>();
  private readonly pending = new Map<string, PendingCall>();
  private readonly wsPath: string;
  private readonly callTimeoutMs: number;

  constructor(
    private readonly options: GatewayServerOptions,
    private readonly logger: Logger,
  ) {
    this.wsPath = options.path ?? '/';
    this.callTimeoutMs = options.callTimeoutMs ?? 15_000;
  }

  /**
   * Start the reverse WebSocket server. Resolves once the port is bound.
   */
  public start(): Promise<void> {
    const wss = new WebSocketServer({ port: this.options.port, path: this.wsPath });
    this.wss = wss;

    wss.on('connection', (ws: WebSocket, req) => {
      if (this.options.token) {
        const providedToken = this.extractToken(req.headers['authorization'], req.url);
        if (providedToken !== this.options.token) {
          this.logger.warn('gateway', 'Connection rejected: invalid token');
          ws.close(4401, 'Unauthorized');
          return;
        }
      } else {
        this.logger.warn('gateway', 'Token not configured - accepting connection (dev mode)');
      }

      this.logger.info('gateway', 'Gateway connection established');
      this.connections.add(ws);
      this.active = ws;

      ws.on('message', (data: RawData) => {
        this.handleFrame(data);
      });

      ws.on('close', () => {
        this.logger.info('gateway', 'Gateway connection closed');
        this.dropConnection(ws);
      });

      ws.on('error', (err: Error) => {
        this.logger.error('gateway', `WebSocket error: ${err.message}`);
        this.dropConnection(ws);
      });
    });

    return new Promise((resolve, reject) => {
      wss.once('listening', () => {
        this.logger.info('gateway', `Listening on ws://localhost:${this.options.port}${this.wsPath}`);
        wss.on('error', (err: Error) => {
          this.logger.error('gateway', `Server error: ${err.message}`);
        });
        resolve();
      });
      wss.once('error', reject);
    });
  }

  private dropConnection(ws: WebSocket): void {
    this.connections.delete(ws);
    if (this.active === ws) {
      this.active = [...this.connections].at(-1) ?? null;
    }
  }

  private extractToken(authHeader: string | string[] | undefined, url?: string): string | undefined {
    const header = Array.isArray(authHeader) ? authHeader[0] : authHeader;
    if (typeof header === 'string' && header.length > 0) {
      return header.startsWith('Bearer ') ? header.substring(7) : header;
    }

    // ?access_token=<token>
    if (url) {
      try {
        const parsed = new URL(url, `http://localhost:${this.options.port}`);
        const t = parsed.searchParams.get('access_token');
        if (t) return t;
      } catch {
        return undefined;
      }
    }
    return undefined;
  }

  private handleFrame(data: RawData): void {
    let raw: unknown;
    try {
      raw = JSON.parse(data.toString());
    } catch (err) {
      this.logger.error('gateway', `Parse error: ${formatErrorMessage(err)}`);
      return;
    }

    const response = ActionResponseSchema.safeParse(raw);
    if (response.success) {
      this.settle(response.data);
      return;
    }

    const event = parseProtocolEvent(raw);
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        this.logger.error('gateway', `Event listener failed: ${formatErrorMessage(err)}`);
      }
    }
  }

  private settle(res: z.infer<typeof ActionResponseSchema>): void {
    const call = this.pending.get(res.echo);
    if (!call) {
      this.logger.debug('gateway', `Response for unknown echo ${res.echo}`);
      return;
    }
    this.pending.delete(res.echo);
    clearTimeout(call.timer);
    if (res.status === 'ok') {
      call.resolve(res.data);
    } else {
      call.reject(new GatewayError('ACTION_FAILED', res.message ?? 'action failed'));
    }
  }

  /** Sends one action frame and waits for the correlated response. */
  call(action: GatewayAction, params: Record<string, unknown>, signal?: AbortSignal): Promise<unknown> {
    const ws = this.active;
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new GatewayError('GATEWAY_UNAVAILABLE', 'no gateway connection'));
    }
    if (signal?.aborted) return Promise.reject(abortError(signal));

    const echo = randomUUID();
    return new Promise<unknown>((resolve, reject) => {
      const onAbort = () => {
        const call = this.pending.get(echo);
        if (!call) return;
        this.pending.delete(echo);
        clearTimeout(call.timer);
        reject(signal ? abortError(signal) : new Error('aborted'));
      };
      const timer = setTimeout(() => {
        this.pending.delete(echo);
        signal?.removeEventListener('abort', onAbort);
        reject(new GatewayError('GATEWAY_TIMEOUT', `${action} timed out after ${this.callTimeoutMs}ms`));
      }, this.callTimeoutMs);

      this.pending.set(echo, {
        resolve: (data) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(data);
        },
        reject: (err) => {
          signal?.removeEventListener('abort', onAbort);
          reject(err);
        },
        timer,
      });
      signal?.addEventListener('abort', onAbort, { once: true });

      ws.send(JSON.stringify({ action, params, echo }), (err) => {
        if (!err) return;
        const call = this.pending.get(echo);
        if (!call) return;
        this.pending.delete(echo);
        clearTimeout(call.timer);
        call.reject(new GatewayError('GATEWAY_UNAVAILABLE', err.message));
      });
    });
  }

  onEvent(listener: (event: ProtocolEvent) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async sendMessage(to: string, message: OutgoingMessage, signal?: AbortSignal): Promise<{ id: string }> {
    const data = await this.call('send_message', { to, ...message }, signal);
    return { id: SendResultSchema.parse(data).message_id };
  }

  async uploadMedia(bytes: Buffer, kind: MediaKind, signal?: AbortSignal): Promise<UploadedMedia> {
    const data = await this.call('upload_media', { kind, base64: bytes.toString('base64') }, signal);
    return UploadResultSchema.parse(data);
  }

  async sendChatPresence(
    chat: string,
    state: ChatPresenceState,
    media: ChatPresenceMedia,
    signal?: AbortSignal,
  ): Promise<void> {
    await this.call('send_chat_presence', { chat, state, media }, signal);
  }

  async sendPresence(state: 'available' | 'unavailable', signal?: AbortSignal): Promise<void> {
    await this.call('send_presence', { state }, signal);
  }

  async markRead(
    chat: string,
    ids: string[],
    sender: string | undefined,
    receiptType: ReceiptType,
    signal?: AbortSignal,
  ): Promise<void> {
    await this.call('mark_read', { chat, message_ids: ids, sender, receipt_type: receiptType }, signal);
  }

  async downloadMedia(ticket: MediaTicket, signal?: AbortSignal): Promise<Buffer> {
    const data = await this.call(
      'download_media',
      {
        type: ticket.type,
        url: ticket.url,
        direct_path: ticket.direct_path,
        media_key: ticket.media_key,
        file_hash: ticket.file_hash,
        encrypted_file_hash: ticket.encrypted_file_hash,
        file_length: ticket.file_length,
      },
      signal,
    );
    return Buffer.from(DownloadResultSchema.parse(data).base64, 'base64');
  }

  get connected(): boolean {
    return this.active !== null && this.active.readyState === WebSocket.OPEN;
  }

  /**
   * Stop the reverse WebSocket server. Pending calls fail as unavailable.
   */
  public stop(): Promise<void> {
    for (const [echo, call] of this.pending) {
      clearTimeout(call.timer);
      call.reject(new GatewayError('GATEWAY_UNAVAILABLE', 'gateway server stopped'));
      this.pending.delete(echo);
    }
    const wss = this.wss;
    if (!wss) return Promise.resolve();
    for (const ws of this.connections) {
      ws.close();
    }
    this.wss = null;
    return new Promise((resolve) => {
      wss.close(() => {
        this.logger.info('gateway', 'Server stopped');
        resolve();
      });
    });
  }
}
