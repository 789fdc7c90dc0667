/**
 * Engine: turns the gateway's raw event stream into envelopes and exposes the
 * outbound control surface.
 *
 * Every event becomes one envelope. Its side effects (history row, sink line,
 * webhook delivery, behavior callback) run independently: one failing does
 * not block the others and never stops the loop.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import type {
  ChatPresenceMedia,
  OutgoingMedia,
  ProtocolClient,
  ReceiptType,
  UploadedMedia,
} from '../../adapter/gateway/ProtocolClient.js';
import {
  identityChangeJid,
  type ChatPresenceEvent,
  type GroupInfoEvent,
  type JoinedGroupEvent,
  type MessageEvent,
  type PresenceEvent,
  type ProtocolEvent,
  type ReceiptEvent,
} from '../../adapter/gateway/protocolEvents.js';
import { UnsupportedError, ValidationError } from '../../infra/errors.js';
import type { Logger } from '../../infra/logger/logger.js';
import { formatErrorMessage } from '../../infra/logger/logger.js';
import { DedupeCache } from '../dedupe/DedupeCache.js';
import { serializeEnvelope, type Envelope, type MediaKind, type MediaTicket } from '../envelope/Envelope.js';
import { STATUS_BROADCAST, canonicalChatId, kindOfChat, userOf } from '../envelope/chatId.js';
import { TokenBucket, type TokenBucketDeps } from '../outbound/TokenBucket.js';
import { rateLimitedWithRetry, type RetryPolicy, type SendFn } from '../outbound/sendDecorators.js';
import type { FolderSink } from '../sink/FolderSink.js';
import type { WebhookForwarder } from '../forward/WebhookForwarder.js';
import type { MessageHistory } from '../storage/HistoryStore.js';
import { previewText } from '../util/text.js';
import { ChatDirectory, resolveChatName } from './chatName.js';
import { classifyMediaFile, kindFromMimetype } from './mediaFiles.js';
import { DEFAULT_VOICE_SECONDS, isOggOpus, oggOpusSeconds, placeholderWaveform } from './voiceNote.js';
import { eventTime, inboundText, mediaTicketOf, outboundText } from './messageContent.js';

export interface EngineHandlers {
  onMessage?(env: Envelope, event: MessageEvent): void | Promise<void>;
  onReceipt?(env: Envelope, event: ReceiptEvent): void | Promise<void>;
  onPresence?(env: Envelope, event: PresenceEvent): void | Promise<void>;
  onGroupUpdate?(env: Envelope, event: GroupInfoEvent): void | Promise<void>;
  onError?(error: unknown, env: Envelope): void;
}

export interface BucketConfig {
  intervalMs: number;
  burst: number;
}

export type OutboundClass = 'text' | 'media' | 'status';

export const RETRY_POLICIES: Record<OutboundClass, { attempts: number; baseDelayMs: number }> = {
  text: { attempts: 3, baseDelayMs: 250 },
  media: { attempts: 3, baseDelayMs: 400 },
  status: { attempts: 2, baseDelayMs: 600 },
};

export interface EngineOptions {
  rateLimits: Record<OutboundClass, BucketConfig>;
  /** Used as `extra` for envelopes that carry none. */
  extraParams?: Record<string, unknown>;
  enableStatus?: boolean;
  receiptDedupeMs?: number;
  /** Default cancellation for outbound operations. */
  signal?: AbortSignal;
  now?: () => Date;
  /** Injected into buckets and retry sleeps (tests). */
  timing?: TokenBucketDeps;
}

export interface EngineDeps {
  client: ProtocolClient;
  logger: Logger;
  sink?: FolderSink | null;
  webhook?: WebhookForwarder | null;
  history?: MessageHistory | null;
  handlers?: EngineHandlers;
}

export interface MediaInput {
  /** Local file to send; ignored when `bytes` is set. */
  path?: string;
  bytes?: Buffer;
  mimetype?: string;
  caption?: string;
  fileName?: string;
  /** Audio only; read from Ogg/Opus data when absent. */
  seconds?: number;
  waveform?: Buffer;
}

interface PreparedMedia {
  bytes: Buffer;
  kind: MediaKind;
  mimetype: string;
  fileName: string;
  caption: string;
  seconds?: number;
  waveform?: Buffer;
  voiceNote: boolean;
}

interface SentMedia {
  id: string;
  upload: UploadedMedia;
}

type SideEffect = readonly [name: string, run: () => unknown];

export class Engine {
  readonly directory = new ChatDirectory();
  private readonly client: ProtocolClient;
  private readonly logger: Logger;
  private readonly sink: FolderSink | null;
  private readonly webhook: WebhookForwarder | null;
  private readonly history: MessageHistory | null;
  private readonly handlers: EngineHandlers;
  private readonly receiptDedupe: DedupeCache;
  /** Ids of messages this engine sent; their echoes are not forwarded twice. */
  private readonly sentIds = new DedupeCache({ windowMs: 10 * 60_000 });
  /** Sends awaiting the gateway's answer; echoes of them wait for these. */
  private readonly pendingSends = new Set<Promise<unknown>>();
  private readonly inflight = new Set<Promise<void>>();
  private readonly now: () => Date;

  private readonly sendTextFn: SendFn<string, string>;
  private readonly sendMediaFn: SendFn<PreparedMedia, SentMedia>;
  private readonly sendStatusFn: SendFn<PreparedMedia, SentMedia>;
  private unsubscribe: (() => void) | null = null;

  constructor(
    deps: EngineDeps,
    private readonly options: EngineOptions,
  ) {
    this.client = deps.client;
    this.logger = deps.logger;
    this.sink = deps.sink ?? null;
    this.webhook = deps.webhook ?? null;
    this.history = deps.history ?? null;
    this.handlers = deps.handlers ?? {};
    this.now = options.now ?? (() => new Date());
    this.receiptDedupe = new DedupeCache({ windowMs: options.receiptDedupeMs ?? 5000 });

    const decorate = <TPayload, TResult>(cls: OutboundClass, base: SendFn<TPayload, TResult>) => {
      const limits = options.rateLimits[cls];
      const bucket = new TokenBucket({ refillIntervalMs: limits.intervalMs, burst: limits.burst }, options.timing);
      const policy: RetryPolicy = {
        ...RETRY_POLICIES[cls],
        sleep: options.timing?.sleep,
        onRetry: (err, attempt, delayMs) => {
          this.logger.warn('engine', `${cls} send attempt ${attempt} failed (${formatErrorMessage(err)}), retrying in ${delayMs}ms`);
        },
      };
      return rateLimitedWithRetry(bucket, policy, base);
    };

    this.sendTextFn = decorate('text', async (to, text, signal) => {
      const res = await this.client.sendMessage(to, { text }, signal);
      this.sentIds.seen(res.id);
      return res.id;
    });
    this.sendMediaFn = decorate('media', (to, media, signal) => this.uploadAndSend(to, media, signal));
    this.sendStatusFn = decorate('status', (to, media, signal) => this.uploadAndSend(to, media, signal));
  }

  /** Subscribes to the gateway's event stream. */
  start(): void {
    if (this.unsubscribe) return;
    this.receiptDedupe.start();
    this.sentIds.start();
    this.unsubscribe = this.client.onEvent((event) => {
      const task = this.handleEvent(event).finally(() => {
        this.inflight.delete(task);
      });
      this.inflight.add(task);
    });
  }

  stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.receiptDedupe.stop();
    this.sentIds.stop();
  }

  /** Waits for in-flight event handling, at most `timeoutMs`. */
  async drain(timeoutMs = 5000): Promise<void> {
    if (this.inflight.size === 0) return;
    let timer: NodeJS.Timeout | undefined;
    await Promise.race([
      Promise.allSettled([...this.inflight]),
      new Promise<void>((resolve) => {
        timer = setTimeout(resolve, timeoutMs);
      }),
    ]);
    clearTimeout(timer);
  }

  /** Normalizes one raw event and runs its side effects. Never rejects. */
  async handleEvent(event: ProtocolEvent): Promise<void> {
    try {
      switch (event.type) {
        case 'message':
          return await this.onMessageEvent(event);
        case 'receipt':
          return await this.onReceiptEvent(event);
        case 'chat_presence':
          return await this.onChatPresence(event);
        case 'presence':
          return await this.onPresenceEvent(event);
        case 'group_info':
          return await this.onGroupInfo(event);
        case 'joined_group':
          return await this.onJoinedGroup(event);
        case 'history_sync':
          this.logger.info('engine', '[HISTORY] history sync received');
          return await this.publish({
            event_type: 'history_sync',
            extra: event.conversations !== undefined ? { conversations: event.conversations } : undefined,
          });
        case 'connected':
          this.logger.info('engine', '[STATE] authenticated and connected');
          return await this.publish({ event_type: 'connected' }, [
            ['presence', () => this.client.sendPresence('available', this.options.signal)],
          ]);
        case 'logged_out':
          this.logger.warn('engine', '[STATE] session logged out; the device may need to be linked again');
          return await this.publish({
            event_type: 'logged_out',
            extra: event.reason ? { reason: event.reason } : undefined,
          });
        case 'identity_change': {
          const jid = identityChangeJid(event);
          const chatId = canonicalChatId(jid);
          this.logger.info('engine', `[IDENTITY] identity changed${chatId ? ` in ${chatId}` : ''}`);
          return await this.publish({ event_type: 'identity_change', chat_id: chatId || undefined });
        }
        case 'unknown':
          this.logger.debug('engine', `[EVENT] ${event.original_type || 'unknown'}`);
          return await this.publish({ event_type: event.original_type || 'unknown' });
      }
    } catch (err) {
      this.logger.error('engine', `Event ${event.type} failed: ${formatErrorMessage(err)}`);
    }
  }

  private async onMessageEvent(event: MessageEvent): Promise<void> {
    const { info } = event;
    if (info.is_from_me) {
      await this.onOwnMessage(event);
      return;
    }

    const chatId = canonicalChatId(info.chat);
    const senderId = canonicalChatId(info.sender);
    if (senderId) this.directory.rememberContact(senderId, info.push_name);

    const env: Envelope = {
      event_type: 'message',
      direction: 'in',
      chat_id: chatId || undefined,
      sender_id: senderId || undefined,
      chat_name: chatId
        ? resolveChatName(
            {
              chatId,
              conversation: event.conversation,
              pushName: info.push_name,
              senderUser: userOf(senderId) || undefined,
            },
            this.directory,
          )
        : undefined,
      message_id: info.id,
      text: inboundText(event.message),
      media: mediaTicketOf(event.message),
    };

    const kind = chatId ? kindOfChat(chatId) : 'private';
    if (chatId === STATUS_BROADCAST) {
      this.logger.info('engine', `[IN] [STATUS] from=${senderId} id=${info.id ?? ''} ${env.media ? 'with media' : 'no media'}`);
    } else if (env.media) {
      this.logger.info(
        'engine',
        `[IN] [${kind}] chat=${chatId} from=${senderId} id=${info.id ?? ''} media=${env.media.type} caption="${previewText(env.text, 60)}"`,
      );
    } else {
      this.logger.info('engine', `[IN] [${kind}] chat=${chatId} from=${senderId} id=${info.id ?? ''} text="${previewText(env.text)}"`);
    }

    const history = this.history;
    const before: SideEffect[] = [];
    if (history && chatId && info.id) {
      const id = info.id;
      before.push([
        'history',
        () =>
          history.save({
            id,
            chat_id: chatId,
            sender: senderId,
            content: env.text ?? '',
            timestamp: eventTime(info.timestamp, this.now()).toISOString(),
            is_from_me: false,
            media_type: env.media?.type,
            filename: env.media?.type === 'document' ? env.media.title || undefined : undefined,
          }),
      ]);
    }
    await this.publish(env, [...before, ['handler', () => this.handlers.onMessage?.(env, event)]]);
  }

  /** Our own messages seen through another device are surfaced as outbound. */
  private async onOwnMessage(event: MessageEvent): Promise<void> {
    const { info } = event;
    // the echo can arrive before the send call returns its id
    if (this.pendingSends.size > 0) await Promise.allSettled([...this.pendingSends]);
    if (info.id && this.sentIds.seen(info.id)) {
      this.logger.debug('engine', `Echo of sent message ${info.id} skipped`);
      return;
    }
    const chatId = canonicalChatId(info.chat);
    await this.forwardOutgoing(chatId, info.id ?? '', outboundText(event.message), mediaTicketOf(event.message));
  }

  private async onReceiptEvent(event: ReceiptEvent): Promise<void> {
    const chatId = canonicalChatId(event.chat);
    const ids = event.message_ids.filter((id) => id.length > 0);
    const receiptType = event.receipt_type ?? '';
    const key = `${chatId}|${receiptType}|${ids.join(',')}`;
    if (this.receiptDedupe.seen(key)) {
      this.logger.debug('engine', `Duplicate receipt ${key} dropped`);
      return;
    }

    const env: Envelope = {
      event_type: 'receipt',
      chat_id: chatId || undefined,
      sender_id: canonicalChatId(event.sender) || undefined,
      message_ids: ids,
      receipt_type: receiptType,
    };
    const label = receiptType || 'delivered';
    this.logger.info(
      'engine',
      ids.length === 1
        ? `[RCPT] chat=${chatId} type=${label} id=${ids[0]}`
        : `[RCPT] chat=${chatId} type=${label} ids=${ids.length}`,
    );
    await this.publish(env, [['handler', () => this.handlers.onReceipt?.(env, event)]]);
  }

  private async onChatPresence(event: ChatPresenceEvent): Promise<void> {
    const chatId = canonicalChatId(event.chat);
    const state = event.state ?? '';
    const media = event.media ?? '';
    this.logger.debug('engine', `[PRESENCE][CHAT] chat=${chatId} ${state.toUpperCase()}${media ? ` (${media})` : ''}`);
    await this.publish({
      event_type: 'chat_presence',
      chat_id: chatId || undefined,
      sender_id: canonicalChatId(event.sender) || undefined,
      extra: { state, media },
    });
  }

  private async onPresenceEvent(event: PresenceEvent): Promise<void> {
    const from = canonicalChatId(event.from);
    const unavailable = event.unavailable ?? false;
    this.logger.debug('engine', `[PRESENCE] ${from} ${unavailable ? `offline, last_seen=${event.last_seen ?? '?'}` : 'online'}`);
    const env: Envelope = {
      event_type: 'presence',
      sender_id: from || undefined,
      extra: { unavailable, last_seen: event.last_seen },
    };
    await this.publish(env, [['handler', () => this.handlers.onPresence?.(env, event)]]);
  }

  private async onGroupInfo(event: GroupInfoEvent): Promise<void> {
    const chatId = canonicalChatId(event.jid);
    this.directory.rememberGroup(chatId, event.name);
    this.logger.info('engine', `[GROUP][UPDATE] ${chatId}`);
    const env: Envelope = {
      event_type: 'group_update',
      chat_id: chatId || undefined,
      chat_name: chatId ? resolveChatName({ chatId }, this.directory) : undefined,
    };
    await this.publish(env, [['handler', () => this.handlers.onGroupUpdate?.(env, event)]]);
  }

  private async onJoinedGroup(event: JoinedGroupEvent): Promise<void> {
    const chatId = canonicalChatId(event.jid);
    this.directory.rememberGroup(chatId, event.name);
    this.logger.info('engine', `[GROUP][JOINED] ${chatId}`);
    await this.publish({
      event_type: 'joined_group',
      chat_id: chatId || undefined,
      chat_name: chatId ? resolveChatName({ chatId }, this.directory) : undefined,
    });
  }

  /**
   * Serializes once, then runs sink, webhook and any extra effects side by side.
   */
  private async publish(env: Envelope, extra: readonly SideEffect[] = []): Promise<void> {
    const { envelope, bytes } = serializeEnvelope(env, {
      now: this.now(),
      extraParams: this.options.extraParams,
    });
    const sink = this.sink;
    const webhook = this.webhook;
    const effects: SideEffect[] = [...extra];
    if (sink) effects.push(['sink', () => sink.append(envelope, bytes)]);
    if (webhook) effects.push(['webhook', () => webhook.forward(bytes)]);
    await Promise.all(effects.map(([name, run]) => this.runEffect(name, envelope, run)));
  }

  private async runEffect(name: string, env: Envelope, run: () => unknown): Promise<void> {
    try {
      await run();
    } catch (err) {
      this.logger.warn('engine', `${name} failed for ${env.event_type} ${env.chat_id ?? ''}: ${formatErrorMessage(err)}`);
      this.handlers.onError?.(err, env);
    }
  }

  /** Mirrors an outbound message into the sink and the webhook. */
  async forwardOutgoing(chatId: string, id: string, text: string, media?: MediaTicket): Promise<void> {
    await this.publish({
      event_type: 'message',
      direction: 'out',
      chat_id: chatId || undefined,
      chat_name: chatId ? resolveChatName({ chatId }, this.directory) : undefined,
      message_id: id || undefined,
      text,
      media,
    });
  }

  // ---- outbound control surface ----

  private requireChat(to: string): string {
    const chatId = canonicalChatId(to);
    if (!chatId) throw new ValidationError('INVALID_RECIPIENT', 'recipient is required');
    return chatId;
  }

  async sendText(to: string, text: string, signal: AbortSignal | undefined = this.options.signal): Promise<string> {
    const chatId = this.requireChat(to);
    const id = await this.trackSend(this.sendTextFn(chatId, text, signal));
    this.logger.info('engine', `[OUT] [${kindOfChat(chatId)}] to=${chatId} id=${id} text="${previewText(text)}"`);
    await this.recordOutbound(chatId, id, text);
    return id;
  }

  async sendMedia(to: string, input: MediaInput, signal: AbortSignal | undefined = this.options.signal): Promise<string> {
    const chatId = this.requireChat(to);
    const media = await prepareMedia(input);
    const sent = await this.trackSend(this.sendMediaFn(chatId, media, signal));
    this.logger.info(
      'engine',
      `[OUT] [${kindOfChat(chatId)}] to=${chatId} id=${sent.id} media=${media.kind} caption="${previewText(media.caption, 60)}"`,
    );
    await this.recordOutbound(chatId, sent.id, media.caption, mediaTicketFromUpload(media, sent.upload));
    return sent.id;
  }

  /** Posts a status update. Only available with the status capability. */
  async postStatus(input: MediaInput, signal: AbortSignal | undefined = this.options.signal): Promise<string> {
    if (!this.options.enableStatus) throw new UnsupportedError('status');
    const media = await prepareMedia(input);
    const sent = await this.trackSend(this.sendStatusFn(STATUS_BROADCAST, media, signal));
    this.logger.info('engine', `[OUT] [status] id=${sent.id} media=${media.kind}`);
    await this.recordOutbound(STATUS_BROADCAST, sent.id, media.caption, mediaTicketFromUpload(media, sent.upload));
    return sent.id;
  }

  async setTyping(
    chat: string,
    typing: boolean,
    media: ChatPresenceMedia = 'text',
    signal: AbortSignal | undefined = this.options.signal,
  ): Promise<void> {
    const chatId = this.requireChat(chat);
    await this.client.sendChatPresence(chatId, typing ? 'composing' : 'paused', media, signal);
  }

  /** Groups need the sender of the acknowledged messages; 1:1 chats do not. */
  async markRead(
    chat: string,
    ids: string[],
    sender?: string,
    receiptType: ReceiptType = 'read',
    signal: AbortSignal | undefined = this.options.signal,
  ): Promise<void> {
    const chatId = this.requireChat(chat);
    const messageIds = ids.filter((id) => id.length > 0);
    if (messageIds.length === 0) return;
    const senderId = canonicalChatId(sender) || undefined;
    await this.client.markRead(chatId, messageIds, senderId, receiptType, signal);
  }

  async downloadMedia(ticket: MediaTicket, signal: AbortSignal | undefined = this.options.signal): Promise<Buffer> {
    if (!ticket.direct_path && !ticket.url) {
      throw new ValidationError('INVALID_TICKET', 'media ticket has neither direct_path nor url');
    }
    return this.client.downloadMedia(ticket, signal);
  }

  /** Downloads into `localPath` and returns it. */
  async saveMedia(ticket: MediaTicket, localPath: string, signal?: AbortSignal): Promise<string> {
    const bytes = await this.downloadMedia(ticket, signal);
    await fs.mkdir(path.dirname(localPath), { recursive: true });
    await fs.writeFile(localPath, bytes);
    return localPath;
  }

  private async uploadAndSend(to: string, media: PreparedMedia, signal?: AbortSignal): Promise<SentMedia> {
    const upload = await this.client.uploadMedia(media.bytes, media.kind, signal);
    const outgoing: OutgoingMedia = {
      kind: media.kind,
      mimetype: media.mimetype,
      upload,
      caption: media.caption || undefined,
      file_name: media.fileName || undefined,
      seconds: media.seconds,
      ptt: media.voiceNote || undefined,
      waveform: media.waveform?.toString('base64'),
    };
    const res = await this.client.sendMessage(to, { media: outgoing }, signal);
    this.sentIds.seen(res.id);
    return { id: res.id, upload };
  }

  private trackSend<T>(send: Promise<T>): Promise<T> {
    this.pendingSends.add(send);
    const remove = () => {
      this.pendingSends.delete(send);
    };
    send.then(remove, remove);
    return send;
  }

  private async recordOutbound(chatId: string, id: string, content: string, media?: MediaTicket): Promise<void> {
    const history = this.history;
    const env: Envelope = { event_type: 'message', direction: 'out', chat_id: chatId, message_id: id };
    const tasks: Promise<void>[] = [this.forwardOutgoing(chatId, id, content, media)];
    if (history) {
      tasks.push(
        this.runEffect('history', env, () =>
          history.save({
            id,
            chat_id: chatId,
            sender: 'me',
            content,
            timestamp: this.now().toISOString(),
            is_from_me: true,
            media_type: media?.type,
            filename: media?.title,
          }),
        ),
      );
    }
    await Promise.all(tasks);
  }
}

async function prepareMedia(input: MediaInput): Promise<PreparedMedia> {
  let bytes = input.bytes;
  if (!bytes) {
    if (!input.path) throw new ValidationError('MEDIA_REQUIRED', 'media path or bytes required');
    try {
      bytes = await fs.readFile(input.path);
    } catch (err) {
      throw new ValidationError('MEDIA_UNREADABLE', formatErrorMessage(err));
    }
  }
  const fileName = input.fileName ?? (input.path ? path.basename(input.path) : '');
  const byName = classifyMediaFile(fileName);
  const mimetype = input.mimetype ?? byName.mimetype;
  const kind = input.mimetype ? kindFromMimetype(input.mimetype) : byName.kind;
  const caption = input.caption ?? '';
  if (kind !== 'audio') return { bytes, kind, mimetype, fileName, caption, voiceNote: false };

  // audio always goes out as a voice note
  let seconds = input.seconds;
  if (!seconds && isOggOpus(mimetype)) seconds = oggOpusSeconds(bytes) ?? undefined;
  seconds = seconds || DEFAULT_VOICE_SECONDS;
  const waveform = input.waveform?.length ? input.waveform : placeholderWaveform(seconds);
  return { bytes, kind, mimetype, fileName, caption, seconds, waveform, voiceNote: true };
}

function mediaTicketFromUpload(media: PreparedMedia, upload: UploadedMedia): MediaTicket {
  return {
    type: media.kind,
    mimetype: media.mimetype,
    title: media.fileName || undefined,
    url: upload.url,
    direct_path: upload.direct_path,
    media_key: upload.media_key,
    file_hash: upload.file_hash,
    encrypted_file_hash: upload.encrypted_file_hash,
    file_length: upload.file_length,
    seconds: media.kind === 'audio' ? media.seconds : undefined,
  };
}
