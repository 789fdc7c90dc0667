/**
 * IngestRouter: what the ingestion server does with an accepted envelope.
 *
 * Messages update the chat profile and feed the aggregation window; typing
 * signals keep an open window alive; a window flush asks the business backend
 * for a reply and answers with a short typing simulation.
 */

import type { BusinessPort } from '../business/BusinessClient.js';
import { AggregationWindow, type ResetReason } from '../conversation/AggregationWindow.js';
import type { Envelope } from '../envelope/Envelope.js';
import { canonicalChatId, isGroupChat, userOf } from '../envelope/chatId.js';
import type { EngineControlPort } from '../outbound/EngineControlClient.js';
import type { ProfileStore } from '../profile/ProfileStore.js';
import { sleep as abortableSleep } from '../util/async.js';
import { charLength, previewText } from '../util/text.js';
import type { Logger } from '../../infra/logger/logger.js';
import { formatErrorMessage } from '../../infra/logger/logger.js';
import { DEFAULT_FILTERS, firstRejection, type EnvelopeFilter } from './filters.js';

export type ProfilePort = Pick<ProfileStore, 'touchInbound' | 'incOutbound' | 'appendMedia'>;

export interface ReplyTiming {
  preReplyDelayMs: number;
  baseWaitMs: number;
  perCharMs: number;
  jitterMs: number;
  maxWaitMs: number;
  typingPauseMs: number;
}

export interface IngestRouterOptions {
  windowMs: number;
  typingDebounceMs?: number;
  reply: ReplyTiming;
  filters?: readonly EnvelopeFilter[];
  signal?: AbortSignal;
  random?: () => number;
  now?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface IngestRouterDeps {
  profiles: ProfilePort;
  engine: EngineControlPort;
  business: BusinessPort;
  logger: Logger;
}

const TYPING_STATES: ReadonlySet<string> = new Set(['composing', 'typing', 'recording']);

/** Does this envelope say the user is typing (or recording)? */
export function isTypingEvent(env: Envelope): boolean {
  const type = env.event_type.trim().toLowerCase();
  const extra = env.extra ?? {};
  if (type === 'chat_presence' || type === 'typing' || type === 'presence') {
    const state = extra.state;
    if (typeof state === 'string') return TYPING_STATES.has(state.trim().toLowerCase());
    if (type !== 'chat_presence') {
      const typing = extra.typing;
      if (typing === true) return true;
      if (typeof typing === 'string' && (typing.toLowerCase() === 'true' || typing === '1')) return true;
    }
  }
  const receipt = (env.receipt_type ?? '').trim().toLowerCase();
  return receipt === 'composing' || receipt === 'typing';
}

export function fallbackReply(count: number): string {
  return `Received ${count} message(s) in the window.`;
}

export class IngestRouter {
  readonly window: AggregationWindow;
  private readonly profiles: ProfilePort;
  private readonly engine: EngineControlPort;
  private readonly business: BusinessPort;
  private readonly logger: Logger;
  private readonly filters: readonly EnvelopeFilter[];
  private readonly typingDebounceMs: number;
  private readonly random: () => number;
  private readonly now: () => number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  private readonly lastByChat = new Map<string, Envelope>();
  private readonly lastChatBySender = new Map<string, string>();
  private readonly lastTypingAt = new Map<string, number>();
  private lastActiveChat = '';

  constructor(
    deps: IngestRouterDeps,
    private readonly options: IngestRouterOptions,
  ) {
    this.profiles = deps.profiles;
    this.engine = deps.engine;
    this.business = deps.business;
    this.logger = deps.logger;
    this.filters = options.filters ?? DEFAULT_FILTERS;
    this.typingDebounceMs = options.typingDebounceMs ?? 700;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => Date.now());
    this.sleep = options.sleep ?? abortableSleep;
    this.window = new AggregationWindow(deps.logger, {
      windowMs: options.windowMs,
      onFlush: (chat, count) => this.flush(chat, count),
      onReset: (chat, reason, count, windowMs) => this.logReset(chat, reason, count, windowMs),
    });
  }

  /** Mark-read for inbound messages, then routing by event type. */
  async handle(env: Envelope): Promise<void> {
    await this.acknowledge(env);
    await this.route(env);
  }

  async route(env: Envelope): Promise<void> {
    switch (env.event_type) {
      case 'message':
        return this.onMessage(env);
      case 'receipt':
        return this.onReceipt(env);
      default:
        return this.onAny(env);
    }
  }

  /** Groups need the sender of the message being acknowledged. */
  async acknowledge(env: Envelope): Promise<void> {
    const id = env.message_id?.trim();
    const chat = canonicalChatId(env.chat_id);
    if (env.event_type !== 'message' || env.direction === 'out' || !id || !chat) return;

    const started = this.now();
    const sender = isGroupChat(chat) ? env.sender_id : undefined;
    try {
      await this.engine.markRead(chat, [id], sender, this.options.signal);
      this.logger.debug('router', `markread ok chat=${chat} id=${id} t_ms=${this.now() - started}`);
    } catch (err) {
      this.logger.warn('router', `markread failed chat=${chat} id=${id}: ${formatErrorMessage(err)}`);
    }
  }

  async onMessage(env: Envelope): Promise<void> {
    const chat = canonicalChatId(env.chat_id);

    if (env.direction === 'out') {
      if (chat) {
        if (env.media) await this.profiles.appendMedia(chat, env);
        await this.profiles.incOutbound(chat);
      }
      this.logger.debug('router', `filtered: direction_out chat=${chat}`);
      return;
    }

    // the window is scheduled before the profile write; rejected messages still count
    const rejected = firstRejection(this.filters, env);
    if (rejected) {
      this.logger.info('router', `filtered: ${rejected} chat=${chat} from=${env.sender_id ?? ''}`);
    } else if (chat) {
      this.window.add(chat);
      const sender = canonicalChatId(env.sender_id);
      if (sender) this.lastChatBySender.set(sender, chat);
      this.lastActiveChat = chat;
      this.lastByChat.set(chat, env);

      const text = env.text ?? '';
      this.logger.info('router', `message chat=${chat} from=${sender} text="${previewText(text)}" len=${charLength(text.trim())}`);
    }

    await this.profiles.touchInbound(env);
    if (chat && env.media) await this.profiles.appendMedia(chat, env);
  }

  async onReceipt(env: Envelope): Promise<void> {
    const rejected = firstRejection(this.filters, env);
    if (rejected) {
      this.logger.debug('router', `filtered: ${rejected} receipt chat=${env.chat_id ?? ''}`);
      return;
    }
    const type = (env.receipt_type ?? '').trim();
    const ids = env.message_ids ?? [];
    if (ids.length > 0) {
      this.logger.info('router', `receipt chat=${env.chat_id ?? ''} count=${ids.length} type=${type}`);
    } else if (env.message_id?.trim()) {
      this.logger.info('router', `receipt chat=${env.chat_id ?? ''} id=${env.message_id} type=${type}`);
    }
  }

  async onAny(env: Envelope): Promise<void> {
    if (isTypingEvent(env)) {
      this.onTyping(env);
      return;
    }
    const rejected = firstRejection(this.filters, env);
    if (rejected) {
      this.logger.debug('router', `filtered: ${rejected} type=${env.event_type}`);
      return;
    }
    this.logger.info('router', `event type=${env.event_type} chat=${env.chat_id ?? ''} from=${env.sender_id ?? ''}`);
  }

  /** Typing bypasses the filters; the target chat falls back step by step. */
  private onTyping(env: Envelope): void {
    const raw = canonicalChatId(env.chat_id);
    const mapped = this.lastChatBySender.get(canonicalChatId(env.sender_id)) ?? '';
    let chat = mapped && mapped !== raw ? mapped : raw;
    if (!chat) chat = this.lastActiveChat;
    // only chats that already had messages, or typing alone would open windows
    if (!chat || !this.lastByChat.has(chat)) return;

    const now = this.now();
    const last = this.lastTypingAt.get(chat);
    if (last !== undefined && now - last < this.typingDebounceMs) return;
    if (this.window.touch(chat)) this.lastTypingAt.set(chat, now);
  }

  /** Window deadline passed: ask the backend and answer once for the burst. */
  async flush(chat: string, count: number): Promise<void> {
    const { signal, reply } = this.options;
    await this.sleep(reply.preReplyDelayMs, signal);

    const env = this.lastByChat.get(chat);
    const text = env?.text?.trim() ?? '';
    if (env && text) {
      const sessionId = `wa-${userOf(env.sender_id || chat)}`;
      const answer = await this.business.ask(sessionId, text, signal);
      const body = answer?.reply ?? '';
      if (body.trim()) {
        const waited = await this.replyWithTyping(chat, body);
        this.logger.info(
          'router',
          `reply chat=${chat} count=${count} reply_len=${charLength(body)} preview="${previewText(body)}" pre_delay_ms=${reply.preReplyDelayMs} typing_ms=${waited}`,
        );
        return;
      }
    }
    await this.replyWithTyping(chat, fallbackReply(count));
  }

  /**
   * Typing on, wait proportional to the reply length (capped), send, short
   * pause, typing off. Returns the wait before sending.
   */
  async replyWithTyping(chat: string, text: string): Promise<number> {
    const { signal, reply } = this.options;
    await this.attempt('typing on', () => this.engine.setTyping(chat, true, 'text', signal));

    const jitter = reply.jitterMs > 0 ? Math.floor(this.random() * reply.jitterMs) : 0;
    const wait = Math.min(reply.baseWaitMs + charLength(text) * reply.perCharMs + jitter, reply.maxWaitMs);
    await this.sleep(wait, signal);

    await this.attempt('send', () => this.engine.sendText(chat, text, signal));
    await this.sleep(reply.typingPauseMs, signal);
    await this.attempt('typing off', () => this.engine.setTyping(chat, false, 'text', signal));
    return wait;
  }

  private async attempt(what: string, call: () => Promise<void>): Promise<void> {
    try {
      await call();
    } catch (err) {
      this.logger.warn('router', `${what} failed: ${formatErrorMessage(err)}`);
    }
  }

  private logReset(chat: string, reason: ResetReason, count: number, windowMs: number): void {
    const secs = Math.floor(windowMs / 1000);
    switch (reason) {
      case 'start':
        this.logger.info('router', `aggregation window started chat=${chat} window_s=${secs} count=${count}`);
        break;
      case 'message':
        this.logger.info('router', `new message in window, restarting wait chat=${chat} window_s=${secs} count=${count}`);
        break;
      case 'typing':
        this.logger.info('router', `user typing, window restarted chat=${chat} window_s=${secs} count=${count}`);
        break;
    }
  }

  /** Cancels open windows and waits for running flushes. */
  async stop(): Promise<void> {
    this.window.clear();
    await this.window.idle();
  }
}
