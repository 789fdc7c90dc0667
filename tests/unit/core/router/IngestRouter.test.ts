import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import type { BusinessPort } from '../../../../src/core/business/BusinessClient.js';
import type { Envelope } from '../../../../src/core/envelope/Envelope.js';
import type { EngineControlPort } from '../../../../src/core/outbound/EngineControlClient.js';
import {
  IngestRouter,
  fallbackReply,
  isTypingEvent,
  type ProfilePort,
  type ReplyTiming,
} from '../../../../src/core/router/IngestRouter.js';
import { createMockLogger } from '../../../helpers/logger.js';

const CHAT = '5215512345678@s.whatsapp.net';
const GROUP = '120363025@g.us';

const TIMING: ReplyTiming = {
  preReplyDelayMs: 0,
  baseWaitMs: 800,
  perCharMs: 35,
  jitterMs: 400,
  maxWaitMs: 4000,
  typingPauseMs: 300,
};

function message(id: string, text: string, overrides: Partial<Envelope> = {}): Envelope {
  return { event_type: 'message', direction: 'in', chat_id: CHAT, sender_id: CHAT, message_id: id, text, ...overrides };
}

function typing(overrides: Partial<Envelope> = {}): Envelope {
  return { event_type: 'chat_presence', chat_id: CHAT, sender_id: CHAT, extra: { state: 'composing', media: 'text' }, ...overrides };
}

function setup(reply: BusinessPort['ask'] = async () => ({ reply: 'Hola, te ayudo' })) {
  const logger = createMockLogger();
  const profiles = {
    touchInbound: vi.fn<ProfilePort['touchInbound']>().mockResolvedValue(null),
    incOutbound: vi.fn<ProfilePort['incOutbound']>().mockResolvedValue(null),
    appendMedia: vi.fn<ProfilePort['appendMedia']>().mockResolvedValue(null),
  };
  const engine = {
    sendText: vi.fn<EngineControlPort['sendText']>().mockResolvedValue(undefined),
    setTyping: vi.fn<EngineControlPort['setTyping']>().mockResolvedValue(undefined),
    markRead: vi.fn<EngineControlPort['markRead']>().mockResolvedValue(undefined),
  };
  const business = { ask: vi.fn<BusinessPort['ask']>(reply) };
  const sleeps: number[] = [];
  const router = new IngestRouter(
    { profiles, engine, business, logger },
    {
      windowMs: 3000,
      typingDebounceMs: 700,
      reply: TIMING,
      random: () => 0,
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    },
  );
  return { router, profiles, engine, business, logger, sleeps };
}

describe('isTypingEvent', () => {
  it('reads the presence state', () => {
    expect(isTypingEvent(typing())).toBe(true);
    expect(isTypingEvent(typing({ extra: { state: 'recording' } }))).toBe(true);
    expect(isTypingEvent(typing({ extra: { state: 'paused' } }))).toBe(false);
  });

  it('falls back to a typing flag for typing and presence events', () => {
    expect(isTypingEvent({ event_type: 'typing', extra: { typing: true } })).toBe(true);
    expect(isTypingEvent({ event_type: 'presence', extra: { typing: '1' } })).toBe(true);
    expect(isTypingEvent({ event_type: 'chat_presence', extra: { typing: true } })).toBe(false);
  });

  it('accepts composing receipts', () => {
    expect(isTypingEvent({ event_type: 'receipt', receipt_type: 'Composing' })).toBe(true);
    expect(isTypingEvent({ event_type: 'receipt', receipt_type: 'read' })).toBe(false);
  });
});

describe('IngestRouter', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('answers a two-message burst once after the window', async () => {
    const { router, engine, business, profiles, sleeps } = setup();

    await router.handle(message('m1', 'hola'));
    await vi.advanceTimersByTimeAsync(1000);
    await router.handle(message('m2', 'como estas'));
    await vi.advanceTimersByTimeAsync(2999);
    expect(business.ask).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    await router.window.idle();

    expect(engine.markRead).toHaveBeenNthCalledWith(1, CHAT, ['m1'], undefined, undefined);
    expect(engine.markRead).toHaveBeenNthCalledWith(2, CHAT, ['m2'], undefined, undefined);
    expect(profiles.touchInbound).toHaveBeenCalledTimes(2);
    expect(business.ask).toHaveBeenCalledTimes(1);
    expect(business.ask).toHaveBeenCalledWith('wa-5215512345678', 'como estas', undefined);
    expect(engine.setTyping.mock.calls).toEqual([
      [CHAT, true, 'text', undefined],
      [CHAT, false, 'text', undefined],
    ]);
    expect(engine.sendText).toHaveBeenCalledTimes(1);
    expect(engine.sendText).toHaveBeenCalledWith(CHAT, 'Hola, te ayudo', undefined);
    // pre-reply delay, typing wait (800 + 14 chars * 35), pause
    expect(sleeps).toEqual([0, 1290, 300]);
  });

  it('sends the fallback when the backend has no reply', async () => {
    const { router, engine } = setup(async () => null);

    await router.handle(message('m1', 'hola'));
    await router.handle(message('m2', 'otra vez'));
    await vi.advanceTimersByTimeAsync(3000);
    await router.window.idle();

    expect(engine.sendText).toHaveBeenCalledWith(CHAT, 'Received 2 message(s) in the window.', undefined);
  });

  it('skips the backend when the last message has no text', async () => {
    const { router, engine, business, profiles } = setup();
    const photo = message('m1', '', { media: { type: 'image', mimetype: 'image/jpeg' } });

    await router.handle(photo);
    await vi.advanceTimersByTimeAsync(3000);
    await router.window.idle();

    expect(profiles.appendMedia).toHaveBeenCalledWith(CHAT, photo);
    expect(business.ask).not.toHaveBeenCalled();
    expect(engine.sendText).toHaveBeenCalledWith(CHAT, fallbackReply(1), undefined);
  });

  it('extends the window while the user types', async () => {
    const { router, business } = setup();

    await router.handle(message('m1', 'hola'));
    await vi.advanceTimersByTimeAsync(2500);
    await router.handle(typing());
    await vi.advanceTimersByTimeAsync(2999);
    expect(business.ask).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    await router.window.idle();
    expect(business.ask).toHaveBeenCalledTimes(1);
  });

  it('debounces typing signals per chat', async () => {
    const { router } = setup();
    const t0 = Date.now();

    await router.handle(message('m1', 'hola'));
    await vi.advanceTimersByTimeAsync(1000);
    await router.handle(typing());
    expect(router.window.deadlineOf(CHAT)).toBe(t0 + 4000);

    await vi.advanceTimersByTimeAsync(100);
    await router.handle(typing());
    expect(router.window.deadlineOf(CHAT)).toBe(t0 + 4000);

    await vi.advanceTimersByTimeAsync(700);
    await router.handle(typing());
    expect(router.window.deadlineOf(CHAT)).toBe(t0 + 4800);
  });

  it('opens the window without waiting for the profile write', async () => {
    const { router, profiles } = setup();
    let finishWrite: () => void = () => undefined;
    profiles.touchInbound.mockReturnValueOnce(
      new Promise((resolve) => {
        finishWrite = () => resolve(null);
      }),
    );

    const handled = router.handle(message('m1', 'hola'));
    await vi.advanceTimersByTimeAsync(0);

    expect(router.window.getPendingCount()).toBe(1);
    finishWrite();
    await handled;
  });

  it('does not debounce typing that found no open window', async () => {
    const { router } = setup();
    const t0 = Date.now();

    await router.handle(message('m1', 'hola'));
    await vi.advanceTimersByTimeAsync(3000);
    await router.window.idle();
    await router.handle(typing());
    expect(router.window.deadlineOf(CHAT)).toBeUndefined();

    await vi.advanceTimersByTimeAsync(100);
    await router.handle(message('m2', 'otra'));
    await vi.advanceTimersByTimeAsync(100);
    await router.handle(typing());

    expect(router.window.deadlineOf(CHAT)).toBe(t0 + 3200 + 3000);
  });

  it('ignores typing for chats without messages', async () => {
    const { router, business } = setup();

    await router.handle(typing());
    await vi.advanceTimersByTimeAsync(10_000);

    expect(router.window.getPendingCount()).toBe(0);
    expect(business.ask).not.toHaveBeenCalled();
  });

  it('maps a private typing signal to the group the sender wrote in', async () => {
    const { router } = setup();
    const t0 = Date.now();

    await router.handle(message('g1', 'hola grupo', { chat_id: GROUP, sender_id: CHAT }));
    await vi.advanceTimersByTimeAsync(2000);
    await router.handle(typing({ chat_id: CHAT, sender_id: CHAT }));

    expect(router.window.deadlineOf(GROUP)).toBe(t0 + 5000);
  });

  it('passes the sender when acknowledging group messages', async () => {
    const { router, engine } = setup();
    await router.handle(message('g1', 'hola', { chat_id: GROUP, sender_id: CHAT }));
    expect(engine.markRead).toHaveBeenCalledWith(GROUP, ['g1'], CHAT, undefined);
  });

  it('keeps routing when mark-read fails', async () => {
    const { router, engine, logger } = setup();
    engine.markRead.mockRejectedValueOnce(new Error('engine down'));

    await router.handle(message('m1', 'hola'));

    expect(logger.warn).toHaveBeenCalledWith('router', `markread failed chat=${CHAT} id=m1: engine down`);
    expect(router.window.getPendingCount()).toBe(1);
  });

  it('counts outbound messages without aggregating them', async () => {
    const { router, engine, profiles } = setup();

    await router.handle(message('o1', 'respuesta', { direction: 'out', sender_id: 'me' }));

    expect(engine.markRead).not.toHaveBeenCalled();
    expect(profiles.incOutbound).toHaveBeenCalledWith(CHAT);
    expect(profiles.touchInbound).not.toHaveBeenCalled();
    expect(router.window.getPendingCount()).toBe(0);
  });

  it('still updates the profile of a message rejected for missing sender', async () => {
    const { router, profiles, logger } = setup();

    await router.handle(message('m1', 'hola', { sender_id: undefined }));

    expect(profiles.touchInbound).toHaveBeenCalledTimes(1);
    expect(router.window.getPendingCount()).toBe(0);
    expect(logger.info).toHaveBeenCalledWith('router', `filtered: sender-required chat=${CHAT} from=`);
  });

  it('caps the typing wait and still clears typing when the send fails', async () => {
    const { router, engine, logger, sleeps } = setup();
    engine.sendText.mockRejectedValueOnce(new Error('rate limited'));

    const waited = await router.replyWithTyping(CHAT, 'x'.repeat(200));

    expect(waited).toBe(4000);
    expect(sleeps).toEqual([4000, 300]);
    expect(logger.warn).toHaveBeenCalledWith('router', 'send failed: rate limited');
    expect(engine.setTyping).toHaveBeenLastCalledWith(CHAT, false, 'text', undefined);
  });
});
