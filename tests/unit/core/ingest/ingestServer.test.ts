import { afterEach, describe, it, expect, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { DedupeCache } from '../../../../src/core/dedupe/DedupeCache.js';
import type { Envelope } from '../../../../src/core/envelope/Envelope.js';
import { signBody } from '../../../../src/core/forward/signature.js';
import {
  MissingSecretError,
  buildIngestServer,
  type IngestServerOptions,
} from '../../../../src/core/ingest/ingestServer.js';
import type { Profile } from '../../../../src/core/profile/ProfileStore.js';
import { Lifecycle } from '../../../../src/infra/lifecycle.js';
import { createMockLogger } from '../../../helpers/logger.js';

const SECRET = 'test-secret';
const CHAT = '5215512345678@s.whatsapp.net';

function envelopeBody(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    event_type: 'message',
    direction: 'in',
    chat_id: CHAT,
    sender_id: CHAT,
    message_id: 'm1',
    text: 'hola',
    ...overrides,
  });
}

describe('ingest server', () => {
  let app: FastifyInstance | undefined;

  afterEach(async () => {
    await app?.close();
    app = undefined;
  });

  function setup(options: Partial<IngestServerOptions> = {}, profiles: Profile[] = []) {
    const logger = createMockLogger();
    const lifecycle = new Lifecycle(logger);
    const handle = vi.fn<(env: Envelope) => Promise<void>>().mockResolvedValue(undefined);
    const server = buildIngestServer(
      {
        router: { handle },
        dedupe: new DedupeCache({ windowMs: 600_000 }),
        profiles: { list: () => profiles },
        lifecycle,
        logger,
      },
      { secret: SECRET, requireSignature: true, bodyLimit: 1_048_576, ...options },
    );
    app = server;
    return { app: server, handle, lifecycle, logger };
  }

  function post(target: FastifyInstance, payload: string, headers: Record<string, string> = {}) {
    return target.inject({
      method: 'POST',
      url: '/wh',
      payload,
      headers: { 'content-type': 'application/json', ...headers },
    });
  }

  it('acknowledges a signed envelope and routes it in the background', async () => {
    const { app, handle, lifecycle } = setup();
    const body = envelopeBody();

    const res = await post(app, body, { 'x-relay-signature': signBody(SECRET, body) });
    await lifecycle.drain();

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true });
    expect(handle).toHaveBeenCalledTimes(1);
    expect(handle).toHaveBeenCalledWith(
      expect.objectContaining({ event_type: 'message', direction: 'in', chat_id: CHAT, message_id: 'm1', text: 'hola' }),
    );
  });

  it('answers a replayed message as a duplicate without routing it again', async () => {
    const { app, handle, lifecycle } = setup();
    const body = envelopeBody();
    const headers = { 'x-relay-signature': signBody(SECRET, body) };

    await post(app, body, headers);
    const replay = await post(app, body, headers);
    await lifecycle.drain();

    expect(replay.statusCode).toBe(200);
    expect(replay.json()).toEqual({ ok: true, dup: true });
    expect(handle).toHaveBeenCalledTimes(1);
  });

  it('does not dedupe non-message events', async () => {
    const { app, handle, lifecycle } = setup();
    const body = envelopeBody({ event_type: 'chat_presence', message_id: 'p1' });
    const headers = { 'x-relay-signature': signBody(SECRET, body) };

    await post(app, body, headers);
    const second = await post(app, body, headers);
    await lifecycle.drain();

    expect(second.json()).toEqual({ ok: true });
    expect(handle).toHaveBeenCalledTimes(2);
  });

  it('rejects missing or tampered signatures', async () => {
    const { app, handle } = setup();
    const body = envelopeBody();

    const unsigned = await post(app, body);
    const tampered = await post(app, envelopeBody({ text: 'adios' }), { 'x-relay-signature': signBody(SECRET, body) });

    expect(unsigned.statusCode).toBe(401);
    expect(unsigned.body).toBe('invalid signature');
    expect(tampered.statusCode).toBe(401);
    expect(handle).not.toHaveBeenCalled();
  });

  it('rejects bodies that are not envelopes', async () => {
    const { app } = setup();
    const broken = '{"event_type":';
    const noType = JSON.stringify({ chat_id: CHAT });

    const res1 = await post(app, broken, { 'x-relay-signature': signBody(SECRET, broken) });
    const res2 = await post(app, noType, { 'x-relay-signature': signBody(SECRET, noType) });

    expect(res1.statusCode).toBe(400);
    expect(res1.body).toBe('invalid json');
    expect(res2.statusCode).toBe(400);
  });

  it('rejects bodies over the ceiling with 413', async () => {
    const { app, handle } = setup({ bodyLimit: 64 });
    const body = envelopeBody({ text: 'x'.repeat(200) });

    const res = await post(app, body, { 'x-relay-signature': signBody(SECRET, body) });

    expect(res.statusCode).toBe(413);
    expect(handle).not.toHaveBeenCalled();
  });

  it('checks the timestamp header when enabled', async () => {
    const now = Date.parse('2024-05-01T12:00:00Z');
    const { app } = setup({ useTimestamp: true, timestampSkewMs: 300_000, now: () => now });
    const body = envelopeBody();
    const signature = signBody(SECRET, body);

    const missing = await post(app, body, { 'x-relay-signature': signature });
    const stale = await post(app, body, { 'x-relay-signature': signature, 'x-relay-timestamp': '2024-05-01T11:00:00Z' });
    const fresh = await post(app, body, { 'x-relay-signature': signature, 'x-relay-timestamp': '2024-05-01T12:01:00Z' });

    expect(missing.statusCode).toBe(401);
    expect(missing.body).toBe('invalid timestamp');
    expect(stale.statusCode).toBe(401);
    expect(fresh.statusCode).toBe(200);
  });

  it('accepts unsigned bodies when signatures are not required', async () => {
    const { app } = setup({ secret: undefined, requireSignature: false });
    const res = await post(app, envelopeBody());
    expect(res.statusCode).toBe(200);
  });

  it('refuses to start without a secret unless the dev override is set', () => {
    expect(() => setup({ secret: undefined })).toThrow(MissingSecretError);
    const { logger } = setup({ secret: undefined, allowNoSecretDev: true });
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('serves the health and debug endpoints', async () => {
    const profile: Profile = {
      chat_id: CHAT,
      language: 'es',
      tier: 'free',
      tags: {},
      first_seen: '2024-05-01T12:00:00.000Z',
      last_connection: '2024-05-01T12:00:00.000Z',
      last_chat: CHAT,
      last_text: 'hola',
      media: { in: [], out: [] },
      block: { spam: false, malicious: false, permanent: false },
      metrics: { msg_in: 1, msg_out: 0, streak_days: 1, streak_last_day: '2024-05-01' },
    };
    const { app } = setup({}, [profile]);

    expect((await app.inject({ method: 'GET', url: '/healthz' })).body).toBe('ok');
    expect((await app.inject({ method: 'GET', url: '/readyz' })).body).toBe('ready');
    expect((await app.inject({ method: 'GET', url: '/' })).body).toBe('server up');
    expect((await app.inject({ method: 'GET', url: '/debug/profiles' })).json()).toEqual([profile]);
  });
});
