import Fastify, { type FastifyInstance } from 'fastify';
import type { DedupeCache } from '../dedupe/DedupeCache.js';
import { EnvelopeSchema, type Envelope } from '../envelope/Envelope.js';
import { SIGNATURE_HEADER, TIMESTAMP_HEADER, verifySignature, verifyTimestamp } from '../forward/signature.js';
import type { Profile } from '../profile/ProfileStore.js';
import { createTextErrorHandler } from '../../infra/http/errorHandler.js';
import type { Lifecycle } from '../../infra/lifecycle.js';
import type { Logger } from '../../infra/logger/logger.js';

export interface IngestHandler {
  handle(env: Envelope): Promise<void>;
}

export interface IngestServerOptions {
  secret?: string;
  requireSignature: boolean;
  allowNoSecretDev?: boolean;
  bodyLimit: number;
  useTimestamp?: boolean;
  timestampSkewMs?: number;
  now?: () => number;
}

export interface IngestServerDeps {
  router: IngestHandler;
  dedupe: DedupeCache;
  profiles: { list(): Profile[] };
  lifecycle: Pick<Lifecycle, 'spawn'>;
  logger: Logger;
}

/** Thrown at startup when signatures are required but no secret is configured. */
export class MissingSecretError extends Error {
  constructor() {
    super('webhook secret required when signatures are enforced');
    this.name = 'MissingSecretError';
  }
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

function parseEnvelope(body: Buffer): Envelope | null {
  let raw: unknown;
  try {
    raw = JSON.parse(body.toString('utf-8'));
  } catch {
    return null;
  }
  const parsed = EnvelopeSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

/**
 * Webhook ingestion endpoint. Envelopes are acknowledged before any routing;
 * routing runs as a detached task owned by the lifecycle.
 */
export function buildIngestServer(deps: IngestServerDeps, options: IngestServerOptions): FastifyInstance {
  const { router, dedupe, profiles, lifecycle, logger } = deps;
  if (options.requireSignature && !options.secret) {
    if (!options.allowNoSecretDev) throw new MissingSecretError();
    logger.warn('ingest', 'signatures required but no secret configured (dev override); every POST /wh will be rejected');
  }
  const skewMs = options.timestampSkewMs ?? 300_000;
  const now = options.now ?? (() => Date.now());

  const app = Fastify({ logger: false, bodyLimit: options.bodyLimit });
  app.setErrorHandler(createTextErrorHandler(logger, 'ingest'));

  // the signature covers the exact bytes, so bodies stay raw whatever the content type
  app.removeAllContentTypeParsers();
  app.addContentTypeParser('*', { parseAs: 'buffer' }, (_request, body, done) => {
    done(null, body);
  });

  app.get('/', async () => 'server up');
  app.get('/healthz', async () => 'ok');
  app.get('/readyz', async () => 'ready');
  app.get('/debug/profiles', async () => profiles.list());

  app.post('/wh', async (request, reply) => {
    const body = Buffer.isBuffer(request.body) ? request.body : Buffer.alloc(0);

    if (options.useTimestamp) {
      const check = verifyTimestamp(headerValue(request.headers[TIMESTAMP_HEADER.toLowerCase()]), skewMs, now());
      if (!check.ok) {
        logger.warn('ingest', `rejected: ${check.reason}`);
        return reply.status(401).type('text/plain; charset=utf-8').send('invalid timestamp');
      }
    }

    if (options.requireSignature) {
      if (!verifySignature(options.secret, body, headerValue(request.headers[SIGNATURE_HEADER.toLowerCase()]))) {
        logger.warn('ingest', 'rejected: invalid signature');
        return reply.status(401).type('text/plain; charset=utf-8').send('invalid signature');
      }
    } else if (!options.secret) {
      logger.debug('ingest', 'signature not required (dev mode)');
    }

    const env = parseEnvelope(body);
    if (!env) {
      return reply.status(400).type('text/plain; charset=utf-8').send('invalid json');
    }

    logger.info(
      'ingest',
      `event type=${env.event_type.trim()} dir=${env.direction ?? ''} chat=${env.chat_id ?? ''} sender=${env.sender_id ?? ''} msg_id=${env.message_id?.trim() ?? ''}`,
    );

    if (env.event_type === 'message' && dedupe.seen(env.message_id?.trim() ?? '')) {
      return reply.status(200).send({ ok: true, dup: true });
    }

    lifecycle.spawn('ingest', () => router.handle(env));
    return reply.status(200).send({ ok: true });
  });

  return app;
}
