import Fastify, { type FastifyInstance } from 'fastify';
import { z } from 'zod';
import { ValidationError } from '../../infra/errors.js';
import { createErrorHandler } from '../../infra/http/errorHandler.js';
import type { Logger } from '../../infra/logger/logger.js';
import { formatErrorMessage } from '../../infra/logger/logger.js';
import type { Engine } from './Engine.js';

export type EngineControl = Pick<Engine, 'sendText' | 'sendMedia' | 'setTyping' | 'markRead'>;

export interface ControlResult {
  success: boolean;
  message: string;
}

const SendBodySchema = z.object({
  recipient: z.string().trim().min(1),
  message: z.string().default(''),
  media_path: z.string().optional(),
});

const TypingBodySchema = z.object({
  recipient: z.string().trim().min(1),
  typing: z.boolean(),
  media: z.string().optional(),
});

const MarkReadBodySchema = z.object({
  recipient: z.string().trim().min(1),
  message_ids: z.array(z.string()).min(1, 'message_ids required'),
  sender: z.string().optional(),
  receipt_type: z.string().optional(),
});

export interface ControlApiOptions {
  /** Readiness check; the engine is ready once the gateway is connected. */
  isReady?: () => boolean;
}

/**
 * HTTP control plane of the engine. Every route answers {success, message};
 * invalid bodies are rejected with 400 by the shared error handler.
 */
export function buildControlApi(engine: EngineControl, logger: Logger, options: ControlApiOptions = {}): FastifyInstance {
  const app = Fastify({ logger: false });
  app.setErrorHandler(createErrorHandler(logger, 'control-api'));

  app.get('/healthz', async () => 'ok');
  app.get('/readyz', async (_request, reply) => {
    if (options.isReady && !options.isReady()) {
      return reply.status(503).type('text/plain; charset=utf-8').send('gateway not connected');
    }
    return 'ready';
  });

  // Validation problems go to the error handler; everything else is a send failure.
  async function run(action: () => Promise<string>): Promise<{ status: number; body: ControlResult }> {
    try {
      return { status: 200, body: { success: true, message: await action() } };
    } catch (err) {
      if (err instanceof ValidationError) throw err;
      logger.warn('control-api', formatErrorMessage(err));
      return { status: 500, body: { success: false, message: formatErrorMessage(err) } };
    }
  }

  /** POST /api/send - text, or media from a local path with the message as caption. */
  app.post('/api/send', async (request, reply) => {
    const body = SendBodySchema.parse(request.body);
    const result = await run(async () => {
      const id = body.media_path
        ? await engine.sendMedia(body.recipient, { path: body.media_path, caption: body.message })
        : await engine.sendText(body.recipient, body.message);
      return `sent: ${id}`;
    });
    return reply.status(result.status).send(result.body);
  });

  /** POST /api/typing - composing on/off. */
  app.post('/api/typing', async (request, reply) => {
    const body = TypingBodySchema.parse(request.body);
    const media = body.media?.toLowerCase() === 'audio' ? 'audio' : 'text';
    const result = await run(async () => {
      await engine.setTyping(body.recipient, body.typing, media);
      return 'typing updated';
    });
    return reply.status(result.status).send(result.body);
  });

  /** POST /api/markread - groups pass the sender of the acknowledged messages. */
  app.post('/api/markread', async (request, reply) => {
    const body = MarkReadBodySchema.parse(request.body);
    const receiptType = body.receipt_type?.trim().toLowerCase() === 'played' ? 'played' : 'read';
    const result = await run(async () => {
      await engine.markRead(body.recipient, body.message_ids, body.sender?.trim() || undefined, receiptType);
      return 'marked';
    });
    return reply.status(result.status).send(result.body);
  });

  return app;
}
