import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { ValidationError } from '../errors.js';
import type { Logger } from '../logger/logger.js';

export interface ErrorResponse {
  error: {
    code: string;
    message: string;
  };
}

/**
 * Maps known error codes to HTTP status codes.
 * Unrecognised codes default to 500.
 */
const STATUS_MAP: Record<string, number> = {
  VALIDATION_ERROR: 400,
  BAD_REQUEST: 400,
  PAYLOAD_TOO_LARGE: 413,
  UNAUTHORIZED: 401,
  NOT_FOUND: 404,
  UNSUPPORTED: 501,
};

function deriveErrorCode(error: Error): string {
  if (error instanceof ValidationError) return error.code;
  if (error instanceof ZodError) return 'VALIDATION_ERROR';
  if ('code' in error && typeof error.code === 'string') {
    if (error.code.startsWith('FST_ERR_VALIDATION')) return 'VALIDATION_ERROR';
    if (error.code === 'FST_ERR_CTP_BODY_TOO_LARGE') return 'PAYLOAD_TOO_LARGE';
    if (error.code === 'FST_ERR_CTP_INVALID_JSON_BODY' || error.code === 'FST_ERR_CTP_EMPTY_JSON_BODY') {
      return 'BAD_REQUEST';
    }
    return error.code;
  }
  return 'INTERNAL_ERROR';
}

function deriveStatus(error: Error, code: string): number {
  if (error instanceof ValidationError) return error.statusCode;
  if ('statusCode' in error && typeof error.statusCode === 'number' && error.statusCode >= 400) {
    return error.statusCode;
  }
  return STATUS_MAP[code] ?? 500;
}

function describe(error: Error): string {
  if (error instanceof ZodError) {
    return error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`).join('; ');
  }
  return error.message || 'An unexpected error occurred';
}

/**
 * Structured JSON error handler shared by the engine's control API.
 */
export function createErrorHandler(logger: Logger, context: string) {
  return function errorHandler(error: FastifyError | Error, request: FastifyRequest, reply: FastifyReply): void {
    const code = deriveErrorCode(error);
    const statusCode = deriveStatus(error, code);
    const response: ErrorResponse = { error: { code, message: describe(error) } };

    if (statusCode >= 500) {
      logger.error(context, `${request.method} ${request.url} failed: ${error.message}`);
    } else {
      logger.debug(context, `${request.method} ${request.url} rejected (${statusCode} ${code})`);
    }
    reply.status(statusCode).send(response);
  };
}

/** Plain-text variant for endpoints whose callers expect text bodies. */
export function createTextErrorHandler(logger: Logger, context: string) {
  return function errorHandler(error: FastifyError | Error, request: FastifyRequest, reply: FastifyReply): void {
    const code = deriveErrorCode(error);
    const statusCode = deriveStatus(error, code);
    if (statusCode >= 500) {
      logger.error(context, `${request.method} ${request.url} failed: ${error.message}`);
    }
    reply.status(statusCode).type('text/plain; charset=utf-8').send(describe(error));
  };
}
