/**
 * Error taxonomy shared by the engine and the ingestion server.
 *
 * Transport errors are retried and then dropped; validation errors map to a
 * 4xx response and are never retried.
 */

export class TransportError extends Error {
  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = 'TransportError';
  }
}

export type GatewayErrorCode = 'GATEWAY_UNAVAILABLE' | 'GATEWAY_TIMEOUT' | 'ACTION_FAILED';

export class GatewayError extends TransportError {
  constructor(
    readonly code: GatewayErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'GatewayError';
  }
}

export class ValidationError extends Error {
  constructor(
    readonly code: string,
    message: string,
    readonly statusCode: number = 400,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class UnsupportedError extends Error {
  constructor(capability: string) {
    super(`unsupported capability: ${capability}`);
    this.name = 'UnsupportedError';
  }
}

export function abortError(signal: AbortSignal): Error {
  if (signal.reason instanceof Error) return signal.reason;
  const err = new Error(typeof signal.reason === 'string' ? signal.reason : 'aborted');
  err.name = 'AbortError';
  return err;
}
