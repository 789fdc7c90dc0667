import type { Envelope } from '../envelope/Envelope.js';

export interface EnvelopeFilter {
  readonly name: string;
  pass(env: Envelope): boolean;
}

export const notOutbound: EnvelopeFilter = {
  name: 'not-outbound',
  pass: (env) => env.direction !== 'out',
};

export const senderRequired: EnvelopeFilter = {
  name: 'sender-required',
  pass: (env) => Boolean(env.sender_id?.trim()),
};

export const DEFAULT_FILTERS: readonly EnvelopeFilter[] = [notOutbound, senderRequired];

/** Name of the first filter that rejects `env`, or null when all pass. */
export function firstRejection(filters: readonly EnvelopeFilter[], env: Envelope): string | null {
  for (const filter of filters) {
    if (!filter.pass(env)) return filter.name;
  }
  return null;
}
