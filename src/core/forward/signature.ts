import { createHmac, timingSafeEqual } from 'node:crypto';

export const SIGNATURE_HEADER = 'X-Relay-Signature';
export const TIMESTAMP_HEADER = 'X-Relay-Timestamp';

const PREFIX = 'sha256=';

/** `sha256=<hex hmac>` over the exact body bytes; '' without a secret. */
export function signBody(secret: string | undefined, body: Buffer | string): string {
  if (!secret) return '';
  return PREFIX + createHmac('sha256', secret).update(body).digest('hex');
}

export function verifySignature(
  secret: string | undefined,
  body: Buffer | string,
  header: string | undefined,
): boolean {
  if (!secret) return false;
  const sig = (header ?? '').trim();
  if (!sig.startsWith(PREFIX)) return false;

  const got = Buffer.from(sig.slice(PREFIX.length), 'utf-8');
  const expected = Buffer.from(signBody(secret, body).slice(PREFIX.length), 'utf-8');
  if (got.length !== expected.length) return false;
  return timingSafeEqual(got, expected);
}

/** RFC3339 at second precision, UTC. */
export function formatTimestamp(d: Date = new Date()): string {
  return d.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export type TimestampCheck = { ok: true } | { ok: false; reason: string };

/**
 * Accepts Unix seconds or RFC3339. The absolute distance to `now` must not
 * exceed `skewMs`.
 */
export function verifyTimestamp(
  header: string | undefined,
  skewMs: number,
  now: number = Date.now(),
): TimestampCheck {
  const raw = (header ?? '').trim();
  if (!raw) return { ok: false, reason: 'missing timestamp' };

  let at: number;
  if (/^-?\d+$/.test(raw)) {
    at = Number(raw) * 1000;
  } else if (/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?(Z|[+-]\d{2}:\d{2})$/i.test(raw)) {
    at = Date.parse(raw);
  } else {
    return { ok: false, reason: 'bad timestamp format' };
  }
  if (Number.isNaN(at)) return { ok: false, reason: 'bad timestamp format' };
  if (Math.abs(now - at) > skewMs) return { ok: false, reason: 'timestamp skew too large' };
  return { ok: true };
}
