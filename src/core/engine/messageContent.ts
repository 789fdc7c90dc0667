import type { MediaKind, MediaTicket } from '../envelope/Envelope.js';
import type { MediaPayload, MessageContent } from '../../adapter/gateway/protocolEvents.js';

const present = (s: string | undefined): string | undefined => (s ? s : undefined);

/** Extended text, then plain conversation, then image caption, then video caption. */
export function inboundText(m: MessageContent | undefined): string {
  if (!m) return '';
  return (
    present(m.extended_text?.text) ??
    present(m.conversation) ??
    present(m.image?.caption) ??
    present(m.video?.caption) ??
    ''
  );
}

/** Copies of our own messages carry no captions worth surfacing as text. */
export function outboundText(m: MessageContent | undefined): string {
  if (!m) return '';
  return present(m.extended_text?.text) ?? present(m.conversation) ?? '';
}

export function mediaTicketOf(m: MessageContent | undefined): MediaTicket | undefined {
  if (!m) return undefined;
  const candidates: Array<[MediaKind, MediaPayload | undefined]> = [
    ['image', m.image],
    ['audio', m.audio],
    ['video', m.video],
    ['document', m.document],
  ];
  for (const [kind, payload] of candidates) {
    if (payload) return ticketFrom(kind, payload);
  }
  return undefined;
}

function ticketFrom(kind: MediaKind, p: MediaPayload): MediaTicket {
  const ticket: MediaTicket = {
    type: kind,
    mimetype: p.mimetype,
    url: p.url,
    direct_path: p.direct_path,
    media_key: p.media_key,
    file_hash: p.file_hash,
    encrypted_file_hash: p.encrypted_file_hash,
    file_length: p.file_length,
  };
  if (kind === 'audio') ticket.seconds = p.seconds;
  if (kind === 'document') ticket.title = p.title;
  return ticket;
}

/** Unix seconds or RFC3339; anything else falls back to `fallback`. */
export function eventTime(value: number | string | undefined, fallback: Date): Date {
  if (typeof value === 'number' && Number.isFinite(value) && value > 0) return new Date(value * 1000);
  if (typeof value === 'string') {
    const ms = Date.parse(value);
    if (!Number.isNaN(ms)) return new Date(ms);
  }
  return fallback;
}
