import { z } from 'zod';

/**
 * Canonical, platform-agnostic record of one protocol event.
 * Every engine side effect (sink, webhook, history) and the ingestion server
 * work on this shape. Field names follow the JSON wire format.
 */
export type Direction = 'in' | 'out';

export type MediaKind = 'image' | 'audio' | 'video' | 'document';

/** Enough metadata and credentials to fetch the media later without the live event. */
export interface MediaTicket {
  direction?: Direction;
  chat_id?: string;
  sender_id?: string;
  message_id?: string;
  type: MediaKind;
  mimetype?: string;
  title?: string;
  url?: string;
  caption?: string;
  at?: string;
  direct_path?: string;
  media_key?: string;
  file_hash?: string;
  encrypted_file_hash?: string;
  file_length?: number;
  seconds?: number;
}

export type EnvelopeEventType =
  | 'message'
  | 'receipt'
  | 'chat_presence'
  | 'presence'
  | 'group_update'
  | 'joined_group'
  | 'history_sync'
  | 'connected'
  | 'logged_out'
  | 'identity_change'
  | (string & {});

export interface Envelope {
  event_type: EnvelopeEventType;
  direction?: Direction;
  chat_id?: string;
  sender_id?: string;
  chat_name?: string;
  /** Set for every event type except receipts. */
  message_id?: string;
  /** Receipts only. */
  message_ids?: string[];
  receipt_type?: string;
  text?: string;
  media?: MediaTicket;
  extra?: Record<string, unknown>;
  /** RFC3339, assigned when the envelope is serialized. */
  at?: string;
}

/** Event types whose envelopes describe the host device rather than a chat. */
export const DEVICE_EVENT_TYPES: ReadonlySet<string> = new Set([
  'connected',
  'logged_out',
  'history_sync',
  'offline_sync_completed',
  'identity_change',
]);

const MediaKindSchema = z.enum(['image', 'audio', 'video', 'document']);

export const MediaTicketSchema = z.object({
  direction: z.enum(['in', 'out']).optional(),
  chat_id: z.string().optional(),
  sender_id: z.string().optional(),
  message_id: z.string().optional(),
  type: MediaKindSchema,
  mimetype: z.string().optional(),
  title: z.string().optional(),
  url: z.string().optional(),
  caption: z.string().optional(),
  at: z.string().optional(),
  direct_path: z.string().optional(),
  media_key: z.string().optional(),
  file_hash: z.string().optional(),
  encrypted_file_hash: z.string().optional(),
  file_length: z.number().nonnegative().optional(),
  seconds: z.number().nonnegative().optional(),
});

/**
 * Wire schema used at the ingestion boundary. Blank direction strings are
 * accepted and dropped because non-message events may carry them.
 */
export const EnvelopeSchema = z.object({
  event_type: z.string().min(1),
  direction: z
    .string()
    .optional()
    .transform((v): Direction | undefined => {
      const d = v?.trim().toLowerCase();
      return d === 'in' || d === 'out' ? d : undefined;
    }),
  chat_id: z.string().optional(),
  sender_id: z.string().optional(),
  chat_name: z.string().optional(),
  message_id: z.string().optional(),
  message_ids: z.array(z.string()).optional(),
  receipt_type: z.string().optional(),
  text: z.string().optional(),
  media: MediaTicketSchema.nullish().transform((m) => m ?? undefined),
  extra: z
    .record(z.unknown())
    .nullish()
    .transform((e) => e ?? undefined),
  at: z.string().optional(),
});

/**
 * Serialize an envelope for the sink and the webhook. `at` is stamped here,
 * not when the event was captured; configured extra params fill an absent
 * `extra`. The input is not mutated.
 */
export function serializeEnvelope(
  env: Envelope,
  options: { now?: Date; extraParams?: Record<string, unknown> } = {},
): { envelope: Envelope; bytes: Buffer } {
  const stamped: Envelope = { ...env, at: (options.now ?? new Date()).toISOString() };
  if (stamped.extra === undefined && options.extraParams && Object.keys(options.extraParams).length > 0) {
    stamped.extra = options.extraParams;
  }
  return { envelope: stamped, bytes: Buffer.from(JSON.stringify(stamped), 'utf-8') };
}
