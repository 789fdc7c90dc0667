import { z } from 'zod';

/**
 * Raw events pushed by the protocol gateway, one JSON frame each.
 * We accept whatever decodes: a field with the wrong shape is dropped
 * instead of failing the whole event.
 */

function lenient<T extends z.ZodTypeAny>(schema: T) {
  return schema.optional().catch(undefined);
}

const str = () => lenient(z.string());

const MediaPayloadSchema = z.object({
  mimetype: str(),
  url: str(),
  direct_path: str(),
  /** base64 */
  media_key: str(),
  file_hash: str(),
  encrypted_file_hash: str(),
  file_length: lenient(z.number().nonnegative()),
  caption: str(),
  seconds: lenient(z.number().nonnegative()),
  title: str(),
});

export type MediaPayload = z.infer<typeof MediaPayloadSchema>;

const MessageContentSchema = z.object({
  conversation: str(),
  extended_text: lenient(z.object({ text: str() })),
  image: lenient(MediaPayloadSchema),
  audio: lenient(MediaPayloadSchema),
  video: lenient(MediaPayloadSchema),
  document: lenient(MediaPayloadSchema),
});

export type MessageContent = z.infer<typeof MessageContentSchema>;

const MessageEventSchema = z.object({
  type: z.literal('message'),
  info: z
    .object({
      id: str(),
      chat: str(),
      sender: str(),
      is_from_me: lenient(z.boolean()),
      push_name: str(),
      /** Unix seconds or RFC3339 */
      timestamp: lenient(z.union([z.number(), z.string()])),
    })
    .catch({}),
  message: lenient(MessageContentSchema),
  conversation: lenient(z.object({ display_name: str(), name: str() })),
});

const ReceiptEventSchema = z.object({
  type: z.literal('receipt'),
  chat: str(),
  sender: str(),
  message_ids: z.array(z.string()).catch([]),
  receipt_type: str(),
});

const ChatPresenceEventSchema = z.object({
  type: z.literal('chat_presence'),
  chat: str(),
  sender: str(),
  state: str(),
  media: str(),
});

const PresenceEventSchema = z.object({
  type: z.literal('presence'),
  from: str(),
  unavailable: lenient(z.boolean()),
  last_seen: str(),
});

const GroupInfoEventSchema = z.object({
  type: z.literal('group_info'),
  jid: str(),
  name: str(),
});

const JoinedGroupEventSchema = z.object({
  type: z.literal('joined_group'),
  jid: str(),
  name: str(),
});

const HistorySyncEventSchema = z.object({
  type: z.literal('history_sync'),
  conversations: lenient(z.number().int().nonnegative()),
});

const ConnectedEventSchema = z.object({ type: z.literal('connected') });
const LoggedOutEventSchema = z.object({ type: z.literal('logged_out'), reason: str() });

const IdentityChangeEventSchema = z.object({
  type: z.literal('identity_change'),
  jid: str(),
});

export type MessageEvent = z.infer<typeof MessageEventSchema>;
export type ReceiptEvent = z.infer<typeof ReceiptEventSchema>;
export type ChatPresenceEvent = z.infer<typeof ChatPresenceEventSchema>;
export type PresenceEvent = z.infer<typeof PresenceEventSchema>;
export type GroupInfoEvent = z.infer<typeof GroupInfoEventSchema>;
export type JoinedGroupEvent = z.infer<typeof JoinedGroupEventSchema>;
export type HistorySyncEvent = z.infer<typeof HistorySyncEventSchema>;
export type ConnectedEvent = z.infer<typeof ConnectedEventSchema>;
export type LoggedOutEvent = z.infer<typeof LoggedOutEventSchema>;
export type IdentityChangeEvent = z.infer<typeof IdentityChangeEventSchema>;

export interface UnknownEvent {
  type: 'unknown';
  /** The gateway's type name, or '' when the frame had none. */
  original_type: string;
}

export type ProtocolEvent =
  | MessageEvent
  | ReceiptEvent
  | ChatPresenceEvent
  | PresenceEvent
  | GroupInfoEvent
  | JoinedGroupEvent
  | HistorySyncEvent
  | ConnectedEvent
  | LoggedOutEvent
  | IdentityChangeEvent
  | UnknownEvent;

const ProtocolEventSchema = z.discriminatedUnion('type', [
  MessageEventSchema,
  ReceiptEventSchema,
  ChatPresenceEventSchema,
  PresenceEventSchema,
  GroupInfoEventSchema,
  JoinedGroupEventSchema,
  HistorySyncEventSchema,
  ConnectedEventSchema,
  LoggedOutEventSchema,
  IdentityChangeEventSchema,
]);

const FrameTypeSchema = z.object({ type: z.string() });

export function parseProtocolEvent(raw: unknown): ProtocolEvent {
  const parsed = ProtocolEventSchema.safeParse(raw);
  if (parsed.success) return parsed.data;
  const frame = FrameTypeSchema.safeParse(raw);
  return { type: 'unknown', original_type: frame.success ? frame.data.type : '' };
}

/** Identity-change events may or may not name the affected chat. */
export function identityChangeJid(event: IdentityChangeEvent): string | undefined {
  return event.jid?.trim() || undefined;
}
