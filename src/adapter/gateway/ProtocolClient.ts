import type { MediaKind, MediaTicket } from '../../core/envelope/Envelope.js';
import type { ProtocolEvent } from './protocolEvents.js';

/** What the gateway returns for an uploaded blob; enough to reference it in a message. */
export interface UploadedMedia {
  url: string;
  direct_path: string;
  media_key: string;
  file_hash: string;
  encrypted_file_hash: string;
  file_length: number;
}

export interface OutgoingMedia {
  kind: MediaKind;
  mimetype: string;
  upload: UploadedMedia;
  caption?: string;
  file_name?: string;
  seconds?: number;
  /** Audio sent as a voice note. */
  ptt?: boolean;
  /** base64 amplitude points, voice notes only */
  waveform?: string;
}

export type OutgoingMessage = { text: string } | { media: OutgoingMedia };

export type ChatPresenceState = 'composing' | 'paused';
export type ChatPresenceMedia = 'text' | 'audio';
export type ReceiptType = 'read' | 'played';

/**
 * The protocol session as the engine sees it. Implemented over the reverse
 * WebSocket by GatewayServer; tests use an in-memory fake.
 */
export interface ProtocolClient {
  onEvent(listener: (event: ProtocolEvent) => void): () => void;
  sendMessage(to: string, message: OutgoingMessage, signal?: AbortSignal): Promise<{ id: string }>;
  uploadMedia(bytes: Buffer, kind: MediaKind, signal?: AbortSignal): Promise<UploadedMedia>;
  sendChatPresence(
    chat: string,
    state: ChatPresenceState,
    media: ChatPresenceMedia,
    signal?: AbortSignal,
  ): Promise<void>;
  sendPresence(state: 'available' | 'unavailable', signal?: AbortSignal): Promise<void>;
  markRead(
    chat: string,
    ids: string[],
    sender: string | undefined,
    receiptType: ReceiptType,
    signal?: AbortSignal,
  ): Promise<void>;
  downloadMedia(ticket: MediaTicket, signal?: AbortSignal): Promise<Buffer>;
}
