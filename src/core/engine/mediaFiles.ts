import path from 'node:path';
import type { MediaKind } from '../envelope/Envelope.js';

const EXTENSIONS: Record<string, { kind: MediaKind; mimetype: string }> = {
  '.jpg': { kind: 'image', mimetype: 'image/jpeg' },
  '.jpeg': { kind: 'image', mimetype: 'image/jpeg' },
  '.png': { kind: 'image', mimetype: 'image/png' },
  '.webp': { kind: 'image', mimetype: 'image/webp' },
  '.gif': { kind: 'image', mimetype: 'image/gif' },
  '.mp4': { kind: 'video', mimetype: 'video/mp4' },
  '.mov': { kind: 'video', mimetype: 'video/quicktime' },
  '.m4v': { kind: 'video', mimetype: 'video/x-m4v' },
  '.webm': { kind: 'video', mimetype: 'video/webm' },
  '.ogg': { kind: 'audio', mimetype: 'audio/ogg' },
  '.opus': { kind: 'audio', mimetype: 'audio/ogg; codecs=opus' },
  '.mp3': { kind: 'audio', mimetype: 'audio/mpeg' },
  '.m4a': { kind: 'audio', mimetype: 'audio/mp4' },
  '.wav': { kind: 'audio', mimetype: 'audio/wav' },
  '.pdf': { kind: 'document', mimetype: 'application/pdf' },
  '.txt': { kind: 'document', mimetype: 'text/plain' },
};

/** Media kind and mimetype from a file name; unknown extensions are documents. */
export function classifyMediaFile(fileName: string): { kind: MediaKind; mimetype: string } {
  const known = EXTENSIONS[path.extname(fileName).toLowerCase()];
  return known ?? { kind: 'document', mimetype: 'application/octet-stream' };
}

export function kindFromMimetype(mimetype: string): MediaKind {
  const m = mimetype.toLowerCase();
  if (m.startsWith('image/')) return 'image';
  if (m.startsWith('video/')) return 'video';
  if (m.startsWith('audio/')) return 'audio';
  return 'document';
}
