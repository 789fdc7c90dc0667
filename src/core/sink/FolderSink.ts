/**
 * FolderSink: append-only NDJSON record of every envelope.
 *
 * Layout: <base>/<category>/<key>.ndjson, one JSON object per line.
 * - groups:   one file per group
 * - contacts: one file per contact; status updates land in the author's file
 * - devices:  host lifecycle events without a chat
 * - system:   anything else, one file per event type
 *
 * With a positive byte ceiling a full file is continued in <file>.part1,
 * <file>.part2, ... Parts are never rewritten.
 */

import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { DEVICE_EVENT_TYPES, type Envelope } from '../envelope/Envelope.js';
import { STATUS_BROADCAST, isGroupChat, sanitizePathPart } from '../envelope/chatId.js';
import { PerKeyLock } from '../util/async.js';

export type SinkCategory = 'contacts' | 'groups' | 'devices' | 'system';

export interface SinkTarget {
  category: SinkCategory;
  fileName: string;
}

const MAX_PARTS = 1000;

export function hostId(): string {
  return sanitizePathPart(os.hostname());
}

export function sinkTargetFor(env: Envelope, host: string = hostId()): SinkTarget {
  const chat = env.chat_id ?? '';
  if (isGroupChat(chat)) {
    return { category: 'groups', fileName: `${sanitizePathPart(chat)}.ndjson` };
  }
  if (chat === STATUS_BROADCAST && env.sender_id) {
    return { category: 'contacts', fileName: `${sanitizePathPart(env.sender_id)}.ndjson` };
  }
  if (chat) {
    return { category: 'contacts', fileName: `${sanitizePathPart(chat)}.ndjson` };
  }
  if (DEVICE_EVENT_TYPES.has(env.event_type)) {
    return { category: 'devices', fileName: `${host}.ndjson` };
  }
  return { category: 'system', fileName: `${sanitizePathPart(env.event_type)}.ndjson` };
}

export interface FolderSinkOptions {
  baseDir: string;
  /** Byte ceiling per file; <= 0 disables rotation. */
  maxBytes?: number;
  host?: string;
}

export class FolderSink {
  private readonly baseDir: string;
  private readonly maxBytes: number;
  private readonly host: string;
  private readonly locks = new PerKeyLock<string>();
  /** Part currently written per base path; 0 is the base file. */
  private readonly currentPart = new Map<string, number>();

  constructor(options: FolderSinkOptions) {
    this.baseDir = options.baseDir || 'outbox';
    this.maxBytes = options.maxBytes ?? 0;
    this.host = options.host ?? hostId();
  }

  /** Base path of the file an envelope is recorded in (before rotation). */
  pathFor(env: Envelope): string {
    const { category, fileName } = sinkTargetFor(env, this.host);
    return path.join(this.baseDir, category, fileName);
  }

  /**
   * Append one serialized envelope plus a newline. Returns the file written.
   */
  async append(env: Envelope, payload: Buffer): Promise<string> {
    const basePath = this.pathFor(env);
    return this.locks.runExclusive(basePath, async () => {
      await fs.mkdir(path.dirname(basePath), { recursive: true });
      const target = await this.resolveTarget(basePath, payload.length + 1);
      await fs.appendFile(target, Buffer.concat([payload, Buffer.from('\n')]));
      return target;
    });
  }

  /** Only moves forward: once a file is full, earlier files are never written again. */
  private async resolveTarget(basePath: string, incoming: number): Promise<string> {
    if (this.maxBytes <= 0) return basePath;
    let part = this.currentPart.get(basePath) ?? (await lastExistingPart(basePath));
    const size = await fileSize(partPath(basePath, part));
    if (size !== null && size > 0 && size + incoming > this.maxBytes) {
      part++;
      while (part < MAX_PARTS && (await fileSize(partPath(basePath, part))) !== null) part++;
    }
    if (part >= MAX_PARTS) throw new Error(`sink rotation exhausted for ${basePath}`);
    this.currentPart.set(basePath, part);
    return partPath(basePath, part);
  }

  drain(): Promise<void> {
    return this.locks.drain();
  }
}

function partPath(basePath: string, part: number): string {
  return part === 0 ? basePath : `${basePath}.part${part}`;
}

async function lastExistingPart(basePath: string): Promise<number> {
  let part = 0;
  while (part + 1 < MAX_PARTS && (await fileSize(partPath(basePath, part + 1))) !== null) part++;
  return part;
}

async function fileSize(p: string): Promise<number | null> {
  try {
    const st = await fs.stat(p);
    return st.size;
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
