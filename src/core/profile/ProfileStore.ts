/**
 * ProfileStore: per-conversation profile with engagement metrics.
 *
 * Profiles are keyed by canonical chat id, created on first use (or
 * rehydrated from their snapshot) and never deleted. Every mutation writes
 * <base>/profiles/<chat>.json through a temp file and a rename; writes for one
 * chat land in mutation order. The in-memory profile stays authoritative when
 * a write fails.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { MediaTicketSchema, type Direction, type Envelope, type MediaTicket } from '../envelope/Envelope.js';
import { canonicalChatId, isGroupChat, sanitizePathPart } from '../envelope/chatId.js';
import { PerKeyLock } from '../util/async.js';
import type { Logger } from '../../infra/logger/logger.js';
import { formatErrorMessage } from '../../infra/logger/logger.js';

const ProfileSchema = z.object({
  chat_id: z.string(),
  name: z.string().optional(),
  language: z.string().default('es'),
  tier: z.string().default('free'),
  tags: z.record(z.string()).default({}),
  first_seen: z.string(),
  last_connection: z.string(),
  last_chat: z.string().default(''),
  last_text: z.string().default(''),
  media: z
    .object({
      in: z.array(MediaTicketSchema).default([]),
      out: z.array(MediaTicketSchema).default([]),
    })
    .default({}),
  block: z
    .object({
      spam: z.boolean().default(false),
      malicious: z.boolean().default(false),
      permanent: z.boolean().default(false),
      until: z.string().optional(),
    })
    .default({}),
  metrics: z
    .object({
      msg_in: z.number().int().nonnegative().default(0),
      msg_out: z.number().int().nonnegative().default(0),
      last_msg_at: z.string().optional(),
      last_msg_id: z.string().optional(),
      streak_days: z.number().int().nonnegative().default(0),
      streak_last_day: z.string().default(''),
    })
    .default({}),
});

export type Profile = z.infer<typeof ProfileSchema>;

export interface ProfileStoreOptions {
  /** Outbox base; snapshots go to <baseDir>/profiles. */
  baseDir: string;
  /** Media entries kept per direction. */
  mediaCap?: number;
  now?: () => Date;
}

/** Local calendar day, YYYY-MM-DD. */
export function localDay(d: Date): string {
  const y = d.getFullYear();
  const m = String(d.getMonth() + 1).padStart(2, '0');
  const day = String(d.getDate()).padStart(2, '0');
  return `${y}-${m}-${day}`;
}

export function nextStreak(
  current: { streak_days: number; streak_last_day: string },
  now: Date,
): { streak_days: number; streak_last_day: string } {
  const today = localDay(now);
  if (current.streak_last_day === today) return { ...current };
  const yesterday = localDay(new Date(now.getFullYear(), now.getMonth(), now.getDate() - 1));
  const days = current.streak_last_day === yesterday ? current.streak_days + 1 : 1;
  return { streak_days: days, streak_last_day: today };
}

function keepLast<T>(items: T[], n: number): T[] {
  return n > 0 && items.length > n ? items.slice(items.length - n) : items;
}

export class ProfileStore {
  private readonly profiles = new Map<string, Profile>();
  private readonly stateLock = new PerKeyLock<string>();
  private readonly writeLock = new PerKeyLock<string>();
  private readonly mediaCap: number;
  private readonly now: () => Date;

  constructor(
    private readonly options: ProfileStoreOptions,
    private readonly logger: Logger,
  ) {
    this.mediaCap = options.mediaCap ?? 200;
    this.now = options.now ?? (() => new Date());
  }

  get profilesDir(): string {
    return path.join(this.options.baseDir, 'profiles');
  }

  snapshotPath(chatId: string): string {
    return path.join(this.profilesDir, `${sanitizePathPart(chatId)}.json`);
  }

  contactSinkPath(chatId: string): string {
    return path.join(this.options.baseDir, 'contacts', `${sanitizePathPart(chatId)}.ndjson`);
  }

  groupSinkPath(chatId: string): string {
    return path.join(this.options.baseDir, 'groups', `${sanitizePathPart(chatId)}.ndjson`);
  }

  /** Inbound message bookkeeping. Keyed by chat, falling back to sender. */
  async touchInbound(env: Envelope): Promise<Profile | null> {
    const key = canonicalChatId(env.chat_id) || canonicalChatId(env.sender_id);
    return this.mutate(key, (p, now) => {
      const at = now.toISOString();
      p.last_connection = at;
      p.last_chat = key;
      p.last_text = env.text ?? '';
      if (env.chat_name) p.name = env.chat_name;
      p.metrics.msg_in += 1;
      p.metrics.last_msg_at = at;
      p.metrics.last_msg_id = env.message_id;
      Object.assign(p.metrics, nextStreak(p.metrics, now));

      if (isGroupChat(key)) {
        p.tags[`out.group.${key}`] = this.groupSinkPath(key);
      } else {
        p.tags['out.contacts_ndjson'] = this.contactSinkPath(key);
      }
    });
  }

  async incOutbound(chatId: string): Promise<Profile | null> {
    return this.mutate(canonicalChatId(chatId), (p, now) => {
      p.metrics.msg_out += 1;
      p.metrics.last_msg_at = now.toISOString();
    });
  }

  /** Adds the envelope's media ticket to the matching direction list. */
  async appendMedia(chatId: string, env: Envelope): Promise<Profile | null> {
    const media = env.media;
    if (!media) return null;
    const key = canonicalChatId(chatId);
    const direction: Direction = env.direction === 'out' ? 'out' : 'in';

    return this.mutate(key, (p, now) => {
      const entry: MediaTicket = {
        ...media,
        direction,
        chat_id: key,
        sender_id: env.sender_id ?? media.sender_id,
        message_id: env.message_id ?? media.message_id,
        caption: env.text?.trim() || media.caption,
        at: media.at ?? env.at ?? now.toISOString(),
      };
      p.media[direction] = keepLast([...p.media[direction], entry], this.mediaCap);
    });
  }

  get(chatId: string): Profile | undefined {
    const p = this.profiles.get(canonicalChatId(chatId));
    return p ? structuredClone(p) : undefined;
  }

  list(): Profile[] {
    return [...this.profiles.values()].map((p) => structuredClone(p));
  }

  /** Waits for queued snapshot writes. */
  async flush(): Promise<void> {
    await this.stateLock.drain();
    await this.writeLock.drain();
  }

  private async mutate(key: string, apply: (profile: Profile, now: Date) => void): Promise<Profile | null> {
    if (!key) return null;

    let written: Promise<void> = Promise.resolve();
    const snapshot = await this.stateLock.runExclusive(key, async () => {
      const profile = await this.loadOrCreate(key);
      apply(profile, this.now());
      const copy = structuredClone(profile);
      // queued while still holding the state lock so writes keep mutation order
      written = this.writeLock.runExclusive(key, () => this.persist(key, copy));
      return copy;
    });
    await written;
    return snapshot;
  }

  private async loadOrCreate(key: string): Promise<Profile> {
    const resident = this.profiles.get(key);
    if (resident) return resident;

    const profile = (await this.rehydrate(key)) ?? this.fresh(key);
    this.profiles.set(key, profile);
    return profile;
  }

  private fresh(key: string): Profile {
    const at = this.now().toISOString();
    return ProfileSchema.parse({ chat_id: key, first_seen: at, last_connection: at });
  }

  private async rehydrate(key: string): Promise<Profile | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.snapshotPath(key), 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
      this.logger.warn('Profiles', `Failed to read snapshot for ${key}: ${formatErrorMessage(err)}`);
      return null;
    }
    try {
      const parsed = ProfileSchema.safeParse(JSON.parse(raw));
      if (parsed.success) return { ...parsed.data, chat_id: key };
      this.logger.warn('Profiles', `Ignoring invalid snapshot for ${key}: ${parsed.error.message}`);
    } catch (err) {
      this.logger.warn('Profiles', `Ignoring unreadable snapshot for ${key}: ${formatErrorMessage(err)}`);
    }
    return null;
  }

  private async persist(key: string, profile: Profile): Promise<void> {
    const target = this.snapshotPath(key);
    const tmp = `${target}.tmp`;
    try {
      await fs.mkdir(this.profilesDir, { recursive: true });
      await fs.writeFile(tmp, JSON.stringify(profile, null, 2), 'utf-8');
      await fs.rename(tmp, target);
    } catch (err) {
      this.logger.error('Profiles', `Failed to persist profile ${key}: ${formatErrorMessage(err)}`);
    }
  }
}
