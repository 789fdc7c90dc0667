/**
 * HistoryStore: message history per canonical chat, one JSONL file per chat.
 *
 * Rows are only appended. A later row with the same id replaces the earlier
 * one when reading, and a trailing partial line (crash mid-write) is skipped.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { canonicalChatId, sanitizePathPart } from '../envelope/chatId.js';
import type { Logger } from '../../infra/logger/logger.js';
import { formatErrorMessage } from '../../infra/logger/logger.js';

const HistoryRowSchema = z.object({
  id: z.string(),
  chat_id: z.string(),
  sender: z.string(),
  content: z.string(),
  timestamp: z.string(),
  is_from_me: z.boolean(),
  media_type: z.string().optional(),
  filename: z.string().optional(),
  url: z.string().optional(),
});

export type HistoryRow = z.infer<typeof HistoryRowSchema>;

export interface MessageHistory {
  save(row: HistoryRow): Promise<void>;
  recent(chatId: string, limit: number): Promise<HistoryRow[]>;
}

export class HistoryStore implements MessageHistory {
  constructor(
    private readonly dir: string,
    private readonly logger: Logger,
  ) {}

  /** Creates the store directory. Failing here is fatal for the engine. */
  async initialize(): Promise<void> {
    this.logger.info('History', `Initializing history store at ${this.dir}`);
    await fs.mkdir(this.dir, { recursive: true });
  }

  private fileFor(chatId: string): string {
    return path.join(this.dir, `${sanitizePathPart(canonicalChatId(chatId))}.jsonl`);
  }

  async save(row: HistoryRow): Promise<void> {
    const stored: HistoryRow = { ...row, chat_id: canonicalChatId(row.chat_id) };
    await fs.appendFile(this.fileFor(stored.chat_id), `${JSON.stringify(stored)}\n`, 'utf-8');
  }

  /** Newest first. */
  async recent(chatId: string, limit: number): Promise<HistoryRow[]> {
    let content: string;
    try {
      content = await fs.readFile(this.fileFor(chatId), 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
      throw err;
    }

    const byId = new Map<string, HistoryRow>();
    for (const line of content.split('\n')) {
      if (!line.trim()) continue;
      const row = parseRow(line);
      if (!row) {
        this.logger.debug('History', `Skipping unreadable row in ${chatId}`);
        continue;
      }
      byId.delete(row.id);
      byId.set(row.id, row);
    }

    return [...byId.values()]
      .sort((a, b) => Date.parse(b.timestamp) - Date.parse(a.timestamp))
      .slice(0, Math.max(0, limit));
  }
}

function parseRow(line: string): HistoryRow | null {
  try {
    const parsed = HistoryRowSchema.safeParse(JSON.parse(line));
    return parsed.success ? parsed.data : null;
  } catch (err) {
    if (err instanceof SyntaxError) return null;
    throw new Error(`history row: ${formatErrorMessage(err)}`);
  }
}
