/**
 * @file AggregationWindow - coalesces a burst of activity in one chat into a single flush
 *
 * Strategy:
 * - A message for a chat without an open window starts one (count 1)
 * - Each further message resets the deadline and increments the count
 * - A typing signal resets the deadline of an open window without counting;
 *   with no open window it does nothing
 * - When the deadline passes the window is cleared and flushed exactly once
 */
import type { Logger } from '../../infra/logger/logger.js';
import { formatErrorMessage } from '../../infra/logger/logger.js';
import { PerKeyLock } from '../util/async.js';

export type ResetReason = 'start' | 'message' | 'typing';

export type FlushHandler = (chat: string, count: number) => Promise<void>;
export type ResetHandler = (chat: string, reason: ResetReason, count: number, windowMs: number) => void;

interface OpenWindow {
  count: number;
  deadline: number;
  timerId: NodeJS.Timeout;
}

export interface AggregationWindowOptions {
  windowMs: number;
  onFlush: FlushHandler;
  onReset?: ResetHandler;
}

export class AggregationWindow {
  private readonly open = new Map<string, OpenWindow>();
  private readonly flushLock = new PerKeyLock<string>();
  private readonly flushing = new Set<Promise<void>>();
  private readonly windowMs: number;
  private readonly onFlush: FlushHandler;
  private readonly onReset: ResetHandler | undefined;

  constructor(
    private readonly logger: Logger,
    options: AggregationWindowOptions,
  ) {
    this.windowMs = options.windowMs > 0 ? options.windowMs : 3000;
    this.onFlush = options.onFlush;
    this.onReset = options.onReset;
  }

  /** Counts one message for `chat`, starting or extending its window. */
  add(chat: string): void {
    if (!chat) return;
    const current = this.open.get(chat);
    if (current) {
      clearTimeout(current.timerId);
      const count = current.count + 1;
      this.open.set(chat, this.schedule(chat, count));
      this.report(chat, 'message', count);
      return;
    }
    this.open.set(chat, this.schedule(chat, 1));
    this.report(chat, 'start', 1);
  }

  /**
   * Extends an open window without counting.
   * @returns false when `chat` had no open window
   */
  touch(chat: string): boolean {
    const current = this.open.get(chat);
    if (!current) return false;
    clearTimeout(current.timerId);
    this.open.set(chat, this.schedule(chat, current.count));
    this.report(chat, 'typing', current.count);
    return true;
  }

  private schedule(chat: string, count: number): OpenWindow {
    const window: OpenWindow = {
      count,
      deadline: Date.now() + this.windowMs,
      timerId: setTimeout(() => this.fire(chat, window), this.windowMs),
    };
    return window;
  }

  private report(chat: string, reason: ResetReason, count: number): void {
    this.logger.debug('aggregation', `window ${reason}: chat=${chat} count=${count} windowMs=${this.windowMs}`);
    this.onReset?.(chat, reason, count, this.windowMs);
  }

  private fire(chat: string, window: OpenWindow): void {
    // a stale timer must not flush a newer window
    if (this.open.get(chat) !== window) return;
    this.open.delete(chat);

    const task = this.flushLock
      .runExclusive(chat, () => this.onFlush(chat, window.count))
      .catch((error: unknown) => {
        this.logger.error('aggregation', `Flush failed for ${chat}: ${formatErrorMessage(error)}`);
      })
      .finally(() => {
        this.flushing.delete(task);
      });
    this.flushing.add(task);
  }

  /** Cancels every open window without flushing. */
  clear(): void {
    for (const window of this.open.values()) {
      clearTimeout(window.timerId);
    }
    this.open.clear();
  }

  /** Resolves once running flushes have finished. */
  async idle(): Promise<void> {
    await Promise.allSettled([...this.flushing]);
  }

  /** Epoch ms at which the open window for `chat` flushes. */
  deadlineOf(chat: string): number | undefined {
    return this.open.get(chat)?.deadline;
  }

  getPendingCount(): number {
    return this.open.size;
  }
}
