/**
 * Time-windowed "seen" set for message ids.
 *
 * Constructed once per process and handed to whoever needs it, so tests get
 * a fresh instance instead of sharing module state.
 */
export interface DedupeCacheOptions {
  windowMs: number;
  /** How often expired entries are swept (default 60s). */
  sweepIntervalMs?: number;
  now?: () => number;
}

export class DedupeCache {
  private readonly seenAt = new Map<string, number>();
  private readonly windowMs: number;
  private readonly sweepIntervalMs: number;
  private readonly now: () => number;
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(options: DedupeCacheOptions) {
    this.windowMs = Math.max(1, options.windowMs);
    this.sweepIntervalMs = options.sweepIntervalMs ?? 60_000;
    this.now = options.now ?? (() => Date.now());
  }

  /**
   * True when `id` was recorded within the window; the original timestamp is
   * kept. Otherwise records `id` now and returns false. Empty ids are never
   * duplicates.
   */
  seen(id: string): boolean {
    if (!id) return false;
    const now = this.now();
    const when = this.seenAt.get(id);
    if (when !== undefined && now - when <= this.windowMs) {
      return true;
    }
    this.seenAt.set(id, now);
    return false;
  }

  /** Drops entries older than the window. Returns how many were removed. */
  sweep(): number {
    const cutoff = this.now() - this.windowMs;
    let removed = 0;
    for (const [id, when] of this.seenAt) {
      if (when < cutoff) {
        this.seenAt.delete(id);
        removed++;
      }
    }
    return removed;
  }

  start(): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => this.sweep(), this.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  get size(): number {
    return this.seenAt.size;
  }
}
