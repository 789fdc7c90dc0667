import type { Logger } from './logger/logger.js';
import { formatErrorMessage } from './logger/logger.js';

export interface Stoppable {
  stop(): void | Promise<void>;
}

export interface ShutdownOptions {
  reason?: string;
  /** Stop accepting new work. */
  stop?: readonly Stoppable[];
  /** Wait for component-owned work (webhook deliveries, flushes). */
  drain?: readonly ((timeoutMs: number) => Promise<unknown>)[];
  drainTimeoutMs?: number;
  /** Release resources last. */
  close?: readonly (() => void | Promise<void>)[];
}

/**
 * Process-wide cancellation signal plus tracking of detached tasks, so that
 * shutdown can abort waits and give running work a bounded grace period.
 */
export class Lifecycle {
  private readonly controller = new AbortController();
  private readonly inflight = new Set<Promise<unknown>>();
  private shuttingDown = false;

  constructor(private readonly logger: Logger) {}

  public get signal(): AbortSignal {
    return this.controller.signal;
  }

  public get isShuttingDown(): boolean {
    return this.shuttingDown;
  }

  public get inflightCount(): number {
    return this.inflight.size;
  }

  public track<T>(promise: Promise<T>): Promise<T> {
    this.inflight.add(promise);
    const remove = () => {
      this.inflight.delete(promise);
    };
    promise.then(remove, remove);
    return promise;
  }

  /** Runs `task` detached; a failure ends in an error log. */
  public spawn(context: string, task: (signal: AbortSignal) => Promise<void>): void {
    const run = task(this.signal).catch((err: unknown) => {
      if (this.signal.aborted) {
        this.logger.debug(context, `Task cancelled: ${formatErrorMessage(err)}`);
        return;
      }
      this.logger.error(context, `Task failed: ${formatErrorMessage(err)}`);
    });
    this.track(run);
  }

  /** Resolves true when everything settled within `timeoutMs`. */
  public async drain(timeoutMs = 5_000): Promise<boolean> {
    if (this.inflight.size === 0) return true;
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), Math.max(0, timeoutMs));
    });
    try {
      return await Promise.race([Promise.allSettled([...this.inflight]).then(() => true), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  public async shutdown(options: ShutdownOptions = {}): Promise<void> {
    if (this.shuttingDown) return;
    this.shuttingDown = true;
    const graceMs = options.drainTimeoutMs ?? 5_000;

    for (const s of options.stop ?? []) {
      try {
        await s.stop();
      } catch (err) {
        this.logger.warn('lifecycle', `stop failed: ${formatErrorMessage(err)}`);
      }
    }

    this.controller.abort(options.reason ?? 'shutdown');

    const deadline = Date.now() + graceMs;
    for (const d of options.drain ?? []) {
      try {
        await d(Math.max(0, deadline - Date.now()));
      } catch (err) {
        this.logger.warn('lifecycle', `drain failed: ${formatErrorMessage(err)}`);
      }
    }
    if (!(await this.drain(Math.max(0, deadline - Date.now())))) {
      this.logger.warn('lifecycle', `${this.inflight.size} task(s) still running after ${graceMs}ms grace`);
    }

    for (const c of options.close ?? []) {
      try {
        await c();
      } catch (err) {
        this.logger.warn('lifecycle', `close failed: ${formatErrorMessage(err)}`);
      }
    }
  }
}
