import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { AggregationWindow } from '../../../../src/core/conversation/AggregationWindow.js';
import { createMockLogger } from '../../../helpers/logger.js';

describe('AggregationWindow', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  function setup(windowMs = 3000) {
    const logger = createMockLogger();
    const onFlush = vi.fn<(chat: string, count: number) => Promise<void>>().mockResolvedValue(undefined);
    const onReset = vi.fn();
    const window = new AggregationWindow(logger, { windowMs, onFlush, onReset });
    return { window, onFlush, onReset, logger };
  }

  it('flushes a burst once with its message count', async () => {
    const { window, onFlush } = setup();

    window.add('chat-a');
    await vi.advanceTimersByTimeAsync(1000);
    window.add('chat-a');
    await vi.advanceTimersByTimeAsync(2999);
    expect(onFlush).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    await window.idle();
    expect(onFlush).toHaveBeenCalledTimes(1);
    expect(onFlush).toHaveBeenCalledWith('chat-a', 2);
    expect(window.getPendingCount()).toBe(0);
  });

  it('keeps windows of different chats independent', async () => {
    const { window, onFlush } = setup();
    window.add('chat-a');
    await vi.advanceTimersByTimeAsync(2000);
    window.add('chat-b');
    await vi.advanceTimersByTimeAsync(1000);
    await window.idle();

    expect(onFlush).toHaveBeenCalledTimes(1);
    expect(onFlush).toHaveBeenCalledWith('chat-a', 1);
    expect(window.getPendingCount()).toBe(1);
  });

  it('extends an open window on typing without counting', async () => {
    const { window, onFlush, onReset } = setup();
    window.add('chat-a');
    await vi.advanceTimersByTimeAsync(2500);
    expect(window.touch('chat-a')).toBe(true);
    await vi.advanceTimersByTimeAsync(2999);
    expect(onFlush).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    await window.idle();
    expect(onFlush).toHaveBeenCalledWith('chat-a', 1);
    expect(onReset.mock.calls.map((c) => c[1])).toEqual(['start', 'typing']);
  });

  it('never opens a window from typing alone', async () => {
    const { window, onFlush } = setup();
    expect(window.touch('chat-a')).toBe(false);
    await vi.advanceTimersByTimeAsync(10_000);
    expect(onFlush).not.toHaveBeenCalled();
    expect(window.getPendingCount()).toBe(0);
  });

  it('reports the deadline of an open window', () => {
    const { window } = setup(3000);
    const start = Date.now();
    window.add('chat-a');
    expect(window.deadlineOf('chat-a')).toBe(start + 3000);
    expect(window.deadlineOf('chat-b')).toBeUndefined();
  });

  it('cancels open windows on clear', async () => {
    const { window, onFlush } = setup();
    window.add('chat-a');
    window.clear();
    await vi.advanceTimersByTimeAsync(5000);
    expect(onFlush).not.toHaveBeenCalled();
  });

  it('logs a failing flush and keeps going', async () => {
    const { window, onFlush, logger } = setup(100);
    onFlush.mockRejectedValueOnce(new Error('backend down'));

    window.add('chat-a');
    await vi.advanceTimersByTimeAsync(100);
    await window.idle();
    window.add('chat-a');
    await vi.advanceTimersByTimeAsync(100);
    await window.idle();

    expect(onFlush).toHaveBeenCalledTimes(2);
    expect(logger.error).toHaveBeenCalledWith('aggregation', 'Flush failed for chat-a: backend down');
  });
});
