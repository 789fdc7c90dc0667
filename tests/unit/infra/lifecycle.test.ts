import { describe, it, expect } from 'vitest';
import { Lifecycle } from '../../../src/infra/lifecycle.js';
import { createMockLogger } from '../../helpers/logger.js';

describe('Lifecycle', () => {
  it('logs a failed detached task', async () => {
    const logger = createMockLogger();
    const lifecycle = new Lifecycle(logger);

    lifecycle.spawn('ingest', async () => {
      throw new Error('backend down');
    });

    await expect(lifecycle.drain(100)).resolves.toBe(true);
    expect(logger.error).toHaveBeenCalledWith('ingest', 'Task failed: backend down');
    expect(lifecycle.inflightCount).toBe(0);
  });

  it('runs stop, abort, drain and close in order', async () => {
    const logger = createMockLogger();
    const lifecycle = new Lifecycle(logger);
    const steps: string[] = [];

    lifecycle.spawn('worker', (signal) => new Promise<void>((resolve) => {
      signal.addEventListener('abort', () => {
        steps.push('aborted');
        resolve();
      });
    }));

    await lifecycle.shutdown({
      reason: 'SIGTERM',
      stop: [{ stop: () => void steps.push('stop') }],
      drain: [async () => steps.push('drain')],
      close: [() => void steps.push('close')],
    });

    expect(steps).toEqual(['stop', 'aborted', 'drain', 'close']);
    expect(lifecycle.signal.reason).toBe('SIGTERM');
    expect(lifecycle.isShuttingDown).toBe(true);
  });

  it('keeps going when a step fails', async () => {
    const logger = createMockLogger();
    const lifecycle = new Lifecycle(logger);
    const steps: string[] = [];

    await lifecycle.shutdown({
      stop: [{ stop: () => Promise.reject(new Error('busy')) }],
      close: [() => void steps.push('close')],
    });

    expect(logger.warn).toHaveBeenCalledWith('lifecycle', 'stop failed: busy');
    expect(steps).toEqual(['close']);
  });
});
