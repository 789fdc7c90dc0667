import { vi } from 'vitest';
import type { Logger } from '../../src/infra/logger/logger.js';

export function createMockLogger() {
  return {
    info: vi.fn<(context: string, message: string) => void>(),
    debug: vi.fn<(context: string, message: string) => void>(),
    warn: vi.fn<(context: string, message: string) => void>(),
    error: vi.fn<(context: string, message: string) => void>(),
  } satisfies Logger;
}
