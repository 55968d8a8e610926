import { vi } from 'vitest';
import type { Logger } from '../../src/utils/logger.js';

export function createTestLogger() {
  return {
    info: vi.fn(async (_message: string) => undefined),
    warn: vi.fn(async (_message: string) => undefined),
    error: vi.fn(async (_message: string) => undefined),
  } satisfies Logger;
}
