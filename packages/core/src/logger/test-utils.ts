import { vi } from 'vitest';
import type { LogLevel, Logger } from './types.js';

/**
 * Logger whose methods are vi.fn() spies; children are the same object
 */
export function createMockLogger(): Logger {
    const logger: Logger = {
        error: vi.fn(),
        warn: vi.fn(),
        info: vi.fn(),
        debug: vi.fn(),
        silly: vi.fn(),
        createChild: vi.fn(() => logger),
        setLevel: vi.fn(),
        getLevel: vi.fn((): LogLevel => 'info'),
        destroy: vi.fn(async () => undefined),
    };
    return logger;
}
