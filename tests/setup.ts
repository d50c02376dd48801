/**
 * Global test setup file
 * Runs before any test module is imported
 */

import { afterEach, vi } from 'vitest';

// Keep test output readable; the logger reads this when first imported
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'silent';
process.env.NODE_ENV = 'test';

afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
});
