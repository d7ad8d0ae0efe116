/**
 * tests/setup.ts
 * Global test setup file for vitest
 *
 * Individual test files mock specific modules (usually the logger) as needed.
 */

import { afterEach, vi } from 'vitest';

// Keep test runs from writing daily log files
process.env.DISABLE_FILE_LOGGING = 'true';

afterEach(() => {
  vi.clearAllMocks();
  vi.useRealTimers();
});
