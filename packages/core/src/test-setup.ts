/**
 * Test Setup: shared doubles for unit suites.
 */

import { vi, type Mock } from 'vitest';
import type { ExtensionLogger } from './logging/logger.js';

export interface MockLogger extends ExtensionLogger {
  trace: Mock;
  debug: Mock;
  info: Mock;
  warn: Mock;
  error: Mock;
  fatal: Mock;
  child: Mock;
}

/** Logger whose `child()` returns itself, so child records land on the same mocks. */
export function makeLogger(): MockLogger {
  const logger: MockLogger = {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
    level: 'info',
  };
  logger.child.mockReturnValue(logger);
  return logger;
}
