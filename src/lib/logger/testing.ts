import { vi } from "vitest";

import type { Logger } from "./logger";

/**
 * Logger double for tests. `child` returns the same instance so assertions can
 * be made on one set of spies.
 */
export const createMockLogger = (): Logger => {
  const logger: Logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn(() => logger),
  };
  return logger;
};
