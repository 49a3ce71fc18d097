/**
 * Silent logger doubles for vi.mock('../../config/logger', ...)
 */

import type { ILogger } from '@guitar-registry/logger'
import { vi } from 'vitest'

export function createMockLogger(): ILogger {
  const mock: ILogger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(() => mock),
  }
  return mock
}

export function mockLoggerModule() {
  return {
    rootLogger: createMockLogger(),
    logger: {
      resolver: createMockLogger(),
      orchestrator: createMockLogger(),
      registry: createMockLogger(),
      script: createMockLogger(),
    },
  }
}
