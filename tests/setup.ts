/**
 * Vitest Setup File
 *
 * Runs before each test file. Components under test get an injected quiet
 * logger; the shared logger is lowered to errors for code paths that fall
 * back to it.
 */

import { beforeAll } from 'vitest'
import { LogLevel } from '../src/utils/logger.js'
import { sharedLogger } from '../src/utils/shared-logger.js'

beforeAll(() => {
  sharedLogger.setConfig({ minLevel: LogLevel.ERROR })
})
