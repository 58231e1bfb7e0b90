import { afterEach, beforeEach, vi } from 'vitest'
import { logger } from '../src/utils/logger'
import { setColorMode } from '../src/utils/colors'

// Silence logger output during tests unless explicitly asserted
beforeEach(() => {
  setColorMode('never')
  vi.spyOn(console, 'log').mockImplementation(() => {})
  vi.spyOn(console, 'error').mockImplementation(() => {})
})

afterEach(() => {
  vi.restoreAllMocks()
  logger.reset()
  process.exitCode = 0
})
