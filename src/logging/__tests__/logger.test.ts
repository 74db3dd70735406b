import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import type { MockInstance } from 'vitest'
import { configureLogging, createConsoleLogger, logger } from '../logger.js'

describe('configureLogging', () => {
  let originalLogger: typeof logger

  beforeEach(() => {
    originalLogger = logger
  })

  afterEach(() => {
    configureLogging(originalLogger)
  })

  it('allows custom logger injection', () => {
    const customLogger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    }

    configureLogging(customLogger)

    logger.debug('Debug message')
    logger.info('Info message')
    logger.warn('Warn message')
    logger.error('Error message')

    expect(customLogger.debug).toHaveBeenCalledWith('Debug message')
    expect(customLogger.info).toHaveBeenCalledWith('Info message')
    expect(customLogger.warn).toHaveBeenCalledWith('Warn message')
    expect(customLogger.error).toHaveBeenCalledWith('Error message')
  })

  it('passes multiple arguments to logger', () => {
    const customLogger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    }

    configureLogging(customLogger)

    const meta = { bookId: 42 }
    logger.warn('[book-cache] failed', meta, 3)

    expect(customLogger.warn).toHaveBeenCalledWith('[book-cache] failed', meta, 3)
  })
})

describe('default logger', () => {
  it('logs warnings to console.warn', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {})

    logger.warn('Warning message', 'arg1')

    expect(warnSpy).toHaveBeenCalledWith('Warning message', 'arg1')

    warnSpy.mockRestore()
  })

  it('does not log debug messages', () => {
    const debugSpy = vi.spyOn(console, 'debug')

    logger.debug('Debug message')

    expect(debugSpy).not.toHaveBeenCalled()

    debugSpy.mockRestore()
  })
})

describe('createConsoleLogger', () => {
  let errorSpy: MockInstance<typeof console.error>

  beforeEach(() => {
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    errorSpy.mockRestore()
  })

  it('writes enabled levels to stderr', () => {
    const consoleLogger = createConsoleLogger('info')

    consoleLogger.info('loaded', 7)
    consoleLogger.error('failed')

    expect(errorSpy).toHaveBeenCalledTimes(2)
    expect(errorSpy).toHaveBeenNthCalledWith(1, 'loaded', 7)
    expect(errorSpy).toHaveBeenNthCalledWith(2, 'failed')
  })

  it('drops messages below the threshold', () => {
    const consoleLogger = createConsoleLogger('warn')

    consoleLogger.debug('noise')
    consoleLogger.info('noise')

    expect(errorSpy).not.toHaveBeenCalled()
  })
})
