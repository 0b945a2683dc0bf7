import { describe, expect, it, vi } from 'vitest'
import { filteredLogger, isLogLevel, type Logger, prefixedLogger } from './logger.js'

function spyLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }
}

describe('prefixedLogger', () => {
  it('prepends the bracketed prefix', () => {
    const base = spyLogger()
    prefixedLogger('tinyhttpd', base).info('GET / - 127.0.0.1', 42)
    expect(base.info).toHaveBeenCalledWith('[tinyhttpd]', 'GET / - 127.0.0.1', 42)
  })
})

describe('filteredLogger', () => {
  it('drops messages below the level', () => {
    const base = spyLogger()
    const logger = filteredLogger('warn', base)
    logger.debug('d')
    logger.info('i')
    logger.warn('w')
    logger.error('e')
    expect(base.debug).not.toHaveBeenCalled()
    expect(base.info).not.toHaveBeenCalled()
    expect(base.warn).toHaveBeenCalledWith('w')
    expect(base.error).toHaveBeenCalledWith('e')
  })

  it('passes everything at debug', () => {
    const base = spyLogger()
    filteredLogger('debug', base).debug('d')
    expect(base.debug).toHaveBeenCalledWith('d')
  })
})

describe('isLogLevel', () => {
  it('accepts known levels only', () => {
    expect(isLogLevel('info')).toBe(true)
    expect(isLogLevel('verbose')).toBe(false)
  })
})
