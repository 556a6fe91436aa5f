/**
 * Logger tests
 */

import { describe, it, expect, afterEach, vi } from 'vitest'
import { createLevelLogger, logger, noopLogger, setLogger } from '../../src/utils/logger'
import type { Logger } from '../../src/utils/logger'

function recordingLogger(): { target: Logger; lines: string[] } {
  const lines: string[] = []
  const target: Logger = {
    debug: message => lines.push(`debug ${message}`),
    info: message => lines.push(`info ${message}`),
    warn: message => lines.push(`warn ${message}`),
    error: message => lines.push(`error ${message}`),
  }
  return { target, lines }
}

describe('createLevelLogger', () => {
  it('should drop messages below the level', () => {
    const { target, lines } = recordingLogger()
    const leveled = createLevelLogger('warn', target)

    leveled.debug('d')
    leveled.info('i')
    leveled.warn('w')
    leveled.error('e', new Error('boom'))

    expect(lines).toEqual(['warn w', 'error e'])
  })

  it('should pass everything at debug', () => {
    const { target, lines } = recordingLogger()
    const leveled = createLevelLogger('debug', target)

    leveled.debug('d')
    leveled.info('i')

    expect(lines).toEqual(['debug d', 'info i'])
  })
})

describe('setLogger', () => {
  afterEach(() => {
    setLogger(noopLogger)
  })

  it('should replace the global logger seen by importers', () => {
    const custom: Logger = { ...noopLogger, warn: vi.fn() }
    setLogger(custom)
    expect(logger).toBe(custom)
  })
})
