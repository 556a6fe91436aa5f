/**
 * Result type tests
 */

import { describe, it, expect } from 'vitest'
import { Ok, Err, isOk, isErr, unwrap, map } from '../../src/types/result'
import type { Result } from '../../src/types/result'
import { ConfigurationError } from '../../src/errors'

describe('Result', () => {
  const ok: Result<number, ConfigurationError> = Ok(2)
  const err: Result<number, ConfigurationError> = Err(new ConfigurationError('bad value'))

  it('should narrow with isOk and isErr', () => {
    expect(isOk(ok)).toBe(true)
    expect(isErr(ok)).toBe(false)
    expect(isErr(err)).toBe(true)
  })

  it('should unwrap a value or throw the error', () => {
    expect(unwrap(ok)).toBe(2)
    expect(() => unwrap(err)).toThrow(ConfigurationError)
  })

  it('should map only Ok values', () => {
    expect(map(ok, value => value * 10)).toEqual({ ok: true, value: 20 })
    expect(map(err, value => value * 10)).toBe(err)
  })
})
