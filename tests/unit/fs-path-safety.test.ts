/**
 * Path safety tests
 */

import { describe, it, expect } from 'vitest'
import { join, resolve } from 'node:path'
import {
  escapesBaseDirectory,
  hasDangerousCharacters,
  hasPathTraversal,
  isAbsoluteHref,
  resolveWithin,
} from '../../src/utils/fs-path-safety'
import { PathTraversalError } from '../../src/storage/errors'

const root = resolve('/srv/catalog')

describe('resolveWithin', () => {
  it('should join a relative href under the root', () => {
    expect(resolveWithin(root, 'roads/data.parquet')).toBe(join(root, 'roads', 'data.parquet'))
  })

  it.each([
    ['../etc/passwd'],
    ['roads/../../etc/passwd'],
    ['/etc/passwd'],
    ['C:/Windows'],
    ['roads/a\0b'],
    [''],
  ])('should reject %j', href => {
    expect(() => resolveWithin(root, href)).toThrow(PathTraversalError)
  })
})

describe('predicates', () => {
  it('should detect traversal segments with either separator', () => {
    expect(hasPathTraversal('data/../secret')).toBe(true)
    expect(hasPathTraversal('data\\..\\secret')).toBe(true)
    expect(hasPathTraversal('data/..hidden/file')).toBe(false)
  })

  it('should detect absolute hrefs', () => {
    expect(isAbsoluteHref('/a')).toBe(true)
    expect(isAbsoluteHref('\\a')).toBe(true)
    expect(isAbsoluteHref('d:\\a')).toBe(true)
    expect(isAbsoluteHref('roads/a')).toBe(false)
  })

  it('should detect control characters', () => {
    expect(hasDangerousCharacters('a\nb')).toBe(true)
    expect(hasDangerousCharacters('a b')).toBe(false)
  })

  it('should detect escapes after resolution', () => {
    expect(escapesBaseDirectory(root, 'roads/data.parquet')).toBe(false)
    expect(escapesBaseDirectory(root, '../other')).toBe(true)
  })
})
