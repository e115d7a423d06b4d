import { describe, expect, it } from 'vitest'
import { InvalidIdentifierError, InvalidPathError } from '../src/errors.js'
import { isValidName, isValidPath, validateName, validatePath } from '../src/identifiers.js'

describe('validateName', () => {
  it.each(['', 'my_table', 'ipv4-addr', 'network-traffic', '__reflist', 'src_ref__parent_ref', 'T1'])(
    'accepts %j',
    (name) => {
      expect(() => validateName(name)).not.toThrow()
      expect(isValidName(name)).toBe(true)
    },
  )

  it.each(['t; DROP TABLE x', 't;', 'a b', 'x"y', "x'y", 'a.b', 'a/*c*/', 'a--\n'])('rejects %j', (name) => {
    expect(() => validateName(name)).toThrow(InvalidIdentifierError)
    expect(isValidName(name)).toBe(false)
  })
})

describe('validatePath', () => {
  it.each([
    'value',
    'ipv4-addr:value',
    'network-traffic:src_ref.value',
    "file:hashes.'SHA-256'",
    'network-traffic:protocols[*]',
    'windows-registry-key:values[*].name',
    'next.name[*]',
    'src_ref.value',
  ])('accepts %j', (path) => {
    expect(() => validatePath(path)).not.toThrow()
    expect(isValidPath(path)).toBe(true)
  })

  it.each(['', '*', 'a b', 'value; DROP TABLE x', '"value"', 'a..b', '.a', 'a.', 'x[1]', '1type:value x'])(
    'rejects %j',
    (path) => {
      expect(() => validatePath(path)).toThrow(InvalidPathError)
      expect(isValidPath(path)).toBe(false)
    },
  )
})
