import { describe, expect, it } from 'vitest'
import { inSubnet, likeBinary, match, matchBinary } from '../src/functions.js'

const b64 = (text: string): string => Buffer.from(text).toString('base64')

describe('inSubnet', () => {
  it.each([
    ['192.168.1.5', '192.168.0.0/16', 1],
    ['10.0.0.1', '192.168.0.0/16', 0],
    ['10.0.0.1', '10.0.0.1', 1],
    ['10.1.0.0/16', '10.0.0.0/8', 1],
    ['2001:db8::1', '2001:db8::/32', 1],
    ['2001:db9::1', '2001:db8::/32', 0],
    ['::1', '10.0.0.0/8', 0],
    ['10.0.0.1', '10.0.0.0/abc', 0],
    ['not an address', '10.0.0.0/8', 0],
  ])('%s in %s is %d', (addr, net, expected) => {
    expect(inSubnet(addr, net)).toBe(expected)
  })

  it('never matches NULL', () => {
    expect(inSubnet(null, '10.0.0.0/8')).toBe(0)
    expect(inSubnet('10.0.0.1', null)).toBe(0)
  })
})

describe('match', () => {
  it('searches anywhere in the value', () => {
    expect(match('^a', 'abc')).toBe(1)
    expect(match('b', 'abc')).toBe(1)
    expect(match('^b', 'abc')).toBe(0)
    expect(match('a', null)).toBe(0)
  })
})

describe('binary helpers', () => {
  const payload = b64('GET / HTTP/1.1')

  it('matches decoded payloads', () => {
    expect(matchBinary('^GET /', payload)).toBe(1)
    expect(matchBinary('^POST', payload)).toBe(0)
  })

  it('applies LIKE to decoded payloads', () => {
    expect(likeBinary('%http%', payload)).toBe(1)
    expect(likeBinary('GET_/%', payload)).toBe(1)
    expect(likeBinary('%1.1', payload)).toBe(1)
    expect(likeBinary('%1.0', payload)).toBe(0)
    expect(likeBinary('POST%', payload)).toBe(0)
    expect(likeBinary('%', 42)).toBe(0)
  })
})
