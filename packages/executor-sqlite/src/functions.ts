import { BlockList, isIPv6 } from 'node:net'
import type BetterSqlite3 from 'better-sqlite3'

// ── Pattern helper functions ───────────────────────────────────
//
// SQLite has no inet type or regular-expression operator, so the functions
// the sqlite dialect calls are registered on every connection. Each returns
// 1 or 0; a NULL or non-text argument never matches.

/** True when `addr` lies in `net`. A CIDR `addr` is tested by its network address. */
export function inSubnet(addr: unknown, net: unknown): number {
  if (typeof addr !== 'string' || typeof net !== 'string') return 0
  const [netAddr = '', bits] = net.split('/')
  const [host = ''] = addr.split('/')
  const family = isIPv6(netAddr) ? 'ipv6' : 'ipv4'
  if ((isIPv6(host) ? 'ipv6' : 'ipv4') !== family) return 0

  const prefix = bits === undefined ? (family === 'ipv6' ? 128 : 32) : Number(bits)
  try {
    const list = new BlockList()
    list.addSubnet(netAddr, prefix, family)
    return list.check(host, family) ? 1 : 0
  } catch {
    // Malformed address or prefix
    return 0
  }
}

/** Regular-expression search anywhere in `value` */
export function match(pattern: unknown, value: unknown): number {
  if (typeof pattern !== 'string' || typeof value !== 'string') return 0
  return new RegExp(pattern).test(value) ? 1 : 0
}

function decodeBase64(value: unknown): string | undefined {
  return typeof value === 'string' ? Buffer.from(value, 'base64').toString('utf8') : undefined
}

/** `match` on the decoded text of a base64 value */
export function matchBinary(pattern: unknown, value: unknown): number {
  return match(pattern, decodeBase64(value))
}

/** SQL LIKE (case-insensitive for ASCII, as in SQLite) on the decoded text of a base64 value */
export function likeBinary(pattern: unknown, value: unknown): number {
  const text = decodeBase64(value)
  if (typeof pattern !== 'string' || text === undefined) return 0
  return likeToRegExp(pattern).test(text) ? 1 : 0
}

function likeToRegExp(pattern: string): RegExp {
  let source = ''
  for (const ch of pattern) {
    if (ch === '%') source += '[\\s\\S]*'
    else if (ch === '_') source += '[\\s\\S]'
    else source += ch.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&')
  }
  return new RegExp(`^${source}$`, 'i')
}

export function registerFunctions(db: BetterSqlite3.Database): void {
  db.function('in_subnet', { deterministic: true }, inSubnet)
  db.function('match', { deterministic: true }, match)
  db.function('match_bin', { deterministic: true }, matchBinary)
  db.function('like_bin', { deterministic: true }, likeBinary)
}
