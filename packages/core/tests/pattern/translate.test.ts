import {
  InvalidIdentifierError,
  InvalidPathError,
  PatternSyntaxError,
  UnsupportedOperatorError,
} from '@stixql/validation'
import { describe, expect, it } from 'vitest'
import { clickhouseDialect } from '../../src/dialects/clickhouse.js'
import { postgresDialect } from '../../src/dialects/postgres.js'
import { patternFilter, stixToSql } from '../../src/pattern/translate.js'
import { Query } from '../../src/query/query.js'
import { createSchemaContext } from '../../src/metadata/context.js'
import { ipv6Table, trafficTable } from '../fixtures/stixSchema.js'

describe('stixToSql', () => {
  it.each([
    ['ipv4-addr', "[ipv4-addr:value = '9.9.9.9']", `"value" = '9.9.9.9'`],
    ['ipv4-addr', "[(ipv4-addr:value = '9.9.9.9')]", `("value" = '9.9.9.9')`],
    ['process', "[ipv4-addr:value = '9.9.9.9']", ''],
    ['ipv4-addr', "[ipv4-addr:value ISSUBSET '192.168.0.0/16']", `(in_subnet("value", '192.168.0.0/16'))`],
    ['domain-name', "[domain-name:value LIKE 'example.%']", `"value" LIKE 'example.%'`],
    [
      'url',
      "[url:value LIKE 'http://example.%' AND url:value LIKE '%.php']",
      `"value" LIKE 'http://example.%' AND "value" LIKE '%.php'`,
    ],
    [
      'url',
      "[url:value LIKE 'http://example.%' AND url:value LIKE '%.php' AND url:value LIKE '%foo%']",
      `"value" LIKE 'http://example.%' AND "value" LIKE '%.php' AND "value" LIKE '%foo%'`,
    ],
    [
      'url',
      "[(url:value LIKE 'http://example.%' OR url:value LIKE 'https://example.%') AND url:value LIKE '%foo%']",
      `("value" LIKE 'http://example.%' OR "value" LIKE 'https://example.%') AND "value" LIKE '%foo%'`,
    ],
    ['network-traffic', "[network-traffic:protocols[*] = 'tcp']", `"protocols" LIKE '%tcp%'`],
    ['network-traffic', "[network-traffic:protocols[*] != 'tcp']", `"protocols" NOT LIKE '%tcp%'`],
    ['windows-registry-key', "[windows-registry-key:values[*].name = 'foo']", `"values" LIKE '%"name":"foo"%'`],
  ])('compiles %s %s', (scoType, pattern, expected) => {
    expect(stixToSql(pattern, scoType)).toBe(expected)
  })

  // --- Operators ---

  it('compiles numeric comparisons and sets', () => {
    expect(stixToSql('[network-traffic:dst_port < 1024]', 'network-traffic')).toBe('"dst_port" < 1024')
    expect(stixToSql('[network-traffic:dst_port IN (80, 443)]', 'network-traffic')).toBe('"dst_port" IN (80, 443)')
    expect(stixToSql('[x-finding:score >= 0.75]', 'x-finding')).toBe('"score" >= 0.75')
  })

  it('negates comparisons', () => {
    expect(stixToSql("[ipv4-addr:value NOT = '1.2.3.4']", 'ipv4-addr')).toBe(`NOT ("value" = '1.2.3.4')`)
    expect(stixToSql("[url:value NOT LIKE '%.php']", 'url')).toBe(`"value" NOT LIKE '%.php'`)
    expect(stixToSql('[network-traffic:dst_port NOT IN (22, 23)]', 'network-traffic')).toBe(
      '"dst_port" NOT IN (22, 23)',
    )
    expect(stixToSql("[ipv4-addr:value NOT ISSUBSET '10.0.0.0/8']", 'ipv4-addr')).toBe(
      `NOT (in_subnet("value", '10.0.0.0/8'))`,
    )
  })

  it('swaps arguments for ISSUPERSET', () => {
    expect(stixToSql("[ipv4-addr:value ISSUPERSET '10.1.2.3']", 'ipv4-addr')).toBe(
      `(in_subnet('10.1.2.3', "value"))`,
    )
  })

  it('only allows subnet operators on IPv4 values', () => {
    expect(() => stixToSql("[domain-name:value ISSUBSET 'example.com']", 'domain-name')).toThrow(
      UnsupportedOperatorError,
    )
  })

  it('compiles MATCHES per dialect', () => {
    const pattern = "[file:name MATCHES '^cmd']"
    expect(stixToSql(pattern, 'file')).toBe(`match('^cmd', "name")`)
    expect(stixToSql(pattern, 'file', { dialect: postgresDialect })).toBe(`stixql_common.match('^cmd', "name")`)
    expect(stixToSql(pattern, 'file', { dialect: clickhouseDialect })).toBe(`match("name", '^cmd')`)
    expect(stixToSql("[file:name NOT MATCHES '^cmd']", 'file')).toBe(`NOT match('^cmd', "name")`)
  })

  it('decodes payloads before matching', () => {
    expect(stixToSql("[artifact:payload_bin MATCHES 'GET /']", 'artifact')).toBe(`match_bin('GET /', "payload_bin")`)
    expect(stixToSql("[artifact:payload_bin LIKE '%GET%']", 'artifact')).toBe(`like_bin('%GET%', "payload_bin")`)
    expect(stixToSql("[artifact:payload_bin NOT LIKE '%GET%']", 'artifact')).toBe(
      `NOT like_bin('%GET%', "payload_bin")`,
    )
  })

  it('checks existence', () => {
    expect(stixToSql('[EXISTS process:pid]', 'process')).toBe('"pid" IS NOT NULL')
  })

  // --- Literals ---

  it('escapes quotes in string literals', () => {
    expect(stixToSql("[file:name = 'O\\'Brien.txt']", 'file')).toBe(`"name" = 'O''Brien.txt'`)
    expect(stixToSql("[file:name = 'O\\'Brien.txt']", 'file', { dialect: clickhouseDialect })).toBe(
      `"name" = 'O\\'Brien.txt'`,
    )
  })

  it('renders booleans, timestamps and binaries', () => {
    expect(stixToSql('[process:x_elevated = true]', 'process')).toBe('"x_elevated" = TRUE')
    expect(stixToSql("[file:created > t'2020-06-30T19:25:09Z']", 'file')).toBe(`"created" > '2020-06-30T19:25:09Z'`)
    expect(stixToSql("[artifact:payload_bin = b'R0VU']", 'artifact')).toBe(`"payload_bin" = 'R0VU'`)
    expect(stixToSql("[artifact:payload_bin = h'4745']", 'artifact')).toBe(`"payload_bin" = 'R0U='`)
  })

  // --- Lists ---

  it('ORs list membership for IN', () => {
    expect(stixToSql("[network-traffic:protocols[*] IN ('tcp', 'udp')]", 'network-traffic')).toBe(
      `"protocols" LIKE '%tcp%' OR "protocols" LIKE '%udp%'`,
    )
    expect(stixToSql("[network-traffic:protocols[*] NOT IN ('tcp', 'udp')]", 'network-traffic')).toBe(
      `"protocols" NOT LIKE '%tcp%' AND "protocols" NOT LIKE '%udp%'`,
    )
  })

  it('parenthesizes an OR of list matches under AND', () => {
    expect(
      stixToSql("[network-traffic:protocols[*] IN ('tcp', 'udp') AND network-traffic:dst_port = 53]", 'network-traffic'),
    ).toBe(`("protocols" LIKE '%tcp%' OR "protocols" LIKE '%udp%') AND "dst_port" = 53`)
  })

  it('rejects ordering operators on lists', () => {
    expect(() => stixToSql("[network-traffic:protocols[*] > 'tcp']", 'network-traffic')).toThrow(
      new UnsupportedOperatorError('>', 'network-traffic', 'protocols[*]'),
    )
  })

  it('rejects list indexes', () => {
    expect(() => stixToSql("[network-traffic:protocols[0] = 'tcp']", 'network-traffic')).toThrow(
      'not supported for network-traffic:protocols[0]',
    )
  })

  // --- Observations ---

  it('drops observations on other types', () => {
    expect(stixToSql("[ipv4-addr:value = '1.1.1.1'] OR [network-traffic:dst_port = 22]", 'network-traffic')).toBe(
      '"dst_port" = 22',
    )
  })

  it('parenthesizes OR observations under AND', () => {
    expect(stixToSql("[url:value = 'a' OR url:value = 'b'] AND [url:value LIKE '%c%']", 'url')).toBe(
      `("value" = 'a' OR "value" = 'b') AND "value" LIKE '%c%'`,
    )
  })

  it('reads FOLLOWEDBY as AND and ignores qualifiers', () => {
    expect(
      stixToSql(
        "[ipv4-addr:value = 'a'] FOLLOWEDBY [ipv4-addr:value = 'b'] WITHIN 5 SECONDS START t'2020-01-01T00:00:00Z' STOP t'2020-01-02T00:00:00Z'",
        'ipv4-addr',
      ),
    ).toBe(`"value" = 'a' AND "value" = 'b'`)
    expect(stixToSql("[ipv4-addr:value = 'a'] REPEATS 3 TIMES", 'ipv4-addr')).toBe(`"value" = 'a'`)
  })

  // --- References ---

  it('follows a reference through a subquery', () => {
    expect(stixToSql("[network-traffic:src_ref.value = '10.0.0.1']", 'network-traffic')).toBe(
      `"src_ref" IN (SELECT "id" FROM "ipv4-addr" WHERE "value" = '10.0.0.1')`,
    )
    expect(stixToSql("[network-traffic:dst_ref.value ISSUBSET '10.0.0.0/8']", 'network-traffic')).toBe(
      `"dst_ref" IN (SELECT "id" FROM "ipv4-addr" WHERE (in_subnet("value", '10.0.0.0/8')))`,
    )
  })

  it('follows nested references innermost first', () => {
    expect(stixToSql("[process:parent_ref.binary_ref.name = 'cmd.exe']", 'process')).toBe(
      `"parent_ref" IN (SELECT "id" FROM "process" WHERE "binary_ref" IN (SELECT "id" FROM "file" WHERE "name" = 'cmd.exe'))`,
    )
  })

  it('follows reference lists through the reflist table', () => {
    expect(stixToSql("[email-message:to_refs[*].value = 'a@example.com']", 'email-message')).toBe(
      `"id" IN (SELECT "source_ref" FROM "__reflist" WHERE "ref_name" = 'to_refs' AND "target_ref" IN (SELECT "id" FROM "email-addr" WHERE "value" = 'a@example.com'))`,
    )
  })

  it('picks the first reference target that has a table', () => {
    const schema = createSchemaContext({ tables: [ipv6Table, trafficTable] })
    expect(stixToSql("[network-traffic:src_ref.value = '::1']", 'network-traffic', { schema })).toBe(
      `"src_ref" IN (SELECT "id" FROM "ipv6-addr" WHERE "value" = '::1')`,
    )
  })

  it('rejects references with no target table', () => {
    const schema = createSchemaContext({ tables: [trafficTable] })
    expect(() => stixToSql("[network-traffic:src_ref.value = '::1']", 'network-traffic', { schema })).toThrow(
      InvalidPathError,
    )
  })

  it('rejects paths that end in a reference list', () => {
    expect(() => stixToSql("[email-message:to_refs = 'x']", 'email-message')).toThrow(InvalidPathError)
  })

  it('compares a reference column directly', () => {
    expect(stixToSql("[network-traffic:src_ref = 'ipv4-addr--1']", 'network-traffic')).toBe(
      `"src_ref" = 'ipv4-addr--1'`,
    )
  })

  // --- Errors ---

  it.each([
    "[ipv4-addr:value = ]",
    "[ipv4-addr:value = '1.1.1.1'",
    "[ipv4-addr:value @ '1.1.1.1']",
    "ipv4-addr:value = '1.1.1.1'",
    "[ipv4-addr:value = '1.1.1.1'] AND",
  ])('rejects %s', (pattern) => {
    expect(() => stixToSql(pattern, 'ipv4-addr')).toThrow(PatternSyntaxError)
  })

  it('reports the pattern in syntax errors', () => {
    try {
      stixToSql('[ipv4-addr:value = ]', 'ipv4-addr')
      expect.fail('Expected PatternSyntaxError')
    } catch (err) {
      expect(err).toBeInstanceOf(PatternSyntaxError)
      const e = err as PatternSyntaxError
      expect(e.code).toBe('PATTERN_SYNTAX')
      expect(e.pattern).toBe('[ipv4-addr:value = ]')
      expect(e.position).toBe(19)
    }
  })

  it('rejects an unsafe type name', () => {
    expect(() => stixToSql("[ipv4-addr:value = '1']", 'ipv4"addr')).toThrow(InvalidIdentifierError)
  })
})

describe('patternFilter', () => {
  it('wraps the compiled condition in a filter', () => {
    const query = new Query('ipv4-addr').append(patternFilter("[ipv4-addr:value = '9.9.9.9']", 'ipv4-addr'))
    expect(query.render()).toEqual({ sql: `SELECT * FROM "ipv4-addr" WHERE ("value" = '9.9.9.9')`, params: [] })
  })

  it('leaves the query unfiltered when nothing applies', () => {
    const query = new Query('process').append(patternFilter("[ipv4-addr:value = '9.9.9.9']", 'process'))
    expect(query.render().sql).toBe('SELECT * FROM "process"')
  })
})
