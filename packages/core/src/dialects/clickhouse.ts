import type { SqlDialect } from '../types/interfaces.js'

// --- ClickHouse Dialect ---

/** ClickHouse parameter type for a bound value, used in `{pN:Type}` placeholders. */
export function chValueType(value: unknown): string {
  if (typeof value === 'boolean') return 'Bool'
  if (typeof value === 'bigint') return 'Int64'
  if (typeof value === 'number') return Number.isInteger(value) ? 'Int64' : 'Float64'
  return 'String'
}

export const clickhouseDialect: SqlDialect = {
  name: 'clickhouse',
  placeholder: (position, value) => `{p${String(position)}:${chValueType(value)}}`,
  offsetNeedsLimit: false,
  // Backslash is an escape character inside ClickHouse string literals
  quoteString: (value) => `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`,
  inSubnet: (addr, subnet) => `isIPAddressInRange(${addr}, ${subnet})`,
  match: (pattern, value) => `match(${value}, ${pattern})`,
  matchBase64: (pattern, value) => `match(base64Decode(${value}), ${pattern})`,
  likeBase64: (pattern, value) => `(base64Decode(${value}) LIKE ${pattern})`,
  catalogQuery:
    'SELECT "table" AS "table_name", "name" AS "column_name", "type" AS "column_type"' +
    ' FROM system.columns WHERE "database" = currentDatabase()' +
    ' ORDER BY "table", "position"',
  symtableQuery: 'SELECT "name", "type" FROM "__symtable"',
}
