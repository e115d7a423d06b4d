import type { DialectName } from '@stixql/validation'
import type { SqlDialect } from '../types/interfaces.js'
import { clickhouseDialect } from './clickhouse.js'
import { postgresDialect } from './postgres.js'
import { sqliteDialect } from './sqlite.js'

const DIALECTS: Record<DialectName, SqlDialect> = {
  sqlite: sqliteDialect,
  postgres: postgresDialect,
  clickhouse: clickhouseDialect,
}

export function getDialect(name: DialectName): SqlDialect {
  return DIALECTS[name]
}
