import type { DialectName, SchemaConfig } from '@stixql/validation'
import type { Placeholder } from '../query/types.js'

// --- DbExecutor (implemented by executor packages) ---

/**
 * Database executor interface.
 *
 * Error contract:
 * - `execute()` must throw `ExecutionError` on any failure: `UNKNOWN_TABLE` / `UNKNOWN_COLUMN`
 *   when the backend names the missing object, `QUERY_FAILED` otherwise.
 * - `ping()` must throw `ConnectionError` (code: `'CONNECTION_FAILED'`) on any failure.
 * - `close()` should attempt cleanup; failures may propagate as raw errors.
 */
export interface DbExecutor {
  execute(sql: string, params: unknown[]): Promise<Record<string, unknown>[]>
  ping(): Promise<void>
  close(): Promise<void>
}

// --- SchemaProvider ---

export interface SchemaProvider {
  load(): Promise<SchemaConfig>
}

// --- SqlDialect ---

/**
 * Backend-specific SQL fragments. Function-building members receive SQL text
 * that is already quoted (a `"column"` reference or a `'literal'`).
 */
export interface SqlDialect {
  readonly name: DialectName
  readonly placeholder: Placeholder
  /** OFFSET is only accepted after a LIMIT */
  readonly offsetNeedsLimit: boolean
  /** Quote text as a string literal the backend reads back unchanged */
  quoteString(value: string): string
  /** True when `addr` (an address or CIDR) lies inside `subnet` */
  inSubnet(addr: string, subnet: string): string
  /** Regular-expression search of `value` */
  match(pattern: string, value: string): string
  /** Regular-expression search of base64-encoded `value` after decoding */
  matchBase64(pattern: string, value: string): string
  /** LIKE on base64-encoded `value` after decoding */
  likeBase64(pattern: string, value: string): string
  /** Lists `table_name`, `column_name`, `column_type` for every table and view, in catalog order */
  readonly catalogQuery: string
  /** Reads `name`, `type` rows of the view-type symbol table */
  readonly symtableQuery: string
}
