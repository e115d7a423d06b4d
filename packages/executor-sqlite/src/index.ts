import type { DbExecutor } from '@stixql/query'
import { ConnectionError, ExecutionError } from '@stixql/validation'
import Database from 'better-sqlite3'
import { registerFunctions } from './functions.js'

export interface SqliteExecutorConfig {
  /** Database file, or `:memory:` */
  readonly filename: string
  readonly readonly?: boolean | undefined
  /** How long to wait on a locked database */
  readonly timeoutMs?: number | undefined
}

export interface SqliteExecutor extends DbExecutor {
  /** The underlying connection, for loading data outside the query path */
  readonly db: Database.Database
}

export function createSqliteExecutor(config: SqliteExecutorConfig): SqliteExecutor {
  let db: Database.Database
  try {
    // better-sqlite3 rejects `timeout: undefined`
    db = new Database(config.filename, {
      readonly: config.readonly ?? false,
      ...(config.timeoutMs !== undefined ? { timeout: config.timeoutMs } : {}),
    })
  } catch (err) {
    throw new ConnectionError('SQLite open failed', { filename: config.filename }, asError(err))
  }
  registerFunctions(db)

  return {
    db,

    async execute(sql: string, params: unknown[]): Promise<Record<string, unknown>[]> {
      try {
        const stmt = db.prepare<unknown[], Record<string, unknown>>(sql)
        const bound = params.map(bindable)
        if (stmt.reader) {
          return stmt.all(...bound)
        }
        stmt.run(...bound)
        return []
      } catch (err) {
        throw toExecutionError(err, sql, params)
      }
    },

    async ping(): Promise<void> {
      try {
        db.prepare('SELECT 1').get()
      } catch (err) {
        throw new ConnectionError('SQLite ping failed', { filename: config.filename }, asError(err))
      }
    },

    async close(): Promise<void> {
      db.close()
    },
  }
}

/** SQLite has no boolean type */
function bindable(value: unknown): unknown {
  return typeof value === 'boolean' ? (value ? 1 : 0) : value
}

function asError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err))
}

function toExecutionError(err: unknown, sql: string, params: unknown[]): ExecutionError {
  const cause = asError(err)
  const table = /no such table: (\S+)/.exec(cause.message)?.[1]
  if (table !== undefined) {
    return new ExecutionError({ code: 'UNKNOWN_TABLE', dialect: 'sqlite', sql, table }, cause)
  }
  const column = /no such column: (\S+)/.exec(cause.message)?.[1]
  if (column !== undefined) {
    return new ExecutionError({ code: 'UNKNOWN_COLUMN', dialect: 'sqlite', sql, column }, cause)
  }
  return new ExecutionError({ code: 'QUERY_FAILED', dialect: 'sqlite', sql, params: [...params] }, cause)
}

export { inSubnet, likeBinary, match, matchBinary, registerFunctions } from './functions.js'
export type { DbExecutor } from '@stixql/query'
