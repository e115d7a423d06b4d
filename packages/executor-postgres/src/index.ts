import type { DbExecutor } from '@stixql/query'
import { PG_FUNCTION_DDL } from '@stixql/query'
import { ConnectionError, ExecutionError } from '@stixql/validation'
import { Pool, types } from 'pg'

// Parse NUMERIC/DECIMAL and INT8 as JavaScript numbers instead of strings
types.setTypeParser(1700, parseFloat) // numeric / decimal
types.setTypeParser(20, Number) // int8 / bigint, e.g. COUNT(*)

export interface PostgresExecutorConfig {
  readonly connectionString?: string | undefined
  readonly host?: string | undefined
  readonly port?: number | undefined
  readonly database?: string | undefined
  readonly user?: string | undefined
  readonly password?: string | undefined
  readonly ssl?: boolean | Record<string, unknown> | undefined
  readonly max?: number | undefined
  readonly timeoutMs?: number | undefined
}

export interface PostgresExecutor extends DbExecutor {
  /** Create the `stixql_common` schema and the pattern helper functions */
  installFunctions(): Promise<void>
}

// SQLSTATE codes
const UNDEFINED_TABLE = '42P01'
const UNDEFINED_COLUMN = '42703'

export function createPostgresExecutor(config: PostgresExecutorConfig): PostgresExecutor {
  const pool = new Pool({
    connectionString: config.connectionString,
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    ssl: config.ssl,
    max: config.max,
    statement_timeout: config.timeoutMs,
  })

  return {
    async execute(sql: string, params: unknown[]): Promise<Record<string, unknown>[]> {
      try {
        const result = await pool.query<Record<string, unknown>>(sql, params)
        return result.rows
      } catch (err) {
        throw toExecutionError(err, sql, params)
      }
    },

    async installFunctions(): Promise<void> {
      for (const stmt of PG_FUNCTION_DDL) {
        try {
          await pool.query(stmt)
        } catch (err) {
          throw toExecutionError(err, stmt, [])
        }
      }
    },

    async ping(): Promise<void> {
      try {
        await pool.query('SELECT 1')
      } catch (err) {
        throw new ConnectionError('PostgreSQL ping failed', { url: config.connectionString }, asError(err))
      }
    },

    async close(): Promise<void> {
      await pool.end()
    },
  }
}

function asError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err))
}

function toExecutionError(err: unknown, sql: string, params: unknown[]): ExecutionError {
  const cause = asError(err)
  const code = 'code' in cause ? cause.code : undefined
  if (code === UNDEFINED_TABLE) {
    const table = /relation "([^"]+)" does not exist/.exec(cause.message)?.[1] ?? ''
    return new ExecutionError({ code: 'UNKNOWN_TABLE', dialect: 'postgres', sql, table }, cause)
  }
  if (code === UNDEFINED_COLUMN) {
    const column = /column "?([^"\s]+)"? does not exist/.exec(cause.message)?.[1] ?? ''
    return new ExecutionError({ code: 'UNKNOWN_COLUMN', dialect: 'postgres', sql, column }, cause)
  }
  return new ExecutionError({ code: 'QUERY_FAILED', dialect: 'postgres', sql, params: [...params] }, cause)
}

export type { DbExecutor } from '@stixql/query'
