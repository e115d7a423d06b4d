import { createClient } from '@clickhouse/client'
import type { DbExecutor } from '@stixql/query'
import { ConnectionError, ExecutionError } from '@stixql/validation'

export interface ClickHouseExecutorConfig {
  readonly url?: string | undefined
  readonly username?: string | undefined
  readonly password?: string | undefined
  readonly database?: string | undefined
  readonly timeoutMs?: number | undefined
}

export function createClickHouseExecutor(config: ClickHouseExecutorConfig): DbExecutor {
  const settings: Record<string, number | string | boolean> = {}
  if (config.timeoutMs !== undefined) {
    settings.max_execution_time = Math.ceil(config.timeoutMs / 1000)
  }

  const client = createClient({
    url: config.url,
    username: config.username,
    password: config.password,
    database: config.database,
    clickhouse_settings: settings,
  })

  return {
    async execute(sql: string, params: unknown[]): Promise<Record<string, unknown>[]> {
      try {
        // Placeholders are rendered as {p1:Type}, {p2:Type}, ...
        const queryParams: Record<string, unknown> = {}
        for (let i = 0; i < params.length; i++) {
          queryParams[`p${String(i + 1)}`] = params[i]
        }

        const result = await client.query({
          query: sql,
          query_params: queryParams,
          format: 'JSONEachRow',
        })

        return await result.json<Record<string, unknown>>()
      } catch (err) {
        throw toExecutionError(err, sql, params)
      }
    },

    async ping(): Promise<void> {
      let result: Awaited<ReturnType<typeof client.ping>>
      try {
        result = await client.ping()
      } catch (err) {
        throw new ConnectionError('ClickHouse ping failed', { url: config.url }, asError(err))
      }
      if (!result.success) {
        throw new ConnectionError('ClickHouse ping failed', { url: config.url }, result.error)
      }
    },

    async close(): Promise<void> {
      await client.close()
    },
  }
}

function asError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err))
}

/** ClickHouse server errors carry their symbolic name in `type`, e.g. `UNKNOWN_TABLE`. */
function toExecutionError(err: unknown, sql: string, params: unknown[]): ExecutionError {
  const cause = asError(err)
  const type = 'type' in cause ? cause.type : undefined
  if (type === 'UNKNOWN_TABLE') {
    const table = /Table (?:[\w-]+\.)?`?([\w-]+)`? does(?:n't| not) exist/.exec(cause.message)?.[1] ?? ''
    return new ExecutionError({ code: 'UNKNOWN_TABLE', dialect: 'clickhouse', sql, table }, cause)
  }
  if (type === 'UNKNOWN_IDENTIFIER') {
    const column = /(?:identifier|Missing columns:) [`']([^`']+)[`']/.exec(cause.message)?.[1] ?? ''
    return new ExecutionError({ code: 'UNKNOWN_COLUMN', dialect: 'clickhouse', sql, column }, cause)
  }
  return new ExecutionError({ code: 'QUERY_FAILED', dialect: 'clickhouse', sql, params: [...params] }, cause)
}

export type { DbExecutor } from '@stixql/query'
