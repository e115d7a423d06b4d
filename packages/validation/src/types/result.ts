import type { DialectName } from '../errors.js'

// --- Debug Log ---

export interface DebugLogEntry {
  timestamp: number
  phase: 'compile' | 'deref' | 'path-resolution' | 'render' | 'execution'
  message: string
  durationMs: number
  details?: Record<string, unknown> | undefined
}

// --- Results ---

export interface QueryResultMeta {
  dialect: DialectName
  table: string
  timing: {
    renderMs: number
    executionMs?: number | undefined
  }
}

export interface DataResult<T = Record<string, unknown>> {
  kind: 'data'
  data: T[]
  meta: QueryResultMeta
  debugLog?: DebugLogEntry[] | undefined
}

export interface CountResult {
  kind: 'count'
  count: number
  meta: QueryResultMeta
  debugLog?: DebugLogEntry[] | undefined
}

export interface SqlResult {
  kind: 'sql'
  sql: string
  params: unknown[]
  meta: QueryResultMeta
  debugLog?: DebugLogEntry[] | undefined
}

export type QueryResult<T = Record<string, unknown>> = DataResult<T> | CountResult | SqlResult
