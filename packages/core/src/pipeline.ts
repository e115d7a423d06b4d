import type { DataResult, DebugLogEntry, DialectName, QueryResult, QueryResultMeta } from '@stixql/validation'
import { ExecutionError, InvalidQueryError, validateName, validatePath } from '@stixql/validation'

import { debugEntry, withDebugLog } from './debug/logger.js'
import { planDeref } from './deref/planner.js'
import { getDialect } from './dialects/index.js'
import type { SchemaContext } from './metadata/context.js'
import { introspectSchema } from './metadata/providers.js'
import { SchemaRegistry } from './metadata/registry.js'
import { patternFilter } from './pattern/translate.js'
import { Query } from './query/query.js'
import {
  aggregate,
  aggregation,
  column,
  count as countStage,
  group as groupBy,
  limit as limitStage,
  offset as offsetStage,
  projection,
} from './query/stages.js'
import type { AggregateSpec, Stage } from './query/types.js'
import { resolvePath } from './resolution/pathResolver.js'
import { autoAggregation } from './stix/props.js'
import type { RefTypeTable } from './stix/refTypes.js'
import type { DbExecutor, SchemaProvider, SqlDialect } from './types/interfaces.js'

// ── Public Types ───────────────────────────────────────────────

export interface CreateStixStoreOptions {
  readonly executor: DbExecutor
  readonly dialect: DialectName
  /** Defaults to reading the live catalog through the executor */
  readonly schemaProvider?: SchemaProvider | undefined
  readonly refTypes?: RefTypeTable | undefined
  readonly validateConnection?: boolean | undefined
}

export interface CallOptions {
  /** `sql-only` renders the statement and returns it without executing */
  readonly executeMode?: 'execute' | 'sql-only' | undefined
  readonly debug?: boolean | undefined
}

export interface PageOptions extends CallOptions {
  readonly limit?: number | undefined
  readonly offset?: number | undefined
}

export interface LookupOptions extends PageOptions {
  /** Join referenced objects in; defaults to true */
  readonly deref?: boolean | undefined
  /** Columns or dereferenced `ref.prop` paths to return, in order */
  readonly paths?: readonly string[] | undefined
}

export interface GroupOptions extends PageOptions {
  readonly pattern?: string | undefined
}

export interface StixStore {
  /** Render and execute a hand-built query */
  run<T = Record<string, unknown>>(query: Query, options?: CallOptions): Promise<QueryResult<T>>
  /** Rows of the `scoType` table that match a STIX pattern */
  extract(scoType: string, pattern: string, options?: PageOptions): Promise<QueryResult>
  lookup(table: string, options?: LookupOptions): Promise<QueryResult>
  /** Values of one object path (possibly through references) for every row of `table` */
  values(path: string, table: string, options?: CallOptions): Promise<QueryResult>
  count(table: string, pattern?: string | undefined, options?: CallOptions): Promise<QueryResult>
  /** One row per distinct value of `by`, every other column aggregated */
  group(table: string, by: string, options?: GroupOptions): Promise<QueryResult>
  schema(): SchemaContext
  reloadSchema(): Promise<void>
  ping(): Promise<void>
  close(): Promise<void>
}

// ── createStixStore ────────────────────────────────────────────

export async function createStixStore(options: CreateStixStoreOptions): Promise<StixStore> {
  const { executor } = options
  const dialect = getDialect(options.dialect)

  if (options.validateConnection !== false) {
    await executor.ping()
  }

  const provider = options.schemaProvider ?? introspectSchema(executor, dialect)
  const registry = await SchemaRegistry.create(provider, options.refTypes)

  let closed = false
  const env = { executor, dialect }

  const guard = (): SchemaContext => {
    if (closed) {
      throw new ExecutionError({ code: 'EXECUTOR_CLOSED' })
    }
    return registry.getSnapshot()
  }

  return {
    async run<T = Record<string, unknown>>(query: Query, opts: CallOptions = {}) {
      guard()
      const result = await runQuery(env, query, 'data', opts, [])
      return result as QueryResult<T>
    },

    async extract(scoType, pattern, opts = {}) {
      const schema = guard()
      validateName(scoType)
      requireTable(schema, scoType)
      const log: DebugLogEntry[] = []
      const t0 = Date.now()
      const where = patternFilter(pattern, scoType, { dialect, schema })
      if (opts.debug === true) log.push(debugEntry('compile', 'Pattern compiled', t0, { pattern }))
      const query = new Query(scoType).append(where).extend(page(opts, dialect))
      return runQuery(env, query, 'data', opts, log)
    },

    async lookup(table, opts = {}) {
      const schema = guard()
      validateName(table)
      requireTable(schema, table)
      const log: DebugLogEntry[] = []
      const query = new Query(table)

      if (opts.deref !== false) {
        const t0 = Date.now()
        const plan = planDeref(schema, table, { paths: opts.paths })
        query.extend(plan.joins)
        if (plan.projection !== undefined) query.append(plan.projection)
        if (opts.debug === true) log.push(debugEntry('deref', `${String(plan.joins.length)} joins`, t0))
      } else if (opts.paths !== undefined && opts.paths.length > 0 && !opts.paths.includes('*')) {
        query.append(projection(opts.paths.map((p) => column(p, table))))
      }

      return runQuery(env, query.extend(page(opts, dialect)), 'data', opts, log)
    },

    async values(path, table, opts = {}) {
      const schema = guard()
      validateName(table)
      requireTable(schema, table)
      const log: DebugLogEntry[] = []
      const t0 = Date.now()
      const resolved = resolvePath(schema, table, undefined, path)
      if (resolved.joins.length === 0 && schema.index.getColumn(table, resolved.column) === undefined) {
        throw new InvalidQueryError(`Unknown column '${resolved.column}' in '${table}'`)
      }
      if (opts.debug === true) {
        log.push(debugEntry('path-resolution', `Resolved ${path}`, t0, { joins: resolved.joins.length }))
      }
      const prop = path.slice(path.lastIndexOf(':') + 1)
      const query = new Query(table)
        .extend(resolved.joins)
        .append(projection([column(resolved.column, resolved.table, prop)]))
      return runQuery(env, query, 'data', opts, log)
    },

    async count(table, pattern, opts = {}) {
      const schema = guard()
      validateName(table)
      requireTable(schema, table)
      const query = new Query(table)
      if (pattern !== undefined && pattern !== '') {
        query.append(patternFilter(pattern, schema.index.tableType(table), { dialect, schema }))
      }
      return runQuery(env, query.append(countStage()), 'count', opts, [])
    },

    async group(table, by, opts = {}) {
      const schema = guard()
      validateName(table)
      validatePath(by)
      requireTable(schema, table)
      const scoType = schema.index.tableType(table)
      const col = by.slice(by.lastIndexOf(':') + 1)
      if (schema.index.getColumn(table, col) === undefined) {
        throw new InvalidQueryError(`Unknown column '${col}' in '${table}'`)
      }

      const stages: Stage[] = []
      if (opts.pattern !== undefined && opts.pattern !== '') {
        stages.push(patternFilter(opts.pattern, scoType, { dialect, schema }))
      }
      stages.push(groupBy([col]), aggregation(groupAggregates(schema, table, scoType, col)))
      stages.push(...page(opts, dialect))
      return runQuery(env, new Query(table).extend(stages), 'data', opts, [])
    },

    schema() {
      return guard()
    },

    async reloadSchema() {
      guard()
      await registry.reload()
    },

    async ping() {
      guard()
      await executor.ping()
    },

    async close() {
      closed = true
      await executor.close()
    },
  }
}

// ── Query Pipeline ─────────────────────────────────────────────

interface Env {
  executor: DbExecutor
  dialect: SqlDialect
}

async function runQuery(
  env: Env,
  query: Query,
  mode: 'data' | 'count',
  opts: CallOptions,
  log: DebugLogEntry[],
): Promise<QueryResult> {
  const debug = opts.debug === true
  const { dialect } = env

  const t0 = Date.now()
  const { sql, params } = query.render(dialect.placeholder)
  const renderMs = Date.now() - t0
  if (debug) log.push(debugEntry('render', `Rendered (${dialect.name})`, t0, { sql }))

  const table = query.table ?? ''
  if (opts.executeMode === 'sql-only') {
    const meta: QueryResultMeta = { dialect: dialect.name, table, timing: { renderMs } }
    return withDebugLog({ kind: 'sql', sql, params, meta }, debug, log)
  }

  const t1 = Date.now()
  let rows: Record<string, unknown>[]
  try {
    rows = await env.executor.execute(sql, params)
  } catch (err) {
    throw toExecError(err, dialect.name, sql, params)
  }
  const executionMs = Date.now() - t1
  if (debug) log.push(debugEntry('execution', `Executed (${String(rows.length)} rows)`, t1))

  const meta: QueryResultMeta = { dialect: dialect.name, table, timing: { renderMs, executionMs } }
  if (mode === 'count') {
    return withDebugLog({ kind: 'count', count: extractCount(rows), meta }, debug, log)
  }
  const result: DataResult = { kind: 'data', data: rows, meta }
  return withDebugLog(result, debug, log)
}

// ── Helpers ────────────────────────────────────────────────────

function requireTable(schema: SchemaContext, table: string): void {
  if (!schema.index.hasTable(table)) {
    throw new InvalidQueryError(`Unknown table '${table}'`)
  }
}

/** Largest LIMIT that reads as "no limit" on backends that need one before OFFSET */
const NO_LIMIT = Number.MAX_SAFE_INTEGER

function page(opts: PageOptions, dialect: SqlDialect): Stage[] {
  const stages: Stage[] = []
  if (opts.limit !== undefined) {
    stages.push(limitStage(opts.limit))
  } else if (opts.offset !== undefined && dialect.offsetNeedsLimit) {
    stages.push(limitStage(NO_LIMIT))
  }
  if (opts.offset !== undefined) stages.push(offsetStage(opts.offset))
  return stages
}

/** `MIN("type")` keeps the type column, then every other column is aggregated by its kind. */
function groupAggregates(schema: SchemaContext, table: string, scoType: string, by: string): AggregateSpec[] {
  const aggs: AggregateSpec[] = []
  const cols = schema.index.getTable(table)?.columns ?? []
  if (by !== 'type' && cols.some((c) => c.name === 'type')) {
    aggs.push(aggregate('MIN', 'type', 'type'))
  }
  for (const c of cols) {
    if (c.name === by) continue
    const agg = autoAggregation(scoType, c.name, c.type ?? '')
    if (agg !== null) aggs.push(agg)
  }
  return aggs
}

function extractCount(rows: Record<string, unknown>[]): number {
  const first = rows[0]
  if (first === undefined) return 0
  const v = Object.values(first)[0]
  if (typeof v === 'number') return v
  if (typeof v === 'bigint') return Number(v)
  if (typeof v === 'string') return Number.parseInt(v, 10) || 0
  return 0
}

function toExecError(err: unknown, dialect: DialectName, sql: string, params: unknown[]): ExecutionError {
  if (err instanceof ExecutionError) return err
  const cause = err instanceof Error ? err : new Error(String(err))
  return new ExecutionError({ code: 'QUERY_FAILED', dialect, sql, params: [...params] }, cause)
}
