import { InvalidQueryError } from '@stixql/validation'
import { quoteColumnRef, quoteIdent } from '../generator/fragments.js'
import type {
  AggregateSpec,
  Column,
  Condition,
  Filter,
  Join,
  Placeholder,
  Predicate,
  Projection,
  QueryParts,
  SelectItem,
} from './types.js'

// --- Render context ---

/**
 * Parameter sink shared by a statement and every subquery nested in it, so
 * ordinal placeholders keep counting across subqueries.
 */
export class RenderContext {
  readonly params: unknown[] = []
  private subqueries = 0
  private readonly placeholder: Placeholder

  constructor(placeholder: Placeholder) {
    this.placeholder = placeholder
  }

  bind(value: unknown): string {
    this.params.push(value)
    return typeof this.placeholder === 'string' ? this.placeholder : this.placeholder(this.params.length, value)
  }

  nextSubqueryAlias(): string {
    this.subqueries += 1
    return `s${String(this.subqueries)}`
  }
}

// --- Statement ---

/**
 * Assemble one SELECT. Clauses that bind values are rendered in text order
 * (FROM, JOIN, WHERE, HAVING) so parameter order matches placeholder order.
 */
export function renderParts(parts: QueryParts, ctx: RenderContext): string {
  const base = parts.base
  if (base === undefined) {
    throw new InvalidQueryError('Query has no base table')
  }

  const rest: string[] = []
  let baseName: string
  if (base.kind === 'table') {
    baseName = base.name
    rest.push(`FROM ${quoteIdent(base.name)}`)
  } else {
    baseName = ctx.nextSubqueryAlias()
    rest.push(`FROM (${base.renderInto(ctx)}) AS ${baseName}`)
  }

  for (const j of resolveJoins(baseName, parts.joins)) {
    rest.push(renderJoin(j, ctx))
  }

  const where = renderFilters(parts.where, ctx)
  if (where !== '') rest.push(`WHERE ${where}`)

  if (parts.groupBy !== undefined && parts.groupBy.columns.length > 0) {
    rest.push(`GROUP BY ${parts.groupBy.columns.map(plainColumn).join(', ')}`)
  }

  const having = renderFilters(parts.having, ctx)
  if (having !== '') rest.push(`HAVING ${having}`)

  const tail = rest.join(' ')
  const clauses = [selectClause(parts, tail)]

  if (parts.order !== undefined && parts.order.items.length > 0) {
    const items = parts.order.items.map((o) => `${plainColumn(o.column)} ${o.direction}`)
    clauses.push(`ORDER BY ${items.join(', ')}`)
  }
  if (parts.limit !== undefined) clauses.push(`LIMIT ${String(parts.limit)}`)
  if (parts.offset !== undefined) clauses.push(`OFFSET ${String(parts.offset)}`)

  return clauses.join(' ')
}

// --- SELECT list, DISTINCT and COUNT ---

function selectClause(parts: QueryParts, tail: string): string {
  const cols = selectList(parts, true)
  const grouped = parts.groupBy !== undefined || parts.aggs !== undefined

  if (parts.distinct && parts.count) {
    if (parts.proj !== undefined && !isStar(parts.proj)) {
      return `SELECT COUNT(DISTINCT ${selectList(parts, false)}) AS "count" ${tail}`
    }
    return `SELECT COUNT(*) AS "count" FROM (SELECT DISTINCT ${cols} ${tail}) AS tmp`
  }
  if (parts.distinct) {
    return `SELECT DISTINCT ${cols} ${tail}`
  }
  if (parts.count) {
    if (grouped) {
      return `SELECT COUNT(*) AS "count" FROM (SELECT ${cols} ${tail}) AS tmp`
    }
    return `SELECT COUNT(${selectList(parts, false)}) AS "count" ${tail}`
  }
  return `SELECT ${cols} ${tail}`
}

/** Projection columns, or else the group columns, followed by aggregates. */
function selectList(parts: QueryParts, aliases: boolean): string {
  const items: string[] =
    parts.proj !== undefined
      ? parts.proj.columns.map((c) => selectItem(c, aliases))
      : (parts.groupBy?.columns.map(plainColumn) ?? [])
  for (const agg of parts.aggs?.aggs ?? []) {
    items.push(aggregateExpr(agg))
  }
  return items.length > 0 ? items.join(', ') : '*'
}

function isStar(proj: Projection): boolean {
  return proj.columns.every((c) => c.kind === 'column' && c.name === '*' && c.table === undefined)
}

function selectItem(item: SelectItem, aliases: boolean): string {
  const expr =
    item.kind === 'coalesce' ? `COALESCE(${item.columns.map(plainColumn).join(', ')})` : plainColumn(item)
  return aliases && item.alias !== undefined ? `${expr} AS ${quoteIdent(item.alias)}` : expr
}

function aggregateExpr(agg: AggregateSpec): string {
  const col = agg.column !== undefined ? plainColumn(agg.column) : '*'
  const expr = agg.fn === 'NUNIQUE' ? `COUNT(DISTINCT ${col})` : `${agg.fn}(${col})`
  return `${expr} AS ${quoteIdent(agg.alias)}`
}

function plainColumn(col: Column): string {
  return quoteColumnRef(col.name, col.table)
}

// --- JOIN ---

interface ResolvedJoin extends Join {
  lhs: string
}

/** Fill in each join's implicit left-hand table without touching the stages. */
function resolveJoins(baseName: string, joins: readonly Join[]): ResolvedJoin[] {
  let prev = baseName
  return joins.map((j) => {
    const resolved = { ...j, lhs: j.lhs ?? prev }
    prev = j.alias ?? j.table
    return resolved
  })
}

function renderJoin(j: ResolvedJoin, ctx: RenderContext): string {
  const target = j.alias ?? j.table
  const head = `${j.how} JOIN ${quoteIdent(j.table)}${j.alias !== undefined ? ` AS ${quoteIdent(j.alias)}` : ''}`
  if (j.how === 'CROSS') {
    return head
  }
  if (j.on.type === 'columns') {
    return `${head} ON ${quoteColumnRef(j.on.left, j.lhs)} ${j.on.op} ${quoteColumnRef(j.on.right, target)}`
  }
  return `${head} ON ${renderCondition(j.on.condition, ctx)}`
}

// --- WHERE / HAVING ---

function renderFilters(filters: readonly Filter[], ctx: RenderContext): string {
  return filters
    .map((f) => renderFilter(f, ctx))
    .filter((text) => text !== '')
    .join(' AND ')
}

function renderFilter(f: Filter, ctx: RenderContext): string {
  const texts = f.conditions.map((c) => renderCondition(c, ctx)).filter((text) => text !== '')
  if (texts.length === 0) return ''
  const joined = texts.join(` ${f.op} `)
  return f.op === 'OR' ? `(${joined})` : joined
}

export function renderCondition(cond: Condition, ctx: RenderContext): string {
  switch (cond.kind) {
    case 'predicate':
      return renderPredicate(cond, ctx)
    case 'compiled':
      return cond.sql === '' ? '' : `(${cond.sql})`
    case 'compound': {
      const lhs = renderCondition(cond.lhs, ctx)
      const rhs = renderCondition(cond.rhs, ctx)
      if (lhs === '') return rhs
      if (rhs === '') return lhs
      return `(${lhs} ${cond.op} ${rhs})`
    }
  }
}

function renderPredicate(p: Predicate, ctx: RenderContext): string {
  const lhs = plainColumn(p.lhs)
  const rhs = p.rhs
  switch (rhs.type) {
    case 'null':
      return `(${lhs} ${p.op} NULL)`
    case 'value':
      return `(${lhs} ${p.op} ${ctx.bind(rhs.value)})`
    case 'list':
      return `(${lhs} ${p.op} (${rhs.values.map((v) => ctx.bind(v)).join(', ')}))`
    case 'column':
      return `(${lhs} ${p.op} ${plainColumn(rhs.column)})`
    case 'query':
      return `(${lhs} ${p.op} (${rhs.query.renderInto(ctx)}))`
  }
}
