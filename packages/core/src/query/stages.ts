import { InvalidOperatorError, InvalidQueryError, validateName, validatePath } from '@stixql/validation'
import { Query } from './query.js'
import type {
  AggregateFunction,
  AggregateSpec,
  Aggregation,
  CoalescedColumn,
  Column,
  ComparisonOperator,
  CompiledPredicate,
  CompoundPredicate,
  Condition,
  CountStage,
  CountUniqueStage,
  Filter,
  Group,
  Join,
  JoinOperator,
  JoinType,
  Limit,
  Offset,
  Order,
  OrderItem,
  Predicate,
  PredicateOperator,
  Projection,
  Scalar,
  SelectItem,
  SortDirection,
  TableStage,
  UniqueStage,
} from './types.js'
import {
  AGGREGATE_FUNCTIONS,
  COMPARISON_OPERATORS,
  JOIN_OPERATORS,
  JOIN_TYPES,
  PREDICATE_OPERATORS,
} from './types.js'

// Every constructor validates names before storing them; bound values are kept apart.

// --- Columns ---

export function column(name: string, table?: string | undefined, alias?: string | undefined): Column {
  if (name !== '*') validatePath(name)
  if (table !== undefined) validateName(table)
  if (alias !== undefined) validatePath(alias)
  return { kind: 'column', name, table, alias }
}

export function coalesce(columns: (string | Column)[], alias: string): CoalescedColumn {
  if (columns.length === 0) {
    throw new InvalidQueryError('COALESCE needs at least one column')
  }
  validatePath(alias)
  return { kind: 'coalesce', columns: columns.map(toColumn), alias }
}

function toColumn(col: string | Column): Column {
  return typeof col === 'string' ? column(col) : column(col.name, col.table, col.alias)
}

function toSelectItem(item: string | SelectItem): SelectItem {
  if (typeof item === 'string') return column(item)
  return item.kind === 'coalesce' ? coalesce(item.columns, item.alias) : toColumn(item)
}

// --- Table ---

export function table(name: string): TableStage {
  validateName(name)
  return { kind: 'table', name }
}

// --- Predicates ---

export type PredicateValue = Scalar | null | Scalar[] | Column | Query

const NULL_TEXT = new Set(['null', 'NULL'])

function isComparisonOperator(op: string): op is ComparisonOperator {
  return (COMPARISON_OPERATORS as readonly string[]).includes(op)
}

/**
 * Single comparison `lhs op rhs`.
 *
 * - `null`, `'null'` and `'NULL'` become `IS NULL` / `IS NOT NULL`; other operators are rejected.
 * - A `[*]` list property is stored as serialized text, so `=` and `!=` turn into
 *   `LIKE` / `NOT LIKE` against the value wrapped in `%` wildcards.
 */
export function predicate(lhs: string | Column, op: string, rhs: PredicateValue): Predicate {
  if (!isComparisonOperator(op)) {
    throw new InvalidOperatorError('INVALID_COMPARISON_OPERATOR', op, COMPARISON_OPERATORS)
  }

  let left = toColumn(lhs)
  const isList = left.name.endsWith('[*]')
  if (isList) {
    left = { ...left, name: left.name.slice(0, -3) }
  }

  if (rhs === null || (typeof rhs === 'string' && NULL_TEXT.has(rhs))) {
    if (op === '=' || op === 'IS') {
      return { kind: 'predicate', lhs: left, op: 'IS', rhs: { type: 'null' } }
    }
    if (op === '!=' || op === '<>' || op === 'IS NOT') {
      return { kind: 'predicate', lhs: left, op: 'IS NOT', rhs: { type: 'null' } }
    }
    throw new InvalidOperatorError('INVALID_COMPARISON_OPERATOR', op, ['=', '!=', '<>', 'IS', 'IS NOT'])
  }

  if (Array.isArray(rhs)) {
    if (op !== 'IN') {
      throw new InvalidQueryError(`Operator ${op} does not take a list of values`)
    }
    if (rhs.length === 0) {
      throw new InvalidQueryError(`IN on '${left.name}' needs at least one value`)
    }
    return { kind: 'predicate', lhs: left, op, rhs: { type: 'list', values: [...rhs] } }
  }

  if (rhs instanceof Query) {
    return { kind: 'predicate', lhs: left, op, rhs: { type: 'query', query: rhs } }
  }

  if (typeof rhs === 'object') {
    return { kind: 'predicate', lhs: left, op, rhs: { type: 'column', column: toColumn(rhs) } }
  }

  if (op === 'IN') {
    throw new InvalidQueryError('IN needs a list of values or a subquery')
  }

  if (isList) {
    const wrapped = `%${String(rhs)}%`
    const listOp = op === '=' ? 'LIKE' : op === '!=' ? 'NOT LIKE' : op
    return { kind: 'predicate', lhs: left, op: listOp, rhs: { type: 'value', value: wrapped } }
  }

  return { kind: 'predicate', lhs: left, op, rhs: { type: 'value', value: rhs } }
}

function isPredicateOperator(op: string): op is PredicateOperator {
  return (PREDICATE_OPERATORS as readonly string[]).includes(op)
}

/** Binary AND/OR node over two conditions. */
export function compound(lhs: Condition, op: string, rhs: Condition): CompoundPredicate {
  if (!isPredicateOperator(op)) {
    throw new InvalidOperatorError('INVALID_PREDICATE_OPERATOR', op, PREDICATE_OPERATORS)
  }
  return { kind: 'compound', lhs, op, rhs }
}

export function compiled(sql: string): CompiledPredicate {
  return { kind: 'compiled', sql }
}

// --- Filter ---

export function filter(conditions: Condition[], op = 'AND'): Filter {
  if (!isPredicateOperator(op)) {
    throw new InvalidOperatorError('INVALID_PREDICATE_OPERATOR', op, PREDICATE_OPERATORS)
  }
  return { kind: 'filter', conditions: [...conditions], op }
}

/** Copy of `f` with every unqualified left-hand column qualified by `table`. */
export function withTable(f: Filter, table: string): Filter {
  validateName(table)
  return { ...f, conditions: f.conditions.map((c) => qualify(c, table)) }
}

function qualify(cond: Condition, table: string): Condition {
  switch (cond.kind) {
    case 'predicate':
      return cond.lhs.table === undefined ? { ...cond, lhs: { ...cond.lhs, table } } : cond
    case 'compound':
      return { ...cond, lhs: qualify(cond.lhs, table), rhs: qualify(cond.rhs, table) }
    case 'compiled':
      return cond
  }
}

// --- Join ---

export interface JoinOptions {
  how?: JoinType | undefined
  alias?: string | undefined
  /** Left-hand table or alias; defaults to the previous join, or the base table */
  lhs?: string | undefined
}

function isJoinOperator(op: string): op is JoinOperator {
  return (JOIN_OPERATORS as readonly string[]).includes(op)
}

function joinType(how: string): JoinType {
  const upper = how.toUpperCase()
  const found = JOIN_TYPES.find((t) => t === upper)
  if (found === undefined) {
    throw new InvalidQueryError(`Invalid join type '${how}' (allowed: ${JOIN_TYPES.join(', ')})`)
  }
  return found
}

function joinTarget(tableName: string, options: JoinOptions): Pick<Join, 'table' | 'alias' | 'how' | 'lhs'> {
  validateName(tableName)
  if (options.alias !== undefined) validateName(options.alias)
  if (options.lhs !== undefined) validateName(options.lhs)
  return { table: tableName, alias: options.alias, how: joinType(options.how ?? 'INNER'), lhs: options.lhs }
}

/** `<how> JOIN "table" ON "<lhs>"."left" <op> "<table>"."right"` */
export function join(tableName: string, left: string, op: string, right: string, options: JoinOptions = {}): Join {
  if (!isJoinOperator(op)) {
    throw new InvalidOperatorError('INVALID_JOIN_OPERATOR', op, JOIN_OPERATORS)
  }
  validatePath(left)
  validatePath(right)
  return { kind: 'join', ...joinTarget(tableName, options), on: { type: 'columns', left, op, right } }
}

/** Join on an arbitrary condition; columns in it should be table-qualified. */
export function joinOn(tableName: string, condition: Condition, options: JoinOptions = {}): Join {
  return { kind: 'join', ...joinTarget(tableName, options), on: { type: 'condition', condition } }
}

// --- Grouping and aggregation ---

export function group(columns: (string | Column)[]): Group {
  return { kind: 'group', columns: columns.map(toColumn) }
}

function isAggregateFunction(fn: string): fn is AggregateFunction {
  return (AGGREGATE_FUNCTIONS as readonly string[]).includes(fn)
}

/** One aggregate expression; `NUNIQUE` renders as `COUNT(DISTINCT col)`. Alias defaults to the lower-cased function. */
export function aggregate(fn: string, col?: string | Column | null | undefined, alias?: string | undefined): AggregateSpec {
  if (!isAggregateFunction(fn)) {
    throw new InvalidOperatorError('INVALID_AGGREGATE_FUNCTION', fn, AGGREGATE_FUNCTIONS)
  }
  const target = col === null || col === undefined || col === '*' ? undefined : toColumn(col)
  const name = alias ?? fn.toLowerCase()
  validatePath(name)
  return { fn, column: target, alias: name }
}

export type AggregateTuple = [fn: string, column?: string | Column | null, alias?: string]

export function aggregation(aggs: (AggregateSpec | AggregateTuple)[]): Aggregation {
  return {
    kind: 'aggregation',
    aggs: aggs.map((a) => (Array.isArray(a) ? aggregate(a[0], a[1], a[2]) : aggregate(a.fn, a.column, a.alias))),
  }
}

// --- Result shaping ---

export function projection(columns: (string | SelectItem)[]): Projection {
  return { kind: 'projection', columns: columns.map(toSelectItem) }
}

export type OrderInput = string | Column | [string | Column, string]

export function order(items: OrderInput[]): Order {
  return { kind: 'order', items: items.map(toOrderItem) }
}

function toOrderItem(item: OrderInput): OrderItem {
  if (!Array.isArray(item)) {
    return { column: toColumn(item), direction: 'ASC' }
  }
  const [col, dir] = item
  return { column: toColumn(col), direction: sortDirection(dir) }
}

function sortDirection(dir: string): SortDirection {
  const upper = dir.toUpperCase()
  if (upper !== 'ASC' && upper !== 'DESC') {
    throw new InvalidQueryError(`Invalid sort direction '${dir}'`)
  }
  return upper
}

function rowCount(what: 'LIMIT' | 'OFFSET', n: number): number {
  if (!Number.isSafeInteger(n) || n < 0) {
    throw new InvalidQueryError(`${what} must be a non-negative integer, got ${String(n)}`)
  }
  return n
}

export function limit(n: number): Limit {
  return { kind: 'limit', count: rowCount('LIMIT', n) }
}

export function offset(n: number): Offset {
  return { kind: 'offset', count: rowCount('OFFSET', n) }
}

export function count(): CountStage {
  return { kind: 'count' }
}

export function unique(): UniqueStage {
  return { kind: 'unique' }
}

export function countUnique(columns?: (string | SelectItem)[] | undefined): CountUniqueStage {
  return { kind: 'count-unique', columns: columns?.map(toSelectItem) }
}
