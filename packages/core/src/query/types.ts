import type { Query } from './query.js'

// --- Values ---

/** A value bound as a positional parameter; never interpolated into SQL text. */
export type Scalar = string | number | bigint | boolean

/**
 * Fixed placeholder token (`?`, `%s`) or a function of the 1-based parameter
 * position and value (`$1`, `{p1:String}`).
 */
export type Placeholder = string | ((position: number, value: unknown) => string)

export interface RenderedSql {
  sql: string
  params: unknown[]
}

// --- Operators ---

export const COMPARISON_OPERATORS = ['=', '<>', '!=', '<', '>', '<=', '>=', 'LIKE', 'IN', 'IS', 'IS NOT'] as const
export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number]

export const PREDICATE_OPERATORS = ['AND', 'OR'] as const
export type PredicateOperator = (typeof PREDICATE_OPERATORS)[number]

export const JOIN_OPERATORS = ['=', '<>', '!=', '<', '>', '<=', '>='] as const
export type JoinOperator = (typeof JOIN_OPERATORS)[number]

export const JOIN_TYPES = ['INNER', 'OUTER', 'LEFT OUTER', 'CROSS'] as const
export type JoinType = (typeof JOIN_TYPES)[number]

export const AGGREGATE_FUNCTIONS = ['COUNT', 'SUM', 'MIN', 'MAX', 'AVG', 'NUNIQUE'] as const
export type AggregateFunction = (typeof AGGREGATE_FUNCTIONS)[number]

export type SortDirection = 'ASC' | 'DESC'

// --- Columns ---

export interface Column {
  kind: 'column'
  name: string
  table?: string | undefined
  alias?: string | undefined
}

/** `COALESCE(a, b, ...)` over equivalent columns of mutually exclusive joins. */
export interface CoalescedColumn {
  kind: 'coalesce'
  columns: Column[]
  alias: string
}

export type SelectItem = Column | CoalescedColumn

// --- Predicates ---

export type Operand =
  | { type: 'value'; value: Scalar }
  | { type: 'list'; values: Scalar[] }
  | { type: 'null' }
  | { type: 'column'; column: Column }
  | { type: 'query'; query: Query }

export interface Predicate {
  kind: 'predicate'
  lhs: Column
  /** `NOT LIKE` only arises from the list-property rewrite */
  op: ComparisonOperator | 'NOT LIKE'
  rhs: Operand
}

export interface CompoundPredicate {
  kind: 'compound'
  lhs: Condition
  op: PredicateOperator
  rhs: Condition
}

/** Boolean SQL text produced by the pattern compiler; empty when the pattern was elided. */
export interface CompiledPredicate {
  kind: 'compiled'
  sql: string
}

export type Condition = Predicate | CompoundPredicate | CompiledPredicate

// --- Stages ---

export interface TableStage {
  kind: 'table'
  name: string
}

export interface Filter {
  kind: 'filter'
  conditions: Condition[]
  op: PredicateOperator
}

export type JoinCondition =
  | { type: 'columns'; left: string; op: JoinOperator; right: string }
  | { type: 'condition'; condition: Condition }

export interface Join {
  kind: 'join'
  table: string
  alias?: string | undefined
  how: JoinType
  /** Left-hand table or alias; defaults to the previous join, or the base table */
  lhs?: string | undefined
  on: JoinCondition
}

export interface Group {
  kind: 'group'
  columns: Column[]
}

export interface AggregateSpec {
  fn: AggregateFunction
  /** Absent means `*` */
  column?: Column | undefined
  alias: string
}

export interface Aggregation {
  kind: 'aggregation'
  aggs: AggregateSpec[]
}

export interface Projection {
  kind: 'projection'
  columns: SelectItem[]
}

export interface OrderItem {
  column: Column
  direction: SortDirection
}

export interface Order {
  kind: 'order'
  items: OrderItem[]
}

export interface Limit {
  kind: 'limit'
  count: number
}

export interface Offset {
  kind: 'offset'
  count: number
}

export interface CountStage {
  kind: 'count'
}

export interface UniqueStage {
  kind: 'unique'
}

export interface CountUniqueStage {
  kind: 'count-unique'
  /** Replaces the projection when given */
  columns?: SelectItem[] | undefined
}

export type Stage =
  | TableStage
  | Query
  | Join
  | Filter
  | Group
  | Aggregation
  | Projection
  | Order
  | Limit
  | Offset
  | CountStage
  | UniqueStage
  | CountUniqueStage

// --- Resolved query state (input to the renderer) ---

export interface QueryParts {
  base: TableStage | Query | undefined
  joins: readonly Join[]
  where: readonly Filter[]
  having: readonly Filter[]
  groupBy: Group | undefined
  aggs: Aggregation | undefined
  proj: Projection | undefined
  distinct: boolean
  count: boolean
  order: Order | undefined
  limit: number | undefined
  offset: number | undefined
}
