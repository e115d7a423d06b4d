// Re-export all types from validation package
export type {
  ColumnMeta,
  CountResult,
  DataResult,
  DebugLogEntry,
  DialectName,
  QueryResult,
  QueryResultMeta,
  SchemaConfig,
  SqlResult,
  TableMeta,
} from '@stixql/validation'
// Re-export validation functions and classes
export {
  ConnectionError,
  ExecutionError,
  InvalidIdentifierError,
  InvalidOperatorError,
  InvalidPathError,
  InvalidQueryError,
  PatternSyntaxError,
  ProviderError,
  SchemaError,
  SchemaIndex,
  StixQlError,
  UnsupportedOperatorError,
  validateName,
  validatePath,
  validateSchema,
} from '@stixql/validation'
// Debug
export { debugEntry, withDebugLog } from './debug/logger.js'
// Dereferencing
export type { DerefIgnore, DerefOptions, DerefPlan } from './deref/planner.js'
export { DEFAULT_DEREF_IGNORE, planDeref } from './deref/planner.js'
export { unresolve } from './deref/unresolve.js'
// Dialects
export { chValueType, clickhouseDialect } from './dialects/clickhouse.js'
export { getDialect } from './dialects/index.js'
export { PG_FUNCTION_DDL, PG_FUNCTION_SCHEMA, postgresDialect } from './dialects/postgres.js'
export { sqliteDialect } from './dialects/sqlite.js'
export { quoteColumnRef, quoteIdent, quoteLiteral } from './generator/fragments.js'
// Schema
export type { SchemaContext } from './metadata/context.js'
export { createSchemaContext } from './metadata/context.js'
export { introspectSchema, staticSchema } from './metadata/providers.js'
export { SchemaRegistry } from './metadata/registry.js'
// STIX patterns
export type { ComparisonOp, Literal, ObjectPathRef, PatternNode, PatternVisitor } from './pattern/ast.js'
export { foldPattern } from './pattern/ast.js'
export { parsePattern } from './pattern/parser.js'
export type { PatternSummary } from './pattern/summarize.js'
export { summarizePattern } from './pattern/summarize.js'
export type { CompileOptions } from './pattern/translate.js'
export { patternFilter, stixToSql } from './pattern/translate.js'
// Pipeline
export type {
  CallOptions,
  CreateStixStoreOptions,
  GroupOptions,
  LookupOptions,
  PageOptions,
  StixStore,
} from './pipeline.js'
export { createStixStore } from './pipeline.js'
// Query IR
export { Query } from './query/query.js'
export type { AggregateTuple, JoinOptions, OrderInput, PredicateValue } from './query/stages.js'
export {
  aggregate,
  aggregation,
  coalesce,
  column,
  compound,
  count,
  countUnique,
  filter,
  group,
  join,
  joinOn,
  limit,
  offset,
  order,
  predicate,
  projection,
  table,
  unique,
  withTable,
} from './query/stages.js'
export type {
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
  Placeholder,
  Predicate,
  PredicateOperator,
  Projection,
  RenderedSql,
  Scalar,
  SelectItem,
  Stage,
  TableStage,
  UniqueStage,
} from './query/types.js'
export {
  AGGREGATE_FUNCTIONS,
  COMPARISON_OPERATORS,
  JOIN_OPERATORS,
  JOIN_TYPES,
  PREDICATE_OPERATORS,
} from './query/types.js'
// Path resolution
export type { ResolvedPath } from './resolution/pathResolver.js'
export { REFLIST_TABLE, resolvePath } from './resolution/pathResolver.js'
export type { NodeLink, PathLink, RelLink } from './stix/paths.js'
export { isRef, parsePath, parseProp, splitPath } from './stix/paths.js'
export { autoAggregation, lastSegment, primaryProp } from './stix/props.js'
export type { RefTypeRule } from './stix/refTypes.js'
export { DEFAULT_REF_TYPES, RefTypeTable, STIX_REF_RULES } from './stix/refTypes.js'
// Public interfaces
export type { DbExecutor, SchemaProvider, SqlDialect } from './types/interfaces.js'
