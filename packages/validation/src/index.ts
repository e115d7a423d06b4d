// Errors
export type {
  ConnectionErrorDetails,
  DialectName,
  ExecutionErrorDetails,
  InvalidOperatorCode,
  SchemaErrorEntry,
} from './errors.js'
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
  StixQlError,
  UnsupportedOperatorError,
} from './errors.js'

// Identifier validation
export { isValidName, isValidPath, validateName, validatePath } from './identifiers.js'

// Schema Index
export { SchemaIndex } from './schemaIndex.js'

// Schema validation
export { validateSchema } from './schemaValidation.js'

// Types: result
export type {
  CountResult,
  DataResult,
  DebugLogEntry,
  QueryResult,
  QueryResultMeta,
  SqlResult,
} from './types/result.js'
// Types: schema
export type { ColumnMeta, SchemaConfig, TableMeta } from './types/schema.js'
