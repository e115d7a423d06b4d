// --- Base Error ---

export class StixQlError extends Error {
  readonly code: string

  constructor(code: string, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'StixQlError'
    this.code = code
  }

  toJSON(): Record<string, unknown> {
    const json: Record<string, unknown> = {
      code: this.code,
      message: this.message,
    }
    if (this.cause !== undefined) {
      json.cause = serializeError(this.cause)
    }
    return json
  }
}

// --- Identifier / Path Errors ---

export class InvalidIdentifierError extends StixQlError {
  declare readonly code: 'INVALID_IDENTIFIER'
  readonly identifier: string

  constructor(identifier: string) {
    super('INVALID_IDENTIFIER', `Invalid identifier: '${identifier}'`)
    this.name = 'InvalidIdentifierError'
    this.identifier = identifier
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      identifier: this.identifier,
    }
  }
}

export class InvalidPathError extends StixQlError {
  declare readonly code: 'INVALID_PATH'
  readonly path: string
  readonly reason: string | undefined

  constructor(path: string, reason?: string | undefined) {
    super('INVALID_PATH', reason !== undefined ? `Invalid STIX path '${path}': ${reason}` : `Invalid STIX path: '${path}'`)
    this.name = 'InvalidPathError'
    this.path = path
    this.reason = reason
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      path: this.path,
      ...(this.reason !== undefined ? { reason: this.reason } : {}),
    }
  }
}

// --- Query Construction Errors ---

export class InvalidQueryError extends StixQlError {
  declare readonly code: 'INVALID_QUERY'

  constructor(message: string) {
    super('INVALID_QUERY', message)
    this.name = 'InvalidQueryError'
  }
}

export type InvalidOperatorCode =
  | 'INVALID_COMPARISON_OPERATOR'
  | 'INVALID_PREDICATE_OPERATOR'
  | 'INVALID_JOIN_OPERATOR'
  | 'INVALID_AGGREGATE_FUNCTION'

export class InvalidOperatorError extends StixQlError {
  declare readonly code: InvalidOperatorCode
  readonly operator: string
  readonly allowed: readonly string[]

  constructor(code: InvalidOperatorCode, operator: unknown, allowed: readonly string[]) {
    super(code, `${operatorLabel(code)} '${String(operator)}' (allowed: ${allowed.join(', ')})`)
    this.name = 'InvalidOperatorError'
    this.operator = String(operator)
    this.allowed = allowed
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      operator: this.operator,
      allowed: this.allowed,
    }
  }
}

// --- Pattern Errors ---

export class PatternSyntaxError extends StixQlError {
  declare readonly code: 'PATTERN_SYNTAX'
  readonly pattern: string
  readonly position: number | undefined

  constructor(pattern: string, detail: string, position?: number | undefined, cause?: Error | undefined) {
    super('PATTERN_SYNTAX', `Invalid STIX pattern ${JSON.stringify(pattern)}: ${detail}`, cause ? { cause } : undefined)
    this.name = 'PatternSyntaxError'
    this.pattern = pattern
    this.position = position
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      pattern: this.pattern,
      ...(this.position !== undefined ? { position: this.position } : {}),
    }
  }
}

export class UnsupportedOperatorError extends StixQlError {
  declare readonly code: 'UNSUPPORTED_OPERATOR'
  readonly operator: string
  readonly scoType: string
  readonly property: string

  constructor(operator: string, scoType: string, property: string) {
    super('UNSUPPORTED_OPERATOR', `${operator} not supported for ${scoType}:${property}`)
    this.name = 'UnsupportedOperatorError'
    this.operator = operator
    this.scoType = scoType
    this.property = property
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      operator: this.operator,
      scoType: this.scoType,
      property: this.property,
    }
  }
}

// --- Schema Error ---

export interface SchemaErrorEntry {
  code: 'INVALID_TABLE_NAME' | 'INVALID_COLUMN_NAME' | 'DUPLICATE_TABLE' | 'DUPLICATE_COLUMN' | 'INVALID_SCO_TYPE'
  message: string
  details: {
    table?: string | undefined
    column?: string | undefined
    actual?: string | undefined
  }
}

export class SchemaError extends StixQlError {
  declare readonly code: 'SCHEMA_INVALID'
  readonly errors: readonly SchemaErrorEntry[]

  constructor(errors: readonly SchemaErrorEntry[]) {
    super('SCHEMA_INVALID', `Schema invalid: ${errors.length} error${errors.length === 1 ? '' : 's'}`)
    this.name = 'SchemaError'
    this.errors = errors
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      errors: this.errors,
    }
  }
}

// --- Provider Error ---

export class ProviderError extends StixQlError {
  declare readonly code: 'SCHEMA_LOAD_FAILED'

  constructor(message: string, cause?: Error | undefined) {
    super('SCHEMA_LOAD_FAILED', message, cause ? { cause } : undefined)
    this.name = 'ProviderError'
  }
}

// --- Connection Error ---

export interface ConnectionErrorDetails {
  url?: string | undefined
  filename?: string | undefined
}

export class ConnectionError extends StixQlError {
  declare readonly code: 'CONNECTION_FAILED'
  readonly details: ConnectionErrorDetails

  constructor(message: string, details: ConnectionErrorDetails, cause?: Error | undefined) {
    super('CONNECTION_FAILED', message, cause ? { cause } : undefined)
    this.name = 'ConnectionError'
    this.details = details
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      details: this.details,
    }
  }
}

// --- Execution Error ---

export type DialectName = 'sqlite' | 'postgres' | 'clickhouse'

export type ExecutionErrorDetails =
  | {
      code: 'QUERY_FAILED'
      dialect: DialectName
      sql: string
      params: unknown[]
    }
  | { code: 'UNKNOWN_TABLE'; dialect: DialectName; sql: string; table: string }
  | { code: 'UNKNOWN_COLUMN'; dialect: DialectName; sql: string; column: string }
  | { code: 'EXECUTOR_CLOSED' }

export class ExecutionError extends StixQlError {
  declare readonly code: 'QUERY_FAILED' | 'UNKNOWN_TABLE' | 'UNKNOWN_COLUMN' | 'EXECUTOR_CLOSED'
  readonly details: ExecutionErrorDetails

  constructor(details: ExecutionErrorDetails, cause?: Error | undefined) {
    super(details.code, defaultExecutionMessage(details), cause ? { cause } : undefined)
    this.name = 'ExecutionError'
    this.details = details
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      details: this.details,
    }
  }
}

// --- Helpers ---

function serializeError(err: unknown): Record<string, unknown> | unknown {
  if (err instanceof StixQlError) {
    return err.toJSON()
  }
  if (err instanceof Error) {
    const json: Record<string, unknown> = {
      message: err.message,
      name: err.name,
    }
    if (err.cause !== undefined) {
      json.cause = serializeError(err.cause)
    }
    return json
  }
  return err
}

function operatorLabel(code: InvalidOperatorCode): string {
  switch (code) {
    case 'INVALID_COMPARISON_OPERATOR':
      return 'Invalid comparison operator'
    case 'INVALID_PREDICATE_OPERATOR':
      return 'Invalid predicate operator'
    case 'INVALID_JOIN_OPERATOR':
      return 'Invalid join operator'
    case 'INVALID_AGGREGATE_FUNCTION':
      return 'Invalid aggregate function'
  }
}

function defaultExecutionMessage(details: ExecutionErrorDetails): string {
  switch (details.code) {
    case 'QUERY_FAILED':
      return `Query failed on ${details.dialect} backend`
    case 'UNKNOWN_TABLE':
      return `Unknown table on ${details.dialect} backend: ${details.table}`
    case 'UNKNOWN_COLUMN':
      return `Unknown column on ${details.dialect} backend: ${details.column}`
    case 'EXECUTOR_CLOSED':
      return 'Store is closed'
  }
}
