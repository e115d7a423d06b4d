import type { SchemaConfig } from '@stixql/validation'
import { SchemaIndex, validateSchema } from '@stixql/validation'
import { DEFAULT_REF_TYPES } from '../stix/refTypes.js'
import type { RefTypeTable } from '../stix/refTypes.js'

/**
 * Read-only schema snapshot threaded through path resolution, pattern
 * compilation and dereferencing. Built once per schema load.
 */
export interface SchemaContext {
  readonly config: SchemaConfig
  readonly index: SchemaIndex
  readonly refTypes: RefTypeTable
}

/** Validate `config` and index it. Throws `SchemaError` when invalid. */
export function createSchemaContext(config: SchemaConfig, refTypes: RefTypeTable = DEFAULT_REF_TYPES): SchemaContext {
  const err = validateSchema(config)
  if (err !== null) {
    throw err
  }
  return { config, index: new SchemaIndex(config), refTypes }
}
