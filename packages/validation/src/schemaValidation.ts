import type { SchemaErrorEntry } from './errors.js'
import { SchemaError } from './errors.js'
import { isValidName, isValidPath } from './identifiers.js'
import type { SchemaConfig } from './types/schema.js'

const SCO_TYPE_REGEX = /^[a-z][a-z0-9-]*$/

// --- Schema Validation ---

/**
 * Validate every table and column name a provider reported before any of
 * them can reach SQL text. Collects all problems instead of stopping at the first.
 */
export function validateSchema(schema: SchemaConfig): SchemaError | null {
  const errors: SchemaErrorEntry[] = []
  const tableNames = new Set<string>()

  for (const table of schema.tables) {
    if (table.name.length === 0 || !isValidName(table.name)) {
      errors.push({
        code: 'INVALID_TABLE_NAME',
        message: `Table name '${table.name}' must match ^[\\w-]+$`,
        details: { table: table.name, actual: table.name },
      })
    }

    if (tableNames.has(table.name)) {
      errors.push({
        code: 'DUPLICATE_TABLE',
        message: `Duplicate table '${table.name}'`,
        details: { table: table.name },
      })
    } else {
      tableNames.add(table.name)
    }

    if (table.scoType !== undefined && !SCO_TYPE_REGEX.test(table.scoType)) {
      errors.push({
        code: 'INVALID_SCO_TYPE',
        message: `Table '${table.name}' has invalid SCO type '${table.scoType}'`,
        details: { table: table.name, actual: table.scoType },
      })
    }

    const columnNames = new Set<string>()
    for (const col of table.columns) {
      if (!isValidPath(col.name)) {
        errors.push({
          code: 'INVALID_COLUMN_NAME',
          message: `Column '${table.name}.${col.name}' is not a valid STIX property name`,
          details: { table: table.name, column: col.name },
        })
      }

      if (columnNames.has(col.name)) {
        errors.push({
          code: 'DUPLICATE_COLUMN',
          message: `Duplicate column '${col.name}' in table '${table.name}'`,
          details: { table: table.name, column: col.name },
        })
      } else {
        columnNames.add(col.name)
      }
    }
  }

  return errors.length > 0 ? new SchemaError(errors) : null
}
