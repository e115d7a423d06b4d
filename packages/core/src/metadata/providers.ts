import type { SchemaConfig, TableMeta } from '@stixql/validation'
import type { DbExecutor, SchemaProvider, SqlDialect } from '../types/interfaces.js'

/**
 * Creates a SchemaProvider that always returns the same config.
 */
export function staticSchema(config: SchemaConfig): SchemaProvider {
  return {
    load: () => Promise.resolve(config),
  }
}

const SYMTABLE = '__symtable'

/**
 * Creates a SchemaProvider that lists tables and columns from the live backend.
 * When a `__symtable(name, type)` table exists, views take their SCO type from it.
 */
export function introspectSchema(executor: DbExecutor, dialect: SqlDialect): SchemaProvider {
  return {
    load: async () => {
      const rows = await executor.execute(dialect.catalogQuery, [])
      const tables = new Map<string, TableMeta>()
      for (const row of rows) {
        const name = String(row['table_name'])
        let table = tables.get(name)
        if (table === undefined) {
          table = { name, columns: [] }
          tables.set(name, table)
        }
        const type = row['column_type']
        table.columns.push({ name: String(row['column_name']), type: typeof type === 'string' ? type : undefined })
      }

      if (tables.has(SYMTABLE)) {
        for (const row of await executor.execute(dialect.symtableQuery, [])) {
          const table = tables.get(String(row['name']))
          const scoType = row['type']
          if (table !== undefined && typeof scoType === 'string' && scoType !== table.name) {
            table.scoType = scoType
          }
        }
      }

      return { tables: [...tables.values()] }
    },
  }
}
