import type { ColumnMeta, SchemaConfig, TableMeta } from './types/schema.js'

/**
 * Pre-indexed schema for O(1) lookups during path resolution and dereferencing.
 * Column order is preserved as listed by the provider.
 */
export class SchemaIndex {
  readonly tablesByName: ReadonlyMap<string, TableMeta>
  readonly columnsByTable: ReadonlyMap<string, ReadonlyMap<string, ColumnMeta>>
  /** SCO types that have a table named after them */
  readonly types: ReadonlySet<string>

  constructor(config: SchemaConfig) {
    const tablesByName = new Map<string, TableMeta>()
    const columnsByTable = new Map<string, Map<string, ColumnMeta>>()
    const types = new Set<string>()

    for (const table of config.tables) {
      tablesByName.set(table.name, table)
      const colMap = new Map<string, ColumnMeta>()
      for (const col of table.columns) {
        colMap.set(col.name, col)
      }
      columnsByTable.set(table.name, colMap)
      if (table.scoType === undefined || table.scoType === table.name) {
        types.add(table.name)
      }
    }

    this.tablesByName = tablesByName
    this.columnsByTable = columnsByTable
    this.types = types
  }

  hasTable(name: string): boolean {
    return this.tablesByName.has(name)
  }

  getTable(name: string): TableMeta | undefined {
    return this.tablesByName.get(name)
  }

  /** Column names of `table` in catalog order; empty for unknown tables. */
  columns(table: string): string[] {
    const cols = this.columnsByTable.get(table)
    return cols !== undefined ? [...cols.keys()] : []
  }

  getColumn(table: string, name: string): ColumnMeta | undefined {
    return this.columnsByTable.get(table)?.get(name)
  }

  /** SCO type of the rows in `table`; a type table's own name when not declared. */
  tableType(table: string): string {
    return this.tablesByName.get(table)?.scoType ?? table
  }
}
