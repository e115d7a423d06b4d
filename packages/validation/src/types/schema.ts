// --- Column ---

export interface ColumnMeta {
  /** Flattened STIX property name as stored, e.g. `src_port` or `hashes.'SHA-256'` */
  name: string
  /** Backend column type as reported by the catalog, e.g. `TEXT`, `bigint` */
  type?: string | undefined
}

// --- Table ---

export interface TableMeta {
  name: string
  /**
   * SCO type of the rows in this table or view. Type tables are named after
   * their type and may omit it; views such as `conns` set it explicitly.
   */
  scoType?: string | undefined
  columns: ColumnMeta[]
}

// --- Schema ---

export interface SchemaConfig {
  tables: TableMeta[]
}
