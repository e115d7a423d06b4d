import { quoteLiteral } from '../generator/fragments.js'
import type { SqlDialect } from '../types/interfaces.js'

// --- SQLite Dialect ---

/** Helper functions are registered on the connection by `@stixql/executor-sqlite`. */
export const sqliteDialect: SqlDialect = {
  name: 'sqlite',
  placeholder: '?',
  offsetNeedsLimit: true,
  quoteString: quoteLiteral,
  inSubnet: (addr, subnet) => `in_subnet(${addr}, ${subnet})`,
  match: (pattern, value) => `match(${pattern}, ${value})`,
  matchBase64: (pattern, value) => `match_bin(${pattern}, ${value})`,
  likeBase64: (pattern, value) => `like_bin(${pattern}, ${value})`,
  catalogQuery:
    'SELECT m."name" AS "table_name", p."name" AS "column_name", p."type" AS "column_type"' +
    ' FROM "sqlite_master" AS m JOIN pragma_table_info(m."name") AS p' +
    ` WHERE m."type" IN ('table', 'view') AND m."name" NOT LIKE 'sqlite\\_%' ESCAPE '\\'` +
    ' ORDER BY m."name", p."cid"',
  symtableQuery: 'SELECT "name", "type" FROM "__symtable"',
}
