import { quoteLiteral } from '../generator/fragments.js'
import type { SqlDialect } from '../types/interfaces.js'

// --- Postgres Dialect ---

/** Schema that holds the pattern helper functions. */
export const PG_FUNCTION_SCHEMA = 'stixql_common'

export const postgresDialect: SqlDialect = {
  name: 'postgres',
  placeholder: (position) => `$${String(position)}`,
  offsetNeedsLimit: false,
  quoteString: quoteLiteral,
  inSubnet: (addr, subnet) => `${PG_FUNCTION_SCHEMA}.in_subnet(${addr}, ${subnet})`,
  match: (pattern, value) => `${PG_FUNCTION_SCHEMA}.match(${pattern}, ${value})`,
  matchBase64: (pattern, value) => `${PG_FUNCTION_SCHEMA}.match_bin(${pattern}, ${value})`,
  likeBase64: (pattern, value) => `${PG_FUNCTION_SCHEMA}.like_bin(${pattern}, ${value})`,
  catalogQuery:
    'SELECT "table_name", "column_name", "data_type" AS "column_type"' +
    ' FROM information_schema.columns WHERE "table_schema" = current_schema()' +
    ' ORDER BY "table_name", "ordinal_position"',
  symtableQuery: 'SELECT "name", "type" FROM "__symtable"',
}

// --- Helper function DDL ---

/** Statements that install the pattern helper functions; each is idempotent. */
export const PG_FUNCTION_DDL: readonly string[] = [
  `CREATE SCHEMA IF NOT EXISTS ${PG_FUNCTION_SCHEMA}`,
  `CREATE OR REPLACE FUNCTION ${PG_FUNCTION_SCHEMA}.match(pattern TEXT, value TEXT)
RETURNS boolean AS $$
    SELECT regexp_match(value, pattern) IS NOT NULL;
$$ LANGUAGE SQL IMMUTABLE`,
  `CREATE OR REPLACE FUNCTION ${PG_FUNCTION_SCHEMA}.match_bin(pattern TEXT, value TEXT)
RETURNS boolean AS $$
    SELECT regexp_match(convert_from(decode(value, 'base64'), 'UTF8'), pattern) IS NOT NULL;
$$ LANGUAGE SQL IMMUTABLE`,
  `CREATE OR REPLACE FUNCTION ${PG_FUNCTION_SCHEMA}.like_bin(pattern TEXT, value TEXT)
RETURNS boolean AS $$
    SELECT convert_from(decode(value, 'base64'), 'UTF8') LIKE pattern;
$$ LANGUAGE SQL IMMUTABLE`,
  `CREATE OR REPLACE FUNCTION ${PG_FUNCTION_SCHEMA}.in_subnet(addr TEXT, net TEXT)
RETURNS boolean AS $$
    SELECT addr::inet <<= net::inet;
$$ LANGUAGE SQL IMMUTABLE`,
]
