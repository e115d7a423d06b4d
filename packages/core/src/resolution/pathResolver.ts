import { InvalidPathError, validateName, validatePath } from '@stixql/validation'
import type { SchemaContext } from '../metadata/context.js'
import { column, compound, join, joinOn, predicate } from '../query/stages.js'
import type { Join } from '../query/types.js'
import { parseProp, splitPath } from '../stix/paths.js'

// --- Path resolution ---

/** Table holding one row per element of every `_refs` list */
export const REFLIST_TABLE = '__reflist'

export interface ResolvedPath {
  /** Joins from the base table to the table holding the target column */
  joins: Join[]
  /** Base table name, or the alias of the last join */
  table: string
  column: string
}

/**
 * Work out the joins needed to reach the column behind a STIX object path.
 *
 * Each `_ref` hop joins the target type's table aliased by the reference
 * stems so far (`src_ref`, `parent_ref__binary_ref`), so the same table can be
 * joined once per reference. A `_refs` hop goes through `__reflist`.
 */
export function resolvePath(
  schema: SchemaContext,
  baseTable: string,
  scoType: string | undefined,
  path: string,
): ResolvedPath {
  validateName(baseTable)
  validatePath(path)

  const parts = splitPath(path)
  const type = scoType ?? schema.index.tableType(baseTable)
  if (parts.scoType !== '' && parts.scoType !== type) {
    throw new InvalidPathError(path, `object type does not match '${type}'`)
  }

  const links = parseProp(type, parts.prop, schema.refTypes, (t) => schema.index.hasTable(t))
  if (links.length === 0) {
    throw new InvalidPathError(path, 'reference has no target type in the schema')
  }

  const joins: Join[] = []
  const stems: string[] = []
  let current = baseTable

  for (const link of links) {
    if (link.kind === 'node') {
      return { joins, table: current, column: storedColumn(link.prop) }
    }

    stems.push(link.ref.replace(/\./g, '__'))
    const alias = stems.join('__')
    if (link.ref.endsWith('_refs')) {
      const reflist = `${alias}__reflist`
      const onReflist = compound(
        predicate(column('ref_name', reflist), '=', link.ref),
        'AND',
        predicate(column('source_ref', reflist), '=', column('id', current)),
      )
      joins.push(joinOn(REFLIST_TABLE, onReflist, { how: 'LEFT OUTER', alias: reflist }))
      joins.push(join(link.toType, 'target_ref', '=', 'id', { how: 'LEFT OUTER', alias, lhs: reflist }))
    } else {
      joins.push(join(link.toType, link.ref, '=', 'id', { how: 'LEFT OUTER', alias, lhs: current }))
    }
    current = alias
  }

  throw new InvalidPathError(path, 'path ends in a reference')
}

/** Lists are stored whole as serialized text, so `values[*].name` lives in `values`. */
function storedColumn(prop: string): string {
  const idx = prop.indexOf('[*]')
  return idx < 0 ? prop : prop.slice(0, idx)
}
