import { InvalidPathError, validateName } from '@stixql/validation'
import type { SchemaContext } from '../metadata/context.js'
import { coalesce, column, join, projection } from '../query/stages.js'
import type { Join, Projection, SelectItem } from '../query/types.js'
import { lastSegment } from '../stix/props.js'

// --- Options / result ---

/** Reference properties not to follow, per object type. */
export type DerefIgnore = Readonly<Record<string, readonly string[]>>

/** `parent_process_ref` on assets and events duplicates `process_ref` and would loop back to the process table. */
export const DEFAULT_DEREF_IGNORE: DerefIgnore = {
  'x-oca-asset': ['parent_process_ref'],
  'x-oca-event': ['parent_process_ref'],
}

export interface DerefOptions {
  /** Restrict and order the projection to these columns or `ref.prop` paths; `['*']` keeps everything */
  paths?: readonly string[] | undefined
  ignore?: DerefIgnore | undefined
}

export interface DerefPlan {
  joins: Join[]
  /** Undefined when the table has no `id` column (e.g. an aggregate view) */
  projection: Projection | undefined
}

// --- Reference tree ---

interface RefNode {
  /** SCO type, which is also the table name */
  type: string
  /** Reference properties from the root to this node; the last one is the edge from its holder */
  path: string[]
  ref: string | undefined
  /** Both address types are present and the reference could point at either */
  mixedIp: boolean
  children: RefNode[]
}

const IP_TYPES = ['ipv4-addr', 'ipv6-addr']
const RELATIONSHIP_REFS = new Set(['source_ref', 'target_ref'])

interface Entry {
  /** Output column name: the alias, else the column name */
  name: string
  item: SelectItem
}

/**
 * Plan the joins that replace each `_ref` column of `table` by the columns of
 * the object it points at, following references depth first. Joined columns
 * are aliased `<ref path>.<column>` (`src_ref.value`,
 * `parent_ref.binary_ref.name`); join aliases are the same path joined by
 * `__`. References to the same type as their holder are not followed, except
 * for one level of `process:parent_ref`.
 */
export function planDeref(schema: SchemaContext, table: string, options: DerefOptions = {}): DerefPlan {
  validateName(table)
  const { index } = schema
  const cols = index.columns(table)
  if (!cols.includes('id')) {
    return { joins: [], projection: undefined }
  }

  const ignore = options.ignore ?? DEFAULT_DEREF_IGNORE
  const rootType = index.tableType(table)
  const root = buildTree(schema, table, rootType, [], undefined, ignore)

  const entries: Entry[] = []
  for (const col of cols) {
    if (!col.endsWith('_ref') || (rootType === 'relationship' && RELATIONSHIP_REFS.has(col))) {
      entries.push({ name: col, item: column(col, table) })
    }
  }

  const joins: Join[] = []
  const visit = (node: RefNode, holder: string): void => {
    const alias = node.path.join('__')
    const ref = node.ref
    if (ref !== undefined) {
      if (node.mixedIp) {
        joinAddressTables(schema, ref, node.path, holder, joins, entries)
        return
      }
      joins.push(join(node.type, ref, '=', 'id', { how: 'LEFT OUTER', alias, lhs: holder }))
      entries.push(...projectJoined(index.columns(node.type), ref, alias, node.path))
    }

    const here = ref !== undefined ? alias : table
    if (node.type === 'process' && index.columns('process').includes('parent_ref')) {
      const parentPath = [...node.path, 'parent_ref']
      const parentAlias = parentPath.join('__')
      joins.push(join('process', 'parent_ref', '=', 'id', { how: 'LEFT OUTER', alias: parentAlias, lhs: here }))
      entries.push(...projectJoined(index.columns('process'), 'parent_ref', parentAlias, parentPath))
    }

    for (const child of node.children) {
      visit(child, here)
    }
  }
  visit(root, table)

  const paths = options.paths
  if (paths === undefined || paths.length === 0 || paths.includes('*')) {
    return { joins, projection: projection(entries.map((e) => e.item)) }
  }

  const byName = new Map(entries.map((e) => [e.name, e.item]))
  const picked = paths.map((path) => {
    const item = byName.get(path)
    if (item !== undefined) return item
    if (cols.includes(path)) return column(path, table)
    throw new InvalidPathError(path, `not a column of '${table}' or a dereferenced path`)
  })
  return { joins, projection: projection(picked) }
}

function buildTree(
  schema: SchemaContext,
  table: string,
  type: string,
  path: string[],
  ref: string | undefined,
  ignore: DerefIgnore,
  ancestors: readonly string[] = [],
): RefNode {
  const node: RefNode = { type, path, ref, mixedIp: false, children: [] }
  const skip = ignore[type] ?? []
  const available = (t: string): boolean => schema.index.types.has(t)

  for (const prop of schema.index.columns(table)) {
    if (!prop.endsWith('_ref') || skip.includes(prop)) continue
    const candidates = schema.refTypes.targets(type, lastSegment(prop)).filter(available)
    const target = candidates[0]
    // Types already on the path are not revisited
    if (target === undefined || target === type || ancestors.includes(target)) continue

    const mixedIp = IP_TYPES.every((t) => candidates.includes(t))
    if (mixedIp) {
      node.children.push({ type: target, path: [...path, prop], ref: prop, mixedIp, children: [] })
    } else {
      node.children.push(buildTree(schema, target, target, [...path, prop], prop, ignore, [...ancestors, type]))
    }
  }
  return node
}

function projectJoined(targetCols: string[], ref: string, alias: string, path: string[]): Entry[] {
  const prefix = path.join('.')
  return targetCols
    .filter((c) => c !== ref && !c.endsWith('_ref'))
    .map((c) => {
      const name = `${prefix}.${c}`
      return { name, item: column(c, alias, name) }
    })
}

/**
 * A reference that may hold either address type joins both tables (aliased
 * `<alias>4` and `<alias>6`). Columns they share are coalesced; the others
 * come from the one table that has them.
 */
function joinAddressTables(
  schema: SchemaContext,
  ref: string,
  path: string[],
  holder: string,
  joins: Join[],
  entries: Entry[],
): void {
  const alias = path.join('__')
  const prefix = path.join('.')
  const v4 = `${alias}4`
  const v6 = `${alias}6`
  joins.push(join('ipv4-addr', ref, '=', 'id', { how: 'LEFT OUTER', alias: v4, lhs: holder }))
  joins.push(join('ipv6-addr', ref, '=', 'id', { how: 'LEFT OUTER', alias: v6, lhs: holder }))

  const v4Cols = schema.index.columns('ipv4-addr').filter((c) => c !== ref && !c.endsWith('_ref'))
  const v6Cols = schema.index.columns('ipv6-addr').filter((c) => c !== ref && !c.endsWith('_ref'))
  for (const c of v4Cols) {
    const name = `${prefix}.${c}`
    const item = v6Cols.includes(c) ? coalesce([column(c, v4), column(c, v6)], name) : column(c, v4, name)
    entries.push({ name, item })
  }
  for (const c of v6Cols) {
    if (!v4Cols.includes(c)) {
      const name = `${prefix}.${c}`
      entries.push({ name, item: column(c, v6, name) })
    }
  }
}
