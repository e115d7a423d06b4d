import type { RefTypeTable } from './refTypes.js'

// --- Parsed path ---

/** Leaf property access; `prop` may be dotted and may carry `[*]` list markers. */
export interface NodeLink {
  kind: 'node'
  type: string
  prop: string
}

/** Reference hop from `fromType` through `ref` to `toType`. */
export interface RelLink {
  kind: 'rel'
  fromType: string
  ref: string
  toType: string
}

export type PathLink = NodeLink | RelLink

export function isRef(name: string): boolean {
  return name.endsWith('_ref') || name.endsWith('_refs')
}

/** Split `type:prop` at the last colon; the type is empty when there is none. */
export function splitPath(path: string): { scoType: string; prop: string } {
  const idx = path.lastIndexOf(':')
  return idx < 0 ? { scoType: '', prop: path } : { scoType: path.slice(0, idx), prop: path.slice(idx + 1) }
}

/** Parse `type:prop` into links; see `parseProp`. */
export function parsePath(path: string, refTypes: RefTypeTable, isAvailable?: (type: string) => boolean): PathLink[] {
  const { scoType, prop } = splitPath(path)
  return parseProp(scoType, prop, refTypes, isAvailable)
}

/**
 * Split a property at its `_ref`/`_refs` hops. Consecutive leaf segments are
 * merged into one node. Each hop takes the first candidate target type (that
 * `isAvailable` accepts, when given). Returns an empty list when some hop has
 * no such candidate.
 */
export function parseProp(
  scoType: string,
  prop: string,
  refTypes: RefTypeTable,
  isAvailable?: (type: string) => boolean,
): PathLink[] {
  if (!prop.includes('_ref.') && !prop.includes('_refs')) {
    return [{ kind: 'node', type: scoType, prop }]
  }

  const links: PathLink[] = []
  let curType = scoType
  let pending: string[] = []

  for (const part of prop.split('.')) {
    const bare = part.endsWith('[*]') ? part.slice(0, -3) : part
    if (!isRef(bare)) {
      pending.push(part)
      continue
    }
    // A reference nested under leaf segments is stored flattened, e.g. `extensions.x.foo_ref`
    const ref = [...pending, bare].join('.')
    pending = []
    const candidates = refTypes.targets(curType, bare).filter((t) => isAvailable === undefined || isAvailable(t))
    const toType = candidates[0]
    if (toType === undefined) {
      return []
    }
    links.push({ kind: 'rel', fromType: curType, ref, toType })
    curType = toType
  }

  if (pending.length > 0) {
    links.push({ kind: 'node', type: curType, prop: pending.join('.') })
  }
  return links
}
