// --- Unresolve ---

type Row = Record<string, unknown>

/**
 * Inverse of dereferencing: split `ref.prop` keys of each row back out into
 * separate objects. The reference keeps the referenced object's id, and each
 * split-out object gets its `type` from that id (`ipv4-addr--...`). Objects
 * are emitted before the row that referenced them; ones without an id are dropped.
 */
export function unresolve(rows: readonly Row[]): Row[] {
  const out: Row[] = []
  for (const row of rows) {
    const pruned: Row = {}
    const reffed = new Map<string, Row>()

    for (const key of Object.keys(row).sort()) {
      const value = row[key]
      const dot = key.indexOf('.')
      if (!key.includes('_ref.') || dot < 0) {
        pruned[key] = value
        continue
      }
      const ref = key.slice(0, dot)
      const rest = key.slice(dot + 1)
      let obj = reffed.get(ref)
      if (obj === undefined) {
        obj = {}
        reffed.set(ref, obj)
      }
      obj[rest] = value
      if (rest === 'id') {
        pruned[ref] = value
      }
    }

    for (const obj of reffed.values()) {
      const id = obj['id']
      if (typeof id === 'string' && id !== '') {
        obj['type'] = id.split('--')[0]
        out.push(...unresolve([obj]))
      }
    }
    out.push(pruned)
  }
  return out
}
