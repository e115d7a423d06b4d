import { aggregate } from '../query/stages.js'
import type { AggregateSpec } from '../query/types.js'

// --- Primary property ---

const PRIMARY_PROPS: Readonly<Record<string, string>> = {
  'user-account': 'user_id',
  file: 'name',
  mutex: 'name',
  process: 'name',
  software: 'name',
  'windows-registry-value-type': 'name',
  'x-ibm-finding': 'name',
  directory: 'path',
  'autonomous-system': 'number',
  'windows-registry-key': 'key',
  'x509-certificate': 'serial_number',
  'x-oca-asset': 'hostname',
  'x-oca-event': 'action',
}

/** The property that best identifies an object of `scoType`; `value` for anything not listed. */
export function primaryProp(scoType: string): string {
  return PRIMARY_PROPS[scoType] ?? 'value'
}

// --- Automatic aggregation ---

const SKIPPED = new Set(['x_root', 'x_contained_by_ref', 'type', 'id'])
const INTEGER_TYPES = new Set(['integer', 'bigint'])

/** PostgreSQL truncates identifiers longer than this */
const MAX_ALIAS_LENGTH = 63

/** Last segment of a dotted or `type:`-prefixed property. */
export function lastSegment(prop: string): string {
  const idx = Math.max(prop.lastIndexOf('.'), prop.lastIndexOf(':'))
  return prop.slice(idx + 1)
}

/**
 * Infer how to aggregate column `prop` of an object of `scoType` when grouping.
 * Returns null for identity columns that should not be aggregated.
 */
export function autoAggregation(scoType: string, prop: string, columnType: string): AggregateSpec | null {
  if (SKIPPED.has(lastSegment(prop))) {
    return null
  }

  const [fn, alias] = inferAggregate(scoType, prop, columnType)
  if (alias.length > MAX_ALIAS_LENGTH) {
    return null
  }
  return aggregate(fn, prop, alias)
}

function inferAggregate(scoType: string, prop: string, columnType: string): [fn: string, alias: string] {
  if (prop === 'number_observed') return ['SUM', prop]
  if (prop === 'first_observed' || prop === 'start') return ['MIN', prop]
  if (prop === 'last_observed' || prop === 'end') return ['MAX', prop]
  if ((scoType === 'network-traffic' && prop.endsWith('_port')) || (scoType === 'process' && prop.endsWith('pid'))) {
    return ['NUNIQUE', `unique_${prop}`]
  }
  if (INTEGER_TYPES.has(columnType.toLowerCase())) return ['AVG', `mean_${prop}`]
  return ['NUNIQUE', `unique_${prop}`]
}
