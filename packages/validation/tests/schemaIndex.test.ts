import { describe, expect, it } from 'vitest'
import { SchemaIndex } from '../src/schemaIndex.js'
import { validSchema } from './fixtures/testSchema.js'

describe('SchemaIndex', () => {
  const index = new SchemaIndex(validSchema())

  it('lists columns in catalog order', () => {
    expect(index.columns('network-traffic')).toEqual(['id', 'src_ref', 'dst_ref', 'src_port', 'dst_port', 'protocols'])
  })

  it('returns no columns for unknown tables', () => {
    expect(index.columns('nope')).toEqual([])
    expect(index.hasTable('nope')).toBe(false)
  })

  it('resolves table types', () => {
    expect(index.tableType('conns')).toBe('network-traffic')
    expect(index.tableType('ipv4-addr')).toBe('ipv4-addr')
    expect(index.tableType('unknown')).toBe('unknown')
  })

  it('collects type tables only', () => {
    expect([...index.types]).toEqual(['ipv4-addr', 'network-traffic'])
  })

  it('looks up column metadata', () => {
    expect(index.getColumn('network-traffic', 'src_port')).toEqual({ name: 'src_port', type: 'INTEGER' })
    expect(index.getColumn('network-traffic', 'nope')).toBeUndefined()
  })
})
