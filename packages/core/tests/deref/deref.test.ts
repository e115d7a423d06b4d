import { InvalidPathError } from '@stixql/validation'
import { describe, expect, it } from 'vitest'
import { planDeref } from '../../src/deref/planner.js'
import { unresolve } from '../../src/deref/unresolve.js'
import { createSchemaContext } from '../../src/metadata/context.js'
import { Query } from '../../src/query/query.js'
import type { DerefPlan } from '../../src/deref/planner.js'
import { fileTable, fullSchema, ipv4Schema, mixedIpSchema, processTable } from '../fixtures/stixSchema.js'

function render(table: string, plan: DerefPlan): string {
  const query = new Query(table).extend(plan.joins)
  if (plan.projection !== undefined) query.append(plan.projection)
  return query.render().sql
}

// --- planDeref ---

describe('planDeref', () => {
  it('replaces each reference with the columns it points at', () => {
    const schema = ipv4Schema()
    const plan = planDeref(schema, 'conns')
    expect(plan.joins).toHaveLength(2)
    // src_ref and dst_ref are replaced by id and value of each address
    expect(plan.projection?.columns).toHaveLength(schema.index.columns('conns').length - 2 + 2 * 2)
    expect(render('conns', plan)).toBe(
      'SELECT "conns"."id", "conns"."src_port", "conns"."dst_port", "conns"."protocols",' +
        ' "src_ref"."id" AS "src_ref.id", "src_ref"."value" AS "src_ref.value",' +
        ' "dst_ref"."id" AS "dst_ref.id", "dst_ref"."value" AS "dst_ref.value"' +
        ' FROM "conns"' +
        ' LEFT OUTER JOIN "ipv4-addr" AS "src_ref" ON "conns"."src_ref" = "src_ref"."id"' +
        ' LEFT OUTER JOIN "ipv4-addr" AS "dst_ref" ON "conns"."dst_ref" = "dst_ref"."id"',
    )
  })

  it('projects only the requested paths', () => {
    const plan = planDeref(ipv4Schema(), 'conns', { paths: ['src_ref.value'] })
    expect(plan.joins).toHaveLength(2)
    expect(plan.projection?.columns).toEqual([
      { kind: 'column', name: 'value', table: 'src_ref', alias: 'src_ref.value' },
    ])
  })

  it('keeps requested base columns and their order', () => {
    const plan = planDeref(ipv4Schema(), 'conns', { paths: ['dst_port', 'dst_ref.value', 'src_ref'] })
    expect(render('conns', plan)).toMatch(
      /^SELECT "conns"\."dst_port", "dst_ref"\."value" AS "dst_ref\.value", "conns"\."src_ref" FROM "conns" /,
    )
  })

  it('treats * as every column', () => {
    const plan = planDeref(ipv4Schema(), 'conns', { paths: ['*'] })
    expect(plan.projection?.columns).toHaveLength(8)
  })

  it('rejects unknown paths', () => {
    expect(() => planDeref(ipv4Schema(), 'conns', { paths: ['src_ref.nope'] })).toThrow(InvalidPathError)
  })

  it('joins both address tables when a reference could hold either', () => {
    const plan = planDeref(mixedIpSchema(), 'network-traffic')
    expect(plan.joins).toHaveLength(4)
    expect(render('network-traffic', plan)).toBe(
      'SELECT "network-traffic"."id", "network-traffic"."src_port", "network-traffic"."dst_port", "network-traffic"."protocols",' +
        ' COALESCE("src_ref4"."id", "src_ref6"."id") AS "src_ref.id",' +
        ' COALESCE("src_ref4"."value", "src_ref6"."value") AS "src_ref.value",' +
        ' COALESCE("dst_ref4"."id", "dst_ref6"."id") AS "dst_ref.id",' +
        ' COALESCE("dst_ref4"."value", "dst_ref6"."value") AS "dst_ref.value"' +
        ' FROM "network-traffic"' +
        ' LEFT OUTER JOIN "ipv4-addr" AS "src_ref4" ON "network-traffic"."src_ref" = "src_ref4"."id"' +
        ' LEFT OUTER JOIN "ipv6-addr" AS "src_ref6" ON "network-traffic"."src_ref" = "src_ref6"."id"' +
        ' LEFT OUTER JOIN "ipv4-addr" AS "dst_ref4" ON "network-traffic"."dst_ref" = "dst_ref4"."id"' +
        ' LEFT OUTER JOIN "ipv6-addr" AS "dst_ref6" ON "network-traffic"."dst_ref" = "dst_ref6"."id"',
    )
  })

  it('joins one level of parent process', () => {
    const schema = createSchemaContext({ tables: [processTable, fileTable] })
    const plan = planDeref(schema, 'process')
    expect(render('process', plan)).toBe(
      'SELECT "process"."id", "process"."pid", "process"."name",' +
        ' "parent_ref"."id" AS "parent_ref.id", "parent_ref"."pid" AS "parent_ref.pid", "parent_ref"."name" AS "parent_ref.name",' +
        ' "binary_ref"."id" AS "binary_ref.id", "binary_ref"."name" AS "binary_ref.name", "binary_ref"."size" AS "binary_ref.size"' +
        ' FROM "process"' +
        ' LEFT OUTER JOIN "process" AS "parent_ref" ON "process"."parent_ref" = "parent_ref"."id"' +
        ' LEFT OUTER JOIN "file" AS "binary_ref" ON "process"."binary_ref" = "binary_ref"."id"',
    )
  })

  it('does not follow references to missing tables', () => {
    const schema = createSchemaContext({ tables: [processTable] })
    const plan = planDeref(schema, 'process')
    expect(plan.joins.map((j) => j.alias)).toEqual(['parent_ref'])
  })

  it('follows references from a joined process', () => {
    const eventTable = {
      name: 'x-oca-event',
      columns: [
        { name: 'id', type: 'TEXT' },
        { name: 'action', type: 'TEXT' },
        { name: 'process_ref', type: 'TEXT' },
        { name: 'parent_process_ref', type: 'TEXT' },
      ],
    }
    const schema = createSchemaContext({ tables: [eventTable, processTable, fileTable] })
    const plan = planDeref(schema, 'x-oca-event')
    expect(plan.joins.map((j) => [j.table, j.alias, j.lhs])).toEqual([
      ['process', 'process_ref', 'x-oca-event'],
      ['process', 'process_ref__parent_ref', 'process_ref'],
      ['file', 'process_ref__binary_ref', 'process_ref'],
    ])
    const names = plan.projection?.columns.map((c) => c.alias ?? c.kind)
    expect(names).toContain('process_ref.parent_ref.name')
    expect(names).toContain('process_ref.binary_ref.name')
    expect(names).not.toContain('parent_process_ref.name')
  })

  it('plans nothing for tables without ids', () => {
    const schema = createSchemaContext({
      tables: [{ name: 'summary', columns: [{ name: 'src_ref' }, { name: 'count' }] }],
    })
    expect(planDeref(schema, 'summary')).toEqual({ joins: [], projection: undefined })
  })

  it('keeps relationship endpoints as plain columns', () => {
    const schema = fullSchema()
    const rel = createSchemaContext({
      tables: [
        ...schema.config.tables,
        {
          name: 'relationship',
          columns: [{ name: 'id' }, { name: 'source_ref' }, { name: 'target_ref' }, { name: 'relationship_type' }],
        },
      ],
    })
    const plan = planDeref(rel, 'relationship')
    expect(plan.joins).toEqual([])
    expect(plan.projection?.columns.map((c) => c.alias ?? (c.kind === 'column' ? c.name : ''))).toEqual([
      'id',
      'source_ref',
      'target_ref',
      'relationship_type',
    ])
  })
})

// --- unresolve ---

describe('unresolve', () => {
  it('splits dereferenced columns back into objects', () => {
    const rows = [
      {
        id: 'network-traffic--1',
        dst_port: 443,
        'src_ref.id': 'ipv4-addr--a',
        'src_ref.value': '10.0.0.1',
        'dst_ref.id': 'ipv6-addr--b',
        'dst_ref.value': '::1',
      },
    ]
    expect(unresolve(rows)).toEqual([
      { id: 'ipv6-addr--b', value: '::1', type: 'ipv6-addr' },
      { id: 'ipv4-addr--a', value: '10.0.0.1', type: 'ipv4-addr' },
      { id: 'network-traffic--1', dst_port: 443, src_ref: 'ipv4-addr--a', dst_ref: 'ipv6-addr--b' },
    ])
  })

  it('unnests references of referenced objects', () => {
    const rows = [
      {
        id: 'x-oca-event--1',
        'process_ref.id': 'process--p',
        'process_ref.name': 'cmd.exe',
        'process_ref.binary_ref.id': 'file--f',
        'process_ref.binary_ref.name': 'cmd.exe',
      },
    ]
    expect(unresolve(rows)).toEqual([
      { id: 'file--f', name: 'cmd.exe', type: 'file' },
      { id: 'process--p', name: 'cmd.exe', binary_ref: 'file--f', type: 'process' },
      { id: 'x-oca-event--1', process_ref: 'process--p' },
    ])
  })

  it('drops references that joined nothing', () => {
    expect(unresolve([{ id: 'network-traffic--2', 'src_ref.id': null, 'src_ref.value': null }])).toEqual([
      { id: 'network-traffic--2', src_ref: null },
    ])
  })
})
