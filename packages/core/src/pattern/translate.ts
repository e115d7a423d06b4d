import {
  InvalidPathError,
  PatternSyntaxError,
  UnsupportedOperatorError,
  validateName,
  validatePath,
} from '@stixql/validation'
import { sqliteDialect } from '../dialects/sqlite.js'
import { quoteIdent } from '../generator/fragments.js'
import type { SchemaContext } from '../metadata/context.js'
import { REFLIST_TABLE } from '../resolution/pathResolver.js'
import { compiled, filter } from '../query/stages.js'
import type { Filter } from '../query/types.js'
import { parseProp } from '../stix/paths.js'
import type { RelLink } from '../stix/paths.js'
import { DEFAULT_REF_TYPES } from '../stix/refTypes.js'
import type { RefTypeTable } from '../stix/refTypes.js'
import type { SqlDialect } from '../types/interfaces.js'
import type { ComparisonNode, ExistsNode, Literal, PatternVisitor } from './ast.js'
import { foldPattern } from './ast.js'
import { parsePattern } from './parser.js'

// --- Options ---

export interface CompileOptions {
  /** Defaults to SQLite */
  dialect?: SqlDialect | undefined
  /** When given, reference hops only consider target types that have a table */
  schema?: SchemaContext | undefined
  /** Defaults to the schema's table, else the built-in STIX table */
  refTypes?: RefTypeTable | undefined
}

// --- Fragments ---

/** Loosest operator at the top level of `sql`; decides whether an enclosing AND must wrap it. */
type Precedence = 'atom' | 'and' | 'or'

interface Fragment {
  sql: string
  prec: Precedence
}

const EMPTY: Fragment = { sql: '', prec: 'atom' }

function atom(sql: string): Fragment {
  return { sql, prec: 'atom' }
}

/** Properties stored as base64 text */
const BINARY_PROPS = new Set(['payload_bin'])

const INDEXED = /\[\d+\]/

// --- Compiler ---

/**
 * Compile a STIX pattern into the text of a WHERE clause for the table of
 * `scoType`. Comparisons on any other object type render as nothing and drop
 * out of the surrounding AND/OR, so a pattern that mixes types can be applied
 * to one table at a time. The result is `''` when nothing applies.
 *
 * Literals are embedded as quoted SQL strings, never bound.
 */
export function stixToSql(pattern: string, scoType: string, options: CompileOptions = {}): string {
  validateName(scoType)
  const ast = parsePattern(pattern)
  return foldPattern(ast, new Translator(pattern, scoType, options)).sql
}

/** Compile `pattern` into a Filter stage for use in a Query. */
export function patternFilter(pattern: string, scoType: string, options: CompileOptions = {}): Filter {
  return filter([compiled(stixToSql(pattern, scoType, options))])
}

class Translator implements PatternVisitor<Fragment> {
  private readonly pattern: string
  private readonly scoType: string
  private readonly dialect: SqlDialect
  private readonly refTypes: RefTypeTable
  private readonly isAvailable: ((type: string) => boolean) | undefined

  constructor(pattern: string, scoType: string, options: CompileOptions) {
    this.pattern = pattern
    this.scoType = scoType
    this.dialect = options.dialect ?? sqliteDialect
    this.refTypes = options.refTypes ?? options.schema?.refTypes ?? DEFAULT_REF_TYPES
    const schema = options.schema
    this.isAvailable = schema !== undefined ? (type) => schema.index.hasTable(type) : undefined
  }

  comparison(node: ComparisonNode): Fragment {
    return this.leaf(node.path.scoType, node.path.prop, node.path.text, (type, prop) => this.compare(node, type, prop))
  }

  exists(node: ExistsNode): Fragment {
    return this.leaf(node.path.scoType, node.path.prop, node.path.text, (_type, prop) =>
      atom(`${columnOf(prop)} IS NOT NULL`),
    )
  }

  and(operands: Fragment[]): Fragment {
    const kept = operands.filter((f) => f.sql !== '')
    const [first] = kept
    if (first === undefined) return EMPTY
    if (kept.length === 1) return first
    return { sql: kept.map((f) => (f.prec === 'or' ? `(${f.sql})` : f.sql)).join(' AND '), prec: 'and' }
  }

  or(operands: Fragment[]): Fragment {
    const kept = operands.filter((f) => f.sql !== '')
    const [first] = kept
    if (first === undefined) return EMPTY
    if (kept.length === 1) return first
    return { sql: kept.map((f) => f.sql).join(' OR '), prec: 'or' }
  }

  group(inner: Fragment): Fragment {
    return inner.sql === '' ? EMPTY : atom(`(${inner.sql})`)
  }

  // --- Leaves ---

  /**
   * Type check, then compile the final property with `compile` and wrap it
   * in one `IN (SELECT ...)` per reference hop, innermost first.
   */
  private leaf(
    scoType: string,
    prop: string,
    path: string,
    compile: (type: string, prop: string) => Fragment,
  ): Fragment {
    if (scoType !== this.scoType) {
      return EMPTY
    }

    const links = parseProp(scoType, prop, this.refTypes, this.isAvailable)
    const last = links[links.length - 1]
    if (last === undefined) {
      throw new InvalidPathError(path, 'reference has no target type in the schema')
    }
    if (last.kind !== 'node') {
      throw new InvalidPathError(path, 'path ends in a reference')
    }

    let frag = compile(last.type, last.prop)
    for (const link of links.slice(0, -1).reverse()) {
      if (link.kind === 'rel') {
        frag = atom(this.hop(link, frag.sql))
      }
    }
    return frag
  }

  private hop(link: RelLink, inner: string): string {
    validatePath(link.ref)
    validateName(link.toType)
    const target = `SELECT "id" FROM ${quoteIdent(link.toType)} WHERE ${inner}`
    if (!link.ref.endsWith('_refs')) {
      return `${quoteIdent(link.ref)} IN (${target})`
    }
    return (
      `"id" IN (SELECT "source_ref" FROM ${quoteIdent(REFLIST_TABLE)}` +
      ` WHERE "ref_name" = ${this.dialect.quoteString(link.ref)} AND "target_ref" IN (${target}))`
    )
  }

  private compare(node: ComparisonNode, type: string, prop: string): Fragment {
    const { op, negated, value } = node
    if (INDEXED.test(prop)) {
      throw new UnsupportedOperatorError(op, type, prop)
    }
    const col = columnOf(prop)

    if (op === 'ISSUBSET' || op === 'ISSUPERSET') {
      if (type !== 'ipv4-addr' || prop !== 'value') {
        throw new UnsupportedOperatorError(op, type, prop)
      }
      const net = this.literal(this.single(value))
      const call = op === 'ISSUBSET' ? this.dialect.inSubnet(col, net) : this.dialect.inSubnet(net, col)
      return atom(negate(`(${call})`, negated))
    }

    if (prop.includes('[*]')) {
      return this.compareList(node, type, prop)
    }

    if (op === 'MATCHES') {
      const re = this.literal(this.single(value))
      const call = BINARY_PROPS.has(prop) ? this.dialect.matchBase64(re, col) : this.dialect.match(re, col)
      return atom(negate(call, negated))
    }

    if (op === 'LIKE' && BINARY_PROPS.has(prop)) {
      return atom(negate(this.dialect.likeBase64(this.literal(this.single(value)), col), negated))
    }

    if (op === 'LIKE' || op === 'IN') {
      const rhs = Array.isArray(value) ? `(${value.map((v) => this.literal(v)).join(', ')})` : this.literal(value)
      return atom(`${col} ${negated ? `NOT ${op}` : op} ${rhs}`)
    }

    const sql = `${col} ${op} ${this.literal(this.single(value))}`
    return atom(negated ? `NOT (${sql})` : sql)
  }

  /**
   * Lists are stored as JSON text, so membership is a substring match:
   * `protocols[*] = 'tcp'` is `"protocols" LIKE '%tcp%'` and
   * `values[*].name = 'foo'` is `"values" LIKE '%"name":"foo"%'`.
   */
  private compareList(node: ComparisonNode, type: string, prop: string): Fragment {
    const { op, negated, value } = node
    const col = columnOf(prop)
    const key = prop.slice(prop.indexOf('[*]') + 3).replace(/^\./, '')

    const like = (v: Literal, positive: boolean): string =>
      `${col} ${positive ? 'LIKE' : 'NOT LIKE'} ${this.dialect.quoteString(`%${memberText(key, v)}%`)}`

    if (op === '=' || op === '!=') {
      return atom(like(this.single(value), (op === '=') !== negated))
    }
    if (op === 'IN' && Array.isArray(value)) {
      const parts = value.map((v) => like(v, !negated))
      const [only] = parts
      if (parts.length === 1 && only !== undefined) return atom(only)
      return negated ? { sql: parts.join(' AND '), prec: 'and' } : { sql: parts.join(' OR '), prec: 'or' }
    }
    throw new UnsupportedOperatorError(op, type, prop)
  }

  private single(value: Literal | Literal[]): Literal {
    if (Array.isArray(value)) {
      throw new PatternSyntaxError(this.pattern, 'a literal set is only allowed after IN')
    }
    return value
  }

  private literal(lit: Literal): string {
    switch (lit.type) {
      case 'string':
      case 'timestamp':
      case 'binary':
        return this.dialect.quoteString(lit.value)
      case 'int':
      case 'float':
        return lit.value
      case 'bool':
        return lit.value ? 'TRUE' : 'FALSE'
    }
  }
}

// --- Helpers ---

/** The column holding `prop`: a list property lives whole in the column named up to its first `[*]`. */
function columnOf(prop: string): string {
  const idx = prop.indexOf('[*]')
  const name = idx < 0 ? prop : prop.slice(0, idx)
  validatePath(name)
  return quoteIdent(name)
}

function negate(sql: string, negated: boolean): string {
  return negated ? `NOT ${sql}` : sql
}

/** How a list member (or member key `key`) appears in the stored JSON text. */
function memberText(key: string, lit: Literal): string {
  const text = lit.type === 'string' ? lit.value : String(lit.value)
  if (key === '') return text
  return lit.type === 'string' ? `"${key}":"${text}"` : `"${key}":${text}`
}
