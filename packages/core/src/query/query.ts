import { InvalidQueryError, validateName } from '@stixql/validation'
import { RenderContext, renderParts } from './render.js'
import type {
  Aggregation,
  Filter,
  Group,
  Join,
  Order,
  Placeholder,
  Projection,
  QueryParts,
  RenderedSql,
  Stage,
  TableStage,
} from './types.js'

/**
 * One SELECT statement assembled from stages.
 *
 * Stages may be appended in any order; `render()` always emits them in SQL
 * clause order. A Query is itself a stage, so it can serve as the base of
 * another query or as the right-hand side of an `IN` predicate.
 */
export class Query {
  readonly kind: 'query' = 'query'

  private base: TableStage | Query | undefined
  private readonly joins: Join[] = []
  private readonly where: Filter[] = []
  private readonly having: Filter[] = []
  private groupBy: Group | undefined
  private aggs: Aggregation | undefined
  private proj: Projection | undefined
  private distinct = false
  private count = false
  private order: Order | undefined
  private limit: number | undefined
  private offset: number | undefined

  constructor(init?: string | Stage[] | undefined) {
    if (typeof init === 'string') {
      validateName(init)
      this.base = { kind: 'table', name: init }
    } else if (init !== undefined) {
      this.extend(init)
    }
  }

  /** Name of the base table, when the base is a table rather than a subquery. */
  get table(): string | undefined {
    return this.base?.kind === 'table' ? this.base.name : undefined
  }

  append(stage: Stage): this {
    switch (stage.kind) {
      case 'table':
      case 'query':
        this.base ??= stage
        break
      case 'join':
        if (this.base === undefined) {
          throw new InvalidQueryError('Join must follow a Table or Query')
        }
        this.joins.push(stage)
        break
      case 'filter':
        if (this.groupBy !== undefined) {
          this.having.push(stage)
        } else {
          this.where.push(stage)
        }
        break
      case 'group':
        this.groupBy = stage
        break
      case 'aggregation':
        if (this.proj !== undefined) {
          throw new InvalidQueryError('Cannot have Aggregation after Projection')
        }
        this.aggs = stage
        break
      case 'projection':
        this.proj = stage
        break
      case 'order':
        this.order = stage
        break
      case 'limit':
        this.limit = stage.count
        break
      case 'offset':
        this.offset = stage.count
        break
      case 'count':
        this.count = true
        break
      case 'unique':
        this.distinct = true
        break
      case 'count-unique':
        this.distinct = true
        this.count = true
        if (stage.columns !== undefined && stage.columns.length > 0) {
          this.proj = { kind: 'projection', columns: stage.columns }
        }
        break
    }
    return this
  }

  extend(stages: Stage[]): this {
    for (const stage of stages) {
      this.append(stage)
    }
    return this
  }

  /** Render to SQL text plus positional parameters. Rendering does not change the query. */
  render(placeholder: Placeholder = '?'): RenderedSql {
    const ctx = new RenderContext(placeholder)
    const sql = this.renderInto(ctx)
    return { sql, params: ctx.params }
  }

  /** @internal Render as part of an enclosing statement, sharing its parameters. */
  renderInto(ctx: RenderContext): string {
    return renderParts(this.parts(), ctx)
  }

  private parts(): QueryParts {
    return {
      base: this.base,
      joins: this.joins,
      where: this.where,
      having: this.having,
      groupBy: this.groupBy,
      aggs: this.aggs,
      proj: this.proj,
      distinct: this.distinct,
      count: this.count,
      order: this.order,
      limit: this.limit,
      offset: this.offset,
    }
  }
}
