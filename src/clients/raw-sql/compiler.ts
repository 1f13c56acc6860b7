import { pageWindow } from '../../plan/builder'
import type { FilterClause, QueryPlan, SearchSpec } from '../../plan/types'
import type { ResolvedField } from '../../schema/types'
import { containsPattern } from '../shared'

export interface CompiledQuery {
  sql:    string
  params: unknown[]
}

const COMPARATORS = {
  equals: '=',
  gte:    '>=',
  lte:    '<=',
  gt:     '>',
  lt:     '<',
} as const

export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`
}

/** Column reference; joined tables are aliased by relation name. */
export function columnRef(plan: QueryPlan, field: ResolvedField): string {
  return `${quoteIdent(field.relation?.name ?? plan.table)}.${quoteIdent(field.column)}`
}

/**
 * Appends parameters and returns the `$n` placeholder. Shared by every
 * fragment of one statement so numbering has no gaps.
 */
class Params {
  readonly values: unknown[] = []

  add(value: unknown): string {
    this.values.push(value)
    return `$${this.values.length}`
  }
}

function compileFrom(plan: QueryPlan): string {
  const base  = quoteIdent(plan.table)
  const joins = plan.joins.map(join => {
    const alias = quoteIdent(join.name)
    return `LEFT JOIN ${quoteIdent(join.table)} AS ${alias}`
      + ` ON ${alias}.${quoteIdent(join.targetColumn)} = ${base}.${quoteIdent(join.localColumn)}`
  })
  return [`FROM ${base}`, ...joins].join('\n')
}

function compileFilter(plan: QueryPlan, filter: FilterClause, params: Params): string {
  const col = columnRef(plan, filter.field)
  switch (filter.operator) {
    case 'contains':
      return `${col} ILIKE ${params.add(containsPattern(String(filter.value)))}`
    case 'isnull':
      return `${col} ${filter.value ? 'IS NULL' : 'IS NOT NULL'}`
    case 'range':
      return `${col} BETWEEN ${params.add(filter.value[0])} AND ${params.add(filter.value[1])}`
    default:
      return `${col} ${COMPARATORS[filter.operator]} ${params.add(filter.value)}`
  }
}

function compileSearch(plan: QueryPlan, search: SearchSpec, params: Params): string {
  const ref   = params.add(containsPattern(search.term))
  const parts = search.fields.map(field => `${columnRef(plan, field)} ILIKE ${ref}`)
  return `(${parts.join(' OR ')})`
}

function compileWhere(plan: QueryPlan, params: Params): string | null {
  const parts = plan.filters.map(f => compileFilter(plan, f, params))
  if (plan.search)    parts.push(compileSearch(plan, plan.search, params))
  if (plan.nameMatch) parts.push(compileSearch(plan, plan.nameMatch, params))
  return parts.length > 0 ? `WHERE ${parts.join(' AND ')}` : null
}

/** SELECT for one page of the plan, columns aliased by field path. */
export function compileSelect(plan: QueryPlan): CompiledQuery {
  const params  = new Params()
  const columns = plan.select.map(f => `${columnRef(plan, f)} AS ${quoteIdent(f.path)}`)
  const where   = compileWhere(plan, params)
  const orderBy = plan.ordering.map(o => `${columnRef(plan, o.field)} ${o.direction === 'desc' ? 'DESC' : 'ASC'}`)

  const lines = [`SELECT ${columns.join(', ')}`, compileFrom(plan)]
  if (where)              lines.push(where)
  if (orderBy.length > 0) lines.push(`ORDER BY ${orderBy.join(', ')}`)
  if (plan.pagination) {
    const { offset, limit } = pageWindow(plan.pagination)
    lines.push(`LIMIT ${params.add(limit)} OFFSET ${params.add(offset)}`)
  }

  return { sql: lines.join('\n'), params: params.values }
}

/** COUNT(*) over the filtered plan, ignoring ordering and pagination. */
export function compileCount(plan: QueryPlan): CompiledQuery {
  const params = new Params()
  const where  = compileWhere(plan, params)
  const lines  = ['SELECT COUNT(*)::int AS count', compileFrom(plan)]
  if (where) lines.push(where)
  return { sql: lines.join('\n'), params: params.values }
}
