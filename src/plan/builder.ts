import { ValidationError } from '../errors'
import type { SchemaRegistry } from '../schema/registry'
import type { EntityName, FieldType, FilterOperator } from '../schema/types'
import type {
  FilterClause, OrderTerm, Pagination, QueryPlan, RawParams, ScalarValue, SearchSpec,
} from './types'

export const DEFAULT_PAGE_SIZE = 50
export const MAX_PAGE_SIZE     = 1000

// Parameters with a fixed meaning; everything else is a filter.
const RESERVED = new Set(['ordering', 'search', 'name', 'page', 'page_size', 'offset', 'limit', '_cancel'])

const SUFFIXES: Readonly<Record<string, FilterOperator>> = {
  exact:     'equals',
  icontains: 'contains',
  gte:       'gte',
  lte:       'lte',
  gt:        'gt',
  lt:        'lt',
  range:     'range',
  isnull:    'isnull',
}

const INT_RE  = /^-?\d+$/
const BOOL_VALUES: Readonly<Record<string, boolean>> = { true: true, '1': true, false: false, '0': false }
const DATE_RE = /^(\d{4}-\d{2}-\d{2})(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:\d{2})?)?$/

/** Date whose setters throw; plan date values stay fixed once built. */
export class PlanDate extends Date {}

for (const key of Object.getOwnPropertyNames(Date.prototype)) {
  if (!key.startsWith('set')) continue
  Object.defineProperty(PlanDate.prototype, key, {
    value() { throw new TypeError(`Date.prototype.${key} called on a query plan date`) },
  })
}

export interface BuildOptions {
  /** `false` builds an unpaginated plan; pagination params are then ignored. */
  paginate?:        boolean
  defaultPageSize?: number
  maxPageSize?:     number
}

/**
 * Compiles raw request parameters into an immutable plan. Throws the first
 * UnknownEntityError, UnknownFieldError or ValidationError it meets.
 *
 * @example
 * buildQueryPlan(contactsRegistry, 'AppUser', {
 *   first_name__icontains: 'John',
 *   ordering:              '-relationship__points,last_name',
 *   page_size:             '50',
 * })
 */
export function buildQueryPlan(
  registry: SchemaRegistry,
  entity:   string,
  params:   RawParams,
  options:  BuildOptions = {}
): QueryPlan {
  const definition = registry.entity(entity)
  const name       = definition.name

  const filters: FilterClause[] = []
  for (const [key, raw] of Object.entries(params)) {
    if (raw === undefined || RESERVED.has(key)) continue
    filters.push(parseFilter(registry, name, key, raw))
  }

  const ordering = parseOrdering(registry, name, params.ordering, definition.defaultOrdering)

  const term   = params.search?.trim() ?? ''
  const search: SearchSpec | null = term
    ? { term, fields: registry.searchable(name) }
    : null

  const nameTerm   = params.name?.trim() ?? ''
  const nameFields = registry.nameFields(name)
  const nameMatch: SearchSpec | null = nameTerm && nameFields.length > 0
    ? { term: nameTerm, fields: nameFields }
    : null

  const pagination = options.paginate === false
    ? null
    : parsePagination(params, options.defaultPageSize ?? DEFAULT_PAGE_SIZE, options.maxPageSize ?? MAX_PAGE_SIZE)

  return deepFreeze<QueryPlan>({
    entity:     name,
    table:      definition.table,
    primaryKey: definition.primaryKey,
    select:     registry.selectable(name),
    joins:      registry.joins(name),
    filters,
    ordering,
    search,
    nameMatch,
    pagination,
  })
}

/** `{offset, limit}` for either pagination mode. */
export function pageWindow(pagination: Pagination): { offset: number; limit: number } {
  return pagination.mode === 'page'
    ? { offset: (pagination.page - 1) * pagination.pageSize, limit: pagination.pageSize }
    : { offset: pagination.offset, limit: pagination.limit }
}

/** Stable textual form of a plan, equal for structurally equal plans. */
export function describePlan(plan: QueryPlan): string {
  const value = (v: ScalarValue): string | number => v instanceof Date ? v.toISOString() : v
  return JSON.stringify({
    entity:  plan.entity,
    filters: plan.filters.map(f => [
      f.field.path,
      f.operator,
      f.operator === 'range'  ? [value(f.value[0]), value(f.value[1])]
      : f.operator === 'isnull' ? f.value
      : value(f.value),
    ]),
    ordering:   plan.ordering.map(o => `${o.direction === 'desc' ? '-' : ''}${o.field.path}`),
    search:     plan.search?.term ?? null,
    name:       plan.nameMatch?.term ?? null,
    pagination: plan.pagination,
  })
}

// ------------------------------------------------------------------
// Filters
// ------------------------------------------------------------------

function splitPath(key: string): string[] {
  return key.split('__').flatMap(s => s.split('.'))
}

function parseFilter(registry: SchemaRegistry, entity: EntityName, key: string, raw: string): FilterClause {
  const segments = splitPath(key)
  const last     = segments[segments.length - 1] ?? ''
  const suffixed = segments.length > 1 && last in SUFFIXES
  const operator: FilterOperator | undefined = suffixed ? SUFFIXES[last] : 'equals'
  const path     = (suffixed ? segments.slice(0, -1) : segments).join('.')

  const field = registry.filterable(entity, path)
  if (operator === undefined || !field.operators.includes(operator)) {
    throw new ValidationError(key, `lookup "${suffixed ? last : 'exact'}" is not allowed on ${path}`)
  }

  if (operator === 'isnull') {
    const flag = BOOL_VALUES[raw.trim().toLowerCase()]
    if (flag === undefined) throw new ValidationError(key, `"${raw}" is not true or false`)
    return { field, operator, value: flag }
  }

  if (operator === 'range') {
    const parts = raw.split(',')
    if (parts.length !== 2) throw new ValidationError(key, 'range expects two comma-separated values')
    const lo = coerceValue(key, field.type, parts[0] ?? '')
    const hi = coerceValue(key, field.type, parts[1] ?? '')
    if (compareScalars(lo, hi) > 0) throw new ValidationError(key, 'range lower bound exceeds upper bound')
    return { field, operator, value: [lo, hi] }
  }

  return { field, operator, value: coerceValue(key, field.type, raw) }
}

export function coerceValue(key: string, type: FieldType, raw: string): ScalarValue {
  switch (type) {
    case 'string':
      if (raw === '') throw new ValidationError(key, 'value is empty')
      return raw

    case 'int': {
      const text = raw.trim()
      if (!INT_RE.test(text)) throw new ValidationError(key, `"${raw}" is not an integer`)
      const n = Number(text)
      if (!Number.isSafeInteger(n)) throw new ValidationError(key, `"${raw}" is out of range`)
      return n
    }

    case 'date': {
      const text  = raw.trim()
      const match = DATE_RE.exec(text)
      if (!match) throw new ValidationError(key, `"${raw}" is not an ISO 8601 date`)
      const date = new PlanDate(text.replace(' ', 'T'))
      if (Number.isNaN(date.getTime())) throw new ValidationError(key, `"${raw}" is not a valid date`)
      // reject calendar overflow such as 2024-02-31
      if (text.length === 10 && date.toISOString().slice(0, 10) !== match[1]) {
        throw new ValidationError(key, `"${raw}" is not a valid date`)
      }
      return date
    }
  }
}

export function compareScalars(a: ScalarValue, b: ScalarValue): number {
  const x = a instanceof Date ? a.getTime() : a
  const y = b instanceof Date ? b.getTime() : b
  if (typeof x === 'number' && typeof y === 'number') return Math.sign(x - y)
  const sx = String(x)
  const sy = String(y)
  return sx < sy ? -1 : sx > sy ? 1 : 0
}

// ------------------------------------------------------------------
// Ordering
// ------------------------------------------------------------------

function parseOrdering(
  registry: SchemaRegistry,
  entity:   EntityName,
  raw:      string | undefined,
  fallback: readonly string[]
): OrderTerm[] {
  const tokens = (raw ?? '').split(',').map(t => t.trim()).filter(Boolean)
  return (tokens.length > 0 ? tokens : fallback).map((token): OrderTerm => {
    const desc = token.startsWith('-')
    const path = splitPath(desc ? token.slice(1) : token).join('.')
    return { field: registry.orderable(entity, path), direction: desc ? 'desc' : 'asc' }
  })
}

// ------------------------------------------------------------------
// Pagination
// ------------------------------------------------------------------

function parseIntParam(key: string, raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined
  const text = raw.trim()
  if (!INT_RE.test(text)) throw new ValidationError(key, `"${raw}" is not an integer`)
  return Number(text)
}

function clamp(n: number, min: number, max: number): number {
  return Math.min(Math.max(n, min), max)
}

// Offsets stay safe integers so stores always receive an exact value.
function parsePagination(params: RawParams, defaultSize: number, maxSize: number): Pagination {
  const offset = parseIntParam('offset', params.offset)
  const limit  = parseIntParam('limit', params.limit)
  if (offset !== undefined || limit !== undefined) {
    return {
      mode:   'offset',
      offset: clamp(offset ?? 0, 0, Number.MAX_SAFE_INTEGER),
      limit:  clamp(limit ?? defaultSize, 1, maxSize),
    }
  }

  const page     = parseIntParam('page', params.page)
  const pageSize = clamp(parseIntParam('page_size', params.page_size) ?? defaultSize, 1, maxSize)
  return {
    mode:     'page',
    page:     clamp(page ?? 1, 1, Math.floor(Number.MAX_SAFE_INTEGER / pageSize) + 1),
    pageSize,
  }
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !(value instanceof Date) && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) deepFreeze(child)
    Object.freeze(value)
  }
  return value
}
