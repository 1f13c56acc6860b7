import type {
  EntityName, FilterOperator, RelationDefinition, ResolvedField, SortDirection,
} from '../schema/types'

export type RawParams = Readonly<Record<string, string | undefined>>

export type ScalarValue = string | number | Date

export type FilterClause =
  | { field: ResolvedField; operator: Exclude<FilterOperator, 'range' | 'isnull'>; value: ScalarValue }
  | { field: ResolvedField; operator: 'range'; value: readonly [ScalarValue, ScalarValue] }
  /** `value: true` keeps rows where the field is NULL (or the relation is missing). */
  | { field: ResolvedField; operator: 'isnull'; value: boolean }

export interface OrderTerm {
  field:     ResolvedField
  direction: SortDirection
}

/** Case-insensitive substring match of `term` against any of `fields`. */
export interface SearchSpec {
  term:   string
  fields: readonly ResolvedField[]
}

export type Pagination =
  | { mode: 'page';   page: number;   pageSize: number }
  | { mode: 'offset'; offset: number; limit: number }

/**
 * Validated description of one query. Everything a store needs to run it is
 * carried here, so stores never consult the registry themselves.
 */
export interface QueryPlan {
  readonly entity:     EntityName
  readonly table:      string
  readonly primaryKey: string
  readonly select:     readonly ResolvedField[]
  readonly joins:      readonly RelationDefinition[]
  readonly filters:    readonly FilterClause[]
  readonly ordering:   readonly OrderTerm[]
  readonly search:     SearchSpec | null
  readonly nameMatch:  SearchSpec | null
  readonly pagination: Pagination | null
}
