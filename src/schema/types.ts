export type EntityName = 'AppUser' | 'Address' | 'CustomerRelationship'

export type FieldType = 'string' | 'int' | 'date'

export type FilterOperator = 'equals' | 'contains' | 'gte' | 'lte' | 'gt' | 'lt' | 'range' | 'isnull'

export type SortDirection = 'asc' | 'desc'

/**
 * Single-hop join from one entity to another. The join condition is always
 * `<base>.<localColumn> = <relation>.<targetColumn>`; the relation name is
 * both the field-path segment and the SQL alias of the joined table.
 */
export interface RelationDefinition {
  name:         string
  target:       EntityName
  /** Table of the target entity. */
  table:        string
  localColumn:  string
  targetColumn: string
}

export interface EntityDefinition {
  name:       EntityName
  table:      string
  primaryKey: string
  columns:    Readonly<Record<string, FieldType>>
  relations:  readonly RelationDefinition[]

  // capability sets, keyed by field path
  filterable: Readonly<Record<string, readonly FilterOperator[]>>
  orderable:  readonly string[]
  searchable: readonly string[]
  nameFields?: readonly string[]

  /** Ordering tokens applied when a request gives none, e.g. `-created`. */
  defaultOrdering: readonly string[]
}

export interface ResolvedField {
  path:     string
  /** Entity that owns the column. */
  entity:   EntityName
  relation: RelationDefinition | null
  column:   string
  type:     FieldType
}

export interface FilterCapability extends ResolvedField {
  operators: readonly FilterOperator[]
}
