import type { QueryPlan } from './plan/types'

// ============================================================
// Table records
// ============================================================

export interface AddressRecord {
  id:            number
  street:        string
  street_number: string
  city_code:     string
  city:          string
  country:       string
}

export interface AppUserRecord {
  id:           number
  first_name:   string
  last_name:    string
  gender:       'M' | 'F' | 'O' | null
  customer_id:  string
  phone_number: string | null
  created:      Date
  address_id:   number | null
  birthday:     Date | null
  last_updated: Date
}

export interface CustomerRelationshipRecord {
  id:            number
  appuser_id:    number
  points:        number
  created:       Date
  last_activity: Date
}

export interface ContactsDataset {
  address:               AddressRecord[]
  appuser:               AppUserRecord[]
  customer_relationship: CustomerRelationshipRecord[]
}

// ============================================================
// Result rows
// ============================================================

/**
 * One result row, flat and keyed by field path:
 * `{ id, first_name, 'address.city', 'relationship.points', ... }`.
 */
export type Row = Record<string, unknown>

// ============================================================
// Store interface: every access method implements this
// ============================================================

export interface StoreCallOptions {
  /** Pushed down to the store's own statement timeout when set. */
  statementTimeoutMs?: number
  /** Aborted when the caller stops waiting; stores cancel server-side work. */
  signal: AbortSignal
}

export interface StoreQueryResult {
  rows:           Row[]
  /** Rows matching the plan before pagination. */
  totalCount:     number
  /** Data statements issued for this call. */
  statementCount: number
}

export interface StoreCountResult {
  count:          number
  statementCount: number
}

export interface QueryStore {
  readonly name: string

  execute(plan: QueryPlan, options: StoreCallOptions): Promise<StoreQueryResult>
  count(plan: QueryPlan, options: StoreCallOptions): Promise<StoreCountResult>

  // Lifecycle
  close(): Promise<void>
}
