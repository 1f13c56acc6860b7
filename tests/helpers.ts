import type { QueryPlan } from '../src/plan/types'
import type {
  AddressRecord, AppUserRecord, ContactsDataset, CustomerRelationshipRecord,
  QueryStore, Row, StoreCallOptions, StoreCountResult, StoreQueryResult,
} from '../src/types'

// ------------------------------------------------------------------
// Datasets
// ------------------------------------------------------------------

const BASE_TIME = Date.UTC(2024, 0, 1)

export function user(id: number, fields: Partial<AppUserRecord> = {}): AppUserRecord {
  return {
    id,
    first_name:   `First${id}`,
    last_name:    `Last${id}`,
    gender:       'F',
    customer_id:  `CUST-${String(id).padStart(12, '0')}`,
    phone_number: null,
    created:      new Date(BASE_TIME + id * 60_000),
    address_id:   null,
    birthday:     null,
    last_updated: new Date(BASE_TIME + id * 60_000),
    ...fields,
  }
}

export function address(id: number, fields: Partial<AddressRecord> = {}): AddressRecord {
  return {
    id,
    street:        `Street ${id}`,
    street_number: String(id),
    city_code:     String(10_000 + id),
    city:          `City ${id}`,
    country:       'Freedonia',
    ...fields,
  }
}

export function relationship(id: number, appuserId: number, points: number): CustomerRelationshipRecord {
  return {
    id,
    appuser_id:    appuserId,
    points,
    created:       new Date(BASE_TIME + id * 1000),
    last_activity: new Date(BASE_TIME + id * 2000),
  }
}

/**
 * Six users over three addresses:
 *
 * | id | first | last  | gender | city      | country        | points |
 * |----|-------|-------|--------|-----------|----------------|--------|
 * | 1  | Ann   | Baker | F      | Springton | United Kingdom | 300    |
 * | 2  | Bob   | Adams | M      | Lakeside  | United States  | 7000   |
 * | 3  | Cara  | Adams | F      | Springton | United Kingdom | 300    |
 * | 4  | Dan   | Cole  | M      | Hillview  | Freedonia      | 7000   |
 * | 5  | Eve   | Baker | O      | -         | -              | -      |
 * | 6  | Finn  | Adams | M      | Lakeside  | United States  | 1200   |
 */
export function smallDataset(): ContactsDataset {
  return {
    address: [
      address(1, { city: 'Springton', country: 'United Kingdom' }),
      address(2, { city: 'Lakeside',  country: 'United States' }),
      address(3, { city: 'Hillview',  country: 'Freedonia' }),
    ],
    appuser: [
      user(1, { first_name: 'Ann',  last_name: 'Baker', gender: 'F', address_id: 1 }),
      user(2, { first_name: 'Bob',  last_name: 'Adams', gender: 'M', address_id: 2 }),
      user(3, { first_name: 'Cara', last_name: 'Adams', gender: 'F', address_id: 1 }),
      user(4, { first_name: 'Dan',  last_name: 'Cole',  gender: 'M', address_id: 3 }),
      user(5, { first_name: 'Eve',  last_name: 'Baker', gender: 'O' }),
      user(6, { first_name: 'Finn', last_name: 'Adams', gender: 'M', address_id: 2 }),
    ],
    customer_relationship: [
      relationship(1, 1, 300),
      relationship(2, 2, 7000),
      relationship(3, 3, 300),
      relationship(4, 4, 7000),
      relationship(5, 6, 1200),
    ],
  }
}

// ------------------------------------------------------------------
// Stores
// ------------------------------------------------------------------

export interface RecordedCall {
  kind:    'execute' | 'count'
  plan:    QueryPlan
  options: StoreCallOptions
}

/**
 * Store whose replies are scripted per call. Each reply resolves after
 * `delayMs`, or rejects with `error`; `ignoreAbort` keeps it running after
 * the caller aborts.
 */
export interface ScriptedReply {
  delayMs?:     number
  rows?:        Row[]
  count?:       number
  error?:       unknown
  ignoreAbort?: boolean
}

export class ScriptedStore implements QueryStore {
  readonly name = 'scripted'
  readonly calls: RecordedCall[] = []
  aborted = 0
  closed  = false

  constructor(private readonly reply: (call: RecordedCall) => ScriptedReply = () => ({})) {}

  execute(plan: QueryPlan, options: StoreCallOptions): Promise<StoreQueryResult> {
    const call: RecordedCall = { kind: 'execute', plan, options }
    return this.respond(call, r => ({
      rows:           r.rows ?? [],
      totalCount:     r.count ?? (r.rows?.length ?? 0),
      statementCount: plan.pagination ? 2 : 1,
    }))
  }

  count(plan: QueryPlan, options: StoreCallOptions): Promise<StoreCountResult> {
    const call: RecordedCall = { kind: 'count', plan, options }
    return this.respond(call, r => ({ count: r.count ?? 0, statementCount: 1 }))
  }

  async close(): Promise<void> {
    this.closed = true
  }

  private respond<T>(call: RecordedCall, shape: (reply: ScriptedReply) => T): Promise<T> {
    this.calls.push(call)
    const reply  = this.reply(call)
    const signal = call.options.signal

    return new Promise<T>((resolve, reject) => {
      const settle = () => {
        if (reply.error !== undefined) reject(reply.error)
        else resolve(shape(reply))
      }
      const delay = reply.delayMs ?? 0
      const timer = setTimeout(() => {
        signal.removeEventListener('abort', onAbort)
        settle()
      }, delay)
      const onAbort = () => {
        this.aborted++
        if (reply.ignoreAbort) return
        clearTimeout(timer)
        reject(signal.reason)
      }
      signal.addEventListener('abort', onAbort, { once: true })
    })
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}
