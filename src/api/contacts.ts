import { isPlanError } from '../errors'
import { CancellationToken, type Clock } from '../execution/cancellation'
import type { ExecutionOutcome, QueryExecutor } from '../execution/executor'
import { buildQueryPlan, pageWindow } from '../plan/builder'
import type { QueryPlan, RawParams } from '../plan/types'
import { contactsRegistry } from '../schema/contacts'
import type { SchemaRegistry } from '../schema/registry'
import type { Row } from '../types'

// ------------------------------------------------------------------
// Request / response shapes
// ------------------------------------------------------------------

export interface ApiRequest {
  params:  RawParams
  /** Aborts when the client goes away; cancels the running query. */
  signal?: AbortSignal
}

export interface ApiDeps {
  executor:   QueryExecutor
  registry?:  SchemaRegistry
  /** Per-request deadline; `null` disables it. */
  timeoutMs?: number | null
  clock?:     Clock
  /** Receives the cause of every 500 response. */
  onError?:   (cause: unknown) => void
}

export interface ListBody {
  count:     number
  page:      number
  page_size: number
  results:   Row[]
}

export interface StatsBody {
  total_contacts:             number
  contacts_with_address:      number
  contacts_with_relationship: number
}

export interface ErrorBody {
  detail: string
  field?: string
}

export type ApiResponse<T> =
  | { status: 200; body: T }
  | { status: 400 | 404 | 499 | 500; body: ErrorBody }

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000

// 499 is the non-standard "client closed request" status.
const CANCELLED = { status: 499, body: { detail: 'Request cancelled' } } as const
const TIMED_OUT = { status: 499, body: { detail: 'Query timed out' } } as const
const NOT_FOUND = { status: 404, body: { detail: 'Not found.' } } as const

const STATS_FILTERS: readonly RawParams[] = [
  {},
  { address__id__isnull: 'false' },
  { relationship__id__isnull: 'false' },
]

// ------------------------------------------------------------------
// Endpoints
// ------------------------------------------------------------------

export function listContacts(request: ApiRequest, deps: ApiDeps): Promise<ApiResponse<ListBody>> {
  return listRecords('AppUser', request, deps)
}

export function retrieveContact(id: string, request: ApiRequest, deps: ApiDeps): Promise<ApiResponse<Row>> {
  return retrieveRecord('AppUser', id, request, deps)
}

/**
 * Contact totals: all contacts, those with an address and those with a
 * customer relationship. The three counts share the request's token.
 */
export async function contactStats(request: ApiRequest, deps: ApiDeps): Promise<ApiResponse<StatsBody>> {
  return withToken(request, deps, async token => {
    const counts: number[] = []
    for (const params of STATS_FILTERS) {
      const built = plan(deps, 'AppUser', params, false, token)
      if (!built.ok) return built.response

      const outcome = await deps.executor.count(built.plan, token)
      if (outcome.status !== 'success') return failure(outcome, deps)
      counts.push(outcome.result)
    }

    const [total = 0, withAddress = 0, withRelationship = 0] = counts
    return {
      status: 200,
      body: {
        total_contacts:             total,
        contacts_with_address:      withAddress,
        contacts_with_relationship: withRelationship,
      },
    }
  })
}

/** Filtered, ordered and paginated list of one entity. */
export async function listRecords(entity: string, request: ApiRequest, deps: ApiDeps): Promise<ApiResponse<ListBody>> {
  return withToken(request, deps, async token => {
    const built = plan(deps, entity, request.params, true, token)
    if (!built.ok) return built.response

    const outcome = await deps.executor.execute(built.plan, token)
    if (outcome.status !== 'success') return failure(outcome, deps)

    const { offset, limit } = built.plan.pagination ? pageWindow(built.plan.pagination) : { offset: 0, limit: outcome.result.resultCount }
    return {
      status: 200,
      body: {
        count:     outcome.result.totalCount,
        page:      limit > 0 ? Math.floor(offset / limit) + 1 : 1,
        page_size: limit,
        results:   outcome.result.rows,
      },
    }
  })
}

/** Single record by primary key. */
export async function retrieveRecord(entity: string, id: string, request: ApiRequest, deps: ApiDeps): Promise<ApiResponse<Row>> {
  return withToken(request, deps, async token => {
    const registry = deps.registry ?? contactsRegistry
    if (!registry.isEntity(entity)) return NOT_FOUND

    const built = plan(deps, entity, { [registry.entity(entity).primaryKey]: id }, false, token)
    if (!built.ok) return built.response

    const outcome = await deps.executor.execute(built.plan, token)
    if (outcome.status !== 'success') return failure(outcome, deps)

    const [row] = outcome.result.rows
    return row ? { status: 200, body: row } : NOT_FOUND
  })
}

// ------------------------------------------------------------------
// Helpers
// ------------------------------------------------------------------

type Built =
  | { ok: true;  plan: QueryPlan }
  | { ok: false; response: ApiResponse<never> }

/**
 * Scopes one CancellationToken to the request. A non-empty `_cancel`
 * parameter cancels it up front; an aborted transport signal cancels it at
 * any point.
 */
async function withToken<T>(
  request: ApiRequest,
  deps:    ApiDeps,
  handle:  (token: CancellationToken) => Promise<ApiResponse<T>>,
): Promise<ApiResponse<T>> {
  const timeoutMs = deps.timeoutMs === undefined ? DEFAULT_REQUEST_TIMEOUT_MS : deps.timeoutMs
  const token = request.signal
    ? CancellationToken.fromSignal(request.signal, timeoutMs, deps.clock)
    : new CancellationToken(timeoutMs, deps.clock)

  try {
    if (request.params._cancel) token.cancel()
    return await handle(token)
  } finally {
    token.dispose()
  }
}

function plan(deps: ApiDeps, entity: string, params: RawParams, paginate: boolean, token: CancellationToken): Built {
  try {
    return { ok: true, plan: buildQueryPlan(deps.registry ?? contactsRegistry, entity, params, { paginate }) }
  } catch (err) {
    if (token.cancelled) return { ok: false, response: CANCELLED }
    if (!isPlanError(err)) throw err
    const field = 'field' in err ? err.field : undefined
    return { ok: false, response: { status: 400, body: field === undefined ? { detail: err.message } : { detail: err.message, field } } }
  }
}

function failure(outcome: Exclude<ExecutionOutcome<unknown>, { status: 'success' }>, deps: ApiDeps): ApiResponse<never> {
  switch (outcome.status) {
    case 'cancelled': return CANCELLED
    case 'timed_out': return TIMED_OUT
    case 'execution_failed':
      deps.onError?.(outcome.cause)
      return { status: 500, body: { detail: 'Query failed' } }
  }
}
