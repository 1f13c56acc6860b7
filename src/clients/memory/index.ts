import { StoreTimeoutError } from '../../errors'
import { compareScalars, pageWindow } from '../../plan/builder'
import type { FilterClause, OrderTerm, QueryPlan, SearchSpec } from '../../plan/types'
import type { ResolvedField } from '../../schema/types'
import type {
  ContactsDataset, QueryStore, Row, StoreCallOptions, StoreCountResult, StoreQueryResult,
} from '../../types'

export interface MemoryStoreOptions {
  /** Artificial store latency per call. */
  latencyMs?: number | ((plan: QueryPlan) => number)
}

interface Candidate {
  row:     Row
  related: ReadonlyMap<string, Row | undefined>
}

/**
 * In-process store over plain table rows. Filtering, search, ordering and
 * null placement follow PostgreSQL so plans behave the same here as on the
 * SQL adapters. Simulates latency, statement timeouts and aborts.
 */
export class MemoryStore implements QueryStore {
  readonly name = 'memory'

  /** Store round-trips started. */
  calls    = 0
  /** Calls that ended because the caller aborted them. */
  aborted  = 0
  /** Calls currently holding the store. */
  inFlight = 0

  private readonly tables:  ReadonlyMap<string, Row[]>
  private readonly indexes = new Map<string, Map<unknown, Row>>()
  private closed = false

  constructor(dataset: ContactsDataset, private readonly options: MemoryStoreOptions = {}) {
    this.tables = new Map<string, Row[]>([
      ['address',               dataset.address.map(r => ({ ...r }))],
      ['appuser',               dataset.appuser.map(r => ({ ...r }))],
      ['customer_relationship', dataset.customer_relationship.map(r => ({ ...r }))],
    ])
  }

  async execute(plan: QueryPlan, options: StoreCallOptions): Promise<StoreQueryResult> {
    return this.call(plan, options, () => {
      const matched = this.match(plan)
      matched.sort((a, b) => compareCandidates(a, b, plan.ordering))

      const page = plan.pagination ? pageWindow(plan.pagination) : null
      const window = page ? matched.slice(page.offset, page.offset + page.limit) : matched

      return {
        rows:           window.map(c => project(c, plan.select)),
        totalCount:     matched.length,
        // paginated lists issue COUNT(*) plus the page query
        statementCount: plan.pagination ? 2 : 1,
      }
    })
  }

  async count(plan: QueryPlan, options: StoreCallOptions): Promise<StoreCountResult> {
    return this.call(plan, options, () => ({ count: this.match(plan).length, statementCount: 1 }))
  }

  async close(): Promise<void> {
    this.closed = true
  }

  // ------------------------------------------------------------------
  // Call lifecycle
  // ------------------------------------------------------------------

  private async call<T>(plan: QueryPlan, options: StoreCallOptions, work: () => T): Promise<T> {
    if (this.closed) throw new Error('MemoryStore is closed')
    this.calls++
    this.inFlight++
    try {
      const latency = typeof this.options.latencyMs === 'function'
        ? this.options.latencyMs(plan)
        : this.options.latencyMs ?? 0
      if (latency > 0) await this.wait(latency, options)
      options.signal.throwIfAborted()
      return work()
    } finally {
      this.inFlight--
    }
  }

  private wait(latencyMs: number, { signal, statementTimeoutMs }: StoreCallOptions): Promise<void> {
    // the store gives up on its own once the statement timeout passes
    const cutoff = statementTimeoutMs !== undefined && statementTimeoutMs < latencyMs ? statementTimeoutMs : null

    return new Promise((resolve, reject) => {
      const onAbort = () => {
        clearTimeout(timer)
        this.aborted++
        reject(signal.reason)
      }
      const timer = setTimeout(() => {
        signal.removeEventListener('abort', onAbort)
        if (cutoff === null) resolve()
        else reject(new StoreTimeoutError(cutoff))
      }, cutoff ?? latencyMs)

      if (signal.aborted) return onAbort()
      signal.addEventListener('abort', onAbort, { once: true })
    })
  }

  // ------------------------------------------------------------------
  // Evaluation
  // ------------------------------------------------------------------

  private table(name: string): Row[] {
    const rows = this.tables.get(name)
    if (!rows) throw new Error(`Unknown table: ${name}`)
    return rows
  }

  private index(table: string, column: string): Map<unknown, Row> {
    const key = `${table}.${column}`
    let index = this.indexes.get(key)
    if (!index) {
      index = new Map()
      for (const row of this.table(table)) {
        const value = row[column]
        if (value !== null && value !== undefined && !index.has(value)) index.set(value, row)
      }
      this.indexes.set(key, index)
    }
    return index
  }

  private match(plan: QueryPlan): Candidate[] {
    const candidates = this.table(plan.table).map((row): Candidate => {
      const related = new Map<string, Row | undefined>()
      for (const join of plan.joins) {
        const local = row[join.localColumn]
        related.set(join.name, local === null || local === undefined
          ? undefined
          : this.index(join.table, join.targetColumn).get(local))
      }
      return { row, related }
    })

    return candidates.filter(c =>
      plan.filters.every(f => matchesFilter(c, f))
      && (plan.search === null || matchesSearch(c, plan.search))
      && (plan.nameMatch === null || matchesSearch(c, plan.nameMatch))
    )
  }
}

// ------------------------------------------------------------------
// Row helpers
// ------------------------------------------------------------------

function valueOf(candidate: Candidate, field: ResolvedField): unknown {
  const source = field.relation === null ? candidate.row : candidate.related.get(field.relation.name)
  const value  = source?.[field.column]
  return value === undefined ? null : value
}

function isComparable(value: unknown): value is string | number | Date {
  return typeof value === 'string' || typeof value === 'number' || value instanceof Date
}

function matchesFilter(candidate: Candidate, filter: FilterClause): boolean {
  const value = valueOf(candidate, filter.field)
  if (filter.operator === 'isnull') return filter.value === !isComparable(value)
  if (!isComparable(value)) return false

  switch (filter.operator) {
    case 'equals':   return compareScalars(value, filter.value) === 0
    case 'contains': return typeof value === 'string' && containsCi(value, String(filter.value))
    case 'gte':      return compareScalars(value, filter.value) >= 0
    case 'lte':      return compareScalars(value, filter.value) <= 0
    case 'gt':       return compareScalars(value, filter.value) > 0
    case 'lt':       return compareScalars(value, filter.value) < 0
    case 'range':
      return compareScalars(value, filter.value[0]) >= 0 && compareScalars(value, filter.value[1]) <= 0
  }
}

function matchesSearch(candidate: Candidate, search: SearchSpec): boolean {
  return search.fields.some(field => {
    const value = valueOf(candidate, field)
    return typeof value === 'string' && containsCi(value, search.term)
  })
}

function containsCi(haystack: string, needle: string): boolean {
  return haystack.toLowerCase().includes(needle.toLowerCase())
}

// NULLs sort last ascending and first descending, as in PostgreSQL.
function compareValues(a: unknown, b: unknown): number {
  if (!isComparable(a)) return isComparable(b) ? 1 : 0
  if (!isComparable(b)) return -1
  return compareScalars(a, b)
}

function compareCandidates(a: Candidate, b: Candidate, ordering: readonly OrderTerm[]): number {
  for (const term of ordering) {
    const cmp = compareValues(valueOf(a, term.field), valueOf(b, term.field))
    if (cmp !== 0) return term.direction === 'desc' ? -cmp : cmp
  }
  return 0
}

function project(candidate: Candidate, select: readonly ResolvedField[]): Row {
  const row: Row = {}
  for (const field of select) row[field.path] = valueOf(candidate, field)
  return row
}
