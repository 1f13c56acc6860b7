import knex, { type Knex } from 'knex'
import { dbConfig, pgConnection } from '../../../configs/db'
import { pageWindow } from '../../plan/builder'
import type { QueryPlan, SearchSpec } from '../../plan/types'
import type { ResolvedField } from '../../schema/types'
import type { QueryStore, Row, StoreCallOptions, StoreCountResult, StoreQueryResult } from '../../types'
import { containsPattern, statementTimeoutSql, translateStoreError } from '../shared'

export interface QueryBuilderStoreOptions {
  db?:            Knex
  onCancelError?: (err: unknown) => void
}

export class QueryBuilderStore implements QueryStore {
  readonly name = 'knex'

  private readonly db: Knex
  private readonly onCancelError: (err: unknown) => void

  constructor(options: QueryBuilderStoreOptions = {}) {
    this.db = options.db ?? knex({
      client: 'pg',
      connection: pgConnection(),
      pool: { min: dbConfig.pool.min, max: dbConfig.pool.max },
    })
    this.onCancelError = options.onCancelError ?? (err => console.error('pg_cancel_backend failed:', err))
  }

  // ------------------------------------------------------------------
  // Read
  // ------------------------------------------------------------------

  async execute(plan: QueryPlan, options: StoreCallOptions): Promise<StoreQueryResult> {
    return this.inTransaction(options, async trx => {
      const totalCount = plan.pagination ? await this.countRows(trx, plan) : 0

      let q = this.filtered(trx, plan).select(
        Object.fromEntries(plan.select.map(f => [f.path, ref(plan, f)]))
      )
      for (const term of plan.ordering) q = q.orderBy(ref(plan, term.field), term.direction)
      if (plan.pagination) {
        const { offset, limit } = pageWindow(plan.pagination)
        q = q.limit(limit).offset(offset)
      }

      const rows: Row[] = await q
      return {
        rows,
        totalCount:     plan.pagination ? totalCount : rows.length,
        statementCount: plan.pagination ? 2 : 1,
      }
    })
  }

  async count(plan: QueryPlan, options: StoreCallOptions): Promise<StoreCountResult> {
    return this.inTransaction(options, async trx => ({
      count:          await this.countRows(trx, plan),
      statementCount: 1,
    }))
  }

  // ------------------------------------------------------------------
  // Query pieces
  // ------------------------------------------------------------------

  private filtered(trx: Knex.Transaction, plan: QueryPlan): Knex.QueryBuilder {
    let q = trx(plan.table)
    for (const join of plan.joins) {
      q = q.leftJoin(
        `${join.table} as ${join.name}`,
        `${join.name}.${join.targetColumn}`,
        `${plan.table}.${join.localColumn}`,
      )
    }

    for (const f of plan.filters) {
      const col = ref(plan, f.field)
      switch (f.operator) {
        case 'equals':   q = q.where(col, '=', f.value);  break
        case 'contains': q = q.whereILike(col, containsPattern(String(f.value))); break
        case 'gte':      q = q.where(col, '>=', f.value); break
        case 'lte':      q = q.where(col, '<=', f.value); break
        case 'gt':       q = q.where(col, '>', f.value);  break
        case 'lt':       q = q.where(col, '<', f.value);  break
        case 'range':    q = q.whereBetween(col, [f.value[0], f.value[1]]); break
        case 'isnull':   q = f.value ? q.whereNull(col) : q.whereNotNull(col); break
      }
    }

    for (const search of [plan.search, plan.nameMatch]) {
      if (search) q = q.where(inner => anyFieldContains(inner, plan, search))
    }
    return q
  }

  private async countRows(trx: Knex.Transaction, plan: QueryPlan): Promise<number> {
    const [row] = await this.filtered(trx, plan).count({ count: '*' })
    return Number(row?.count ?? 0)
  }

  /**
   * Transaction scope with the statement timeout applied; an abort cancels
   * the backend's running statement, and the connection is not handed back
   * until that cancel has landed.
   */
  private async inTransaction<T>(options: StoreCallOptions, work: (trx: Knex.Transaction) => Promise<T>): Promise<T> {
    const { signal, statementTimeoutMs } = options
    signal.throwIfAborted()

    try {
      return await this.db.transaction(async trx => {
        if (statementTimeoutMs !== undefined) await trx.raw(statementTimeoutSql(statementTimeoutMs))

        const backend: { rows: Array<{ pid: number }> } = await trx.raw('SELECT pg_backend_pid() AS pid')
        const pid     = backend.rows[0]?.pid
        const cancels: Promise<void>[] = []
        const onAbort = () => {
          if (pid === undefined) return
          cancels.push(this.db.raw('SELECT pg_cancel_backend(?)', [pid]).then(() => undefined, this.onCancelError))
        }
        signal.addEventListener('abort', onAbort, { once: true })
        try {
          signal.throwIfAborted()
          return await work(trx)
        } finally {
          signal.removeEventListener('abort', onAbort)
          // a cancel still in flight would hit whoever gets this connection next
          await Promise.all(cancels)
        }
      }, { readOnly: true })
    } catch (err) {
      throw translateStoreError(err, statementTimeoutMs, signal)
    }
  }

  // ------------------------------------------------------------------
  // Lifecycle
  // ------------------------------------------------------------------

  async close(): Promise<void> {
    await this.db.destroy()
  }
}

function ref(plan: QueryPlan, field: ResolvedField): string {
  return `${field.relation?.name ?? plan.table}.${field.column}`
}

function anyFieldContains(q: Knex.QueryBuilder, plan: QueryPlan, search: SearchSpec): void {
  const pattern = containsPattern(search.term)
  for (const field of search.fields) q.orWhereILike(ref(plan, field), pattern)
}
