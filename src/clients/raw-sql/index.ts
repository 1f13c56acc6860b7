import { Pool, type PoolClient, type QueryResult, type QueryResultRow } from 'pg'
import { dbConfig, pgConnection } from '../../../configs/db'
import type { QueryPlan } from '../../plan/types'
import type { QueryStore, Row, StoreCallOptions, StoreCountResult, StoreQueryResult } from '../../types'
import { statementTimeoutSql, translateStoreError } from '../shared'
import { compileCount, compileSelect, type CompiledQuery } from './compiler'

type Runner = <R extends QueryResultRow>(query: CompiledQuery) => Promise<QueryResult<R>>

export interface RawSqlStoreOptions {
  pool?:          Pool
  /** Called when the best-effort server-side cancel fails. */
  onCancelError?: (err: unknown) => void
}

export class RawSqlStore implements QueryStore {
  readonly name = 'raw'

  private readonly pool: Pool
  private readonly onCancelError: (err: unknown) => void

  constructor(options: RawSqlStoreOptions = {}) {
    this.pool = options.pool ?? new Pool({
      ...pgConnection(),
      min: dbConfig.pool.min,
      max: dbConfig.pool.max,
    })
    this.onCancelError = options.onCancelError ?? (err => console.error('pg_cancel_backend failed:', err))
  }

  // ------------------------------------------------------------------
  // Read
  // ------------------------------------------------------------------

  async execute(plan: QueryPlan, options: StoreCallOptions): Promise<StoreQueryResult> {
    return this.withClient(options, async run => {
      let totalCount = 0
      if (plan.pagination) {
        const { rows: [row] } = await run<{ count: number }>(compileCount(plan))
        totalCount = row?.count ?? 0
      }

      const { rows } = await run<Row>(compileSelect(plan))
      return {
        rows,
        totalCount:     plan.pagination ? totalCount : rows.length,
        statementCount: plan.pagination ? 2 : 1,
      }
    })
  }

  async count(plan: QueryPlan, options: StoreCallOptions): Promise<StoreCountResult> {
    return this.withClient(options, async run => {
      const { rows: [row] } = await run<{ count: number }>(compileCount(plan))
      return { count: row?.count ?? 0, statementCount: 1 }
    })
  }

  // ------------------------------------------------------------------
  // Connection scope
  // ------------------------------------------------------------------

  /**
   * Runs `work` on one pooled connection inside a read-only transaction with
   * the statement timeout applied. An abort cancels the backend's running
   * statement; the connection goes back to the pool only after that cancel
   * has landed, and is discarded when the rollback fails.
   */
  private async withClient<T>(options: StoreCallOptions, work: (run: Runner) => Promise<T>): Promise<T> {
    const { signal, statementTimeoutMs } = options
    signal.throwIfAborted()

    const client: PoolClient = await this.pool.connect()
    const cancels: Promise<void>[] = []
    let onAbort: (() => void) | null = null
    let broken: Error | undefined

    try {
      await client.query('BEGIN READ ONLY')
      if (statementTimeoutMs !== undefined) await client.query(statementTimeoutSql(statementTimeoutMs))

      const { rows: [backend] } = await client.query<{ pid: number }>('SELECT pg_backend_pid() AS pid')
      if (backend) {
        const pid = backend.pid
        onAbort = () => {
          cancels.push(this.pool.query('SELECT pg_cancel_backend($1)', [pid]).then(() => undefined, this.onCancelError))
        }
        signal.addEventListener('abort', onAbort, { once: true })
      }
      signal.throwIfAborted()

      const run: Runner = <R extends QueryResultRow>(query: CompiledQuery) =>
        client.query<R>(query.sql, query.params)
      const result = await work(run)

      await client.query('COMMIT')
      return result
    } catch (err) {
      try {
        await client.query('ROLLBACK')
      } catch (rollbackErr) {
        broken = rollbackErr instanceof Error ? rollbackErr : new Error(String(rollbackErr))
      }
      throw translateStoreError(err, statementTimeoutMs, signal)
    } finally {
      if (onAbort) signal.removeEventListener('abort', onAbort)
      await Promise.all(cancels)
      client.release(broken)
    }
  }

  // ------------------------------------------------------------------
  // Lifecycle
  // ------------------------------------------------------------------

  async close(): Promise<void> {
    await this.pool.end()
  }
}
