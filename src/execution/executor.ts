import { StoreTimeoutError } from '../errors'
import type { QueryPlan } from '../plan/types'
import type { QueryStore, Row, StoreCallOptions } from '../types'
import { systemClock, type CancellationToken, type Clock } from './cancellation'

export type ExecutionStatus = 'success' | 'cancelled' | 'timed_out' | 'execution_failed'

export interface ExecutionMetrics {
  status:      ExecutionStatus
  durationMs:  number
  queryCount:  number
  resultCount: number
}

export type ExecutionOutcome<T> =
  | { status: 'success';          result: T;          metrics: ExecutionMetrics }
  | { status: 'cancelled';                            metrics: ExecutionMetrics }
  | { status: 'timed_out';        elapsedMs: number;  metrics: ExecutionMetrics }
  | { status: 'execution_failed'; cause: unknown;     metrics: ExecutionMetrics }

export interface QueryResult {
  rows:        Row[]
  resultCount: number
  totalCount:  number
}

export interface ExecutorConfig {
  /** Upper bound on how long a cancel or an expired deadline goes unnoticed. */
  pollIntervalMs:         number
  /** Push the remaining deadline down as the store's statement timeout. */
  enableStatementTimeout: boolean
  clock?:                 Clock
}

export const DEFAULT_EXECUTOR_CONFIG: ExecutorConfig = {
  pollIntervalMs:         25,
  enableStatementTimeout: true,
}

type Settled<T> =
  | { kind: 'value'; value: T }
  | { kind: 'error'; error: unknown }
  | { kind: 'cancelled' }
  | { kind: 'timed_out' }

interface Reply<T> {
  value:      T
  queryCount: number
}

interface Measured {
  queryCount:  number
  resultCount: number
}

/**
 * Runs plans against a store under a caller-owned CancellationToken. Holds no
 * per-call state, so one instance serves any number of concurrent callers.
 */
export class QueryExecutor {
  private readonly clock: Clock

  constructor(
    private readonly store:  QueryStore,
    private readonly config: ExecutorConfig = DEFAULT_EXECUTOR_CONFIG,
  ) {
    if (!(config.pollIntervalMs > 0)) throw new Error('pollIntervalMs must be positive')
    this.clock = config.clock ?? systemClock
  }

  get storeName(): string {
    return this.store.name
  }

  execute(plan: QueryPlan, token: CancellationToken): Promise<ExecutionOutcome<QueryResult>> {
    return this.run(
      token,
      async options => {
        const { rows, totalCount, statementCount } = await this.store.execute(plan, options)
        return { value: { rows, resultCount: rows.length, totalCount }, queryCount: statementCount }
      },
      result => result.resultCount,
    )
  }

  /** Count-only query under the same deadline and cancellation rules. */
  count(plan: QueryPlan, token: CancellationToken): Promise<ExecutionOutcome<number>> {
    return this.run(
      token,
      async options => {
        const { count, statementCount } = await this.store.count(plan, options)
        return { value: count, queryCount: statementCount }
      },
      () => 1,
    )
  }

  // ------------------------------------------------------------------
  // Internals
  // ------------------------------------------------------------------

  private async run<T>(
    token:       CancellationToken,
    dispatch:    (options: StoreCallOptions) => Promise<Reply<T>>,
    resultCount: (value: T) => number,
  ): Promise<ExecutionOutcome<T>> {
    const startedAt = this.clock.now()
    const metrics = (status: ExecutionStatus, measured: Measured = { queryCount: 0, resultCount: 0 }): ExecutionMetrics => ({
      status,
      durationMs: this.clock.now() - startedAt,
      ...measured,
    })

    if (token.cancelled) return { status: 'cancelled', metrics: metrics('cancelled') }
    if (token.expired) {
      return { status: 'timed_out', elapsedMs: token.elapsedMs(), metrics: metrics('timed_out') }
    }

    const controller = new AbortController()
    const remaining  = token.remainingMs()
    const options: StoreCallOptions = {
      signal: controller.signal,
      statementTimeoutMs: this.config.enableStatementTimeout && Number.isFinite(remaining)
        ? Math.max(1, Math.ceil(remaining))
        : undefined,
    }

    let pending: Promise<Settled<Reply<T>>>
    try {
      pending = dispatch(options).then(
        (value): Settled<Reply<T>> => ({ kind: 'value', value }),
        (error: unknown): Settled<Reply<T>> => ({ kind: 'error', error }),
      )
    } catch (error) {
      pending = Promise.resolve<Settled<Reply<T>>>({ kind: 'error', error })
    }

    const settled = await this.waitFor(pending, token)

    switch (settled.kind) {
      case 'cancelled':
        controller.abort()
        return { status: 'cancelled', metrics: metrics('cancelled') }

      case 'timed_out':
        controller.abort()
        return { status: 'timed_out', elapsedMs: token.elapsedMs(), metrics: metrics('timed_out') }

      case 'error': {
        const { error } = settled
        if (token.cancelled) return { status: 'cancelled', metrics: metrics('cancelled') }
        if (error instanceof StoreTimeoutError || token.expired) {
          return { status: 'timed_out', elapsedMs: token.elapsedMs(), metrics: metrics('timed_out') }
        }
        return { status: 'execution_failed', cause: error, metrics: metrics('execution_failed') }
      }

      case 'value': {
        const { value, queryCount } = settled.value
        // a result that lands after cancel or after the deadline is discarded
        if (token.cancelled) return { status: 'cancelled', metrics: metrics('cancelled', { queryCount, resultCount: 0 }) }
        if (token.expired) {
          return {
            status:    'timed_out',
            elapsedMs: token.elapsedMs(),
            metrics:   metrics('timed_out', { queryCount, resultCount: 0 }),
          }
        }
        return {
          status:  'success',
          result:  value,
          metrics: metrics('success', { queryCount, resultCount: resultCount(value) }),
        }
      }
    }
  }

  /**
   * Races the store call against the token. The token is re-checked at least
   * every `pollIntervalMs` and never later than its deadline; a cancel wakes
   * the wait immediately.
   */
  private waitFor<T>(pending: Promise<Settled<T>>, token: CancellationToken): Promise<Settled<T>> {
    return new Promise(resolve => {
      let timer: NodeJS.Timeout | undefined
      let unsubscribe = () => {}
      let done = false

      const finish = (settled: Settled<T>) => {
        if (done) return
        done = true
        if (timer !== undefined) clearTimeout(timer)
        unsubscribe()
        resolve(settled)
      }

      const check = () => {
        if (token.cancelled) return finish({ kind: 'cancelled' })
        const remaining = token.remainingMs()
        if (remaining <= 0) return finish({ kind: 'timed_out' })
        timer = setTimeout(check, Math.ceil(Math.min(this.config.pollIntervalMs, remaining)))
      }

      unsubscribe = token.onCancel(() => finish({ kind: 'cancelled' }))
      void pending.then(finish)
      check()
    })
  }
}
