import { isPlanError } from '../errors'
import { CancellationToken } from '../execution/cancellation'
import type { ExecutionMetrics, ExecutionOutcome, QueryExecutor } from '../execution/executor'
import { buildQueryPlan } from '../plan/builder'
import type { Pagination, QueryPlan, RawParams } from '../plan/types'
import type { SchemaRegistry } from '../schema/registry'
import type {
  BenchmarkResult, BenchmarkScenario, HarnessConfig, HarnessHooks, PaginationVariant,
} from './types'

type PageCount =
  | { ok: true;  totalPages: number }
  | { ok: false; outcome: Exclude<ExecutionOutcome<number>, { status: 'success' }> }

interface RunSlot {
  repetition: number
  variant:    PaginationVariant | null
  page:       number | null
}

/**
 * Drives scenarios through the executor one query at a time, so every
 * recorded duration belongs to a single in-flight statement. A failed run is
 * recorded and the harness moves on.
 */
export class BenchmarkHarness {
  constructor(
    private readonly executor: QueryExecutor,
    private readonly registry: SchemaRegistry,
    private readonly config:   HarnessConfig,
    private readonly hooks:    HarnessHooks = {},
  ) {}

  async run(scenarios: readonly BenchmarkScenario[]): Promise<BenchmarkResult[]> {
    const results: BenchmarkResult[] = []
    for (const scenario of scenarios) {
      results.push(...await this.runScenario(scenario))
    }
    return results
  }

  async runScenario(scenario: BenchmarkScenario): Promise<BenchmarkResult[]> {
    this.hooks.onScenarioStart?.(scenario)

    const results: BenchmarkResult[] = []
    const record = (slot: RunSlot, fields: Pick<BenchmarkResult, 'plan' | 'metrics' | 'error'>) => {
      const result: BenchmarkResult = {
        scenario:  scenario.name,
        runIndex:  results.length,
        ...slot,
        status:    fields.metrics.status,
        timestamp: new Date(),
        ...fields,
      }
      results.push(result)
      this.hooks.onResult?.(result)
    }

    // The template validates the parameters once; a bad scenario is one failed run.
    let template: QueryPlan
    try {
      template = this.build(scenario, scenario.params)
    } catch (err) {
      if (!isPlanError(err)) throw err
      record({ repetition: 0, variant: null, page: null }, { plan: null, metrics: failedMetrics(), error: err.message })
      return results
    }

    for (let i = 0; i < this.config.warmup; i++) {
      await this.execute(template)
    }

    const pagination = template.pagination
    const variants   = pagination && scenario.variants?.length ? scenario.variants : null
    let pageCount: PageCount | null = null

    const repetitions = scenario.repetitions ?? this.config.repetitions
    for (let repetition = 0; repetition < repetitions; repetition++) {
      if (!variants || !pagination) {
        const { plan, outcome } = await this.runPlan(template)
        record({ repetition, variant: null, page: null }, { plan, metrics: outcome.metrics, error: outcomeError(outcome) })
        continue
      }

      // with one or two pages first, middle and last coincide; each page runs once
      const visited = new Set<number>()
      for (const variant of variants) {
        if (variant === 'first') {
          if (visited.has(1)) continue
          visited.add(1)
          await this.runPage(scenario, pagination, 1, { repetition, variant, page: 1 }, record)
          continue
        }

        pageCount ??= await this.countPages(template, pagination)
        if (!pageCount.ok) {
          const { outcome } = pageCount
          record({ repetition, variant, page: null }, {
            plan:    null,
            metrics: outcome.metrics,
            error:   `total count unavailable: ${outcomeError(outcome) ?? outcome.status}`,
          })
          continue
        }

        for (const page of this.pagesFor(variant, pageCount.totalPages, scenario)) {
          if (visited.has(page)) continue
          visited.add(page)
          await this.runPage(scenario, pagination, page, { repetition, variant, page }, record)
        }
      }
    }

    return results
  }

  // ------------------------------------------------------------------
  // Single runs
  // ------------------------------------------------------------------

  private build(scenario: BenchmarkScenario, params: RawParams): QueryPlan {
    return buildQueryPlan(this.registry, scenario.entity, params, {
      ...this.config.buildOptions,
      paginate: scenario.paginate ?? this.config.buildOptions?.paginate,
    })
  }

  private newToken(): CancellationToken {
    return CancellationToken.withTimeout(this.config.deadlineMs, this.config.clock)
  }

  private async execute(plan: QueryPlan) {
    const token = this.newToken()
    try {
      return await this.executor.execute(plan, token)
    } finally {
      token.dispose()
    }
  }

  /** Fresh plan instance and fresh token per run. */
  private async runPlan(template: QueryPlan) {
    const plan = Object.freeze({ ...template })
    return { plan, outcome: await this.execute(plan) }
  }

  private async runPage(
    scenario:   BenchmarkScenario,
    pagination: Pagination,
    page:       number,
    slot:       RunSlot,
    record:     (slot: RunSlot, fields: Pick<BenchmarkResult, 'plan' | 'metrics' | 'error'>) => void,
  ): Promise<void> {
    let plan: QueryPlan
    try {
      plan = this.build(scenario, paramsForPage(scenario.params, pagination, page))
    } catch (err) {
      if (!isPlanError(err)) throw err
      record(slot, { plan: null, metrics: failedMetrics(), error: err.message })
      return
    }
    const outcome = await this.execute(plan)
    record(slot, { plan, metrics: outcome.metrics, error: outcomeError(outcome) })
  }

  // ------------------------------------------------------------------
  // Page variants
  // ------------------------------------------------------------------

  private async countPages(template: QueryPlan, pagination: Pagination): Promise<PageCount> {
    const token = this.newToken()
    try {
      const outcome = await this.executor.count(template, token)
      if (outcome.status !== 'success') return { ok: false, outcome }
      const size = pagination.mode === 'page' ? pagination.pageSize : pagination.limit
      return { ok: true, totalPages: Math.max(1, Math.ceil(outcome.result / size)) }
    } finally {
      token.dispose()
    }
  }

  private pagesFor(variant: Exclude<PaginationVariant, 'first'>, totalPages: number, scenario: BenchmarkScenario): number[] {
    switch (variant) {
      case 'middle': return [Math.ceil(totalPages / 2)]
      case 'last':   return [totalPages]
      case 'random': {
        // distinct pages other than first, middle and last, ascending
        const fixed = new Set([1, Math.ceil(totalPages / 2), totalPages])
        const pool: number[] = []
        for (let p = 2; p <= totalPages; p++) if (!fixed.has(p)) pool.push(p)

        const random = this.config.random ?? Math.random
        const draws  = Math.min(pool.length, scenario.randomPages ?? this.config.randomPages ?? 1)
        for (let i = 0; i < draws; i++) {
          const j = i + Math.floor(random() * (pool.length - i))
          const picked = pool[j] ?? 0
          pool[j] = pool[i] ?? 0
          pool[i] = picked
        }
        return pool.slice(0, draws).sort((a, b) => a - b)
      }
    }
  }
}

// ------------------------------------------------------------------
// Helpers
// ------------------------------------------------------------------

function paramsForPage(params: RawParams, pagination: Pagination, page: number): RawParams {
  if (pagination.mode === 'page') return { ...params, page: String(page) }
  return { ...params, offset: String((page - 1) * pagination.limit) }
}

function failedMetrics(): ExecutionMetrics {
  return { status: 'execution_failed', durationMs: 0, queryCount: 0, resultCount: 0 }
}

export function outcomeError(outcome: ExecutionOutcome<unknown>): string | null {
  switch (outcome.status) {
    case 'success':          return null
    case 'cancelled':        return 'cancelled'
    case 'timed_out':        return `timed out after ${outcome.elapsedMs.toFixed(1)} ms`
    case 'execution_failed': return outcome.cause instanceof Error ? outcome.cause.message : String(outcome.cause)
  }
}
