import type { ExecutionMetrics, ExecutionStatus } from '../execution/executor'
import type { Clock } from '../execution/cancellation'
import type { BuildOptions } from '../plan/builder'
import type { QueryPlan, RawParams } from '../plan/types'

export type PaginationVariant = 'first' | 'middle' | 'last' | 'random'

export interface BenchmarkScenario {
  name:         string
  description?: string
  entity:       string
  /** Raw request parameters, exactly as a client would send them. */
  params:       RawParams
  repetitions?: number
  /** Pages to visit per repetition; omitted means one run with `params` as given. */
  variants?:    readonly PaginationVariant[]
  /** Random pages drawn per repetition for the `random` variant. */
  randomPages?: number
  paginate?:    boolean
}

export interface BenchmarkResult {
  scenario:   string
  /** Position among this scenario's recorded runs, from 0. */
  runIndex:   number
  repetition: number
  variant:    PaginationVariant | null
  page:       number | null
  /** Null when the plan could not be built. */
  plan:       QueryPlan | null
  status:     ExecutionStatus
  metrics:    ExecutionMetrics
  error:      string | null
  timestamp:  Date
}

export interface HarnessConfig {
  repetitions:   number
  warmup:        number
  /** Deadline given to every run's CancellationToken. */
  deadlineMs:    number
  randomPages?:  number
  buildOptions?: BuildOptions
  /** Uniform in [0, 1); drives the random page variant. */
  random?:       () => number
  clock?:        Clock
}

export interface HarnessHooks {
  onScenarioStart?: (scenario: BenchmarkScenario) => void
  onResult?:        (result: BenchmarkResult) => void
}
