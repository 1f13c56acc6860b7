import type { ExecutionStatus } from '../execution/executor'
import type { BenchmarkResult } from '../harness/types'

export const STATUSES: readonly ExecutionStatus[] = ['success', 'cancelled', 'timed_out', 'execution_failed']

/** Duration statistics over a scenario's successful runs, in milliseconds. */
export interface DurationStats {
  mean:   number
  median: number
  p95:    number
  min:    number
  max:    number
}

export interface ScenarioSummary {
  scenario:        string
  runs:            number
  statusCounts:    Record<ExecutionStatus, number>
  /** Null when no run succeeded. */
  durations:       DurationStats | null
  meanQueryCount:  number | null
  meanResultCount: number | null
}

export interface BenchmarkReport {
  generatedAt: Date
  results:     readonly BenchmarkResult[]
  /** One entry per scenario, in first-seen order. */
  summaries:   readonly ScenarioSummary[]
}

// ------------------------------------------------------------------
// Stats helpers
// ------------------------------------------------------------------

/** Nearest-rank percentile over an ascending array. */
export function percentile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) return 0
  const idx = Math.ceil((p / 100) * sorted.length) - 1
  return sorted[Math.max(0, idx)] ?? 0
}

export function median(sorted: readonly number[]): number {
  if (sorted.length === 0) return 0
  const mid = Math.floor(sorted.length / 2)
  const hi  = sorted[mid] ?? 0
  if (sorted.length % 2 === 1) return hi
  return ((sorted[mid - 1] ?? 0) + hi) / 2
}

function mean(values: readonly number[]): number {
  return values.reduce((s, v) => s + v, 0) / values.length
}

export function computeStats(timings: readonly number[]): DurationStats | null {
  if (timings.length === 0) return null
  const sorted = [...timings].sort((a, b) => a - b)
  return {
    mean:   mean(timings),
    median: median(sorted),
    p95:    percentile(sorted, 95),
    min:    sorted[0] ?? 0,
    max:    sorted[sorted.length - 1] ?? 0,
  }
}

// ------------------------------------------------------------------
// Report
// ------------------------------------------------------------------

function emptyCounts(): Record<ExecutionStatus, number> {
  return { success: 0, cancelled: 0, timed_out: 0, execution_failed: 0 }
}

function summarize(scenario: string, runs: readonly BenchmarkResult[]): ScenarioSummary {
  const statusCounts = emptyCounts()
  for (const r of runs) statusCounts[r.status]++

  const ok = runs.filter(r => r.status === 'success').map(r => r.metrics)
  return {
    scenario,
    runs:            runs.length,
    statusCounts,
    durations:       computeStats(ok.map(m => m.durationMs)),
    meanQueryCount:  ok.length ? mean(ok.map(m => m.queryCount)) : null,
    meanResultCount: ok.length ? mean(ok.map(m => m.resultCount)) : null,
  }
}

export function aggregate(results: readonly BenchmarkResult[], generatedAt: Date = new Date()): BenchmarkReport {
  const byScenario = new Map<string, BenchmarkResult[]>()
  for (const r of results) {
    const group = byScenario.get(r.scenario)
    if (group) group.push(r)
    else byScenario.set(r.scenario, [r])
  }

  return Object.freeze({
    generatedAt,
    results:   [...results],
    summaries: [...byScenario].map(([scenario, runs]) => summarize(scenario, runs)),
  })
}
