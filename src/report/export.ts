import * as fs   from 'fs'
import * as path from 'path'

import type { BenchmarkResult } from '../harness/types'
import { describePlan } from '../plan/builder'
import { STATUSES, type BenchmarkReport, type ScenarioSummary } from './aggregate'

export const RUNS_CSV_HEADER    = 'scenario,run_index,status,duration_ms,query_count,result_count'
export const SUMMARY_CSV_HEADER = [
  'scenario', 'runs', ...STATUSES,
  'mean_ms', 'median_ms', 'p95_ms', 'min_ms', 'max_ms',
  'mean_query_count', 'mean_result_count',
].join(',')

/** Numeric series per scenario for a charting collaborator; success runs only. */
export interface ChartSeries {
  scenario:   string
  runIndex:   number[]
  durationMs: number[]
  queryCount: number[]
}

export interface ReportFiles {
  json:       string
  runsCsv:    string
  summaryCsv: string
  /** `toChartSeries` output for the charting collaborator. */
  chart:      string
}

// ------------------------------------------------------------------
// Serialisation
// ------------------------------------------------------------------

function csvCell(value: string | number | null): string {
  if (value === null) return ''
  const s = String(value)
  return /[",\n\r]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s
}

function fixed(value: number | null | undefined): string | null {
  return value === null || value === undefined ? null : value.toFixed(3)
}

function runRecord(r: BenchmarkResult) {
  return {
    scenario:     r.scenario,
    run_index:    r.runIndex,
    status:       r.status,
    duration_ms:  r.metrics.durationMs,
    query_count:  r.metrics.queryCount,
    result_count: r.metrics.resultCount,
    repetition:   r.repetition,
    variant:      r.variant,
    page:         r.page,
    error:        r.error,
    plan:         r.plan ? JSON.parse(describePlan(r.plan)) as unknown : null,
    timestamp:    r.timestamp.toISOString(),
  }
}

function summaryRecord(s: ScenarioSummary) {
  return {
    scenario:          s.scenario,
    runs:              s.runs,
    status_counts:     s.statusCounts,
    mean_ms:           s.durations?.mean ?? null,
    median_ms:         s.durations?.median ?? null,
    p95_ms:            s.durations?.p95 ?? null,
    min_ms:            s.durations?.min ?? null,
    max_ms:            s.durations?.max ?? null,
    mean_query_count:  s.meanQueryCount,
    mean_result_count: s.meanResultCount,
  }
}

export function toJson(report: BenchmarkReport): string {
  return JSON.stringify({
    generated_at: report.generatedAt.toISOString(),
    summaries:    report.summaries.map(summaryRecord),
    runs:         report.results.map(runRecord),
  }, null, 2)
}

export function toRunsCsv(report: BenchmarkReport): string {
  const rows = report.results.map(r =>
    [
      csvCell(r.scenario), r.runIndex, r.status,
      r.metrics.durationMs.toFixed(3), r.metrics.queryCount, r.metrics.resultCount,
    ].join(',')
  )
  return [RUNS_CSV_HEADER, ...rows].join('\n')
}

export function toSummaryCsv(report: BenchmarkReport): string {
  const rows = report.summaries.map(s =>
    [
      s.scenario, s.runs, ...STATUSES.map(status => s.statusCounts[status]),
      fixed(s.durations?.mean), fixed(s.durations?.median), fixed(s.durations?.p95),
      fixed(s.durations?.min),  fixed(s.durations?.max),
      fixed(s.meanQueryCount),  fixed(s.meanResultCount),
    ].map(csvCell).join(',')
  )
  return [SUMMARY_CSV_HEADER, ...rows].join('\n')
}

export function toChartSeries(report: BenchmarkReport): ChartSeries[] {
  const series = new Map<string, ChartSeries>()
  for (const s of report.summaries) {
    series.set(s.scenario, { scenario: s.scenario, runIndex: [], durationMs: [], queryCount: [] })
  }
  for (const r of report.results) {
    const entry = series.get(r.scenario)
    if (!entry || r.status !== 'success') continue
    entry.runIndex.push(r.runIndex)
    entry.durationMs.push(r.metrics.durationMs)
    entry.queryCount.push(r.metrics.queryCount)
  }
  return [...series.values()]
}

// ------------------------------------------------------------------
// Files
// ------------------------------------------------------------------

export function reportStamp(date: Date = new Date()): string {
  return date.toISOString().replace(/[:.]/g, '-')
}

export function writeReport(report: BenchmarkReport, dir: string, stamp: string = reportStamp(report.generatedAt)): ReportFiles {
  fs.mkdirSync(dir, { recursive: true })

  const files: ReportFiles = {
    json:       path.join(dir, `results_${stamp}.json`),
    runsCsv:    path.join(dir, `runs_${stamp}.csv`),
    summaryCsv: path.join(dir, `summary_${stamp}.csv`),
    chart:      path.join(dir, `chart_${stamp}.json`),
  }
  fs.writeFileSync(files.json,       toJson(report))
  fs.writeFileSync(files.runsCsv,    toRunsCsv(report))
  fs.writeFileSync(files.summaryCsv, toSummaryCsv(report))
  fs.writeFileSync(files.chart,      JSON.stringify(toChartSeries(report), null, 2))
  return files
}
