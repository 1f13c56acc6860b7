import * as fs   from 'fs'
import * as os   from 'os'
import * as path from 'path'
import { afterEach, describe, it, expect } from 'vitest'
import type { ExecutionStatus } from '../../src/execution/executor'
import type { BenchmarkResult } from '../../src/harness/types'
import { buildQueryPlan } from '../../src/plan/builder'
import { aggregate, median, percentile } from '../../src/report/aggregate'
import {
  RUNS_CSV_HEADER, SUMMARY_CSV_HEADER, reportStamp, toChartSeries, toJson, toRunsCsv, toSummaryCsv, writeReport,
} from '../../src/report/export'
import { contactsRegistry } from '../../src/schema/contacts'

const AT = new Date('2024-05-01T12:00:00.000Z')

function result(scenario: string, runIndex: number, durationMs: number, status: ExecutionStatus = 'success'): BenchmarkResult {
  return {
    scenario,
    runIndex,
    repetition: runIndex,
    variant:    null,
    page:       null,
    plan:       null,
    status,
    metrics:    { status, durationMs, queryCount: status === 'success' ? 2 : 0, resultCount: status === 'success' ? 50 : 0 },
    error:      status === 'success' ? null : status,
    timestamp:  AT,
  }
}

describe('aggregate', () => {
  it('summarises durations of successful runs', () => {
    const report = aggregate([10, 20, 30, 40, 50].map((d, i) => result('list', i, d)), AT)
    const [summary] = report.summaries

    expect(summary?.durations).toEqual({ mean: 30, median: 30, p95: 50, min: 10, max: 50 })
    expect(summary?.meanQueryCount).toBe(2)
    expect(summary?.meanResultCount).toBe(50)
    expect(summary?.runs).toBe(5)
  })

  it('counts every status but keeps failed runs out of the statistics', () => {
    const report = aggregate([
      result('list', 0, 10),
      result('list', 1, 999, 'timed_out'),
      result('list', 2, 30),
      result('list', 3, 1, 'cancelled'),
      result('list', 4, 5, 'execution_failed'),
    ])
    const [summary] = report.summaries

    expect(summary?.statusCounts).toEqual({ success: 2, cancelled: 1, timed_out: 1, execution_failed: 1 })
    expect(summary?.durations).toEqual({ mean: 20, median: 20, p95: 30, min: 10, max: 30 })
  })

  it('reports no statistics for a scenario without successes', () => {
    const [summary] = aggregate([result('slow', 0, 100, 'timed_out')]).summaries
    expect(summary?.durations).toBeNull()
    expect(summary?.meanQueryCount).toBeNull()
  })

  it('groups by scenario in first-seen order', () => {
    const report = aggregate([result('b', 0, 1), result('a', 0, 2), result('b', 1, 3)])
    expect(report.summaries.map(s => [s.scenario, s.runs])).toEqual([['b', 2], ['a', 1]])
  })

  it('uses nearest-rank percentiles and averages the middle pair for the median', () => {
    expect(percentile([1, 2, 3, 4], 50)).toBe(2)
    expect(percentile([], 95)).toBe(0)
    expect(median([1, 2, 3, 4])).toBe(2.5)
  })
})

describe('exporters', () => {
  const report = aggregate([
    result('list', 0, 12.3456),
    result('list', 1, 40, 'timed_out'),
    result('with, comma', 0, 5),
  ], AT)

  it('writes runs CSV with the stable header', () => {
    expect(toRunsCsv(report).split('\n')).toEqual([
      'scenario,run_index,status,duration_ms,query_count,result_count',
      'list,0,success,12.346,2,50',
      'list,1,timed_out,40.000,0,0',
      '"with, comma",0,success,5.000,2,50',
    ])
    expect(RUNS_CSV_HEADER).toBe('scenario,run_index,status,duration_ms,query_count,result_count')
  })

  it('writes one summary row per scenario', () => {
    const lines = toSummaryCsv(report).split('\n')
    expect(lines[0]).toBe(SUMMARY_CSV_HEADER)
    expect(lines[0]).toBe(
      'scenario,runs,success,cancelled,timed_out,execution_failed,mean_ms,median_ms,p95_ms,min_ms,max_ms,mean_query_count,mean_result_count'
    )
    expect(lines[1]).toBe('list,2,1,0,1,0,12.346,12.346,12.346,12.346,12.346,2.000,50.000')
  })

  it('leaves statistics empty when nothing succeeded', () => {
    const lines = toSummaryCsv(aggregate([result('slow', 0, 9, 'cancelled')])).split('\n')
    expect(lines[1]).toBe('slow,1,0,1,0,0,,,,,,,')
  })

  it('serialises runs and summaries to JSON', () => {
    const parsed = JSON.parse(toJson(report))
    expect(parsed.generated_at).toBe('2024-05-01T12:00:00.000Z')
    expect(parsed.runs[1]).toMatchObject({
      scenario: 'list', run_index: 1, status: 'timed_out', duration_ms: 40, query_count: 0, result_count: 0,
      error: 'timed_out', plan: null, timestamp: '2024-05-01T12:00:00.000Z',
    })
    expect(parsed.summaries[0]).toMatchObject({ scenario: 'list', runs: 2, mean_ms: 12.3456 })
  })

  it('includes the plan description when there is a plan', () => {
    const plan = buildQueryPlan(contactsRegistry, 'AppUser', { gender: 'F' })
    const parsed = JSON.parse(toJson(aggregate([{ ...result('p', 0, 1), plan }])))
    expect(parsed.runs[0].plan.filters).toEqual([['gender', 'equals', 'F']])
  })

  it('hands charting only numeric series from successful runs', () => {
    expect(toChartSeries(report)).toEqual([
      { scenario: 'list',        runIndex: [0], durationMs: [12.3456], queryCount: [2] },
      { scenario: 'with, comma', runIndex: [0], durationMs: [5],       queryCount: [2] },
    ])
  })
})

describe('writeReport', () => {
  let dir: string | null = null

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true })
    dir = null
  })

  it('writes JSON, runs CSV, summary CSV and chart series under one stamp', () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'bench-report-'))
    const report = aggregate([result('list', 0, 10)], AT)
    const files  = writeReport(report, path.join(dir, 'out'))

    expect(path.basename(files.json)).toBe('results_2024-05-01T12-00-00-000Z.json')
    expect(path.basename(files.runsCsv)).toBe('runs_2024-05-01T12-00-00-000Z.csv')
    expect(path.basename(files.summaryCsv)).toBe('summary_2024-05-01T12-00-00-000Z.csv')
    expect(fs.readFileSync(files.runsCsv, 'utf8')).toBe(toRunsCsv(report))
    expect(JSON.parse(fs.readFileSync(files.json, 'utf8')).runs).toHaveLength(1)
  })

  it('writes the chart series beside the results', () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'bench-report-'))
    const report = aggregate([result('list', 0, 10), result('list', 1, 30), result('detail', 0, 5)], AT)
    const files  = writeReport(report, dir)

    expect(path.basename(files.chart)).toBe('chart_2024-05-01T12-00-00-000Z.json')
    expect(JSON.parse(fs.readFileSync(files.chart, 'utf8'))).toEqual(JSON.parse(JSON.stringify(toChartSeries(report))))
  })

  it('formats stamps without separators that upset file systems', () => {
    expect(reportStamp(AT)).toBe('2024-05-01T12-00-00-000Z')
  })
})
