import { Command } from 'commander'

import { RawSqlStore }          from '../../src/clients/raw-sql'
import { QueryBuilderStore }    from '../../src/clients/query-builder'
import { MemoryStore }          from '../../src/clients/memory'
import { QueryExecutor }        from '../../src/execution/executor'
import { BenchmarkHarness }     from '../../src/harness/harness'
import { aggregate, type ScenarioSummary } from '../../src/report/aggregate'
import { reportStamp, writeReport } from '../../src/report/export'
import { generateDataset }      from '../../src/fixtures/generate'
import { contactsRegistry }     from '../../src/schema/contacts'
import { benchConfig }          from '../../configs/bench'
import { cases, caseMap }       from '../cases'
import type { BenchmarkResult } from '../../src/harness/types'
import type { QueryStore }      from '../../src/types'

// ------------------------------------------------------------------
// Store registry
// ------------------------------------------------------------------

type StoreName = 'raw' | 'knex' | 'memory'

const STORE_NAMES: readonly StoreName[] = ['raw', 'knex', 'memory']

function isStoreName(name: string): name is StoreName {
  return STORE_NAMES.some(s => s === name)
}

interface MemoryOptions {
  rows:      number
  latencyMs: number
}

function createStore(name: StoreName, memory: MemoryOptions): QueryStore {
  switch (name) {
    case 'raw':  return new RawSqlStore()
    case 'knex': return new QueryBuilderStore()
    case 'memory': {
      const ratio   = benchConfig.dataSizes.M.addresses / benchConfig.dataSizes.M.users
      const dataset = generateDataset(
        { users: memory.rows, addresses: Math.max(1, Math.round(memory.rows * ratio)) },
        { seed: 42 },
      )
      return new MemoryStore(dataset, { latencyMs: memory.latencyMs })
    }
  }
}

// ------------------------------------------------------------------
// Output
// ------------------------------------------------------------------

function ms(value: number | undefined): string {
  return value === undefined ? '      -' : value.toFixed(2).padStart(7)
}

function summaryLine(s: ScenarioSummary): string {
  const failed = s.runs - s.statusCounts.success
  return (
    `mean=${ms(s.durations?.mean)}ms  ` +
    `median=${ms(s.durations?.median)}ms  ` +
    `p95=${ms(s.durations?.p95)}ms  ` +
    `q=${(s.meanQueryCount ?? 0).toFixed(1)}  ` +
    `rows=${(s.meanResultCount ?? 0).toFixed(0).padStart(5)}  ` +
    `err=${failed}`
  )
}

function parseCount(label: string, raw: string, min: number): number {
  const n = Number(raw)
  if (!Number.isInteger(n) || n < min) {
    console.error(`Invalid ${label} "${raw}": expected an integer >= ${min}`)
    process.exit(1)
  }
  return n
}

// ------------------------------------------------------------------
// CLI
// ------------------------------------------------------------------

async function main() {
  const program = new Command()

  program
    .name('bench')
    .description('Contacts list query benchmark: filters, sorts, search and pagination')
    .option('--store <names>',       `Comma-separated stores (${STORE_NAMES.join('|')})`, 'raw')
    .option('--case <names>',        'Comma-separated case names (default: all)')
    .option('--warmup <n>',          'Unrecorded warmup runs per case', String(benchConfig.warmup))
    .option('--repetitions <n>',     'Recorded runs per case',          String(benchConfig.repetitions))
    .option('--deadline <ms>',       'Per-run deadline',                String(benchConfig.deadlineMs))
    .option('--poll <ms>',           'Cancellation poll interval',      String(benchConfig.pollIntervalMs))
    .option('--no-statement-timeout', 'Do not push the deadline down as statement_timeout')
    .option('--rows <n>',            'Users generated for the memory store', String(benchConfig.dataSizes.S.users))
    .option('--latency <ms>',        'Artificial latency per memory store call', '0')
    .option('--out <dir>',           'Output directory', 'bench/reports')
    .option('--no-export',           'Skip writing report files')

  program.parse(process.argv)
  const opts = program.opts<{
    store:            string
    case?:            string
    warmup:           string
    repetitions:      string
    deadline:         string
    poll:             string
    statementTimeout: boolean
    rows:             string
    latency:          string
    out:              string
    export:           boolean
  }>()

  const storeNames = opts.store.split(',').map(s => s.trim())
  const caseNames  = opts.case
    ? opts.case.split(',').map(s => s.trim())
    : cases.map(c => c.name)

  const warmup      = parseCount('warmup', opts.warmup, 0)
  const repetitions = parseCount('repetitions', opts.repetitions, 1)
  const deadlineMs  = parseCount('deadline', opts.deadline, 1)
  const pollMs      = parseCount('poll', opts.poll, 1)
  const memory      = { rows: parseCount('rows', opts.rows, 0), latencyMs: parseCount('latency', opts.latency, 0) }

  // validate
  const stores = storeNames.filter(isStoreName)
  for (const s of storeNames) {
    if (!isStoreName(s)) {
      console.error(`Unknown store "${s}". Valid: ${STORE_NAMES.join(', ')}`)
      process.exit(1)
    }
  }
  for (const c of caseNames) {
    if (!caseMap[c]) {
      console.error(`Unknown case "${c}". Valid: ${cases.map(x => x.name).join(', ')}`)
      process.exit(1)
    }
  }
  const scenarios = cases.filter(c => caseNames.includes(c.name))

  console.log(`\nBenchmark  warmup=${warmup}  repetitions=${repetitions}  deadline=${deadlineMs}ms  poll=${pollMs}ms`)
  console.log(`Stores : ${stores.join(', ')}`)
  console.log(`Cases  : ${caseNames.join(', ')}\n`)

  const stamp   = reportStamp()
  const written: string[] = []

  for (const storeName of stores) {
    console.log(`── ${storeName} ──`)
    const store    = createStore(storeName, memory)
    const executor = new QueryExecutor(store, {
      pollIntervalMs:         pollMs,
      enableStatementTimeout: opts.statementTimeout,
    })
    const harness = new BenchmarkHarness(executor, contactsRegistry, {
      repetitions,
      warmup,
      deadlineMs,
      randomPages: benchConfig.randomPages,
    })

    const results: BenchmarkResult[] = []
    try {
      for (const scenario of scenarios) {
        process.stdout.write(`  ${scenario.name.padEnd(30)} `)
        const runs = await harness.runScenario(scenario)
        results.push(...runs)

        const [summary] = aggregate(runs).summaries
        console.log(summary ? summaryLine(summary) : 'no runs')
        for (const r of runs) {
          if (r.error) console.log(`    ! run ${r.runIndex} ${r.status}: ${r.error}`)
        }
      }
    } finally {
      await store.close()
    }

    if (opts.export) {
      const files = writeReport(aggregate(results), opts.out, `${storeName}_${stamp}`)
      written.push(files.json, files.runsCsv, files.summaryCsv, files.chart)
    }
    console.log()
  }

  if (written.length) console.log(`Results:\n  ${written.join('\n  ')}`)
}

main().catch(err => {
  console.error(err)
  process.exit(1)
})
