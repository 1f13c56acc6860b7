import 'dotenv/config'

export const benchConfig = {
  warmup:      Number(process.env.BENCH_WARMUP      ?? 1),
  repetitions: Number(process.env.BENCH_REPETITIONS ?? 5),

  // per-run deadline, also pushed down as statement_timeout
  deadlineMs:     Number(process.env.BENCH_DEADLINE_MS ?? 30_000),
  pollIntervalMs: Number(process.env.BENCH_POLL_MS     ?? 25),

  pageSize:    1000,
  randomPages: 10,

  samples: {
    firstName: process.env.BENCH_SAMPLE_FIRST_NAME ?? 'John',
    city:      process.env.BENCH_SAMPLE_CITY       ?? 'New York',
  },

  dataSizes: {
    S: { users:   1_000, addresses:    800 },
    M: { users:  10_000, addresses:  8_000 },
    L: { users: 100_000, addresses: 80_000 },
  },

  defaultSize: 'M' as const,
}
