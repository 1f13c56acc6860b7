import 'dotenv/config'

export const dbConfig = {
  host:     process.env.PG_HOST     ?? 'localhost',
  port:     Number(process.env.PG_PORT ?? 5432),
  database: process.env.PG_DATABASE ?? 'contacts',
  user:     process.env.PG_USER     ?? 'bench',
  password: process.env.PG_PASSWORD ?? 'bench',

  // shows up in pg_stat_activity next to the benchmark's statements
  applicationName: process.env.PG_APPLICATION_NAME ?? 'contacts-query-bench',

  pool: {
    min: Number(process.env.PG_POOL_MIN ?? 2),
    max: Number(process.env.PG_POOL_MAX ?? 10),
  },
}

/** Connection settings accepted by both `pg` and knex's pg client. */
export function pgConnection() {
  return {
    host:             dbConfig.host,
    port:             dbConfig.port,
    database:         dbConfig.database,
    user:             dbConfig.user,
    password:         dbConfig.password,
    application_name: dbConfig.applicationName,
  }
}
