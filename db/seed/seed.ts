import { Pool, type PoolClient } from 'pg'
import { pgConnection } from '../../configs/db'
import { benchConfig } from '../../configs/bench'
import { generateDataset } from '../../src/fixtures/generate'

type SizeName = keyof typeof benchConfig.dataSizes

function sizeName(raw: string | undefined): SizeName {
  const name = raw ?? benchConfig.defaultSize
  if (name === 'S' || name === 'M' || name === 'L') return name
  throw new Error(`Unknown SEED_SIZE "${name}". Valid: S, M, L`)
}

const SIZE = sizeName(process.env.SEED_SIZE)
const cfg  = benchConfig.dataSizes[SIZE]
const SEED = process.env.SEED_RANDOM === undefined ? undefined : Number(process.env.SEED_RANDOM)

const pool = new Pool(pgConnection())

const BATCH = 500

/** Multi-row INSERT in batches; ids come from the generator so foreign keys line up. */
async function insertBatched<R>(
  client:  PoolClient,
  table:   string,
  columns: readonly (keyof R & string)[],
  records: readonly R[],
): Promise<void> {
  for (let i = 0; i < records.length; i += BATCH) {
    const batch = records.slice(i, i + BATCH)
    const placeholders = batch
      .map((_, j) => `(${columns.map((__, k) => `$${j * columns.length + k + 1}`).join(', ')})`)
      .join(', ')
    const params = batch.flatMap(r => columns.map(c => r[c]))
    await client.query(`INSERT INTO ${table} (${columns.join(', ')}) VALUES ${placeholders}`, params)
    process.stdout.write(`\r  ${table}: ${Math.min(i + BATCH, records.length)}/${records.length}`)
  }
  process.stdout.write('\n')
}

async function main() {
  console.log(`Seeding [size=${SIZE}]: ${cfg.users} users, ${cfg.addresses} addresses`)
  const data   = generateDataset(cfg, { seed: SEED })
  const client = await pool.connect()

  try {
    await client.query('BEGIN')
    await client.query('TRUNCATE customer_relationship, appuser, address RESTART IDENTITY CASCADE')

    await insertBatched(client, 'address',
      ['id', 'street', 'street_number', 'city_code', 'city', 'country'], data.address)
    await insertBatched(client, 'appuser',
      ['id', 'first_name', 'last_name', 'gender', 'customer_id', 'phone_number',
       'created', 'address_id', 'birthday', 'last_updated'], data.appuser)
    await insertBatched(client, 'customer_relationship',
      ['id', 'appuser_id', 'points', 'created', 'last_activity'], data.customer_relationship)

    // explicit ids leave the sequences behind
    for (const table of ['address', 'appuser', 'customer_relationship']) {
      await client.query(`SELECT setval(pg_get_serial_sequence('${table}', 'id'), GREATEST((SELECT MAX(id) FROM ${table}), 1))`)
    }

    await client.query('COMMIT')
    console.log(
      `Seeding complete. addresses=${data.address.length}  users=${data.appuser.length}  ` +
      `relationships=${data.customer_relationship.length}`
    )
  } catch (err) {
    await client.query('ROLLBACK')
    throw err
  } finally {
    client.release()
    await pool.end()
  }
}

main().catch(err => {
  console.error(err)
  process.exit(1)
})
