import knex, { type Knex } from 'knex'
import { afterAll, describe, it, expect, vi } from 'vitest'
import { QueryBuilderStore } from '../../src/clients/query-builder'
import { StoreTimeoutError } from '../../src/errors'
import { buildQueryPlan } from '../../src/plan/builder'
import { contactsRegistry } from '../../src/schema/contacts'
import type { StoreCallOptions } from '../../src/types'
import { sleep } from '../helpers'

// Builds SQL only; never connects.
const sqlOnly = knex({ client: 'pg' })
afterAll(() => sqlOnly.destroy())

interface Statement {
  sql:      string
  bindings: readonly unknown[]
}

type Reply = (statement: Statement) => unknown[] | Promise<unknown[]>

// knex stand-in: the transaction hands out real builders whose SQL is
// recorded and answered by `reply` instead of a server.
function fakeKnex(reply: Reply) {
  const log:        string[]    = []
  const statements: Statement[] = []

  const builder = (table: string) => {
    const qb = sqlOnly(table)
    Object.defineProperty(qb, 'then', {
      value: (ok: (rows: unknown[]) => unknown, fail: (err: unknown) => unknown) =>
        Promise.resolve()
          .then(() => {
            const { sql, bindings } = qb.toSQL().toNative()
            statements.push({ sql, bindings })
            return reply({ sql, bindings })
          })
          .then(ok, fail),
    })
    return qb
  }
  const trx = Object.assign(builder, {
    raw: vi.fn(async (sql: string) => {
      log.push(sql)
      return sql === 'SELECT pg_backend_pid() AS pid' ? { rows: [{ pid: 42 }] } : { rows: [] }
    }),
  })
  const db = {
    transaction: vi.fn(async (work: (t: typeof trx) => Promise<unknown>, _config?: Knex.TransactionConfig) => {
      const result = await work(trx)
      log.push('commit')
      return result
    }),
    raw:     vi.fn(async (_sql: string, _bindings?: unknown[]) => ({ rows: [] })),
    destroy: vi.fn(async () => {}),
  }

  const store = new QueryBuilderStore({ db: db as unknown as Knex, onCancelError: vi.fn() })
  return { store, db, trx, log, statements }
}

function callOptions(statementTimeoutMs?: number, controller = new AbortController()): StoreCallOptions {
  return { signal: controller.signal, statementTimeoutMs }
}

const answer: Reply = ({ sql }) => sql.startsWith('select count(*)') ? [{ count: '3' }] : [{ id: 2 }, { id: 4 }]

const FROM_APPUSER = [
  'from "appuser"',
  'left join "address" as "address" on "address"."id" = "appuser"."address_id"',
  'left join "customer_relationship" as "relationship" on "relationship"."appuser_id" = "appuser"."id"',
].join(' ')

describe('QueryBuilderStore', () => {
  const plan = buildQueryPlan(contactsRegistry, 'AppUser', {
    gender:              'M',
    address__id__isnull: 'false',
    search:              'ann',
    page:                '2',
    page_size:           '2',
  })

  it('runs count and page queries in one read-only transaction', async () => {
    const { store, db, log } = fakeKnex(answer)
    const result = await store.execute(plan, callOptions(500))

    expect(result).toEqual({ rows: [{ id: 2 }, { id: 4 }], totalCount: 3, statementCount: 2 })
    expect(db.transaction).toHaveBeenCalledTimes(1)
    expect(db.transaction.mock.calls[0]?.[1]).toEqual({ readOnly: true })
    expect(log).toEqual(['SET LOCAL statement_timeout = 500', 'SELECT pg_backend_pid() AS pid', 'commit'])
  })

  it('compiles joins, filters and the grouped search', async () => {
    const { store, statements } = fakeKnex(answer)
    await store.execute(plan, callOptions())

    const [count, select] = statements
    expect(count?.sql.startsWith(`select count(*) as "count" ${FROM_APPUSER} where `)).toBe(true)
    expect(count?.sql).toContain(
      'where "appuser"."gender" = $1 and "address"."id" is not null and ("appuser"."first_name" ilike $2 or "appuser"."last_name" ilike $3 or',
    )
    expect(count?.bindings).toEqual(['M', ...Array<string>(7).fill('%ann%')])

    expect(select?.sql).toContain('"appuser"."id" as "id"')
    expect(select?.sql).toContain(FROM_APPUSER)
    expect(select?.sql).toContain('order by "appuser"."created" desc')
    expect(select?.bindings.slice(-2)).toEqual([2, 2])
  })

  it('filters on a missing relation with IS NULL', async () => {
    const { store, statements } = fakeKnex(() => [{ count: '1' }])
    const missing = buildQueryPlan(contactsRegistry, 'AppUser', { relationship__id__isnull: 'true' }, { paginate: false })

    expect(await store.count(missing, callOptions())).toEqual({ count: 1, statementCount: 1 })
    expect(statements[0]?.sql).toBe(`select count(*) as "count" ${FROM_APPUSER} where "relationship"."id" is null`)
  })

  it('skips the statement timeout when none is given', async () => {
    const { store, trx } = fakeKnex(answer)
    await store.count(plan, callOptions())
    expect(trx.raw.mock.calls.map(([sql]) => sql)).toEqual(['SELECT pg_backend_pid() AS pid'])
  })

  it('reports the server statement timeout as StoreTimeoutError', async () => {
    const timeout = Object.assign(new Error('canceling statement due to statement timeout'), { code: '57014' })
    const { store } = fakeKnex(() => { throw timeout })

    await expect(store.execute(plan, callOptions(200))).rejects.toBeInstanceOf(StoreTimeoutError)
  })

  it('finishes the backend cancel before the transaction ends', async () => {
    const controller = new AbortController()
    const { store, db, log } = fakeKnex(({ sql }) => {
      if (sql.startsWith('select count(*)')) return [{ count: '3' }]
      controller.abort()
      return [{ id: 2 }]
    })
    db.raw.mockImplementation(async () => {
      await sleep(20)
      log.push('cancel landed')
      return { rows: [] }
    })

    await store.execute(plan, callOptions(undefined, controller))

    expect(db.raw).toHaveBeenCalledWith('SELECT pg_cancel_backend(?)', [42])
    expect(log.slice(-2)).toEqual(['cancel landed', 'commit'])
  })

  it('does not open a transaction for an already aborted call', async () => {
    const controller = new AbortController()
    controller.abort()
    const { store, db } = fakeKnex(answer)

    await expect(store.count(plan, callOptions(undefined, controller))).rejects.toBeDefined()
    expect(db.transaction).not.toHaveBeenCalled()
  })

  it('destroys the knex instance on close', async () => {
    const { store, db } = fakeKnex(answer)
    await store.close()
    expect(db.destroy).toHaveBeenCalledTimes(1)
  })
})
