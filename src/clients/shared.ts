import { StoreTimeoutError } from '../errors'

// PostgreSQL SQLSTATE for "canceling statement due to statement timeout / user request"
const QUERY_CANCELED = '57014'

/** Escapes LIKE wildcards so a term matches literally. */
export function escapeLike(term: string): string {
  return term.replace(/[\\%_]/g, '\\$&')
}

export function containsPattern(term: string): string {
  return `%${escapeLike(term)}%`
}

/** `SET LOCAL` takes no bind parameters, so the value is validated here. */
export function statementTimeoutSql(timeoutMs: number): string {
  const ms = Math.ceil(timeoutMs)
  if (!Number.isSafeInteger(ms) || ms < 1) throw new RangeError(`Invalid statement timeout: ${timeoutMs}`)
  return `SET LOCAL statement_timeout = ${ms}`
}

export function isQueryCanceled(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === QUERY_CANCELED
}

/**
 * Maps a driver error to the store contract: a server-side statement timeout
 * becomes StoreTimeoutError, anything else passes through untouched.
 */
export function translateStoreError(err: unknown, timeoutMs: number | undefined, signal: AbortSignal): unknown {
  if (isQueryCanceled(err) && !signal.aborted) return new StoreTimeoutError(timeoutMs, err)
  return err
}
