export class UnknownEntityError extends Error {
  override readonly name = 'UnknownEntityError'

  constructor(readonly entity: string) {
    super(`Unknown entity: ${entity}`)
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

export class UnknownFieldError extends Error {
  override readonly name = 'UnknownFieldError'

  constructor(
    readonly entity:     string,
    readonly field:      string,
    readonly capability: 'field' | 'filterable' | 'orderable' | 'searchable' = 'field',
  ) {
    super(
      capability === 'field'
        ? `Unknown field "${field}" on ${entity}`
        : `Field "${field}" is not ${capability} on ${entity}`
    )
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

export class ValidationError extends Error {
  override readonly name = 'ValidationError'

  constructor(
    readonly field:  string,
    readonly reason: string,
  ) {
    super(`Invalid value for "${field}": ${reason}`)
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/**
 * Raised by a store adapter when the store's own statement timeout aborted
 * the query server-side.
 */
export class StoreTimeoutError extends Error {
  override readonly name = 'StoreTimeoutError'

  constructor(
    readonly timeoutMs: number | undefined,
    override readonly cause?: unknown,
  ) {
    super(
      timeoutMs === undefined
        ? 'Statement cancelled by the store'
        : `Statement exceeded store timeout of ${timeoutMs} ms`
    )
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

export function isPlanError(err: unknown): err is UnknownEntityError | UnknownFieldError | ValidationError {
  return err instanceof UnknownEntityError
    || err instanceof UnknownFieldError
    || err instanceof ValidationError
}
