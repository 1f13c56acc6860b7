export interface Clock {
  /** Monotonic milliseconds. */
  now(): number
}

export const systemClock: Clock = {
  now: () => performance.now(),
}

/**
 * One-way cancellation flag plus a monotonic deadline, shared between the
 * caller of one execution and whatever can cancel it. Once cancelled it stays
 * cancelled.
 */
export class CancellationToken {
  readonly startedAt: number
  /** `Infinity` when the token has no deadline. */
  readonly deadline:  number

  private _cancelled = false
  private readonly listeners = new Set<() => void>()
  private detach: (() => void) | null = null

  constructor(timeoutMs: number | null, private readonly clock: Clock = systemClock) {
    this.startedAt = clock.now()
    this.deadline  = timeoutMs === null ? Infinity : this.startedAt + Math.max(0, timeoutMs)
  }

  static withTimeout(timeoutMs: number, clock?: Clock): CancellationToken {
    return new CancellationToken(timeoutMs, clock)
  }

  static none(clock?: Clock): CancellationToken {
    return new CancellationToken(null, clock)
  }

  /** Token that is cancelled when `signal` aborts, e.g. on client disconnect. */
  static fromSignal(signal: AbortSignal, timeoutMs: number | null, clock?: Clock): CancellationToken {
    const token = new CancellationToken(timeoutMs, clock)
    if (signal.aborted) {
      token.cancel()
      return token
    }
    const onAbort = () => token.cancel()
    signal.addEventListener('abort', onAbort, { once: true })
    token.detach = () => signal.removeEventListener('abort', onAbort)
    return token
  }

  get cancelled(): boolean {
    return this._cancelled
  }

  get expired(): boolean {
    return this.clock.now() >= this.deadline
  }

  remainingMs(): number {
    return Math.max(0, this.deadline - this.clock.now())
  }

  elapsedMs(): number {
    return this.clock.now() - this.startedAt
  }

  cancel(): void {
    if (this._cancelled) return
    this._cancelled = true
    const listeners = [...this.listeners]
    this.listeners.clear()
    for (const listener of listeners) listener()
  }

  /**
   * Registers a listener for the cancel transition. Runs immediately when the
   * token is already cancelled. Returns the unsubscribe function.
   */
  onCancel(listener: () => void): () => void {
    if (this._cancelled) {
      listener()
      return () => {}
    }
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  /** Drops listeners and any external signal subscription. */
  dispose(): void {
    this.listeners.clear()
    this.detach?.()
    this.detach = null
  }
}
