/**
 * Remembers the first error thrown by a series of independent steps so
 * every step still runs before the error surfaces.
 */
export class FirstFailure {
  private failure: { error: unknown } | undefined

  /** Runs `fn`; an error it throws is kept, not rethrown. */
  async capture(fn: () => void | Promise<void>): Promise<void> {
    try {
      await fn()
    } catch (err) {
      this.failure ??= { error: err }
    }
  }

  hasFailed(): boolean {
    return this.failure !== undefined
  }

  throwIfFailed(): void {
    if (this.failure) throw this.failure.error
  }
}
