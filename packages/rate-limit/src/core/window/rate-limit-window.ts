import type { Milliseconds } from "@palisade/core"

/**
 * Count and bounds of one fixed window.
 */
export class RateLimitWindow {
  private current = 0
  private started: Milliseconds

  constructor(
    readonly windowMs: Milliseconds,
    startedAtMs: Milliseconds,
  ) {
    this.started = startedAtMs
  }

  get count(): number {
    return this.current
  }

  get startedAtMs(): Milliseconds {
    return this.started
  }

  get resetAtMs(): Milliseconds {
    return this.started + this.windowMs
  }

  isExpired(nowMs: Milliseconds): boolean {
    return nowMs >= this.resetAtMs
  }

  restart(nowMs: Milliseconds): void {
    this.current = 0
    this.started = nowMs
  }

  increment(): void {
    this.current++
  }

  /** Floored at zero. */
  decrement(): void {
    if (this.current > 0) this.current--
  }
}
