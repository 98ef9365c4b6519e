import type { Clock, Milliseconds } from "../../ports/clock"

/**
 * A clock that only moves when told to.
 *
 * @example
 * ```ts
 * const clock = new ManualClock()
 * await cache.put("k", "v", 100)
 * clock.advance(150)
 * await cache.get("k") // undefined, entry expired
 * ```
 */
export class ManualClock implements Clock {
  private current: Milliseconds

  constructor(start: Milliseconds | Date = 0) {
    this.current = toMs(start)
  }

  now(): Date {
    return new Date(this.current)
  }

  nowMs(): Milliseconds {
    return this.current
  }

  advance(ms: Milliseconds): void {
    if (!Number.isFinite(ms) || ms < 0) {
      throw new RangeError(`ManualClock cannot move by ${ms}ms`)
    }

    this.current += ms
  }

  set(time: Milliseconds | Date): void {
    this.current = toMs(time)
  }
}

function toMs(time: Milliseconds | Date): Milliseconds {
  return time instanceof Date ? time.getTime() : time
}
