import type { Clock, Milliseconds } from "@palisade/core"
import type { CacheEntry } from "../../ports/cache-entry"

type Lifetime = Pick<CacheEntry, "createdAtMs" | "ttlMs">

function isExpiredAt(entry: Lifetime, nowMs: Milliseconds): boolean {
  if (entry.ttlMs === undefined) return false

  return nowMs >= entry.createdAtMs + entry.ttlMs
}

function remainingAt(entry: Lifetime, nowMs: Milliseconds): Milliseconds | undefined {
  if (entry.ttlMs === undefined) return undefined

  return Math.max(0, entry.createdAtMs + entry.ttlMs - nowMs)
}

export class StoredCacheEntry<V = unknown> implements CacheEntry<V> {
  private lastAccessed: Milliseconds
  private accesses = 0

  readonly createdAtMs: Milliseconds

  constructor(
    private readonly clock: Clock,
    readonly value: V,
    readonly ttlMs: Milliseconds | undefined,
  ) {
    this.createdAtMs = clock.nowMs()
    this.lastAccessed = this.createdAtMs
  }

  get lastAccessedAtMs(): Milliseconds {
    return this.lastAccessed
  }

  get accessCount(): number {
    return this.accesses
  }

  isExpired(): boolean {
    return isExpiredAt(this, this.clock.nowMs())
  }

  remainingTtlMs(): Milliseconds | undefined {
    return remainingAt(this, this.clock.nowMs())
  }

  ageMs(): Milliseconds {
    return this.clock.nowMs() - this.createdAtMs
  }

  recordAccess(): void {
    this.accesses++
    this.lastAccessed = this.clock.nowMs()
  }

  /** Frozen copy handed to callers, so later reads don't change what they hold. */
  snapshot(): CacheEntry<V> {
    const { clock, value, ttlMs, createdAtMs, lastAccessedAtMs, accessCount } = this
    const lifetime: Lifetime = { createdAtMs, ttlMs }

    return Object.freeze({
      value,
      ttlMs,
      createdAtMs,
      lastAccessedAtMs,
      accessCount,
      isExpired: () => isExpiredAt(lifetime, clock.nowMs()),
      remainingTtlMs: () => remainingAt(lifetime, clock.nowMs()),
      ageMs: () => clock.nowMs() - createdAtMs,
    })
  }
}
