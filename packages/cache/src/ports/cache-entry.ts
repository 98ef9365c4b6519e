import type { Milliseconds } from "@palisade/core"

/**
 * Read-only view of a stored value and its bookkeeping.
 *
 * @remarks
 * `lastAccessedAtMs` and `accessCount` change on every successful read;
 * everything else is fixed when the entry is written. Expiry is lazy:
 * an expired entry can remain in the store until a read, a write or
 * `invalidate()` reaches it.
 */
export interface CacheEntry<V = unknown> {
  readonly value: V

  /** `undefined` means the entry never expires. */
  readonly ttlMs: Milliseconds | undefined
  readonly createdAtMs: Milliseconds
  readonly lastAccessedAtMs: Milliseconds
  readonly accessCount: number

  /** `true` once `now >= createdAtMs + ttlMs`. */
  isExpired(): boolean

  /** Time left before expiry, `undefined` without a TTL, never negative. */
  remainingTtlMs(): Milliseconds | undefined

  ageMs(): Milliseconds
}
