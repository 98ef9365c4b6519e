import type { Milliseconds, Resource, ResourceKey } from "@palisade/core"
import type { CacheEntry } from "./cache-entry"
import type { CacheMetrics } from "./cache-metrics"

/**
 * A named cache backend.
 *
 * @remarks
 * Keys compare by value (see `keyFingerprint`). Every method that reads
 * and then writes the backend's state runs inside that backend's own
 * critical section, so interleaved callers never observe a half-applied
 * capacity check or expiry.
 *
 * A distributed backend must keep the same observable contract.
 */
export interface CacheStorage {
  readonly name: string

  /**
   * @returns the entry, or `undefined` when absent or expired (an expired
   * entry is removed and reported as evicted and expired).
   */
  get(key: ResourceKey): Promise<CacheEntry | undefined>

  /**
   * Inserts or overwrites. A new key in a full cache first evicts the
   * eviction policy's victim.
   *
   * @param ttlMs - Overrides the backend's default TTL for this entry.
   * @throws CacheCapacityExceededError when full and no policy is set.
   */
  put(key: ResourceKey, value: unknown, ttlMs?: Milliseconds): Promise<void>

  /**
   * Atomic check-then-insert.
   *
   * @returns the existing live entry, untouched, or `undefined` after inserting.
   */
  putIfAbsent(key: ResourceKey, value: unknown, ttlMs?: Milliseconds): Promise<CacheEntry | undefined>

  /** @throws CacheEntryNotFoundError when the key is absent. */
  evict(key: ResourceKey): Promise<void>

  /** @returns whether an entry was removed. */
  evictIfPresent(key: ResourceKey): Promise<boolean>

  clear(): Promise<void>

  /** Removes expired entries only. */
  invalidate(): Promise<void>

  size(): number
  keys(): ResourceKey[]
  getMetrics(): CacheMetrics
  getResource(): Resource
}
