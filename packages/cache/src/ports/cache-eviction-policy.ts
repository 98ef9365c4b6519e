import type { CacheEntry } from "./cache-entry"

/**
 * Least Recently Used: evicts the entry with the oldest last access.
 */
export type LruEvictionPolicyName = "lru"

/**
 * Least Frequently Used: evicts the entry read the fewest times.
 */
export type LfuEvictionPolicyName = "lfu"

/**
 * First In, First Out: evicts the entry written the longest ago,
 * regardless of reads.
 */
export type FifoEvictionPolicyName = "fifo"

export type EvictionPolicyName = LruEvictionPolicyName | LfuEvictionPolicyName | FifoEvictionPolicyName

export type EvictionCandidate = Pick<CacheEntry, "createdAtMs" | "lastAccessedAtMs" | "accessCount">

/**
 * Chooses which entry a full cache gives up.
 *
 * @remarks
 * Pure: the answer depends only on the metadata passed in. When several
 * entries share the lowest metric, the one met first in the map's
 * iteration order (insertion order for a `Map`) is chosen.
 */
export interface CacheEvictionPolicy {
  readonly name: EvictionPolicyName

  /** @returns `undefined` only for an empty map. */
  selectVictim<K>(entries: ReadonlyMap<K, EvictionCandidate>): K | undefined
}
