import type { CacheEvictionPolicy, EvictionCandidate } from "../../ports/cache-eviction-policy"
import { selectMinimum } from "./select-minimum"

export class LruEvictionPolicy implements CacheEvictionPolicy {
  readonly name = "lru"

  selectVictim<K>(entries: ReadonlyMap<K, EvictionCandidate>): K | undefined {
    return selectMinimum(entries, (e) => e.lastAccessedAtMs)
  }
}
