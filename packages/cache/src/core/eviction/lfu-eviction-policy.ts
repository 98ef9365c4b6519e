import type { CacheEvictionPolicy, EvictionCandidate } from "../../ports/cache-eviction-policy"
import { selectMinimum } from "./select-minimum"

export class LfuEvictionPolicy implements CacheEvictionPolicy {
  readonly name = "lfu"

  selectVictim<K>(entries: ReadonlyMap<K, EvictionCandidate>): K | undefined {
    return selectMinimum(entries, (e) => e.accessCount)
  }
}
