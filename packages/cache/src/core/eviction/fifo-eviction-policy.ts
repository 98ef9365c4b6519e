import type { CacheEvictionPolicy, EvictionCandidate } from "../../ports/cache-eviction-policy"
import { selectMinimum } from "./select-minimum"

export class FifoEvictionPolicy implements CacheEvictionPolicy {
  readonly name = "fifo"

  selectVictim<K>(entries: ReadonlyMap<K, EvictionCandidate>): K | undefined {
    return selectMinimum(entries, (e) => e.createdAtMs)
  }
}
