import type { EvictionCandidate } from "../../ports/cache-eviction-policy"

/** First key with the strictly lowest metric, in iteration order. */
export function selectMinimum<K>(
  entries: ReadonlyMap<K, EvictionCandidate>,
  metric: (candidate: EvictionCandidate) => number,
): K | undefined {
  let victim: K | undefined
  let lowest = Number.POSITIVE_INFINITY

  for (const [key, candidate] of entries) {
    const value = metric(candidate)

    if (victim === undefined || value < lowest) {
      victim = key
      lowest = value
    }
  }

  return victim
}
