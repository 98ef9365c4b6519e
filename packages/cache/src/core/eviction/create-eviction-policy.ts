import type { CacheEvictionPolicy, EvictionPolicyName } from "../../ports/cache-eviction-policy"
import { FifoEvictionPolicy } from "./fifo-eviction-policy"
import { LfuEvictionPolicy } from "./lfu-eviction-policy"
import { LruEvictionPolicy } from "./lru-eviction-policy"

export const evictionPolicyNames = ["lru", "lfu", "fifo"] as const satisfies readonly EvictionPolicyName[]

export function isEvictionPolicyName(value: string): value is EvictionPolicyName {
  return evictionPolicyNames.some((name) => name === value)
}

/**
 * @param name - Case-insensitive policy name.
 * @throws RangeError for an unknown name.
 */
export function createEvictionPolicy(name: string): CacheEvictionPolicy {
  const normalized = name.trim().toLowerCase()

  if (!isEvictionPolicyName(normalized)) {
    throw new RangeError(
      `Unknown eviction policy "${name}", expected one of: ${evictionPolicyNames.join(", ")}`,
    )
  }

  switch (normalized) {
    case "lru":
      return new LruEvictionPolicy()
    case "lfu":
      return new LfuEvictionPolicy()
    case "fifo":
      return new FifoEvictionPolicy()
  }
}
