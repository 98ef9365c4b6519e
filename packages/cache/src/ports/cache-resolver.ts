import type { Invocation } from "@palisade/core"
import type { CacheOperationSpec } from "./cache-operation"
import type { CacheStorage } from "./cache-storage"

/**
 * Maps an operation to the caches taking part, in the order they are used.
 */
export interface CacheResolver {
  resolveCaches(operation: CacheOperationSpec, invocation: Invocation<unknown>): Promise<CacheStorage[]>
}
