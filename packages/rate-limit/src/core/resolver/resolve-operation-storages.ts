import type { Invocation, Registry } from "@palisade/core"
import type { RateLimitManager } from "../../ports/rate-limit-manager"
import type { RateLimitOperation } from "../../ports/rate-limit-operation"
import type { RateLimitResolver } from "../../ports/rate-limit-resolver"
import type { RateLimitStorage } from "../../ports/rate-limit-storage"

export type ResolveOperationStoragesDeps = {
  resolvers: Registry<RateLimitResolver>
  managers: Registry<RateLimitManager>
  defaultResolver: RateLimitResolver
}

/**
 * Named resolver, then named manager (all of its stores), then the
 * default resolver.
 *
 * @throws NotFoundError when a named resolver or manager is not registered.
 */
export async function resolveOperationStorages(
  deps: ResolveOperationStoragesDeps,
  operation: RateLimitOperation,
  invocation: Invocation<unknown>,
): Promise<RateLimitStorage[]> {
  if (operation.rateLimitResolver !== undefined) {
    return deps.resolvers.require(operation.rateLimitResolver).resolveStorages(operation, invocation)
  }

  if (operation.rateLimitManager !== undefined) {
    const manager = deps.managers.require(operation.rateLimitManager)
    const storages: RateLimitStorage[] = []

    for (const name of await manager.getStorageNames()) {
      const storage = await manager.getStorage(name)

      if (storage) storages.push(storage)
    }

    return storages
  }

  return deps.defaultResolver.resolveStorages(operation, invocation)
}
