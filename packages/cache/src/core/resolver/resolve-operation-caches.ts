import type { Invocation, Registry } from "@palisade/core"
import type { CacheManager } from "../../ports/cache-manager"
import type { CacheOperationSpec } from "../../ports/cache-operation"
import type { CacheResolver } from "../../ports/cache-resolver"
import type { CacheStorage } from "../../ports/cache-storage"

export type ResolveOperationCachesDeps = {
  resolvers: Registry<CacheResolver>
  managers: Registry<CacheManager>
  defaultResolver: CacheResolver
}

/**
 * Picks the caches for one operation: a named resolver wins, then a named
 * manager (all of its caches), then the default resolver.
 *
 * @throws NotFoundError when a named resolver or manager is not registered.
 */
export async function resolveOperationCaches(
  deps: ResolveOperationCachesDeps,
  operation: CacheOperationSpec,
  invocation: Invocation<unknown>,
): Promise<CacheStorage[]> {
  if (operation.cacheResolver !== undefined) {
    return deps.resolvers.require(operation.cacheResolver).resolveCaches(operation, invocation)
  }

  if (operation.cacheManager !== undefined) {
    const manager = deps.managers.require(operation.cacheManager)
    const caches: CacheStorage[] = []

    for (const name of await manager.getCacheNames()) {
      const cache = await manager.getCache(name)

      if (cache) caches.push(cache)
    }

    return caches
  }

  return deps.defaultResolver.resolveCaches(operation, invocation)
}
