import { BackendOperationError, describeKey, type ResourceKey } from "@palisade/core"
import type { CacheErrorHandler } from "../../ports/cache-error-handler"
import type { CacheStorage } from "../../ports/cache-storage"

/** Wraps every backend failure in a {@link BackendOperationError}. */
export class ThrowingCacheErrorHandler implements CacheErrorHandler {
  onGet(error: unknown, cache: CacheStorage, key: ResourceKey): never {
    throw new BackendOperationError({ backend: cache.name, operation: "get", key: describeKey(key), cause: error })
  }

  onPut(error: unknown, cache: CacheStorage, key: ResourceKey): never {
    throw new BackendOperationError({ backend: cache.name, operation: "put", key: describeKey(key), cause: error })
  }

  onEvict(error: unknown, cache: CacheStorage, key: ResourceKey): never {
    throw new BackendOperationError({ backend: cache.name, operation: "evict", key: describeKey(key), cause: error })
  }

  onClear(error: unknown, cache: CacheStorage): never {
    throw new BackendOperationError({ backend: cache.name, operation: "clear", cause: error })
  }
}
