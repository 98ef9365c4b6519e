import { describeKey, ResourceError, type ResourceKey } from "@palisade/core"

export class CacheCapacityExceededError extends ResourceError<"capacity_exceeded"> {
  constructor(
    readonly cacheName: string,
    readonly maxEntries: number,
  ) {
    super(
      `Cache "${cacheName}" is full (${maxEntries} entries) and has no eviction policy`,
      { code: "capacity_exceeded", context: { cacheName, maxEntries } },
    )
  }
}

export class CacheEntryNotFoundError extends ResourceError<"entry_not_found"> {
  constructor(
    readonly cacheName: string,
    readonly key: ResourceKey,
  ) {
    const described = describeKey(key)

    super(`No entry for key ${described} in cache "${cacheName}"`, {
      code: "entry_not_found",
      context: { cacheName, key: described },
    })
  }
}
