import { PropertyEnvironment } from "@palisade/config"
import {
  BackendOperationError,
  createInvocation,
  type KeyGenerator,
  MapRegistry,
  never,
  NotFoundError,
  SimpleKeyGenerator,
  whenEnv,
} from "@palisade/core"
import { NullLogger } from "@palisade/logger"
import { MemoryCacheStorage } from "../../../adapters/memory/memory-cache-storage"
import type { CacheErrorHandler } from "../../../ports/cache-error-handler"
import type { CacheManager } from "../../../ports/cache-manager"
import type { ReadThroughOperation } from "../../../ports/cache-operation"
import type { CacheResolver } from "../../../ports/cache-resolver"
import { createTestCache } from "../../../tests/utils/cache-fixtures"
import { LoggingCacheErrorHandler } from "../../error-handler/logging-cache-error-handler"
import { ThrowingCacheErrorHandler } from "../../error-handler/throwing-cache-error-handler"
import { SimpleCacheManager } from "../../manager/simple-cache-manager"
import { SimpleCacheResolver } from "../../resolver/simple-cache-resolver"
import { CachePipeline } from "../cache-pipeline"

type SetupOptions = {
  errorHandler?: CacheErrorHandler
  properties?: Record<string, string>
  keyGenerators?: Record<string, KeyGenerator>
}

function setup(opts: SetupOptions = {}) {
  const logger = new NullLogger()
  const { cache: users, clock } = createTestCache({ name: "users" })
  const archive = new MemoryCacheStorage({ clock, logger }, { name: "archive" })
  const manager = new SimpleCacheManager({ logger, caches: [users, archive] }, { autoCreate: false })

  const pipeline = new CachePipeline({
    environment: PropertyEnvironment.fromRecord(opts.properties ?? {}),
    logger,
    errorHandler: opts.errorHandler ?? new LoggingCacheErrorHandler({ logger }),
    defaultResolver: new SimpleCacheResolver({ manager, logger }),
    resolvers: new MapRegistry<CacheResolver>("cache resolver"),
    managers: new MapRegistry<CacheManager>("cache manager"),
    defaultKeyGenerator: new SimpleKeyGenerator(),
    keyGenerators: new MapRegistry<KeyGenerator>("key generator", Object.entries(opts.keyGenerators ?? {})),
  })

  return { pipeline, users, archive, clock }
}

function findUser(id: number, impl: () => Promise<string> = async () => `user-${id}`) {
  const call = vi.fn(impl)

  return { call, invocation: createInvocation({ method: "findUser", positional: [id], call }) }
}

const isString = (value: unknown): value is string => typeof value === "string"

const readThrough = (
  cacheNames: string[],
  extra: Partial<ReadThroughOperation<string>> = {},
): ReadThroughOperation<string> => ({ kind: "read-through", cacheNames, accepts: isString, ...extra })

describe("CachePipeline", () => {
  describe("read-through", () => {
    it("calls through on a miss and stores the result in every cache", async () => {
      const { pipeline, users, archive } = setup()
      const { call, invocation } = findUser(1)

      const result = await pipeline.execute({ readThrough: readThrough(["users", "archive"]) }, invocation)

      expect(result).toBe("user-1")
      expect(call).toHaveBeenCalledTimes(1)
      expect((await users.get(1))?.value).toBe("user-1")
      expect((await archive.get(1))?.value).toBe("user-1")
    })

    it("serves a hit without calling through", async () => {
      const { pipeline, users } = setup()
      await users.put(1, "cached")
      const { call, invocation } = findUser(1)

      const result = await pipeline.execute({ readThrough: readThrough(["users"]) }, invocation)

      expect(result).toBe("cached")
      expect(call).not.toHaveBeenCalled()
    })

    it("stops at the first cache that has the key", async () => {
      const { pipeline, users, archive } = setup()
      await users.put(1, "cached")
      const archiveGet = vi.spyOn(archive, "get")
      const { call, invocation } = findUser(1)

      const result = await pipeline.execute({ readThrough: readThrough(["users", "archive"]) }, invocation)

      expect(result).toBe("cached")
      expect(archiveGet).not.toHaveBeenCalled()
      expect(call).not.toHaveBeenCalled()
    })

    it("uses the first cache that has the key and writes nothing", async () => {
      const { pipeline, users, archive } = setup()
      await archive.put(1, "from-archive")
      const { invocation } = findUser(1)

      const result = await pipeline.execute({ readThrough: readThrough(["users", "archive"]) }, invocation)

      expect(result).toBe("from-archive")
      expect(users.size()).toBe(0)
    })

    it("returns a cached null instead of treating it as a miss", async () => {
      const { pipeline, users } = setup()
      await users.put(1, null)
      const call = vi.fn(async (): Promise<string | null> => "user-1")
      const invocation = createInvocation({ method: "findUser", positional: [1], call })

      const result = await pipeline.execute(
        {
          readThrough: {
            kind: "read-through",
            cacheNames: ["users"],
            accepts: (v): v is string | null => v === null || typeof v === "string",
          },
        },
        invocation,
      )

      expect(result).toBeNull()
      expect(call).not.toHaveBeenCalled()
    })

    it("treats a value the guard rejects as a miss and replaces it", async () => {
      const { pipeline, users } = setup()
      await users.put(1, 42)
      const { call, invocation } = findUser(1)

      const result = await pipeline.execute({ readThrough: readThrough(["users"]) }, invocation)

      expect(result).toBe("user-1")
      expect(call).toHaveBeenCalledTimes(1)
      expect((await users.get(1))?.value).toBe("user-1")
    })

    it("applies the operation ttl to stored entries", async () => {
      const { pipeline, users, clock } = setup()
      const { invocation } = findUser(1)

      await pipeline.execute({ readThrough: readThrough(["users"], { ttlMs: 100 }) }, invocation)
      clock.advance(100)

      expect(await users.get(1)).toBeUndefined()
    })

    it("uses a named key generator", async () => {
      const { pipeline, users } = setup({
        keyGenerators: { constant: { generate: () => "fixed" } },
      })
      const { invocation } = findUser(1)

      await pipeline.execute({ readThrough: readThrough(["users"], { keyGenerator: "constant" }) }, invocation)

      expect(users.keys()).toStrictEqual(["fixed"])
    })

    it("fails when a cache name cannot be resolved by a strict manager", async () => {
      const logger = new NullLogger()
      const manager = new SimpleCacheManager({ logger }, { autoCreate: false, failIfNotFound: true })
      const pipeline = new CachePipeline({
        environment: PropertyEnvironment.fromRecord({}),
        logger,
        errorHandler: new LoggingCacheErrorHandler({ logger }),
        defaultResolver: new SimpleCacheResolver({ manager, logger }),
        resolvers: new MapRegistry<CacheResolver>("cache resolver"),
        managers: new MapRegistry<CacheManager>("cache manager"),
        defaultKeyGenerator: new SimpleKeyGenerator(),
        keyGenerators: new MapRegistry<KeyGenerator>("key generator"),
      })
      const { call, invocation } = findUser(1)

      await expect(pipeline.execute({ readThrough: readThrough(["users"]) }, invocation)).rejects.toBeInstanceOf(
        NotFoundError,
      )
      expect(call).not.toHaveBeenCalled()
    })
  })

  describe("write-through", () => {
    it("always calls through and overwrites the cached value", async () => {
      const { pipeline, users } = setup()
      await users.put(1, "stale")
      const { call, invocation } = findUser(1)

      const result = await pipeline.execute({ writeThrough: { kind: "write-through", cacheNames: ["users"] } }, invocation)

      expect(result).toBe("user-1")
      expect(call).toHaveBeenCalledTimes(1)
      expect((await users.get(1))?.value).toBe("user-1")
    })
  })

  describe("invalidate", () => {
    it("evicts the call's key after a normal return", async () => {
      const { pipeline, users } = setup()
      await users.put(1, "stale")
      await users.put(2, "other")
      const { invocation } = findUser(1)

      await pipeline.execute({ invalidate: { kind: "invalidate", cacheNames: ["users"] } }, invocation)

      expect(users.keys()).toStrictEqual([2])
    })

    it("leaves the cache alone when the call throws", async () => {
      const { pipeline, users } = setup()
      await users.put(1, "stale")
      const { invocation } = findUser(1, async () => {
        throw new Error("db down")
      })

      await expect(
        pipeline.execute({ invalidate: { kind: "invalidate", cacheNames: ["users"] } }, invocation),
      ).rejects.toThrow("db down")
      expect(users.keys()).toStrictEqual([1])
    })

    it("runs before the call when asked, even if the call throws", async () => {
      const { pipeline, users } = setup()
      await users.put(1, "stale")
      const { invocation } = findUser(1, async () => {
        throw new Error("db down")
      })

      await expect(
        pipeline.execute(
          { invalidate: { kind: "invalidate", cacheNames: ["users"], beforeInvocation: true } },
          invocation,
        ),
      ).rejects.toThrow("db down")
      expect(users.size()).toBe(0)
    })

    it("clears every entry with allEntries", async () => {
      const { pipeline, users } = setup()
      await users.put(1, "a")
      await users.put(2, "b")
      const { invocation } = findUser(3)

      await pipeline.execute({ invalidate: { kind: "invalidate", cacheNames: ["users"], allEntries: true } }, invocation)

      expect(users.size()).toBe(0)
    })

    it("still invalidates after a read-through hit", async () => {
      const { pipeline, users, archive } = setup()
      await users.put(1, "cached")
      await archive.put(1, "old")
      const { invocation } = findUser(1)

      const result = await pipeline.execute(
        {
          readThrough: readThrough(["users"]),
          invalidate: { kind: "invalidate", cacheNames: ["archive"] },
        },
        invocation,
      )

      expect(result).toBe("cached")
      expect(archive.size()).toBe(0)
    })
  })

  describe("conditions", () => {
    it("skips a read-through whose condition is false", async () => {
      const { pipeline, users } = setup()
      await users.put(1, "cached")
      const { call, invocation } = findUser(1)

      const result = await pipeline.execute({ readThrough: readThrough(["users"], { condition: never() }) }, invocation)

      expect(result).toBe("user-1")
      expect(call).toHaveBeenCalledTimes(1)
      expect((await users.get(1))?.value).toBe("cached")
    })

    it("skips caching when the unless gate holds", async () => {
      const { pipeline, users } = setup({ properties: { "cache.disabled": "true" } })
      const { invocation } = findUser(1)

      await pipeline.execute(
        { readThrough: readThrough(["users"], { unless: whenEnv("cache.disabled", { value: "true" }) }) },
        invocation,
      )

      expect(users.size()).toBe(0)
    })
  })

  describe("backend failures", () => {
    it("falls back to calling through when a get fails and errors are logged", async () => {
      const { pipeline, users } = setup()
      vi.spyOn(users, "get").mockRejectedValue(new Error("down"))
      const { call, invocation } = findUser(1)

      const result = await pipeline.execute({ readThrough: readThrough(["users"]) }, invocation)

      expect(result).toBe("user-1")
      expect(call).toHaveBeenCalledTimes(1)
      expect(users.keys()).toStrictEqual([1])
    })

    it("tries every cache before surfacing a thrown get failure", async () => {
      const { pipeline, users, archive } = setup({ errorHandler: new ThrowingCacheErrorHandler() })
      vi.spyOn(users, "get").mockRejectedValue(new Error("down"))
      const archiveGet = vi.spyOn(archive, "get")
      const { call, invocation } = findUser(1)

      await expect(
        pipeline.execute({ readThrough: readThrough(["users", "archive"]) }, invocation),
      ).rejects.toThrow('get on "users" for key 1 failed: down')
      expect(archiveGet).toHaveBeenCalledTimes(1)
      expect(call).not.toHaveBeenCalled()
    })

    it("writes to the remaining caches before surfacing a thrown put failure", async () => {
      const { pipeline, users, archive } = setup({ errorHandler: new ThrowingCacheErrorHandler() })
      vi.spyOn(users, "put").mockRejectedValue(new Error("full"))
      const { invocation } = findUser(1)

      await expect(
        pipeline.execute({ writeThrough: { kind: "write-through", cacheNames: ["users", "archive"] } }, invocation),
      ).rejects.toBeInstanceOf(BackendOperationError)
      expect((await archive.get(1))?.value).toBe("user-1")
    })
  })
})
