import { ManualClock } from "@palisade/core"
import { InMemoryMutex } from "@palisade/lock"
import { NullLogger } from "@palisade/logger"
import { CacheCapacityExceededError } from "../../../core/errors/cache-errors"
import { FifoEvictionPolicy } from "../../../core/eviction/fifo-eviction-policy"
import { LfuEvictionPolicy } from "../../../core/eviction/lfu-eviction-policy"
import { LruEvictionPolicy } from "../../../core/eviction/lru-eviction-policy"
import { createTestCache } from "../../../tests/utils/cache-fixtures"
import { MemoryCacheStorage } from "../memory-cache-storage"

describe("MemoryCacheStorage", () => {
  describe("configuration", () => {
    it("rejects a non-positive maxEntries", () => {
      expect(() => createTestCache({ maxEntries: 0 })).toThrow(RangeError)
    })

    it("rejects a negative default ttl", () => {
      expect(() => createTestCache({ defaultTtlMs: -1 })).toThrow(RangeError)
    })

    it("rejects a negative ttl on put", async () => {
      const { cache } = createTestCache()

      await expect(cache.put("k", "v", -5)).rejects.toBeInstanceOf(RangeError)
    })

    it("applies the default ttl when put gets none", async () => {
      const { cache, clock } = createTestCache({ defaultTtlMs: 50 })

      await cache.put("k", "v")
      clock.advance(50)

      expect(await cache.get("k")).toBeUndefined()
    })

    it("lets a per-entry ttl override the default", async () => {
      const { cache, clock } = createTestCache({ defaultTtlMs: 50 })

      await cache.put("k", "v", 500)
      clock.advance(50)

      expect((await cache.get("k"))?.value).toBe("v")
    })
  })

  describe("capacity", () => {
    it("rejects a new key when full and no policy is set", async () => {
      const { cache } = createTestCache({ maxEntries: 1 })
      await cache.put("a", 1)

      const error = await cache.put("b", 2).catch((err: unknown) => err)

      expect(error).toBeInstanceOf(CacheCapacityExceededError)
      expect(error).toMatchObject({
        code: "capacity_exceeded",
        message: 'Cache "users" is full (1 entries) and has no eviction policy',
      })
      expect(cache.keys()).toStrictEqual(["a"])
    })

    it("still overwrites an existing key when full", async () => {
      const { cache } = createTestCache({ maxEntries: 1 })
      await cache.put("a", 1)
      await cache.put("a", 2)

      expect((await cache.get("a"))?.value).toBe(2)
    })

    it("evicts the least recently used entry under LRU", async () => {
      const { cache, clock, sink } = createTestCache({ maxEntries: 2 }, { evictionPolicy: new LruEvictionPolicy() })
      await cache.put("a", 1)
      await cache.put("b", 2)
      clock.advance(10)
      await cache.get("a")

      await cache.put("c", 3)

      expect(cache.keys()).toStrictEqual(["a", "c"])
      expect(sink.events.filter((e) => e.type === "evict")).toMatchObject([
        { key: "b", reason: "eviction-policy" },
      ])
    })

    it("evicts the least frequently read entry under LFU", async () => {
      const { cache } = createTestCache({ maxEntries: 2 }, { evictionPolicy: new LfuEvictionPolicy() })
      await cache.put("a", 1)
      await cache.put("b", 2)
      await cache.get("a")
      await cache.get("a")
      await cache.get("b")

      await cache.put("c", 3)

      expect(cache.keys()).toStrictEqual(["a", "c"])
    })

    it("evicts the oldest write under FIFO, regardless of reads", async () => {
      const { cache, clock } = createTestCache({ maxEntries: 2 }, { evictionPolicy: new FifoEvictionPolicy() })
      await cache.put("a", 1)
      clock.advance(1)
      await cache.put("b", 2)
      await cache.get("a")

      await cache.put("c", 3)

      expect(cache.keys()).toStrictEqual(["b", "c"])
    })

    it("never exceeds maxEntries under concurrent puts", async () => {
      const { cache } = createTestCache({ maxEntries: 3 }, { evictionPolicy: new LruEvictionPolicy() })

      await Promise.all(Array.from({ length: 20 }, (_, i) => cache.put(`k${i}`, i)))

      expect(cache.size()).toBe(3)
    })
  })

  describe("atomicity", () => {
    it("lets exactly one concurrent putIfAbsent insert", async () => {
      const { cache } = createTestCache()

      const results = await Promise.all(Array.from({ length: 10 }, (_, i) => cache.putIfAbsent("k", i)))

      expect(results.filter((r) => r === undefined)).toHaveLength(1)
      expect(results.slice(1).map((r) => r?.value)).toStrictEqual(Array.from({ length: 9 }, () => 0))
      expect((await cache.get("k"))?.value).toBe(0)
    })

    it("runs each operation under the supplied mutex", async () => {
      const mutex = new InMemoryMutex()
      const { cache } = createTestCache({}, { mutex })
      const lease = await mutex.acquire()

      const pending = cache.put("k", "v")
      await Promise.resolve()

      expect(cache.size()).toBe(0)
      expect(mutex.pendingCount()).toBe(1)

      lease.release()
      await pending

      expect(cache.size()).toBe(1)
    })
  })

  describe("entries", () => {
    it("hands out snapshots that later reads do not change", async () => {
      const { cache } = createTestCache()
      await cache.put("k", "v")

      const first = await cache.get("k")
      await cache.get("k")

      expect(first?.accessCount).toBe(1)
      expect(Object.isFrozen(first)).toBe(true)
    })
  })

  describe("events", () => {
    it("publishes put, hit, miss and expire events", async () => {
      const { cache, clock, sink } = createTestCache()

      await cache.put("k", "v", 100)
      await cache.get("k")
      await cache.get("other")
      clock.advance(100)
      await cache.get("k")

      expect(sink.events.map((e) => e.type)).toStrictEqual(["put", "hit", "miss", "expire"])
      expect(sink.events[0]).toStrictEqual({
        type: "put",
        key: "k",
        value: "v",
        ttlMs: 100,
        cacheName: "users",
        timestamp: new Date(Date.UTC(2025, 0, 1)),
      })
    })

    it("publishes one clear event per removed key, each with the total", async () => {
      const { cache, sink } = createTestCache()
      await cache.put("a", 1)
      await cache.put("b", 2)
      sink.events.length = 0

      await cache.clear()

      expect(sink.events).toMatchObject([
        { type: "clear", key: "a", count: 2 },
        { type: "clear", key: "b", count: 2 },
      ])
    })

    it("publishes a manual evict event", async () => {
      const { cache, sink } = createTestCache()
      await cache.put("a", 1)

      await cache.evictIfPresent("a")

      expect(sink.events.at(-1)).toMatchObject({ type: "evict", key: "a", reason: "manual" })
    })

    it("publishes nothing when events are disabled", async () => {
      const { cache, sink } = createTestCache({ eventsEnabled: false })

      await cache.put("a", 1)
      await cache.get("a")

      expect(sink.events).toStrictEqual([])
    })

    it("keeps working when the sink throws", async () => {
      const cache = new MemoryCacheStorage(
        {
          clock: new ManualClock(),
          logger: new NullLogger(),
          events: {
            publish() {
              throw new Error("sink down")
            },
          },
        },
        { name: "users" },
      )

      await cache.put("a", 1)

      expect((await cache.get("a"))?.value).toBe(1)
    })

    it("lets a sink read from the same cache while handling an event", async () => {
      const seen: unknown[] = []
      const holder: { cache?: MemoryCacheStorage } = {}
      const { cache } = createTestCache(
        {},
        {
          events: {
            async publish(event) {
              if (event.type !== "put" || !holder.cache) return
              seen.push((await holder.cache.get(event.key))?.value)
            },
          },
        },
      )
      holder.cache = cache

      await cache.put("k", 1)

      expect(seen).toStrictEqual([1])
    })
  })

  describe("metrics", () => {
    it("counts hits, misses and puts", async () => {
      const { cache } = createTestCache()

      await cache.put("a", 1)
      await cache.get("a")
      await cache.get("b")

      const metrics = cache.getMetrics()

      expect(metrics.totals()).toStrictEqual({
        hits: 1,
        misses: 1,
        puts: 1,
        evictions: 0,
        expirations: 0,
        cleared: 0,
      })
      expect(metrics.hitRate()).toBe(50)
    })

    it("counts an expired read as an eviction and an expiration", async () => {
      const { cache, clock } = createTestCache()
      await cache.put("a", 1, 10)
      clock.advance(10)

      await cache.get("a")

      expect(cache.getMetrics().totals()).toMatchObject({ evictions: 1, expirations: 1, misses: 0 })
    })

    it("counts cleared entries", async () => {
      const { cache } = createTestCache()
      await cache.put("a", 1)
      await cache.put("b", 2)

      await cache.clear()

      expect(cache.getMetrics().totals().cleared).toBe(2)
    })

    it("records nothing when metrics are disabled", async () => {
      const { cache } = createTestCache({ metricsEnabled: false })

      await cache.put("a", 1)
      await cache.get("a")

      expect(cache.getMetrics().totals()).toStrictEqual({
        hits: 0,
        misses: 0,
        puts: 0,
        evictions: 0,
        expirations: 0,
        cleared: 0,
      })
    })
  })
})
