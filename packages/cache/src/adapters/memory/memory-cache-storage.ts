import {
  type Clock,
  describeKey,
  InvariantError,
  keyFingerprint,
  type Milliseconds,
  type NotificationSink,
  publishSafely,
  type Resource,
  type ResourceKey,
} from "@palisade/core"
import { InMemoryMutex, type Mutex, withLock } from "@palisade/lock"
import type { Logger } from "@palisade/logger"
import { StoredCacheEntry } from "../../core/entry/stored-cache-entry"
import { CacheCapacityExceededError, CacheEntryNotFoundError } from "../../core/errors/cache-errors"
import { SimpleCacheMetrics } from "../../core/metrics/simple-cache-metrics"
import type { CacheEntry } from "../../ports/cache-entry"
import type { CacheEvent, CacheEvictionReason } from "../../ports/cache-event"
import type { CacheEvictionPolicy } from "../../ports/cache-eviction-policy"
import type { CacheMetrics } from "../../ports/cache-metrics"
import type { CacheStorage } from "../../ports/cache-storage"

export type MemoryCacheStorageDeps = {
  clock: Clock
  logger: Logger

  /** Serializes every read-modify-write; a private mutex when omitted. */
  mutex?: Mutex

  /** Without a policy a full cache rejects new keys. */
  evictionPolicy?: CacheEvictionPolicy
  events?: NotificationSink<CacheEvent>
  metrics?: CacheMetrics
}

export type MemoryCacheStorageOptions = {
  name: string

  /** Unbounded when omitted. */
  maxEntries?: number

  /** Applied when `put` gets no TTL; entries never expire when both are absent. */
  defaultTtlMs?: Milliseconds

  /** @default true */
  metricsEnabled?: boolean

  /** @default true */
  eventsEnabled?: boolean
}

type Slot = {
  key: ResourceKey
  entry: StoredCacheEntry
}

function assertTtl(ttlMs: Milliseconds | undefined, label: string): void {
  if (ttlMs === undefined) return
  if (!Number.isFinite(ttlMs) || ttlMs < 0) {
    throw new RangeError(`${label} must be a finite, non-negative number of milliseconds, got ${ttlMs}`)
  }
}

/**
 * Process-local cache backend.
 *
 * @remarks
 * Entries are indexed by key fingerprint, so structurally equal keys
 * share an entry. Expiry is checked lazily on access and by
 * `invalidate()`.
 */
export class MemoryCacheStorage implements CacheStorage {
  readonly name: string

  private readonly slots = new Map<string, Slot>()
  private readonly candidates = new Map<string, StoredCacheEntry>()
  private readonly mutex: Mutex
  private readonly metrics: CacheMetrics
  private readonly logger: Logger
  private readonly resource: Resource

  constructor(
    private readonly deps: MemoryCacheStorageDeps,
    private readonly opts: MemoryCacheStorageOptions,
  ) {
    const { maxEntries } = opts

    if (maxEntries !== undefined && (!Number.isInteger(maxEntries) || maxEntries < 1)) {
      throw new RangeError(`maxEntries must be a positive integer, got ${maxEntries}`)
    }
    assertTtl(opts.defaultTtlMs, "defaultTtlMs")

    this.name = opts.name
    this.mutex = deps.mutex ?? new InMemoryMutex()
    this.metrics = deps.metrics ?? new SimpleCacheMetrics(opts.name)
    this.logger = deps.logger.child({ component: "memory-cache-storage", cache: opts.name })
    this.resource = { kind: "cache", name: opts.name, size: () => this.size() }
  }

  async get(key: ResourceKey): Promise<CacheEntry | undefined> {
    return this.locked((outbox) => {
      const fp = keyFingerprint(key)
      const slot = this.slots.get(fp)

      if (!slot) {
        this.record((m) => m.recordMiss(describeKey(key)))
        this.emit(outbox, { type: "miss", key })
        return undefined
      }

      if (slot.entry.isExpired()) {
        this.expire(outbox, fp, slot)
        return undefined
      }

      slot.entry.recordAccess()
      this.record((m) => m.recordHit(describeKey(key)))
      this.emit(outbox, { type: "hit", key, value: slot.entry.value })

      return slot.entry.snapshot()
    })
  }

  async put(key: ResourceKey, value: unknown, ttlMs?: Milliseconds): Promise<void> {
    assertTtl(ttlMs, "ttlMs")

    await this.locked((outbox) => this.insert(outbox, key, value, ttlMs))
  }

  async putIfAbsent(key: ResourceKey, value: unknown, ttlMs?: Milliseconds): Promise<CacheEntry | undefined> {
    assertTtl(ttlMs, "ttlMs")

    return this.locked((outbox) => {
      const fp = keyFingerprint(key)
      const slot = this.slots.get(fp)

      if (slot && !slot.entry.isExpired()) {
        this.record((m) => m.recordHit(describeKey(key)))
        return slot.entry.snapshot()
      }

      if (slot) this.expire(outbox, fp, slot)
      this.insert(outbox, key, value, ttlMs)

      return undefined
    })
  }

  async evict(key: ResourceKey): Promise<void> {
    await this.locked((outbox) => {
      const fp = keyFingerprint(key)
      const slot = this.slots.get(fp)

      if (!slot) throw new CacheEntryNotFoundError(this.name, key)

      this.remove(outbox, fp, slot, "manual")
    })
  }

  async evictIfPresent(key: ResourceKey): Promise<boolean> {
    return this.locked((outbox) => {
      const fp = keyFingerprint(key)
      const slot = this.slots.get(fp)

      if (!slot) return false

      this.remove(outbox, fp, slot, "manual")

      return true
    })
  }

  async clear(): Promise<void> {
    await this.locked((outbox) => {
      const removed = [...this.slots.values()]
      const count = removed.length

      this.slots.clear()
      this.candidates.clear()
      this.record((m) => m.recordClear(count))

      for (const { key } of removed) this.emit(outbox, { type: "clear", key, count })

      if (count > 0) this.logger.debug("Cleared cache", { count })
    })
  }

  async invalidate(): Promise<void> {
    await this.locked((outbox) => {
      for (const [fp, slot] of [...this.slots]) {
        if (slot.entry.isExpired()) this.expire(outbox, fp, slot)
      }
    })
  }

  size(): number {
    return this.slots.size
  }

  keys(): ResourceKey[] {
    return [...this.slots.values()].map((slot) => slot.key)
  }

  getMetrics(): CacheMetrics {
    return this.metrics
  }

  getResource(): Resource {
    return this.resource
  }

  /**
   * Runs `fn` under the store mutex. Events it queues are published once
   * the mutex is released, so a sink may call back into this store.
   */
  private async locked<T>(fn: (outbox: CacheEvent[]) => T): Promise<T> {
    const outbox: CacheEvent[] = []

    try {
      return await withLock(this.mutex, () => fn(outbox))
    } finally {
      for (const event of outbox) await publishSafely(this.deps.events, event, this.logger)
    }
  }

  private insert(outbox: CacheEvent[], key: ResourceKey, value: unknown, ttlMs: Milliseconds | undefined): void {
    const fp = keyFingerprint(key)

    if (!this.slots.has(fp)) this.ensureCapacityForOne(outbox)

    const ttl = ttlMs ?? this.opts.defaultTtlMs
    const entry = new StoredCacheEntry(this.deps.clock, value, ttl)

    this.slots.set(fp, { key, entry })
    this.candidates.set(fp, entry)
    this.record((m) => m.recordPut(describeKey(key)))
    this.emit(outbox, { type: "put", key, value, ttlMs: ttl })
  }

  private ensureCapacityForOne(outbox: CacheEvent[]): void {
    const { maxEntries } = this.opts

    if (maxEntries === undefined) return

    while (this.slots.size >= maxEntries) {
      const policy = this.deps.evictionPolicy

      if (!policy) throw new CacheCapacityExceededError(this.name, maxEntries)

      const victim = policy.selectVictim(this.candidates)
      const slot = victim === undefined ? undefined : this.slots.get(victim)

      if (victim === undefined || !slot) {
        throw new InvariantError(`Eviction policy "${policy.name}" chose no victim while over capacity`, {
          cacheName: this.name,
        })
      }

      this.remove(outbox, victim, slot, "eviction-policy")
    }
  }

  private remove(outbox: CacheEvent[], fp: string, slot: Slot, reason: CacheEvictionReason): void {
    this.slots.delete(fp)
    this.candidates.delete(fp)
    this.record((m) => m.recordEviction(describeKey(slot.key)))
    this.emit(outbox, { type: "evict", key: slot.key, reason })
  }

  private expire(outbox: CacheEvent[], fp: string, slot: Slot): void {
    const label = describeKey(slot.key)

    this.slots.delete(fp)
    this.candidates.delete(fp)
    this.record((m) => {
      m.recordEviction(label)
      m.recordExpiration(label)
    })
    this.emit(outbox, { type: "expire", key: slot.key, value: slot.entry.value, ttlMs: slot.entry.ttlMs })
  }

  private record(fn: (metrics: CacheMetrics) => void): void {
    if (this.opts.metricsEnabled ?? true) fn(this.metrics)
  }

  /** Stamps and queues an event; `locked` publishes it after release. */
  private emit(outbox: CacheEvent[], event: DistributiveOmit<CacheEvent, "cacheName" | "timestamp">): void {
    if (!(this.opts.eventsEnabled ?? true)) return

    outbox.push({ ...event, cacheName: this.name, timestamp: this.deps.clock.now() })
  }
}

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never
