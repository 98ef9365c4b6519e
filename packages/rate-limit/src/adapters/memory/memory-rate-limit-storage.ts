import {
  type Clock,
  describeKey,
  keyFingerprint,
  type Milliseconds,
  type NotificationSink,
  publishSafely,
  type Resource,
  type ResourceKey,
} from "@palisade/core"
import { InMemoryMutex, type Mutex, withLock } from "@palisade/lock"
import type { Logger } from "@palisade/logger"
import { SimpleRateLimitMetrics } from "../../core/metrics/simple-rate-limit-metrics"
import { SimpleRateLimitResult } from "../../core/result/simple-rate-limit-result"
import { RateLimitWindow } from "../../core/window/rate-limit-window"
import type { RateLimitEvent } from "../../ports/rate-limit-event"
import type { RateLimitMetrics } from "../../ports/rate-limit-metrics"
import type { RateLimitResult } from "../../ports/rate-limit-result"
import type { RateLimitStorage } from "../../ports/rate-limit-storage"

export type MemoryRateLimitStorageDeps = {
  clock: Clock
  logger: Logger
  mutex?: Mutex
  events?: NotificationSink<RateLimitEvent>
  metrics?: RateLimitMetrics
}

export type MemoryRateLimitStorageOptions = {
  name: string

  /** @default "UTC" */
  timeZone?: string

  /** @default true */
  metricsEnabled?: boolean

  /** @default true */
  eventsEnabled?: boolean
}

type Slot = {
  identifier: ResourceKey
  identity: string
  window: RateLimitWindow
}

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never

function assertWindow(windowMs: Milliseconds): void {
  if (!Number.isFinite(windowMs) || windowMs <= 0) {
    throw new RangeError(`windowMs must be a positive, finite number of milliseconds, got ${windowMs}`)
  }
}

function assertLimit(limit: number): void {
  if (!Number.isInteger(limit) || limit < 0) {
    throw new RangeError(`limit must be a non-negative integer, got ${limit}`)
  }
}

/**
 * Process-local rate-limit store.
 *
 * @remarks
 * Identifiers compare by value (see `keyFingerprint`); one identifier can
 * hold several windows of different lengths at once.
 */
export class MemoryRateLimitStorage implements RateLimitStorage {
  readonly name: string

  private readonly slots = new Map<string, Slot>()
  private readonly mutex: Mutex
  private readonly metrics: RateLimitMetrics
  private readonly logger: Logger
  private readonly resource: Resource
  private readonly timeZone: string

  constructor(
    private readonly deps: MemoryRateLimitStorageDeps,
    private readonly opts: MemoryRateLimitStorageOptions,
  ) {
    this.name = opts.name
    this.timeZone = opts.timeZone ?? "UTC"
    this.mutex = deps.mutex ?? new InMemoryMutex()
    this.metrics = deps.metrics ?? new SimpleRateLimitMetrics(opts.name, deps.clock)
    this.logger = deps.logger.child({ component: "memory-rate-limit-storage", limitName: opts.name })
    this.resource = { kind: "rate-limit", name: opts.name, size: () => this.size() }
  }

  async tryConsume(identifier: ResourceKey, limit: number, windowMs: Milliseconds): Promise<RateLimitResult> {
    assertLimit(limit)
    assertWindow(windowMs)

    return this.locked((outbox) => {
      const slot = this.currentSlot(outbox, identifier, windowMs)
      const { window } = slot
      const nowMs = this.deps.clock.nowMs()
      const label = describeKey(identifier)

      if (window.count < limit) {
        window.increment()
        this.record((m) => m.recordAllowed(label))
        this.emit(outbox, { type: "allowed", identifier })

        return this.result(slot, { allowed: true, limit, retryAfterMs: 0 })
      }

      const retryAfterMs = Math.max(0, window.resetAtMs - nowMs)

      this.record((m) => m.recordDenied(label))
      this.emit(outbox, { type: "denied", identifier, retryAt: new Date(nowMs + retryAfterMs) })
      this.logger.debug("Request denied", { identifier: label, count: window.count, limit })

      return this.result(slot, { allowed: false, limit, retryAfterMs })
    })
  }

  async rollbackConsume(identifier: ResourceKey, windowMs: Milliseconds, resetAtMs?: Milliseconds): Promise<boolean> {
    return withLock(this.mutex, () => {
      const key = this.slotKey(identifier, windowMs)
      const slot = this.slots.get(key)

      if (!slot) return false

      const { window } = slot

      if (window.isExpired(this.deps.clock.nowMs())) return false
      if (resetAtMs !== undefined && window.resetAtMs !== resetAtMs) return false
      if (window.count === 0) return false

      window.decrement()
      this.record((m) => m.decrementAllowed(describeKey(identifier)))

      if (window.count === 0) this.slots.delete(key)

      return true
    })
  }

  async getRemainingRequests(identifier: ResourceKey, limit: number, windowMs: Milliseconds): Promise<number> {
    const count = await this.getRequestCount(identifier, windowMs)

    return Math.max(0, limit - count)
  }

  async recordRequest(identifier: ResourceKey, windowMs: Milliseconds): Promise<void> {
    assertWindow(windowMs)

    await this.locked((outbox) => {
      const { window } = this.currentSlot(outbox, identifier, windowMs)

      window.increment()
      this.record((m) => m.recordAllowed(describeKey(identifier)))
    })
  }

  async getRequestCount(identifier: ResourceKey, windowMs: Milliseconds): Promise<number> {
    const window = this.slots.get(this.slotKey(identifier, windowMs))?.window

    if (!window || window.isExpired(this.deps.clock.nowMs())) return 0

    return window.count
  }

  async getResetTime(identifier: ResourceKey, windowMs: Milliseconds): Promise<Date | undefined> {
    const window = this.slots.get(this.slotKey(identifier, windowMs))?.window

    if (!window) return undefined

    const nowMs = this.deps.clock.nowMs()

    return new Date(window.isExpired(nowMs) ? nowMs : window.resetAtMs)
  }

  async getRetryAfter(identifier: ResourceKey, windowMs: Milliseconds): Promise<Date | undefined> {
    const window = this.slots.get(this.slotKey(identifier, windowMs))?.window

    if (!window || window.isExpired(this.deps.clock.nowMs())) return undefined

    return new Date(window.resetAtMs)
  }

  async reset(identifier: ResourceKey): Promise<void> {
    const identity = keyFingerprint(identifier)

    await this.locked((outbox) => {
      for (const [key, slot] of [...this.slots]) {
        if (slot.identity !== identity) continue

        this.slots.delete(key)
        this.record((m) => m.recordReset(describeKey(identifier)))
        this.emit(outbox, { type: "reset", identifier: slot.identifier, resetTime: this.deps.clock.now() })
      }
    })
  }

  async clear(): Promise<void> {
    await this.locked((outbox) => {
      const removed = [...this.slots.values()]

      this.slots.clear()

      for (const slot of removed) {
        this.emit(outbox, { type: "clear", identifier: slot.identifier, count: slot.window.count })
      }

      this.record((m) => m.reset())

      if (removed.length > 0) this.logger.debug("Cleared rate limit windows", { count: removed.length })
    })
  }

  async invalidate(): Promise<void> {
    await this.locked((outbox) => {
      const nowMs = this.deps.clock.nowMs()

      for (const [key, slot] of [...this.slots]) {
        if (!slot.window.isExpired(nowMs)) continue

        this.slots.delete(key)
        this.record((m) => m.recordReset(describeKey(slot.identifier)))
        this.emit(outbox, { type: "reset", identifier: slot.identifier, resetTime: new Date(slot.window.resetAtMs) })
      }
    })
  }

  size(): number {
    return this.slots.size
  }

  getMetrics(): RateLimitMetrics {
    return this.metrics
  }

  getResource(): Resource {
    return this.resource
  }

  /** Sinks run after release, so they may call back into this store. */
  private async locked<T>(fn: (outbox: RateLimitEvent[]) => T): Promise<T> {
    const outbox: RateLimitEvent[] = []

    try {
      return await withLock(this.mutex, () => fn(outbox))
    } finally {
      for (const event of outbox) await publishSafely(this.deps.events, event, this.logger)
    }
  }

  /** Finds or opens the window, rolling it over when it has ended. Caller holds the lock. */
  private currentSlot(outbox: RateLimitEvent[], identifier: ResourceKey, windowMs: Milliseconds): Slot {
    const key = this.slotKey(identifier, windowMs)
    const nowMs = this.deps.clock.nowMs()
    const existing = this.slots.get(key)

    if (!existing) {
      const slot: Slot = {
        identifier,
        identity: keyFingerprint(identifier),
        window: new RateLimitWindow(windowMs, nowMs),
      }

      this.slots.set(key, slot)

      return slot
    }

    if (existing.window.isExpired(nowMs)) {
      existing.window.restart(nowMs)
      this.record((m) => m.recordReset(describeKey(identifier)))
      this.emit(outbox, { type: "reset", identifier, resetTime: new Date(existing.window.resetAtMs) })
    }

    return existing
  }

  private slotKey(identifier: ResourceKey, windowMs: Milliseconds): string {
    return `${keyFingerprint(identifier)}|${windowMs}`
  }

  private result(
    slot: Slot,
    decision: { allowed: boolean; limit: number; retryAfterMs: Milliseconds },
  ): RateLimitResult {
    return new SimpleRateLimitResult({
      identifier: slot.identifier,
      limitName: this.name,
      allowed: decision.allowed,
      currentCount: slot.window.count,
      limit: decision.limit,
      windowMs: slot.window.windowMs,
      resetTime: new Date(slot.window.resetAtMs),
      retryAfterMs: decision.retryAfterMs,
      timeZone: this.timeZone,
    })
  }

  private record(fn: (metrics: RateLimitMetrics) => void): void {
    if (this.opts.metricsEnabled ?? true) fn(this.metrics)
  }

  /** Queues an event for `locked` to publish once the mutex is free. */
  private emit(outbox: RateLimitEvent[], event: DistributiveOmit<RateLimitEvent, "limitName" | "timestamp">): void {
    if (!(this.opts.eventsEnabled ?? true)) return

    outbox.push({ ...event, limitName: this.name, timestamp: this.deps.clock.now() })
  }
}
