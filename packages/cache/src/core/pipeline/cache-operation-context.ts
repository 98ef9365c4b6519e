import { InvariantError, InvocationContext } from "@palisade/core"
import type { CacheResult } from "../../ports/cache-result"

/**
 * Invocation state plus what the cache pipeline learned on the way:
 * the call's result, a value served from a cache, and whether a
 * read-through missed everywhere.
 *
 * @remarks
 * The result and the cached value can each be set once.
 */
export class CacheOperationContext extends InvocationContext {
  private result: CacheResult<unknown> = { kind: "miss" }
  private cached: CacheResult<unknown> = { kind: "miss" }
  private missed = false

  setResult(value: unknown): void {
    if (this.result.kind === "hit") throw new InvariantError("Invocation result was already recorded")

    this.result = { kind: "hit", value }
  }

  /** `miss` until the guarded call has returned. */
  getResult(): CacheResult<unknown> {
    return this.result
  }

  setCachedResult(value: unknown): void {
    if (this.cached.kind === "hit") throw new InvariantError("Cached result was already recorded")

    this.cached = { kind: "hit", value }
  }

  getCachedResult(): CacheResult<unknown> {
    return this.cached
  }

  markCacheMiss(): void {
    this.missed = true
  }

  isCacheMiss(): boolean {
    return this.missed
  }
}
