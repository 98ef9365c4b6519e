import { InvocationContext } from "@palisade/core"
import type { RateLimitResult } from "../../ports/rate-limit-result"
import type { RateLimitStorage } from "../../ports/rate-limit-storage"

export type Consumption = Readonly<{
  storage: RateLimitStorage
  result: RateLimitResult
}>

/**
 * Invocation state plus the consumptions a rollback would have to undo.
 */
export class RateLimitOperationContext extends InvocationContext {
  private skipped = false
  private readonly consumptions: Consumption[] = []

  markSkipped(): void {
    this.skipped = true
  }

  isSkipped(): boolean {
    return this.skipped
  }

  recordConsumption(storage: RateLimitStorage, result: RateLimitResult): void {
    this.consumptions.push({ storage, result })
  }

  /** In the order they were taken. */
  getConsumptions(): readonly Consumption[] {
    return this.consumptions
  }
}
