import type { Invocation } from "@palisade/core"
import type { RateLimitOperation } from "./rate-limit-operation"
import type { RateLimitStorage } from "./rate-limit-storage"

export interface RateLimitResolver {
  resolveStorages(operation: RateLimitOperation, invocation: Invocation<unknown>): Promise<RateLimitStorage[]>
}
