import type { RateLimitStorage } from "./rate-limit-storage"

export interface RateLimitManager {
  getStorage(name: string): Promise<RateLimitStorage | undefined>
  getStorageNames(): Promise<string[]>
  clearAll(): Promise<void>

  /** Sweeps, clears and forgets every store the manager holds. */
  destroy(): Promise<void>
}
