import type { CacheManager, CachePipeline } from "@palisade/cache"
import type { Clock } from "@palisade/core"
import type { Logger } from "@palisade/logger"
import type { RateLimitManager, RateLimitPipeline } from "@palisade/rate-limit"
import type { EngineSettings } from "../core/settings/engine-settings"

/**
 * A wired set of stores and pipelines. One per process is typical;
 * engines share nothing with each other.
 */
export interface Engine {
  readonly settings: EngineSettings
  readonly clock: Clock
  readonly logger: Logger

  readonly cacheManager: CacheManager
  readonly rateLimitManager: RateLimitManager

  readonly cachePipeline: CachePipeline
  readonly rateLimitPipeline: RateLimitPipeline

  /** Empties every store the engine manages. */
  destroy(): Promise<void>
}
