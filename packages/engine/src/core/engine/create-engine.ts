import {
  type CacheEvent,
  type CacheManager,
  CachePipeline,
  type CacheResolver,
  type CacheStorage,
  createEvictionPolicy,
  LoggingCacheErrorHandler,
  MemoryCacheStorage,
  SimpleCacheManager,
  SimpleCacheResolver,
  ThrowingCacheErrorHandler,
} from "@palisade/cache"
import { type Environment, PropertyEnvironment } from "@palisade/config"
import {
  type Clock,
  type KeyGenerator,
  MapRegistry,
  type NotificationSink,
  SimpleKeyGenerator,
  SystemClock,
} from "@palisade/core"
import { createPinoLogger, type Logger } from "@palisade/logger"
import {
  MemoryRateLimitStorage,
  type RateLimitEvent,
  type RateLimitManager,
  RateLimitPipeline,
  type RateLimitResolver,
  type RateLimitStorage,
  SimpleRateLimitManager,
  SimpleRateLimitResolver,
} from "@palisade/rate-limit"
import type { Engine } from "../../ports/engine"
import type { EngineSettings } from "../settings/engine-settings"

export type CreateEngineOptions = {
  settings: EngineSettings

  /** @default SystemClock */
  clock?: Clock

  /** A pino logger built from `LOG_LEVEL`/`LOG_PRETTY` when omitted. */
  logger?: Logger

  /** Read by `whenEnv` conditions; the process environment when omitted. */
  environment?: Environment

  /** Pre-built stores; anything else is created on first use when auto-creation is on. */
  caches?: readonly CacheStorage[]
  rateLimits?: readonly RateLimitStorage[]

  /** Named extensions, referenced from operations by name. */
  keyGenerators?: Readonly<Record<string, KeyGenerator>>
  cacheResolvers?: Readonly<Record<string, CacheResolver>>
  cacheManagers?: Readonly<Record<string, CacheManager>>
  rateLimitResolvers?: Readonly<Record<string, RateLimitResolver>>
  rateLimitManagers?: Readonly<Record<string, RateLimitManager>>

  cacheEvents?: NotificationSink<CacheEvent>
  rateLimitEvents?: NotificationSink<RateLimitEvent>
}

export function createEngine(opts: CreateEngineOptions): Engine {
  const { settings } = opts
  const clock = opts.clock ?? new SystemClock()
  const logger = opts.logger ?? createPinoLogger({}, { level: settings.LOG_LEVEL, prettify: settings.LOG_PRETTY })
  const environment = opts.environment ?? PropertyEnvironment.fromRecord(process.env, "env")
  const defaultTtlMs = settings.CACHE_TTL_SECONDS === undefined ? undefined : settings.CACHE_TTL_SECONDS * 1000

  const cacheManager = new SimpleCacheManager(
    {
      logger,
      caches: opts.caches,
      createCache: (name) =>
        new MemoryCacheStorage(
          {
            clock,
            logger,
            evictionPolicy: createEvictionPolicy(settings.CACHE_EVICTION_POLICY),
            events: opts.cacheEvents,
          },
          {
            name,
            maxEntries: settings.CACHE_MAX_ENTRIES,
            defaultTtlMs,
            metricsEnabled: settings.CACHE_ENABLE_METRICS,
            eventsEnabled: settings.CACHE_ENABLE_EVENTS,
          },
        ),
    },
    { autoCreate: settings.CACHE_AUTO_CREATE, failIfNotFound: settings.CACHE_FAIL_ON_MISSING },
  )

  const rateLimitManager = new SimpleRateLimitManager(
    {
      logger,
      storages: opts.rateLimits,
      createStorage: (name) =>
        new MemoryRateLimitStorage(
          { clock, logger, events: opts.rateLimitEvents },
          {
            name,
            timeZone: settings.RATE_LIMIT_TIMEZONE,
            metricsEnabled: settings.RATE_LIMIT_ENABLE_METRICS,
            eventsEnabled: settings.RATE_LIMIT_ENABLE_EVENTS,
          },
        ),
    },
    { autoCreate: settings.RATE_LIMIT_AUTO_CREATE, failIfNotFound: settings.RATE_LIMIT_FAIL_ON_MISSING },
  )

  const defaultKeyGenerator = new SimpleKeyGenerator()
  const keyGenerators = new MapRegistry<KeyGenerator>("key generator", Object.entries(opts.keyGenerators ?? {}))

  const cachePipeline = new CachePipeline({
    environment,
    logger,
    errorHandler:
      settings.CACHE_ERROR_HANDLER === "throw"
        ? new ThrowingCacheErrorHandler()
        : new LoggingCacheErrorHandler({ logger }),
    defaultResolver: new SimpleCacheResolver({ manager: cacheManager, logger }),
    resolvers: new MapRegistry<CacheResolver>("cache resolver", Object.entries(opts.cacheResolvers ?? {})),
    managers: new MapRegistry<CacheManager>("cache manager", Object.entries(opts.cacheManagers ?? {})),
    defaultKeyGenerator,
    keyGenerators,
  })

  const rateLimitPipeline = new RateLimitPipeline({
    environment,
    logger,
    defaultResolver: new SimpleRateLimitResolver({ manager: rateLimitManager, logger }),
    resolvers: new MapRegistry<RateLimitResolver>("rate limit resolver", Object.entries(opts.rateLimitResolvers ?? {})),
    managers: new MapRegistry<RateLimitManager>("rate limit manager", Object.entries(opts.rateLimitManagers ?? {})),
    defaultKeyGenerator,
    keyGenerators,
  })

  logger.child({ component: "engine" }).debug("Engine created", {
    cacheEvictionPolicy: settings.CACHE_EVICTION_POLICY,
    cacheErrorHandler: settings.CACHE_ERROR_HANDLER,
  })

  return {
    settings,
    clock,
    logger,
    cacheManager,
    rateLimitManager,
    cachePipeline,
    rateLimitPipeline,
    async destroy() {
      await rateLimitManager.destroy()
      await cacheManager.destroy()
    },
  }
}
