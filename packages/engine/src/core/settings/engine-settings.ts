import { evictionPolicyNames } from "@palisade/cache"
import { type ConfigSource, EnvSource, loadConfig } from "@palisade/config"
import { logLevelNames } from "@palisade/logger"
import { z } from "zod"

export const ENV_PREFIX = "PALISADE_"

const flag = (fallback: boolean) => z.union([z.boolean(), z.stringbool()]).default(fallback)

function isTimeZone(value: string): boolean {
  try {
    return new Intl.DateTimeFormat("en-US", { timeZone: value }).resolvedOptions().timeZone.length > 0
  } catch {
    return false
  }
}

const timeZone = z.string().trim().refine(isTimeZone, { message: "Unknown IANA time zone" })

export const engineSettingsSchema = z.object({
  /** Default TTL of auto-created caches; entries never expire when unset. */
  CACHE_TTL_SECONDS: z.coerce.number().nonnegative().optional(),
  CACHE_MAX_ENTRIES: z.coerce.number().int().positive().optional(),
  CACHE_EVICTION_POLICY: z.string().trim().toLowerCase().pipe(z.enum(evictionPolicyNames)).default("lru"),
  CACHE_ENABLE_EVENTS: flag(true),
  CACHE_ENABLE_METRICS: flag(true),
  CACHE_AUTO_CREATE: flag(true),
  CACHE_FAIL_ON_MISSING: flag(false),
  CACHE_ERROR_HANDLER: z.enum(["log", "throw"]).default("log"),

  RATE_LIMIT_ENABLE_EVENTS: flag(true),
  RATE_LIMIT_ENABLE_METRICS: flag(true),
  RATE_LIMIT_AUTO_CREATE: flag(true),
  RATE_LIMIT_FAIL_ON_MISSING: flag(false),
  RATE_LIMIT_TIMEZONE: timeZone.default("UTC"),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.union([z.boolean(), z.stringbool()]).default(false),
})

export type EngineSettings = z.output<typeof engineSettingsSchema>

/**
 * Reads `PALISADE_*` variables from the process environment, or the given
 * sources in order (later ones win).
 *
 * @throws ConfigValidationError when a value does not parse.
 */
export async function loadEngineSettings(
  sources: ConfigSource[] = [new EnvSource({ prefix: ENV_PREFIX })],
): Promise<EngineSettings> {
  const config = await loadConfig({ schema: engineSettingsSchema, sources })

  return config.value
}

/** Settings with every default applied. */
export function defaultEngineSettings(): EngineSettings {
  return engineSettingsSchema.parse({})
}
