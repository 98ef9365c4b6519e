import { ConfigValidationError, EnvSource, ObjectSource } from "@palisade/config"
import { defaultEngineSettings, ENV_PREFIX, loadEngineSettings } from "../engine-settings"

const fromEnv = (env: Record<string, string>) => new EnvSource({ prefix: ENV_PREFIX, env })

describe("engine settings", () => {
  it("applies defaults", () => {
    const settings = defaultEngineSettings()

    expect(settings).toMatchObject({
      CACHE_EVICTION_POLICY: "lru",
      CACHE_ENABLE_EVENTS: true,
      CACHE_ENABLE_METRICS: true,
      CACHE_AUTO_CREATE: true,
      CACHE_FAIL_ON_MISSING: false,
      CACHE_ERROR_HANDLER: "log",
      RATE_LIMIT_ENABLE_EVENTS: true,
      RATE_LIMIT_ENABLE_METRICS: true,
      RATE_LIMIT_AUTO_CREATE: true,
      RATE_LIMIT_FAIL_ON_MISSING: false,
      RATE_LIMIT_TIMEZONE: "UTC",
      LOG_LEVEL: "info",
      LOG_PRETTY: false,
    })
    expect(settings.CACHE_TTL_SECONDS).toBeUndefined()
    expect(settings.CACHE_MAX_ENTRIES).toBeUndefined()
  })

  it("reads prefixed variables and coerces them", async () => {
    const settings = await loadEngineSettings([
      fromEnv({
        PALISADE_CACHE_TTL_SECONDS: "30",
        PALISADE_CACHE_MAX_ENTRIES: "500",
        PALISADE_CACHE_EVICTION_POLICY: " LFU ",
        PALISADE_CACHE_ENABLE_METRICS: "off",
        PALISADE_RATE_LIMIT_FAIL_ON_MISSING: "yes",
        PALISADE_RATE_LIMIT_TIMEZONE: "Europe/Berlin",
        PALISADE_LOG_LEVEL: "debug",
        CACHE_MAX_ENTRIES: "1",
      }),
    ])

    expect(settings.CACHE_TTL_SECONDS).toBe(30)
    expect(settings.CACHE_MAX_ENTRIES).toBe(500)
    expect(settings.CACHE_EVICTION_POLICY).toBe("lfu")
    expect(settings.CACHE_ENABLE_METRICS).toBe(false)
    expect(settings.RATE_LIMIT_FAIL_ON_MISSING).toBe(true)
    expect(settings.RATE_LIMIT_TIMEZONE).toBe("Europe/Berlin")
    expect(settings.LOG_LEVEL).toBe("debug")
  })

  it("lets later sources override, booleans included", async () => {
    const settings = await loadEngineSettings([
      fromEnv({ PALISADE_CACHE_AUTO_CREATE: "true" }),
      new ObjectSource({ CACHE_AUTO_CREATE: false }),
    ])

    expect(settings.CACHE_AUTO_CREATE).toBe(false)
  })

  it.each([
    ["PALISADE_CACHE_EVICTION_POLICY", "random"],
    ["PALISADE_CACHE_MAX_ENTRIES", "0"],
    ["PALISADE_CACHE_ERROR_HANDLER", "ignore"],
    ["PALISADE_RATE_LIMIT_TIMEZONE", "Mars/Olympus_Mons"],
    ["PALISADE_LOG_LEVEL", "verbose"],
    ["PALISADE_LOG_PRETTY", "maybe"],
  ])("rejects %s=%s", async (name, value) => {
    await expect(loadEngineSettings([fromEnv({ [name]: value })])).rejects.toBeInstanceOf(ConfigValidationError)
  })
})
