import { EnvSource } from "../env-source"

describe("EnvSource behavior", () => {
  it("returns all variables when no prefix is set", async () => {
    const source = new EnvSource({ env: { LOG_LEVEL: "warn", CACHE_TTL_SECONDS: "60" } })

    await expect(source.load()).resolves.toEqual({
      LOG_LEVEL: "warn",
      CACHE_TTL_SECONDS: "60",
    })
  })

  it("filters and strips the prefix", async () => {
    const source = new EnvSource({
      prefix: "PALISADE_",
      env: {
        PALISADE_CACHE_MAX_ENTRIES: "100",
        PALISADE_RATE_LIMIT_AUTO_CREATE: "false",
        PATH: "/usr/bin",
      },
    })

    await expect(source.load()).resolves.toEqual({
      CACHE_MAX_ENTRIES: "100",
      RATE_LIMIT_AUTO_CREATE: "false",
    })
  })

  it("reads process.env when no env is injected", async () => {
    vi.stubEnv("PALISADE_ENV_SOURCE_PROBE", "present")

    try {
      const result = await new EnvSource({ prefix: "PALISADE_ENV_SOURCE_" }).load()

      expect(result).toEqual({ PROBE: "present" })
    } finally {
      vi.unstubAllEnvs()
    }
  })
})
