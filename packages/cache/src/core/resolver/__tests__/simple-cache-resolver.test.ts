import { createInvocation, NotFoundError } from "@palisade/core"
import { NullLogger } from "@palisade/logger"
import type { CacheResolver } from "../../../ports/cache-resolver"
import { createTestCache } from "../../../tests/utils/cache-fixtures"
import { SimpleCacheManager } from "../../manager/simple-cache-manager"
import { SimpleCacheResolver } from "../simple-cache-resolver"

const logger = new NullLogger()
const invocation = createInvocation({ method: "findUser", call: () => null })

describe("SimpleCacheResolver", () => {
  const users = createTestCache({ name: "users" }).cache
  const orders = createTestCache({ name: "orders" }).cache
  const manager = new SimpleCacheManager({ logger, caches: [users, orders] }, { autoCreate: false })

  it("resolves cache names through the manager in order", async () => {
    const resolver = new SimpleCacheResolver({ manager, logger })

    const caches = await resolver.resolveCaches(
      { kind: "invalidate", cacheNames: ["orders", "users"] },
      invocation,
    )

    expect(caches).toStrictEqual([orders, users])
  })

  it("skips names the manager does not know", async () => {
    const resolver = new SimpleCacheResolver({ manager, logger })

    const caches = await resolver.resolveCaches({ kind: "invalidate", cacheNames: ["missing", "users"] }, invocation)

    expect(caches).toStrictEqual([users])
  })

  it("puts delegate results first and drops duplicates", async () => {
    const delegate: CacheResolver = { resolveCaches: vi.fn().mockResolvedValue([users]) }
    const resolver = new SimpleCacheResolver({ manager, logger, delegates: [delegate] })

    const caches = await resolver.resolveCaches(
      { kind: "invalidate", cacheNames: ["orders", "users"] },
      invocation,
    )

    expect(caches).toStrictEqual([users, orders])
  })

  it("skips a failing delegate", async () => {
    const delegate: CacheResolver = { resolveCaches: vi.fn().mockRejectedValue(new Error("down")) }
    const resolver = new SimpleCacheResolver({ manager, logger, delegates: [delegate] })

    const caches = await resolver.resolveCaches({ kind: "invalidate", cacheNames: ["users"] }, invocation)

    expect(caches).toStrictEqual([users])
  })

  it("propagates NotFoundError from a strict manager", async () => {
    const strict = new SimpleCacheManager({ logger }, { autoCreate: false, failIfNotFound: true })
    const resolver = new SimpleCacheResolver({ manager: strict, logger })

    await expect(
      resolver.resolveCaches({ kind: "invalidate", cacheNames: ["users"] }, invocation),
    ).rejects.toBeInstanceOf(NotFoundError)
  })
})
