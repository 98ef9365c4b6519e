import { createInvocation, type MethodIdentity } from "@palisade/core"
import type { Engine } from "../../ports/engine"
import type { GuardOptions, GuardPolicy } from "../../ports/guard-policy"

export type GuardedFunction<A extends unknown[], R> = (...args: A) => Promise<R | undefined>

/**
 * Wraps `fn` so every call goes through the engine's pipelines.
 *
 * Rate limiting runs first; a call it admits then goes through the cache
 * pipeline, so cache hits still consume quota. A denial under
 * `throwOnExceeded: false` resolves to `undefined`.
 *
 * @example
 * ```ts
 * const findUser = guard(
 *   engine,
 *   {
 *     rateLimit: { storageNames: ["per-user"], limit: 100, windowMs: 60_000 },
 *     cache: { readThrough: { kind: "read-through", cacheNames: ["users"], accepts: acceptsSchema(userSchema) } },
 *   },
 *   (id: string) => repo.findUser(id),
 * )
 * ```
 */
export function guard<A extends unknown[], R>(
  engine: Engine,
  policy: GuardPolicy<R>,
  fn: (...args: A) => R | Promise<R>,
  opts: GuardOptions = {},
): GuardedFunction<A, R> {
  const method: MethodIdentity = { name: opts.name ?? (fn.name || "anonymous") }
  const { target } = opts

  return async (...args: A) => {
    const call = () => fn.apply(target, args)
    const { cache, rateLimit } = policy

    const cached = (): Promise<R> =>
      cache
        ? engine.cachePipeline.execute(cache, createInvocation({ target, method, positional: args, call }))
        : Promise.resolve().then(call)

    if (!rateLimit) return cached()

    const outcome = await engine.rateLimitPipeline.execute(
      rateLimit,
      createInvocation({ target, method, positional: args, call: cached }),
    )

    return outcome.kind === "denied" ? undefined : outcome.value
  }
}
