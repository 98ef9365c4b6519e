import type { Invocation, MethodIdentity } from "../../ports/invocation"

export type CreateInvocationOptions<R> = {
  method: MethodIdentity | string
  call: () => R | Promise<R>
  target?: object
  positional?: readonly unknown[]
  named?: Readonly<Record<string, unknown>>
}

const detachedTarget: object = Object.freeze({})

/**
 * Builds an {@link Invocation} around a plain function call.
 *
 * @example
 * ```ts
 * const invocation = createInvocation({
 *   target: repo,
 *   method: { name: "findUser", owner: "UserRepository" },
 *   positional: [id],
 *   call: () => repo.findUser(id),
 * })
 * ```
 */
export function createInvocation<R>(opts: CreateInvocationOptions<R>): Invocation<R> {
  const method = typeof opts.method === "string" ? { name: opts.method } : opts.method
  let settled: Promise<R> | undefined

  return {
    target: opts.target ?? detachedTarget,
    method: Object.freeze({ ...method }),
    args: Object.freeze({
      positional: Object.freeze([...(opts.positional ?? [])]),
      named: Object.freeze({ ...opts.named }),
    }),
    proceed(): Promise<R> {
      settled ??= Promise.resolve().then(opts.call)

      return settled
    },
  }
}
