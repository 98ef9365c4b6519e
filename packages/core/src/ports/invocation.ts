export type MethodIdentity = Readonly<{
  name: string

  /** Class or module the method belongs to, when the host knows it. */
  owner?: string
}>

export type InvocationArguments = Readonly<{
  positional: readonly unknown[]
  named: Readonly<Record<string, unknown>>
}>

/**
 * A guarded call, as handed over by the host's interception layer.
 *
 * @remarks
 * Pipelines never reflect on the target; they only read the method
 * identity and arguments (for key generation and conditions) and decide
 * whether to call `proceed()`.
 */
export interface Invocation<R = unknown> {
  readonly target: object
  readonly method: MethodIdentity
  readonly args: InvocationArguments

  /** Runs the protected call. Repeated calls return the same settled promise. */
  proceed(): Promise<R>
}
