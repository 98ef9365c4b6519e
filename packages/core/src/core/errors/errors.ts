import { ResourceError } from "./resource-error"

/**
 * A named backend, resolver, manager or key generator does not exist and
 * nothing was allowed to create it.
 */
export class NotFoundError extends ResourceError<"not_found"> {
  constructor(
    readonly kind: string,
    readonly resourceName: string,
  ) {
    super(`No ${kind} named "${resourceName}" is available`, {
      code: "not_found",
      context: { kind, name: resourceName },
    })
  }
}

export type BackendOperationErrorDetails = Readonly<{
  backend: string
  operation: string
  key?: string
  cause: unknown
}>

/**
 * A single get/put/evict/clear/consume call failed inside one backend.
 */
export class BackendOperationError extends ResourceError<"backend_operation_failed"> {
  readonly backend: string
  readonly operation: string

  constructor(details: BackendOperationErrorDetails) {
    const target = details.key === undefined ? "" : ` for key ${details.key}`
    const reason = details.cause instanceof Error ? `: ${details.cause.message}` : ""

    super(`${details.operation} on "${details.backend}"${target} failed${reason}`, {
      code: "backend_operation_failed",
      context: {
        backend: details.backend,
        operation: details.operation,
        ...(details.key !== undefined && { key: details.key }),
      },
      cause: details.cause,
      isRetryable: true,
    })

    this.backend = details.backend
    this.operation = details.operation
  }
}

/**
 * Internal state was used in a way the engine never allows.
 */
export class InvariantError extends ResourceError<"invariant_violation"> {
  constructor(message: string, context?: Readonly<Record<string, unknown>>) {
    super(message, {
      code: "invariant_violation",
      isOperational: false,
      ...(context && { context }),
    })
  }
}
