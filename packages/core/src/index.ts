export { ManualClock } from "./adapters/clock/manual-clock"
export { SystemClock } from "./adapters/clock/system-clock"
export { always, and, never, nor, not, or, shouldSkip, when } from "./core/conditions/conditions"
export {
  type EnvMatch,
  type EnvPresenceMatch,
  type EnvValueMatch,
  type WhenEnvOptions,
  whenEnv,
} from "./core/conditions/env-condition"
export {
  InvocationContext,
  type InvocationContextDeps,
} from "./core/context/invocation-context"
export {
  BackendOperationError,
  type BackendOperationErrorDetails,
  InvariantError,
  NotFoundError,
} from "./core/errors/errors"
export { FirstFailure } from "./core/errors/first-failure"
export {
  type ErrorCode,
  type ErrorContext,
  ResourceError,
  type ResourceErrorOptions,
  type SerializeOptions,
  type SerializedError,
  isResourceError,
  serializeError,
} from "./core/errors/resource-error"
export {
  type CreateInvocationOptions,
  createInvocation,
} from "./core/invocation/create-invocation"
export { CompositeKeyGenerator } from "./core/keys/composite-key-generator"
export { describeKey } from "./core/keys/describe-key"
export {
  type Fingerprintable,
  isFingerprintable,
  keyFingerprint,
  keysEqual,
} from "./core/keys/key-fingerprint"
export { SimpleKey } from "./core/keys/simple-key"
export { SimpleKeyGenerator } from "./core/keys/simple-key-generator"
export { publishSafely } from "./core/notify/publish-safely"
export { type Prioritized, sortByPriority } from "./core/ordering/sort-by-priority"
export { MapRegistry } from "./core/registry/map-registry"
export { describeDuration } from "./core/time/describe-duration"
export type { Clock, Milliseconds } from "./ports/clock"
export type { ConditionGate, ResourceCondition } from "./ports/condition"
export type { Invocation, InvocationArguments, MethodIdentity } from "./ports/invocation"
export {
  type ConditionalKeyGenerator,
  type KeyGenerator,
  type ResourceKey,
  isConditionalKeyGenerator,
} from "./ports/key-generator"
export type { NotificationSink } from "./ports/notification-sink"
export type { OperationContext } from "./ports/operation-context"
export type { Registry } from "./ports/registry"
export type { Resource, ResourceKind } from "./ports/resource"
