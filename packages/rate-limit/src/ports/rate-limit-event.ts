import type { ResourceKey } from "@palisade/core"

type RateLimitEventBase = Readonly<{
  limitName: string
  identifier: ResourceKey
  timestamp: Date
}>

export type RateLimitAllowedEvent = RateLimitEventBase & Readonly<{ type: "allowed" }>

export type RateLimitDeniedEvent = RateLimitEventBase & Readonly<{ type: "denied"; retryAt: Date }>

/** A window rolled over or was swept; `resetTime` is when it ended or restarts. */
export type RateLimitResetEvent = RateLimitEventBase & Readonly<{ type: "reset"; resetTime: Date }>

export type RateLimitClearEvent = RateLimitEventBase & Readonly<{ type: "clear"; count: number }>

export type RateLimitEvent =
  | RateLimitAllowedEvent
  | RateLimitDeniedEvent
  | RateLimitResetEvent
  | RateLimitClearEvent
