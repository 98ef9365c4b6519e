import type { RateLimitResult } from "./rate-limit-result"

/** Every store accepted; `results` follow resolution order. */
export type RateLimitAllowed<R> = {
  kind: "allowed"
  value: R
  results: RateLimitResult[]
}

/** A gate skipped metering; the call ran anyway. */
export type RateLimitUnmetered<R> = {
  kind: "unmetered"
  value: R
}

/** A store denied and the operation asked not to throw. */
export type RateLimitDenied = {
  kind: "denied"
  result: RateLimitResult
}

export type RateLimitOutcome<R> = RateLimitAllowed<R> | RateLimitUnmetered<R> | RateLimitDenied
