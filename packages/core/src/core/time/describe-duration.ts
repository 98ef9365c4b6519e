import type { Milliseconds } from "../../ports/clock"

const units = [
  { ms: 86_400_000, name: "day" },
  { ms: 3_600_000, name: "hour" },
  { ms: 60_000, name: "minute" },
  { ms: 1_000, name: "second" },
] as const

/**
 * Human-readable duration using the largest unit that divides it exactly.
 *
 * @example
 * describeDuration(60_000) // "1 minute"
 * describeDuration(90_000) // "90 seconds"
 * describeDuration(250)    // "250 milliseconds"
 */
export function describeDuration(ms: Milliseconds): string {
  const whole = Math.max(0, Math.round(ms))
  const unit = units.find((u) => whole >= u.ms && whole % u.ms === 0)
  const [count, name] = unit ? [whole / unit.ms, unit.name] : [whole, "millisecond"]

  return `${count} ${name}${count === 1 ? "" : "s"}`
}
