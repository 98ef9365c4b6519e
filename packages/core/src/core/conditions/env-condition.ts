import type { ResourceCondition } from "../../ports/condition"

export type EnvValueMatch =
  | "equals"
  | "not-equals"
  | "equals-ignore-case"
  | "not-equals-ignore-case"
  | "regex"

export type EnvPresenceMatch = "exists" | "not-exists"

export type EnvMatch = EnvValueMatch | EnvPresenceMatch

export type WhenEnvOptions =
  | Readonly<{ match: EnvPresenceMatch }>
  | Readonly<{ match?: EnvValueMatch; value: string }>

type Matcher = (current: string | undefined, present: boolean) => boolean

function createMatcher(opts: WhenEnvOptions): Matcher {
  if (!("value" in opts)) {
    return opts.match === "exists" ? (_, present) => present : (_, present) => !present
  }

  const { value } = opts

  switch (opts.match ?? "equals") {
    case "equals":
      return (current) => current !== undefined && current === value
    case "not-equals":
      return (current) => current !== undefined && current !== value
    case "equals-ignore-case":
      return (current) => current !== undefined && current.toLowerCase() === value.toLowerCase()
    case "not-equals-ignore-case":
      return (current) => current !== undefined && current.toLowerCase() !== value.toLowerCase()
    case "regex": {
      const pattern = new RegExp(value)

      return (current) => current !== undefined && pattern.test(current)
    }
  }
}

/**
 * Gates on an environment property.
 *
 * @remarks
 * Value matches are false when the property is absent, including
 * `not-equals`. Matching is case-sensitive except for the `-ignore-case`
 * variants.
 *
 * @example
 * ```ts
 * whenEnv("FEATURE_USER_CACHE", { value: "on" })
 * whenEnv("RATE_LIMIT_BYPASS", { match: "not-exists" })
 * whenEnv("REGION", { match: "regex", value: "^eu-" })
 * ```
 */
export function whenEnv(property: string, opts: WhenEnvOptions): ResourceCondition {
  const matches = createMatcher(opts)

  return {
    shouldApply({ environment }) {
      return matches(environment.getProperty(property), environment.containsProperty(property))
    },
  }
}
