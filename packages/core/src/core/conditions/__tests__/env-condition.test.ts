import { makeContext } from "../../../tests/utils/make-context"
import { whenEnv } from "../env-condition"

const context = makeContext({
  properties: { REGION: "eu-west-1", MODE: "Strict", EMPTY: "" },
})

async function evaluate(condition: ReturnType<typeof whenEnv>): Promise<boolean> {
  return condition.shouldApply(context)
}

describe("whenEnv", () => {
  it("equals is the default and is case-sensitive", async () => {
    expect(await evaluate(whenEnv("MODE", { value: "Strict" }))).toBe(true)
    expect(await evaluate(whenEnv("MODE", { value: "strict" }))).toBe(false)
  })

  it("equals-ignore-case ignores case", async () => {
    expect(await evaluate(whenEnv("MODE", { match: "equals-ignore-case", value: "STRICT" }))).toBe(true)
  })

  it("not-equals requires the property to be present", async () => {
    expect(await evaluate(whenEnv("MODE", { match: "not-equals", value: "lenient" }))).toBe(true)
    expect(await evaluate(whenEnv("MODE", { match: "not-equals", value: "Strict" }))).toBe(false)
    expect(await evaluate(whenEnv("MISSING", { match: "not-equals", value: "x" }))).toBe(false)
  })

  it("not-equals-ignore-case compares without case", async () => {
    expect(await evaluate(whenEnv("MODE", { match: "not-equals-ignore-case", value: "STRICT" }))).toBe(
      false,
    )
    expect(await evaluate(whenEnv("MODE", { match: "not-equals-ignore-case", value: "open" }))).toBe(
      true,
    )
  })

  it("exists and not-exists check presence, an empty value counts as present", async () => {
    expect(await evaluate(whenEnv("EMPTY", { match: "exists" }))).toBe(true)
    expect(await evaluate(whenEnv("MISSING", { match: "exists" }))).toBe(false)
    expect(await evaluate(whenEnv("MISSING", { match: "not-exists" }))).toBe(true)
    expect(await evaluate(whenEnv("REGION", { match: "not-exists" }))).toBe(false)
  })

  it("regex matches against the current value", async () => {
    expect(await evaluate(whenEnv("REGION", { match: "regex", value: "^eu-" }))).toBe(true)
    expect(await evaluate(whenEnv("REGION", { match: "regex", value: "^us-" }))).toBe(false)
    expect(await evaluate(whenEnv("MISSING", { match: "regex", value: ".*" }))).toBe(false)
  })
})
