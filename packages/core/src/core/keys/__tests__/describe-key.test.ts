import { describeKey } from "../describe-key"
import { SimpleKey } from "../simple-key"

describe("describeKey", () => {
  it("renders primitives as strings", () => {
    expect(describeKey("user-7")).toBe("user-7")
    expect(describeKey(42)).toBe("42")
    expect(describeKey(null)).toBe("null")
  })

  it("uses a custom toString when the key defines one", () => {
    expect(describeKey(new SimpleKey(["a", 1]))).toBe("SimpleKey(a, 1)")
  })

  it("renders dates as ISO strings", () => {
    expect(describeKey(new Date(0))).toBe("1970-01-01T00:00:00.000Z")
  })

  it("renders plain objects and arrays as JSON", () => {
    expect(describeKey({ tenant: "t1", id: 3 })).toBe('{"tenant":"t1","id":3}')
    expect(describeKey(["a", 1])).toBe('["a",1]')
  })

  it("falls back to String() when JSON fails", () => {
    const cyclic: Record<string, unknown> = {}
    cyclic.self = cyclic

    expect(describeKey(cyclic)).toBe("[object Object]")
  })
})
