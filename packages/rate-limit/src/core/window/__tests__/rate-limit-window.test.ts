import { RateLimitWindow } from "../rate-limit-window"

describe("RateLimitWindow", () => {
  it("ends windowMs after it started", () => {
    const window = new RateLimitWindow(1_000, 5_000)

    expect(window.resetAtMs).toBe(6_000)
    expect(window.isExpired(5_999)).toBe(false)
    expect(window.isExpired(6_000)).toBe(true)
  })

  it("restarts from zero at the given time", () => {
    const window = new RateLimitWindow(1_000, 0)
    window.increment()
    window.increment()

    window.restart(7_000)

    expect(window.count).toBe(0)
    expect(window.startedAtMs).toBe(7_000)
    expect(window.resetAtMs).toBe(8_000)
  })

  it("never decrements below zero", () => {
    const window = new RateLimitWindow(1_000, 0)
    window.increment()

    window.decrement()
    window.decrement()

    expect(window.count).toBe(0)
  })
})
