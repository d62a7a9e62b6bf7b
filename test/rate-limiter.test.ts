import { describe, expect, test } from "vitest"
import { SlidingWindowRateLimiter } from "../src/services/rate-limiter"

describe("sliding window rate limiter", () => {
  test("allows up to the per-minute budget for each client", () => {
    let now = 0
    const limiter = new SlidingWindowRateLimiter({ requestsPerMinute: 2, now: () => now })

    expect(limiter.consume("1.1.1.1")).toEqual({ allowed: true, remaining: 1 })
    now = 10_000
    expect(limiter.consume("1.1.1.1")).toEqual({ allowed: true, remaining: 0 })
    now = 20_000
    expect(limiter.consume("1.1.1.1")).toEqual({ allowed: false, retryAfterSeconds: 40 })
    expect(limiter.consume("2.2.2.2")).toEqual({ allowed: true, remaining: 1 })
  })

  test("frees capacity once the oldest request leaves the window", () => {
    let now = 0
    const limiter = new SlidingWindowRateLimiter({ requestsPerMinute: 1, now: () => now })

    limiter.record("client")
    now = 59_999
    expect(limiter.isAllowed("client")).toBe(false)
    expect(limiter.resetSeconds("client")).toBe(1)

    now = 60_000
    expect(limiter.isAllowed("client")).toBe(true)
    expect(limiter.remaining("client")).toBe(1)
    expect(limiter.resetSeconds("client")).toBe(0)
  })

  test("rejected requests are not counted", () => {
    let now = 0
    const limiter = new SlidingWindowRateLimiter({ requestsPerMinute: 1, now: () => now })

    limiter.consume("client")
    now = 30_000
    limiter.consume("client")
    limiter.consume("client")

    now = 60_000
    expect(limiter.consume("client")).toEqual({ allowed: true, remaining: 0 })
  })

  test("forgets idle clients once their requests leave the window", () => {
    let now = 0
    const limiter = new SlidingWindowRateLimiter({ requestsPerMinute: 5, now: () => now })

    for (let i = 0; i < 1_000; i += 1) {
      limiter.consume(`10.0.${Math.floor(i / 256)}.${i % 256}`)
    }
    expect(limiter.trackedClients).toBe(1_000)

    now = 10 * 60_000
    expect(limiter.consume("192.0.2.1")).toEqual({ allowed: true, remaining: 4 })
    expect(limiter.trackedClients).toBe(1)
  })

  test("keeps clients that are still inside the window when sweeping", () => {
    let now = 0
    const limiter = new SlidingWindowRateLimiter({ requestsPerMinute: 1, now: () => now })

    limiter.consume("idle")
    now = 30_000
    limiter.consume("busy")
    now = 60_000
    limiter.consume("fresh")

    expect(limiter.trackedClients).toBe(2)
    expect(limiter.consume("busy")).toEqual({ allowed: false, retryAfterSeconds: 30 })
  })
})
