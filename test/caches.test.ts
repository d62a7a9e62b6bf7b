import { describe, expect, test } from "vitest"
import { TtlCache } from "../src/lib/ttl-cache"
import { SearchCache } from "../src/services/search-cache"
import { TrendsCache } from "../src/services/trends-cache"

const MINUTE = 60_000

describe("ttl cache", () => {
  test("entries go inert once older than the ttl", () => {
    let now = 0
    const cache = new TtlCache<string>({ ttlMs: 10 * MINUTE, now: () => now })

    cache.set("a", "value")
    now = 10 * MINUTE
    expect(cache.get("a")).toBe("value")

    now = 10 * MINUTE + 1
    expect(cache.get("a")).toBeUndefined()
    expect(cache.size).toBe(0)
  })

  test("evicts the single oldest entry when full", () => {
    let now = 0
    const cache = new TtlCache<number>({ ttlMs: MINUTE, maxSize: 2, now: () => now })

    cache.set("first", 1)
    now = 1
    cache.set("second", 2)
    now = 2
    cache.set("third", 3)

    expect(cache.size).toBe(2)
    expect(cache.get("first")).toBeUndefined()
    expect(cache.get("second")).toBe(2)
    expect(cache.get("third")).toBe(3)
  })

  test("overwriting an existing key does not evict", () => {
    const cache = new TtlCache<number>({ ttlMs: MINUTE, maxSize: 2 })

    cache.set("a", 1)
    cache.set("b", 2)
    cache.set("a", 3)

    expect(cache.size).toBe(2)
    expect(cache.get("a")).toBe(3)
    expect(cache.get("b")).toBe(2)
  })

  test("sweeps expired entries lazily at most once per interval", () => {
    let now = 0
    const cache = new TtlCache<string>({ ttlMs: MINUTE, sweepIntervalMs: 5 * MINUTE, now: () => now })

    cache.set("stale", "x")
    now = 2 * MINUTE
    cache.set("fresh", "y")
    expect(cache.size).toBe(2)

    now = 5 * MINUTE
    cache.get("missing")
    expect(cache.size).toBe(0)
  })
})

describe("search cache", () => {
  test("keys by keyword, region and time limit", () => {
    const cache = new SearchCache({ searchTtlMs: 30 * MINUTE, searchMaxSize: 100, searchSweepIntervalMs: 5 * MINUTE })

    cache.set("캠핑", "kr-ko", "m", "evidence")

    expect(cache.get("캠핑", "kr-ko", "m")).toBe("evidence")
    expect(cache.get("캠핑", "wt-wt", "m")).toBeUndefined()
    expect(cache.get("캠핑", "kr-ko", null)).toBeUndefined()
  })

  test("never grows past its capacity", () => {
    const cache = new SearchCache({ searchTtlMs: 30 * MINUTE, searchMaxSize: 3, searchSweepIntervalMs: 5 * MINUTE })

    for (const keyword of ["a", "b", "c", "d", "e"]) {
      cache.set(keyword, "kr-ko", "m", keyword)
    }

    expect(cache.size).toBe(3)
    expect(cache.get("a", "kr-ko", "m")).toBeUndefined()
    expect(cache.get("e", "kr-ko", "m")).toBe("e")
  })
})

describe("trends cache", () => {
  test("round-trips a keyword set until it expires", () => {
    let now = 0
    const cache = new TrendsCache(10 * MINUTE, () => now)
    const value = { keywords: ["a"], source: "rss", googleKeywords: ["a"], recommendKeywords: [] }

    cache.set("south_korea", 20, value)

    expect(cache.get("south_korea", 20)).toEqual(value)
    expect(cache.get("south_korea", 10)).toBeUndefined()

    now = 10 * MINUTE + 1
    expect(cache.get("south_korea", 20)).toBeUndefined()
  })
})
