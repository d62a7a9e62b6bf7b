import { TtlCache } from "../lib/ttl-cache"
import type { TrendingKeywords } from "../types"

/** Trending keyword lists keyed by region and requested size. */
export class TrendsCache {
  private readonly cache: TtlCache<TrendingKeywords>

  constructor(ttlMs: number, now?: () => number) {
    this.cache = new TtlCache<TrendingKeywords>({ ttlMs, now })
  }

  get(region: string, limit: number): TrendingKeywords | undefined {
    return this.cache.get(`${region}:${limit}`)
  }

  set(region: string, limit: number, value: TrendingKeywords): void {
    this.cache.set(`${region}:${limit}`, value)
  }
}
