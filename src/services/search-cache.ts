import type { CacheSettings } from "../config"
import { TtlCache } from "../lib/ttl-cache"
import type { TimeLimit } from "../types"

export class SearchCache {
  private readonly cache: TtlCache<string>

  constructor(settings: Pick<CacheSettings, "searchTtlMs" | "searchMaxSize" | "searchSweepIntervalMs">, now?: () => number) {
    this.cache = new TtlCache<string>({
      ttlMs: settings.searchTtlMs,
      maxSize: settings.searchMaxSize,
      sweepIntervalMs: settings.searchSweepIntervalMs,
      now,
    })
  }

  get size(): number {
    return this.cache.size
  }

  get(keyword: string, region: string, timelimit: TimeLimit): string | undefined {
    return this.cache.get(cacheKey(keyword, region, timelimit))
  }

  set(keyword: string, region: string, timelimit: TimeLimit, text: string): void {
    this.cache.set(cacheKey(keyword, region, timelimit), text)
  }
}

function cacheKey(keyword: string, region: string, timelimit: TimeLimit): string {
  return `${keyword}:${region}:${timelimit ?? "none"}`
}
