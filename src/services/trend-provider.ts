import type { Logger } from "pino"
import type { TrendingKeywords } from "../types"
import type { TrendStrategy } from "./trend-sources"
import type { TrendsCache } from "./trends-cache"

export interface RegionInfo {
  name: string
  geo: string
}

export const DEFAULT_REGION = "south_korea"

export const REGIONS: Record<string, RegionInfo> = {
  south_korea: { name: "한국", geo: "KR" },
}

interface TrendProviderDependencies {
  cache: TrendsCache
  strategies: TrendStrategy[]
  logger: Logger
}

export class TrendProvider {
  constructor(private readonly deps: TrendProviderDependencies) {}

  listRegions(): Array<{ id: string; name: string }> {
    return Object.entries(REGIONS).map(([id, info]) => ({ id, name: info.name }))
  }

  /**
   * Walks the acquisition tiers in order and returns the first that yields
   * keywords. Unknown regions fall back to the default region's geo.
   */
  async getTrendingKeywords(region = DEFAULT_REGION, limit = 20): Promise<TrendingKeywords> {
    const cached = this.deps.cache.get(region, limit)
    if (cached) {
      this.deps.logger.debug({ region, limit }, "trends cache hit")
      return { ...copyTrends(cached), source: `${cached.source}(cached)` }
    }

    const info = REGIONS[region] ?? REGIONS[DEFAULT_REGION]
    const geo = info?.geo ?? "KR"

    for (const strategy of this.deps.strategies) {
      const outcome = await strategy.acquire({ region, geo, limit })
      if (outcome.status === "none") {
        this.deps.logger.debug({ region, strategy: strategy.name, reason: outcome.reason }, "trend tier yielded no data")
        continue
      }

      if (outcome.result.keywords.length > 0) {
        this.deps.cache.set(region, limit, copyTrends(outcome.result))
      }
      return outcome.result
    }

    return { keywords: [], source: "mixed", googleKeywords: [], recommendKeywords: [] }
  }
}

function copyTrends(trends: TrendingKeywords): TrendingKeywords {
  return {
    keywords: [...trends.keywords],
    source: trends.source,
    googleKeywords: [...trends.googleKeywords],
    recommendKeywords: [...trends.recommendKeywords],
  }
}
