import type { AppConfig } from "./config"
import type { Loggers } from "./logger"
import type { ArticleOrchestrator } from "./services/article-orchestrator"
import type { SlidingWindowRateLimiter } from "./services/rate-limiter"
import type { SearchBackend } from "./services/search-orchestrator"
import type { TrendProvider } from "./services/trend-provider"

export interface ServerContext {
  config: AppConfig
  loggers: Loggers
  searchBackend: SearchBackend
  trendProvider: Pick<TrendProvider, "getTrendingKeywords" | "listRegions">
  articleOrchestrator: Pick<
    ArticleOrchestrator,
    "generateFromKeyword" | "streamFromKeyword" | "generateFromUrl" | "streamFromUrl"
  >
  generateLimiter: SlidingWindowRateLimiter
  trendsLimiter: SlidingWindowRateLimiter
}
