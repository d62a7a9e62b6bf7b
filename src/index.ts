import "dotenv/config"
import { serve } from "@hono/node-server"
import { createRequestHandler } from "./app"
import { loadConfig } from "./config"
import { createLoggers } from "./logger"
import type { ServerContext } from "./server-context"
import { ArticleOrchestrator } from "./services/article-orchestrator"
import { BraveClient } from "./services/brave-client"
import { ContentFetcher } from "./services/content-fetcher"
import { GenerationClient } from "./services/generation-client"
import { SlidingWindowRateLimiter } from "./services/rate-limiter"
import { SearchCache } from "./services/search-cache"
import { SearchOrchestrator } from "./services/search-orchestrator"
import { SearxngClient } from "./services/searxng-client"
import { ExportTrendStrategy, FeedTrendStrategy } from "./services/trend-sources"
import { TrendProvider } from "./services/trend-provider"
import { TrendsCache } from "./services/trends-cache"
import { WebSearchService } from "./services/web-search"

const config = loadConfig()
const loggers = createLoggers(config)

const searchOrchestrator = new SearchOrchestrator(config.search, {
  braveClient: config.braveApiKey ? new BraveClient(config) : undefined,
  searxngClient: config.searxng.baseUrl ? new SearxngClient(config) : undefined,
  logger: loggers.app,
})
const contentFetcher = new ContentFetcher(config)
const fetchContent = (url: string) => contentFetcher.fetch(url)

const webSearch = new WebSearchService({
  backend: searchOrchestrator,
  cache: new SearchCache(config.cache),
  fetchContent,
  logger: loggers.app,
})

const trendProvider = new TrendProvider({
  cache: new TrendsCache(config.cache.trendsTtlMs),
  strategies: [
    new ExportTrendStrategy(config.trends, { logger: loggers.app }),
    new FeedTrendStrategy(config.trends, { logger: loggers.app }),
  ],
  logger: loggers.app,
})

const articleOrchestrator = new ArticleOrchestrator({
  generator: new GenerationClient(config.llm, loggers.app),
  webSearch,
  fetchContent,
  defaultApiKey: config.llm.apiKey,
  loggers,
})

const ctx: ServerContext = {
  config,
  loggers,
  searchBackend: searchOrchestrator,
  trendProvider,
  articleOrchestrator,
  generateLimiter: new SlidingWindowRateLimiter({ requestsPerMinute: config.rateLimit.generatePerMinute }),
  trendsLimiter: new SlidingWindowRateLimiter({ requestsPerMinute: config.rateLimit.trendsPerMinute }),
}

const handle = createRequestHandler(ctx)

serve(
  {
    hostname: config.host,
    port: config.port,
    fetch: (request, env) => handle(request, env.incoming.socket.remoteAddress),
  },
  (info) => {
    loggers.app.info(
      {
        host: info.address,
        port: info.port,
        llmProvider: config.llm.provider,
        llmModel: config.llm.model,
        searchStrategy: config.search.strategy,
        searchProviders: searchOrchestrator.availableProviders(),
        trendsExport: config.trends.useCsvExport,
      },
      "trendwriter started",
    )
  },
)
