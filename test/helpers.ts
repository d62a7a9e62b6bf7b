import { loadConfig, type AppConfig } from "../src/config"
import { createSilentLoggers } from "../src/logger"
import type { ServerContext } from "../src/server-context"
import { SlidingWindowRateLimiter } from "../src/services/rate-limiter"
import type { TrendProvider } from "../src/services/trend-provider"
import type { TrendingKeywords } from "../src/types"

export function testConfig(env: Record<string, string | undefined> = {}): AppConfig {
  return loadConfig({ TRENDWRITER_LOG_LEVEL: "silent", ...env })
}

export function jsonResponseOf(payload: unknown, status = 200): Response {
  return new Response(JSON.stringify(payload), {
    status,
    headers: { "content-type": "application/json" },
  })
}

export function htmlResponseOf(html: string, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(html, {
    status,
    headers: { "content-type": "text/html; charset=utf-8", ...headers },
  })
}

export async function collect(chunks: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = []
  for await (const chunk of chunks) {
    out.push(chunk)
  }
  return out
}

export class FakeTrendProvider implements Pick<TrendProvider, "getTrendingKeywords" | "listRegions"> {
  calls: Array<{ region?: string; limit?: number }> = []

  constructor(private readonly result: TrendingKeywords) {}

  listRegions() {
    return [{ id: "south_korea", name: "한국" }]
  }

  async getTrendingKeywords(region?: string, limit?: number): Promise<TrendingKeywords> {
    this.calls.push({ region, limit })
    return this.result
  }
}

type ArticleService = ServerContext["articleOrchestrator"]

/** Article service whose every entry point fails until a test overrides it. */
export function unusedArticleService(): ArticleService {
  const unexpected = async (): Promise<never> => {
    throw new Error("unexpected article request")
  }
  return {
    generateFromKeyword: unexpected,
    streamFromKeyword: unexpected,
    generateFromUrl: unexpected,
    streamFromUrl: unexpected,
  }
}

export function testContext(
  config: AppConfig = testConfig(),
  overrides: Partial<Omit<ServerContext, "config">> = {},
): ServerContext {
  return {
    config,
    loggers: createSilentLoggers(),
    searchBackend: {
      availableProviders: () => [],
      search: async () => {
        throw new Error("unexpected search")
      },
    },
    trendProvider: new FakeTrendProvider({ keywords: [], source: "mixed", googleKeywords: [], recommendKeywords: [] }),
    articleOrchestrator: unusedArticleService(),
    generateLimiter: new SlidingWindowRateLimiter({ requestsPerMinute: config.rateLimit.generatePerMinute }),
    trendsLimiter: new SlidingWindowRateLimiter({ requestsPerMinute: config.rateLimit.trendsPerMinute }),
    ...overrides,
  }
}
