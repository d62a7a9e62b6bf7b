import type { AppConfig } from "../config"
import { RateLimiterQueue } from "./rate-limiter"
import {
  asRecord,
  readString,
  safeHostname,
  type SearchProviderClient,
  type SearchRequest,
  type SearchResponse,
  type SearchResult,
} from "./search-provider"

interface BraveClientDependencies {
  fetchImpl?: (input: Request | URL | string, init?: RequestInit) => Promise<Response>
  limiter?: RateLimiterQueue
  sleep?: (ms: number) => Promise<void>
  now?: () => number
}

export class BraveClient implements SearchProviderClient {
  readonly name = "brave" as const

  private readonly limiter: RateLimiterQueue
  private readonly fetchImpl: (input: Request | URL | string, init?: RequestInit) => Promise<Response>

  constructor(
    private readonly config: AppConfig,
    dependencies: BraveClientDependencies = {},
  ) {
    this.fetchImpl = dependencies.fetchImpl ?? fetch
    this.limiter =
      dependencies.limiter ??
      new RateLimiterQueue({
        requestsPerSecond: config.braveRateLimit.requestsPerSecond,
        maxQueued: config.braveRateLimit.queueMax,
        now: dependencies.now,
        sleep: dependencies.sleep,
      })
  }

  async search(request: SearchRequest): Promise<SearchResponse> {
    if (!this.config.braveApiKey) {
      throw new Error("TRENDWRITER_BRAVE_API_KEY is not configured")
    }

    const query = new URLSearchParams({
      q: request.query,
      count: String(request.count),
      safesearch: request.safesearch ?? "moderate",
    })

    if (request.country) {
      query.set("country", request.country)
    }

    if (request.searchLang) {
      query.set("search_lang", request.searchLang)
    }

    if (request.freshness) {
      query.set("freshness", request.freshness)
    }

    const path = request.vertical === "news" ? "news/search" : "web/search"
    const endpoint = `${this.config.braveApiBaseUrl}/${path}?${query.toString()}`
    const response = await this.limiter.schedule(() =>
      this.fetchImpl(endpoint, {
        method: "GET",
        headers: {
          Accept: "application/json",
          "X-Subscription-Token": this.config.braveApiKey,
        },
      }),
    )

    if (!response.ok) {
      const bodyText = await response.text()
      throw new Error(`Brave API returned ${response.status}: ${bodyText.slice(0, 500)}`)
    }

    const json: unknown = await response.json()
    const body = asRecord(json)
    // web hits live under `web.results`, news hits at the top-level `results`
    const maybeResults = request.vertical === "news" ? body.results : asRecord(body.web).results
    const results = Array.isArray(maybeResults) ? maybeResults : []

    const normalized: SearchResult[] = []
    for (const unknownItem of results) {
      const item = asRecord(unknownItem)
      const url = readString(item, "url") ?? ""
      if (!url) {
        continue
      }

      const metaUrl = asRecord(item.meta_url)
      normalized.push({
        url,
        title: readString(item, "title") ?? "Untitled",
        snippet: readString(item, "description") ?? "",
        source: readString(metaUrl, "hostname") ?? safeHostname(url),
        published: readString(item, "age") ?? readString(item, "page_age"),
      })
    }

    return {
      raw: json,
      results: normalized.slice(0, request.count),
    }
  }
}
