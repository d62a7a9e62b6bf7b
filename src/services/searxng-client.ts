import type { AppConfig } from "../config"
import {
  asRecord,
  readString,
  safeHostname,
  type SearchProviderClient,
  type SearchRequest,
  type SearchResponse,
  type SearchResult,
} from "./search-provider"

interface SearxngClientDependencies {
  fetchImpl?: (input: Request | URL | string, init?: RequestInit) => Promise<Response>
}

export class SearxngClient implements SearchProviderClient {
  readonly name = "searxng" as const

  private readonly fetchImpl: (
    input: Request | URL | string,
    init?: RequestInit,
  ) => Promise<Response>

  constructor(
    private readonly config: AppConfig,
    dependencies: SearxngClientDependencies = {},
  ) {
    this.fetchImpl = dependencies.fetchImpl ?? fetch
  }

  async search(request: SearchRequest): Promise<SearchResponse> {
    if (!this.config.searxng.baseUrl) {
      throw new Error("TRENDWRITER_SEARXNG_BASE_URL is not configured")
    }

    const query = new URLSearchParams({
      q: request.query,
      format: "json",
      categories: request.vertical === "news" ? "news" : "general",
    })

    query.set("safesearch", toSearxngSafesearch(request.safesearch ?? "moderate"))

    if (request.searchLang) {
      query.set("language", request.country ? `${request.searchLang}-${request.country}` : request.searchLang)
    }

    if (request.freshness) {
      const timeRange = toSearxngTimeRange(request.freshness)
      if (timeRange) {
        query.set("time_range", timeRange)
      }
    }

    const endpoint = `${this.config.searxng.baseUrl}/search?${query.toString()}`
    const response = await this.fetchImpl(endpoint, {
      method: "GET",
      headers: {
        Accept: "application/json",
      },
      signal: AbortSignal.timeout(this.config.searxng.timeoutMs),
    })

    if (!response.ok) {
      const bodyText = await response.text()
      throw new Error(`SearXNG API returned ${response.status}: ${bodyText.slice(0, 500)}`)
    }

    const json: unknown = await response.json()
    const maybeResults = asRecord(json).results
    const results = Array.isArray(maybeResults) ? maybeResults : []

    const normalized: SearchResult[] = []
    for (const unknownItem of results) {
      const item = asRecord(unknownItem)
      const url = readString(item, "url") ?? ""
      if (!url) {
        continue
      }

      normalized.push({
        url,
        title: readString(item, "title") ?? "Untitled",
        snippet: readString(item, "content") ?? readString(item, "description") ?? "",
        source: request.vertical === "news" ? (readString(item, "engine") ?? safeHostname(url)) : safeHostname(url),
        published: readString(item, "publishedDate") ?? undefined,
      })
    }

    return {
      raw: json,
      results: normalized.slice(0, request.count),
    }
  }
}

function toSearxngSafesearch(value: "off" | "moderate" | "strict"): string {
  if (value === "off") {
    return "0"
  }

  if (value === "strict") {
    return "2"
  }

  return "1"
}

function toSearxngTimeRange(value: string): string | null {
  const map: Record<string, string> = {
    pd: "day",
    pw: "week",
    pm: "month",
    py: "year",
  }

  return map[value.trim().toLowerCase()] ?? null
}
