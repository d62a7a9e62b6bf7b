import type { Logger } from "pino"
import Parser from "rss-parser"
import type { TrendSettings } from "../config"
import fallbackPool from "../data/fallback-keywords.json"
import type { TrendingKeywords } from "../types"
import { asRecord, readString } from "./search-provider"

export interface TrendQuery {
  region: string
  geo: string
  limit: number
}

export type TrendAcquisition =
  | { status: "data"; result: TrendingKeywords }
  | { status: "none"; reason: string }

/** One tier of trending-keyword acquisition. */
export interface TrendStrategy {
  readonly name: string
  acquire(query: TrendQuery): Promise<TrendAcquisition>
}

type FetchLike = (input: string | URL | Request, init?: RequestInit) => Promise<Response>

interface TrendStrategyDependencies {
  fetchImpl?: FetchLike
  logger: Logger
}

export const FALLBACK_KEYWORDS: readonly string[] = Object.values(fallbackPool).flat()

/**
 * Reads a Google Trends JSON export. Only used for South Korea and only when
 * the export tier is switched on.
 */
export class ExportTrendStrategy implements TrendStrategy {
  readonly name = "csv"
  private readonly fetchImpl: FetchLike

  constructor(
    private readonly settings: TrendSettings,
    private readonly deps: TrendStrategyDependencies,
  ) {
    this.fetchImpl = deps.fetchImpl ?? fetch
  }

  async acquire(query: TrendQuery): Promise<TrendAcquisition> {
    if (query.region !== "south_korea" || !this.settings.useCsvExport) {
      return { status: "none", reason: "export tier disabled" }
    }

    if (!this.settings.exportUrl) {
      return { status: "none", reason: "export URL not configured" }
    }

    try {
      const endpoint = new URL(this.settings.exportUrl)
      endpoint.searchParams.set("geo", query.geo)
      const response = await this.fetchImpl(endpoint, {
        headers: { Accept: "application/json" },
        signal: AbortSignal.timeout(this.settings.timeoutMs),
      })
      if (!response.ok) {
        throw new Error(`Trends export returned ${response.status}`)
      }

      const keywords = parseExportKeywords(await response.json(), query.limit)
      if (keywords.length === 0) {
        this.deps.logger.warn({ region: query.region }, "trends export contained no keywords")
        return { status: "none", reason: "empty export" }
      }

      this.deps.logger.info({ region: query.region, count: keywords.length }, "trends export loaded")
      return {
        status: "data",
        result: { keywords, source: "csv", googleKeywords: keywords, recommendKeywords: [] },
      }
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      this.deps.logger.warn({ region: query.region, error: reason }, "trends export failed")
      return { status: "none", reason }
    }
  }
}

/**
 * Reads the public trending RSS feed and pads the list from the built-in
 * keyword pool up to the requested size.
 */
export class FeedTrendStrategy implements TrendStrategy {
  readonly name = "rss"
  private readonly fetchImpl: FetchLike
  private readonly parser = new Parser()

  constructor(
    private readonly settings: TrendSettings,
    private readonly deps: TrendStrategyDependencies,
    private readonly pool: readonly string[] = FALLBACK_KEYWORDS,
  ) {
    this.fetchImpl = deps.fetchImpl ?? fetch
  }

  async acquire(query: TrendQuery): Promise<TrendAcquisition> {
    const rss = await this.readFeed(query)

    const seen = new Set(rss)
    const recommend: string[] = []
    for (const keyword of this.pool) {
      if (rss.length + recommend.length >= query.limit) {
        break
      }
      if (!seen.has(keyword)) {
        recommend.push(keyword)
        seen.add(keyword)
      }
    }

    const keywords = [...rss, ...recommend].slice(0, query.limit)
    if (keywords.length === 0) {
      return { status: "none", reason: "no feed items and empty pool" }
    }

    return {
      status: "data",
      result: {
        keywords,
        source: rss.length > 0 && recommend.length === 0 ? "rss" : "mixed",
        googleKeywords: rss,
        recommendKeywords: recommend,
      },
    }
  }

  private async readFeed(query: TrendQuery): Promise<string[]> {
    try {
      const endpoint = new URL(this.settings.rssUrl)
      endpoint.searchParams.set("geo", query.geo)
      const response = await this.fetchImpl(endpoint, {
        headers: { Accept: "application/rss+xml, application/xml;q=0.9, text/xml;q=0.8,*/*;q=0.5" },
        signal: AbortSignal.timeout(this.settings.timeoutMs),
      })
      if (!response.ok) {
        throw new Error(`Trends feed returned ${response.status}`)
      }

      const feed = await this.parser.parseString(await response.text())
      const titles: string[] = []
      for (const item of feed.items) {
        const title = item.title?.trim()
        if (title) {
          titles.push(title)
        }
      }
      return titles
    } catch (error) {
      this.deps.logger.warn(
        { region: query.region, error: error instanceof Error ? error.message : String(error) },
        "trends feed failed",
      )
      return []
    }
  }
}

/**
 * Keywords from an export payload: an array of rows, or `{ data }` / `{ rows }`.
 * Each row contributes its trend title, then related terms from its
 * comma-separated breakdown until `limit` is reached.
 */
export function parseExportKeywords(payload: unknown, limit: number): string[] {
  const rows = exportRows(payload)
  const seen = new Set<string>()
  const keywords: string[] = []

  for (const unknownRow of rows) {
    if (typeof unknownRow !== "object" || unknownRow === null || Array.isArray(unknownRow)) {
      continue
    }
    const row = asRecord(unknownRow)

    const title = (readString(row, "Trends") || readString(row, "trends") || readString(row, "title") || "").trim()
    if (title && !seen.has(title)) {
      seen.add(title)
      keywords.push(title)
      if (keywords.length >= limit) {
        break
      }
    }

    const breakdown = readString(row, "Trend breakdown") ?? ""
    for (const part of breakdown.split(",")) {
      if (keywords.length >= limit) {
        break
      }
      const term = part.trim()
      if (term && !seen.has(term) && term.length >= 2 && term.length <= 50) {
        seen.add(term)
        keywords.push(term)
      }
    }
  }

  return keywords.slice(0, limit)
}

function exportRows(payload: unknown): unknown[] {
  if (Array.isArray(payload)) {
    return payload
  }

  const record = asRecord(payload)
  const rows = record.data ?? record.rows
  return Array.isArray(rows) ? rows : []
}
