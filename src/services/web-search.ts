import type { Logger } from "pino"
import type { TimeLimit, UrlContent, WebSearchOptions } from "../types"
import type { SearchCache } from "./search-cache"
import { SearchDisabledError, type SearchBackend } from "./search-orchestrator"
import type { SearchRequest, SearchResult } from "./search-provider"

export type BranchOutcome =
  | { status: "ok"; results: SearchResult[] }
  | { status: "degraded"; error: string }

export type SearchEvidence =
  | { origin: "cache"; text: string }
  | { origin: "live"; text: string; web: BranchOutcome; news: BranchOutcome }

export interface RelatedSearch {
  content: UrlContent
  evidence: string
}

const WEB_SECTION_HEADER = "--- 일반 웹 검색 ---"
const NEWS_SECTION_HEADER = "--- 뉴스 기사 ---"

const FRESHNESS: Record<Exclude<TimeLimit, null>, string> = {
  d: "pd",
  w: "pw",
  m: "pm",
  y: "py",
}

interface WebSearchDependencies {
  backend: SearchBackend
  cache: SearchCache
  fetchContent: (url: string) => Promise<UrlContent>
  logger: Logger
}

/** Builds the web/news evidence block handed to the prompt builder. */
export class WebSearchService {
  constructor(private readonly deps: WebSearchDependencies) {}

  async searchWeb(keyword: string, options: WebSearchOptions = {}): Promise<string> {
    const evidence = await this.searchWebDetailed(keyword, options)
    return evidence.text
  }

  async searchWebDetailed(keyword: string, options: WebSearchOptions = {}): Promise<SearchEvidence> {
    const query = keyword.trim()
    const region = options.region ?? "kr-ko"
    const timelimit = options.timelimit === undefined ? "m" : options.timelimit

    if (!query) {
      return { origin: "live", text: "", web: { status: "ok", results: [] }, news: { status: "ok", results: [] } }
    }

    const cached = this.deps.cache.get(query, region, timelimit)
    if (cached !== undefined) {
      this.deps.logger.debug({ keyword: query, region }, "search cache hit")
      return { origin: "cache", text: cached }
    }

    const base = { query, ...regionFilters(region), freshness: timelimit ? FRESHNESS[timelimit] : undefined }
    const [web, news] = await Promise.all([
      this.runBranch({ ...base, vertical: "web", count: options.maxResults ?? 5 }),
      this.runBranch({ ...base, vertical: "news", count: options.maxNews ?? 5 }),
    ])

    const sections: string[] = []
    if (web.status === "ok" && web.results.length > 0) {
      sections.push(`${WEB_SECTION_HEADER}\n${web.results.map(formatWebEntry).join("\n\n")}`)
    }
    if (news.status === "ok" && news.results.length > 0) {
      sections.push(`${NEWS_SECTION_HEADER}\n${news.results.map(formatNewsEntry).join("\n\n")}`)
    }

    const text = sections.join("\n\n")
    if (text) {
      this.deps.cache.set(query, region, timelimit, text)
    }

    return { origin: "live", text, web, news }
  }

  /** Fetches `url`, derives search terms from it and gathers related evidence. */
  async searchRelatedToUrl(url: string, options: WebSearchOptions = {}): Promise<RelatedSearch> {
    const content = await this.deps.fetchContent(url)

    let keywords = extractKeywords(content)
    if (keywords.length === 0) {
      keywords = [content.title]
    }

    const query = keywords.slice(0, 3).join(" ")
    const evidence = query.trim() ? await this.searchWeb(query, options) : ""

    return { content, evidence }
  }

  private async runBranch(request: SearchRequest): Promise<BranchOutcome> {
    if (request.count <= 0) {
      return { status: "ok", results: [] }
    }

    try {
      const execution = await this.deps.backend.search(request)
      return { status: "ok", results: execution.results }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      if (error instanceof SearchDisabledError) {
        this.deps.logger.debug({ vertical: request.vertical }, "search disabled, skipping branch")
      } else {
        this.deps.logger.warn({ vertical: request.vertical, query: request.query, error: message }, "search branch failed")
      }
      return { status: "degraded", error: message }
    }
  }
}

const TITLE_TOKEN = /[가-힣a-zA-Z0-9]+/g

/**
 * Search terms for a fetched page: meta keywords first, then up to three
 * title tokens of two or more characters, de-duplicated case-insensitively.
 */
export function extractKeywords(content: Pick<UrlContent, "title" | "keywords">, max = 5): string[] {
  const candidates = [...content.keywords.slice(0, max)]

  if (content.title) {
    const titleWords = (content.title.match(TITLE_TOKEN) ?? []).filter((word) => word.length >= 2)
    candidates.push(...titleWords.slice(0, 3))
  }

  const seen = new Set<string>()
  const unique: string[] = []
  for (const candidate of candidates) {
    const key = candidate.toLowerCase()
    if (!seen.has(key)) {
      seen.add(key)
      unique.push(candidate)
    }
  }

  return unique.slice(0, max)
}

export function regionFilters(region: string): Pick<SearchRequest, "country" | "searchLang"> {
  const [country = "", language = ""] = region.trim().toLowerCase().split("-")
  return {
    country: country && country !== "wt" ? country.toUpperCase() : undefined,
    searchLang: language && language !== "wt" ? language : undefined,
  }
}

function formatWebEntry(result: SearchResult, index: number): string {
  const title = result.title.trim()
  const label = `[${index + 1}]`
  return withDetails(title ? `${label} ${title}` : label, result)
}

function formatNewsEntry(result: SearchResult, index: number): string {
  const extra = [result.source.trim(), (result.published ?? "").trim()].filter(Boolean).join(" ")
  const heading = `[뉴스 ${index + 1}] ${result.title.trim()}${extra ? ` (${extra})` : ""}`
  return withDetails(heading, result)
}

function withDetails(heading: string, result: SearchResult): string {
  const lines = [heading]
  const snippet = result.snippet.trim()
  const url = result.url.trim()
  if (snippet) {
    lines.push(`  요약: ${snippet}`)
  }
  if (url) {
    lines.push(`  URL: ${url}`)
  }
  return lines.join("\n")
}
