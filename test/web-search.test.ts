import { describe, expect, test } from "vitest"
import { createSilentLoggers } from "../src/logger"
import { SearchCache } from "../src/services/search-cache"
import { SearchDisabledError, type SearchBackend } from "../src/services/search-orchestrator"
import type { SearchRequest, SearchResult } from "../src/services/search-provider"
import { extractKeywords, regionFilters, WebSearchService } from "../src/services/web-search"
import type { UrlContent } from "../src/types"

const WEB_HIT: SearchResult = {
  url: "https://blog.example/camping",
  title: "캠핑 가이드",
  snippet: "텐트 고르는 법",
  source: "blog.example",
}

const NEWS_HIT: SearchResult = {
  url: "https://news.example/1",
  title: "캠핑 인구 증가",
  snippet: "올해 캠핑장 예약이 늘었다",
  source: "news.example",
  published: "2026-10-01",
}

class FakeBackend implements SearchBackend {
  calls: SearchRequest[] = []

  constructor(private readonly handler: (request: SearchRequest) => SearchResult[]) {}

  availableProviders() {
    return ["searxng" as const]
  }

  async search(request: SearchRequest) {
    this.calls.push(request)
    return { provider: "searxng" as const, fallbackUsed: false, raw: {}, results: this.handler(request) }
  }
}

function buildService(backend: SearchBackend, fetchContent?: (url: string) => Promise<UrlContent>) {
  const cache = new SearchCache({ searchTtlMs: 30 * 60_000, searchMaxSize: 100, searchSweepIntervalMs: 5 * 60_000 })
  const service = new WebSearchService({
    backend,
    cache,
    fetchContent: fetchContent ?? (async () => Promise.reject(new Error("no fetch expected"))),
    logger: createSilentLoggers().app,
  })
  return { service, cache }
}

describe("web search evidence", () => {
  test("formats web and news sections", async () => {
    const backend = new FakeBackend((request) => (request.vertical === "web" ? [WEB_HIT] : [NEWS_HIT]))
    const { service } = buildService(backend)

    const text = await service.searchWeb("  캠핑  ")

    expect(text).toBe(
      [
        "--- 일반 웹 검색 ---",
        "[1] 캠핑 가이드",
        "  요약: 텐트 고르는 법",
        "  URL: https://blog.example/camping",
        "",
        "--- 뉴스 기사 ---",
        "[뉴스 1] 캠핑 인구 증가 (news.example 2026-10-01)",
        "  요약: 올해 캠핑장 예약이 늘었다",
        "  URL: https://news.example/1",
      ].join("\n"),
    )
    expect(backend.calls.map((call) => [call.query, call.vertical, call.country, call.searchLang, call.freshness])).toEqual([
      ["캠핑", "web", "KR", "ko", "pm"],
      ["캠핑", "news", "KR", "ko", "pm"],
    ])
  })

  test("separates entries with a blank line and omits empty parts", async () => {
    const bare: SearchResult = { url: "", title: "제목만", snippet: "", source: "" }
    const backend = new FakeBackend((request) => (request.vertical === "web" ? [WEB_HIT, bare] : [bare]))
    const { service } = buildService(backend)

    const text = await service.searchWeb("캠핑")

    expect(text).toBe(
      [
        "--- 일반 웹 검색 ---",
        "[1] 캠핑 가이드",
        "  요약: 텐트 고르는 법",
        "  URL: https://blog.example/camping",
        "",
        "[2] 제목만",
        "",
        "--- 뉴스 기사 ---",
        "[뉴스 1] 제목만",
      ].join("\n"),
    )
  })

  test("returns empty text for a blank keyword without searching", async () => {
    const backend = new FakeBackend(() => [WEB_HIT])
    const { service } = buildService(backend)

    expect(await service.searchWeb("   ")).toBe("")
    expect(backend.calls).toEqual([])
  })

  test("serves repeated searches from the cache", async () => {
    const backend = new FakeBackend(() => [WEB_HIT])
    const { service } = buildService(backend)

    const first = await service.searchWebDetailed("캠핑")
    const second = await service.searchWebDetailed("캠핑 ")

    expect(first.origin).toBe("live")
    expect(second).toEqual({ origin: "cache", text: first.text })
    expect(backend.calls.length).toBe(2)
  })

  test("does not cache empty results", async () => {
    const backend = new FakeBackend(() => [])
    const { service, cache } = buildService(backend)

    expect(await service.searchWeb("없는 검색어")).toBe("")
    expect(cache.size).toBe(0)
  })

  test("absorbs a failing branch and keeps the other", async () => {
    const backend = new FakeBackend((request) => {
      if (request.vertical === "news") {
        throw new Error("news backend down")
      }
      return [WEB_HIT]
    })
    const { service } = buildService(backend)

    const evidence = await service.searchWebDetailed("캠핑")

    expect(evidence.origin).toBe("live")
    if (evidence.origin === "live") {
      expect(evidence.news).toEqual({ status: "degraded", error: "news backend down" })
      expect(evidence.web.status).toBe("ok")
      expect(evidence.text.startsWith("--- 일반 웹 검색 ---")).toBe(true)
      expect(evidence.text.includes("--- 뉴스 기사 ---")).toBe(false)
    }
  })

  test("reports disabled search as degraded branches", async () => {
    const backend: SearchBackend = {
      availableProviders: () => [],
      search: async () => {
        throw new SearchDisabledError()
      },
    }
    const { service } = buildService(backend)

    expect(await service.searchWebDetailed("캠핑")).toEqual({
      origin: "live",
      text: "",
      web: { status: "degraded", error: "Search is disabled" },
      news: { status: "degraded", error: "Search is disabled" },
    })
  })

  test("skips branches whose maximum is zero", async () => {
    const backend = new FakeBackend(() => [WEB_HIT])
    const { service } = buildService(backend)

    expect(await service.searchWeb("캠핑", { maxResults: 0, maxNews: 0 })).toBe("")
    expect(backend.calls).toEqual([])
  })

  test("worldwide region sends no filters and a null time limit sends no freshness", async () => {
    const backend = new FakeBackend(() => [])
    const { service } = buildService(backend)

    await service.searchWeb("camping", { region: "wt-wt", timelimit: null, maxNews: 0 })

    expect(backend.calls).toEqual([
      { query: "camping", vertical: "web", count: 5, country: undefined, searchLang: undefined, freshness: undefined },
    ])
  })
})

describe("related search for a URL", () => {
  const page: UrlContent = {
    url: "https://camp.example/autumn",
    title: "가을 캠핑 준비물 총정리",
    description: "",
    content: "본문",
    keywords: ["캠핑", "장비"],
  }

  test("searches the first three derived keywords", async () => {
    const backend = new FakeBackend((request) => (request.vertical === "web" ? [WEB_HIT] : []))
    const { service } = buildService(backend, async () => page)

    const related = await service.searchRelatedToUrl(page.url)

    expect(related.content).toEqual(page)
    expect(backend.calls[0]?.query).toBe("캠핑 장비 가을")
    expect(related.evidence.startsWith("--- 일반 웹 검색 ---")).toBe(true)
  })

  test("skips the search when nothing can be derived", async () => {
    const backend = new FakeBackend(() => [WEB_HIT])
    const { service } = buildService(backend, async () => ({ ...page, title: "", keywords: [] }))

    const related = await service.searchRelatedToUrl(page.url)

    expect(related.evidence).toBe("")
    expect(backend.calls).toEqual([])
  })

  test("propagates fetch failures", async () => {
    const { service } = buildService(new FakeBackend(() => []), async () => {
      throw new Error("boom")
    })

    await expect(service.searchRelatedToUrl(page.url)).rejects.toThrow("boom")
  })
})

describe("extractKeywords", () => {
  test("prefers meta keywords then title tokens, de-duplicated case-insensitively", () => {
    expect(
      extractKeywords({ title: "Tent 가이드: tent 고르기 A", keywords: ["TENT", "캠핑"] }),
    ).toEqual(["TENT", "캠핑", "가이드"])
  })

  test("caps the result", () => {
    expect(extractKeywords({ title: "alpha beta gamma", keywords: ["a1", "a2", "a3", "a4"] }, 5)).toEqual([
      "a1",
      "a2",
      "a3",
      "a4",
      "alpha",
    ])
  })

  test("returns nothing for an empty page", () => {
    expect(extractKeywords({ title: "", keywords: [] })).toEqual([])
  })
})

describe("regionFilters", () => {
  test("maps region codes to backend filters", () => {
    expect(regionFilters("kr-ko")).toEqual({ country: "KR", searchLang: "ko" })
    expect(regionFilters("us-en")).toEqual({ country: "US", searchLang: "en" })
    expect(regionFilters("wt-wt")).toEqual({ country: undefined, searchLang: undefined })
  })
})
