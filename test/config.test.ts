import { describe, expect, test } from "vitest"
import { DEFAULT_MODELS, loadConfig } from "../src/config"

describe("loadConfig", () => {
  test("applies defaults", () => {
    const config = loadConfig({})

    expect(config.port).toBe(3000)
    expect(config.host).toBe("0.0.0.0")
    expect(config.llm).toEqual({
      provider: "anthropic",
      model: DEFAULT_MODELS.anthropic,
      apiKey: "",
      temperature: 0.7,
      maxOutputTokens: 2048,
      timeoutMs: 0,
    })
    expect(config.search).toEqual({ strategy: "fallback", primary: "searxng" })
    expect(config.braveRateLimit).toEqual({ tier: "free", requestsPerSecond: 1, queueMax: 10 })
    expect(config.cache).toEqual({
      searchTtlMs: 30 * 60_000,
      searchMaxSize: 100,
      searchSweepIntervalMs: 5 * 60_000,
      trendsTtlMs: 10 * 60_000,
    })
    expect(config.trends.useCsvExport).toBe(false)
    expect(config.rateLimit).toEqual({ generatePerMinute: 5, trendsPerMinute: 20 })
  })

  test("reads the provider, model and credential", () => {
    const config = loadConfig({
      TRENDWRITER_LLM_PROVIDER: "openai",
      TRENDWRITER_API_KEY: " test-secret ",
      TRENDWRITER_LLM_TIMEOUT_MS: "90000",
    })

    expect(config.llm.provider).toBe("openai")
    expect(config.llm.model).toBe(DEFAULT_MODELS.openai)
    expect(config.llm.apiKey).toBe("test-secret")
    expect(config.llm.timeoutMs).toBe(90_000)
    expect(loadConfig({ TRENDWRITER_LLM_MODEL: "test-model" }).llm.model).toBe("test-model")
  })

  test("falls back to the provider-specific key variable", () => {
    expect(loadConfig({ ANTHROPIC_API_KEY: "test-secret" }).llm.apiKey).toBe("test-secret")
    expect(loadConfig({ ANTHROPIC_API_KEY: "other", TRENDWRITER_API_KEY: "test-secret" }).llm.apiKey).toBe("test-secret")
  })

  test("accepts Brave tiers or a numeric rate", () => {
    expect(loadConfig({ TRENDWRITER_BRAVE_RATE_LIMIT: "Pro" }).braveRateLimit).toMatchObject({
      tier: "pro",
      requestsPerSecond: 50,
    })
    expect(loadConfig({ TRENDWRITER_BRAVE_RATE_LIMIT: "7" }).braveRateLimit).toMatchObject({
      tier: "custom",
      requestsPerSecond: 7,
    })
    expect(() => loadConfig({ TRENDWRITER_BRAVE_RATE_LIMIT: "enterprise" })).toThrow()
  })

  test("normalizes URLs and clamps numbers", () => {
    const config = loadConfig({
      TRENDWRITER_SEARXNG_BASE_URL: "http://searxng.internal:8080//",
      TRENDWRITER_SEARCH_CACHE_MAX_SIZE: "0",
      TRENDWRITER_GENERATE_RATE_LIMIT: "nope",
      TRENDWRITER_USE_CSV_TRENDS: "yes",
    })

    expect(config.searxng.baseUrl).toBe("http://searxng.internal:8080")
    expect(config.cache.searchMaxSize).toBe(1)
    expect(config.rateLimit.generatePerMinute).toBe(5)
    expect(config.trends.useCsvExport).toBe(true)
  })

  test("rejects unknown enum values", () => {
    expect(() => loadConfig({ TRENDWRITER_SEARCH_STRATEGY: "random" })).toThrow()
    expect(() => loadConfig({ TRENDWRITER_LLM_PROVIDER: "ollama" })).toThrow()
  })
})
