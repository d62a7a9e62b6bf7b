import { z } from "zod"

export type LlmProvider = "anthropic" | "openai"
export type SearchProviderName = "brave" | "searxng"
export type SearchStrategy = "single" | "fallback" | "disabled"
export type BraveRateLimitTier = "free" | "paid" | "base" | "pro"

export interface LlmSettings {
  provider: LlmProvider
  model: string
  apiKey: string
  temperature: number
  maxOutputTokens: number
  timeoutMs: number
}

export interface SearchSettings {
  strategy: SearchStrategy
  primary: SearchProviderName
}

export interface BraveRateLimitSettings {
  tier: BraveRateLimitTier | "custom"
  requestsPerSecond: number
  queueMax: number
}

export interface SearxngSettings {
  baseUrl: string
  timeoutMs: number
}

export interface CacheSettings {
  searchTtlMs: number
  searchMaxSize: number
  searchSweepIntervalMs: number
  trendsTtlMs: number
}

export interface TrendSettings {
  useCsvExport: boolean
  exportUrl: string
  rssUrl: string
  timeoutMs: number
}

export interface FetchSettings {
  timeoutMs: number
  maxRedirects: number
  maxFetchBytes: number
  maxExtractedChars: number
  userAgent: string
  acceptLanguage: string
}

export interface RateLimitSettings {
  generatePerMinute: number
  trendsPerMinute: number
}

export interface AppConfig {
  port: number
  host: string
  logDir: string
  logLevel: string
  llm: LlmSettings
  search: SearchSettings
  braveApiKey: string
  braveApiBaseUrl: string
  braveRateLimit: BraveRateLimitSettings
  searxng: SearxngSettings
  cache: CacheSettings
  trends: TrendSettings
  fetch: FetchSettings
  rateLimit: RateLimitSettings
}

export const DEFAULT_MODELS: Record<LlmProvider, string> = {
  anthropic: "claude-sonnet-4-20250514",
  openai: "gpt-4o-mini",
}

const BROWSER_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36"

const braveTierRps: Record<BraveRateLimitTier, number> = {
  free: 1,
  paid: 20,
  base: 20,
  pro: 50,
}

const RateLimitTierSchema = z.enum(["free", "paid", "base", "pro"])
const RateLimitSettingSchema = z.preprocess(
  (value) => {
    if (typeof value !== "string") {
      return value
    }

    const normalized = value.trim().toLowerCase()
    if (/^\d+$/.test(normalized)) {
      return Number.parseInt(normalized, 10)
    }

    return normalized
  },
  z.union([RateLimitTierSchema, z.number().int().positive()]),
)

const EnvSchema = z.object({
  PORT: z.string().optional(),
  HOST: z.string().optional(),
  TRENDWRITER_LOG_DIR: z.string().default("./data/logs"),
  TRENDWRITER_LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  TRENDWRITER_LLM_PROVIDER: z.enum(["anthropic", "openai"]).default("anthropic"),
  TRENDWRITER_LLM_MODEL: z.string().optional(),
  TRENDWRITER_API_KEY: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),
  TRENDWRITER_LLM_TIMEOUT_MS: z.string().optional(),
  TRENDWRITER_SEARCH_STRATEGY: z.enum(["single", "fallback", "disabled"]).default("fallback"),
  TRENDWRITER_SEARCH_PRIMARY: z.enum(["brave", "searxng"]).default("searxng"),
  TRENDWRITER_BRAVE_API_KEY: z.string().default(""),
  TRENDWRITER_BRAVE_API_BASE_URL: z.string().default("https://api.search.brave.com/res/v1"),
  TRENDWRITER_BRAVE_RATE_LIMIT: RateLimitSettingSchema.default("free"),
  TRENDWRITER_BRAVE_QUEUE_MAX: z.string().optional(),
  TRENDWRITER_SEARXNG_BASE_URL: z.string().default(""),
  TRENDWRITER_SEARXNG_TIMEOUT_MS: z.string().optional(),
  TRENDWRITER_SEARCH_CACHE_TTL_MINUTES: z.string().optional(),
  TRENDWRITER_SEARCH_CACHE_MAX_SIZE: z.string().optional(),
  TRENDWRITER_TRENDS_CACHE_TTL_MINUTES: z.string().optional(),
  TRENDWRITER_USE_CSV_TRENDS: z.string().optional(),
  TRENDWRITER_TRENDS_EXPORT_URL: z.string().default(""),
  TRENDWRITER_TRENDS_RSS_URL: z.string().default("https://trends.google.com/trending/rss"),
  TRENDWRITER_TRENDS_TIMEOUT_MS: z.string().optional(),
  TRENDWRITER_FETCH_TIMEOUT_MS: z.string().optional(),
  TRENDWRITER_USER_AGENT: z.string().default(BROWSER_USER_AGENT),
  TRENDWRITER_GENERATE_RATE_LIMIT: z.string().optional(),
  TRENDWRITER_TRENDS_RATE_LIMIT: z.string().optional(),
})

function toBoolean(input: string | undefined, defaultValue: boolean): boolean {
  if (input === undefined) {
    return defaultValue
  }

  const normalized = input.trim().toLowerCase()
  if (["1", "true", "yes", "on"].includes(normalized)) {
    return true
  }

  if (["0", "false", "no", "off"].includes(normalized)) {
    return false
  }

  return defaultValue
}

function toInteger(input: string | undefined, defaultValue: number): number {
  if (!input) {
    return defaultValue
  }

  const parsed = Number.parseInt(input, 10)
  if (Number.isNaN(parsed)) {
    return defaultValue
  }

  return parsed
}

function toMinInteger(input: string | undefined, defaultValue: number, min: number): number {
  const parsed = toInteger(input, defaultValue)
  return parsed < min ? min : parsed
}

function trimTrailingSlashes(value: string): string {
  return value.trim().replace(/\/+$/, "")
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.parse(env)
  const provider = parsed.TRENDWRITER_LLM_PROVIDER
  const model = parsed.TRENDWRITER_LLM_MODEL?.trim() || DEFAULT_MODELS[provider]
  const braveRateLimit =
    typeof parsed.TRENDWRITER_BRAVE_RATE_LIMIT === "number"
      ? {
          tier: "custom" as const,
          requestsPerSecond: parsed.TRENDWRITER_BRAVE_RATE_LIMIT,
        }
      : {
          tier: parsed.TRENDWRITER_BRAVE_RATE_LIMIT,
          requestsPerSecond: braveTierRps[parsed.TRENDWRITER_BRAVE_RATE_LIMIT],
        }

  return {
    port: toInteger(parsed.PORT, 3000),
    host: parsed.HOST ?? "0.0.0.0",
    logDir: parsed.TRENDWRITER_LOG_DIR,
    logLevel: parsed.TRENDWRITER_LOG_LEVEL,
    llm: {
      provider,
      model,
      apiKey: (parsed.TRENDWRITER_API_KEY || parsed.ANTHROPIC_API_KEY || "").trim(),
      temperature: 0.7,
      maxOutputTokens: 2048,
      timeoutMs: toMinInteger(parsed.TRENDWRITER_LLM_TIMEOUT_MS, 0, 0),
    },
    search: {
      strategy: parsed.TRENDWRITER_SEARCH_STRATEGY,
      primary: parsed.TRENDWRITER_SEARCH_PRIMARY,
    },
    braveApiKey: parsed.TRENDWRITER_BRAVE_API_KEY,
    braveApiBaseUrl: trimTrailingSlashes(parsed.TRENDWRITER_BRAVE_API_BASE_URL),
    braveRateLimit: {
      tier: braveRateLimit.tier,
      requestsPerSecond: braveRateLimit.requestsPerSecond,
      queueMax: toMinInteger(parsed.TRENDWRITER_BRAVE_QUEUE_MAX, 10, 1),
    },
    searxng: {
      baseUrl: trimTrailingSlashes(parsed.TRENDWRITER_SEARXNG_BASE_URL),
      timeoutMs: toMinInteger(parsed.TRENDWRITER_SEARXNG_TIMEOUT_MS, 8_000, 1),
    },
    cache: {
      searchTtlMs: toMinInteger(parsed.TRENDWRITER_SEARCH_CACHE_TTL_MINUTES, 30, 1) * 60 * 1000,
      searchMaxSize: toMinInteger(parsed.TRENDWRITER_SEARCH_CACHE_MAX_SIZE, 100, 1),
      searchSweepIntervalMs: 5 * 60 * 1000,
      trendsTtlMs: toMinInteger(parsed.TRENDWRITER_TRENDS_CACHE_TTL_MINUTES, 10, 1) * 60 * 1000,
    },
    trends: {
      useCsvExport: toBoolean(parsed.TRENDWRITER_USE_CSV_TRENDS, false),
      exportUrl: parsed.TRENDWRITER_TRENDS_EXPORT_URL.trim(),
      rssUrl: parsed.TRENDWRITER_TRENDS_RSS_URL.trim(),
      timeoutMs: toMinInteger(parsed.TRENDWRITER_TRENDS_TIMEOUT_MS, 12_000, 1),
    },
    fetch: {
      timeoutMs: toMinInteger(parsed.TRENDWRITER_FETCH_TIMEOUT_MS, 15_000, 1),
      maxRedirects: 4,
      maxFetchBytes: 2_000_000,
      maxExtractedChars: 8_000,
      userAgent: parsed.TRENDWRITER_USER_AGENT,
      acceptLanguage: "ko-KR,ko;q=0.9,en-US;q=0.8,en;q=0.7",
    },
    rateLimit: {
      generatePerMinute: toMinInteger(parsed.TRENDWRITER_GENERATE_RATE_LIMIT, 5, 1),
      trendsPerMinute: toMinInteger(parsed.TRENDWRITER_TRENDS_RATE_LIMIT, 20, 1),
    },
  }
}
