import type { SearchProviderName } from "../config"

export type { SearchProviderName }

export type SearchVertical = "web" | "news"

export interface SearchRequest {
  query: string
  count: number
  vertical: SearchVertical
  country?: string
  searchLang?: string
  safesearch?: "off" | "moderate" | "strict"
  /** Brave-style freshness code: pd, pw, pm or py. */
  freshness?: string
}

export interface SearchResult {
  url: string
  title: string
  snippet: string
  source: string
  published?: string
}

export interface SearchResponse {
  raw: unknown
  results: SearchResult[]
}

export interface SearchProviderClient {
  readonly name: SearchProviderName
  search(request: SearchRequest): Promise<SearchResponse>
}

export function safeHostname(url: string): string {
  try {
    return new URL(url).hostname
  } catch {
    return "unknown"
  }
}

export function readString(item: Record<string, unknown>, key: string): string | undefined {
  const value = item[key]
  return typeof value === "string" ? value : undefined
}

export function asRecord(value: unknown): Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : {}
}
