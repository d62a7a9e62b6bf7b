export type ArticleLanguage = "ko" | "en"
export type ArticleStyle = "정보성" | "리뷰" | "How-to" | "뉴스해설"
export type ArticleLength = "short" | "medium" | "long"

export const ARTICLE_LANGUAGES = ["ko", "en"] as const satisfies readonly ArticleLanguage[]
export const ARTICLE_STYLES = ["정보성", "리뷰", "How-to", "뉴스해설"] as const satisfies readonly ArticleStyle[]
export const ARTICLE_LENGTHS = ["short", "medium", "long"] as const satisfies readonly ArticleLength[]

export interface UrlContent {
  url: string
  title: string
  description: string
  content: string
  keywords: string[]
}

/** Search recency window: day, week, month, year, or unrestricted. */
export type TimeLimit = "d" | "w" | "m" | "y" | null

export interface WebSearchOptions {
  maxResults?: number
  maxNews?: number
  region?: string
  timelimit?: TimeLimit
}

export interface TrendingKeywords {
  keywords: string[]
  source: string
  googleKeywords: string[]
  recommendKeywords: string[]
}

export interface ArticleOptions {
  language: ArticleLanguage
  style: ArticleStyle
  length: ArticleLength
  useEmoji: boolean
  useWebSearch: boolean
  guide?: string
  apiKey?: string
}

export interface KeywordArticleRequest extends ArticleOptions {
  keyword: string
  referenceUrl?: string
}

export interface UrlArticleRequest extends ArticleOptions {
  url: string
}
