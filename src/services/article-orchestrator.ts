import type { Loggers } from "../logger"
import type { ArticleLanguage, KeywordArticleRequest, UrlArticleRequest, UrlContent, WebSearchOptions } from "../types"
import { FetchError } from "./content-fetcher"
import type { TextGenerator } from "./generation-client"
import {
  classifyGenerationError,
  GenerationFailedError,
  userMessageFor,
  type ClassifyOptions,
} from "./generation-errors"
import { buildKeywordPrompts, buildUrlPrompts, type PromptPair } from "./prompt-builder"
import type { RelatedSearch, WebSearchService } from "./web-search"

export type ArticleRequestErrorKind = "missing_credential" | "invalid_input" | "bad_url" | "url_analysis_failed"

export class ArticleRequestError extends Error {
  constructor(
    readonly kind: ArticleRequestErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = "ArticleRequestError"
  }
}

export interface KeywordArticle {
  markdown: string
  keyword: string
}

export interface UrlArticle {
  markdown: string
  url: string
  analyzedTitle: string
  keywords: string[]
}

export interface UrlArticleStream {
  analyzedTitle: string
  keywords: string[]
  chunks: AsyncIterable<string>
}

export const ERROR_TRAILER_PREFIX = "\n\n[ERROR] "

interface ArticleOrchestratorDependencies {
  generator: TextGenerator
  webSearch: Pick<WebSearchService, "searchWeb" | "searchRelatedToUrl">
  fetchContent: (url: string) => Promise<UrlContent>
  defaultApiKey: string
  loggers: Loggers
}

/**
 * Entry points for article generation. Setup failures (credential, input,
 * URL analysis) are thrown before any output; failures inside a stream end
 * it with a single `[ERROR]` chunk.
 */
export class ArticleOrchestrator {
  constructor(private readonly deps: ArticleOrchestratorDependencies) {}

  async generateFromKeyword(request: KeywordArticleRequest): Promise<KeywordArticle> {
    const apiKey = this.resolveCredential(request.apiKey)
    const { keyword, prompts } = await this.prepareKeyword(request)

    try {
      const markdown = await this.deps.generator.generate(prompts, { apiKey })
      return { markdown, keyword }
    } catch (error) {
      throw this.generationFailure(error, "keyword", { detectUnknownModel: true })
    }
  }

  async streamFromKeyword(request: KeywordArticleRequest): Promise<AsyncIterable<string>> {
    const apiKey = this.resolveCredential(request.apiKey)
    const { prompts } = await this.prepareKeyword(request)

    return this.withErrorTrailer(this.deps.generator.generateStream(prompts, { apiKey }), "keyword")
  }

  async generateFromUrl(request: UrlArticleRequest): Promise<UrlArticle> {
    const apiKey = this.resolveCredential(request.apiKey)
    const { url, related, prompts } = await this.prepareUrl(request)

    try {
      const markdown = await this.deps.generator.generate(prompts, { apiKey })
      return {
        markdown,
        url,
        analyzedTitle: related.content.title,
        keywords: related.content.keywords,
      }
    } catch (error) {
      throw this.generationFailure(error, "url")
    }
  }

  async streamFromUrl(request: UrlArticleRequest): Promise<UrlArticleStream> {
    const apiKey = this.resolveCredential(request.apiKey)
    const { related, prompts } = await this.prepareUrl(request)

    return {
      analyzedTitle: related.content.title,
      keywords: related.content.keywords,
      chunks: this.withErrorTrailer(this.deps.generator.generateStream(prompts, { apiKey }), "url"),
    }
  }

  private resolveCredential(requested: string | undefined): string {
    const apiKey = requested?.trim() || this.deps.defaultApiKey
    if (!apiKey) {
      throw new ArticleRequestError(
        "missing_credential",
        "TRENDWRITER_API_KEY 환경변수 또는 요청 body의 api_key를 설정해 주세요.",
      )
    }
    return apiKey
  }

  private async prepareKeyword(request: KeywordArticleRequest): Promise<{ keyword: string; prompts: PromptPair }> {
    const keyword = request.keyword.trim()
    if (!keyword) {
      throw new ArticleRequestError("invalid_input", "keyword를 입력해 주세요.")
    }

    let evidence = ""
    if (request.useWebSearch) {
      try {
        evidence = await this.deps.webSearch.searchWeb(keyword, {
          maxResults: 5,
          ...searchScope(request.language),
        })
      } catch (error) {
        this.deps.loggers.app.warn({ keyword, error: describe(error) }, "search before generate failed")
      }
    }

    const referenceContent = request.referenceUrl ? await this.readReference(request.referenceUrl) : undefined

    return {
      keyword,
      prompts: buildKeywordPrompts({
        keyword,
        language: request.language,
        style: request.style,
        length: request.length,
        useEmoji: request.useEmoji,
        guide: request.guide,
        evidence,
        referenceContent,
      }),
    }
  }

  private async readReference(url: string): Promise<string | undefined> {
    try {
      const content = await this.deps.fetchContent(url)
      return content.content
    } catch (error) {
      if (!this.logFetchFailure(url, error)) {
        this.deps.loggers.app.warn({ url, error: describe(error) }, "reference URL could not be read")
      }
      return undefined
    }
  }

  private async prepareUrl(
    request: UrlArticleRequest,
  ): Promise<{ url: string; related: RelatedSearch; prompts: PromptPair }> {
    const url = request.url.trim()
    if (!url) {
      throw new ArticleRequestError("invalid_input", "URL을 입력해 주세요.")
    }

    const max = request.useWebSearch ? 5 : 0
    let related: RelatedSearch
    try {
      related = await this.deps.webSearch.searchRelatedToUrl(url, {
        maxResults: max,
        maxNews: max,
        ...searchScope(request.language),
      })
    } catch (error) {
      this.logFetchFailure(url, error)
      if (error instanceof FetchError) {
        throw new ArticleRequestError("bad_url", error.message, { cause: error })
      }

      this.deps.loggers.app.warn({ url, error: describe(error) }, "URL analysis failed")
      throw new ArticleRequestError("url_analysis_failed", `URL 분석 중 오류가 발생했습니다: ${describe(error)}`, {
        cause: error,
      })
    }

    return {
      url,
      related,
      prompts: buildUrlPrompts({
        content: related.content,
        language: request.language,
        style: request.style,
        length: request.length,
        useEmoji: request.useEmoji,
        guide: request.guide,
        evidence: request.useWebSearch ? related.evidence : undefined,
      }),
    }
  }

  private async *withErrorTrailer(chunks: AsyncIterable<string>, flow: "keyword" | "url"): AsyncGenerator<string> {
    try {
      for await (const chunk of chunks) {
        yield chunk
      }
    } catch (error) {
      const category = classifyGenerationError(error)
      this.deps.loggers.app.error({ flow, category: category.kind, error: describe(error) }, "article stream failed")
      yield `${ERROR_TRAILER_PREFIX}${userMessageFor(category)}`
    }
  }

  private generationFailure(error: unknown, flow: "keyword" | "url", options?: ClassifyOptions): GenerationFailedError {
    const category = classifyGenerationError(error, options)
    this.deps.loggers.app.error({ flow, category: category.kind, error: describe(error) }, "article generation failed")
    return new GenerationFailedError(category, { cause: error })
  }

  /** Logs unsafe-URL rejections on the security logger; returns whether it did. */
  private logFetchFailure(url: string, error: unknown): boolean {
    if (error instanceof FetchError && error.reason === "unsafe") {
      this.deps.loggers.security.warn({ url, reason: error.message }, "blocked outbound URL")
      return true
    }
    return false
  }
}

function searchScope(language: ArticleLanguage): Pick<WebSearchOptions, "region" | "timelimit"> {
  return { region: language === "ko" ? "kr-ko" : "wt-wt", timelimit: "m" }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
