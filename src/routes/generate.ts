import { z } from "zod"
import { errorResponse, jsonResponse, readJsonBody, textStreamResponse } from "../lib/http"
import type { ServerContext } from "../server-context"
import { ArticleRequestError } from "../services/article-orchestrator"
import { GenerationFailedError } from "../services/generation-errors"
import { ARTICLE_LANGUAGES, ARTICLE_LENGTHS, ARTICLE_STYLES, type ArticleOptions } from "../types"

const blankToUndefined = (value: unknown): unknown =>
  typeof value === "string" && value.trim() === "" ? undefined : value

const ApiKeySchema = z.preprocess(
  blankToUndefined,
  z
    .string()
    .trim()
    .startsWith("sk-", "올바른 API 키 형식이 아닙니다.")
    .min(20, "API 키가 너무 짧습니다.")
    .optional(),
)

const HttpUrlSchema = z
  .string()
  .trim()
  .min(1, "URL을 입력해 주세요.")
  .max(2000, "URL이 너무 깁니다.")
  .refine(isHttpUrl, "http 또는 https URL만 지원합니다.")

const ArticleOptionsSchema = z.object({
  api_key: ApiKeySchema,
  lang: z.enum(ARTICLE_LANGUAGES, { message: "지원하지 않는 언어입니다. (ko, en)" }).default("ko"),
  style: z
    .enum(ARTICLE_STYLES, { message: `지원하지 않는 스타일입니다. (${ARTICLE_STYLES.join(", ")})` })
    .default("정보성"),
  length: z
    .enum(ARTICLE_LENGTHS, { message: `지원하지 않는 길이입니다. (${ARTICLE_LENGTHS.join(", ")})` })
    .default("medium"),
  use_emoji: z.boolean().default(false),
  use_web_search: z.boolean().default(true),
  guide: z.preprocess(blankToUndefined, z.string().trim().max(1000, "가이드는 1000자 이하여야 합니다.").optional()),
})

const KeywordArticleSchema = ArticleOptionsSchema.extend({
  keyword: z
    .string({ required_error: "keyword를 입력해 주세요." })
    .trim()
    .min(2, "키워드는 2자 이상이어야 합니다.")
    .max(100, "키워드는 100자 이하여야 합니다."),
  reference_url: z.preprocess(blankToUndefined, HttpUrlSchema.optional()),
})

const UrlArticleSchema = ArticleOptionsSchema.extend({
  url: z.string({ required_error: "URL을 입력해 주세요." }).pipe(HttpUrlSchema),
})

type ArticleOptionsBody = z.infer<typeof ArticleOptionsSchema>

export async function handleGenerate(request: Request, ctx: ServerContext): Promise<Response> {
  const parsed = KeywordArticleSchema.safeParse(await readJsonBody(request))
  if (!parsed.success) {
    return errorResponse(400, "잘못된 요청입니다.", parsed.error.flatten())
  }

  try {
    const article = await ctx.articleOrchestrator.generateFromKeyword({
      ...toArticleOptions(parsed.data),
      keyword: parsed.data.keyword,
      referenceUrl: parsed.data.reference_url,
    })
    return jsonResponse({ markdown: article.markdown, keyword: article.keyword })
  } catch (error) {
    return articleErrorResponse(error, ctx)
  }
}

export async function handleGenerateStream(request: Request, ctx: ServerContext): Promise<Response> {
  const parsed = KeywordArticleSchema.safeParse(await readJsonBody(request))
  if (!parsed.success) {
    return errorResponse(400, "잘못된 요청입니다.", parsed.error.flatten())
  }

  try {
    const chunks = await ctx.articleOrchestrator.streamFromKeyword({
      ...toArticleOptions(parsed.data),
      keyword: parsed.data.keyword,
      referenceUrl: parsed.data.reference_url,
    })
    return textStreamResponse(chunks)
  } catch (error) {
    return articleErrorResponse(error, ctx)
  }
}

export async function handleGenerateFromUrl(request: Request, ctx: ServerContext): Promise<Response> {
  const parsed = UrlArticleSchema.safeParse(await readJsonBody(request))
  if (!parsed.success) {
    return errorResponse(400, "잘못된 요청입니다.", parsed.error.flatten())
  }

  try {
    const article = await ctx.articleOrchestrator.generateFromUrl({
      ...toArticleOptions(parsed.data),
      url: parsed.data.url,
    })
    return jsonResponse({
      markdown: article.markdown,
      url: article.url,
      analyzed_title: article.analyzedTitle,
      keywords: article.keywords,
    })
  } catch (error) {
    return articleErrorResponse(error, ctx)
  }
}

export async function handleGenerateFromUrlStream(request: Request, ctx: ServerContext): Promise<Response> {
  const parsed = UrlArticleSchema.safeParse(await readJsonBody(request))
  if (!parsed.success) {
    return errorResponse(400, "잘못된 요청입니다.", parsed.error.flatten())
  }

  try {
    const stream = await ctx.articleOrchestrator.streamFromUrl({
      ...toArticleOptions(parsed.data),
      url: parsed.data.url,
    })
    return textStreamResponse(stream.chunks, {
      "x-analyzed-title": encodeURIComponent(stream.analyzedTitle),
      "x-keywords": encodeURIComponent(stream.keywords.join(",")),
    })
  } catch (error) {
    return articleErrorResponse(error, ctx)
  }
}

function toArticleOptions(body: ArticleOptionsBody): ArticleOptions {
  return {
    apiKey: body.api_key,
    language: body.lang,
    style: body.style,
    length: body.length,
    useEmoji: body.use_emoji,
    useWebSearch: body.use_web_search,
    guide: body.guide,
  }
}

function articleErrorResponse(error: unknown, ctx: ServerContext): Response {
  if (error instanceof ArticleRequestError) {
    return errorResponse(error.kind === "url_analysis_failed" ? 502 : 400, error.message, { kind: error.kind })
  }

  if (error instanceof GenerationFailedError) {
    return errorResponse(502, error.message, { category: error.category.kind })
  }

  ctx.loggers.app.error({ error }, "article request failed")
  return errorResponse(500, "글 생성 중 알 수 없는 오류가 발생했습니다.")
}

function isHttpUrl(value: string): boolean {
  try {
    const parsed = new URL(value)
    return parsed.protocol === "http:" || parsed.protocol === "https:"
  } catch {
    return false
  }
}
