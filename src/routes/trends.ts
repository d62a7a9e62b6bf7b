import { z } from "zod"
import { errorResponse, jsonResponse } from "../lib/http"
import type { ServerContext } from "../server-context"
import { DEFAULT_REGION } from "../services/trend-provider"

const TrendsQuerySchema = z.object({
  region: z.string().trim().min(1).max(50).default(DEFAULT_REGION),
  limit: z.coerce
    .number()
    .int()
    .min(1, "limit은 1 이상이어야 합니다.")
    .max(100, "limit은 100 이하여야 합니다.")
    .default(20),
})

export async function handleTrends(request: Request, ctx: ServerContext): Promise<Response> {
  const params = new URL(request.url).searchParams
  const parsed = TrendsQuerySchema.safeParse({
    region: params.get("region") ?? undefined,
    limit: params.get("limit") ?? undefined,
  })

  if (!parsed.success) {
    return errorResponse(400, "잘못된 요청입니다.", parsed.error.flatten())
  }

  const { region, limit } = parsed.data

  try {
    const trends = await ctx.trendProvider.getTrendingKeywords(region, limit)
    ctx.loggers.app.info({ region, limit, source: trends.source, count: trends.keywords.length }, "trends served")

    return jsonResponse({
      keywords: trends.keywords,
      region,
      source: trends.source,
      google: trends.googleKeywords,
      recommend: trends.recommendKeywords,
    })
  } catch (error) {
    ctx.loggers.app.error({ error, region, limit }, "trends request failed")
    return errorResponse(502, error instanceof Error ? error.message : "트렌드를 불러오지 못했습니다.")
  }
}
