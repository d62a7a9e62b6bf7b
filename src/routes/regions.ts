import { jsonResponse } from "../lib/http"
import type { ServerContext } from "../server-context"

export function handleRegions(_request: Request, ctx: ServerContext): Response {
  return jsonResponse({ regions: ctx.trendProvider.listRegions() })
}
