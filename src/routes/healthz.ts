import { jsonResponse } from "../lib/http"
import type { ServerContext } from "../server-context"

export function handleHealthz(_request: Request, ctx: ServerContext): Response {
  return jsonResponse({
    status: "ok",
    timestamp: new Date().toISOString(),
    checks: {
      llm_provider: ctx.config.llm.provider,
      llm_model: ctx.config.llm.model,
      default_api_key_configured: Boolean(ctx.config.llm.apiKey),
      search_strategy: ctx.config.search.strategy,
      search_providers: ctx.searchBackend.availableProviders(),
    },
  })
}
