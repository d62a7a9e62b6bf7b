import { jsonResponse } from "../lib/http"
import type { ServerContext } from "../server-context"

export function handleReadyz(_request: Request, ctx: ServerContext): Response {
  const searchEnabled = ctx.config.search.strategy !== "disabled"
  const braveRequired =
    searchEnabled && (ctx.config.search.primary === "brave" || ctx.config.search.strategy === "fallback")
  const searxngRequired =
    searchEnabled &&
    (ctx.config.search.primary === "searxng" || ctx.config.search.strategy === "fallback")

  const braveApiKeyConfigured = !braveRequired || Boolean(ctx.config.braveApiKey)
  const searxngBaseUrlConfigured = !searxngRequired || Boolean(ctx.config.searxng.baseUrl)
  const searxngBaseUrlValid = !searxngRequired || isValidUrl(ctx.config.searxng.baseUrl)
  const llmApiKeyConfigured = Boolean(ctx.config.llm.apiKey)
  const trendsExportUrlValid = !ctx.config.trends.useCsvExport || isValidUrl(ctx.config.trends.exportUrl)

  const checks = {
    llm_provider: ctx.config.llm.provider,
    llm_api_key_configured: llmApiKeyConfigured,
    search_strategy: ctx.config.search.strategy,
    search_primary: ctx.config.search.primary,
    search_enabled: searchEnabled,
    brave_required: braveRequired,
    brave_api_key_configured: braveApiKeyConfigured,
    searxng_required: searxngRequired,
    searxng_base_url_configured: searxngBaseUrlConfigured,
    searxng_base_url_valid: searxngBaseUrlValid,
    trends_export_enabled: ctx.config.trends.useCsvExport,
    trends_export_url_valid: trendsExportUrlValid,
  }

  const ready =
    llmApiKeyConfigured &&
    braveApiKeyConfigured &&
    searxngBaseUrlConfigured &&
    searxngBaseUrlValid &&
    trendsExportUrlValid
  return jsonResponse(
    {
      status: ready ? "ready" : "not_ready",
      timestamp: new Date().toISOString(),
      checks,
    },
    ready ? 200 : 503,
  )
}

function isValidUrl(value: string): boolean {
  try {
    const parsed = new URL(value)
    return parsed.protocol === "http:" || parsed.protocol === "https:"
  } catch {
    return false
  }
}
