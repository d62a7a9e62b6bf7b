import { describe, expect, test } from "vitest"
import { handleHealthz } from "../src/routes/healthz"
import { handleReadyz } from "../src/routes/readyz"
import { testConfig, testContext } from "./helpers"

describe("health and readiness routes", () => {
  test("/healthz remains liveness-only", async () => {
    const response = handleHealthz(new Request("http://localhost/healthz"), testContext())
    expect(response.status).toBe(200)

    expect(await response.json()).toMatchObject({
      status: "ok",
      checks: {
        llm_provider: "anthropic",
        default_api_key_configured: false,
        search_strategy: "fallback",
        search_providers: [],
      },
    })
  })

  test("/readyz reports missing configuration", async () => {
    const response = handleReadyz(new Request("http://localhost/readyz"), testContext())
    expect(response.status).toBe(503)

    expect(await response.json()).toMatchObject({
      status: "not_ready",
      checks: {
        llm_api_key_configured: false,
        brave_required: true,
        brave_api_key_configured: false,
        searxng_required: true,
        searxng_base_url_configured: false,
      },
    })
  })

  test("/readyz allows disabled search mode without provider credentials", async () => {
    const config = testConfig({ TRENDWRITER_SEARCH_STRATEGY: "disabled", TRENDWRITER_API_KEY: "test-secret" })
    const response = handleReadyz(new Request("http://localhost/readyz"), testContext(config))
    expect(response.status).toBe(200)

    expect(await response.json()).toMatchObject({
      status: "ready",
      checks: { search_enabled: false, brave_required: false, searxng_required: false },
    })
  })

  test("/readyz only requires the primary provider in single mode", async () => {
    const config = testConfig({
      TRENDWRITER_SEARCH_STRATEGY: "single",
      TRENDWRITER_SEARCH_PRIMARY: "searxng",
      TRENDWRITER_SEARXNG_BASE_URL: "http://searxng.internal:8080",
      TRENDWRITER_API_KEY: "test-secret",
    })
    const response = handleReadyz(new Request("http://localhost/readyz"), testContext(config))

    expect(response.status).toBe(200)
    expect(await response.json()).toMatchObject({ checks: { brave_required: false, searxng_base_url_valid: true } })
  })

  test("/readyz rejects an enabled trends export without a usable URL", async () => {
    const config = testConfig({
      TRENDWRITER_SEARCH_STRATEGY: "disabled",
      TRENDWRITER_API_KEY: "test-secret",
      TRENDWRITER_USE_CSV_TRENDS: "1",
    })
    const response = handleReadyz(new Request("http://localhost/readyz"), testContext(config))

    expect(response.status).toBe(503)
    expect(await response.json()).toMatchObject({
      checks: { trends_export_enabled: true, trends_export_url_valid: false },
    })
  })
})
