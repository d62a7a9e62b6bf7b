import type { Logger } from "pino"
import type { SearchSettings } from "../config"
import type {
  SearchProviderClient,
  SearchProviderName,
  SearchRequest,
  SearchResponse,
} from "./search-provider"

export interface SearchExecution extends SearchResponse {
  provider: SearchProviderName
  fallbackUsed: boolean
}

export class SearchDisabledError extends Error {
  constructor() {
    super("Search is disabled")
    this.name = "SearchDisabledError"
  }
}

export class SearchProviderNotConfiguredError extends Error {
  constructor(readonly provider: SearchProviderName) {
    super(`Search provider '${provider}' is not configured`)
    this.name = "SearchProviderNotConfiguredError"
  }
}

export class SearchFallbackError extends Error {
  constructor(
    readonly primaryProvider: SearchProviderName,
    readonly fallbackProvider: SearchProviderName,
    readonly primaryError: unknown,
    readonly fallbackError: unknown,
  ) {
    super(`Search failed for primary '${primaryProvider}' and fallback '${fallbackProvider}'`)
    this.name = "SearchFallbackError"
  }
}

export type SearchBackend = Pick<SearchOrchestrator, "search" | "availableProviders">

interface SearchOrchestratorDependencies {
  braveClient?: SearchProviderClient
  searxngClient?: SearchProviderClient
  logger?: Logger
}

/** Routes a web or news query to Brave or SearXNG according to the configured strategy. */
export class SearchOrchestrator {
  constructor(
    private readonly settings: SearchSettings,
    private readonly dependencies: SearchOrchestratorDependencies,
  ) {}

  /** Providers the current strategy may call; empty when search is disabled. */
  availableProviders(): SearchProviderName[] {
    if (this.settings.strategy === "disabled") {
      return []
    }

    const order =
      this.settings.strategy === "single"
        ? [this.settings.primary]
        : [this.settings.primary, getFallbackProvider(this.settings.primary)]

    return order.filter((name) => this.findProvider(name) !== undefined)
  }

  async search(request: SearchRequest): Promise<SearchExecution> {
    if (this.settings.strategy === "disabled") {
      throw new SearchDisabledError()
    }

    const primary = this.settings.primary

    if (this.settings.strategy === "single") {
      return this.execute(primary, request, false)
    }

    const fallback = getFallbackProvider(primary)

    try {
      return await this.execute(primary, request, false)
    } catch (primaryError) {
      this.dependencies.logger?.warn(
        {
          provider: primary,
          fallback,
          vertical: request.vertical,
          error: primaryError instanceof Error ? primaryError.message : String(primaryError),
        },
        "primary search provider failed, trying fallback",
      )

      try {
        return await this.execute(fallback, request, true)
      } catch (fallbackError) {
        throw new SearchFallbackError(primary, fallback, primaryError, fallbackError)
      }
    }
  }

  private async execute(
    providerName: SearchProviderName,
    request: SearchRequest,
    fallbackUsed: boolean,
  ): Promise<SearchExecution> {
    const client = this.findProvider(providerName)
    if (!client) {
      throw new SearchProviderNotConfiguredError(providerName)
    }

    const response = await client.search(request)

    return {
      provider: providerName,
      fallbackUsed,
      raw: response.raw,
      results: response.results,
    }
  }

  private findProvider(providerName: SearchProviderName): SearchProviderClient | undefined {
    return providerName === "brave" ? this.dependencies.braveClient : this.dependencies.searxngClient
  }
}

function getFallbackProvider(primary: SearchProviderName): SearchProviderName {
  return primary === "brave" ? "searxng" : "brave"
}
