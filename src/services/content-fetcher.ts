import type { AppConfig } from "../config"
import {
  assertSafeUrl as assertSafeUrlDefault,
  HostResolutionError,
  UnsafeUrlError,
} from "../lib/network"
import type { UrlContent } from "../types"
import { extractUrlContent } from "./html-extractor"

const ALLOWED_CONTENT_TYPES = ["text/html", "text/plain", "application/xhtml+xml"]

export type FetchFailureReason = "unsafe" | "unreachable" | "status" | "content_type"

export class FetchError extends Error {
  constructor(
    readonly reason: FetchFailureReason,
    message: string,
    readonly url: string,
  ) {
    super(message)
    this.name = "FetchError"
  }
}

export type FetchLike = (input: string | URL | Request, init?: RequestInit) => Promise<Response>

interface ContentFetcherDeps {
  assertSafeUrl?: (url: string | URL) => Promise<URL>
  fetchImpl?: FetchLike
}

export class ContentFetcher {
  private readonly assertSafeUrl: (url: string | URL) => Promise<URL>
  private readonly fetchImpl: FetchLike

  constructor(
    private readonly config: AppConfig,
    deps: ContentFetcherDeps = {},
  ) {
    this.assertSafeUrl = deps.assertSafeUrl ?? ((url) => assertSafeUrlDefault(url))
    this.fetchImpl = deps.fetchImpl ?? fetch
  }

  async fetch(url: string): Promise<UrlContent> {
    const body = await this.fetchPage(url)
    return extractUrlContent(url, body, this.config.fetch.maxExtractedChars)
  }

  private async fetchPage(url: string): Promise<string> {
    let current = await this.guard(url, url)

    for (let i = 0; i <= this.config.fetch.maxRedirects; i += 1) {
      let response: Response
      try {
        response = await this.fetchImpl(current, {
          method: "GET",
          redirect: "manual",
          headers: {
            "User-Agent": this.config.fetch.userAgent,
            "Accept": "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
            "Accept-Language": this.config.fetch.acceptLanguage,
          },
          signal: AbortSignal.timeout(this.config.fetch.timeoutMs),
        })
      } catch (error) {
        throw new FetchError("unreachable", `URL을 가져올 수 없습니다: ${describe(error)}`, url)
      }

      if (response.status >= 300 && response.status < 400) {
        const location = response.headers.get("location")
        await discardBody(response)

        if (!location) {
          throw new FetchError("unreachable", `Redirect response without location from ${current}`, url)
        }

        current = await this.guard(location, url, current)
        continue
      }

      if (!response.ok) {
        await discardBody(response)
        throw new FetchError("status", `URL을 가져올 수 없습니다: HTTP ${response.status}`, url)
      }

      const contentTypeHeader = response.headers.get("content-type") ?? "text/html"
      const contentType = contentTypeHeader.split(";")[0]?.trim().toLowerCase() ?? "text/html"
      if (!ALLOWED_CONTENT_TYPES.includes(contentType)) {
        await discardBody(response)
        throw new FetchError("content_type", `지원하지 않는 콘텐츠 형식입니다: ${contentType}`, url)
      }

      try {
        const bytes = await readBodyWithLimit(response, this.config.fetch.maxFetchBytes)
        return decodeBody(bytes, contentTypeHeader)
      } catch (error) {
        throw new FetchError("unreachable", `URL을 가져올 수 없습니다: ${describe(error)}`, url)
      }
    }

    throw new FetchError("unreachable", "Too many redirects", url)
  }

  private async guard(target: string, requested: string, base?: URL): Promise<URL> {
    try {
      return await this.assertSafeUrl(base ? resolveLocation(target, base) : target)
    } catch (error) {
      if (error instanceof UnsafeUrlError) {
        throw new FetchError("unsafe", `허용되지 않는 URL입니다: ${error.message}`, requested)
      }
      if (error instanceof HostResolutionError) {
        throw new FetchError("unreachable", `URL을 가져올 수 없습니다: ${error.message}`, requested)
      }
      throw error
    }
  }
}

function resolveLocation(location: string, base: URL): string {
  try {
    return new URL(location, base).toString()
  } catch {
    return location
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

async function discardBody(response: Response): Promise<void> {
  try {
    await response.body?.cancel()
  } catch {
    // body already consumed or closed
  }
}

async function readBodyWithLimit(response: Response, maxBytes: number): Promise<Uint8Array> {
  const reader = response.body?.getReader()
  if (!reader) {
    return new Uint8Array(0)
  }

  let total = 0
  const chunks: Uint8Array[] = []

  while (true) {
    const result = await reader.read()
    if (result.done) {
      break
    }

    total += result.value.byteLength
    if (total > maxBytes) {
      await reader.cancel()
      throw new Error(`Page body exceeded max size of ${maxBytes} bytes`)
    }

    chunks.push(result.value)
  }

  const merged = new Uint8Array(total)
  let offset = 0
  for (const chunk of chunks) {
    merged.set(chunk, offset)
    offset += chunk.byteLength
  }

  return merged
}

const CHARSET_SNIFF_BYTES = 4096
const HEADER_CHARSET = /charset\s*=\s*["']?\s*([\w.:-]+)/i
const META_CHARSET = /<meta[^>]+charset\s*=\s*["']?\s*([\w.:-]+)/i

/**
 * Decodes with the charset from the content-type header, else from a
 * `<meta charset>` or `http-equiv` tag near the top of the page, else UTF-8.
 */
export function decodeBody(bytes: Uint8Array, contentTypeHeader: string): string {
  const declared =
    HEADER_CHARSET.exec(contentTypeHeader)?.[1] ??
    META_CHARSET.exec(new TextDecoder("latin1").decode(bytes.subarray(0, CHARSET_SNIFF_BYTES)))?.[1]

  return decoderFor(declared).decode(bytes)
}

function decoderFor(label: string | undefined): TextDecoder {
  if (!label) {
    return new TextDecoder()
  }

  try {
    return new TextDecoder(label.toLowerCase())
  } catch {
    return new TextDecoder()
  }
}
