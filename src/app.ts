import { clientIdFromRequest, errorResponse } from "./lib/http"
import { handleGenerate, handleGenerateFromUrl, handleGenerateFromUrlStream, handleGenerateStream } from "./routes/generate"
import { handleHealthz } from "./routes/healthz"
import { handleReadyz } from "./routes/readyz"
import { handleRegions } from "./routes/regions"
import { handleTrends } from "./routes/trends"
import type { ServerContext } from "./server-context"
import type { SlidingWindowRateLimiter } from "./services/rate-limiter"

type RouteHandler = (request: Request, ctx: ServerContext) => Response | Promise<Response>

interface Route {
  method: "GET" | "POST"
  handler: RouteHandler
  limiter?: (ctx: ServerContext) => SlidingWindowRateLimiter
}

const generateLimiter = (ctx: ServerContext) => ctx.generateLimiter
const trendsLimiter = (ctx: ServerContext) => ctx.trendsLimiter

const ROUTES: Record<string, Route> = {
  "/healthz": { method: "GET", handler: handleHealthz },
  "/readyz": { method: "GET", handler: handleReadyz },
  "/api/regions": { method: "GET", handler: handleRegions },
  "/api/trends": { method: "GET", handler: handleTrends, limiter: trendsLimiter },
  "/api/generate": { method: "POST", handler: handleGenerate, limiter: generateLimiter },
  "/api/generate/stream": { method: "POST", handler: handleGenerateStream, limiter: generateLimiter },
  "/api/generate-from-url": { method: "POST", handler: handleGenerateFromUrl, limiter: generateLimiter },
  "/api/generate-from-url/stream": { method: "POST", handler: handleGenerateFromUrlStream, limiter: generateLimiter },
}

export type RequestHandler = (request: Request, peerAddress?: string) => Promise<Response>

export function createRequestHandler(ctx: ServerContext): RequestHandler {
  return async (request, peerAddress) => {
    const started = Date.now()
    const { pathname } = new URL(request.url)
    const clientId = clientIdFromRequest(request, peerAddress)

    let response: Response
    try {
      response = await dispatch(request, pathname, clientId, ctx)
    } catch (error) {
      ctx.loggers.app.error({ error, pathname }, "unhandled request error")
      response = errorResponse(500, "Internal server error")
    }

    ctx.loggers.app.info(
      {
        method: request.method,
        pathname,
        clientId,
        status: response.status,
        durationMs: Date.now() - started,
      },
      "http request",
    )

    return response
  }
}

async function dispatch(request: Request, pathname: string, clientId: string, ctx: ServerContext): Promise<Response> {
  const route = ROUTES[pathname]
  if (!route) {
    return errorResponse(404, "Route not found")
  }

  if (request.method !== route.method) {
    return errorResponse(405, "Method not allowed")
  }

  if (route.limiter) {
    const decision = route.limiter(ctx).consume(clientId)
    if (!decision.allowed) {
      ctx.loggers.security.warn({ clientId, pathname, retryAfterSeconds: decision.retryAfterSeconds }, "rate limit exceeded")
      return errorResponse(
        429,
        `요청이 너무 많습니다. ${decision.retryAfterSeconds}초 후에 다시 시도해 주세요.`,
        undefined,
        { "Retry-After": String(decision.retryAfterSeconds) },
      )
    }
  }

  return route.handler(request, ctx)
}
