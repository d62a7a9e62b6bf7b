export function jsonResponse(
  payload: unknown,
  status = 200,
  headers: Record<string, string> = {},
): Response {
  return new Response(JSON.stringify(payload), {
    status,
    headers: {
      "content-type": "application/json; charset=utf-8",
      ...headers,
    },
  })
}

export function errorResponse(
  status: number,
  message: string,
  details?: unknown,
  headers: Record<string, string> = {},
): Response {
  return jsonResponse(
    {
      error: {
        message,
        details,
      },
    },
    status,
    headers,
  )
}

export async function readJsonBody(request: Request): Promise<unknown> {
  try {
    return await request.json()
  } catch {
    return null
  }
}

/**
 * Streams text chunks as a `text/plain` body. Cancelling the body (client
 * disconnect) closes the source iterator so the producer stops as well.
 */
export function textStreamResponse(
  chunks: AsyncIterable<string>,
  headers: Record<string, string> = {},
): Response {
  const encoder = new TextEncoder()
  const iterator = chunks[Symbol.asyncIterator]()

  const body = new ReadableStream<Uint8Array>({
    async pull(controller) {
      try {
        const next = await iterator.next()
        if (next.done) {
          controller.close()
          return
        }
        controller.enqueue(encoder.encode(next.value))
      } catch (error) {
        controller.error(error)
      }
    },
    async cancel() {
      await iterator.return?.()
    },
  })

  return new Response(body, {
    status: 200,
    headers: {
      "content-type": "text/plain; charset=utf-8",
      "cache-control": "no-cache",
      ...headers,
    },
  })
}

export function clientIdFromRequest(request: Request, peerAddress?: string): string {
  const forwarded = request.headers.get("x-forwarded-for")
  if (forwarded) {
    const first = forwarded.split(",")[0]?.trim()
    if (first) {
      return first
    }
  }

  return peerAddress || "unknown"
}
