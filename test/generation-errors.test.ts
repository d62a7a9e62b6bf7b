import { APICallError } from "ai"
import { describe, expect, test } from "vitest"
import {
  classifyGenerationError,
  GenerationFailedError,
  userMessageFor,
} from "../src/services/generation-errors"

function apiError(message: string, responseBody: string) {
  return new APICallError({
    message,
    url: "https://llm.example/v1/messages",
    requestBodyValues: {},
    statusCode: 400,
    responseBody,
  })
}

describe("classifyGenerationError", () => {
  test("detects exhausted credit from the message", () => {
    expect(classifyGenerationError(new Error("Your credit balance is too low"))).toEqual({ kind: "insufficient_credit" })
  })

  test("detects exhausted credit from the response body", () => {
    const error = apiError("Bad Request", '{"error":{"message":"Please go to Plans & Billing to purchase credits."}}')

    expect(classifyGenerationError(error)).toEqual({ kind: "insufficient_credit" })
  })

  test("detects rate limiting", () => {
    expect(classifyGenerationError(new Error("Rate limit exceeded"))).toEqual({ kind: "rate_limited" })
  })

  test("detects bad credentials", () => {
    expect(classifyGenerationError(new Error("invalid x-api-key"))).toEqual({ kind: "bad_credential" })
    expect(classifyGenerationError(new Error("authentication_error"))).toEqual({ kind: "bad_credential" })
  })

  test("reports unknown models only when asked to", () => {
    const error = new Error("not_found_error: model: test-model")

    expect(classifyGenerationError(error, { detectUnknownModel: true })).toEqual({ kind: "unknown_model" })
    expect(classifyGenerationError(error)).toEqual({
      kind: "upstream",
      message: "not_found_error: model: test-model",
    })
  })

  test("applies rules in order", () => {
    expect(classifyGenerationError(new Error("rate limit reached, upgrade your plan"))).toEqual({
      kind: "insufficient_credit",
    })
  })

  test("passes other failures through", () => {
    expect(classifyGenerationError(new Error("socket hang up"))).toEqual({ kind: "upstream", message: "socket hang up" })
    expect(classifyGenerationError("boom")).toEqual({ kind: "upstream", message: "boom" })
  })
})

describe("user messages", () => {
  test("uses the raw message for upstream failures", () => {
    expect(userMessageFor({ kind: "upstream", message: "socket hang up" })).toBe("socket hang up")
  })

  test("carries the category's message on the error", () => {
    const cause = new Error("Rate limit exceeded")
    const error = new GenerationFailedError({ kind: "rate_limited" }, { cause })

    expect(error.message).toBe("API 요청 한도를 초과했습니다. 잠시 후 다시 시도해 주세요.")
    expect(error.cause).toBe(cause)
    expect(error.name).toBe("GenerationFailedError")
  })
})
