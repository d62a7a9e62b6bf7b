import { APICallError } from "ai"

export type GenerationFailureCategory =
  | { kind: "insufficient_credit" }
  | { kind: "rate_limited" }
  | { kind: "bad_credential" }
  | { kind: "unknown_model" }
  | { kind: "upstream"; message: string }

export interface ClassifyOptions {
  /** Only the blocking keyword flow reports unknown models separately. */
  detectUnknownModel?: boolean
}

const CREDIT_MARKERS = ["credit", "billing", "purchase credits", "too low", "upgrade", "plans"]

/** Maps a generation failure to a user-facing category; the first matching rule wins. */
export function classifyGenerationError(error: unknown, options: ClassifyOptions = {}): GenerationFailureCategory {
  const message = errorMessage(error)
  const text = `${message} ${responseBody(error)}`.toLowerCase()

  if (CREDIT_MARKERS.some((marker) => text.includes(marker)) || (text.includes("balance") && text.includes("low"))) {
    return { kind: "insufficient_credit" }
  }

  if (text.includes("rate") && text.includes("limit")) {
    return { kind: "rate_limited" }
  }

  if ((text.includes("invalid") && (text.includes("key") || text.includes("api"))) || text.includes("authentication")) {
    return { kind: "bad_credential" }
  }

  if (options.detectUnknownModel && text.includes("not_found") && text.includes("model")) {
    return { kind: "unknown_model" }
  }

  return { kind: "upstream", message }
}

export function userMessageFor(category: GenerationFailureCategory): string {
  switch (category.kind) {
    case "insufficient_credit":
      return "API 크레딧이 부족합니다. 제공사 콘솔의 Plans & Billing 에서 크레딧을 충전해 주세요."
    case "rate_limited":
      return "API 요청 한도를 초과했습니다. 잠시 후 다시 시도해 주세요."
    case "bad_credential":
      return "API 키가 올바르지 않습니다. 키를 확인해 주세요."
    case "unknown_model":
      return "설정된 모델을 찾을 수 없습니다. TRENDWRITER_LLM_MODEL 설정을 확인해 주세요."
    case "upstream":
      return category.message
  }
}

export class GenerationFailedError extends Error {
  constructor(
    readonly category: GenerationFailureCategory,
    options?: { cause?: unknown },
  ) {
    super(userMessageFor(category), options)
    this.name = "GenerationFailedError"
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

function responseBody(error: unknown): string {
  if (APICallError.isInstance(error)) {
    return error.responseBody ?? ""
  }

  return ""
}
