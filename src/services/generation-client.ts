import { createAnthropic } from "@ai-sdk/anthropic"
import { createOpenAI } from "@ai-sdk/openai"
import { generateText, streamText, type LanguageModel } from "ai"
import type { Logger } from "pino"
import type { LlmProvider, LlmSettings } from "../config"
import type { PromptPair } from "./prompt-builder"

export interface GenerationCredentials {
  apiKey: string
  model?: string
}

export interface ModelSelection {
  provider: LlmProvider
  model: string
  apiKey: string
}

export type ModelFactory = (selection: ModelSelection) => LanguageModel

/** Blocking and streaming article generation behind one seam. */
export interface TextGenerator {
  generate(prompts: PromptPair, credentials: GenerationCredentials): Promise<string>
  generateStream(prompts: PromptPair, credentials: GenerationCredentials): AsyncIterable<string>
}

interface GenerationClientDependencies {
  createModel?: ModelFactory
}

export class GenerationClient implements TextGenerator {
  private readonly createModel: ModelFactory

  constructor(
    private readonly settings: LlmSettings,
    private readonly logger: Logger,
    dependencies: GenerationClientDependencies = {},
  ) {
    this.createModel = dependencies.createModel ?? createProviderModel
  }

  async generate(prompts: PromptPair, credentials: GenerationCredentials): Promise<string> {
    const model = this.resolveModel(credentials)
    const startedAt = Date.now()

    const result = await generateText({
      model,
      system: prompts.system,
      prompt: prompts.user,
      temperature: this.settings.temperature,
      maxTokens: this.settings.maxOutputTokens,
      maxRetries: 0,
      abortSignal: this.settings.timeoutMs > 0 ? AbortSignal.timeout(this.settings.timeoutMs) : undefined,
    })

    this.logger.info(
      { provider: this.settings.provider, model: model.modelId, durationMs: Date.now() - startedAt },
      "article generated",
    )

    return cleanMarkdown(result.text.trim())
  }

  /**
   * Yields text deltas in arrival order. Ends at the first upstream error,
   * which is rethrown; leaving the loop early aborts the upstream request.
   */
  async *generateStream(prompts: PromptPair, credentials: GenerationCredentials): AsyncGenerator<string> {
    const model = this.resolveModel(credentials)
    const controller = new AbortController()
    const timer =
      this.settings.timeoutMs > 0
        ? setTimeout(() => controller.abort(new Error("Generation timed out")), this.settings.timeoutMs)
        : undefined
    let completed = false

    try {
      const result = streamText({
        model,
        system: prompts.system,
        prompt: prompts.user,
        temperature: this.settings.temperature,
        maxTokens: this.settings.maxOutputTokens,
        maxRetries: 0,
        abortSignal: controller.signal,
        onError: ({ error }) => {
          this.logger.debug({ error: error instanceof Error ? error.message : String(error) }, "generation stream error")
        },
      })

      for await (const part of result.fullStream) {
        if (part.type === "text-delta") {
          if (part.textDelta) {
            yield part.textDelta
          }
        } else if (part.type === "error") {
          throw part.error instanceof Error ? part.error : new Error(String(part.error))
        }
      }

      completed = true
    } finally {
      if (timer) {
        clearTimeout(timer)
      }
      if (!completed && !controller.signal.aborted) {
        controller.abort()
      }
    }
  }

  private resolveModel(credentials: GenerationCredentials): LanguageModel {
    return this.createModel({
      provider: this.settings.provider,
      model: credentials.model?.trim() || this.settings.model,
      apiKey: credentials.apiKey,
    })
  }
}

function createProviderModel(selection: ModelSelection): LanguageModel {
  if (selection.provider === "openai") {
    return createOpenAI({ apiKey: selection.apiKey })(selection.model)
  }

  return createAnthropic({ apiKey: selection.apiKey })(selection.model)
}

/**
 * Unwraps output the model wrapped in a single code fence: drops the opening
 * fence line and everything from the last fence on.
 */
export function cleanMarkdown(text: string): string {
  if (!text.startsWith("```") || !text.slice(3).includes("```")) {
    return text
  }

  const firstNewline = text.indexOf("\n")
  return text.slice(firstNewline + 1, text.lastIndexOf("```")).trim()
}
