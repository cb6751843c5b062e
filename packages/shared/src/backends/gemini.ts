// =============================================================================
// @newsdesk/shared — Google Gemini backend
// =============================================================================
// Gemini does not always report usage metadata; missing counts are estimated
// from character length by the shared backend logic.
// =============================================================================

import { ApiError, GoogleGenAI } from "@google/genai";
import { toErrorMessage } from "../errors.js";
import { defineBackend, DEFAULT_MAX_TOKENS, isNetworkError } from "./backend.js";
import { PRICING } from "./pricing.js";
import type {
  BackendFailure,
  BackendOptions,
  CompletionRequest,
  CompletionResponse,
  SynthesisBackend,
} from "./types.js";

export function createGeminiClient(apiKey: string): GoogleGenAI {
  return new GoogleGenAI({ apiKey });
}

export function classifyGeminiError(error: unknown): BackendFailure {
  if (error instanceof ApiError) {
    if (error.status === 429 || error.message.includes("RESOURCE_EXHAUSTED")) {
      return {
        kind: "rate_limit",
        message: "Rate limit exceeded or quota exhausted",
      };
    }
    return { kind: "backend", message: `API error: ${error.message}` };
  }
  if (isNetworkError(error)) {
    return { kind: "connectivity", message: "Failed to connect to Gemini API" };
  }
  return {
    kind: "unexpected",
    message: `Unexpected error: ${toErrorMessage(error)}`,
  };
}

export function createGeminiBackend(
  client: GoogleGenAI,
  options: BackendOptions,
): SynthesisBackend {
  async function complete(
    request: CompletionRequest,
  ): Promise<CompletionResponse> {
    const response = await client.models.generateContent({
      model: options.model,
      contents: request.prompt,
      config: {
        maxOutputTokens: request.maxTokens,
        ...(request.system !== undefined && {
          systemInstruction: request.system,
        }),
        ...(request.temperature !== undefined && {
          temperature: request.temperature,
        }),
        ...(request.signal !== undefined && { abortSignal: request.signal }),
      },
    });

    return {
      text: response.text ?? "",
      inputTokens: response.usageMetadata?.promptTokenCount,
      outputTokens: response.usageMetadata?.candidatesTokenCount,
    };
  }

  return defineBackend({
    name: "gemini",
    displayName: "Gemini",
    model: options.model,
    maxTokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
    pricing: PRICING.gemini,
    complete,
    classifyError: classifyGeminiError,
    onUsage: options.onUsage,
  });
}
