// =============================================================================
// @newsdesk/shared — OpenAI (GPT) backend
// =============================================================================

import OpenAI from "openai";
import { toErrorMessage } from "../errors.js";
import { defineBackend, DEFAULT_MAX_TOKENS } from "./backend.js";
import { PRICING } from "./pricing.js";
import type {
  BackendFailure,
  BackendOptions,
  CompletionRequest,
  CompletionResponse,
  SynthesisBackend,
} from "./types.js";

type ChatMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;

export function createOpenAIClient(apiKey: string): OpenAI {
  return new OpenAI({ apiKey });
}

export function classifyOpenAIError(error: unknown): BackendFailure {
  if (error instanceof OpenAI.RateLimitError) {
    return {
      kind: "rate_limit",
      message: "Rate limit exceeded. Please wait and retry.",
    };
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return { kind: "connectivity", message: "Failed to connect to OpenAI API" };
  }
  if (error instanceof OpenAI.APIError) {
    return { kind: "backend", message: `API error: ${error.message}` };
  }
  return {
    kind: "unexpected",
    message: `Unexpected error: ${toErrorMessage(error)}`,
  };
}

export function createOpenAIBackend(
  client: OpenAI,
  options: BackendOptions,
): SynthesisBackend {
  async function complete(
    request: CompletionRequest,
  ): Promise<CompletionResponse> {
    const messages: ChatMessage[] = [];
    if (request.system !== undefined) {
      messages.push({ role: "system", content: request.system });
    }
    messages.push({ role: "user", content: request.prompt });

    const response = await client.chat.completions.create(
      {
        model: options.model,
        max_tokens: request.maxTokens,
        ...(request.temperature !== undefined && {
          temperature: request.temperature,
        }),
        messages,
      },
      { signal: request.signal },
    );

    return {
      text: response.choices[0]?.message?.content ?? "",
      inputTokens: response.usage?.prompt_tokens,
      outputTokens: response.usage?.completion_tokens,
    };
  }

  return defineBackend({
    name: "openai",
    displayName: "OpenAI",
    model: options.model,
    maxTokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
    pricing: PRICING.openai,
    complete,
    classifyError: classifyOpenAIError,
    onUsage: options.onUsage,
  });
}
