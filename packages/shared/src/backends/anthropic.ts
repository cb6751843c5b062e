// =============================================================================
// @newsdesk/shared — Anthropic (Claude) backend
// =============================================================================

import Anthropic from "@anthropic-ai/sdk";
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

export function createAnthropicClient(apiKey: string): Anthropic {
  return new Anthropic({ apiKey });
}

export function classifyAnthropicError(error: unknown): BackendFailure {
  if (error instanceof Anthropic.RateLimitError) {
    return {
      kind: "rate_limit",
      message: "Rate limit exceeded. Please wait and retry.",
    };
  }
  if (error instanceof Anthropic.APIConnectionError) {
    return { kind: "connectivity", message: "Failed to connect to Anthropic API" };
  }
  if (error instanceof Anthropic.APIError) {
    return { kind: "backend", message: `API error: ${error.message}` };
  }
  return {
    kind: "unexpected",
    message: `Unexpected error: ${toErrorMessage(error)}`,
  };
}

export function createAnthropicBackend(
  client: Anthropic,
  options: BackendOptions,
): SynthesisBackend {
  async function complete(
    request: CompletionRequest,
  ): Promise<CompletionResponse> {
    const response = await client.messages.create(
      {
        model: options.model,
        max_tokens: request.maxTokens,
        ...(request.system !== undefined && { system: request.system }),
        ...(request.temperature !== undefined && {
          temperature: request.temperature,
        }),
        messages: [{ role: "user", content: request.prompt }],
      },
      { signal: request.signal },
    );

    const text = response.content
      .filter((block) => block.type === "text")
      .map((block) => (block.type === "text" ? block.text : ""))
      .join("");

    return {
      text,
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
    };
  }

  return defineBackend({
    name: "anthropic",
    displayName: "Claude",
    model: options.model,
    maxTokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
    pricing: PRICING.anthropic,
    complete,
    classifyError: classifyAnthropicError,
    onUsage: options.onUsage,
  });
}
