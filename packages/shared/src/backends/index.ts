// =============================================================================
// @newsdesk/shared — Backend factory
// =============================================================================
// Builds the selected variant from the explicit Config value.
// =============================================================================

import { CREDENTIAL_KEYS, credentialFor, modelFor, type Config } from "../config.js";
import { ConfigurationError } from "../errors.js";
import type { ProviderName } from "../types.js";
import { createAnthropicBackend, createAnthropicClient } from "./anthropic.js";
import { createGeminiBackend, createGeminiClient } from "./gemini.js";
import { createOpenAIBackend, createOpenAIClient } from "./openai.js";
import type { SynthesisBackend, UsageRecord } from "./types.js";

export interface CreateBackendOptions {
  onUsage?: (record: UsageRecord) => void;
}

export function createSynthesisBackend(
  provider: ProviderName,
  config: Config,
  options: CreateBackendOptions = {},
): SynthesisBackend {
  const apiKey = credentialFor(config, provider);
  if (apiKey === undefined) {
    throw new ConfigurationError(
      CREDENTIAL_KEYS[provider],
      `${provider} API key not found`,
    );
  }

  const backendOptions = {
    model: modelFor(config, provider),
    maxTokens: config.MAX_TOKENS,
    onUsage: options.onUsage,
  };

  switch (provider) {
    case "anthropic":
      return createAnthropicBackend(createAnthropicClient(apiKey), backendOptions);
    case "openai":
      return createOpenAIBackend(createOpenAIClient(apiKey), backendOptions);
    case "gemini":
      return createGeminiBackend(createGeminiClient(apiKey), backendOptions);
  }
}

export * from "./types.js";
export { defineBackend, isNetworkError, DEFAULT_MAX_TOKENS, YES_NO_MAX_TOKENS } from "./backend.js";
export { PRICING, CHARS_PER_TOKEN, calculateCost, estimateTokens } from "./pricing.js";
export { buildSynthesisPrompt, formatItem, SYSTEM_PROMPT, ITEM_DELIMITER } from "./prompt.js";
export { createAnthropicBackend, createAnthropicClient, classifyAnthropicError } from "./anthropic.js";
export { createOpenAIBackend, createOpenAIClient, classifyOpenAIError } from "./openai.js";
export { createGeminiBackend, createGeminiClient, classifyGeminiError } from "./gemini.js";
