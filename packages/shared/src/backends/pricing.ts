// =============================================================================
// @newsdesk/shared — Per-backend pricing tables and cost estimation
// =============================================================================
// Rates are USD per single token. Only used for cost reporting.
// =============================================================================

import type { ModelPricing, ProviderName } from "../types.js";

const PER_MILLION = 1_000_000;

function perMillion(input: number, output: number): ModelPricing {
  return { input: input / PER_MILLION, output: output / PER_MILLION };
}

export const PRICING: Record<ProviderName, Record<string, ModelPricing>> = {
  anthropic: {
    "claude-3-haiku-20240307": perMillion(0.25, 1.25),
    "claude-3-5-sonnet-20241022": perMillion(3.0, 15.0),
  },
  openai: {
    "gpt-4o-mini": perMillion(0.15, 0.6),
    "gpt-4o": perMillion(2.5, 10.0),
    "gpt-4-turbo": perMillion(10.0, 30.0),
  },
  gemini: {
    "gemini-1.5-flash": perMillion(0.075, 0.3),
    "gemini-1.5-pro": perMillion(1.25, 5.0),
    "gemini-pro": perMillion(0.5, 1.5),
  },
};

/** Ratio used when a backend does not report token counts */
export const CHARS_PER_TOKEN = 4;

export function estimateTokens(text: string): number {
  return Math.floor(text.length / CHARS_PER_TOKEN);
}

/** Unknown models cost 0. */
export function calculateCost(
  pricing: Record<string, ModelPricing>,
  model: string,
  inputTokens: number,
  outputTokens: number,
): number {
  const rates = Object.hasOwn(pricing, model) ? pricing[model] : undefined;
  if (!rates) return 0;
  return inputTokens * rates.input + outputTokens * rates.output;
}
