// =============================================================================
// @newsdesk/shared — Backend behaviour common to all variants
// =============================================================================
// Turns a variant's wire call and error classifier into a SynthesisBackend:
// prompt building, output caps, usage resolution, cost, and uniform
// SynthesisError wrapping.
// =============================================================================

import { SynthesisError, toErrorMessage } from "../errors.js";
import type { Batch } from "../types.js";
import { buildSynthesisPrompt, SYSTEM_PROMPT } from "./prompt.js";
import { calculateCost, estimateTokens } from "./pricing.js";
import type {
  BackendDefinition,
  BackendFailure,
  CallOptions,
  CompletionResponse,
  SynthesisBackend,
  SynthesisResult,
  SynthesisUsage,
  UsagePurpose,
} from "./types.js";

export const DEFAULT_MAX_TOKENS = 4096;
export const YES_NO_MAX_TOKENS = 10;

const NETWORK_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "EAI_AGAIN",
  "ETIMEDOUT",
  "UND_ERR_CONNECT_TIMEOUT",
]);

/**
 * True for failures raised below HTTP: DNS, refused or reset connections,
 * and undici's "fetch failed" TypeError.
 */
export function isNetworkError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const code = "code" in error ? error.code : undefined;
  if (typeof code === "string" && NETWORK_ERROR_CODES.has(code)) return true;
  if (error instanceof TypeError && error.message === "fetch failed") {
    return true;
  }
  return error.cause !== undefined && isNetworkError(error.cause);
}

function resolveUsage(
  definition: BackendDefinition,
  promptText: string,
  response: CompletionResponse,
): SynthesisUsage {
  const estimated =
    response.inputTokens === undefined || response.outputTokens === undefined;
  const inputTokens = response.inputTokens ?? estimateTokens(promptText);
  const outputTokens = response.outputTokens ?? estimateTokens(response.text);

  return {
    inputTokens,
    outputTokens,
    estimated,
    costUsd: calculateCost(
      definition.pricing,
      definition.model,
      inputTokens,
      outputTokens,
    ),
  };
}

export function defineBackend(definition: BackendDefinition): SynthesisBackend {
  const label = `${definition.displayName}-${definition.model}`;

  function wrap(error: unknown): SynthesisError {
    if (error instanceof SynthesisError) return error;
    let failure: BackendFailure;
    try {
      failure = definition.classifyError(error);
    } catch {
      failure = { kind: "unexpected", message: toErrorMessage(error) };
    }
    return new SynthesisError(definition.name, failure.kind, failure.message, {
      cause: error,
    });
  }

  async function call(
    purpose: UsagePurpose,
    system: string | undefined,
    prompt: string,
    maxTokens: number,
    temperature: number | undefined,
    options: CallOptions | undefined,
  ): Promise<{ text: string; usage: SynthesisUsage; durationMs: number }> {
    const start = performance.now();
    let response: CompletionResponse;
    try {
      response = await definition.complete({
        system,
        prompt,
        maxTokens,
        temperature,
        signal: options?.signal,
      });
    } catch (error) {
      throw wrap(error);
    }

    const durationMs = performance.now() - start;
    const usage = resolveUsage(definition, (system ?? "") + prompt, response);
    definition.onUsage?.({ backend: label, purpose, durationMs, ...usage });
    return { text: response.text, usage, durationMs };
  }

  return {
    name: definition.name,
    model: definition.model,
    label,

    async synthesize(
      batch: Batch,
      options?: CallOptions,
    ): Promise<SynthesisResult> {
      const prompt = buildSynthesisPrompt(batch);
      const result = await call(
        "synthesis",
        SYSTEM_PROMPT,
        prompt,
        definition.maxTokens,
        undefined,
        options,
      );

      if (result.text.trim() === "") {
        throw new SynthesisError(
          definition.name,
          "backend",
          "Empty response from backend",
        );
      }
      return result;
    },

    async cheapYesNo(prompt: string, options?: CallOptions): Promise<string> {
      const result = await call(
        "relevance",
        undefined,
        prompt,
        YES_NO_MAX_TOKENS,
        0,
        options,
      );
      return result.text;
    },
  };
}
