// =============================================================================
// @newsdesk/shared — Synthesis backend contracts
// =============================================================================
// Every backend variant exposes the same two capabilities. The filter and
// orchestrator never branch on which variant they hold.
// =============================================================================

import type { SynthesisErrorKind } from "../errors.js";
import type { Batch, ModelPricing, ProviderName } from "../types.js";

export interface CallOptions {
  signal?: AbortSignal;
}

/** One request to the backend's wire protocol. */
export interface CompletionRequest {
  system?: string;
  prompt: string;
  maxTokens: number;
  temperature?: number;
  signal?: AbortSignal;
}

/** Token counts are left undefined when the backend does not report them. */
export interface CompletionResponse {
  text: string;
  inputTokens?: number;
  outputTokens?: number;
}

export interface SynthesisUsage {
  inputTokens: number;
  outputTokens: number;
  /** True when counts were derived from character length */
  estimated: boolean;
  costUsd: number;
}

export interface SynthesisResult {
  text: string;
  usage: SynthesisUsage;
  durationMs: number;
}

export type UsagePurpose = "synthesis" | "relevance";

export interface UsageRecord extends SynthesisUsage {
  backend: string;
  purpose: UsagePurpose;
  durationMs: number;
}

export interface SynthesisBackend {
  readonly name: ProviderName;
  readonly model: string;
  /** Display label, e.g. "OpenAI-gpt-4o-mini" */
  readonly label: string;
  synthesize(batch: Batch, options?: CallOptions): Promise<SynthesisResult>;
  /** Low-cost, deterministic, short answer call used by the relevance filter */
  cheapYesNo(prompt: string, options?: CallOptions): Promise<string>;
}

export interface BackendFailure {
  kind: SynthesisErrorKind;
  message: string;
}

export interface BackendOptions {
  model: string;
  maxTokens?: number;
  /** Invoked after every successful call */
  onUsage?: (record: UsageRecord) => void;
}

export interface BackendDefinition {
  name: ProviderName;
  displayName: string;
  model: string;
  maxTokens: number;
  pricing: Record<string, ModelPricing>;
  complete: (request: CompletionRequest) => Promise<CompletionResponse>;
  classifyError: (error: unknown) => BackendFailure;
  onUsage?: (record: UsageRecord) => void;
}
