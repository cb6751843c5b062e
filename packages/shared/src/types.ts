// =============================================================================
// @newsdesk/shared — Item, batch, and run result model
// =============================================================================
// Entities flowing through every pipeline stage: ingested items, the batch
// they accumulate into, the per-run result record, and the storage and
// metadata shapes exchanged with the collaborators.
// =============================================================================

// ---------------------------------------------------------------------------
// Enums & Union Types
// ---------------------------------------------------------------------------

/** Synthesis backends the system knows how to talk to */
export type ProviderName = "anthropic" | "openai" | "gemini";

/** Phases that can record an error into a RunResult */
export type RunPhase = "fetch" | "process" | "storage" | "output";

/** Orchestrator states, linear with FAILED as the absorbing state */
export type PipelineState =
  | "INIT"
  | "FETCHING"
  | "AGGREGATED"
  | "SYNTHESIZING"
  | "PERSISTING"
  | "RENDERING"
  | "DONE"
  | "FAILED";

/** Why the relevance filter reached its decision */
export type RelevanceBasis =
  | "no-topic"
  | "semantic"
  | "keyword"
  | "keyword-fallback";

// ---------------------------------------------------------------------------
// Item & Batch
// ---------------------------------------------------------------------------

/** A single ingested unit, e.g. a news article. Title and link are non-empty. */
export interface Item {
  readonly title: string;
  readonly link: string;
  readonly summary: string;
  /** Free-form timestamp string as given by the source */
  readonly published: string;
  /** Origin identifier, usually the feed URL */
  readonly source: string;
  readonly sourceName: string;
  readonly authors: readonly string[];
  readonly tags: readonly string[];
}

/** Items from all sources of one run, in source order then feed order */
export type Batch = readonly Item[];

// ---------------------------------------------------------------------------
// Run result
// ---------------------------------------------------------------------------

export interface RunError {
  phase: RunPhase;
  source?: string;
  message: string;
}

export interface RunResult {
  success: boolean;
  topic?: string;
  sources: string[];
  itemsProcessed: number;
  errors: RunError[];
  synthesis?: string;
  storageId?: string;
  outputPath?: string;
  /** Seconds from entry to exit */
  duration: number;
}

// ---------------------------------------------------------------------------
// Metadata & storage records
// ---------------------------------------------------------------------------

export interface RunMetadata {
  topic?: string;
  sources: string[];
  itemCount: number;
  timestamp: string;
  failedSources: string[];
  provider?: ProviderName;
  model?: string;
}

export interface StoredAnalysis {
  identifier: string;
  timestamp: string;
  synthesis: string;
  batch: Item[];
  metadata: RunMetadata;
}

export interface AnalysisSummary {
  identifier: string;
  timestamp: string;
  topic?: string;
  sources: string[];
  itemCount: number;
}

// ---------------------------------------------------------------------------
// Provider configuration
// ---------------------------------------------------------------------------

/** Price per single token, in USD */
export interface ModelPricing {
  input: number;
  output: number;
}

export interface ProviderConfig {
  name: ProviderName;
  hasCredential: boolean;
  model: string;
  pricing: Record<string, ModelPricing>;
}

// ---------------------------------------------------------------------------
// Logging
// ---------------------------------------------------------------------------

/**
 * Minimal structural logger accepted by shared components. The CLI logger
 * satisfies it; tests can pass a stub.
 */
export interface LogSink {
  debug: (msg: string, data?: Record<string, unknown>) => void;
  info: (msg: string, data?: Record<string, unknown>) => void;
  warn: (msg: string, data?: Record<string, unknown>) => void;
}

export const silentLog: LogSink = {
  debug: () => {},
  info: () => {},
  warn: () => {},
};
