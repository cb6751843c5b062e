// =============================================================================
// @newsdesk/shared — Error taxonomy
// =============================================================================
// AggregatorError is the umbrella every other kind extends, so callers have
// one catch-all. Each error keeps the original cause.
// =============================================================================

import type { ProviderName, RunResult } from "./types.js";

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class AggregatorError extends Error {
  constructor(
    message: string,
    public readonly code: string = "AGGREGATOR_ERROR",
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "AggregatorError";
  }
}

/** Missing credential, unknown provider, invalid setting. Always fatal. */
export class ConfigurationError extends AggregatorError {
  constructor(
    public readonly configKey: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Configuration error (${configKey}): ${message}`, "CONFIG_ERROR", options);
    this.name = "ConfigurationError";
  }
}

export class FetchError extends AggregatorError {
  constructor(
    public readonly source: string,
    message: string,
    options?: { cause?: unknown; code?: string },
  ) {
    super(
      `Failed to fetch from ${source}: ${message}`,
      options?.code ?? "FETCH_ERROR",
      options,
    );
    this.name = "FetchError";
  }
}

export type SynthesisErrorKind =
  | "rate_limit"
  | "connectivity"
  | "backend"
  | "unexpected";

export class SynthesisError extends AggregatorError {
  constructor(
    public readonly backend: ProviderName,
    public readonly kind: SynthesisErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(
      `Processing failed (${backend}): ${message}`,
      `SYNTHESIS_${kind.toUpperCase()}`,
      options,
    );
    this.name = "SynthesisError";
  }
}

export class StorageError extends AggregatorError {
  constructor(
    public readonly operation: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Storage ${operation} failed: ${message}`, "STORAGE_ERROR", options);
    this.name = "StorageError";
  }
}

export class OutputError extends AggregatorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`Output generation failed: ${message}`, "OUTPUT_ERROR", options);
    this.name = "OutputError";
  }
}

/**
 * A run that ended in the FAILED state. Carries the RunResult as it stood
 * when the run unwound (duration set, errors appended).
 */
export class PipelineError extends AggregatorError {
  constructor(
    message: string,
    code: string,
    public readonly result: RunResult,
    options?: { cause?: unknown },
  ) {
    super(message, code, options);
    this.name = "PipelineError";
  }
}
