// =============================================================================
// @newsdesk/cli — Pipeline orchestrator
// =============================================================================
// Sequences fetch -> filter -> aggregate -> synthesize -> persist -> render
// for one run and produces a single RunResult:
// - per-source fetch failures are recorded and skipped; only an empty batch
//   is fatal
// - synthesis failures, including blank text, are fatal; there is no
//   mid-run backend fallback
// - storage and output failures are recorded but never flip success
// - metrics are flushed exactly once on every exit path
// =============================================================================

import {
  AggregatorError,
  FetchError,
  PipelineError,
  SynthesisError,
  toErrorMessage,
  type AnalysisSummary,
  type Batch,
  type Item,
  type PipelineState,
  type RelevanceFilter,
  type RunMetadata,
  type RunResult,
  type StoredAnalysis,
  type SynthesisBackend,
  type SynthesisResult,
} from "@newsdesk/shared";
import { createRunId, type Logger } from "./logger.js";
import type { MetricsAccumulator } from "./metrics.js";

// ---------------------------------------------------------------------------
// Collaborator contracts
// ---------------------------------------------------------------------------

export interface FetchOptions {
  signal?: AbortSignal;
}

/** Resolves to a non-empty list of validated items or rejects with FetchError. */
export interface Fetcher {
  fetch(source: string, options?: FetchOptions): Promise<Item[]>;
}

export interface Storage {
  save(batch: Batch, synthesis: string, metadata: RunMetadata): Promise<string>;
  load(identifier: string): Promise<StoredAnalysis>;
  listAll(): Promise<AnalysisSummary[]>;
}

export interface OutputRenderer {
  generate(synthesis: string, metadata: RunMetadata): Promise<string>;
}

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PipelineDependencies {
  fetcher: Fetcher;
  backend: SynthesisBackend;
  metrics: MetricsAccumulator;
  logger: Logger;
  /** Only consulted when a run has a topic */
  relevanceFilter?: RelevanceFilter;
  storage?: Storage;
  output?: OutputRenderer;
  /** Sources fetched at once (default 1, i.e. sequential) */
  fetchConcurrency?: number;
  now?: () => Date;
}

export interface RunOptions {
  signal?: AbortSignal;
}

export interface Pipeline {
  /**
   * Runs the pipeline once. Resolves with a successful RunResult; rejects
   * with a PipelineError carrying the RunResult when the run fails.
   */
  run(sources: string[], topic?: string, options?: RunOptions): Promise<RunResult>;
}

type SourceOutcome =
  | { ok: true; source: string; items: Item[]; rejected: number }
  | { ok: false; source: string; error: FetchError };

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isValidItem(item: Item): boolean {
  return item.title.trim() !== "" && item.link.trim() !== "";
}

function elapsedSeconds(start: number): number {
  return (performance.now() - start) / 1000;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createPipeline(deps: PipelineDependencies): Pipeline {
  const { fetcher, backend, metrics, relevanceFilter, storage, output } = deps;
  const concurrency = Math.max(1, deps.fetchConcurrency ?? 1);
  const now = deps.now ?? (() => new Date());

  async function fetchSource(
    source: string,
    topic: string | undefined,
    log: Logger,
    signal: AbortSignal | undefined,
  ): Promise<SourceOutcome> {
    const start = performance.now();
    log.info("Fetch started", { source });

    let fetched: Item[];
    try {
      fetched = await fetcher.fetch(source, { signal });
    } catch (error) {
      const fetchError =
        error instanceof FetchError
          ? error
          : new FetchError(source, `Unexpected error: ${toErrorMessage(error)}`, {
              cause: error,
            });
      const durationMs = performance.now() - start;
      metrics.recordFetchError(source, fetchError.message, durationMs);
      log.warn("Fetch failed", {
        source,
        error: fetchError.message,
        durationMs: Math.round(durationMs),
      });
      return { ok: false, source, error: fetchError };
    }

    const durationMs = performance.now() - start;
    metrics.recordFetchSuccess(source, fetched.length, durationMs);

    const items: Item[] = [];
    let rejected = 0;
    for (const item of fetched) {
      if (!isValidItem(item)) continue;
      if (topic !== undefined && relevanceFilter) {
        const relevant = await relevanceFilter.matches(topic, item, { signal });
        if (!relevant) {
          rejected++;
          continue;
        }
      }
      items.push(item);
    }

    log.info("Fetch succeeded", {
      source,
      fetched: fetched.length,
      kept: items.length,
      durationMs: Math.round(durationMs),
    });
    return { ok: true, source, items, rejected };
  }

  /** Bounded worker pool; outcomes keep source order. */
  async function fetchAll(
    sources: string[],
    topic: string | undefined,
    log: Logger,
    signal: AbortSignal | undefined,
  ): Promise<SourceOutcome[]> {
    const outcomes: SourceOutcome[] = new Array<SourceOutcome>(sources.length);
    let next = 0;

    async function worker(): Promise<void> {
      while (next < sources.length) {
        const index = next++;
        outcomes[index] = await fetchSource(sources[index], topic, log, signal);
      }
    }

    const workers = Array.from(
      { length: Math.min(concurrency, sources.length) },
      () => worker(),
    );
    await Promise.all(workers);
    return outcomes;
  }

  return {
    async run(
      sources: string[],
      topic?: string,
      options: RunOptions = {},
    ): Promise<RunResult> {
      if (sources.length === 0) {
        throw new AggregatorError(
          "At least one source must be supplied",
          "NO_SOURCES",
        );
      }

      const { signal } = options;
      const startedAt = performance.now();
      const log = deps.logger.child({ runId: createRunId() });
      const result: RunResult = {
        success: false,
        topic,
        sources: [...sources],
        itemsProcessed: 0,
        errors: [],
        duration: 0,
      };

      let state: PipelineState = "INIT";
      function transition(next: PipelineState): void {
        log.info("Pipeline state changed", { from: state, to: next });
        state = next;
      }

      function throwIfCancelled(): void {
        if (signal?.aborted) {
          throw new PipelineError("Run cancelled", "CANCELLED", result, {
            cause: signal.reason,
          });
        }
      }

      try {
        log.info("Starting pipeline", {
          topic: topic ?? "None specified",
          sources: sources.length,
          backend: backend.label,
        });
        throwIfCancelled();

        // --- Fetch (relevance filtering inline) ---
        transition("FETCHING");
        const outcomes = await fetchAll(sources, topic, log, signal);
        throwIfCancelled();

        const batch: Item[] = [];
        const failedSources: string[] = [];
        let rejected = 0;
        for (const outcome of outcomes) {
          if (outcome.ok) {
            batch.push(...outcome.items);
            rejected += outcome.rejected;
          } else {
            failedSources.push(outcome.source);
            result.errors.push({
              phase: "fetch",
              source: outcome.source,
              message: outcome.error.message,
            });
          }
        }

        if (batch.length === 0) {
          const failed =
            failedSources.length > 0 ? `. Failed sources: ${failedSources.join(", ")}` : "";
          let message: string;
          let code: string;
          if (rejected > 0) {
            message = `No items matched topic "${topic ?? ""}"`;
            code = "NO_MATCHING_ITEMS";
          } else if (failedSources.length === sources.length) {
            message = `No items fetched from any source${failed}`;
            code = "ALL_SOURCES_FAILED";
          } else {
            message = `No valid items fetched from any source${failed}`;
            code = "NO_ITEMS_FETCHED";
          }
          metrics.recordError("fetch", message);
          throw new PipelineError(message, code, result);
        }

        result.itemsProcessed = batch.length;
        transition("AGGREGATED");
        log.info("Fetch phase complete", {
          items: batch.length,
          succeededSources: sources.length - failedSources.length,
          totalSources: sources.length,
        });

        // --- Synthesize (fatal on failure) ---
        transition("SYNTHESIZING");
        const synthesisStart = performance.now();
        let synthesis: SynthesisResult;
        try {
          synthesis = await backend.synthesize(batch, { signal });
        } catch (error) {
          const message = toErrorMessage(error);
          metrics.recordProcessError(
            backend.label,
            message,
            performance.now() - synthesisStart,
          );
          result.errors.push({ phase: "process", message });
          throwIfCancelled();
          throw new PipelineError(
            message,
            error instanceof SynthesisError ? error.code : "SYNTHESIS_UNEXPECTED",
            result,
            { cause: error },
          );
        }

        if (synthesis.text.trim() === "") {
          const failure = new SynthesisError(backend.name, "backend", "Empty response from backend");
          metrics.recordProcessError(
            backend.label,
            failure.message,
            performance.now() - synthesisStart,
          );
          result.errors.push({ phase: "process", message: failure.message });
          throw new PipelineError(failure.message, failure.code, result, { cause: failure });
        }

        log.info("Synthesis completed", {
          backend: backend.label,
          durationMs: Math.round(synthesis.durationMs),
          inputTokens: synthesis.usage.inputTokens,
          outputTokens: synthesis.usage.outputTokens,
          estimated: synthesis.usage.estimated,
          costUsd: synthesis.usage.costUsd,
        });

        const metadata: RunMetadata = {
          topic,
          sources: [...sources],
          itemCount: batch.length,
          timestamp: now().toISOString(),
          failedSources,
          provider: backend.name,
          model: backend.model,
        };

        // --- Persist (optional, non-fatal) ---
        if (storage) {
          transition("PERSISTING");
          try {
            result.storageId = await storage.save(batch, synthesis.text, metadata);
            log.info("Storage save successful", { storageId: result.storageId });
          } catch (error) {
            const message = toErrorMessage(error);
            metrics.recordError("storage", message);
            result.errors.push({ phase: "storage", message });
            log.error("Storage save failed", { error: message });
          }
        }

        // --- Render (optional, non-fatal) ---
        if (output) {
          transition("RENDERING");
          try {
            result.outputPath = await output.generate(synthesis.text, metadata);
            log.info("Output generated", { outputPath: result.outputPath });
          } catch (error) {
            const message = toErrorMessage(error);
            metrics.recordError("output", message);
            result.errors.push({ phase: "output", message });
            log.error("Output generation failed", { error: message });
          }
        }

        result.synthesis = synthesis.text;
        result.success = true;
        transition("DONE");
        log.info("Pipeline completed", {
          durationSeconds: Number(elapsedSeconds(startedAt).toFixed(2)),
          errors: result.errors.length,
        });
        return result;
      } catch (error) {
        transition("FAILED");

        let failure: PipelineError;
        if (error instanceof PipelineError) {
          failure = error;
        } else if (signal?.aborted) {
          failure = new PipelineError("Run cancelled", "CANCELLED", result, {
            cause: error,
          });
        } else {
          failure = new PipelineError(
            `Pipeline failed with unexpected error: ${toErrorMessage(error)}`,
            "UNEXPECTED",
            result,
            { cause: error },
          );
        }

        log.error("Pipeline failed", { code: failure.code, error: failure.message });
        throw failure;
      } finally {
        result.duration = elapsedSeconds(startedAt);
        try {
          const file = await metrics.flush();
          log.debug("Metrics saved", { file });
        } catch (error) {
          log.warn("Failed to save metrics", { error: toErrorMessage(error) });
        }
      }
    },
  };
}
