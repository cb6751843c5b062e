// =============================================================================
// @newsdesk/cli — Session metrics and cost accumulator
// =============================================================================
// Passive sink written by every pipeline phase: operation timings, token
// counts, and cost per backend. Writes are synchronous calls on the event
// loop, so concurrent phases cannot interleave a partial update. flush()
// persists metrics_<session>.json once per accumulator.
// =============================================================================

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { UsageRecord } from "@newsdesk/shared";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type MetricsOperation =
  | {
      type: "fetch";
      source: string;
      itemCount: number;
      durationMs: number;
      timestamp: string;
    }
  | {
      type: "process";
      backend: string;
      durationMs: number;
      tokens: number;
      cost: number;
      estimated: boolean;
      timestamp: string;
    };

export interface MetricsErrorRecord {
  type: string;
  source?: string;
  backend?: string;
  message: string;
  durationMs?: number;
  timestamp: string;
}

export interface MetricsSnapshot {
  sessionId: string;
  sessionStart: string;
  sessionEnd?: string;
  operations: MetricsOperation[];
  errors: MetricsErrorRecord[];
  costs: { total: number; byBackend: Record<string, number> };
  tokens: { input: number; output: number };
  relevanceCalls: number;
  performance: {
    fetchTimesMs: number[];
    processTimesMs: number[];
    totalItems: number;
  };
}

export interface MetricsSummary {
  totalOperations: number;
  totalErrors: number;
  totalItems: number;
  totalCost: number;
  avgFetchMs: number;
  avgProcessMs: number;
  relevanceCalls: number;
  costByBackend: Record<string, number>;
}

export interface MetricsAccumulator {
  readonly sessionId: string;
  recordFetchSuccess(source: string, itemCount: number, durationMs: number): void;
  recordFetchError(source: string, message: string, durationMs: number): void;
  recordUsage(record: UsageRecord): void;
  recordProcessError(backend: string, message: string, durationMs: number): void;
  recordError(type: string, message: string): void;
  summary(): MetricsSummary;
  snapshot(): MetricsSnapshot;
  /** Writes the metrics file once; later calls resolve to the same path. */
  flush(): Promise<string>;
}

export interface MetricsOptions {
  logDir: string;
  now?: () => Date;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local time as YYYYMMDD_HHMMSS */
export function formatSessionId(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

function average(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((acc, v) => acc + v, 0) / values.length;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createMetricsAccumulator(
  options: MetricsOptions,
): MetricsAccumulator {
  const now = options.now ?? (() => new Date());
  const started = now();
  const sessionId = formatSessionId(started);

  const state: MetricsSnapshot = {
    sessionId,
    sessionStart: started.toISOString(),
    operations: [],
    errors: [],
    costs: { total: 0, byBackend: {} },
    tokens: { input: 0, output: 0 },
    relevanceCalls: 0,
    performance: { fetchTimesMs: [], processTimesMs: [], totalItems: 0 },
  };

  let flushing: Promise<string> | undefined;

  function timestamp(): string {
    return now().toISOString();
  }

  function snapshot(): MetricsSnapshot {
    return structuredClone(state);
  }

  return {
    sessionId,

    recordFetchSuccess(source, itemCount, durationMs) {
      state.operations.push({
        type: "fetch",
        source,
        itemCount,
        durationMs,
        timestamp: timestamp(),
      });
      state.performance.fetchTimesMs.push(durationMs);
      state.performance.totalItems += itemCount;
    },

    recordFetchError(source, message, durationMs) {
      state.errors.push({
        type: "fetch",
        source,
        message,
        durationMs,
        timestamp: timestamp(),
      });
    },

    recordUsage(record) {
      state.tokens.input += record.inputTokens;
      state.tokens.output += record.outputTokens;
      state.costs.total += record.costUsd;
      state.costs.byBackend[record.backend] =
        (state.costs.byBackend[record.backend] ?? 0) + record.costUsd;

      if (record.purpose === "relevance") {
        state.relevanceCalls += 1;
        return;
      }

      state.operations.push({
        type: "process",
        backend: record.backend,
        durationMs: record.durationMs,
        tokens: record.inputTokens + record.outputTokens,
        cost: record.costUsd,
        estimated: record.estimated,
        timestamp: timestamp(),
      });
      state.performance.processTimesMs.push(record.durationMs);
    },

    recordProcessError(backend, message, durationMs) {
      state.errors.push({
        type: "process",
        backend,
        message,
        durationMs,
        timestamp: timestamp(),
      });
    },

    recordError(type, message) {
      state.errors.push({ type, message, timestamp: timestamp() });
    },

    summary() {
      return {
        totalOperations: state.operations.length,
        totalErrors: state.errors.length,
        totalItems: state.performance.totalItems,
        totalCost: state.costs.total,
        avgFetchMs: average(state.performance.fetchTimesMs),
        avgProcessMs: average(state.performance.processTimesMs),
        relevanceCalls: state.relevanceCalls,
        costByBackend: { ...state.costs.byBackend },
      };
    },

    snapshot,

    flush() {
      if (!flushing) {
        flushing = (async () => {
          state.sessionEnd = timestamp();
          const file = join(options.logDir, `metrics_${sessionId}.json`);
          await mkdir(options.logDir, { recursive: true });
          await writeFile(file, JSON.stringify(snapshot(), null, 2), "utf-8");
          return file;
        })();
      }
      return flushing;
    },
  };
}
