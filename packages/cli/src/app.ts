// =============================================================================
// @newsdesk/cli — Application wiring
// =============================================================================
// Builds the long-lived context (config, logger, storage) once per process
// and assembles a pipeline per run from it: provider selection, backend,
// relevance filter, fetcher, renderer, and a fresh metrics session.
// =============================================================================

import { join } from "node:path";
import {
  availableProviders,
  createRelevanceFilter,
  createSynthesisBackend,
  loadConfig,
  selectProvider,
  type Config,
  type CreateBackendOptions,
  type ProviderName,
  type ProviderSelection,
  type SynthesisBackend,
} from "@newsdesk/shared";
import { createRssFetcher } from "./fetchers/rss.js";
import {
  createFileWriter,
  createLogger,
  stderrWriter,
  teeWriter,
  type LineWriter,
  type Logger,
} from "./logger.js";
import {
  createMetricsAccumulator,
  formatSessionId,
  type MetricsAccumulator,
} from "./metrics.js";
import { createMarkdownRenderer } from "./output/markdown.js";
import { createPipeline, type Pipeline, type Storage } from "./pipeline.js";
import { createJsonStorage } from "./storage/json-storage.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type BackendFactory = (
  provider: ProviderName,
  config: Config,
  options: CreateBackendOptions,
) => SynthesisBackend;

export interface AppOptions {
  env?: Record<string, string | undefined>;
  /** Debug logging, echoed to the console */
  verbose?: boolean;
  /** Console sink for verbose runs, stderr by default */
  writeLog?: LineWriter;
  fetchImpl?: typeof fetch;
  createBackend?: BackendFactory;
  now?: () => Date;
}

export interface AppContext {
  config: Config;
  logger: Logger;
  /** LOG_DIR/session_<id>.log */
  logFile: string;
  storage: Storage;
  options: AppOptions;
}

export interface RunSetupOptions {
  provider?: ProviderName;
  storage?: boolean;
  output?: boolean;
  /** Wire the relevance filter (default true) */
  relevance?: boolean;
}

export interface RunSetup {
  pipeline: Pipeline;
  backend: SynthesisBackend;
  selection: ProviderSelection;
  metrics: MetricsAccumulator;
}

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

export function createAppContext(options: AppOptions = {}): AppContext {
  const config = loadConfig(options.env);
  const now = options.now ?? (() => new Date());
  const logFile = join(config.LOG_DIR, `session_${formatSessionId(now())}.log`);
  const toFile = createFileWriter(logFile);
  const logger = createLogger({
    level: options.verbose ? "debug" : config.LOG_LEVEL,
    write: options.verbose ? teeWriter(toFile, options.writeLog ?? stderrWriter) : toFile,
  });
  const storage = createJsonStorage({ dataDir: config.DATA_DIR, now: options.now });
  return { config, logger, logFile, storage, options };
}

export function setupRun(context: AppContext, setup: RunSetupOptions = {}): RunSetup {
  const { config, logger, options } = context;

  const selection = selectProvider(
    setup.provider ?? config.DEFAULT_LLM_PROVIDER,
    availableProviders(config),
  );
  if (selection.substituted) {
    logger.warn("Requested provider unavailable, using fallback", {
      requested: selection.requested,
      provider: selection.provider,
    });
  }

  const metrics = createMetricsAccumulator({ logDir: config.LOG_DIR, now: options.now });
  const createBackend = options.createBackend ?? createSynthesisBackend;
  const backend = createBackend(selection.provider, config, {
    onUsage: (record) => metrics.recordUsage(record),
  });

  const relevanceFilter =
    setup.relevance === false
      ? undefined
      : createRelevanceFilter({
          backend: config.SEMANTIC_FILTER ? backend : undefined,
          log: logger.child({ component: "relevance" }),
        });

  const pipeline = createPipeline({
    fetcher: createRssFetcher({
      maxItems: config.MAX_ARTICLES_PER_SOURCE,
      timeoutMs: config.FETCH_TIMEOUT_MS,
      logger: logger.child({ component: "fetcher" }),
      fetchImpl: options.fetchImpl,
      now: options.now,
    }),
    backend,
    metrics,
    logger,
    relevanceFilter,
    storage: setup.storage === false ? undefined : context.storage,
    output:
      setup.output === false
        ? undefined
        : createMarkdownRenderer({ outputDir: config.OUTPUT_DIR, now: options.now }),
    fetchConcurrency: config.FETCH_CONCURRENCY,
    now: options.now,
  });

  logger.info("Pipeline configured", {
    provider: backend.name,
    model: backend.model,
    semanticFilter: relevanceFilter !== undefined && config.SEMANTIC_FILTER,
    storage: setup.storage !== false,
    output: setup.output !== false,
  });

  return { pipeline, backend, selection, metrics };
}
