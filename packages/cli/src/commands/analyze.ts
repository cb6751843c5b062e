// =============================================================================
// @newsdesk/cli — analyze command
// =============================================================================

import { getSourceUrls, PipelineError, validateConfig } from "@newsdesk/shared";
import { createAppContext, setupRun } from "../app.js";
import type { Command } from "../cli.js";
import { printHeading, printRunErrors, printSummary } from "./format.js";
import {
  EXIT_FAILURE,
  EXIT_INTERRUPTED,
  EXIT_OK,
  type CommandEnv,
} from "./types.js";

type AnalyzeCommand = Extract<Command, { name: "analyze" }>;

/** Explicit sources win, then the category, then the default set. */
export function resolveSources(command: AnalyzeCommand): string[] {
  if (command.sources.length > 0) return [...command.sources];
  return getSourceUrls(command.category ?? "default");
}

export async function runAnalyze(
  command: AnalyzeCommand,
  env: CommandEnv,
): Promise<number> {
  const { io } = env;
  const context = createAppContext({
    ...env.app,
    verbose: command.verbose || env.app.verbose,
  });

  const problems = validateConfig(context.config);
  if (problems.length > 0) {
    io.print("Configuration errors:");
    for (const problem of problems) io.print(`  - ${problem}`);
    return EXIT_FAILURE;
  }

  const sources = resolveSources(command);
  const { pipeline, backend, metrics } = setupRun(context, {
    provider: command.provider,
    storage: command.storage,
    output: command.output,
  });

  printHeading(io, `News analysis: ${command.topic}`);
  io.print(`Using ${sources.length} source(s) with ${backend.label}`);

  try {
    const result = await pipeline.run(sources, command.topic, {
      signal: env.signal,
    });

    io.print("");
    io.print("Analysis complete.");
    io.print("");
    io.print(result.synthesis ?? "");
    io.print("");
    io.print(`Articles processed: ${result.itemsProcessed}`);
    io.print(`Duration: ${result.duration.toFixed(2)}s`);
    if (result.outputPath) io.print(`Output saved: ${result.outputPath}`);
    if (result.storageId) io.print(`Storage ID: ${result.storageId}`);
    printRunErrors(io, result.errors);
    printSummary(io, metrics.summary());
    return EXIT_OK;
  } catch (error) {
    if (!(error instanceof PipelineError)) throw error;

    if (error.code === "CANCELLED") {
      io.print("");
      io.print("Interrupted by user");
      printSummary(io, metrics.summary());
      return EXIT_INTERRUPTED;
    }

    io.print("");
    io.print(`Analysis failed: ${error.message}`);
    printRunErrors(io, error.result.errors);
    printSummary(io, metrics.summary());
    return EXIT_FAILURE;
  }
}
