// =============================================================================
// @newsdesk/cli — test command
// =============================================================================
// One-source smoke run: validates config, then runs the pipeline on the
// first default source with storage, output, and relevance filtering off.
// =============================================================================

import { getSourceUrls, toErrorMessage, validateConfig } from "@newsdesk/shared";
import { createAppContext, setupRun } from "../app.js";
import type { Command } from "../cli.js";
import { printHeading, printSummary } from "./format.js";
import { EXIT_FAILURE, EXIT_OK, type CommandEnv } from "./types.js";

export const SELF_TEST_TOPIC = "TEST";

export async function runSelfTest(
  command: Extract<Command, { name: "test" }>,
  env: CommandEnv,
): Promise<number> {
  const { io } = env;
  printHeading(io, "Testing pipeline");

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
  io.print("Configuration valid");

  const [source] = getSourceUrls("default");
  if (source === undefined) {
    io.print("No default source configured");
    return EXIT_FAILURE;
  }
  io.print(`Testing with source: ${source}`);

  const { pipeline, metrics } = setupRun(context, {
    storage: false,
    output: false,
    relevance: false,
  });

  try {
    const result = await pipeline.run([source], SELF_TEST_TOPIC, {
      signal: env.signal,
    });
    if (result.itemsProcessed === 0) {
      io.print("Test failed: no items processed");
      return EXIT_FAILURE;
    }
    io.print("All components working");
    printSummary(io, metrics.summary());
    return EXIT_OK;
  } catch (error) {
    io.print(`Test failed: ${toErrorMessage(error)}`);
    return EXIT_FAILURE;
  }
}
