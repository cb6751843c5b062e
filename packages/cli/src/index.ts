#!/usr/bin/env -S npx tsx
// =============================================================================
// @newsdesk/cli — Entry point
// =============================================================================
// Parses argv, runs one command, and exits with its code. The first SIGINT
// cancels the running pipeline (which flushes metrics on its way out); a
// second one exits immediately.
// =============================================================================

import { parseArgs, USAGE, UsageError, type Command } from "./cli.js";
import { EXIT_FAILURE, EXIT_INTERRUPTED, runCommand } from "./commands/index.js";

const controller = new AbortController();

process.on("SIGINT", () => {
  if (controller.signal.aborted) {
    process.exit(EXIT_INTERRUPTED);
  }
  controller.abort(new Error("Interrupted by user"));
});

async function main(argv: string[]): Promise<number> {
  let command: Command;
  try {
    command = parseArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(error.message);
      console.error("");
      console.error(USAGE);
      return EXIT_FAILURE;
    }
    throw error;
  }

  return runCommand(command, {
    io: { print: (line) => console.log(line) },
    app: {},
    signal: controller.signal,
  });
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = controller.signal.aborted ? EXIT_INTERRUPTED : code;
  })
  .catch((err) => {
    console.error(
      "Fatal:",
      err instanceof Error ? err.message : String(err),
    );
    process.exitCode = EXIT_FAILURE;
  });
