import { AggregatorError, toErrorMessage } from "@newsdesk/shared";
import type { Command } from "../cli.js";
import { runAnalyze } from "./analyze.js";
import { runConfig, runHelp, runHistory, runShow, runSources } from "./catalog.js";
import { runSelfTest } from "./self-test.js";
import { EXIT_FAILURE, type CommandEnv } from "./types.js";

export * from "./types.js";
export { resolveSources } from "./analyze.js";
export { describeConfig } from "./catalog.js";

async function dispatch(command: Command, env: CommandEnv): Promise<number> {
  switch (command.name) {
    case "analyze":
      return runAnalyze(command, env);
    case "sources":
      return runSources(command, env);
    case "history":
      return runHistory(command, env);
    case "show":
      return runShow(command, env);
    case "test":
      return runSelfTest(command, env);
    case "config":
      return runConfig(env);
    case "help":
      return runHelp(env);
  }
}

/** Runs a parsed command and maps any failure to an exit code. */
export async function runCommand(command: Command, env: CommandEnv): Promise<number> {
  try {
    return await dispatch(command, env);
  } catch (error) {
    if (error instanceof AggregatorError) {
      env.io.print(`Error: ${error.message}`);
    } else {
      env.io.print(`Unexpected error: ${toErrorMessage(error)}`);
    }
    return EXIT_FAILURE;
  }
}
