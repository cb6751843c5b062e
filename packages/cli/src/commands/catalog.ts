// =============================================================================
// @newsdesk/cli — Read-only commands: sources, history, show, config
// =============================================================================

import {
  availableProviders,
  getSourcesByCategory,
  modelFor,
  PROVIDER_PRIORITY,
  type Config,
} from "@newsdesk/shared";
import { createAppContext } from "../app.js";
import { USAGE, type Command } from "../cli.js";
import { printHeading } from "./format.js";
import { EXIT_OK, type CommandEnv } from "./types.js";

export function runSources(
  command: Extract<Command, { name: "sources" }>,
  env: CommandEnv,
): number {
  const { io } = env;
  const sources = getSourcesByCategory(command.category);

  printHeading(io, `Available sources (${command.category})`);
  for (const [name, url] of Object.entries(sources)) {
    io.print(`  ${name.padEnd(20)} ${url}`);
  }
  io.print("");
  io.print(`Total: ${Object.keys(sources).length} sources`);
  return EXIT_OK;
}

export async function runHistory(
  command: Extract<Command, { name: "history" }>,
  env: CommandEnv,
): Promise<number> {
  const { io } = env;
  const { storage } = createAppContext(env.app);
  const entries = await storage.listAll();

  printHeading(io, "Analysis history");
  if (entries.length === 0) {
    io.print("No analyses found");
    return EXIT_OK;
  }

  // Most recent first
  for (const entry of entries.slice(-command.limit).reverse()) {
    io.print("");
    io.print(entry.identifier);
    io.print(`  Topic:    ${entry.topic ?? "N/A"}`);
    io.print(`  Time:     ${entry.timestamp}`);
    io.print(`  Articles: ${entry.itemCount}`);
    io.print(`  Sources:  ${entry.sources.length}`);
  }
  return EXIT_OK;
}

export async function runShow(
  command: Extract<Command, { name: "show" }>,
  env: CommandEnv,
): Promise<number> {
  const { io } = env;
  const { storage } = createAppContext(env.app);
  const analysis = await storage.load(command.identifier);

  printHeading(io, `Analysis: ${analysis.identifier}`);
  io.print(`Topic:    ${analysis.metadata.topic ?? "N/A"}`);
  io.print(`Time:     ${analysis.timestamp}`);
  io.print(`Articles: ${analysis.batch.length}`);
  if (analysis.metadata.provider) {
    io.print(`Backend:  ${analysis.metadata.provider} (${analysis.metadata.model ?? "default"})`);
  }
  io.print("");
  io.print(analysis.synthesis);
  return EXIT_OK;
}

function status(value: string | undefined): string {
  return value === undefined ? "NOT SET" : "Set";
}

export function describeConfig(config: Config): string[] {
  const available = new Set(availableProviders(config));
  const lines = [
    "LLM:",
    `  Default provider:  ${config.DEFAULT_LLM_PROVIDER}`,
    `  Max tokens:        ${config.MAX_TOKENS}`,
    `  Semantic filter:   ${config.SEMANTIC_FILTER ? "enabled" : "disabled"}`,
    "",
    "API keys:",
    `  ANTHROPIC_API_KEY: ${status(config.ANTHROPIC_API_KEY)}`,
    `  OPENAI_API_KEY:    ${status(config.OPENAI_API_KEY)}`,
    `  GEMINI_API_KEY:    ${status(config.GEMINI_API_KEY)}`,
    "",
    "Models:",
  ];
  for (const provider of PROVIDER_PRIORITY) {
    const marker = available.has(provider) ? "" : " (unavailable)";
    lines.push(`  ${provider.padEnd(18)} ${modelFor(config, provider)}${marker}`);
  }
  lines.push(
    "",
    "Directories:",
    `  Data:    ${config.DATA_DIR}`,
    `  Output:  ${config.OUTPUT_DIR}`,
    `  Logs:    ${config.LOG_DIR}`,
    "",
    "Fetching:",
    `  Max articles per source: ${config.MAX_ARTICLES_PER_SOURCE}`,
    `  Timeout:                 ${config.FETCH_TIMEOUT_MS}ms`,
    `  Concurrency:             ${config.FETCH_CONCURRENCY}`,
  );
  return lines;
}

export function runConfig(env: CommandEnv): number {
  const { config } = createAppContext(env.app);
  printHeading(env.io, "Configuration");
  for (const line of describeConfig(config)) env.io.print(line);
  return EXIT_OK;
}

export function runHelp(env: CommandEnv): number {
  for (const line of USAGE.trimEnd().split("\n")) env.io.print(line);
  return EXIT_OK;
}
