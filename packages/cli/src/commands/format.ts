import type { RunError } from "@newsdesk/shared";
import type { MetricsSummary } from "../metrics.js";
import type { CommandIo } from "./types.js";

const RULE = "=".repeat(60);

export function printHeading(io: CommandIo, title: string): void {
  io.print(RULE);
  io.print(`  ${title}`);
  io.print(RULE);
}

export function formatRunError(error: RunError): string {
  const where = error.source ? `${error.phase} ${error.source}` : error.phase;
  return `[${where}] ${error.message}`;
}

export function printRunErrors(io: CommandIo, errors: readonly RunError[]): void {
  if (errors.length === 0) return;
  io.print("");
  io.print("Errors:");
  for (const error of errors) {
    io.print(`  - ${formatRunError(error)}`);
  }
}

export function printSummary(io: CommandIo, summary: MetricsSummary): void {
  io.print("");
  io.print("Session summary:");
  io.print(`  Operations:      ${summary.totalOperations}`);
  io.print(`  Errors:          ${summary.totalErrors}`);
  io.print(`  Items fetched:   ${summary.totalItems}`);
  io.print(`  Relevance calls: ${summary.relevanceCalls}`);
  io.print(`  Avg fetch time:  ${Math.round(summary.avgFetchMs)}ms`);
  io.print(`  Avg process:     ${Math.round(summary.avgProcessMs)}ms`);
  io.print(`  Total cost:      $${summary.totalCost.toFixed(4)}`);
  for (const [backend, cost] of Object.entries(summary.costByBackend)) {
    io.print(`    ${backend}: $${cost.toFixed(4)}`);
  }
}
