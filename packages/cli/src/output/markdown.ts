// =============================================================================
// @newsdesk/cli — Markdown report renderer
// =============================================================================
// Writes one human-readable report per run:
//   <outputDir>/analysis_<timestamp>[_<topic slug>][_<n>].md
// A name already taken gets a counter suffix, as storage identifiers do.
// =============================================================================

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { OutputError, toErrorMessage, type RunMetadata } from "@newsdesk/shared";
import { formatSessionId } from "../metrics.js";
import type { OutputRenderer } from "../pipeline.js";
import { slugify } from "../storage/json-storage.js";

export interface MarkdownRendererOptions {
  outputDir: string;
  now?: () => Date;
}

export function reportFileName(date: Date, topic?: string, counter = 1): string {
  const slug = topic ? slugify(topic) : "";
  const stamp = formatSessionId(date);
  const base = slug ? `analysis_${stamp}_${slug}` : `analysis_${stamp}`;
  return counter > 1 ? `${base}_${counter}.md` : `${base}.md`;
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "EEXIST";
}

export function renderReport(synthesis: string, metadata: RunMetadata): string {
  const lines = [
    `# News Analysis: ${metadata.topic ?? "General"}`,
    "",
    `**Generated:** ${metadata.timestamp}`,
    `**Articles analyzed:** ${metadata.itemCount}`,
    `**Sources:** ${metadata.sources.length}`,
  ];
  if (metadata.provider) {
    const model = metadata.model ? ` (${metadata.model})` : "";
    lines.push(`**Backend:** ${metadata.provider}${model}`);
  }
  if (metadata.failedSources.length > 0) {
    lines.push(`**Failed sources:** ${metadata.failedSources.join(", ")}`);
  }

  lines.push("", "---", "", synthesis.trim(), "", "---", "", "## Sources", "");
  for (const source of metadata.sources) {
    const failed = metadata.failedSources.includes(source) ? " (failed)" : "";
    lines.push(`- ${source}${failed}`);
  }

  return lines.join("\n") + "\n";
}

export function createMarkdownRenderer(
  options: MarkdownRendererOptions,
): OutputRenderer {
  const now = options.now ?? (() => new Date());

  return {
    async generate(synthesis: string, metadata: RunMetadata): Promise<string> {
      const date = now();
      const content = renderReport(synthesis, metadata);
      try {
        await mkdir(options.outputDir, { recursive: true });
        for (let counter = 1; ; counter++) {
          const path = join(options.outputDir, reportFileName(date, metadata.topic, counter));
          try {
            // "wx" fails instead of overwriting an earlier report
            await writeFile(path, content, { encoding: "utf-8", flag: "wx" });
            return path;
          } catch (error) {
            if (!isAlreadyExists(error)) throw error;
          }
        }
      } catch (error) {
        throw new OutputError(toErrorMessage(error), { cause: error });
      }
    },
  };
}
