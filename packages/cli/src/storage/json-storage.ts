// =============================================================================
// @newsdesk/cli — JSON file storage
// =============================================================================
// Layout under the data directory:
//   syntheses/<id>.json   synthesis text + metadata
//   raw/<id>.json         the batch that produced it
//   index.json            one summary per save, in save order
// Files read back are validated with zod before use.
// =============================================================================

import { access, mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import {
  IndexFileSchema,
  RawFileSchema,
  StorageError,
  SynthesisFileSchema,
  toErrorMessage,
  type AnalysisSummary,
  type Batch,
  type IndexFile,
  type RawFile,
  type RunMetadata,
  type StoredAnalysis,
  type SynthesisFile,
} from "@newsdesk/shared";
import { ZodError } from "zod";
import { formatSessionId } from "../metrics.js";
import type { Storage } from "../pipeline.js";

const SLUG_MAX_LENGTH = 50;
const IDENTIFIER_PATTERN = /^[\p{L}\p{N}_]+$/u;

export interface JsonStorageOptions {
  dataDir: string;
  now?: () => Date;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Lower-case, punctuation dropped, whitespace and hyphen runs become `_`. */
export function slugify(text: string, maxLength = SLUG_MAX_LENGTH): string {
  return text
    .toLowerCase()
    .trim()
    .replace(/[^\p{L}\p{N}_\s-]/gu, "")
    .replace(/[-\s]+/g, "_")
    .slice(0, maxLength);
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

async function readJson<T>(
  path: string,
  schema: { parse(data: unknown): T },
): Promise<T> {
  const text = await readFile(path, "utf-8");
  return schema.parse(JSON.parse(text));
}

function describeReadFailure(error: unknown): string {
  if (error instanceof SyntaxError) return `Invalid JSON format: ${error.message}`;
  if (error instanceof ZodError) {
    return `Invalid file contents: ${error.message}`;
  }
  return toErrorMessage(error);
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createJsonStorage(options: JsonStorageOptions): Storage {
  const now = options.now ?? (() => new Date());
  const synthesesDir = join(options.dataDir, "syntheses");
  const rawDir = join(options.dataDir, "raw");
  const indexFile = join(options.dataDir, "index.json");

  async function readIndex(): Promise<IndexFile> {
    try {
      return await readJson(indexFile, IndexFileSchema);
    } catch (error) {
      if (isNotFound(error)) return { analyses: [] };
      throw error;
    }
  }

  /** `<timestamp>[_<slug>]`, suffixed with a counter if already taken. */
  async function allocateIdentifier(date: Date, topic?: string): Promise<string> {
    const slug = topic ? slugify(topic) : "";
    const base = slug ? `${formatSessionId(date)}_${slug}` : formatSessionId(date);
    let identifier = base;
    for (let n = 2; await exists(join(synthesesDir, `${identifier}.json`)); n++) {
      identifier = `${base}_${n}`;
    }
    return identifier;
  }

  return {
    async save(
      batch: Batch,
      synthesis: string,
      metadata: RunMetadata,
    ): Promise<string> {
      try {
        await mkdir(synthesesDir, { recursive: true });
        await mkdir(rawDir, { recursive: true });

        const date = now();
        const timestamp = date.toISOString();
        const identifier = await allocateIdentifier(date, metadata.topic);

        const synthesisFile: SynthesisFile = {
          identifier,
          timestamp,
          synthesis,
          metadata,
          itemCount: batch.length,
        };
        const rawFile: RawFile = {
          identifier,
          timestamp,
          items: batch.map((item) => ({
            ...item,
            authors: [...item.authors],
            tags: [...item.tags],
          })),
          metadata,
        };

        await writeFile(
          join(synthesesDir, `${identifier}.json`),
          JSON.stringify(synthesisFile, null, 2),
          "utf-8",
        );
        await writeFile(
          join(rawDir, `${identifier}.json`),
          JSON.stringify(rawFile, null, 2),
          "utf-8",
        );

        const index = await readIndex();
        index.analyses.push({
          identifier,
          timestamp,
          topic: metadata.topic,
          sources: [...metadata.sources],
          itemCount: metadata.itemCount,
        });
        await writeFile(indexFile, JSON.stringify(index, null, 2), "utf-8");

        return identifier;
      } catch (error) {
        throw new StorageError("save", describeReadFailure(error), { cause: error });
      }
    },

    async load(identifier: string): Promise<StoredAnalysis> {
      if (!IDENTIFIER_PATTERN.test(identifier)) {
        throw new StorageError("load", `Invalid identifier: ${identifier}`);
      }

      let stored: SynthesisFile;
      try {
        stored = await readJson(
          join(synthesesDir, `${identifier}.json`),
          SynthesisFileSchema,
        );
      } catch (error) {
        if (isNotFound(error)) {
          throw new StorageError("load", `Synthesis file not found: ${identifier}`, {
            cause: error,
          });
        }
        throw new StorageError("load", describeReadFailure(error), { cause: error });
      }

      let items: RawFile["items"] = [];
      try {
        items = (await readJson(join(rawDir, `${identifier}.json`), RawFileSchema))
          .items;
      } catch (error) {
        if (!isNotFound(error)) {
          throw new StorageError("load", describeReadFailure(error), {
            cause: error,
          });
        }
      }

      return {
        identifier: stored.identifier,
        timestamp: stored.timestamp,
        synthesis: stored.synthesis,
        batch: items,
        metadata: stored.metadata,
      };
    },

    async listAll(): Promise<AnalysisSummary[]> {
      try {
        const index = await readIndex();
        return index.analyses;
      } catch (error) {
        throw new StorageError("list", describeReadFailure(error), { cause: error });
      }
    },
  };
}
