// =============================================================================
// @newsdesk/shared — Zod schemas for persisted records
// =============================================================================
// Validates what comes back from disk so downstream code can trust loaded
// analyses and index entries.
// =============================================================================

import { z } from "zod";
import { providerNameSchema } from "./config.js";

// ---------------------------------------------------------------------------
// Item
// ---------------------------------------------------------------------------

export const ItemSchema = z.object({
  title: z.string().min(1),
  link: z.string().min(1),
  summary: z.string().default(""),
  published: z.string().default(""),
  source: z.string().default(""),
  sourceName: z.string().default(""),
  authors: z.array(z.string()).default([]),
  tags: z.array(z.string()).default([]),
});

// ---------------------------------------------------------------------------
// Run metadata
// ---------------------------------------------------------------------------

export const RunMetadataSchema = z.object({
  topic: z.string().optional(),
  sources: z.array(z.string()).default([]),
  itemCount: z.number().int().min(0).default(0),
  timestamp: z.string(),
  failedSources: z.array(z.string()).default([]),
  provider: providerNameSchema.optional(),
  model: z.string().optional(),
});

// ---------------------------------------------------------------------------
// Files written by the JSON storage
// ---------------------------------------------------------------------------

export const SynthesisFileSchema = z.object({
  identifier: z.string().min(1),
  timestamp: z.string(),
  synthesis: z.string(),
  metadata: RunMetadataSchema,
  itemCount: z.number().int().min(0),
});
export type SynthesisFile = z.infer<typeof SynthesisFileSchema>;

export const RawFileSchema = z.object({
  identifier: z.string().min(1),
  timestamp: z.string(),
  items: z.array(ItemSchema),
  metadata: RunMetadataSchema,
});
export type RawFile = z.infer<typeof RawFileSchema>;

export const AnalysisSummarySchema = z.object({
  identifier: z.string().min(1),
  timestamp: z.string(),
  topic: z.string().optional(),
  sources: z.array(z.string()).default([]),
  itemCount: z.number().int().min(0).default(0),
});

export const IndexFileSchema = z.object({
  analyses: z.array(AnalysisSummarySchema).default([]),
});
export type IndexFile = z.infer<typeof IndexFileSchema>;
