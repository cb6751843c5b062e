// =============================================================================
// @newsdesk/shared — Relevance filter
// =============================================================================
// Decides per item whether it belongs in the batch for a topic. Tries a
// semantic yes/no call through a synthesis backend first and falls back to
// the keyword heuristic on any failure, or when no backend is wired.
// `matches` never rejects; the basis of each decision is logged only.
// =============================================================================

import { toErrorMessage } from "../errors.js";
import type { CallOptions, SynthesisBackend } from "../backends/types.js";
import { silentLog, type Item, type LogSink, type RelevanceBasis } from "../types.js";
import { extractExcerpt } from "./excerpt.js";
import { scoreKeywords } from "./keywords.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RelevanceFilter {
  matches(
    topic: string | undefined,
    item: Item,
    options?: CallOptions,
  ): Promise<boolean>;
}

export interface RelevanceFilterOptions {
  /** Omit to always use the keyword heuristic */
  backend?: SynthesisBackend;
  log?: LogSink;
}

// ---------------------------------------------------------------------------
// Semantic check helpers
// ---------------------------------------------------------------------------

export function buildRelevancePrompt(topic: string, item: Item): string {
  return [
    `Does the following news article discuss the topic "${topic}"?`,
    "Answer with only YES or NO.",
    "",
    `Title: ${item.title}`,
    `Excerpt: ${extractExcerpt(item.summary)}`,
  ].join("\n");
}

export function isAffirmative(response: string): boolean {
  return response.trim().toUpperCase().startsWith("YES");
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createRelevanceFilter(
  options: RelevanceFilterOptions = {},
): RelevanceFilter {
  const { backend } = options;
  const log = options.log ?? silentLog;

  function decide(
    basis: RelevanceBasis,
    matched: boolean,
    item: Item,
    extra?: Record<string, unknown>,
  ): boolean {
    log.debug("Relevance decision", {
      basis,
      matched,
      title: item.title,
      source: item.source,
      ...extra,
    });
    return matched;
  }

  function byKeywords(
    topic: string,
    item: Item,
    basis: RelevanceBasis,
  ): boolean {
    const score = scoreKeywords(topic, item);
    return decide(basis, score.matched, item, {
      hits: score.hits,
      required: score.required,
    });
  }

  return {
    async matches(
      topic: string | undefined,
      item: Item,
      callOptions?: CallOptions,
    ): Promise<boolean> {
      const trimmed = topic?.trim() ?? "";
      if (trimmed === "") {
        return decide("no-topic", true, item);
      }

      if (!backend) {
        return byKeywords(trimmed, item, "keyword");
      }

      try {
        const answer = await backend.cheapYesNo(
          buildRelevancePrompt(trimmed, item),
          callOptions,
        );
        return decide("semantic", isAffirmative(answer), item, {
          backend: backend.label,
        });
      } catch (error) {
        log.warn("Semantic relevance check failed, using keyword heuristic", {
          backend: backend.label,
          error: toErrorMessage(error),
        });
        return byKeywords(trimmed, item, "keyword-fallback");
      }
    },
  };
}
