// =============================================================================
// @newsdesk/shared — Keyword relevance heuristic
// =============================================================================
// Deterministic fallback for the semantic check. Keywords are the topic's
// whitespace-delimited words; a keyword hits when it occurs as a substring
// of the lower-cased title + summary.
// =============================================================================

import type { Item } from "../types.js";

export interface KeywordScore {
  keywords: string[];
  hits: number;
  required: number;
  matched: boolean;
}

export function topicKeywords(topic: string): string[] {
  return topic
    .toLowerCase()
    .split(/\s+/)
    .filter((word) => word !== "");
}

export function scoreKeywords(
  topic: string,
  item: Pick<Item, "title" | "summary">,
): KeywordScore {
  const keywords = topicKeywords(topic);
  const searchable = `${item.title} ${item.summary}`.toLowerCase();
  const hits = keywords.filter((keyword) => searchable.includes(keyword)).length;
  const required = Math.max(1, Math.floor(keywords.length / 2));

  return { keywords, hits, required, matched: hits >= required };
}

/** Match iff hits >= max(1, floor(keywordCount / 2)). */
export function keywordMatches(
  topic: string,
  item: Pick<Item, "title" | "summary">,
): boolean {
  return scoreKeywords(topic, item).matched;
}
