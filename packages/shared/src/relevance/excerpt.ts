// =============================================================================
// @newsdesk/shared — Excerpt extraction for semantic relevance checks
// =============================================================================

export const EXCERPT_SENTENCES = 3;
export const EXCERPT_MAX_WORDS = 100;
export const ELLIPSIS = "...";

/**
 * First three sentence segments of `summary` (split on . ! ?), re-joined
 * with a period, then capped at 100 whitespace-delimited words with an
 * ellipsis appended when cut. Pure function of its input.
 */
export function extractExcerpt(summary: string): string {
  const sentences = summary
    .split(/[.!?]/)
    .map((segment) => segment.trim())
    .filter((segment) => segment !== "")
    .slice(0, EXCERPT_SENTENCES);

  const joined = sentences.join(". ");
  const words = joined.split(/\s+/).filter((word) => word !== "");

  if (words.length > EXCERPT_MAX_WORDS) {
    return words.slice(0, EXCERPT_MAX_WORDS).join(" ") + ELLIPSIS;
  }
  return joined;
}
