// =============================================================================
// @newsdesk/shared — Synthesis prompt builder
// =============================================================================
// One prompt shared by all backend variants: every item rendered as a block,
// blocks separated by a delimiter, followed by the sectioned instructions.
// =============================================================================

import type { Batch, Item } from "../types.js";

export const SYSTEM_PROMPT =
  "You are an expert news analyst specializing in multi-source analysis and synthesis.";

export const ITEM_DELIMITER = "\n---\n";

const INSTRUCTIONS = [
  "1. **Identify Common Themes**: What are the main points that multiple sources agree on?",
  "2. **Highlight Differences**: What unique perspectives or information does each source provide?",
  "3. **Analyze Sentiment & Tone**: What is the overall sentiment (positive, negative, neutral) of each source?",
  "4. **Detect Bias**: Are there any noticeable biases in how different sources present the information?",
  "5. **Provide Synthesis**: Create a comprehensive, balanced summary that incorporates all perspectives.",
].join("\n");

const OUTPUT_STRUCTURE = [
  "## Common Themes",
  "[What multiple sources agree on]",
  "",
  "## Source-Specific Perspectives",
  "[Unique information from each source]",
  "",
  "## Sentiment Analysis",
  "[Overall tone and sentiment of each source]",
  "",
  "## Potential Biases",
  "[Any detected biases or editorial slants]",
  "",
  "## Comprehensive Synthesis",
  "[Your balanced summary incorporating all perspectives]",
  "",
  "## Key Takeaways",
  "[3-5 bullet points of the most important insights]",
].join("\n");

export function formatItem(item: Item, index: number): string {
  return [
    `Article ${index + 1}:`,
    `Source: ${item.sourceName || "Unknown"}`,
    `Title: ${item.title}`,
    `Published: ${item.published || "Unknown"}`,
    `Link: ${item.link}`,
    `Summary: ${item.summary || "No summary available"}`,
  ].join("\n");
}

export function buildSynthesisPrompt(batch: Batch): string {
  const items = batch.map(formatItem).join(ITEM_DELIMITER);

  return [
    `I have collected ${batch.length} articles from various sources on a specific topic. Your task is to:`,
    "",
    INSTRUCTIONS,
    "",
    "Here are the articles:",
    "",
    items,
    "",
    "Please provide your analysis in the following structure:",
    "",
    OUTPUT_STRUCTURE,
  ].join("\n");
}
