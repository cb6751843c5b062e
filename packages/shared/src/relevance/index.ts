export {
  extractExcerpt,
  EXCERPT_SENTENCES,
  EXCERPT_MAX_WORDS,
  ELLIPSIS,
} from "./excerpt.js";
export {
  keywordMatches,
  scoreKeywords,
  topicKeywords,
  type KeywordScore,
} from "./keywords.js";
export {
  createRelevanceFilter,
  buildRelevancePrompt,
  isAffirmative,
  type RelevanceFilter,
  type RelevanceFilterOptions,
} from "./filter.js";
