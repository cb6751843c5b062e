// =============================================================================
// @newsdesk/shared — Feed source catalog
// =============================================================================

export type SourceCategory = "default" | "international" | "tech" | "all";

export const SOURCE_CATEGORIES: readonly SourceCategory[] = [
  "default",
  "international",
  "tech",
  "all",
];

const DEFAULT_SOURCES: Record<string, string> = {
  ERR: "https://www.err.ee/rss",
  Postimees: "https://www.postimees.ee/rss",
  Delfi: "https://www.delfi.ee/rss",
};

const INTERNATIONAL_SOURCES: Record<string, string> = {
  BBC: "http://feeds.bbci.co.uk/news/rss.xml",
  Reuters: "https://www.reutersagency.com/feed/",
  "EU Commission":
    "https://ec.europa.eu/commission/presscorner/api/files/feed/en.xml",
  Guardian: "https://www.theguardian.com/international/rss",
  DW: "https://rss.dw.com/xml/rss-en-all",
};

const TECH_SOURCES: Record<string, string> = {
  TechCrunch: "https://techcrunch.com/feed/",
  "Ars Technica": "http://feeds.arstechnica.com/arstechnica/index",
  Wired: "https://www.wired.com/feed/rss",
};

export function isSourceCategory(value: string): value is SourceCategory {
  return (SOURCE_CATEGORIES as readonly string[]).includes(value);
}

/**
 * Named sources (display name -> feed URL) for a category. Unknown category
 * names fall back to the default set.
 */
export function getSourcesByCategory(
  category: string,
): Record<string, string> {
  switch (category) {
    case "international":
      return { ...INTERNATIONAL_SOURCES };
    case "tech":
      return { ...TECH_SOURCES };
    case "all":
      return { ...DEFAULT_SOURCES, ...INTERNATIONAL_SOURCES, ...TECH_SOURCES };
    default:
      return { ...DEFAULT_SOURCES };
  }
}

export function getSourceUrls(category: string): string[] {
  return Object.values(getSourcesByCategory(category));
}
