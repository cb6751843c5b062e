// =============================================================================
// @newsdesk/cli — RSS / Atom feed fetcher
// =============================================================================
// GETs a feed URL and extracts items from RSS <item> or Atom <entry>
// elements with lightweight regex parsing. Entries missing a title or link
// are skipped; a feed that yields nothing usable is a FetchError.
// =============================================================================

import { FetchError, toErrorMessage, type Item } from "@newsdesk/shared";
import { logExternalCall, type Logger } from "../logger.js";
import type { Fetcher, FetchOptions } from "../pipeline.js";

const USER_AGENT = "newsdesk/0.1 (+feed aggregator)";

export interface RssFetcherOptions {
  /** Entries read per feed, taken from the top */
  maxItems: number;
  timeoutMs: number;
  logger?: Logger;
  fetchImpl?: typeof fetch;
  /** Fallback `published` for entries without a date */
  now?: () => Date;
}

// ---------------------------------------------------------------------------
// XML helpers
// ---------------------------------------------------------------------------

const ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: " ",
};

export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, ref: string) => {
    if (ref.startsWith("#")) {
      const hex = ref[1] === "x" || ref[1] === "X";
      const code = parseInt(ref.slice(hex ? 2 : 1), hex ? 16 : 10);
      return code <= 0x10ffff ? String.fromCodePoint(code) : match;
    }
    const named = ENTITIES[ref.toLowerCase()];
    return named ?? match;
  });
}

const CDATA = /<!\[CDATA\[([\s\S]*?)\]\]>/g;

// A tag needs a letter after "<", so text such as "a <3 b > c" is kept
const MARKUP = /<\/?[a-z][a-z0-9:-]*(?:\s[^<>]*)?\/?>/gi;

function stripMarkup(text: string): string {
  return text.replace(MARKUP, " ");
}

/**
 * Markup removed, entities decoded outside CDATA, whitespace collapsed.
 * Entity-escaped HTML (`&lt;p&gt;`) is stripped once decoded.
 */
export function cleanText(raw: string): string {
  let text = "";
  let last = 0;
  for (const match of raw.matchAll(CDATA)) {
    const index = match.index ?? last;
    text += stripMarkup(decodeEntities(stripMarkup(raw.slice(last, index))));
    text += stripMarkup(match[1]);
    last = index + match[0].length;
  }
  text += stripMarkup(decodeEntities(stripMarkup(raw.slice(last))));
  return text.replace(/\s+/g, " ").trim();
}

function escapeTag(tag: string): string {
  return tag.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Raw inner XML of every <tag>...</tag> occurrence. */
function allTagContents(xml: string, tag: string): string[] {
  const name = escapeTag(tag);
  const re = new RegExp(`<${name}(?:\\s[^>]*)?>([\\s\\S]*?)</${name}>`, "gi");
  const found: string[] = [];
  let match: RegExpExecArray | null;
  while ((match = re.exec(xml)) !== null) {
    found.push(match[1]);
  }
  return found;
}

function tagText(xml: string, tag: string): string | undefined {
  const [first] = allTagContents(xml, tag);
  if (first === undefined) return undefined;
  const text = cleanText(first);
  return text === "" ? undefined : text;
}

function attribute(element: string, name: string): string | undefined {
  const re = new RegExp(`\\s${escapeTag(name)}\\s*=\\s*["']([^"']*)["']`, "i");
  const match = re.exec(element);
  return match ? decodeEntities(match[1]).trim() : undefined;
}

function splitByTag(xml: string, tag: string): string[] {
  const re = new RegExp(`<${tag}[\\s>][\\s\\S]*?</${tag}>`, "gi");
  return xml.match(re) ?? [];
}

function firstOf(xml: string, tags: string[]): string | undefined {
  for (const tag of tags) {
    const text = tagText(xml, tag);
    if (text !== undefined) return text;
  }
  return undefined;
}

function atomLink(entry: string): string | undefined {
  const links = entry.match(/<link\b[^>]*>/gi) ?? [];
  let fallback: string | undefined;
  for (const link of links) {
    const href = attribute(link, "href");
    if (!href) continue;
    const rel = attribute(link, "rel");
    if (rel === undefined || rel === "alternate") return href;
    fallback ??= href;
  }
  return fallback;
}

function authorsOf(entry: string): string[] {
  const names: string[] = [];
  for (const block of allTagContents(entry, "author")) {
    const name = tagText(block, "name") ?? cleanText(block);
    if (name) names.push(name);
  }
  for (const creator of allTagContents(entry, "dc:creator")) {
    const name = cleanText(creator);
    if (name) names.push(name);
  }
  return [...new Set(names)];
}

function tagsOf(entry: string): string[] {
  const tags: string[] = [];
  const re = /<category\b([^>]*?)(?:\/>|>([\s\S]*?)<\/category>)/gi;
  let match: RegExpExecArray | null;
  while ((match = re.exec(entry)) !== null) {
    const text = match[2] !== undefined ? cleanText(match[2]) : "";
    const value = text || attribute(match[1], "term");
    if (value) tags.push(value);
  }
  return [...new Set(tags)];
}

/** First domain label without `www.`, upper-cased. */
export function sourceNameFor(source: string): string {
  try {
    const host = new URL(source).hostname.replace(/^www\./i, "");
    const [label] = host.split(".");
    return label ? label.toUpperCase() : source;
  } catch {
    return source;
  }
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/** Entries of a feed document, RSS items first and Atom entries otherwise. */
export function parseFeed(
  xml: string,
  source: string,
  options: { maxItems: number; fallbackPublished: string },
): { entries: number; items: Item[] } {
  const rssItems = splitByTag(xml, "item");
  const isAtom = rssItems.length === 0;
  const entries = (isAtom ? splitByTag(xml, "entry") : rssItems).slice(
    0,
    options.maxItems,
  );
  const sourceName = sourceNameFor(source);

  const items: Item[] = [];
  for (const entry of entries) {
    const title = tagText(entry, "title");
    const link = isAtom
      ? atomLink(entry) ?? tagText(entry, "link")
      : tagText(entry, "link") ?? atomLink(entry);
    if (!title || !link) continue;

    items.push({
      title,
      link,
      summary:
        firstOf(entry, ["description", "summary", "content:encoded", "content"]) ??
        "",
      published:
        firstOf(entry, ["pubDate", "published", "updated", "dc:date"]) ??
        options.fallbackPublished,
      source,
      sourceName,
      authors: authorsOf(entry),
      tags: tagsOf(entry),
    });
  }

  return { entries: entries.length, items };
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createRssFetcher(options: RssFetcherOptions): Fetcher {
  const fetchImpl = options.fetchImpl ?? fetch;
  const now = options.now ?? (() => new Date());
  const { logger } = options;

  async function download(source: string, signal?: AbortSignal): Promise<string> {
    const timeout = AbortSignal.timeout(options.timeoutMs);
    const start = performance.now();
    try {
      const response = await fetchImpl(source, {
        headers: {
          "User-Agent": USER_AGENT,
          Accept: "application/rss+xml, application/atom+xml, application/xml, text/xml",
        },
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      });
      if (!response.ok) {
        throw new FetchError(source, `HTTP ${response.status}`, {
          code: "FETCH_HTTP_ERROR",
        });
      }
      const body = await response.text();
      if (logger) logExternalCall(logger, "feed", source, performance.now() - start);
      return body;
    } catch (error) {
      if (logger) {
        logExternalCall(
          logger,
          "feed",
          source,
          performance.now() - start,
          toErrorMessage(error),
        );
      }
      if (error instanceof FetchError) throw error;
      if (timeout.aborted) {
        throw new FetchError(source, `Timed out after ${options.timeoutMs}ms`, {
          cause: error,
          code: "FETCH_TIMEOUT",
        });
      }
      throw new FetchError(source, toErrorMessage(error), { cause: error });
    }
  }

  return {
    async fetch(source: string, fetchOptions: FetchOptions = {}): Promise<Item[]> {
      const xml = await download(source, fetchOptions.signal);
      const { entries, items } = parseFeed(xml, source, {
        maxItems: options.maxItems,
        fallbackPublished: now().toISOString(),
      });

      if (entries === 0) {
        throw new FetchError(source, "No entries found in feed", {
          code: "FETCH_EMPTY",
        });
      }
      if (items.length === 0) {
        throw new FetchError(source, "No valid articles could be extracted", {
          code: "FETCH_EMPTY",
        });
      }

      logger?.debug("Feed parsed", { source, entries, items: items.length });
      return items;
    },
  };
}
