import { describe, it, expect, vi } from "vitest";
import { FetchError } from "@newsdesk/shared";
import { cleanText, createRssFetcher, decodeEntities, parseFeed, sourceNameFor } from "../rss.js";

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const RSS_FEED = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0" xmlns:dc="http://purl.org/dc/elements/1.1/" xmlns:content="http://purl.org/rss/1.0/modules/content/">
  <channel>
    <title>Example News</title>
    <link>https://www.example.com/</link>
    <item>
      <title><![CDATA[Harbour & rail plan approved]]></title>
      <link>https://www.example.com/harbour</link>
      <description>&lt;p&gt;The council &lt;b&gt;voted&lt;/b&gt; 7 to 2.&lt;/p&gt;</description>
      <pubDate>Mon, 06 May 2024 08:30:00 GMT</pubDate>
      <dc:creator>Kadri Tamm</dc:creator>
      <category>Transport</category>
      <category>Local</category>
    </item>
    <item>
      <title>No link here</title>
      <description>Skipped.</description>
    </item>
    <item>
      <title>Bare item</title>
      <link>https://www.example.com/bare</link>
    </item>
  </channel>
</rss>`;

const ATOM_FEED = `<?xml version="1.0" encoding="utf-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>Atom Example</title>
  <entry>
    <title type="html">Chip exports rise</title>
    <link rel="self" href="https://atom.example.org/api/1"/>
    <link rel="alternate" href="https://atom.example.org/chips"/>
    <updated>2024-05-05T12:00:00Z</updated>
    <summary>Exports rose 4%.</summary>
    <author><name>Mari Kask</name></author>
    <category term="economy"/>
  </entry>
</feed>`;

const FALLBACK = "2024-05-06T10:00:00.000Z";

function respondWith(body: string, init?: ResponseInit) {
  return vi.fn(async () => new Response(body, init));
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

describe("parseFeed", () => {
  it("extracts RSS items and skips entries without a link", () => {
    const { entries, items } = parseFeed(RSS_FEED, "https://www.example.com/rss", {
      maxItems: 10,
      fallbackPublished: FALLBACK,
    });

    expect(entries).toBe(3);
    expect(items).toHaveLength(2);
    expect(items[0]).toEqual({
      title: "Harbour & rail plan approved",
      link: "https://www.example.com/harbour",
      summary: "The council voted 7 to 2.",
      published: "Mon, 06 May 2024 08:30:00 GMT",
      source: "https://www.example.com/rss",
      sourceName: "EXAMPLE",
      authors: ["Kadri Tamm"],
      tags: ["Transport", "Local"],
    });
  });

  it("uses defaults for missing optional fields", () => {
    const { items } = parseFeed(RSS_FEED, "https://www.example.com/rss", {
      maxItems: 10,
      fallbackPublished: FALLBACK,
    });
    expect(items[1]).toMatchObject({
      title: "Bare item",
      summary: "",
      published: FALLBACK,
      authors: [],
      tags: [],
    });
  });

  it("reads Atom entries with the alternate link", () => {
    const { items } = parseFeed(ATOM_FEED, "https://atom.example.org/feed", {
      maxItems: 10,
      fallbackPublished: FALLBACK,
    });
    expect(items).toEqual([
      {
        title: "Chip exports rise",
        link: "https://atom.example.org/chips",
        summary: "Exports rose 4%.",
        published: "2024-05-05T12:00:00Z",
        source: "https://atom.example.org/feed",
        sourceName: "ATOM",
        authors: ["Mari Kask"],
        tags: ["economy"],
      },
    ]);
  });

  it("reads only the first maxItems entries", () => {
    const { entries, items } = parseFeed(RSS_FEED, "https://www.example.com/rss", {
      maxItems: 1,
      fallbackPublished: FALLBACK,
    });
    expect(entries).toBe(1);
    expect(items.map((item) => item.title)).toEqual(["Harbour & rail plan approved"]);
  });
});

describe("text helpers", () => {
  it("decodes named and numeric entities", () => {
    expect(decodeEntities("a &amp; b &#228; &#x41; &unknown;")).toBe("a & b ä A &unknown;");
  });

  it("strips markup and collapses whitespace", () => {
    expect(cleanText("  <p>One\n  <i>two</i></p> ")).toBe("One two");
  });

  it("keeps escaped angle brackets that are not markup", () => {
    expect(cleanText("a &lt;3 b &gt; c")).toBe("a <3 b > c");
  });

  it("strips entity-escaped markup", () => {
    expect(cleanText("&lt;p&gt;Rates &lt;b&gt;held&lt;/b&gt;&lt;/p&gt;")).toBe("Rates held");
  });

  it("leaves CDATA content undecoded", () => {
    expect(cleanText("<![CDATA[Fish &amp; chips <b>daily</b>]]> &amp; more")).toBe(
      "Fish &amp; chips daily & more",
    );
  });

  it("names a source after its first domain label", () => {
    expect(sourceNameFor("https://www.err.ee/rss")).toBe("ERR");
    expect(sourceNameFor("http://feeds.bbci.co.uk/news/rss.xml")).toBe("FEEDS");
    expect(sourceNameFor("not a url")).toBe("not a url");
  });
});

// ---------------------------------------------------------------------------
// Fetcher
// ---------------------------------------------------------------------------

describe("createRssFetcher", () => {
  it("fetches and parses a feed with a user agent", async () => {
    const fetchImpl = respondWith(RSS_FEED);
    const fetcher = createRssFetcher({ maxItems: 10, timeoutMs: 1000, fetchImpl });

    const items = await fetcher.fetch("https://www.example.com/rss");

    expect(items).toHaveLength(2);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it("rejects HTTP errors with a FetchError", async () => {
    const fetcher = createRssFetcher({
      maxItems: 10,
      timeoutMs: 1000,
      fetchImpl: respondWith("gone", { status: 404 }),
    });

    await expect(fetcher.fetch("https://www.example.com/rss")).rejects.toMatchObject({
      name: "FetchError",
      source: "https://www.example.com/rss",
      code: "FETCH_HTTP_ERROR",
      message: "Failed to fetch from https://www.example.com/rss: HTTP 404",
    });
  });

  it("rejects a feed without entries", async () => {
    const fetcher = createRssFetcher({
      maxItems: 10,
      timeoutMs: 1000,
      fetchImpl: respondWith("<rss><channel><title>Empty</title></channel></rss>"),
    });

    await expect(fetcher.fetch("https://www.example.com/rss")).rejects.toThrow(
      "Failed to fetch from https://www.example.com/rss: No entries found in feed",
    );
  });

  it("rejects a feed whose entries are all invalid", async () => {
    const fetcher = createRssFetcher({
      maxItems: 10,
      timeoutMs: 1000,
      fetchImpl: respondWith("<rss><channel><item><title>Only</title></item></channel></rss>"),
    });

    await expect(fetcher.fetch("https://www.example.com/rss")).rejects.toThrow(
      "No valid articles could be extracted",
    );
  });

  it("wraps network failures", async () => {
    const fetcher = createRssFetcher({
      maxItems: 10,
      timeoutMs: 1000,
      fetchImpl: vi.fn(async () => {
        throw new TypeError("fetch failed");
      }),
    });

    const error = await fetcher.fetch("https://www.example.com/rss").catch((e: unknown) => e);
    expect(error).toBeInstanceOf(FetchError);
    if (error instanceof FetchError) {
      expect(error.message).toBe("Failed to fetch from https://www.example.com/rss: fetch failed");
      expect(error.cause).toBeInstanceOf(TypeError);
    }
  });

  it("times out slow feeds", async () => {
    const fetchImpl = vi.fn(
      (_url: string | URL | Request, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(init?.signal?.reason));
        }),
    );
    const fetcher = createRssFetcher({ maxItems: 10, timeoutMs: 20, fetchImpl });

    await expect(fetcher.fetch("https://slow.example.com/rss")).rejects.toMatchObject({
      code: "FETCH_TIMEOUT",
      message: "Failed to fetch from https://slow.example.com/rss: Timed out after 20ms",
    });
  });
});
