import { describe, expect, it } from "vitest";
import { parseRss, stripTags, truncateSummary } from "./rss.js";

describe("parseRss", () => {
  it("parses RSS items", () => {
    const xml = `<?xml version="1.0"?>
      <rss version="2.0">
        <channel>
          <title>Channel Title</title>
          <item>
            <title>Test Title</title>
            <link>https://example.com/article</link>
            <description>Stocks   closed higher.</description>
            <pubDate>Fri, 01 Mar 2024 10:00:00 GMT</pubDate>
          </item>
        </channel>
      </rss>`;
    const items = parseRss(xml);
    expect(items).toHaveLength(1);
    expect(items[0]?.title).toBe("Test Title");
    expect(items[0]?.url).toBe("https://example.com/article");
    expect(items[0]?.summary).toBe("Stocks closed higher.");
    expect(items[0]?.publishedAt).toBe("2024-03-01T10:00:00.000Z");
  });

  it("parses Atom entries", () => {
    const xml = `<?xml version="1.0"?>
      <feed xmlns="http://www.w3.org/2005/Atom">
        <entry>
          <title>Atom Entry</title>
          <link rel="self" href="https://example.com/self" />
          <link rel="alternate" href="https://example.com/atom" />
          <summary>Short summary</summary>
          <updated>2024-04-01T12:00:00Z</updated>
        </entry>
      </feed>`;
    const items = parseRss(xml);
    expect(items).toHaveLength(1);
    expect(items[0]?.title).toBe("Atom Entry");
    expect(items[0]?.url).toBe("https://example.com/atom");
    expect(items[0]?.summary).toBe("Short summary");
    expect(items[0]?.publishedAt).toBe("2024-04-01T12:00:00.000Z");
  });

  it("keeps document order and skips entries without usable titles", () => {
    const xml = `<rss version="2.0"><channel>
      <item><title>First story</title><link>https://example.com/1</link></item>
      <item><title>Ok</title><link>https://example.com/2</link></item>
      <item><title>Third story</title><link>https://example.com/3</link><pubDate>not a date</pubDate></item>
    </channel></rss>`;
    const items = parseRss(xml);
    expect(items.map((item) => item.title)).toEqual(["First story", "Third story"]);
    expect(items[1]?.publishedAt).toBeUndefined();
  });

  it("reads only the first maxItems entries", () => {
    const xml = `<rss version="2.0"><channel>
      <item><title>Ok</title><link>https://example.com/1</link></item>
      <item><title>Second story</title><link>https://example.com/2</link></item>
      <item><title>Third story</title><link>https://example.com/3</link></item>
    </channel></rss>`;
    expect(parseRss(xml, { maxItems: 2 }).map((item) => item.title)).toEqual(["Second story"]);
    expect(parseRss(xml).map((item) => item.title)).toEqual(["Second story", "Third story"]);
  });

  it("accepts RSS 1.0 documents", () => {
    const xml = `<rdf:RDF xmlns:rdf="http://www.w3.org/1999/02/22-rdf-syntax-ns#" xmlns="http://purl.org/rss/1.0/">
      <item><title>RDF story</title><link>https://example.com/rdf</link></item>
    </rdf:RDF>`;
    expect(parseRss(xml).map((item) => item.url)).toEqual(["https://example.com/rdf"]);
  });

  it("rejects documents that are not feeds", () => {
    expect(() => parseRss("<html><body>Maintenance</body></html>")).toThrow(
      "not an RSS or Atom document",
    );
    expect(() => parseRss("   ")).toThrow("empty feed body");
  });
});

describe("stripTags", () => {
  it("removes markup and collapses whitespace", () => {
    expect(stripTags("<p>Stocks <b>rose</b>\n today</p>")).toBe("Stocks rose today");
  });
});

describe("truncateSummary", () => {
  it("cuts long text with an ellipsis", () => {
    expect(truncateSummary("abcdef", 3)).toBe("abc...");
    expect(truncateSummary("abc", 3)).toBe("abc");
  });
});
