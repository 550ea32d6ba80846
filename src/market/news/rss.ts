import { DOMParser } from "linkedom";

export type RssItem = {
  title: string;
  url: string;
  summary: string;
  publishedAt?: string;
};

// Structural view of the linkedom nodes this parser reads.
type FeedNode = {
  readonly tagName?: string;
  readonly textContent: string | null;
  getAttribute(name: string): string | null;
  querySelector(selector: string): FeedNode | null;
  querySelectorAll(selector: string): ArrayLike<FeedNode>;
};

type FeedDoc = {
  readonly documentElement: FeedNode | null;
  querySelectorAll(selector: string): ArrayLike<FeedNode>;
};

// Local names of the RSS 2.0, RSS 1.0 (rdf:RDF) and Atom roots.
const FEED_ROOTS = new Set(["rss", "rdf", "feed"]);
export const SUMMARY_MAX_CHARS = 300;
const MIN_TITLE_CHARS = 4;

function textContent(node: FeedNode | null | undefined): string {
  if (!node) {
    return "";
  }
  return (node.textContent ?? "").trim();
}

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function stripTags(text: string): string {
  return collapseWhitespace(text.replace(/<[^>]+>/g, " "));
}

export function truncateSummary(text: string, maxChars = SUMMARY_MAX_CHARS): string {
  if (text.length <= maxChars) {
    return text;
  }
  return `${text.slice(0, maxChars).trimEnd()}...`;
}

function resolveItemLink(item: FeedNode): string {
  const link = textContent(item.querySelector("link"));
  if (link) {
    return link;
  }
  const links = Array.from(item.querySelectorAll("link[href]"));
  const alternate =
    links.find((el) => (el.getAttribute("rel") ?? "alternate") === "alternate") ?? links[0];
  return alternate?.getAttribute("href")?.trim() ?? "";
}

function toIsoDate(raw: string): string | undefined {
  const date = new Date(raw);
  if (!Number.isFinite(date.getTime())) {
    return undefined;
  }
  return date.toISOString();
}

function resolvePublishedAt(item: FeedNode): string | undefined {
  for (const selector of ["pubDate", "published", "updated"]) {
    const value = textContent(item.querySelector(selector));
    if (value) {
      const iso = toIsoDate(value);
      if (iso) {
        return iso;
      }
    }
  }
  return undefined;
}

function resolveSummary(item: FeedNode): string {
  for (const selector of ["description", "summary", "content"]) {
    const value = textContent(item.querySelector(selector));
    if (value) {
      return truncateSummary(stripTags(value));
    }
  }
  return "";
}

function extractItems(doc: FeedDoc): FeedNode[] {
  const rssItems = Array.from(doc.querySelectorAll("item"));
  if (rssItems.length > 0) {
    return rssItems;
  }
  return Array.from(doc.querySelectorAll("entry"));
}

function rootName(doc: FeedDoc): string {
  const tag = doc.documentElement?.tagName ?? "";
  const local = tag.split(":").pop() ?? "";
  return local.toLowerCase();
}

/**
 * Parses an RSS 2.0, RSS 1.0 (RDF) or Atom document. Throws when the body
 * is not a syndication document at all. Only the first `maxItems` entries
 * are read; among those, entries without a usable title or link are skipped.
 */
export function parseRss(xml: string, options: { maxItems?: number } = {}): RssItem[] {
  if (!xml.trim()) {
    throw new Error("empty feed body");
  }
  const parser = new DOMParser();
  const doc: FeedDoc | null = parser.parseFromString(xml, "text/xml");
  if (!doc || !FEED_ROOTS.has(rootName(doc))) {
    throw new Error("not an RSS or Atom document");
  }
  const results: RssItem[] = [];
  const entries = extractItems(doc);
  const limited = options.maxItems === undefined ? entries : entries.slice(0, options.maxItems);
  for (const item of limited) {
    const title = collapseWhitespace(textContent(item.querySelector("title")));
    const url = resolveItemLink(item);
    if (title.length < MIN_TITLE_CHARS || !url) {
      continue;
    }
    results.push({
      title,
      url,
      summary: resolveSummary(item),
      publishedAt: resolvePublishedAt(item),
    });
  }
  return results;
}
