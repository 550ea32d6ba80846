import { setTimeout as delay } from "node:timers/promises";
import { resolveFeedTimeoutMs } from "../../config/feeds.js";
import type { FeedSettings, FeedSource } from "../../config/types.briefing.js";
import { FeedFetchError, describeError } from "../../errors.js";
import { createSubsystemLogger } from "../../logging/logger.js";
import type { HttpSession } from "../../net/session.js";
import { parseRss, type RssItem } from "./rss.js";

export type Article = {
  title: string;
  link: string;
  summary: string;
  /** Name of the feed the article came from. */
  source: string;
  category: string;
  publishedAt?: string;
};

export type FeedStatus = {
  source: string;
  ok: boolean;
  articles: number;
  error?: string;
};

export type FeedIngestResult = {
  articles: Article[];
  statuses: FeedStatus[];
  succeeded: number;
  failed: number;
};

export type FeedIngestDeps = {
  session: HttpSession;
  sleep?: (ms: number) => Promise<unknown>;
};

const log = createSubsystemLogger("news");

async function fetchFeed(
  source: FeedSource,
  settings: FeedSettings,
  session: HttpSession,
): Promise<Article[]> {
  const timeoutMs = resolveFeedTimeoutMs(source, settings);
  const res = await session.get(source.url, { timeoutMs });
  if (!res.ok) {
    throw new FeedFetchError(source.name, res.error ?? `HTTP ${res.status}`);
  }
  let items: RssItem[];
  try {
    items = parseRss(res.body, { maxItems: settings.maxArticlesPerFeed });
  } catch (err) {
    throw new FeedFetchError(source.name, `parse error - ${describeError(err)}`, { cause: err });
  }
  return items.map((item) => ({
    title: item.title,
    link: item.url,
    summary: item.summary,
    source: source.name,
    category: source.category,
    publishedAt: item.publishedAt,
  }));
}

/**
 * Fetches the given feeds one after another. A failing feed is logged and
 * counted; it never aborts the batch or reaches the caller as an exception.
 */
export async function ingestFeeds(
  sources: FeedSource[],
  settings: FeedSettings,
  deps: FeedIngestDeps,
): Promise<FeedIngestResult> {
  const sleep = deps.sleep ?? ((ms: number) => delay(ms));
  const enabled = sources.filter((source) => source.enabled);
  const articles: Article[] = [];
  const statuses: FeedStatus[] = [];
  let succeeded = 0;
  let failed = 0;

  log.info(`fetching ${enabled.length} feeds`);
  for (const [index, source] of enabled.entries()) {
    if (index > 0 && settings.rateLimitDelayMs > 0) {
      await sleep(settings.rateLimitDelayMs);
    }
    try {
      const fetched = await fetchFeed(source, settings, deps.session);
      articles.push(...fetched);
      statuses.push({ source: source.name, ok: true, articles: fetched.length });
      succeeded += 1;
      log.debug(`${source.name}: ${fetched.length} articles`);
    } catch (err) {
      const reason = err instanceof FeedFetchError ? err.reason : describeError(err);
      statuses.push({ source: source.name, ok: false, articles: 0, error: reason });
      failed += 1;
      log.warn(`${source.name}: ${reason}`);
    }
  }
  log.info(`ingested ${articles.length} articles (${succeeded} ok, ${failed} failed)`);
  return { articles, statuses, succeeded, failed };
}
