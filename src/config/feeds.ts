import fs from "node:fs";
import { StartupConfigError, describeError } from "../errors.js";
import type { FeedDocument, FeedSettings, FeedSource } from "./types.briefing.js";
import { FeedDocumentSchema } from "./zod-schema.briefing.js";

export const DEFAULT_FEEDS_URL = new URL("../../config/feeds.json", import.meta.url);

function secondsToMs(seconds: number): number {
  return Math.round(seconds * 1000);
}

export function feedIdentity(source: FeedSource): string {
  return `${source.name}|${source.url}`;
}

export function parseFeedDocument(raw: unknown): FeedDocument {
  const parsed = FeedDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new StartupConfigError(`Invalid feed configuration: ${detail}`);
  }
  const { rss_feeds: rssFeeds, config } = parsed.data;
  const seen = new Set<string>();
  const feeds: FeedSource[] = [];
  for (const entry of rssFeeds) {
    const source: FeedSource = {
      name: entry.name,
      url: entry.url,
      enabled: entry.enabled,
      category: entry.category,
      timeoutMs: entry.timeout === undefined ? undefined : secondsToMs(entry.timeout),
      note: entry.note,
    };
    const identity = feedIdentity(source);
    if (seen.has(identity)) {
      throw new StartupConfigError(`Duplicate feed source: ${source.name} (${source.url})`);
    }
    seen.add(identity);
    feeds.push(Object.freeze(source));
  }
  const timeoutOverridesMs: Record<string, number> = {};
  for (const [host, seconds] of Object.entries(config.timeout_overrides ?? {})) {
    timeoutOverridesMs[host.toLowerCase()] = secondsToMs(seconds);
  }
  return {
    feeds,
    settings: {
      maxArticlesPerFeed: config.max_articles_per_feed,
      defaultTimeoutMs: secondsToMs(config.default_timeout),
      timeoutOverridesMs,
      rateLimitDelayMs: secondsToMs(config.rate_limit_delay),
    },
  };
}

export function loadFeedDocument(filePath: string | URL = DEFAULT_FEEDS_URL): FeedDocument {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (err) {
    throw new StartupConfigError(`Cannot read feed configuration ${String(filePath)}`, [], {
      cause: err,
    });
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new StartupConfigError(
      `Feed configuration ${String(filePath)} is not valid JSON: ${describeError(err)}`,
      [],
      { cause: err },
    );
  }
  return parseFeedDocument(json);
}

export function selectEnabledFeeds(doc: FeedDocument): FeedSource[] {
  return doc.feeds.filter((source) => source.enabled);
}

export function resolveFeedTimeoutMs(source: FeedSource, settings: FeedSettings): number {
  if (source.timeoutMs !== undefined) {
    return source.timeoutMs;
  }
  try {
    const host = new URL(source.url).hostname.toLowerCase();
    const override = settings.timeoutOverridesMs[host];
    if (override !== undefined) {
      return override;
    }
  } catch {
    return settings.defaultTimeoutMs;
  }
  return settings.defaultTimeoutMs;
}
