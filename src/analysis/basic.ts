import type { Article } from "../market/news/ingest.js";
import type { MarketQuote } from "../market/quotes/types.js";
import type { AnalysisRequest, AnalysisResult, Story } from "./types.js";

export const BASIC_ANALYSIS_LABEL = "Basic Analysis (No AI)";
export const BASIC_STORIES_PER_SECTION = 5;
export const MARKET_CATEGORIES = new Set(["markets", "economy", "finance", "business"]);

function toStory(article: Article): Story {
  return { headline: article.title, summary: article.summary, source: article.source };
}

/** Largest absolute percentage move; earlier symbols win ties. */
export function findLargestMover(quotes: MarketQuote[]): MarketQuote | null {
  let best: MarketQuote | null = null;
  for (const quote of quotes) {
    if (!best || Math.abs(quote.changePercent) > Math.abs(best.changePercent)) {
      best = quote;
    }
  }
  return best;
}

function describeMover(quotes: MarketQuote[]): string {
  const mover = findLargestMover(quotes);
  if (!mover) {
    return "No quote data was available for this run.";
  }
  const pct = mover.changePercent.toFixed(2);
  const signed = mover.changePercent > 0 ? `+${pct}` : pct;
  return `Largest move among tracked symbols: **${mover.symbol}** at ${mover.price.toFixed(2)} (${signed}%).`;
}

/**
 * Rule-based summary used when no AI provider answered. Market stories are
 * the first articles from market/economy feeds and general stories the first
 * of the rest, both in feed-configuration order.
 */
export function buildBasicAnalysis(request: AnalysisRequest): AnalysisResult {
  const marketStories: Story[] = [];
  const generalStories: Story[] = [];
  for (const article of request.articles) {
    const isMarket = MARKET_CATEGORIES.has(article.category.toLowerCase());
    const bucket = isMarket ? marketStories : generalStories;
    if (bucket.length < BASIC_STORIES_PER_SECTION) {
      bucket.push(toStory(article));
    }
  }
  const outlook = [
    "AI analysis unavailable; headlines are listed in feed order without commentary.",
    describeMover(request.quotes),
    "Monitor upcoming economic data releases and corporate earnings reports.",
  ].join("\n\n");
  return {
    provider: BASIC_ANALYSIS_LABEL,
    providerId: "basic",
    sections: { marketStories, generalStories, outlook },
    fallback: true,
  };
}
