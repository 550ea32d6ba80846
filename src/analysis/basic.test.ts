import { describe, expect, it } from "vitest";
import type { Article } from "../market/news/ingest.js";
import type { MarketQuote } from "../market/quotes/types.js";
import { buildBasicAnalysis, findLargestMover } from "./basic.js";

function article(title: string, category: string): Article {
  return { title, link: `https://example.com/${title}`, summary: `${title} summary`, source: "Feed", category };
}

function quote(symbol: string, changePercent: number): MarketQuote {
  return { symbol, price: 100, change: changePercent, changePercent, timestamp: "2025-01-01T00:00:00.000Z" };
}

describe("buildBasicAnalysis", () => {
  it("splits articles by category in feed order, five per section", () => {
    const articles = [
      ...["m1", "m2", "m3", "m4", "m5", "m6"].map((title) => article(title, "markets")),
      article("g1", "politics"),
      article("e1", "Economy"),
      article("g2", "world"),
    ];
    const result = buildBasicAnalysis({ articles, quotes: [], generatedAt: new Date(0) });
    expect(result.provider).toBe("Basic Analysis (No AI)");
    expect(result.fallback).toBe(true);
    expect(result.sections.marketStories.map((story) => story.headline)).toEqual([
      "m1",
      "m2",
      "m3",
      "m4",
      "m5",
    ]);
    expect(result.sections.generalStories).toEqual([
      { headline: "g1", summary: "g1 summary", source: "Feed" },
      { headline: "g2", summary: "g2 summary", source: "Feed" },
    ]);
  });

  it("names the largest mover in the outlook", () => {
    const result = buildBasicAnalysis({
      articles: [],
      quotes: [quote("SPY", 0.4), quote("GLD", -1.256), quote("QQQ", 1.256)],
      generatedAt: new Date(0),
    });
    expect(result.sections.outlook.split("\n\n")[1]).toBe(
      "Largest move among tracked symbols: **GLD** at 100.00 (-1.26%).",
    );
  });

  it("still produces an outlook without data", () => {
    const result = buildBasicAnalysis({ articles: [], quotes: [], generatedAt: new Date(0) });
    expect(result.sections.outlook).toContain("No quote data was available for this run.");
    expect(result.sections.marketStories).toEqual([]);
  });
});

describe("findLargestMover", () => {
  it("returns null for an empty snapshot", () => {
    expect(findLargestMover([])).toBeNull();
  });
});
