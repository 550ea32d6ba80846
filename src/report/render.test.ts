import { describe, expect, it } from "vitest";
import type { AnalysisResult } from "../analysis/types.js";
import type { Article } from "../market/news/ingest.js";
import { renderReport, type ReportInput } from "./render.js";

const ANALYSIS: AnalysisResult = {
  provider: "Anthropic <model>",
  providerId: "anthropic",
  fallback: false,
  sections: {
    marketStories: [
      { headline: "<script>alert(1)</script> Stocks & bonds", summary: "Rally <b>broad</b>", source: "Wire" },
    ],
    generalStories: [{ headline: "Storm hits coast", summary: "" }],
    outlook: "Watch **CPI**.\n\n<img src=x onerror=alert(1)>",
  },
};

const ARTICLES: Article[] = [
  {
    title: "<script>document.cookie</script>",
    link: "https://example.com/a?x=1&y=2",
    summary: "",
    source: "Feed & Co",
    category: "markets",
  },
  {
    title: "Plain headline",
    link: "javascript:alert(1)",
    summary: "",
    source: "Feed",
    category: "general",
  },
];

function input(overrides: Partial<ReportInput> = {}): ReportInput {
  return {
    analysis: ANALYSIS,
    quotes: [
      { symbol: "SPY", price: 512.3, change: 2.5, changePercent: 0.49, timestamp: "" },
      { symbol: "GLD", price: 190, change: -1.25, changePercent: -0.654, timestamp: "" },
      { symbol: "UUP", price: 28, change: 0, changePercent: 0, timestamp: "" },
    ],
    articles: ARTICLES,
    feeds: { succeeded: 2, total: 2 },
    trackedSymbols: ["SPY", "GLD", "UUP"],
    generatedAt: new Date("2025-03-01T12:30:00Z"),
    ...overrides,
  };
}

describe("renderReport", () => {
  it("never lets feed or model markup through", () => {
    const { html } = renderReport(input());
    expect(html).not.toContain("<script");
    expect(html).not.toContain("<img");
    expect(html).toContain(
      "<strong>&lt;script&gt;alert(1)&lt;/script&gt; Stocks &amp; bonds</strong>",
    );
    expect(html).toContain(
      '<a href="https://example.com/a?x=1&amp;y=2">&lt;script&gt;document.cookie&lt;/script&gt;</a>',
    );
    expect(html).toContain("<p>&lt;img src=x onerror=alert(1)&gt;</p>");
    expect(html).toContain("<strong>Analysis by:</strong> Anthropic &lt;model&gt;<br>");
  });

  it("renders unsafe links as plain text", () => {
    const { html } = renderReport(input());
    expect(html).toContain('<li class="headline">Plain headline <span class="source">Feed</span></li>');
  });

  it("colors quote rows by sign", () => {
    const { html } = renderReport(input());
    expect(html).toContain(
      '<tr class="quote"><td>SPY</td><td>512.30</td><td style="color: #1e8e3e;">+2.50</td><td style="color: #1e8e3e;">+0.49%</td></tr>',
    );
    expect(html).toContain(
      '<tr class="quote"><td>GLD</td><td>190.00</td><td style="color: #d93025;">-1.25</td><td style="color: #d93025;">-0.65%</td></tr>',
    );
    expect(html).toContain('<td style="color: #5f6368;">0.00</td>');
  });

  it("summarizes data sources and subject", () => {
    const report = renderReport(input({ feeds: { succeeded: 1, total: 2 } }));
    expect(report.subject).toBe("Market Intelligence Brief - March 1, 2025");
    expect(report.html).toContain("2 articles from 1/2 feeds");
    expect(report.html).toContain("(many feeds failed)");
    expect(report.html.match(/<li class="headline">/g)).toHaveLength(2);
  });

  it("builds a plain-text alternative", () => {
    const { text } = renderReport(input({ quotes: [] }));
    expect(text.split("\n").slice(0, 8)).toEqual([
      "Daily Market & News Intelligence",
      "Generated: March 1, 2025 at 12:30 PM UTC",
      "Analysis by: Anthropic <model>",
      "Data Sources: 2 articles from 2/2 feeds",
      "",
      "MARKET SNAPSHOT",
      "No quote data available for this run.",
      "",
    ]);
    expect(text).toContain("Watch CPI.");
  });

  it("contains no scripting", () => {
    const { html } = renderReport(input());
    expect(html.startsWith("<!DOCTYPE html>")).toBe(true);
    expect(html).not.toMatch(/<script\b/i);
    expect(html).not.toMatch(/<[a-z]+[^>]*\son\w+=/i);
  });
});
