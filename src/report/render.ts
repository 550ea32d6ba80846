import type { AnalysisResult, Story } from "../analysis/types.js";
import type { Article } from "../market/news/ingest.js";
import type { MarketQuote } from "../market/quotes/types.js";
import { escapeHtml, renderProse, safeHref } from "./escape.js";
import {
  TREND_COLORS,
  feedHealth,
  formatLongDate,
  formatPercent,
  formatPrice,
  formatSignedFixed,
  formatTimestamp,
  trendOf,
  type FeedHealth,
} from "./format.js";

export type ReportInput = {
  analysis: AnalysisResult;
  quotes: MarketQuote[];
  articles: Article[];
  feeds: { succeeded: number; total: number };
  trackedSymbols: string[];
  generatedAt: Date;
};

export type RenderedReport = {
  subject: string;
  html: string;
  text: string;
};

export const REPORT_TITLE = "Daily Market & News Intelligence";

const HEALTH_MARKERS: Record<FeedHealth, { label: string; color: string }> = {
  good: { label: "all feeds ok", color: "#1e8e3e" },
  warning: { label: "some feeds failed", color: "#f39c12" },
  error: { label: "many feeds failed", color: "#d93025" },
};

const STYLES = `
  body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; line-height: 1.6; color: #333; margin: 0; padding: 20px 0; background-color: #f5f5f5; }
  .container { background-color: #fff; padding: 30px; border-radius: 10px; max-width: 800px; margin: 0 auto; }
  .header { text-align: center; margin-bottom: 30px; padding-bottom: 20px; border-bottom: 3px solid #2c3e50; }
  .header h1 { color: #2c3e50; margin: 0; font-size: 26px; }
  .meta { color: #666; font-size: 14px; margin-top: 10px; background-color: #f8f9fa; padding: 10px; border-radius: 5px; }
  h2 { color: #2c3e50; border-bottom: 2px solid #3498db; padding-bottom: 8px; margin-top: 30px; font-size: 22px; }
  table.quotes { width: 100%; border-collapse: collapse; font-size: 14px; }
  table.quotes th, table.quotes td { padding: 6px 8px; border-bottom: 1px solid #eee; text-align: right; }
  table.quotes th:first-child, table.quotes td:first-child { text-align: left; }
  .story { margin: 12px 0; }
  .story .source, .headline .source { color: #888; font-size: 12px; }
  .footer { margin-top: 40px; padding-top: 20px; border-top: 2px solid #eee; text-align: center; color: #666; font-size: 12px; }
  @media screen and (max-width: 600px) { .container { padding: 15px; border-radius: 0; } }
`;

export function buildSubject(generatedAt: Date): string {
  return `Market Intelligence Brief - ${formatLongDate(generatedAt)}`;
}

function renderQuoteRow(quote: MarketQuote): string {
  const color = TREND_COLORS[trendOf(quote.change)];
  return [
    `<tr class="quote">`,
    `<td>${escapeHtml(quote.symbol)}</td>`,
    `<td>${formatPrice(quote.price)}</td>`,
    `<td style="color: ${color};">${formatSignedFixed(quote.change)}</td>`,
    `<td style="color: ${color};">${formatPercent(quote.changePercent)}</td>`,
    `</tr>`,
  ].join("");
}

function renderQuotes(quotes: MarketQuote[]): string {
  if (quotes.length === 0) {
    return `<p>No quote data available for this run.</p>`;
  }
  return [
    `<table class="quotes">`,
    `<tr><th>Symbol</th><th>Price</th><th>Change</th><th>Change %</th></tr>`,
    ...quotes.map(renderQuoteRow),
    `</table>`,
  ].join("\n");
}

function renderLink(title: string, href: string): string {
  const safe = safeHref(href);
  if (!safe) {
    return escapeHtml(title);
  }
  return `<a href="${escapeHtml(safe)}">${escapeHtml(title)}</a>`;
}

function renderStory(story: Story): string {
  const source = story.source ? ` <span class="source">(${escapeHtml(story.source)})</span>` : "";
  const summary = story.summary ? `<br>${escapeHtml(story.summary)}` : "";
  return `<div class="story"><strong>${escapeHtml(story.headline)}</strong>${source}${summary}</div>`;
}

function renderStories(stories: Story[]): string {
  if (stories.length === 0) {
    return `<p>No stories in this section.</p>`;
  }
  return stories.map(renderStory).join("\n");
}

function renderHeadlines(articles: Article[]): string {
  if (articles.length === 0) {
    return `<p>No headlines were collected.</p>`;
  }
  const items = articles.map(
    (article) =>
      `<li class="headline">${renderLink(article.title, article.link)} <span class="source">${escapeHtml(
        article.source,
      )}</span></li>`,
  );
  return `<ul>\n${items.join("\n")}\n</ul>`;
}

function renderMeta(input: ReportInput): string {
  const health = HEALTH_MARKERS[feedHealth(input.feeds.succeeded, input.feeds.total)];
  const articleCount = input.articles.length.toLocaleString("en-US");
  return [
    `<strong>Generated:</strong> ${escapeHtml(formatTimestamp(input.generatedAt))}<br>`,
    `<strong>Analysis by:</strong> ${escapeHtml(input.analysis.provider)}<br>`,
    `<strong>Data Sources:</strong> ${articleCount} articles from ${input.feeds.succeeded}/${input.feeds.total} feeds`,
    ` <span class="feed-health" style="color: ${health.color};">(${health.label})</span>`,
  ].join("\n");
}

/** Renders the briefing as one static HTML document plus a plain-text alternative. */
export function renderReport(input: ReportInput): RenderedReport {
  const { sections } = input.analysis;
  const tracked = input.trackedSymbols.map(escapeHtml).join(" | ");
  const html = `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>${escapeHtml(REPORT_TITLE)}</title>
<style>${STYLES}</style>
</head>
<body>
<div class="container">
<div class="header">
<h1>${escapeHtml(REPORT_TITLE)}</h1>
<div class="meta">
${renderMeta(input)}
</div>
</div>
<h2>Market Snapshot</h2>
${renderQuotes(input.quotes)}
<h2>Top Market &amp; Economy Stories</h2>
${renderStories(sections.marketStories)}
<h2>General News</h2>
${renderStories(sections.generalStories)}
<h2>Looking Ahead</h2>
${renderProse(sections.outlook)}
<h2>Source Headlines</h2>
${renderHeadlines(input.articles)}
<div class="footer">
<p><strong>Market Intelligence Briefing</strong></p>
<p>Tracking: ${tracked}</p>
</div>
</div>
</body>
</html>
`;
  return { subject: buildSubject(input.generatedAt), html, text: renderText(input) };
}

function storyLines(stories: Story[]): string[] {
  return stories.map((story) => {
    const source = story.source ? ` (${story.source})` : "";
    const summary = story.summary ? `\n  ${story.summary}` : "";
    return `- ${story.headline}${source}${summary}`;
  });
}

export function renderText(input: ReportInput): string {
  const { sections } = input.analysis;
  const quoteLines = input.quotes.map(
    (quote) =>
      `${quote.symbol}: ${formatPrice(quote.price)} (${formatSignedFixed(quote.change)}, ${formatPercent(
        quote.changePercent,
      )})`,
  );
  return [
    REPORT_TITLE,
    `Generated: ${formatTimestamp(input.generatedAt)}`,
    `Analysis by: ${input.analysis.provider}`,
    `Data Sources: ${input.articles.length} articles from ${input.feeds.succeeded}/${input.feeds.total} feeds`,
    "",
    "MARKET SNAPSHOT",
    ...(quoteLines.length > 0 ? quoteLines : ["No quote data available for this run."]),
    "",
    "TOP MARKET & ECONOMY STORIES",
    ...storyLines(sections.marketStories),
    "",
    "GENERAL NEWS",
    ...storyLines(sections.generalStories),
    "",
    "LOOKING AHEAD",
    sections.outlook.replace(/\*\*([^*]+)\*\*/g, "$1"),
    "",
  ].join("\n");
}
