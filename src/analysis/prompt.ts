import type { Article } from "../market/news/ingest.js";
import type { MarketQuote } from "../market/quotes/types.js";
import type { AnalysisRequest, ProviderPrompt } from "./types.js";

export const ANALYSIS_SYSTEM_PROMPT = [
  "You are a professional financial market analyst writing a concise briefing.",
  "Take the current time of day into account (morning pre-market vs. evening wrap-up).",
  "Respond with a single JSON object and nothing else, using exactly these keys:",
  '{"market_stories": [{"headline": string, "summary": string, "source": string}],',
  ' "general_stories": [{"headline": string, "summary": string, "source": string}],',
  ' "outlook": string}',
  "market_stories: up to 6 of the most important market and economy stories.",
  "general_stories: up to 6 other notable news stories.",
  "outlook: one or two short paragraphs on what to watch next. You may use **bold** for emphasis.",
  "Only use facts present in the supplied headlines and quotes.",
].join("\n");

function formatSigned(value: number, digits = 2): string {
  const fixed = value.toFixed(digits);
  return value > 0 ? `+${fixed}` : fixed;
}

export function formatQuoteLine(quote: MarketQuote): string {
  return `${quote.symbol}: ${quote.price.toFixed(2)} (${formatSigned(quote.change)}, ${formatSigned(
    quote.changePercent,
  )}%)`;
}

function formatArticleLine(article: Article, index: number): string {
  const summary = article.summary ? ` - ${article.summary}` : "";
  return `${index + 1}. [${article.source} / ${article.category}] ${article.title}${summary}`;
}

export function buildAnalysisPrompt(request: AnalysisRequest): ProviderPrompt {
  const quoteLines =
    request.quotes.length > 0
      ? request.quotes.map(formatQuoteLine).join("\n")
      : "No quote data available.";
  const articleLines =
    request.articles.length > 0
      ? request.articles.map(formatArticleLine).join("\n")
      : "No headlines available.";
  const user = [
    `Current time (UTC): ${request.generatedAt.toISOString()}`,
    "",
    "MARKET SNAPSHOT",
    quoteLines,
    "",
    `HEADLINES (${request.articles.length})`,
    articleLines,
  ].join("\n");
  return { system: ANALYSIS_SYSTEM_PROMPT, user };
}
