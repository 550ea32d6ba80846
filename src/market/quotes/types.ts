import type { HttpSession } from "../../net/session.js";

export type MarketQuote = {
  symbol: string;
  price: number;
  change: number;
  changePercent: number;
  /** ISO-8601 time of the quote as reported by the provider. */
  timestamp: string;
};

export type QuoteFetchParams = {
  symbol: string;
  timeoutMs: number;
  session: HttpSession;
};

export type QuoteOutcome = { ok: true; quote: MarketQuote } | { ok: false; reason: string };

export type QuoteSourceHandler = (params: QuoteFetchParams) => Promise<QuoteOutcome>;
