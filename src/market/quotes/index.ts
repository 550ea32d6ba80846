import { QuoteFetchError, describeError } from "../../errors.js";
import { createSubsystemLogger } from "../../logging/logger.js";
import type { HttpSession } from "../../net/session.js";
import type { MarketQuote, QuoteOutcome, QuoteSourceHandler } from "./types.js";

export const DEFAULT_SYMBOLS = ["QQQ", "SPY", "UUP", "IWM", "GLD", "COINBASE:BTCUSD", "MP"];
export const DEFAULT_QUOTE_TIMEOUT_MS = 10_000;

export type QuoteBatch = {
  quotes: MarketQuote[];
  omitted: string[];
};

const log = createSubsystemLogger("quotes");

export function normalizeSymbols(raw: string[]): string[] {
  const seen = new Set<string>();
  const symbols: string[] = [];
  for (const entry of raw) {
    const symbol = entry.trim().toUpperCase();
    if (!symbol || seen.has(symbol)) {
      continue;
    }
    seen.add(symbol);
    symbols.push(symbol);
  }
  return symbols;
}

/** One request per symbol, in order. Unreachable symbols are logged and omitted. */
export async function fetchQuotes(params: {
  symbols: string[];
  handler: QuoteSourceHandler;
  session: HttpSession;
  timeoutMs?: number;
}): Promise<QuoteBatch> {
  const quotes: MarketQuote[] = [];
  const omitted: string[] = [];
  for (const symbol of params.symbols) {
    let outcome: QuoteOutcome;
    try {
      outcome = await params.handler({
        symbol,
        timeoutMs: params.timeoutMs ?? DEFAULT_QUOTE_TIMEOUT_MS,
        session: params.session,
      });
    } catch (err) {
      outcome = { ok: false, reason: `unexpected error - ${describeError(err)}` };
    }
    if (outcome.ok) {
      quotes.push(outcome.quote);
      continue;
    }
    omitted.push(symbol);
    log.warn(new QuoteFetchError(symbol, outcome.reason).message);
  }
  log.info(`fetched ${quotes.length}/${params.symbols.length} quotes`);
  return { quotes, omitted };
}
