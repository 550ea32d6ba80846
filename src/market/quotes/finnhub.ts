import { z } from "zod";
import type { QuoteSourceHandler } from "./types.js";

export const FINNHUB_BASE_URL = "https://finnhub.io/api/v1";

const FinnhubQuoteSchema = z.object({
  c: z.number().nullable().optional(),
  d: z.number().nullable().optional(),
  dp: z.number().nullable().optional(),
  t: z.number().nullable().optional(),
});

// `t` is epoch seconds; out-of-range values fall back to the fetch time.
function quoteTimestamp(ts: number | null | undefined, now: () => Date): string {
  const date = ts ? new Date(ts * 1000) : now();
  return Number.isFinite(date.getTime()) ? date.toISOString() : now().toISOString();
}

export function createFinnhubQuoteHandler(params: {
  apiKey: string;
  baseUrl?: string;
  now?: () => Date;
}): QuoteSourceHandler {
  const baseUrl = params.baseUrl ?? FINNHUB_BASE_URL;
  const now = params.now ?? (() => new Date());
  return async ({ symbol, timeoutMs, session }) => {
    const url = `${baseUrl}/quote?symbol=${encodeURIComponent(symbol)}`;
    const res = await session.get(url, {
      timeoutMs,
      headers: { accept: "application/json", "x-finnhub-token": params.apiKey },
    });
    if (!res.ok) {
      return { ok: false, reason: res.error ?? `HTTP ${res.status}` };
    }
    let json: unknown;
    try {
      json = JSON.parse(res.body);
    } catch {
      return { ok: false, reason: "malformed quote response" };
    }
    const parsed = FinnhubQuoteSchema.safeParse(json);
    if (!parsed.success) {
      return { ok: false, reason: "malformed quote response" };
    }
    const { c: price, d: change, dp: changePercent, t: ts } = parsed.data;
    // Finnhub answers unknown symbols with an all-zero quote.
    if (!price || !Number.isFinite(price)) {
      return { ok: false, reason: "unknown symbol or no price" };
    }
    return {
      ok: true,
      quote: {
        symbol: symbol.toUpperCase(),
        price,
        change: change ?? 0,
        changePercent: changePercent ?? 0,
        timestamp: quoteTimestamp(ts, now),
      },
    };
  };
}
