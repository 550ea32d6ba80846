export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

export type RequestLimits = {
  timeoutMs: number;
  maxBytes?: number;
  headers?: Record<string, string>;
};

export type FetchFailure = "timeout" | "network" | "http";

export type FetchResult = {
  ok: boolean;
  status: number;
  body: string;
  bytes: number;
  failure?: FetchFailure;
  error?: string;
};

/**
 * One run's HTTP client. Everything goes through the same fetch, so Node's
 * keep-alive pool is reused per origin for the lifetime of the run.
 */
export type HttpSession = {
  userAgent: string;
  get: (url: string, limits: RequestLimits) => Promise<FetchResult>;
  postJson: (url: string, payload: unknown, limits: RequestLimits) => Promise<FetchResult>;
};

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (compatible; MarketBriefingBot/1.0; +https://example.com/bot)";
export const DEFAULT_MAX_BYTES = 2_000_000;

const FEED_ACCEPT = "application/rss+xml, application/atom+xml, application/xml, text/xml;q=0.9, */*;q=0.8";

function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError");
}

async function request(
  fetchImpl: FetchLike,
  url: string,
  init: RequestInit,
  limits: RequestLimits,
): Promise<FetchResult> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), limits.timeoutMs);
  try {
    const res = await fetchImpl(url, { ...init, signal: controller.signal });
    const arrayBuf = await res.arrayBuffer();
    const bytes = arrayBuf.byteLength;
    const maxBytes = limits.maxBytes ?? DEFAULT_MAX_BYTES;
    const sliced = bytes > maxBytes ? arrayBuf.slice(0, maxBytes) : arrayBuf;
    const body = Buffer.from(sliced).toString("utf8");
    return {
      ok: res.ok,
      status: res.status,
      body,
      bytes,
      failure: res.ok ? undefined : "http",
      error: res.ok ? undefined : `HTTP ${res.status}`,
    };
  } catch (err) {
    const timedOut = controller.signal.aborted || isAbortError(err);
    return {
      ok: false,
      status: 0,
      body: "",
      bytes: 0,
      failure: timedOut ? "timeout" : "network",
      error: timedOut
        ? `timed out after ${limits.timeoutMs}ms`
        : err instanceof Error
          ? err.message
          : String(err),
    };
  } finally {
    clearTimeout(timeout);
  }
}

export function createHttpSession(params: {
  userAgent?: string;
  fetchImpl?: FetchLike;
} = {}): HttpSession {
  const userAgent = params.userAgent ?? DEFAULT_USER_AGENT;
  const fetchImpl: FetchLike = params.fetchImpl ?? ((input, init) => fetch(input, init));
  return {
    userAgent,
    get: (url, limits) =>
      request(
        fetchImpl,
        url,
        {
          method: "GET",
          headers: {
            "user-agent": userAgent,
            accept: FEED_ACCEPT,
            "accept-language": "en-US,en;q=0.5",
            ...limits.headers,
          },
        },
        limits,
      ),
    postJson: (url, payload, limits) =>
      request(
        fetchImpl,
        url,
        {
          method: "POST",
          headers: {
            "user-agent": userAgent,
            "content-type": "application/json",
            accept: "application/json",
            ...limits.headers,
          },
          body: JSON.stringify(payload),
        },
        limits,
      ),
  };
}
