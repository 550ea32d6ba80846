import { parseAnalysisResponse } from "../parse.js";
import type { ProviderFailure, ProviderOutcome, TokenUsage } from "../types.js";

export const DEFAULT_MAX_OUTPUT_TOKENS = 4000;

function readStatus(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "status" in err) {
    const status = err.status;
    return typeof status === "number" ? status : undefined;
  }
  return undefined;
}

export function failureFromStatus(status: number, detail?: string): ProviderFailure {
  if (status === 401 || status === 403) {
    return { ok: false, reason: "auth", detail };
  }
  if (status === 429) {
    return { ok: false, reason: "rate-limited", detail };
  }
  return { ok: false, reason: `http-${status}`, detail };
}

/** Maps an SDK or fetch error to a provider failure. */
export function classifyProviderError(err: unknown, signal?: AbortSignal): ProviderFailure {
  const detail = err instanceof Error ? err.message : String(err);
  if (signal?.aborted) {
    return { ok: false, reason: "timeout", detail };
  }
  const status = readStatus(err);
  if (status !== undefined) {
    return failureFromStatus(status, detail);
  }
  if (err instanceof Error && /timed? ?out/i.test(err.message)) {
    return { ok: false, reason: "timeout", detail };
  }
  return { ok: false, reason: "network", detail };
}

export function outcomeFromText(text: string | null | undefined, usage?: TokenUsage): ProviderOutcome {
  if (!text || !text.trim()) {
    return { ok: false, reason: "empty-response" };
  }
  const parsed = parseAnalysisResponse(text);
  if (!parsed.ok) {
    return { ok: false, reason: "malformed-response", detail: parsed.error };
  }
  return { ok: true, sections: parsed.sections, usage };
}

export async function withTimeout<T>(
  timeoutMs: number,
  run: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await run(controller.signal);
  } finally {
    clearTimeout(timeout);
  }
}
