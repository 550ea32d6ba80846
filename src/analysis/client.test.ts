import { describe, expect, it, vi } from "vitest";
import type { AiProviderId } from "../config/types.briefing.js";
import { runAnalysis } from "./client.js";
import type { AnalysisProvider, AnalysisRequest, ProviderOutcome } from "./types.js";

const REQUEST: AnalysisRequest = {
  articles: [
    {
      title: "Fed holds rates",
      link: "https://example.com/fed",
      summary: "",
      source: "Wire",
      category: "economy",
    },
  ],
  quotes: [],
  generatedAt: new Date("2025-03-01T12:30:00Z"),
};

const SUCCESS: ProviderOutcome = {
  ok: true,
  sections: {
    marketStories: [{ headline: "Fed holds rates", summary: "No change." }],
    generalStories: [],
    outlook: "Steady.",
  },
  usage: { input: 1000, output: 500, total: 1500 },
};

function fakeProvider(id: AiProviderId, outcome: ProviderOutcome | Error) {
  const analyze = vi.fn<AnalysisProvider["analyze"]>(async () => {
    if (outcome instanceof Error) {
      throw outcome;
    }
    return outcome;
  });
  const provider: AnalysisProvider = { id, label: `fake ${id}`, model: "test-model", analyze };
  return { provider, analyze };
}

describe("runAnalysis", () => {
  it("stops at the first successful provider", async () => {
    const first = fakeProvider("openai", SUCCESS);
    const second = fakeProvider("anthropic", SUCCESS);
    const run = await runAnalysis({ providers: [first.provider, second.provider], request: REQUEST });
    expect(first.analyze).toHaveBeenCalledTimes(1);
    expect(second.analyze).not.toHaveBeenCalled();
    expect(run.result.provider).toBe("fake openai");
    expect(run.result.fallback).toBe(false);
    expect(run.result.costEstimateUsd).toBe(0.00125);
  });

  it("falls through failures in order", async () => {
    const first = fakeProvider("openai", { ok: false, reason: "malformed-response" });
    const second = fakeProvider("anthropic", { ok: false, reason: "rate-limited" });
    const third = fakeProvider("gemini", SUCCESS);
    const run = await runAnalysis({
      providers: [first.provider, second.provider, third.provider],
      request: REQUEST,
      now: () => 0,
    });
    expect(run.result.providerId).toBe("gemini");
    expect(run.attempts).toEqual([
      { provider: "fake openai", ok: false, reason: "malformed-response", durationMs: 0 },
      { provider: "fake anthropic", ok: false, reason: "rate-limited", durationMs: 0 },
      { provider: "fake gemini", ok: true, durationMs: 0 },
    ]);
  });

  it("returns the basic analysis when every provider fails", async () => {
    const first = fakeProvider("openai", { ok: false, reason: "auth" });
    const second = fakeProvider("gemini", new Error("boom"));
    const run = await runAnalysis({ providers: [first.provider, second.provider], request: REQUEST });
    expect(run.result.fallback).toBe(true);
    expect(run.result.provider).toBe("Basic Analysis (No AI)");
    expect(run.result.sections.marketStories).toEqual([
      { headline: "Fed holds rates", summary: "", source: "Wire" },
    ]);
    expect(run.attempts.map((attempt) => attempt.ok)).toEqual([false, false]);
  });

  it("returns the basic analysis when no provider is configured", async () => {
    const run = await runAnalysis({ providers: [], request: REQUEST });
    expect(run.result.fallback).toBe(true);
    expect(run.attempts).toEqual([]);
  });

  it("sends the same prompt and timeout to each provider", async () => {
    const first = fakeProvider("openai", { ok: false, reason: "timeout" });
    const second = fakeProvider("anthropic", SUCCESS);
    await runAnalysis({
      providers: [first.provider, second.provider],
      request: REQUEST,
      timeoutMs: 5000,
    });
    const [firstPrompt, firstOptions] = first.analyze.mock.calls[0] ?? [];
    const [secondPrompt] = second.analyze.mock.calls[0] ?? [];
    expect(firstOptions).toEqual({ timeoutMs: 5000 });
    expect(firstPrompt).toEqual(secondPrompt);
    expect(firstPrompt?.user).toContain("1. [Wire / economy] Fed holds rates");
  });
});
