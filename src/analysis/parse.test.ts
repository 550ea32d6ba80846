import { describe, expect, it } from "vitest";
import { extractJsonObject, parseAnalysisResponse } from "./parse.js";

const VALID = {
  market_stories: [{ headline: "Stocks rally", summary: "Indexes rose.", source: "Wire" }],
  general_stories: [],
  outlook: "Watch **CPI** on Thursday.",
};

describe("extractJsonObject", () => {
  it("unwraps fenced replies", () => {
    const text = "Here you go:\n```json\n{\"a\": 1}\n```\nThanks";
    expect(extractJsonObject(text)).toBe('{"a": 1}');
  });

  it("returns null when there is no object", () => {
    expect(extractJsonObject("no json here")).toBeNull();
  });
});

describe("parseAnalysisResponse", () => {
  it("maps a valid reply to sections", () => {
    const parsed = parseAnalysisResponse(`Sure! ${JSON.stringify(VALID)}`);
    expect(parsed).toEqual({
      ok: true,
      sections: {
        marketStories: [{ headline: "Stocks rally", summary: "Indexes rose.", source: "Wire" }],
        generalStories: [],
        outlook: "Watch **CPI** on Thursday.",
      },
    });
  });

  it("rejects truncated JSON", () => {
    const parsed = parseAnalysisResponse('{"market_stories": [{"headline": "x"}');
    expect(parsed.ok).toBe(false);
  });

  it("rejects replies missing required keys", () => {
    const parsed = parseAnalysisResponse(JSON.stringify({ market_stories: [], outlook: "x" }));
    expect(parsed).toEqual({ ok: false, error: "general_stories: Required" });
  });

  it("rejects replies without any stories", () => {
    const parsed = parseAnalysisResponse(
      JSON.stringify({ market_stories: [], general_stories: [], outlook: "Quiet day." }),
    );
    expect(parsed).toEqual({ ok: false, error: "<root>: no stories" });
  });
});
