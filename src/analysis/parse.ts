import { z } from "zod";
import type { AnalysisSections } from "./types.js";

const StorySchema = z.object({
  headline: z.string().trim().min(1),
  summary: z.string().trim().default(""),
  source: z
    .string()
    .trim()
    .optional()
    .transform((value) => value || undefined),
});

export const AnalysisResponseSchema = z
  .object({
    market_stories: z.array(StorySchema),
    general_stories: z.array(StorySchema),
    outlook: z.string().trim().min(1),
  })
  .refine((value) => value.market_stories.length + value.general_stories.length > 0, {
    message: "no stories",
  });

export type ParsedAnalysis = { ok: true; sections: AnalysisSections } | { ok: false; error: string };

/** Pulls the JSON object out of a model reply, tolerating code fences and surrounding prose. */
export function extractJsonObject(text: string): string | null {
  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/i);
  const candidate = (fenced?.[1] ?? text).trim();
  const start = candidate.indexOf("{");
  const end = candidate.lastIndexOf("}");
  if (start === -1 || end <= start) {
    return null;
  }
  return candidate.slice(start, end + 1);
}

export function parseAnalysisResponse(text: string): ParsedAnalysis {
  const raw = extractJsonObject(text);
  if (!raw) {
    return { ok: false, error: "no JSON object in response" };
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }
  const parsed = AnalysisResponseSchema.safeParse(json);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    return { ok: false, error: detail };
  }
  return {
    ok: true,
    sections: {
      marketStories: parsed.data.market_stories,
      generalStories: parsed.data.general_stories,
      outlook: parsed.data.outlook,
    },
  };
}
