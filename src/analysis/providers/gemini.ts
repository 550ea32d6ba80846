import { z } from "zod";
import type { HttpSession } from "../../net/session.js";
import { buildUsage } from "../cost.js";
import type { AnalysisProvider } from "../types.js";
import { DEFAULT_MAX_OUTPUT_TOKENS, failureFromStatus, outcomeFromText } from "./shared.js";

export const DEFAULT_GEMINI_MODEL = "gemini-2.5-flash";
export const GEMINI_BASE_URL = "https://generativelanguage.googleapis.com/v1beta";

const GeminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({ parts: z.array(z.object({ text: z.string().optional() })).optional() })
          .optional(),
      }),
    )
    .optional(),
  usageMetadata: z
    .object({
      promptTokenCount: z.number().optional(),
      candidatesTokenCount: z.number().optional(),
    })
    .optional(),
});

export function createGeminiProvider(params: {
  apiKey: string;
  session: HttpSession;
  model?: string;
  baseUrl?: string;
}): AnalysisProvider {
  const model = params.model ?? DEFAULT_GEMINI_MODEL;
  const baseUrl = params.baseUrl ?? GEMINI_BASE_URL;
  return {
    id: "gemini",
    label: `Google ${model}`,
    model,
    analyze: async (prompt, { timeoutMs }) => {
      const url = `${baseUrl}/models/${encodeURIComponent(model)}:generateContent`;
      const res = await params.session.postJson(
        url,
        {
          systemInstruction: { parts: [{ text: prompt.system }] },
          contents: [{ role: "user", parts: [{ text: prompt.user }] }],
          generationConfig: {
            temperature: 0.7,
            maxOutputTokens: DEFAULT_MAX_OUTPUT_TOKENS,
            responseMimeType: "application/json",
            candidateCount: 1,
          },
        },
        { timeoutMs, headers: { "x-goog-api-key": params.apiKey } },
      );
      if (!res.ok) {
        if (res.failure === "timeout") {
          return { ok: false, reason: "timeout", detail: res.error };
        }
        if (res.failure === "network") {
          return { ok: false, reason: "network", detail: res.error };
        }
        return failureFromStatus(res.status, res.error);
      }
      let json: unknown;
      try {
        json = JSON.parse(res.body);
      } catch {
        return { ok: false, reason: "malformed-response", detail: "body is not JSON" };
      }
      const parsed = GeminiResponseSchema.safeParse(json);
      if (!parsed.success) {
        return { ok: false, reason: "malformed-response", detail: "unexpected response shape" };
      }
      const parts = parsed.data.candidates?.[0]?.content?.parts ?? [];
      const text = parts.map((part) => part.text ?? "").join("");
      const usageMeta = parsed.data.usageMetadata;
      return outcomeFromText(
        text,
        buildUsage(usageMeta?.promptTokenCount, usageMeta?.candidatesTokenCount),
      );
    },
  };
}
