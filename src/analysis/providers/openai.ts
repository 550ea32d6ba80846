import OpenAI from "openai";
import { buildUsage } from "../cost.js";
import type { AnalysisProvider } from "../types.js";
import {
  DEFAULT_MAX_OUTPUT_TOKENS,
  classifyProviderError,
  outcomeFromText,
  withTimeout,
} from "./shared.js";

export const DEFAULT_OPENAI_MODEL = "gpt-5-mini";

export type OpenAiChatRequest = {
  model: string;
  messages: Array<{ role: "system" | "user"; content: string }>;
  max_completion_tokens: number;
  response_format: { type: "json_object" };
};

export type OpenAiChatResponse = {
  choices: Array<{ message: { content: string | null } }>;
  usage?: { prompt_tokens: number; completion_tokens: number; total_tokens: number } | null;
};

/** The slice of the OpenAI client this provider calls. */
export type OpenAiChatCreate = (
  body: OpenAiChatRequest,
  options: { signal: AbortSignal },
) => Promise<OpenAiChatResponse>;

export function createOpenAiChatCreate(apiKey: string): OpenAiChatCreate {
  const client = new OpenAI({ apiKey, maxRetries: 0 });
  return (body, options) => client.chat.completions.create(body, options);
}

export function createOpenAiProvider(params: {
  model?: string;
  create: OpenAiChatCreate;
}): AnalysisProvider {
  const model = params.model ?? DEFAULT_OPENAI_MODEL;
  return {
    id: "openai",
    label: `OpenAI ${model}`,
    model,
    analyze: async (prompt, { timeoutMs }) =>
      withTimeout(timeoutMs, async (signal) => {
        try {
          const response = await params.create(
            {
              model,
              messages: [
                { role: "system", content: prompt.system },
                { role: "user", content: prompt.user },
              ],
              max_completion_tokens: DEFAULT_MAX_OUTPUT_TOKENS,
              response_format: { type: "json_object" },
            },
            { signal },
          );
          const usage = buildUsage(response.usage?.prompt_tokens, response.usage?.completion_tokens);
          return outcomeFromText(response.choices[0]?.message.content, usage);
        } catch (err) {
          return classifyProviderError(err, signal);
        }
      }),
  };
}
