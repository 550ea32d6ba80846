import Anthropic from "@anthropic-ai/sdk";
import { buildUsage } from "../cost.js";
import type { AnalysisProvider } from "../types.js";
import {
  DEFAULT_MAX_OUTPUT_TOKENS,
  classifyProviderError,
  outcomeFromText,
  withTimeout,
} from "./shared.js";

export const DEFAULT_ANTHROPIC_MODEL = "claude-3-5-haiku-20241022";

export type AnthropicMessageRequest = {
  model: string;
  max_tokens: number;
  system: string;
  messages: Array<{ role: "user"; content: string }>;
};

export type AnthropicMessageResponse = {
  content: Array<{ type: string; text?: string }>;
  usage?: { input_tokens: number; output_tokens: number };
};

/** The slice of the Anthropic client this provider calls. */
export type AnthropicMessagesCreate = (
  body: AnthropicMessageRequest,
  options: { signal: AbortSignal },
) => Promise<AnthropicMessageResponse>;

export function createAnthropicMessagesCreate(apiKey: string): AnthropicMessagesCreate {
  const client = new Anthropic({ apiKey, maxRetries: 0 });
  return (body, options) => client.messages.create(body, options);
}

export function createAnthropicProvider(params: {
  model?: string;
  create: AnthropicMessagesCreate;
}): AnalysisProvider {
  const model = params.model ?? DEFAULT_ANTHROPIC_MODEL;
  return {
    id: "anthropic",
    label: `Anthropic ${model}`,
    model,
    analyze: async (prompt, { timeoutMs }) =>
      withTimeout(timeoutMs, async (signal) => {
        try {
          const response = await params.create(
            {
              model,
              max_tokens: DEFAULT_MAX_OUTPUT_TOKENS,
              system: prompt.system,
              messages: [{ role: "user", content: prompt.user }],
            },
            { signal },
          );
          const text = response.content
            .map((block) => (block.type === "text" ? (block.text ?? "") : ""))
            .join("");
          const usage = buildUsage(response.usage?.input_tokens, response.usage?.output_tokens);
          return outcomeFromText(text, usage);
        } catch (err) {
          return classifyProviderError(err, signal);
        }
      }),
  };
}
