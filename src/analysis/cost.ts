import type { AiProviderId } from "../config/types.briefing.js";
import type { TokenUsage } from "./types.js";

// Approximate USD per 1K tokens for the default model of each provider.
const RATES_PER_THOUSAND: Record<AiProviderId, { input: number; output: number }> = {
  openai: { input: 0.00025, output: 0.002 },
  anthropic: { input: 0.0008, output: 0.004 },
  gemini: { input: 0.0003, output: 0.0025 },
};

export function estimateCostUsd(provider: AiProviderId, usage: TokenUsage): number {
  const rates = RATES_PER_THOUSAND[provider];
  const cost = (usage.input / 1000) * rates.input + (usage.output / 1000) * rates.output;
  return Number(cost.toFixed(6));
}

export function buildUsage(input: number | undefined, output: number | undefined): TokenUsage | undefined {
  if (input === undefined && output === undefined) {
    return undefined;
  }
  const inputTokens = input ?? 0;
  const outputTokens = output ?? 0;
  return { input: inputTokens, output: outputTokens, total: inputTokens + outputTokens };
}
