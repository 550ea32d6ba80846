import type { AiProviderId } from "../config/types.briefing.js";
import type { Article } from "../market/news/ingest.js";
import type { MarketQuote } from "../market/quotes/types.js";

export type Story = {
  headline: string;
  summary: string;
  source?: string;
};

export type AnalysisSections = {
  marketStories: Story[];
  generalStories: Story[];
  outlook: string;
};

export type TokenUsage = { input: number; output: number; total: number };

export type AnalysisResult = {
  /** Human-readable label of whoever produced the analysis. */
  provider: string;
  providerId: AiProviderId | "basic";
  sections: AnalysisSections;
  usage?: TokenUsage;
  costEstimateUsd?: number;
  /** True when every AI provider failed and the rule-based summary was used. */
  fallback: boolean;
};

export type AnalysisRequest = {
  articles: Article[];
  quotes: MarketQuote[];
  generatedAt: Date;
};

export type ProviderPrompt = {
  system: string;
  user: string;
};

export type ProviderFailureReason =
  | "timeout"
  | "auth"
  | "rate-limited"
  | "malformed-response"
  | "empty-response"
  | "network"
  | `http-${number}`;

export type ProviderSuccess = {
  ok: true;
  sections: AnalysisSections;
  usage?: TokenUsage;
};

export type ProviderFailure = {
  ok: false;
  reason: ProviderFailureReason;
  detail?: string;
};

export type ProviderOutcome = ProviderSuccess | ProviderFailure;

export type AnalysisProvider = {
  id: AiProviderId;
  label: string;
  model: string;
  analyze: (prompt: ProviderPrompt, options: { timeoutMs: number }) => Promise<ProviderOutcome>;
};
