export type FeedSource = {
  name: string;
  url: string;
  enabled: boolean;
  /** Free-form grouping, e.g. "markets", "economy", "politics". */
  category: string;
  /** Per-feed timeout; wins over host overrides and the default. */
  timeoutMs?: number;
  note?: string;
};

export type FeedSettings = {
  maxArticlesPerFeed: number;
  defaultTimeoutMs: number;
  /** Timeouts keyed by lower-cased feed host name. */
  timeoutOverridesMs: Record<string, number>;
  /** Pause between consecutive feed fetches. */
  rateLimitDelayMs: number;
};

export type FeedDocument = {
  feeds: FeedSource[];
  settings: FeedSettings;
};

export type AiProviderId = "openai" | "anthropic" | "gemini";

export type BriefingEnv = {
  FINNHUB_API_KEY: string;
  OPENAI_API_KEY?: string;
  ANTHROPIC_API_KEY?: string;
  GEMINI_API_KEY?: string;
  SENDER_EMAIL: string;
  SENDER_PASSWORD: string;
  RECIPIENT_EMAIL: string;
  SMTP_HOST: string;
  SMTP_PORT: number;
  /** Provider ids in the order they are tried. */
  AI_PROVIDER_ORDER: AiProviderId[];
  OPENAI_MODEL?: string;
  ANTHROPIC_MODEL?: string;
  GEMINI_MODEL?: string;
  BRIEFING_FEEDS_PATH?: string;
  BRIEFING_LOG_LEVEL: "debug" | "info" | "warn" | "error";
};
