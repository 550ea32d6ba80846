import { z } from "zod";

const SecondsSchema = z.number().positive();

export const FeedSourceSchema = z
  .object({
    name: z.string().trim().min(1),
    url: z.string().url(),
    enabled: z.boolean(),
    category: z.string().trim().min(1),
    timeout: SecondsSchema.optional(),
    note: z.string().optional(),
  })
  .strict();

export const FeedDocumentSchema = z
  .object({
    rss_feeds: z.array(FeedSourceSchema),
    config: z
      .object({
        max_articles_per_feed: z.number().int().positive(),
        default_timeout: SecondsSchema,
        timeout_overrides: z.record(z.string(), SecondsSchema).optional(),
        rate_limit_delay: z.number().nonnegative(),
      })
      .strict(),
  })
  .strict();

const OptionalKeySchema = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const AiProviderIdSchema = z.enum(["openai", "anthropic", "gemini"]);

export const DEFAULT_PROVIDER_ORDER = ["openai", "anthropic", "gemini"] as const;

export const BriefingEnvSchema = z.object({
  FINNHUB_API_KEY: OptionalKeySchema,
  OPENAI_API_KEY: OptionalKeySchema,
  ANTHROPIC_API_KEY: OptionalKeySchema,
  GEMINI_API_KEY: OptionalKeySchema,
  SENDER_EMAIL: OptionalKeySchema,
  SENDER_PASSWORD: OptionalKeySchema,
  RECIPIENT_EMAIL: OptionalKeySchema,
  SMTP_HOST: OptionalKeySchema.transform((value) => value ?? "smtp.gmail.com"),
  SMTP_PORT: OptionalKeySchema.pipe(
    z.coerce.number().int().min(1).max(65_535).optional(),
  ).transform((value) => value ?? 587),
  AI_PROVIDER_ORDER: OptionalKeySchema.transform((value) =>
    value
      ? value
          .split(",")
          .map((entry) => entry.trim().toLowerCase())
          .filter(Boolean)
      : [...DEFAULT_PROVIDER_ORDER],
  ).pipe(z.array(AiProviderIdSchema).min(1)),
  OPENAI_MODEL: OptionalKeySchema,
  ANTHROPIC_MODEL: OptionalKeySchema,
  GEMINI_MODEL: OptionalKeySchema,
  BRIEFING_FEEDS_PATH: OptionalKeySchema,
  BRIEFING_LOG_LEVEL: OptionalKeySchema.pipe(
    z.enum(["debug", "info", "warn", "error"]).optional(),
  ).transform((value) => value ?? "info"),
});
