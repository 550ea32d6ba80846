import { StartupConfigError } from "../errors.js";
import type { AiProviderId, BriefingEnv } from "./types.briefing.js";
import { BriefingEnvSchema } from "./zod-schema.briefing.js";

export const REQUIRED_ENV_KEYS = [
  "FINNHUB_API_KEY",
  "SENDER_EMAIL",
  "SENDER_PASSWORD",
  "RECIPIENT_EMAIL",
] as const;

export const AI_KEY_NAMES = ["OPENAI_API_KEY", "ANTHROPIC_API_KEY", "GEMINI_API_KEY"] as const;

export const PROVIDER_KEY_NAMES = {
  openai: "OPENAI_API_KEY",
  anthropic: "ANTHROPIC_API_KEY",
  gemini: "GEMINI_API_KEY",
} as const satisfies Record<AiProviderId, (typeof AI_KEY_NAMES)[number]>;

function formatIssues(issues: Array<{ path: Array<string | number>; message: string }>): string {
  return issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`).join("; ");
}

/**
 * Reads and validates the process environment once at startup. Throws
 * StartupConfigError naming every missing variable; values never appear in
 * the message.
 */
export function loadBriefingEnv(env: NodeJS.ProcessEnv = process.env): BriefingEnv {
  const parsed = BriefingEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new StartupConfigError(
      `Invalid environment: ${formatIssues(parsed.error.issues)}`,
    );
  }
  const values = parsed.data;
  const missing: string[] = REQUIRED_ENV_KEYS.filter((key) => !values[key]);
  // Only keys of providers listed in AI_PROVIDER_ORDER can be used.
  const usableKeys = [...new Set(values.AI_PROVIDER_ORDER.map((id) => PROVIDER_KEY_NAMES[id]))];
  if (!usableKeys.some((key) => values[key])) {
    missing.push(`one of ${usableKeys.join(" | ")}`);
  }
  const {
    FINNHUB_API_KEY,
    SENDER_EMAIL,
    SENDER_PASSWORD,
    RECIPIENT_EMAIL,
  } = values;
  if (missing.length > 0 || !FINNHUB_API_KEY || !SENDER_EMAIL || !SENDER_PASSWORD || !RECIPIENT_EMAIL) {
    throw new StartupConfigError(
      `Missing required environment variables: ${missing.join(", ")}`,
      missing,
    );
  }
  return {
    ...values,
    FINNHUB_API_KEY,
    SENDER_EMAIL,
    SENDER_PASSWORD,
    RECIPIENT_EMAIL,
  };
}

export function listCredentialValues(env: BriefingEnv): Array<string | undefined> {
  return [
    env.FINNHUB_API_KEY,
    env.OPENAI_API_KEY,
    env.ANTHROPIC_API_KEY,
    env.GEMINI_API_KEY,
    env.SENDER_PASSWORD,
  ];
}
