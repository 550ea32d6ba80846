import type { AiProviderId, BriefingEnv } from "../../config/types.briefing.js";
import type { HttpSession } from "../../net/session.js";
import type { AnalysisProvider } from "../types.js";
import { createAnthropicMessagesCreate, createAnthropicProvider } from "./anthropic.js";
import { createGeminiProvider } from "./gemini.js";
import { createOpenAiChatCreate, createOpenAiProvider } from "./openai.js";

type ProviderFactory = (env: BriefingEnv, session: HttpSession) => AnalysisProvider | null;

export const PROVIDER_FACTORIES: Record<AiProviderId, ProviderFactory> = {
  openai: (env) =>
    env.OPENAI_API_KEY
      ? createOpenAiProvider({
          model: env.OPENAI_MODEL,
          create: createOpenAiChatCreate(env.OPENAI_API_KEY),
        })
      : null,
  anthropic: (env) =>
    env.ANTHROPIC_API_KEY
      ? createAnthropicProvider({
          model: env.ANTHROPIC_MODEL,
          create: createAnthropicMessagesCreate(env.ANTHROPIC_API_KEY),
        })
      : null,
  gemini: (env, session) =>
    env.GEMINI_API_KEY
      ? createGeminiProvider({ apiKey: env.GEMINI_API_KEY, session, model: env.GEMINI_MODEL })
      : null,
};

/**
 * Builds the providers in priority order. A provider is only included when
 * its credential is present; repeated ids keep their first position.
 */
export function buildProviders(
  env: BriefingEnv,
  session: HttpSession,
  factories: Record<AiProviderId, ProviderFactory> = PROVIDER_FACTORIES,
): AnalysisProvider[] {
  const seen = new Set<AiProviderId>();
  const providers: AnalysisProvider[] = [];
  for (const id of env.AI_PROVIDER_ORDER) {
    if (seen.has(id)) {
      continue;
    }
    seen.add(id);
    const provider = factories[id](env, session);
    if (provider) {
      providers.push(provider);
    }
  }
  return providers;
}
