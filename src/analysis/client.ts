import { ProviderError } from "../errors.js";
import { createSubsystemLogger } from "../logging/logger.js";
import { buildBasicAnalysis } from "./basic.js";
import { estimateCostUsd } from "./cost.js";
import { buildAnalysisPrompt } from "./prompt.js";
import type {
  AnalysisProvider,
  AnalysisRequest,
  AnalysisResult,
  ProviderFailureReason,
  ProviderOutcome,
} from "./types.js";

export const DEFAULT_PROVIDER_TIMEOUT_MS = 120_000;

export type ProviderAttempt = {
  provider: string;
  ok: boolean;
  reason?: ProviderFailureReason;
  durationMs: number;
};

export type AnalysisRun = {
  result: AnalysisResult;
  attempts: ProviderAttempt[];
};

const log = createSubsystemLogger("ai");

/**
 * Tries each provider in order and returns the first structured analysis.
 * Later providers are not invoked once one succeeds; when all of them fail
 * the rule-based analysis is returned instead. Never throws.
 */
export async function runAnalysis(params: {
  providers: AnalysisProvider[];
  request: AnalysisRequest;
  timeoutMs?: number;
  now?: () => number;
}): Promise<AnalysisRun> {
  const now = params.now ?? Date.now;
  const timeoutMs = params.timeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS;
  const prompt = buildAnalysisPrompt(params.request);
  const attempts: ProviderAttempt[] = [];

  for (const provider of params.providers) {
    const startedAt = now();
    log.info(`requesting analysis from ${provider.label}`);
    let outcome: ProviderOutcome;
    try {
      outcome = await provider.analyze(prompt, { timeoutMs });
    } catch (err) {
      // Expected failures arrive as outcomes; a throw here is unexpected.
      const error = new ProviderError(provider.label, "unexpected error", { cause: err });
      log.error(`${error.message}: ${err instanceof Error ? err.message : String(err)}`);
      attempts.push({
        provider: provider.label,
        ok: false,
        reason: "network",
        durationMs: now() - startedAt,
      });
      continue;
    }
    const durationMs = now() - startedAt;
    if (outcome.ok) {
      attempts.push({ provider: provider.label, ok: true, durationMs });
      const usage = outcome.usage;
      if (usage) {
        log.info(
          `${provider.label} usage - input: ${usage.input}, output: ${usage.output}, total: ${usage.total}`,
        );
      }
      return {
        result: {
          provider: provider.label,
          providerId: provider.id,
          sections: outcome.sections,
          usage,
          costEstimateUsd: usage ? estimateCostUsd(provider.id, usage) : undefined,
          fallback: false,
        },
        attempts,
      };
    }
    attempts.push({ provider: provider.label, ok: false, reason: outcome.reason, durationMs });
    const error = new ProviderError(provider.label, outcome.reason);
    log.warn(outcome.detail ? `${error.message} (${outcome.detail})` : error.message);
  }

  log.warn(
    params.providers.length === 0
      ? "no AI providers configured - generating basic analysis"
      : "all AI providers failed - generating basic analysis",
  );
  return { result: buildBasicAnalysis(params.request), attempts };
}
