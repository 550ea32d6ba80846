import type { TokenUsage } from "../analysis/types.js";
import type { DeliveryStatus } from "../delivery/email.js";
import { VERSION } from "../version.js";

export type ProviderFailureRecord = { provider: string; reason: string };

export type RunMetrics = {
  runId: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  articlesProcessed: number;
  feedsSucceeded: number;
  feedsFailed: number;
  symbolsRequested: number;
  symbolsOmitted: number;
  provider: string;
  providerFailures: ProviderFailureRecord[];
  emailStatus: DeliveryStatus;
  tokenUsage?: TokenUsage;
  costEstimateUsd?: number;
  version: string;
};

export function buildRunMetrics(params: Omit<RunMetrics, "durationMs" | "version">): RunMetrics {
  const durationMs = new Date(params.finishedAt).getTime() - new Date(params.startedAt).getTime();
  return {
    ...params,
    providerFailures: [...params.providerFailures],
    durationMs: Number.isFinite(durationMs) ? Math.max(0, durationMs) : 0,
    version: VERSION,
  };
}

/** Multi-line summary logged at the end of a run. */
export function formatMetricsSummary(metrics: RunMetrics): string {
  const lines = [
    `run ${metrics.runId} (v${metrics.version}) finished in ${(metrics.durationMs / 1000).toFixed(1)}s`,
    `articles: ${metrics.articlesProcessed}`,
    `feeds: ${metrics.feedsSucceeded} ok, ${metrics.feedsFailed} failed`,
    `symbols: ${metrics.symbolsRequested - metrics.symbolsOmitted}/${metrics.symbolsRequested} quoted`,
    `analysis: ${metrics.provider}`,
  ];
  if (metrics.providerFailures.length > 0) {
    lines.push(
      `provider failures: ${metrics.providerFailures.map((f) => `${f.provider} (${f.reason})`).join(", ")}`,
    );
  }
  if (metrics.tokenUsage) {
    const cost =
      metrics.costEstimateUsd === undefined ? "" : `, ~$${metrics.costEstimateUsd.toFixed(4)}`;
    lines.push(`tokens: ${metrics.tokenUsage.total}${cost}`);
  }
  lines.push(`email: ${metrics.emailStatus}`);
  return lines.join("\n");
}
