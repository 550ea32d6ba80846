import crypto from "node:crypto";
import { runAnalysis } from "../analysis/client.js";
import { buildProviders } from "../analysis/providers/index.js";
import type { AnalysisProvider, AnalysisResult } from "../analysis/types.js";
import { listCredentialValues, loadBriefingEnv } from "../config/env.js";
import { loadFeedDocument, selectEnabledFeeds } from "../config/feeds.js";
import type { BriefingEnv, FeedDocument } from "../config/types.briefing.js";
import {
  createEmailDelivery,
  createFileDelivery,
  createSmtpTransport,
  type MailTransport,
  type ReportDelivery,
} from "../delivery/email.js";
import { createSubsystemLogger, registerSecrets, setLogLevel } from "../logging/logger.js";
import { ingestFeeds, type FeedStatus } from "../market/news/ingest.js";
import { createFinnhubQuoteHandler } from "../market/quotes/finnhub.js";
import { DEFAULT_SYMBOLS, fetchQuotes, normalizeSymbols } from "../market/quotes/index.js";
import type { QuoteSourceHandler } from "../market/quotes/types.js";
import { createHttpSession, type FetchLike, type HttpSession } from "../net/session.js";
import { buildRunMetrics, formatMetricsSummary, type RunMetrics } from "../ops/metrics.js";
import { renderReport, type RenderedReport } from "../report/render.js";

/** Everything one run talks to. Nothing here is shared between runs. */
export type BriefingDeps = {
  feeds: FeedDocument;
  session: HttpSession;
  providers: AnalysisProvider[];
  quoteHandler: QuoteSourceHandler;
  symbols: string[];
  deliver: ReportDelivery;
  now?: () => Date;
  sleep?: (ms: number) => Promise<unknown>;
  runId?: string;
  providerTimeoutMs?: number;
  quoteTimeoutMs?: number;
};

export type BriefingOutcome = {
  metrics: RunMetrics;
  report: RenderedReport;
  analysis: AnalysisResult;
  feedStatuses: FeedStatus[];
};

export type PrepareOptions = {
  env?: NodeJS.ProcessEnv;
  feedsPath?: string;
  symbols?: string[];
  dryRun?: boolean;
  outPath?: string;
  fetchImpl?: FetchLike;
  transport?: MailTransport;
};

const log = createSubsystemLogger("briefing");

/**
 * Validates credentials and configuration and wires the run's collaborators.
 * Throws StartupConfigError before any network traffic.
 */
export function prepareBriefing(options: PrepareOptions = {}): {
  env: BriefingEnv;
  deps: BriefingDeps;
} {
  const env = loadBriefingEnv(options.env);
  registerSecrets(listCredentialValues(env));
  setLogLevel(env.BRIEFING_LOG_LEVEL);

  const feeds = loadFeedDocument(options.feedsPath ?? env.BRIEFING_FEEDS_PATH);
  const session = createHttpSession({ fetchImpl: options.fetchImpl });
  const symbols = normalizeSymbols(options.symbols ?? DEFAULT_SYMBOLS);
  const deliver = options.dryRun
    ? createFileDelivery({ outPath: options.outPath ?? "-" })
    : createEmailDelivery({
        transport: options.transport ?? createSmtpTransport(env),
        from: env.SENDER_EMAIL,
        to: env.RECIPIENT_EMAIL,
      });

  return {
    env,
    deps: {
      feeds,
      session,
      providers: buildProviders(env, session),
      quoteHandler: createFinnhubQuoteHandler({ apiKey: env.FINNHUB_API_KEY }),
      symbols,
      deliver,
    },
  };
}

export async function runBriefing(deps: BriefingDeps): Promise<BriefingOutcome> {
  const now = deps.now ?? (() => new Date());
  const runId = deps.runId ?? `briefing-${crypto.randomUUID()}`;
  const startedAt = now();
  log.info(`run ${runId} started`);

  const enabled = selectEnabledFeeds(deps.feeds);
  const ingest = await ingestFeeds(enabled, deps.feeds.settings, {
    session: deps.session,
    sleep: deps.sleep,
  });
  log.info(
    `${ingest.articles.length} articles from ${ingest.succeeded}/${enabled.length} feeds`,
  );

  const batch = await fetchQuotes({
    symbols: deps.symbols,
    handler: deps.quoteHandler,
    session: deps.session,
    timeoutMs: deps.quoteTimeoutMs,
  });

  const analysis = await runAnalysis({
    providers: deps.providers,
    request: { articles: ingest.articles, quotes: batch.quotes, generatedAt: startedAt },
    timeoutMs: deps.providerTimeoutMs,
  });

  const report = renderReport({
    analysis: analysis.result,
    quotes: batch.quotes,
    articles: ingest.articles,
    feeds: { succeeded: ingest.succeeded, total: enabled.length },
    trackedSymbols: deps.symbols,
    generatedAt: startedAt,
  });

  const delivery = await deps.deliver(report);

  const metrics = buildRunMetrics({
    runId,
    startedAt: startedAt.toISOString(),
    finishedAt: now().toISOString(),
    articlesProcessed: ingest.articles.length,
    feedsSucceeded: ingest.succeeded,
    feedsFailed: ingest.failed,
    symbolsRequested: deps.symbols.length,
    symbolsOmitted: batch.omitted.length,
    provider: analysis.result.provider,
    providerFailures: analysis.attempts
      .filter((attempt) => !attempt.ok)
      .map((attempt) => ({ provider: attempt.provider, reason: attempt.reason ?? "unknown" })),
    emailStatus: delivery.status,
    tokenUsage: analysis.result.usage,
    costEstimateUsd: analysis.result.costEstimateUsd,
  });
  log.info(formatMetricsSummary(metrics));

  return { metrics, report, analysis: analysis.result, feedStatuses: ingest.statuses };
}
