export type BriefingErrorCode =
  | "startup-config"
  | "feed-fetch"
  | "quote-fetch"
  | "provider"
  | "delivery";

export class BriefingError extends Error {
  constructor(
    message: string,
    public readonly code: BriefingErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "BriefingError";
  }
}

/** Missing or invalid configuration. Raised before any network call; the CLI exits non-zero. */
export class StartupConfigError extends BriefingError {
  constructor(
    message: string,
    public readonly missing: string[] = [],
    options?: { cause?: unknown },
  ) {
    super(message, "startup-config", options);
    this.name = "StartupConfigError";
  }
}

export class FeedFetchError extends BriefingError {
  constructor(
    public readonly source: string,
    public readonly reason: string,
    options?: { cause?: unknown },
  ) {
    super(`${source}: ${reason}`, "feed-fetch", options);
    this.name = "FeedFetchError";
  }
}

export class QuoteFetchError extends BriefingError {
  constructor(
    public readonly symbol: string,
    public readonly reason: string,
    options?: { cause?: unknown },
  ) {
    super(`${symbol}: ${reason}`, "quote-fetch", options);
    this.name = "QuoteFetchError";
  }
}

export class ProviderError extends BriefingError {
  constructor(
    public readonly provider: string,
    public readonly reason: string,
    options?: { cause?: unknown },
  ) {
    super(`${provider}: ${reason}`, "provider", options);
    this.name = "ProviderError";
  }
}

export class DeliveryError extends BriefingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "delivery", options);
    this.name = "DeliveryError";
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
