import type { FeatureKey } from "@limitkit/schemas";

/** Local quota storage could not be read, or held a value that failed validation. */
export class PersistenceReadError extends Error {
  constructor(
    message: string,
    public readonly featureKey: FeatureKey | null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "PersistenceReadError";
  }
}

/** A quota write did not reach durable storage. */
export class PersistenceWriteError extends Error {
  constructor(
    message: string,
    public readonly featureKey: FeatureKey | null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "PersistenceWriteError";
  }
}

/**
 * Limit configuration outside the accepted range. Reported, never thrown to callers:
 * the offending value is clamped to a safe default.
 */
export class InvalidConfigurationError extends Error {
  constructor(
    public readonly featureKey: FeatureKey,
    public readonly field: "limit" | "cooldownDurationSeconds",
    public readonly received: number,
    public readonly applied: number,
  ) {
    super(`Invalid ${field} for feature ${featureKey}: ${received}, using ${applied}`);
    this.name = "InvalidConfigurationError";
  }
}

export class UnknownFeatureError extends Error {
  constructor(featureKey: string) {
    super(`No limit manager registered for feature "${featureKey}"`);
    this.name = "UnknownFeatureError";
  }
}
