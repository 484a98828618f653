import type { FeatureKey, PersistedQuota } from "@limitkit/schemas";

/**
 * Durable home for per-feature counters. Implementations throw
 * PersistenceReadError / PersistenceWriteError; they never return partial data.
 */
export interface QuotaStore {
  /** Persisted counters for the feature, or zeroed counters when nothing was saved. */
  load(featureKey: FeatureKey): Promise<PersistedQuota>;
  save(featureKey: FeatureKey, usageCount: number, cooldownStartEpochSeconds: number): Promise<void>;
}
