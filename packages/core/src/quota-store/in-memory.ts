import { EMPTY_PERSISTED_QUOTA } from "@limitkit/schemas";
import type { FeatureKey, PersistedQuota } from "@limitkit/schemas";
import type { QuotaStore } from "./store.js";

export class InMemoryQuotaStore implements QuotaStore {
  private entries = new Map<FeatureKey, PersistedQuota>();

  async load(featureKey: FeatureKey): Promise<PersistedQuota> {
    const entry = this.entries.get(featureKey);
    return entry ? { ...entry } : { ...EMPTY_PERSISTED_QUOTA };
  }

  async save(featureKey: FeatureKey, usageCount: number, cooldownStartEpochSeconds: number): Promise<void> {
    this.entries.set(featureKey, { usageCount, cooldownStartEpochSeconds });
  }
}
