import { EMPTY_PERSISTED_QUOTA, PersistedQuotaSchema } from "@limitkit/schemas";
import type { FeatureKey, PersistedQuota } from "@limitkit/schemas";
import { PersistenceReadError, PersistenceWriteError } from "@limitkit/core";
import type { QuotaStore } from "@limitkit/core";

/** The slice of an ioredis client the store needs. */
export interface RedisQuotaClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
}

export function quotaKey(namespace: string, featureKey: FeatureKey): string {
  return `quota:${namespace}:${featureKey}`;
}

export class RedisQuotaStore implements QuotaStore {
  constructor(
    private redis: RedisQuotaClient,
    private namespace = "default",
  ) {}

  async load(featureKey: FeatureKey): Promise<PersistedQuota> {
    let raw: string | null;
    try {
      raw = await this.redis.get(quotaKey(this.namespace, featureKey));
    } catch (err) {
      throw new PersistenceReadError(`Redis read failed for ${featureKey}`, featureKey, { cause: err });
    }
    if (raw === null) return { ...EMPTY_PERSISTED_QUOTA };

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new PersistenceReadError(`Stored quota for ${featureKey} is not valid JSON`, featureKey, { cause: err });
    }

    const parsed = PersistedQuotaSchema.safeParse(json);
    if (!parsed.success) {
      throw new PersistenceReadError(`Stored quota for ${featureKey} has an unexpected shape`, featureKey, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  async save(featureKey: FeatureKey, usageCount: number, cooldownStartEpochSeconds: number): Promise<void> {
    const value = JSON.stringify({ usageCount, cooldownStartEpochSeconds });
    try {
      await this.redis.set(quotaKey(this.namespace, featureKey), value);
    } catch (err) {
      throw new PersistenceWriteError(`Redis write failed for ${featureKey}`, featureKey, { cause: err });
    }
  }
}
