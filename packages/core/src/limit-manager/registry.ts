import { FEATURE_KEYS } from "@limitkit/schemas";
import type { FeatureKey } from "@limitkit/schemas";
import type { Clock } from "../clock/cooldown-clock.js";
import type { EntitlementProvider } from "../config/entitlements.js";
import type { LimitConfigProvider } from "../config/provider.js";
import { UnknownFeatureError } from "../errors.js";
import { createLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import type { QuotaStore } from "../quota-store/store.js";
import type { LimitMetrics } from "../telemetry/metrics.js";
import { KeyedMutex } from "../utils/keyed-mutex.js";
import { LimitManager } from "./limit-manager.js";
import type { CooldownExpiredListener, CooldownStartedListener } from "./limit-manager.js";

export interface LimitRegistryOptions {
  store: QuotaStore;
  config: LimitConfigProvider;
  entitlements?: EntitlementProvider;
  clock?: Clock;
  logger?: Logger;
  metrics?: LimitMetrics;
  /** Features to manage. Default: every known feature key. */
  features?: readonly FeatureKey[];
  expiryToleranceSeconds?: number;
  writeRetryDelayMs?: number;
}

/** One LimitManager per feature key, built once and passed around by reference. */
export class LimitManagerRegistry {
  private readonly managers = new Map<FeatureKey, LimitManager>();

  constructor(managers: Iterable<LimitManager>) {
    for (const manager of managers) {
      if (this.managers.has(manager.featureKey)) {
        throw new Error(`Duplicate limit manager for feature "${manager.featureKey}"`);
      }
      this.managers.set(manager.featureKey, manager);
    }
  }

  get(featureKey: FeatureKey): LimitManager {
    const manager = this.managers.get(featureKey);
    if (!manager) throw new UnknownFeatureError(featureKey);
    return manager;
  }

  has(featureKey: FeatureKey): boolean {
    return this.managers.has(featureKey);
  }

  list(): LimitManager[] {
    return [...this.managers.values()];
  }

  keys(): FeatureKey[] {
    return [...this.managers.keys()];
  }

  /** Remaining seconds for every feature currently in cooldown. */
  async getCooldownSummary(): Promise<Partial<Record<FeatureKey, number>>> {
    const summary: Partial<Record<FeatureKey, number>> = {};
    for (const manager of this.managers.values()) {
      if (await manager.isInCooldown()) {
        summary[manager.featureKey] = await manager.getRemainingCooldown();
      }
    }
    return summary;
  }

  async resetAll(): Promise<void> {
    for (const manager of this.managers.values()) {
      await manager.resetUsage();
    }
  }

  onCooldownStarted(listener: CooldownStartedListener): () => void {
    const unsubscribers = this.list().map((manager) => manager.onCooldownStarted(listener));
    return () => {
      for (const unsubscribe of unsubscribers) unsubscribe();
    };
  }

  onCooldownExpired(listener: CooldownExpiredListener): () => void {
    const unsubscribers = this.list().map((manager) => manager.onCooldownExpired(listener));
    return () => {
      for (const unsubscribe of unsubscribers) unsubscribe();
    };
  }
}

export function createLimitRegistry(options: LimitRegistryOptions): LimitManagerRegistry {
  const logger = options.logger ?? createLogger("limit-manager");
  const mutex = new KeyedMutex<FeatureKey>();
  const features = options.features ?? FEATURE_KEYS;

  return new LimitManagerRegistry(
    features.map(
      (featureKey) =>
        new LimitManager({
          featureKey,
          store: options.store,
          config: options.config,
          entitlements: options.entitlements,
          clock: options.clock,
          logger,
          metrics: options.metrics,
          mutex,
          expiryToleranceSeconds: options.expiryToleranceSeconds,
          writeRetryDelayMs: options.writeRetryDelayMs,
        }),
    ),
  );
}
