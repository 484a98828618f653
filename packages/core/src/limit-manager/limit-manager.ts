import { EMPTY_PERSISTED_QUOTA } from "@limitkit/schemas";
import type {
  CooldownExpiredEvent,
  FeatureKey,
  FeatureLimitConfig,
  FeatureLimitResult,
  PerformActionResult,
  PersistedQuota,
  QuotaState,
} from "@limitkit/schemas";
import {
  DEFAULT_EXPIRY_TOLERANCE_SECONDS,
  hasCooldownExpired,
  isCooldownActive,
  remainingCooldown,
  systemClock,
  toEpochSeconds,
} from "../clock/cooldown-clock.js";
import type { Clock } from "../clock/cooldown-clock.js";
import { resolveFeatureConfig } from "../config/provider.js";
import type { LimitConfigProvider } from "../config/provider.js";
import { StaticEntitlementProvider, hasUnlimitedAccess } from "../config/entitlements.js";
import type { EntitlementProvider } from "../config/entitlements.js";
import { createLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import type { QuotaStore } from "../quota-store/store.js";
import { getMetrics } from "../telemetry/metrics.js";
import type { LimitMetrics } from "../telemetry/metrics.js";
import { KeyedMutex } from "../utils/keyed-mutex.js";
import { withRetry } from "../utils/retry.js";

export interface CooldownStartedEvent {
  featureKey: FeatureKey;
  startedAtEpochSeconds: number;
  durationSeconds: number;
}

export type CooldownStartedListener = (event: CooldownStartedEvent) => void;

/** Fired when a running cooldown is cleared because it ran out; not on an explicit reset. */
export type CooldownExpiredListener = (event: CooldownExpiredEvent) => void;

export interface LimitManagerOptions {
  featureKey: FeatureKey;
  store: QuotaStore;
  config: LimitConfigProvider;
  entitlements?: EntitlementProvider;
  clock?: Clock;
  logger?: Logger;
  metrics?: LimitMetrics;
  /** Shared across managers so every feature key has exactly one writer at a time. */
  mutex?: KeyedMutex<FeatureKey>;
  expiryToleranceSeconds?: number;
  /** Delay before the single write retry. Default: 50 */
  writeRetryDelayMs?: number;
}

interface Snapshot {
  quota: PersistedQuota;
  config: FeatureLimitConfig;
  now: number;
}

/**
 * Usage quota and cooldown window for one gated feature.
 *
 * Only the counters are persisted; limit and duration come from the config
 * provider on every call. Expiry is healed lazily on read, so the feature
 * becomes available once the window has passed even if nothing else ran.
 */
export class LimitManager {
  readonly featureKey: FeatureKey;
  private readonly store: QuotaStore;
  private readonly config: LimitConfigProvider;
  private readonly entitlements: EntitlementProvider;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly metrics: LimitMetrics;
  private readonly mutex: KeyedMutex<FeatureKey>;
  private readonly tolerance: number;
  private readonly writeRetryDelayMs: number;

  private lastKnown: PersistedQuota | null = null;
  private readonly reportedConfigIssues = new Set<string>();
  private readonly startedListeners = new Set<CooldownStartedListener>();
  private readonly expiredListeners = new Set<CooldownExpiredListener>();

  constructor(options: LimitManagerOptions) {
    this.featureKey = options.featureKey;
    this.store = options.store;
    this.config = options.config;
    this.entitlements = options.entitlements ?? new StaticEntitlementProvider();
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger("limit-manager");
    this.metrics = options.metrics ?? getMetrics();
    this.mutex = options.mutex ?? new KeyedMutex<FeatureKey>();
    this.tolerance = options.expiryToleranceSeconds ?? DEFAULT_EXPIRY_TOLERANCE_SECONDS;
    this.writeRetryDelayMs = options.writeRetryDelayMs ?? 50;
  }

  /** True when the quota has room, or the cooldown has run out (which resets usage). */
  async canPerformAction(): Promise<boolean> {
    return this.locked(async () => {
      const snapshot = await this.snapshot();
      if (this.bypasses(snapshot.now)) return true;
      if (snapshot.quota.usageCount < snapshot.config.limit) return true;
      const { healed } = await this.healIfExpired(snapshot);
      return healed;
    });
  }

  async recordUsage(): Promise<QuotaState> {
    return this.locked(async () => this.recordUsageUnlocked(await this.snapshot()));
  }

  async getRemainingCooldown(): Promise<number> {
    return this.locked(async () => {
      const { quota, config, now } = await this.snapshot();
      return remainingCooldown(quota.cooldownStartEpochSeconds, config.cooldownDurationSeconds, now);
    });
  }

  async resetUsage(): Promise<void> {
    await this.locked(async () => {
      await this.write({ ...EMPTY_PERSISTED_QUOTA });
      this.logger.info({ featureKey: this.featureKey }, "Usage reset");
    });
  }

  /**
   * Opens the cooldown window when the quota is used up but no window is running yet,
   * so the wait is measured from the moment the popup appears. An open window is never
   * restarted. Returns the seconds left.
   */
  async startCooldownOnPopupOpen(): Promise<number> {
    return this.locked(async () => {
      const snapshot = await this.snapshot();
      const { quota, config, now } = snapshot;

      if (quota.cooldownStartEpochSeconds > 0) {
        const { healed } = await this.healIfExpired(snapshot);
        if (healed) return 0;
        return remainingCooldown(quota.cooldownStartEpochSeconds, config.cooldownDurationSeconds, now);
      }
      if (quota.usageCount < config.limit) return 0;

      await this.write({ usageCount: quota.usageCount, cooldownStartEpochSeconds: now });
      this.cooldownStarted(now, config.cooldownDurationSeconds, "popup-open");
      return remainingCooldown(now, config.cooldownDurationSeconds, now);
    });
  }

  async isInCooldown(): Promise<boolean> {
    return this.locked(async () => {
      const { quota, config, now } = await this.snapshot();
      return isCooldownActive(quota.cooldownStartEpochSeconds, config.cooldownDurationSeconds, now);
    });
  }

  async getState(): Promise<QuotaState> {
    return this.locked(async () => this.toState(await this.snapshot()));
  }

  async getRemainingFreeActions(): Promise<number> {
    return this.locked(async () => {
      const { quota, config } = await this.snapshot();
      return Math.max(0, config.limit - quota.usageCount);
    });
  }

  async checkLimit(): Promise<FeatureLimitResult> {
    return this.locked(async () => (await this.checkLimitUnlocked(await this.snapshot())).result);
  }

  /**
   * Checks the limit and, when allowed, records one usage. Users with unlimited
   * access proceed without anything being recorded.
   */
  async performAction(): Promise<PerformActionResult> {
    return this.locked(async () => {
      const snapshot = await this.snapshot();
      const { result, quota } = await this.checkLimitUnlocked(snapshot);
      const labels = { feature: this.featureKey };

      if (!result.canProceed) {
        this.metrics.actionsBlocked.inc(labels);
        this.logger.debug(
          { featureKey: this.featureKey, remainingCooldownSeconds: result.remainingCooldownSeconds },
          "Action blocked by cooldown",
        );
        return { ...result, performed: false };
      }

      this.metrics.actionsAllowed.inc(labels);
      if (result.bypassed) {
        return { ...result, performed: true };
      }

      const state = await this.recordUsageUnlocked({ ...snapshot, quota });
      return {
        ...result,
        performed: true,
        usageCount: state.usageCount,
        remainingFreeActions: Math.max(0, state.limit - state.usageCount),
        isLimitReached: state.usageCount >= state.limit,
        remainingCooldownSeconds: remainingCooldown(
          state.cooldownStartEpochSeconds,
          state.cooldownDurationSeconds,
          snapshot.now,
        ),
      };
    });
  }

  /** Resets the feature if its cooldown window has run out. Returns whether it did. */
  async expireIfDue(): Promise<boolean> {
    return this.locked(async () => {
      const snapshot = await this.snapshot();
      if (snapshot.quota.cooldownStartEpochSeconds === 0) return false;
      const { healed } = await this.healIfExpired(snapshot);
      return healed;
    });
  }

  onCooldownStarted(listener: CooldownStartedListener): () => void {
    this.startedListeners.add(listener);
    return () => {
      this.startedListeners.delete(listener);
    };
  }

  onCooldownExpired(listener: CooldownExpiredListener): () => void {
    this.expiredListeners.add(listener);
    return () => {
      this.expiredListeners.delete(listener);
    };
  }

  // ── internals ─────────────────────────────────────────────────────

  private locked<T>(fn: () => Promise<T>): Promise<T> {
    return this.mutex.run(this.featureKey, fn);
  }

  private async snapshot(): Promise<Snapshot> {
    return {
      quota: await this.read(),
      config: this.currentConfig(),
      now: toEpochSeconds(this.clock.now()),
    };
  }

  private bypasses(now: number): boolean {
    return hasUnlimitedAccess(this.entitlements, this.config.getNewUserFreePeriodSeconds(), now);
  }

  private async checkLimitUnlocked(
    snapshot: Snapshot,
  ): Promise<{ result: FeatureLimitResult; quota: PersistedQuota }> {
    const { config, now } = snapshot;

    if (this.bypasses(now)) {
      const result: FeatureLimitResult = {
        featureKey: this.featureKey,
        canProceed: true,
        showPopup: false,
        remainingCooldownSeconds: 0,
        usageCount: snapshot.quota.usageCount,
        limit: config.limit,
        remainingFreeActions: Math.max(0, config.limit - snapshot.quota.usageCount),
        isLimitReached: false,
        bypassed: true,
      };
      return { result, quota: snapshot.quota };
    }

    const { quota, healed } = await this.healIfExpired(snapshot);
    const isLimitReached = quota.usageCount >= config.limit;
    const inCooldown = isCooldownActive(quota.cooldownStartEpochSeconds, config.cooldownDurationSeconds, now);

    let showPopup: boolean;
    if (healed) {
      showPopup = false;
    } else if (config.popupMode === "always") {
      showPopup = true;
    } else {
      showPopup = isLimitReached || inCooldown;
    }

    const result: FeatureLimitResult = {
      featureKey: this.featureKey,
      canProceed: !isLimitReached,
      showPopup,
      remainingCooldownSeconds: remainingCooldown(
        quota.cooldownStartEpochSeconds,
        config.cooldownDurationSeconds,
        now,
      ),
      usageCount: quota.usageCount,
      limit: config.limit,
      remainingFreeActions: Math.max(0, config.limit - quota.usageCount),
      isLimitReached,
      bypassed: false,
    };
    return { result, quota };
  }

  private async recordUsageUnlocked(snapshot: Snapshot): Promise<QuotaState> {
    const { config, now } = snapshot;
    const { quota } = await this.healIfExpired(snapshot);

    if (quota.usageCount >= config.limit && quota.cooldownStartEpochSeconds > 0) {
      this.logger.warn(
        { featureKey: this.featureKey, usageCount: quota.usageCount, limit: config.limit },
        "Usage recorded during cooldown, ignoring",
      );
      return this.toState({ quota, config, now });
    }

    const usageCount = Math.min(quota.usageCount + 1, config.limit);
    let cooldownStartEpochSeconds = quota.cooldownStartEpochSeconds;
    const startsCooldown = usageCount >= config.limit && cooldownStartEpochSeconds === 0;
    if (startsCooldown) {
      cooldownStartEpochSeconds = now;
    }

    const next = { usageCount, cooldownStartEpochSeconds };
    await this.write(next);
    if (startsCooldown) {
      this.cooldownStarted(now, config.cooldownDurationSeconds, "limit-reached");
    }
    return this.toState({ quota: next, config, now });
  }

  /**
   * Resets usage when the limit was reached (or a window is open) and the window
   * has run out. Idempotent: a healed quota no longer matches.
   */
  private async healIfExpired(snapshot: Snapshot): Promise<{ quota: PersistedQuota; healed: boolean }> {
    const { quota, config, now } = snapshot;
    const limited = quota.usageCount >= config.limit || quota.cooldownStartEpochSeconds > 0;
    if (!limited) return { quota, healed: false };
    if (!hasCooldownExpired(quota.cooldownStartEpochSeconds, config.cooldownDurationSeconds, now, this.tolerance)) {
      return { quota, healed: false };
    }

    const reset = { ...EMPTY_PERSISTED_QUOTA };
    await this.write(reset);
    this.logger.info(
      { featureKey: this.featureKey, previousUsage: quota.usageCount },
      "Cooldown expired, usage reset",
    );
    if (quota.cooldownStartEpochSeconds > 0) {
      this.metrics.cooldownsExpired.inc({ feature: this.featureKey });
      this.cooldownExpired(now);
    }
    return { quota: reset, healed: true };
  }

  private cooldownExpired(expiredAtEpochSeconds: number): void {
    const event: CooldownExpiredEvent = { featureKey: this.featureKey, expiredAtEpochSeconds };
    for (const listener of [...this.expiredListeners]) {
      try {
        listener(event);
      } catch (err) {
        this.logger.error({ err, featureKey: this.featureKey }, "Cooldown expired listener failed");
      }
    }
  }

  private cooldownStarted(startedAtEpochSeconds: number, durationSeconds: number, trigger: string): void {
    this.metrics.cooldownsStarted.inc({ feature: this.featureKey, trigger });
    this.metrics.cooldownWaitSeconds.observe({ feature: this.featureKey }, durationSeconds);
    this.logger.info(
      { featureKey: this.featureKey, startedAtEpochSeconds, durationSeconds, trigger },
      "Cooldown started",
    );

    const event: CooldownStartedEvent = { featureKey: this.featureKey, startedAtEpochSeconds, durationSeconds };
    for (const listener of this.startedListeners) {
      try {
        listener(event);
      } catch (err) {
        this.logger.error({ err, featureKey: this.featureKey }, "Cooldown started listener failed");
      }
    }
  }

  private currentConfig(): FeatureLimitConfig {
    const { config, issues } = resolveFeatureConfig(this.featureKey, this.config.getFeatureConfig(this.featureKey));
    for (const issue of issues) {
      if (this.reportedConfigIssues.has(issue.message)) continue;
      this.reportedConfigIssues.add(issue.message);
      this.logger.warn(
        { featureKey: this.featureKey, field: issue.field, received: issue.received, applied: issue.applied },
        issue.message,
      );
    }
    return config;
  }

  private async read(): Promise<PersistedQuota> {
    try {
      const quota = await this.store.load(this.featureKey);
      this.lastKnown = quota;
      return { ...quota };
    } catch (err) {
      this.metrics.persistenceFailures.inc({ feature: this.featureKey, operation: "read" });
      this.logger.warn({ err, featureKey: this.featureKey }, "Quota read failed, using last known state");
      return this.lastKnown ? { ...this.lastKnown } : { ...EMPTY_PERSISTED_QUOTA };
    }
  }

  /** Never throws: the in-memory copy is updated first, then one retry, then the write is dropped. */
  private async write(next: PersistedQuota): Promise<void> {
    this.lastKnown = { ...next };
    try {
      await withRetry(
        () => this.store.save(this.featureKey, next.usageCount, next.cooldownStartEpochSeconds),
        {
          maxAttempts: 2,
          delayMs: this.writeRetryDelayMs,
          onRetry: (err) => this.logger.warn({ err, featureKey: this.featureKey }, "Quota write failed, retrying"),
        },
      );
    } catch (err) {
      this.metrics.persistenceFailures.inc({ feature: this.featureKey, operation: "write" });
      this.logger.error({ err, featureKey: this.featureKey }, "Quota write failed after retry, keeping in-memory state");
    }
  }

  private toState({ quota, config }: Snapshot): QuotaState {
    return {
      featureKey: this.featureKey,
      usageCount: quota.usageCount,
      cooldownStartEpochSeconds: quota.cooldownStartEpochSeconds,
      limit: config.limit,
      cooldownDurationSeconds: config.cooldownDurationSeconds,
    };
  }
}
