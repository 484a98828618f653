import type { CooldownExpiredEvent, FeatureKey } from "@limitkit/schemas";
import type { CooldownExpiredListener } from "../limit-manager/limit-manager.js";
import type { LimitManagerRegistry } from "../limit-manager/registry.js";
import { createLogger } from "../logger.js";
import type { Logger } from "../logger.js";

/**
 * idle: nothing to watch.
 * armed: a cooldown is known but no loop runs (notifier stopped).
 * firing: the tick loop is running.
 */
export type NotifierState = "idle" | "armed" | "firing";

export type { CooldownExpiredListener };

export interface ExpiryNotifierOptions {
  registry: LimitManagerRegistry;
  /** Coarse re-check interval. Default: 1000 */
  intervalMs?: number;
  logger?: Logger;
}

export interface WaitForExpiryOptions {
  timeoutMs: number;
  featureKey?: FeatureKey;
  signal?: AbortSignal;
}

interface Watch {
  preciseTimer: ReturnType<typeof setTimeout> | null;
}

/**
 * Best-effort broadcaster of "cooldown expired". Watches features with an open
 * window and resets them through their manager once the window runs out. Every
 * expiry a manager reports is passed on to listeners, whichever call healed it.
 * Managers stay authoritative: a missed tick only delays the event.
 */
export class BackgroundExpiryNotifier {
  private readonly registry: LimitManagerRegistry;
  private readonly intervalMs: number;
  private readonly logger: Logger;

  private state: NotifierState = "idle";
  private running = false;
  private loop: ReturnType<typeof setInterval> | null = null;
  private readonly watched = new Map<FeatureKey, Watch>();
  private readonly listeners = new Set<CooldownExpiredListener>();
  private inFlight: Promise<FeatureKey[]> | null = null;
  private recheckRequested = false;
  private readonly unsubscribeStarted: () => void;
  private readonly unsubscribeExpired: () => void;

  constructor(options: ExpiryNotifierOptions) {
    this.registry = options.registry;
    this.intervalMs = options.intervalMs ?? 1000;
    this.logger = options.logger ?? createLogger("expiry-notifier");
    this.unsubscribeStarted = this.registry.onCooldownStarted((event) => {
      this.arm(event.featureKey, event.durationSeconds);
    });
    this.unsubscribeExpired = this.registry.onCooldownExpired((event) => {
      this.unwatch(event.featureKey);
      this.settleState();
      this.broadcast(event);
    });
  }

  getState(): NotifierState {
    return this.state;
  }

  watchedFeatures(): FeatureKey[] {
    return [...this.watched.keys()];
  }

  onCooldownExpired(listener: CooldownExpiredListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Resolves with the next matching event, or null once the timeout passes or the signal aborts. */
  waitForExpiry(options: WaitForExpiryOptions): Promise<CooldownExpiredEvent | null> {
    const { timeoutMs, featureKey, signal } = options;
    return new Promise((resolve) => {
      if (signal?.aborted) {
        resolve(null);
        return;
      }

      const finish = (event: CooldownExpiredEvent | null) => {
        clearTimeout(timer);
        unsubscribe();
        signal?.removeEventListener("abort", onAbort);
        resolve(event);
      };
      const onAbort = () => finish(null);
      const timer = setTimeout(() => finish(null), timeoutMs);
      const unsubscribe = this.onCooldownExpired((event) => {
        if (featureKey && event.featureKey !== featureKey) return;
        finish(event);
      });
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  /** Starts watching a feature whose cooldown has `remainingSeconds` left. */
  arm(featureKey: FeatureKey, remainingSeconds: number): void {
    this.unwatch(featureKey);
    const watch: Watch = { preciseTimer: null };
    this.watched.set(featureKey, watch);

    if (!this.running) {
      this.state = "armed";
      return;
    }
    this.schedulePrecise(watch, remainingSeconds);
    this.ensureLoop();
  }

  /**
   * Picks up cooldowns persisted by an earlier run, then checks them at once.
   * Returns the features reset by that first check.
   */
  async start(): Promise<FeatureKey[]> {
    if (this.running) return [];
    this.running = true;

    for (const manager of this.registry.list()) {
      try {
        const state = await manager.getState();
        if (state.cooldownStartEpochSeconds === 0 || this.watched.has(manager.featureKey)) continue;
        this.arm(manager.featureKey, await manager.getRemainingCooldown());
      } catch (err) {
        this.logger.error({ err, featureKey: manager.featureKey }, "Failed to load cooldown on start");
      }
    }

    for (const [featureKey, watch] of this.watched) {
      if (watch.preciseTimer === null) {
        this.schedulePrecise(watch, await this.registry.get(featureKey).getRemainingCooldown());
      }
    }

    const expired = await this.checkAll();
    if (this.watched.size > 0 && this.running) this.ensureLoop();
    this.logger.info({ watching: this.watchedFeatures(), expired }, "Expiry notifier started");
    return expired;
  }

  stop(): void {
    this.running = false;
    if (this.loop) {
      clearInterval(this.loop);
      this.loop = null;
    }
    for (const watch of this.watched.values()) {
      if (watch.preciseTimer) clearTimeout(watch.preciseTimer);
      watch.preciseTimer = null;
    }
    this.state = this.watched.size > 0 ? "armed" : "idle";
  }

  /** Stops, detaches from the registry and waits for a running check to finish. */
  async close(): Promise<void> {
    this.stop();
    this.unsubscribeStarted();
    this.unsubscribeExpired();
    this.listeners.clear();
    if (this.inFlight) await this.inFlight;
  }

  /** Resets every watched feature whose cooldown has run out. Returns the keys reset. */
  async checkAll(): Promise<FeatureKey[]> {
    const expired: FeatureKey[] = [];

    for (const [featureKey, watch] of [...this.watched]) {
      const manager = this.registry.get(featureKey);
      try {
        // A reset here is announced through the manager's expiry event.
        if (await manager.expireIfDue()) {
          expired.push(featureKey);
        } else if (!(await manager.isInCooldown())) {
          // Cleared by an explicit reset; nothing to announce.
          this.unwatchIfCurrent(featureKey, watch);
        }
      } catch (err) {
        this.logger.error({ err, featureKey }, "Cooldown expiry check failed");
      }
    }

    this.settleState();
    return expired;
  }

  private settleState(): void {
    if (this.watched.size === 0) {
      if (this.loop) {
        clearInterval(this.loop);
        this.loop = null;
      }
      this.state = "idle";
    } else {
      this.state = this.running ? "firing" : "armed";
    }
  }

  private ensureLoop(): void {
    this.state = "firing";
    if (this.loop) return;
    this.loop = setInterval(() => this.runCheck(), this.intervalMs);
    this.loop.unref();
  }

  private schedulePrecise(watch: Watch, remainingSeconds: number): void {
    if (watch.preciseTimer) clearTimeout(watch.preciseTimer);
    const timer = setTimeout(() => {
      watch.preciseTimer = null;
      this.runCheck();
    }, Math.max(0, remainingSeconds) * 1000);
    timer.unref();
    watch.preciseTimer = timer;
  }

  /** Coalesces overlapping checks: a request during a running check triggers one more pass. */
  private runCheck(): void {
    if (!this.running) return;
    if (this.inFlight) {
      this.recheckRequested = true;
      return;
    }
    this.inFlight = this.checkAll()
      .catch((err: unknown): FeatureKey[] => {
        this.logger.error({ err }, "Expiry notifier tick failed");
        return [];
      })
      .finally(() => {
        this.inFlight = null;
        if (this.recheckRequested) {
          this.recheckRequested = false;
          this.runCheck();
        }
      });
  }

  private broadcast(event: CooldownExpiredEvent): void {
    this.logger.info({ featureKey: event.featureKey }, "Cooldown expired");
    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (err) {
        this.logger.error({ err, featureKey: event.featureKey }, "Cooldown expired listener failed");
      }
    }
  }

  private unwatch(featureKey: FeatureKey): void {
    const watch = this.watched.get(featureKey);
    if (!watch) return;
    if (watch.preciseTimer) clearTimeout(watch.preciseTimer);
    this.watched.delete(featureKey);
  }

  /** Leaves a watch alone if the feature was re-armed while a check was awaiting. */
  private unwatchIfCurrent(featureKey: FeatureKey, watch: Watch): void {
    if (this.watched.get(featureKey) === watch) this.unwatch(featureKey);
  }
}
