import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import type { CooldownExpiredEvent } from "@limitkit/schemas";
import { StaticLimitConfigProvider } from "../config/provider.js";
import { createLimitRegistry } from "../limit-manager/registry.js";
import { BackgroundExpiryNotifier } from "../notifier/expiry-notifier.js";
import { InMemoryQuotaStore } from "../quota-store/in-memory.js";
import { createInMemoryMetrics } from "../telemetry/metrics.js";

const T0 = 1_700_000_000;

function setup(intervalMs = 1000) {
  const store = new InMemoryQuotaStore();
  const registry = createLimitRegistry({
    store,
    config: new StaticLimitConfigProvider(),
    metrics: createInMemoryMetrics(),
    writeRetryDelayMs: 0,
  });
  const notifier = new BackgroundExpiryNotifier({ registry, intervalMs });
  const events: CooldownExpiredEvent[] = [];
  notifier.onCooldownExpired((event) => events.push(event));
  return { store, registry, notifier, events };
}

async function exhaust(registry: ReturnType<typeof setup>["registry"], featureKey: "conversation" | "refresh") {
  const manager = registry.get(featureKey);
  await manager.recordUsage();
  await manager.recordUsage();
}

describe("BackgroundExpiryNotifier", () => {
  let notifier: BackgroundExpiryNotifier | null = null;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(T0 * 1000);
  });

  afterEach(async () => {
    await notifier?.close();
    notifier = null;
    vi.useRealTimers();
  });

  it("stays idle with nothing to watch", async () => {
    const ctx = setup();
    notifier = ctx.notifier;

    expect(await notifier.start()).toEqual([]);
    expect(notifier.getState()).toBe("idle");
  });

  it("arms when a cooldown starts and broadcasts when it runs out", async () => {
    const ctx = setup();
    notifier = ctx.notifier;
    await notifier.start();

    await exhaust(ctx.registry, "conversation");
    expect(notifier.getState()).toBe("firing");
    expect(notifier.watchedFeatures()).toEqual(["conversation"]);

    await vi.advanceTimersByTimeAsync(28_000);
    expect(ctx.events).toEqual([]);

    await vi.advanceTimersByTimeAsync(1_000);
    expect(ctx.events).toEqual([{ featureKey: "conversation", expiredAtEpochSeconds: T0 + 29 }]);
    expect(notifier.getState()).toBe("idle");
    expect(await ctx.registry.get("conversation").getState()).toMatchObject({
      usageCount: 0,
      cooldownStartEpochSeconds: 0,
    });
  });

  it("fires on the precise timer without waiting for a tick", async () => {
    const ctx = setup(60_000);
    notifier = ctx.notifier;
    await notifier.start();
    await exhaust(ctx.registry, "conversation");

    await vi.advanceTimersByTimeAsync(29_999);
    expect(ctx.events).toEqual([]);

    await vi.advanceTimersByTimeAsync(1);
    expect(ctx.events).toEqual([{ featureKey: "conversation", expiredAtEpochSeconds: T0 + 30 }]);
  });

  it("picks up cooldowns persisted before start", async () => {
    const ctx = setup();
    notifier = ctx.notifier;
    await ctx.store.save("refresh", 2, T0 - 100);

    expect(await notifier.start()).toEqual([]);
    expect(notifier.watchedFeatures()).toEqual(["refresh"]);
    expect(notifier.getState()).toBe("firing");

    await vi.advanceTimersByTimeAsync(18_000);
    expect(ctx.events).toEqual([]);

    await vi.advanceTimersByTimeAsync(1_000);
    expect(ctx.events).toEqual([{ featureKey: "refresh", expiredAtEpochSeconds: T0 + 19 }]);
  });

  it("resets cooldowns that ran out while nothing was watching", async () => {
    const ctx = setup();
    notifier = ctx.notifier;
    await ctx.store.save("refresh", 2, T0 - 500);

    expect(await notifier.start()).toEqual(["refresh"]);
    expect(ctx.events).toEqual([{ featureKey: "refresh", expiredAtEpochSeconds: T0 }]);
    expect(notifier.getState()).toBe("idle");
  });

  it("stays armed without running timers while stopped", async () => {
    const ctx = setup();
    notifier = ctx.notifier;

    await exhaust(ctx.registry, "conversation");
    expect(notifier.getState()).toBe("armed");
    expect(vi.getTimerCount()).toBe(0);

    await vi.advanceTimersByTimeAsync(60_000);
    expect(ctx.events).toEqual([]);

    expect(await notifier.start()).toEqual(["conversation"]);
    expect(ctx.events).toEqual([{ featureKey: "conversation", expiredAtEpochSeconds: T0 + 60 }]);
  });

  it("cancels every timer on stop", async () => {
    const ctx = setup();
    notifier = ctx.notifier;
    await notifier.start();
    await exhaust(ctx.registry, "conversation");
    expect(vi.getTimerCount()).toBe(2);

    notifier.stop();

    expect(vi.getTimerCount()).toBe(0);
    expect(notifier.getState()).toBe("armed");
    await vi.advanceTimersByTimeAsync(60_000);
    expect(ctx.events).toEqual([]);
  });

  it("drops a feature reset through another path without announcing it", async () => {
    const ctx = setup();
    notifier = ctx.notifier;
    await notifier.start();
    await exhaust(ctx.registry, "conversation");

    await ctx.registry.get("conversation").resetUsage();
    await vi.advanceTimersByTimeAsync(1_000);

    expect(ctx.events).toEqual([]);
    expect(notifier.watchedFeatures()).toEqual([]);
    expect(notifier.getState()).toBe("idle");
  });

  it("reports which features a manual check reset", async () => {
    const ctx = setup();
    notifier = ctx.notifier;
    await exhaust(ctx.registry, "conversation");
    await exhaust(ctx.registry, "refresh");

    vi.setSystemTime((T0 + 31) * 1000);

    expect(await notifier.checkAll()).toEqual(["conversation"]);
    expect(notifier.watchedFeatures()).toEqual(["refresh"]);
    expect(notifier.getState()).toBe("armed");
  });

  it("announces an expiry that a regular read healed first", async () => {
    const ctx = setup();
    notifier = ctx.notifier;
    await notifier.start();
    await exhaust(ctx.registry, "refresh");

    vi.setSystemTime((T0 + 121) * 1000);
    expect(await ctx.registry.get("refresh").canPerformAction()).toBe(true);

    expect(ctx.events).toEqual([{ featureKey: "refresh", expiredAtEpochSeconds: T0 + 121 }]);
    expect(notifier.watchedFeatures()).toEqual([]);
    expect(notifier.getState()).toBe("idle");

    expect(await notifier.checkAll()).toEqual([]);
    expect(ctx.events).toHaveLength(1);
  });

  it("announces an expiry healed by a check inside the tolerance", async () => {
    const ctx = setup(60_000);
    notifier = ctx.notifier;
    await notifier.start();
    await exhaust(ctx.registry, "conversation");

    vi.setSystemTime((T0 + 29) * 1000);
    const result = await ctx.registry.get("conversation").checkLimit();

    expect(result).toMatchObject({ canProceed: true, usageCount: 0 });
    expect(ctx.events).toEqual([{ featureKey: "conversation", expiredAtEpochSeconds: T0 + 29 }]);
    expect(vi.getTimerCount()).toBe(0);
  });

  it("announces expiries healed while stopped", async () => {
    const ctx = setup();
    notifier = ctx.notifier;
    await exhaust(ctx.registry, "conversation");
    expect(notifier.getState()).toBe("armed");

    vi.setSystemTime((T0 + 30) * 1000);
    await ctx.registry.get("conversation").recordUsage();

    expect(ctx.events).toEqual([{ featureKey: "conversation", expiredAtEpochSeconds: T0 + 30 }]);
    expect(notifier.getState()).toBe("idle");
  });

  it("keeps broadcasting when a listener throws", async () => {
    const ctx = setup();
    notifier = ctx.notifier;
    notifier.onCooldownExpired(() => {
      throw new Error("listener broke");
    });
    const late: CooldownExpiredEvent[] = [];
    notifier.onCooldownExpired((event) => late.push(event));
    await exhaust(ctx.registry, "conversation");
    vi.setSystemTime((T0 + 30) * 1000);

    await notifier.checkAll();

    expect(ctx.events).toHaveLength(1);
    expect(late).toHaveLength(1);
  });

  describe("waitForExpiry", () => {
    it("resolves with the next matching event", async () => {
      const ctx = setup();
      notifier = ctx.notifier;
      await notifier.start();
      await exhaust(ctx.registry, "refresh");
      await exhaust(ctx.registry, "conversation");

      const pending = notifier.waitForExpiry({ timeoutMs: 300_000, featureKey: "refresh" });
      await vi.advanceTimersByTimeAsync(119_000);

      await expect(pending).resolves.toEqual({ featureKey: "refresh", expiredAtEpochSeconds: T0 + 119 });
    });

    it("resolves with null on timeout", async () => {
      const ctx = setup();
      notifier = ctx.notifier;

      const pending = notifier.waitForExpiry({ timeoutMs: 5_000 });
      await vi.advanceTimersByTimeAsync(5_000);

      await expect(pending).resolves.toBeNull();
    });

    it("resolves with null when aborted", async () => {
      const ctx = setup();
      notifier = ctx.notifier;
      const controller = new AbortController();

      const pending = notifier.waitForExpiry({ timeoutMs: 5_000, signal: controller.signal });
      controller.abort();

      await expect(pending).resolves.toBeNull();
      expect(vi.getTimerCount()).toBe(0);
    });
  });
});
