import { describe, it, expect } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  FileQuotaStore,
  InMemoryQuotaStore,
  ManualClock,
  PersistenceReadError,
  PersistenceWriteError,
  StaticLimitConfigProvider,
  createInMemoryMetrics,
  createLimitRegistry,
} from "@limitkit/core";
import { RedisQuotaStore, createQuotaStore, quotaKey, type RedisQuotaClient } from "../quota-store/index.js";

class FakeRedis implements RedisQuotaClient {
  readonly data = new Map<string, string>();

  async get(key: string): Promise<string | null> {
    return this.data.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<"OK"> {
    this.data.set(key, value);
    return "OK";
  }
}

class DownRedis implements RedisQuotaClient {
  async get(): Promise<string | null> {
    throw new Error("connect ECONNREFUSED 127.0.0.1:6379");
  }

  async set(): Promise<"OK"> {
    throw new Error("connect ECONNREFUSED 127.0.0.1:6379");
  }
}

describe("RedisQuotaStore", () => {
  it("reads zeros for a feature never written", async () => {
    const store = new RedisQuotaStore(new FakeRedis());
    expect(await store.load("search")).toEqual({ usageCount: 0, cooldownStartEpochSeconds: 0 });
  });

  it("stores each feature as JSON under a namespaced key", async () => {
    const redis = new FakeRedis();
    const store = new RedisQuotaStore(redis, "tenant-a");

    await store.save("search", 4, 1_700_000_000);

    expect(quotaKey("tenant-a", "search")).toBe("quota:tenant-a:search");
    expect(redis.data.get("quota:tenant-a:search")).toBe('{"usageCount":4,"cooldownStartEpochSeconds":1700000000}');
    expect(await store.load("search")).toEqual({ usageCount: 4, cooldownStartEpochSeconds: 1_700_000_000 });
  });

  it("keeps namespaces apart", async () => {
    const redis = new FakeRedis();
    await new RedisQuotaStore(redis, "tenant-a").save("filter", 2, 0);

    expect(await new RedisQuotaStore(redis, "tenant-b").load("filter")).toEqual({
      usageCount: 0,
      cooldownStartEpochSeconds: 0,
    });
  });

  it("reports malformed values as read errors", async () => {
    const redis = new FakeRedis();
    const store = new RedisQuotaStore(redis);
    redis.data.set(quotaKey("default", "message"), "not json");
    redis.data.set(quotaKey("default", "refresh"), '{"usageCount":-1}');

    await expect(store.load("message")).rejects.toBeInstanceOf(PersistenceReadError);
    await expect(store.load("refresh")).rejects.toBeInstanceOf(PersistenceReadError);
  });

  it("wraps connection failures with the feature key", async () => {
    const store = new RedisQuotaStore(new DownRedis());

    const readError = await store.load("conversation").catch((err: unknown) => err);
    expect(readError).toBeInstanceOf(PersistenceReadError);
    expect(readError).toMatchObject({ featureKey: "conversation" });

    await expect(store.save("conversation", 1, 0)).rejects.toBeInstanceOf(PersistenceWriteError);
  });

  it("lets limit managers fail open when Redis is down", async () => {
    const registry = createLimitRegistry({
      store: new RedisQuotaStore(new DownRedis()),
      config: new StaticLimitConfigProvider(),
      clock: new ManualClock(),
      metrics: createInMemoryMetrics(),
      writeRetryDelayMs: 0,
    });
    const manager = registry.get("conversation");

    expect(await manager.canPerformAction()).toBe(true);
    await manager.recordUsage();
    expect(await manager.getState()).toMatchObject({ usageCount: 1 });
  });
});

describe("createQuotaStore", () => {
  it("falls back to memory", () => {
    const selection = createQuotaStore({ QUOTA_NAMESPACE: "default" });
    expect(selection.backend).toBe("memory");
    expect(selection.store).toBeInstanceOf(InMemoryQuotaStore);
    expect(selection.redis).toBeNull();
  });

  it("uses a JSON file when a path is configured", async () => {
    const dir = await mkdtemp(join(tmpdir(), "limitkit-api-"));
    try {
      const selection = createQuotaStore({ QUOTA_NAMESPACE: "default", QUOTA_STATE_PATH: join(dir, "quota.json") });
      expect(selection.backend).toBe("file");
      expect(selection.store).toBeInstanceOf(FileQuotaStore);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
