import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { InMemoryQuotaStore } from "../quota-store/in-memory.js";
import { FileQuotaStore } from "../quota-store/file.js";
import { PersistenceReadError } from "../errors.js";

describe("InMemoryQuotaStore", () => {
  it("returns zeroed counters for a feature never saved", async () => {
    const store = new InMemoryQuotaStore();
    expect(await store.load("search")).toEqual({ usageCount: 0, cooldownStartEpochSeconds: 0 });
  });

  it("round-trips saved counters", async () => {
    const store = new InMemoryQuotaStore();
    await store.save("search", 15, 1_700_000_000);
    expect(await store.load("search")).toEqual({ usageCount: 15, cooldownStartEpochSeconds: 1_700_000_000 });
  });

  it("hands out copies", async () => {
    const store = new InMemoryQuotaStore();
    await store.save("filter", 1, 0);
    const loaded = await store.load("filter");
    loaded.usageCount = 99;
    expect((await store.load("filter")).usageCount).toBe(1);
  });

  it("keeps features apart", async () => {
    const store = new InMemoryQuotaStore();
    await store.save("filter", 2, 10);
    expect(await store.load("refresh")).toEqual({ usageCount: 0, cooldownStartEpochSeconds: 0 });
  });
});

describe("FileQuotaStore", () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "limitkit-quota-"));
    filePath = join(dir, "nested", "quota.json");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("returns zeroed counters when the file does not exist", async () => {
    const store = new FileQuotaStore(filePath);
    expect(await store.load("conversation")).toEqual({ usageCount: 0, cooldownStartEpochSeconds: 0 });
  });

  it("survives a restart", async () => {
    await new FileQuotaStore(filePath).save("message", 5, 1_700_000_040);

    const reopened = new FileQuotaStore(filePath);
    expect(await reopened.load("message")).toEqual({ usageCount: 5, cooldownStartEpochSeconds: 1_700_000_040 });
  });

  it("keeps every feature in one versioned document", async () => {
    const store = new FileQuotaStore(filePath);
    await store.save("search", 3, 0);
    await store.save("refresh", 2, 1_700_000_000);

    const document: unknown = JSON.parse(await readFile(filePath, "utf8"));
    expect(document).toEqual({
      version: 1,
      features: {
        search: { usageCount: 3, cooldownStartEpochSeconds: 0 },
        refresh: { usageCount: 2, cooldownStartEpochSeconds: 1_700_000_000 },
      },
    });
  });

  it("does not lose concurrent saves of different features", async () => {
    const store = new FileQuotaStore(filePath);
    await Promise.all([
      store.save("conversation", 1, 0),
      store.save("refresh", 2, 0),
      store.save("filter", 1, 0),
      store.save("search", 4, 0),
    ]);

    const reopened = new FileQuotaStore(filePath);
    expect((await reopened.load("conversation")).usageCount).toBe(1);
    expect((await reopened.load("refresh")).usageCount).toBe(2);
    expect((await reopened.load("filter")).usageCount).toBe(1);
    expect((await reopened.load("search")).usageCount).toBe(4);
  });

  it("reports a corrupt file as a read error", async () => {
    const store = new FileQuotaStore(filePath);
    await store.save("search", 1, 0);
    await writeFile(filePath, "{ not json", "utf8");

    await expect(store.load("search")).rejects.toBeInstanceOf(PersistenceReadError);
  });

  it("reports an unexpected document shape as a read error", async () => {
    const store = new FileQuotaStore(filePath);
    await store.save("search", 1, 0);
    await writeFile(filePath, JSON.stringify({ version: 2, features: {} }), "utf8");

    await expect(store.load("search")).rejects.toThrow(/unexpected shape/);
  });

  it("replaces a corrupt file on the next save", async () => {
    const store = new FileQuotaStore(filePath);
    await store.save("search", 1, 0);
    await writeFile(filePath, "garbage", "utf8");

    await store.save("filter", 2, 1_700_000_000);
    expect(await store.load("filter")).toEqual({ usageCount: 2, cooldownStartEpochSeconds: 1_700_000_000 });
    expect(await store.load("search")).toEqual({ usageCount: 0, cooldownStartEpochSeconds: 0 });
  });
});
