import { describe, it, expect, vi } from "vitest";
import { withRetry } from "../utils/retry.js";
import { KeyedMutex } from "../utils/keyed-mutex.js";

describe("withRetry", () => {
  it("returns the first successful result", async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error("transient")).mockResolvedValueOnce("ok");

    const result = await withRetry(fn, { maxAttempts: 2, delayMs: 0 });

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("throws the last error once attempts run out", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new Error("first"))
      .mockRejectedValueOnce(new Error("second"));

    await expect(withRetry(fn, { maxAttempts: 2, delayMs: 0 })).rejects.toThrow("second");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("reports each failed attempt before retrying", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new Error("first"))
      .mockRejectedValueOnce(new Error("second"))
      .mockResolvedValueOnce("ok");
    const attempts: number[] = [];

    await withRetry(fn, { maxAttempts: 3, delayMs: 0, onRetry: (_err, attempt) => attempts.push(attempt) });

    expect(attempts).toEqual([1, 2]);
  });

  it("waits the configured delay before retrying", async () => {
    vi.useFakeTimers();
    try {
      const fn = vi.fn().mockRejectedValueOnce(new Error("first")).mockResolvedValueOnce("ok");

      const pending = withRetry(fn, { maxAttempts: 2, delayMs: 100 });
      await vi.advanceTimersByTimeAsync(99);
      expect(fn).toHaveBeenCalledTimes(1);
      await vi.advanceTimersByTimeAsync(1);

      await expect(pending).resolves.toBe("ok");
      expect(fn).toHaveBeenCalledTimes(2);
    } finally {
      vi.useRealTimers();
    }
  });
});

describe("KeyedMutex", () => {
  const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 1));

  it("runs work for the same key one at a time, in order", async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    const task = (name: string) =>
      mutex.run("search", async () => {
        events.push(`${name}:start`);
        await tick();
        events.push(`${name}:end`);
        return name;
      });

    const results = await Promise.all([task("a"), task("b"), task("c")]);

    expect(results).toEqual(["a", "b", "c"]);
    expect(events).toEqual(["a:start", "a:end", "b:start", "b:end", "c:start", "c:end"]);
  });

  it("lets different keys interleave", async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    const task = (key: string) =>
      mutex.run(key, async () => {
        events.push(`${key}:start`);
        await tick();
        events.push(`${key}:end`);
      });

    await Promise.all([task("refresh"), task("filter")]);

    expect(events.slice(0, 2)).toEqual(["refresh:start", "filter:start"]);
  });

  it("keeps going after a task rejects", async () => {
    const mutex = new KeyedMutex();

    const failing = mutex.run("message", async () => {
      throw new Error("boom");
    });
    const following = mutex.run("message", async () => "next");

    await expect(failing).rejects.toThrow("boom");
    await expect(following).resolves.toBe("next");
  });
});
