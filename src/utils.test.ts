import { setTimeout as sleep } from "node:timers/promises";
import { describe, expect, it } from "vitest";
import { KeyedLock, isRecord } from "./utils.js";

describe("isRecord", () => {
  it("accepts plain objects only", () => {
    expect(isRecord({ a: 1 })).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
    expect(isRecord("x")).toBe(false);
  });
});

describe("KeyedLock", () => {
  it("serializes work on the same key", async () => {
    const lock = new KeyedLock();
    const order: string[] = [];
    const first = lock.withLock("k", async () => {
      order.push("first:start");
      await sleep(10);
      order.push("first:end");
    });
    const second = lock.withLock("k", async () => {
      order.push("second");
    });
    await Promise.all([first, second]);
    expect(order).toEqual(["first:start", "first:end", "second"]);
    expect(lock.isLocked("k")).toBe(false);
  });

  it("releases the key when the work throws", async () => {
    const lock = new KeyedLock();
    await expect(lock.withLock("k", async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    expect(await lock.withLock("k", async () => "next")).toBe("next");
  });

  it("runs different keys concurrently", async () => {
    const lock = new KeyedLock();
    const order: string[] = [];
    const slow = lock.withLock("a", async () => {
      await sleep(10);
      order.push("a");
    });
    const fast = lock.withLock("b", async () => {
      order.push("b");
    });
    await Promise.all([slow, fast]);
    expect(order).toEqual(["b", "a"]);
  });
});
