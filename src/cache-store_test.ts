import { describe, expect, it } from "vitest";
import { Effect, Option, TestClock, TestContext } from "effect";
import { isExpired, makeCacheStore } from "./cache-store.ts";

function run<A, E>(effect: Effect.Effect<A, E, never>): Promise<A> {
  return Effect.runPromise(effect.pipe(Effect.provide(TestContext.TestContext)));
}

describe("isExpired", () => {
  const entry = { value: 1, storedAt: 1_000, expiry: 500 };

  it("is fresh up to and including the expiry", () => {
    expect(isExpired(entry, 1_500)).toBe(false);
  });

  it("expires strictly after it", () => {
    expect(isExpired(entry, 1_501)).toBe(true);
  });
});

describe("makeCacheStore", () => {
  it("stores the value with the current time", async () => {
    const entry = await run(
      Effect.gen(function* () {
        const cache = yield* makeCacheStore<number>();
        yield* TestClock.adjust("2 seconds");
        yield* cache.set("AAPL", 190, "5 minutes");
        return yield* cache.get("AAPL");
      }),
    );
    expect(Option.getOrUndefined(entry)).toEqual({
      value: 190,
      storedAt: 2_000,
      expiry: 300_000,
    });
  });

  it("hides expired entries from fresh reads but not raw reads", async () => {
    const result = await run(
      Effect.gen(function* () {
        const cache = yield* makeCacheStore<number>();
        yield* cache.set("AAPL", 190, "5 minutes");
        yield* TestClock.adjust("6 minutes");
        return {
          fresh: yield* cache.getFresh("AAPL"),
          raw: yield* cache.get("AAPL"),
        };
      }),
    );
    expect(Option.isNone(result.fresh)).toBe(true);
    expect(Option.getOrUndefined(result.raw)?.value).toBe(190);
  });

  it("overwrites rather than merges", async () => {
    const value = await run(
      Effect.gen(function* () {
        const cache = yield* makeCacheStore<{ price: number; currency?: string }>();
        yield* cache.set("AAPL", { price: 190, currency: "USD" }, "5 minutes");
        yield* cache.set("AAPL", { price: 191 }, "5 minutes");
        return yield* cache.getFresh("AAPL");
      }),
    );
    expect(Option.getOrUndefined(value)).toEqual({ price: 191 });
  });

  it("sweeps only expired entries", async () => {
    const result = await run(
      Effect.gen(function* () {
        const cache = yield* makeCacheStore<number>();
        yield* cache.set("OLD", 1, "1 minute");
        yield* cache.set("NEW", 2, "10 minutes");
        yield* TestClock.adjust("2 minutes");
        const removed = yield* cache.sweepExpired;
        return {
          removed,
          old: yield* cache.get("OLD"),
          kept: yield* cache.get("NEW"),
        };
      }),
    );
    expect(result.removed).toEqual(["OLD"]);
    expect(Option.isNone(result.old)).toBe(true);
    expect(Option.isSome(result.kept)).toBe(true);
  });

  it("counts fresh hits and misses", async () => {
    const info = await run(
      Effect.gen(function* () {
        const cache = yield* makeCacheStore<number>();
        yield* cache.set("AAPL", 190, "5 minutes");
        yield* cache.getFresh("AAPL");
        yield* cache.getFresh("AAPL");
        yield* cache.getFresh("MSFT");
        yield* cache.get("MSFT");
        return yield* cache.info;
      }),
    );
    expect(info).toEqual({ entries: 1, hits: 2, misses: 1, hitRate: 2 / 3 });
  });

  it("remove and clear drop entries", async () => {
    const result = await run(
      Effect.gen(function* () {
        const cache = yield* makeCacheStore<number>();
        yield* cache.set("A", 1, "5 minutes");
        yield* cache.set("B", 2, "5 minutes");
        yield* cache.remove("A");
        const afterRemove = (yield* cache.info).entries;
        yield* cache.clear;
        return { afterRemove, afterClear: (yield* cache.info).entries };
      }),
    );
    expect(result).toEqual({ afterRemove: 1, afterClear: 0 });
  });
});
