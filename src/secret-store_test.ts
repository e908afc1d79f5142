import { describe, expect, it } from "vitest";
import { ConfigProvider, Effect, Layer, Option, Redacted } from "effect";
import {
  isPlaceholderKey,
  SecretStore,
  SecretStoreLive,
  secretStoreFromRecord,
} from "./secret-store.ts";

const keyFor = (provider: string) =>
  Effect.flatMap(SecretStore, (s) => s.getAPIKey(provider)).pipe(
    Effect.map((key) => Option.getOrUndefined(Option.map(key, Redacted.value))),
  );

describe("isPlaceholderKey", () => {
  it("recognizes template values", () => {
    expect(isPlaceholderKey("")).toBe(true);
    expect(isPlaceholderKey("   ")).toBe(true);
    expect(isPlaceholderKey("your_api_key_here")).toBe(true);
    expect(isPlaceholderKey("sk-REPLACE-ME")).toBe(true);
    expect(isPlaceholderKey("KEY_PLACEHOLDER")).toBe(true);
  });

  it("accepts anything else", () => {
    expect(isPlaceholderKey("test-secret")).toBe(false);
  });
});

describe("SecretStoreLive", () => {
  it("reads keys from configuration and drops placeholders", async () => {
    const config = ConfigProvider.fromMap(
      new Map([
        ["RAPIDAPI_KEY", "test-secret"],
        ["ALPHA_VANTAGE_API_KEY", "your_alpha_vantage_key"],
      ]),
    );

    const keys = await Effect.runPromise(
      Effect.all([keyFor("rapidapi"), keyFor("alphavantage"), keyFor("yahoo")]).pipe(
        Effect.provide(SecretStoreLive.pipe(Layer.provide(Layer.setConfigProvider(config)))),
      ),
    );

    expect(keys).toEqual(["test-secret", undefined, undefined]);
  });
});

describe("secretStoreFromRecord", () => {
  it("serves fixed keys", async () => {
    const key = await Effect.runPromise(
      keyFor("rapidapi").pipe(Effect.provide(secretStoreFromRecord({ rapidapi: "test-secret" }))),
    );
    expect(key).toBe("test-secret");
  });
});
