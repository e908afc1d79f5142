import { describe, expect, it } from "vitest";
import { ConfigProvider, Duration, Effect, Either, Layer } from "effect";
import { defaultSettings, Settings, SettingsLive } from "./config.ts";

const load = (env: ReadonlyArray<readonly [string, string]>) =>
  Effect.runPromise(
    Effect.either(
      Settings.pipe(
        Effect.provide(
          SettingsLive.pipe(
            Layer.provide(Layer.setConfigProvider(ConfigProvider.fromMap(new Map(env)))),
          ),
        ),
      ),
    ),
  );

describe("SettingsLive", () => {
  it("falls back to the defaults", async () => {
    const result = await load([]);
    expect(Either.getOrThrow(result)).toEqual(defaultSettings);
  });

  it("reads overrides from the environment", async () => {
    const settings = Either.getOrThrow(
      await load([
        ["QUOTE_PROVIDERS", "yahoo,fixtures"],
        ["PROVIDER_TIMEOUT", "2 seconds"],
        ["RETRY_COUNT", "0"],
      ]),
    );
    expect(settings.providers).toEqual(["yahoo", "fixtures"]);
    expect(Duration.toMillis(settings.providerTimeout)).toBe(2_000);
    expect(settings.retryCount).toBe(0);
  });

  it("rejects a negative retry count", async () => {
    const result = await load([["RETRY_COUNT", "-1"]]);
    expect(Either.isLeft(result)).toBe(true);
  });
});
