// Secret store — API keys per provider, opaque to the rest of the pipeline.

import { Config, Context, Effect, Layer, Option, Redacted } from "effect";
import type { ProviderId } from "./domain.ts";

export class SecretStore extends Context.Tag("SecretStore")<
  SecretStore,
  {
    readonly getAPIKey: (
      provider: ProviderId,
    ) => Effect.Effect<Option.Option<Redacted.Redacted<string>>>;
  }
>() {}

/** Template values shipped in sample configs are not real keys. */
export function isPlaceholderKey(key: string): boolean {
  const trimmed = key.trim();
  return (
    trimmed.length === 0 ||
    trimmed.startsWith("your_") ||
    trimmed.startsWith("sk-REPLACE") ||
    trimmed.includes("PLACEHOLDER")
  );
}

const usable = (
  key: Option.Option<Redacted.Redacted<string>>,
): Option.Option<Redacted.Redacted<string>> =>
  Option.filter(key, (k) => !isPlaceholderKey(Redacted.value(k)));

const ENV_KEYS: Record<ProviderId, string> = {
  alphavantage: "ALPHA_VANTAGE_API_KEY",
  rapidapi: "RAPIDAPI_KEY",
};

/** Keys read once from configuration (environment by default). */
export const SecretStoreLive = Layer.effect(
  SecretStore,
  Effect.gen(function* () {
    const keys = new Map<ProviderId, Option.Option<Redacted.Redacted<string>>>();
    for (const [provider, name] of Object.entries(ENV_KEYS)) {
      const key = yield* Config.option(Config.redacted(name));
      keys.set(provider, usable(key));
    }
    return SecretStore.of({
      getAPIKey: (provider) =>
        Effect.succeed(keys.get(provider) ?? Option.none()),
    });
  }),
);

/** Fixed keys, for tests and embedding. */
export const secretStoreFromRecord = (
  record: Readonly<Record<ProviderId, string>>,
) =>
  Layer.succeed(
    SecretStore,
    SecretStore.of({
      getAPIKey: (provider) =>
        Effect.succeed(
          usable(
            Option.fromNullable(record[provider]).pipe(
              Option.map((k) => Redacted.make(k)),
            ),
          ),
        ),
    }),
  );
