// Providers are chosen by configuration, in priority order.

import { FetchHttpClient, type HttpClient } from "@effect/platform";
import { ConfigError, Effect, Layer } from "effect";
import { QuoteCacheLive, SearchCacheLive } from "./cache-store.ts";
import { Settings, SettingsLive } from "./config.ts";
import { PortfolioLive } from "./portfolio.ts";
import { ProviderHealthLive } from "./provider-health.ts";
import { type QuoteProvider, QuoteProviders } from "./quote-provider.ts";
import { QuoteResolverLive } from "./quote-resolver.ts";
import { SecretStore, SecretStoreLive } from "./secret-store.ts";
import { SymbolSearchLive } from "./symbol-search.ts";
import { makeAlphaVantageProvider } from "./providers/alpha-vantage.ts";
import { fixtureProvider } from "./providers/fixtures.ts";
import { makeRapidApiProvider } from "./providers/rapidapi.ts";
import { makeYahooFinanceProvider } from "./providers/yahoo-finance.ts";

type ProviderFactory = Effect.Effect<
  QuoteProvider,
  ConfigError.ConfigError,
  HttpClient.HttpClient | SecretStore
>;

const factories = new Map<string, ProviderFactory>([
  ["rapidapi", makeRapidApiProvider],
  ["yahoo", makeYahooFinanceProvider],
  ["alphavantage", makeAlphaVantageProvider],
  ["fixtures", Effect.succeed(fixtureProvider)],
]);

export const QuoteProvidersLive = Layer.effect(
  QuoteProviders,
  Effect.gen(function* () {
    const { providers } = yield* Settings;
    return yield* Effect.forEach(providers, (name) => {
      const make = factories.get(name.trim().toLowerCase());
      return make === undefined
        ? Effect.fail(
          ConfigError.InvalidData(
            ["QUOTE_PROVIDERS"],
            `Unknown provider "${name}" (expected one of ${[...factories.keys()].join(", ")})`,
          ),
        )
        : make;
    });
  }),
);

/** Resolver, search and their shared state, over whatever Settings and providers are given. */
export const PipelineLive = Layer.mergeAll(QuoteResolverLive, SymbolSearchLive).pipe(
  Layer.provideMerge(
    Layer.mergeAll(ProviderHealthLive, QuoteCacheLive, SearchCacheLive),
  ),
);

/** Everything, configured from the environment and talking to the network. */
export const AppLive = PortfolioLive.pipe(
  Layer.provideMerge(PipelineLive),
  Layer.provideMerge(QuoteProvidersLive),
  Layer.provide(Layer.mergeAll(SecretStoreLive, FetchHttpClient.layer)),
  Layer.provideMerge(SettingsLive),
);
