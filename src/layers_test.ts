import { describe, expect, it } from "vitest";
import { FetchHttpClient } from "@effect/platform";
import { Effect, Either, Layer } from "effect";
import { settingsLayer } from "./config.ts";
import { PipelineLive, QuoteProvidersLive } from "./layers.ts";
import { QuoteProviders } from "./quote-provider.ts";
import { QuoteResolver } from "./quote-resolver.ts";
import { secretStoreFromRecord } from "./secret-store.ts";
import { SymbolSearch } from "./symbol-search.ts";
import { stubFetch } from "./providers/fetch-stub.ts";

// Building providers never touches the network; only calling them would.
const providersFor = (providers: ReadonlyArray<string>) =>
  QuoteProvidersLive.pipe(
    Layer.provideMerge(settingsLayer({ providers })),
    Layer.provide(Layer.mergeAll(FetchHttpClient.layer, secretStoreFromRecord({}))),
  );

describe("QuoteProvidersLive", () => {
  it("builds providers in the configured priority order", async () => {
    const ids = await Effect.runPromise(
      Effect.map(QuoteProviders, (ps) => ps.map((p) => p.id)).pipe(
        Effect.provide(providersFor(["yahoo", "AlphaVantage", "rapidapi"])),
      ),
    );
    expect(ids).toEqual(["yahoo", "alphavantage", "rapidapi"]);
  });

  it("rejects an unknown provider name", async () => {
    const result = await Effect.runPromise(
      Effect.either(QuoteProviders.pipe(Effect.provide(providersFor(["yahoo", "bloomberg"])))),
    );
    expect(Either.isLeft(result) && result.left._tag).toBe("InvalidData");
  });
});

describe("PipelineLive with the fixture provider", () => {
  const layer = PipelineLive.pipe(Layer.provideMerge(providersFor(["fixtures"])));

  it("resolves known symbols and reports unknown ones", async () => {
    const results = await Effect.runPromise(
      Effect.flatMap(QuoteResolver, (r) => r.refresh(["aapl", "NOPE"])).pipe(
        Effect.provide(layer),
      ),
    );

    const aapl = results.get("AAPL");
    const nope = results.get("NOPE");
    expect(aapl !== undefined && Either.isRight(aapl) && aapl.right).toMatchObject({
      symbol: "AAPL",
      price: 225.3,
      source: "fixtures",
    });
    expect(nope !== undefined && Either.isLeft(nope) && nope.left.attempts).toEqual([
      { provider: "fixtures", outcome: "NotFound" },
    ]);
  });

  it("searches by name", async () => {
    const matches = await Effect.runPromise(
      Effect.flatMap(SymbolSearch, (s) => s.search("micro")).pipe(Effect.provide(layer)),
    );
    expect(matches.map((m) => m.symbol)).toEqual(["MSFT"]);
  });
});

describe("PipelineLive over HTTP", () => {
  it("resolves each symbol on its own through a live adapter", async () => {
    const stub = stubFetch((url) => {
      const symbol = url.pathname.split("/").pop() ?? "";
      return symbol === "AAPL"
        ? {
          body: {
            chart: { result: [{ meta: { symbol, regularMarketPrice: 5 } }], error: null },
          },
        }
        : { status: 404, body: { chart: { result: null, error: { description: "No data" } } } };
    });
    const layer = PipelineLive.pipe(
      Layer.provideMerge(QuoteProvidersLive),
      Layer.provideMerge(settingsLayer({ providers: ["yahoo"] })),
      Layer.provideMerge(Layer.merge(stub.layer, secretStoreFromRecord({}))),
    );

    const results = await Effect.runPromise(
      Effect.flatMap(QuoteResolver, (r) => r.refresh(["AAPL", "MSFT"])).pipe(
        Effect.provide(layer),
      ),
    );

    const aapl = results.get("AAPL");
    const msft = results.get("MSFT");
    expect(aapl !== undefined && Either.isRight(aapl) && aapl.right).toMatchObject({
      symbol: "AAPL",
      price: 5,
      source: "yahoo",
    });
    expect(msft !== undefined && Either.isLeft(msft) && msft.left.attempts).toEqual([
      { provider: "yahoo", outcome: "NotFound" },
    ]);
  });
});
