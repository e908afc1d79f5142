// Yahoo Finance — keyless chart and search endpoints.

import { HttpClient, HttpClientRequest } from "@effect/platform";
import { Clock, Config, type ConfigError, Effect, Schema } from "effect";
import type { Quote, SymbolMatch } from "../domain.ts";
import { withDerivedChange } from "../domain.ts";
import {
  MalformedResponse,
  NotFound,
  type QuoteProvider,
} from "../quote-provider.ts";
import { getJson, parsePrice, withTimeout } from "./http.ts";

export const YAHOO = "yahoo";

// --- Yahoo response schemas ---

const YahooMeta = Schema.Struct({
  symbol: Schema.String,
  regularMarketPrice: Schema.optional(Schema.Number),
  chartPreviousClose: Schema.optional(Schema.Number),
  previousClose: Schema.optional(Schema.Number),
  currency: Schema.optional(Schema.String),
  regularMarketTime: Schema.optional(Schema.Number),
});

const YahooChartResponse = Schema.Struct({
  chart: Schema.Struct({
    result: Schema.NullOr(Schema.Array(Schema.Struct({ meta: YahooMeta }))),
    error: Schema.NullOr(
      Schema.Struct({
        description: Schema.optional(Schema.String),
      }),
    ),
  }),
});

type YahooChartResponseType = typeof YahooChartResponse.Type;

const YahooSearchResponse = Schema.Struct({
  quotes: Schema.Array(
    Schema.Struct({
      symbol: Schema.optional(Schema.String),
      shortname: Schema.optional(Schema.String),
      longname: Schema.optional(Schema.String),
      exchDisp: Schema.optional(Schema.String),
      quoteType: Schema.optional(Schema.String),
    }),
  ),
});

// --- Decode chart response into Quote ---

export function decodeYahooChart(
  json: unknown,
  symbol: string,
  now: number,
): Effect.Effect<Quote, MalformedResponse | NotFound> {
  return Schema.decodeUnknown(YahooChartResponse)(json).pipe(
    Effect.mapError(
      (schemaError) =>
        new MalformedResponse({
          provider: YAHOO,
          message: `Invalid response: ${schemaError.message}`,
        }),
    ),
    Effect.flatMap((response) => interpretChart(response, symbol, now)),
  );
}

function interpretChart(
  response: YahooChartResponseType,
  symbol: string,
  now: number,
): Effect.Effect<Quote, MalformedResponse | NotFound> {
  const { chart } = response;

  if (chart.error !== null) {
    return Effect.fail(new NotFound({ provider: YAHOO, symbol }));
  }

  if (chart.result === null || chart.result.length === 0) {
    return Effect.fail(new NotFound({ provider: YAHOO, symbol }));
  }

  const meta = chart.result[0].meta;
  // Yahoo reports 0 when it has nothing to say about the instrument.
  const price = parsePrice(meta.regularMarketPrice);
  if (price === undefined) {
    return Effect.fail(
      new MalformedResponse({
        provider: YAHOO,
        message: `No usable price for ${symbol}`,
      }),
    );
  }

  return Effect.succeed(
    withDerivedChange({
      symbol: meta.symbol.toUpperCase(),
      price,
      previousClose: parsePrice(meta.chartPreviousClose ?? meta.previousClose),
      currency: meta.currency,
      marketTime: meta.regularMarketTime === undefined
        ? undefined
        : meta.regularMarketTime * 1000,
      source: YAHOO,
      timestamp: now,
    }),
  );
}

// --- Decode search response ---

export function decodeYahooSearch(
  json: unknown,
): Effect.Effect<ReadonlyArray<SymbolMatch>, MalformedResponse> {
  return Schema.decodeUnknown(YahooSearchResponse)(json).pipe(
    Effect.mapError(
      (e) =>
        new MalformedResponse({
          provider: YAHOO,
          message: `Invalid search response: ${e.message}`,
        }),
    ),
    Effect.map(({ quotes }) =>
      quotes.flatMap((q): Array<SymbolMatch> =>
        q.symbol === undefined
          ? []
          : [{
            symbol: q.symbol.toUpperCase(),
            name: q.longname ?? q.shortname ?? q.symbol,
            exchange: q.exchDisp,
            type: q.quoteType,
            source: YAHOO,
          }]
      )
    ),
  );
}

// --- Yahoo Finance provider ---

export const makeYahooFinanceProvider: Effect.Effect<
  QuoteProvider,
  ConfigError.ConfigError,
  HttpClient.HttpClient
> = Effect.gen(function* () {
  const client = (yield* HttpClient.HttpClient).pipe(
    HttpClient.filterStatusOk,
    HttpClient.mapRequest(
      HttpClientRequest.setHeader("User-Agent", "Mozilla/5.0"),
    ),
  );
  const chartUrl = yield* Config.string("YAHOO_BASE_URL").pipe(
    Config.withDefault("https://query1.finance.yahoo.com/v8/finance/chart"),
  );
  const searchUrl = yield* Config.string("YAHOO_SEARCH_URL").pipe(
    Config.withDefault("https://query1.finance.yahoo.com/v1/finance/search"),
  );

  return {
    id: YAHOO,
    tier: "realtime",
    fetchQuote: (symbol, timeout) =>
      Effect.gen(function* () {
        const json = yield* getJson(
          client,
          YAHOO,
          symbol,
          `${chartUrl}/${encodeURIComponent(symbol)}`,
        );
        const now = yield* Clock.currentTimeMillis;
        return yield* decodeYahooChart(json, symbol, now);
      }).pipe(withTimeout(YAHOO, timeout)),
    searchSymbols: (query, timeout) =>
      getJson(
        client,
        YAHOO,
        query,
        `${searchUrl}?q=${encodeURIComponent(query)}&quotesCount=10&newsCount=0`,
      ).pipe(
        Effect.flatMap(decodeYahooSearch),
        withTimeout(YAHOO, timeout),
      ),
  } satisfies QuoteProvider;
});
