// RapidAPI Yahoo Finance — the keyed real-time feed.

import { HttpClient } from "@effect/platform";
import {
  Clock,
  Config,
  type ConfigError,
  Effect,
  Option,
  Redacted,
  Schema,
} from "effect";
import type { Quote, SymbolMatch } from "../domain.ts";
import { withDerivedChange } from "../domain.ts";
import {
  AuthError,
  MalformedResponse,
  NotFound,
  type QuoteProvider,
} from "../quote-provider.ts";
import { SecretStore } from "../secret-store.ts";
import { getJson, parseNumber, parsePrice, withTimeout } from "./http.ts";

export const RAPIDAPI = "rapidapi";

// --- RapidAPI response schemas ---

const RapidQuote = Schema.Struct({
  symbol: Schema.String,
  regularMarketPrice: Schema.optional(Schema.Number),
  regularMarketPreviousClose: Schema.optional(Schema.Number),
  regularMarketChange: Schema.optional(Schema.Number),
  regularMarketChangePercent: Schema.optional(Schema.Number),
  regularMarketTime: Schema.optional(Schema.Number),
  currency: Schema.optional(Schema.String),
});

const RapidQuoteResponse = Schema.Struct({
  quoteResponse: Schema.Struct({
    result: Schema.Array(RapidQuote),
  }),
});

const RapidAutoComplete = Schema.Struct({
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

// --- Decoders ---

export function decodeRapidQuote(
  json: unknown,
  symbol: string,
  now: number,
): Effect.Effect<Quote, MalformedResponse | NotFound> {
  return Schema.decodeUnknown(RapidQuoteResponse)(json).pipe(
    Effect.mapError(
      (e) =>
        new MalformedResponse({
          provider: RAPIDAPI,
          message: `Invalid response: ${e.message}`,
        }),
    ),
    Effect.flatMap(({ quoteResponse }): Effect.Effect<Quote, MalformedResponse | NotFound> => {
      const wanted = symbol.toUpperCase();
      const match = quoteResponse.result.find(
        (q) => q.symbol.toUpperCase() === wanted,
      );
      if (match === undefined) {
        return Effect.fail(new NotFound({ provider: RAPIDAPI, symbol }));
      }
      const price = parsePrice(match.regularMarketPrice);
      if (price === undefined) {
        return Effect.fail(
          new MalformedResponse({
            provider: RAPIDAPI,
            message: `No usable price for ${symbol}`,
          }),
        );
      }
      return Effect.succeed(
        withDerivedChange({
          symbol: wanted,
          price,
          previousClose: parsePrice(match.regularMarketPreviousClose),
          change: parseNumber(match.regularMarketChange),
          changePercent: parseNumber(match.regularMarketChangePercent),
          currency: match.currency,
          marketTime: match.regularMarketTime === undefined
            ? undefined
            : match.regularMarketTime * 1000,
          source: RAPIDAPI,
          timestamp: now,
        }),
      );
    }),
  );
}

export function decodeRapidAutoComplete(
  json: unknown,
): Effect.Effect<ReadonlyArray<SymbolMatch>, MalformedResponse> {
  return Schema.decodeUnknown(RapidAutoComplete)(json).pipe(
    Effect.mapError(
      (e) =>
        new MalformedResponse({
          provider: RAPIDAPI,
          message: `Invalid auto-complete response: ${e.message}`,
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
            source: RAPIDAPI,
          }]
      )
    ),
  );
}

// --- RapidAPI provider ---

export const makeRapidApiProvider: Effect.Effect<
  QuoteProvider,
  ConfigError.ConfigError,
  HttpClient.HttpClient | SecretStore
> = Effect.gen(function* () {
  const client = (yield* HttpClient.HttpClient).pipe(
    HttpClient.filterStatusOk,
  );
  const secrets = yield* SecretStore;
  const host = yield* Config.string("RAPIDAPI_HOST").pipe(
    Config.withDefault("yh-finance.p.rapidapi.com"),
  );

  const get = (path: string, subject: string) =>
    secrets.getAPIKey(RAPIDAPI).pipe(
      Effect.flatMap(
        Option.match({
          onNone: () =>
            Effect.fail(
              new AuthError({
                provider: RAPIDAPI,
                message: "No RapidAPI key configured",
              }),
            ),
          onSome: (key) =>
            getJson(client, RAPIDAPI, subject, `https://${host}${path}`, {
              headers: {
                "X-RapidAPI-Key": Redacted.value(key),
                "X-RapidAPI-Host": host,
              },
            }),
        }),
      ),
    );

  return {
    id: RAPIDAPI,
    tier: "realtime",
    fetchQuote: (symbol, timeout) =>
      Effect.gen(function* () {
        const json = yield* get(
          `/market/v2/get-quotes?region=US&symbols=${encodeURIComponent(symbol)}`,
          symbol,
        );
        const now = yield* Clock.currentTimeMillis;
        return yield* decodeRapidQuote(json, symbol, now);
      }).pipe(withTimeout(RAPIDAPI, timeout)),
    searchSymbols: (query, timeout) =>
      get(`/auto-complete?region=US&q=${encodeURIComponent(query)}`, query).pipe(
        Effect.flatMap(decodeRapidAutoComplete),
        withTimeout(RAPIDAPI, timeout),
      ),
  } satisfies QuoteProvider;
});
