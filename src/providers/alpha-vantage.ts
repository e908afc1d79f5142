// Alpha Vantage — GLOBAL_QUOTE and SYMBOL_SEARCH, keyed through the secret store.

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
  InvalidRequest,
  MalformedResponse,
  NotFound,
  RateLimited,
  type QuoteProvider,
} from "../quote-provider.ts";
import { SecretStore } from "../secret-store.ts";
import { getJson, parseNumber, parsePrice, withTimeout } from "./http.ts";

export const ALPHA_VANTAGE = "alphavantage";

// --- Alpha Vantage response schemas ---

const AlphaVantageGlobalQuote = Schema.Struct({
  "01. symbol": Schema.String,
  "05. price": Schema.String,
  "07. latest trading day": Schema.optional(Schema.String),
  "08. previous close": Schema.optional(Schema.String),
  "09. change": Schema.optional(Schema.String),
  "10. change percent": Schema.optional(Schema.String),
});

type AlphaVantageGlobalQuoteType = typeof AlphaVantageGlobalQuote.Type;

const AlphaVantageSearchResponse = Schema.Struct({
  bestMatches: Schema.Array(
    Schema.Struct({
      "1. symbol": Schema.String,
      "2. name": Schema.String,
      "3. type": Schema.optional(Schema.String),
      "4. region": Schema.optional(Schema.String),
      "8. currency": Schema.optional(Schema.String),
    }),
  ),
});

type ServiceNoteError = RateLimited | AuthError | InvalidRequest;

/**
 * Alpha Vantage reports throttling, key problems and bad calls as top-level
 * string fields on a 200 response.
 */
export function interpretServiceNote(
  obj: Record<string, unknown>,
): ServiceNoteError | undefined {
  const errorMessage = obj["Error Message"];
  if (typeof errorMessage === "string") {
    return new InvalidRequest({ provider: ALPHA_VANTAGE, message: errorMessage });
  }
  for (const field of ["Note", "Information"]) {
    const note = obj[field];
    if (typeof note !== "string") continue;
    const lower = note.toLowerCase();
    if (lower.includes("api key") || lower.includes("apikey")) {
      return new AuthError({ provider: ALPHA_VANTAGE, message: note });
    }
    return new RateLimited({ provider: ALPHA_VANTAGE, message: note });
  }
  return undefined;
}

// --- Decode GLOBAL_QUOTE response into Quote ---

export function decodeAlphaVantageQuote(
  json: unknown,
  symbol: string,
  now: number,
): Effect.Effect<Quote, MalformedResponse | NotFound | ServiceNoteError> {
  if (typeof json !== "object" || json === null) {
    return Effect.fail(
      new MalformedResponse({
        provider: ALPHA_VANTAGE,
        message: "Response is not an object",
      }),
    );
  }

  const obj = json as Record<string, unknown>;

  const note = interpretServiceNote(obj);
  if (note !== undefined) return Effect.fail(note);

  const globalQuote = obj["Global Quote"];

  if (
    globalQuote === undefined ||
    typeof globalQuote !== "object" ||
    globalQuote === null ||
    Object.keys(globalQuote).length === 0
  ) {
    return Effect.fail(new NotFound({ provider: ALPHA_VANTAGE, symbol }));
  }

  return Schema.decodeUnknown(AlphaVantageGlobalQuote)(globalQuote).pipe(
    Effect.mapError(
      (e) =>
        new MalformedResponse({
          provider: ALPHA_VANTAGE,
          message: `Invalid response: ${e.message}`,
        }),
    ),
    Effect.flatMap((q) => toQuote(q, now)),
  );
}

function toQuote(
  q: AlphaVantageGlobalQuoteType,
  now: number,
): Effect.Effect<Quote, MalformedResponse> {
  const price = parsePrice(q["05. price"]);

  if (price === undefined) {
    return Effect.fail(
      new MalformedResponse({
        provider: ALPHA_VANTAGE,
        message: "Non-numeric or zero price in quote data",
      }),
    );
  }

  const tradingDay = q["07. latest trading day"];
  const marketTime = tradingDay === undefined ? Number.NaN : Date.parse(tradingDay);

  return Effect.succeed(
    withDerivedChange({
      symbol: q["01. symbol"].toUpperCase(),
      price,
      previousClose: parsePrice(q["08. previous close"]),
      change: parseNumber(q["09. change"]),
      changePercent: parseNumber(q["10. change percent"]),
      marketTime: Number.isNaN(marketTime) ? undefined : marketTime,
      source: ALPHA_VANTAGE,
      timestamp: now,
    }),
  );
}

// --- Decode SYMBOL_SEARCH response ---

export function decodeAlphaVantageSearch(
  json: unknown,
): Effect.Effect<
  ReadonlyArray<SymbolMatch>,
  MalformedResponse | ServiceNoteError
> {
  if (typeof json === "object" && json !== null) {
    const note = interpretServiceNote(json as Record<string, unknown>);
    if (note !== undefined) return Effect.fail(note);
  }

  return Schema.decodeUnknown(AlphaVantageSearchResponse)(json).pipe(
    Effect.mapError(
      (e) =>
        new MalformedResponse({
          provider: ALPHA_VANTAGE,
          message: `Invalid search response: ${e.message}`,
        }),
    ),
    Effect.map(({ bestMatches }) =>
      bestMatches.map((m) => ({
        symbol: m["1. symbol"].toUpperCase(),
        name: m["2. name"],
        type: m["3. type"],
        region: m["4. region"],
        currency: m["8. currency"],
        source: ALPHA_VANTAGE,
      }))
    ),
  );
}

// --- Alpha Vantage provider ---

export const makeAlphaVantageProvider: Effect.Effect<
  QuoteProvider,
  ConfigError.ConfigError,
  HttpClient.HttpClient | SecretStore
> = Effect.gen(function* () {
  const client = (yield* HttpClient.HttpClient).pipe(
    HttpClient.filterStatusOk,
  );
  const secrets = yield* SecretStore;
  const baseUrl = yield* Config.string("ALPHA_VANTAGE_BASE_URL").pipe(
    Config.withDefault("https://www.alphavantage.co/query"),
  );

  const apiKey = secrets.getAPIKey(ALPHA_VANTAGE).pipe(
    Effect.flatMap(
      Option.match({
        onNone: () =>
          Effect.fail(
            new AuthError({
              provider: ALPHA_VANTAGE,
              message: "No Alpha Vantage API key configured",
            }),
          ),
        onSome: (key) => Effect.succeed(Redacted.value(key)),
      }),
    ),
  );

  const query = (params: string, subject: string) =>
    Effect.flatMap(apiKey, (key) =>
      getJson(
        client,
        ALPHA_VANTAGE,
        subject,
        `${baseUrl}?${params}&apikey=${encodeURIComponent(key)}`,
      ));

  return {
    id: ALPHA_VANTAGE,
    tier: "delayed",
    fetchQuote: (symbol, timeout) =>
      Effect.gen(function* () {
        const json = yield* query(
          `function=GLOBAL_QUOTE&symbol=${encodeURIComponent(symbol)}`,
          symbol,
        );
        const now = yield* Clock.currentTimeMillis;
        return yield* decodeAlphaVantageQuote(json, symbol, now);
      }).pipe(withTimeout(ALPHA_VANTAGE, timeout)),
    searchSymbols: (keywords, timeout) =>
      query(
        `function=SYMBOL_SEARCH&keywords=${encodeURIComponent(keywords)}`,
        keywords,
      ).pipe(
        Effect.flatMap(decodeAlphaVantageSearch),
        withTimeout(ALPHA_VANTAGE, timeout),
      ),
  } satisfies QuoteProvider;
});
