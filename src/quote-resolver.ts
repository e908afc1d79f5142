// Quote resolver — tries providers in priority order with retries and
// health-based skipping, falls back to the cache, and isolates failures
// per symbol.

import {
  Console,
  Context,
  Data,
  type Duration,
  Effect,
  Either,
  Layer,
  Option,
  Schedule,
  type Stream,
  SubscriptionRef,
} from "effect";
import { QuoteCache } from "./cache-store.ts";
import { Settings } from "./config.ts";
import {
  CACHE_SOURCE,
  normalizeSymbol,
  type ProviderId,
  type Quote,
  type QuoteSource,
} from "./domain.ts";
import { ProviderHealth } from "./provider-health.ts";
import {
  isRetryable,
  type ProviderErrorTag,
  type QuoteProvider,
  QuoteProviders,
} from "./quote-provider.ts";

// --- Errors ---

export class NoSymbols extends Data.TaggedError("NoSymbols")<{}> {}

export interface ProviderAttempt {
  readonly provider: ProviderId;
  /** How the provider's last attempt ended, or "Disabled" if it was skipped. */
  readonly outcome: ProviderErrorTag | "Disabled";
}

/** No provider produced a quote and nothing was cached. */
export class AllSourcesFailed extends Data.TaggedError("AllSourcesFailed")<{
  readonly symbol: string;
  readonly attempts: ReadonlyArray<ProviderAttempt>;
}> {}

// --- Types ---

export interface RefreshOptions {
  /** Per-call timeout override for every provider attempt. */
  readonly timeout?: Duration.DurationInput;
}

export type RefreshResult = ReadonlyMap<
  string,
  Either.Either<Quote, AllSourcesFailed>
>;

export interface RefreshStatus {
  readonly symbol: string;
  readonly source: QuoteSource;
  readonly timestamp: number;
}

export interface QuoteResolverService {
  /** Resolve every symbol independently; one symbol's failure never fails the batch. */
  readonly refresh: (
    symbols: ReadonlyArray<string>,
    options?: RefreshOptions,
  ) => Effect.Effect<RefreshResult, NoSymbols>;
  readonly resolve: (
    symbol: string,
    options?: RefreshOptions,
  ) => Effect.Effect<Quote, AllSourcesFailed>;
  /** Most recent successful source and time. */
  readonly lastStatus: Effect.Effect<Option.Option<RefreshStatus>>;
  readonly statusChanges: Stream.Stream<Option.Option<RefreshStatus>>;
}

export class QuoteResolver extends Context.Tag("QuoteResolver")<
  QuoteResolver,
  QuoteResolverService
>() {}

// --- Resolver ---

export const makeQuoteResolver: Effect.Effect<
  QuoteResolverService,
  never,
  QuoteProviders | ProviderHealth | QuoteCache | Settings
> = Effect.gen(function* () {
  const providers = yield* QuoteProviders;
  const health = yield* ProviderHealth;
  const cache = yield* QuoteCache;
  const settings = yield* Settings;
  const status = yield* SubscriptionRef.make(Option.none<RefreshStatus>());

  const backoff = Schedule.exponential(settings.retryBaseDelay).pipe(
    Schedule.compose(Schedule.recurs(settings.retryCount)),
  );

  const expiryFor = (provider: QuoteProvider) =>
    provider.tier === "realtime" ? settings.realtimeTtl : settings.delayedTtl;

  const publish = (symbol: string, quote: Quote) =>
    SubscriptionRef.set(
      status,
      Option.some({ symbol, source: quote.source, timestamp: quote.timestamp }),
    );

  /** One provider, retrying transient faults with exponential backoff. */
  const attempt = (
    provider: QuoteProvider,
    symbol: string,
    timeout: Duration.DurationInput,
  ) =>
    provider.fetchQuote(symbol, timeout).pipe(
      Effect.tapError((e) =>
        Console.debug(`[resolver] ${symbol}: ${provider.id} attempt failed: ${e._tag}`)
      ),
      Effect.retry({ while: isRetryable, schedule: backoff }),
    );

  const fromCache = (
    symbol: string,
    attempts: ReadonlyArray<ProviderAttempt>,
  ): Effect.Effect<Quote, AllSourcesFailed> =>
    Effect.gen(function* () {
      const entry = yield* cache.get(symbol);
      if (Option.isNone(entry)) {
        yield* Console.debug(`[resolver] ${symbol}: all sources failed, nothing cached`);
        return yield* Effect.fail(new AllSourcesFailed({ symbol, attempts }));
      }
      // Raw read: an expired entry is still served.
      const quote: Quote = {
        ...entry.value.value,
        source: CACHE_SOURCE,
        timestamp: entry.value.storedAt,
      };
      yield* Console.debug(`[resolver] ${symbol}: serving cached quote`);
      yield* publish(symbol, quote);
      return quote;
    });

  const resolveOne = (symbol: string, timeout: Duration.DurationInput) =>
    Effect.gen(function* () {
      const attempts: Array<ProviderAttempt> = [];

      for (const provider of providers) {
        const enabled = yield* health.checkAndMaybeReenable(provider.id);
        if (!enabled) {
          yield* Console.debug(`[resolver] ${symbol}: skipping ${provider.id} (disabled)`);
          attempts.push({ provider: provider.id, outcome: "Disabled" });
          continue;
        }

        yield* Console.debug(`[resolver] ${symbol}: trying ${provider.id}...`);
        const result = yield* Effect.either(attempt(provider, symbol, timeout));

        if (Either.isRight(result)) {
          const quote = result.right;
          yield* cache.set(symbol, quote, expiryFor(provider));
          yield* health.recordSuccess(provider.id);
          yield* publish(symbol, quote);
          return quote;
        }

        const error = result.left;
        attempts.push({ provider: provider.id, outcome: error._tag });
        yield* health.recordFailure(provider.id, error);
        yield* Console.debug(`[resolver] ${symbol}: ${provider.id} failed: ${error._tag}`);
      }

      return yield* fromCache(symbol, attempts);
    });

  const resolve = (symbol: string, options: RefreshOptions = {}) =>
    resolveOne(normalizeSymbol(symbol), options.timeout ?? settings.providerTimeout);

  const refresh = (
    symbols: ReadonlyArray<string>,
    options: RefreshOptions = {},
  ): Effect.Effect<RefreshResult, NoSymbols> =>
    Effect.gen(function* () {
      const unique = Array.from(
        new Set(symbols.map(normalizeSymbol).filter((s) => s.length > 0)),
      );
      if (unique.length === 0) {
        return yield* Effect.fail(new NoSymbols());
      }

      const timeout = options.timeout ?? settings.providerTimeout;
      const results = yield* Effect.forEach(
        unique,
        (symbol) =>
          resolveOne(symbol, timeout).pipe(
            Effect.either,
            Effect.map((result) => [symbol, result] as const),
          ),
        { concurrency: "unbounded" },
      );
      return new Map(results);
    });

  return {
    refresh,
    resolve,
    lastStatus: SubscriptionRef.get(status),
    statusChanges: status.changes,
  } satisfies QuoteResolverService;
});

export const QuoteResolverLive = Layer.effect(QuoteResolver, makeQuoteResolver);
