// Symbol search — free-text lookup across providers, with a ticker
// validation fallback and a debounced "search as you type" front end.

import {
  Console,
  Context,
  type Duration,
  Effect,
  Either,
  type Fiber,
  FiberHandle,
  Layer,
  Option,
  type Scope,
} from "effect";
import { SearchCache } from "./cache-store.ts";
import { Settings } from "./config.ts";
import { normalizeSymbol, type SymbolMatch } from "./domain.ts";
import { ProviderHealth } from "./provider-health.ts";
import { QuoteProviders } from "./quote-provider.ts";

const TICKER_PATTERN = /^[A-Za-z0-9.:-]{1,10}$/;

/** Short enough and plain enough to be tried as a symbol directly. */
export function looksLikeTicker(query: string): boolean {
  return TICKER_PATTERN.test(query.trim());
}

export function searchKey(query: string): string {
  return query.trim().toLowerCase();
}

export interface SearchOptions {
  readonly timeout?: Duration.DurationInput;
  readonly limit?: number;
}

export interface SymbolSearchService {
  /** Never fails: provider errors are absorbed and an empty list means no match. */
  readonly search: (
    query: string,
    options?: SearchOptions,
  ) => Effect.Effect<ReadonlyArray<SymbolMatch>>;
}

export class SymbolSearch extends Context.Tag("SymbolSearch")<
  SymbolSearch,
  SymbolSearchService
>() {}

export const makeSymbolSearch: Effect.Effect<
  SymbolSearchService,
  never,
  QuoteProviders | ProviderHealth | SearchCache | Settings
> = Effect.gen(function* () {
  const providers = yield* QuoteProviders;
  const health = yield* ProviderHealth;
  const cache = yield* SearchCache;
  const settings = yield* Settings;

  const byName = (query: string, timeout: Duration.DurationInput) =>
    Effect.gen(function* () {
      for (const provider of providers) {
        if (!(yield* health.checkAndMaybeReenable(provider.id))) continue;

        const result = yield* Effect.either(provider.searchSymbols(query, timeout));
        if (Either.isLeft(result)) {
          yield* health.recordFailure(provider.id, result.left);
          yield* Console.debug(`[search] "${query}": ${provider.id} failed: ${result.left._tag}`);
          continue;
        }
        if (result.right.length > 0) {
          yield* Console.debug(
            `[search] "${query}": ${result.right.length} matches from ${provider.id}`,
          );
          return Option.some(result.right);
        }
      }
      return Option.none<ReadonlyArray<SymbolMatch>>();
    });

  // Confirms a ticker-shaped query by fetching a quote for it.
  const byTicker = (query: string, timeout: Duration.DurationInput) =>
    Effect.gen(function* () {
      const symbol = normalizeSymbol(query);
      for (const provider of providers) {
        if (!(yield* health.checkAndMaybeReenable(provider.id))) continue;

        const result = yield* Effect.either(provider.fetchQuote(symbol, timeout));
        if (Either.isRight(result)) {
          yield* Console.debug(`[search] "${query}": confirmed as ticker by ${provider.id}`);
          const match: SymbolMatch = { symbol, name: symbol, source: provider.id };
          return [match];
        }
        yield* health.recordFailure(provider.id, result.left);
      }
      return [];
    });

  const search = (query: string, options: SearchOptions = {}) =>
    Effect.gen(function* () {
      const key = searchKey(query);
      if (key.length === 0) return [];

      const timeout = options.timeout ?? settings.providerTimeout;
      const limit = options.limit ?? settings.searchResultLimit;

      // The cache holds a provider's whole list; the limit applies per call.
      const cached = yield* cache.getFresh(key);
      if (Option.isSome(cached)) {
        yield* Console.debug(`[search] "${query}": cache hit`);
        return cached.value.slice(0, limit);
      }

      const found = yield* byName(query.trim(), timeout);
      if (Option.isSome(found)) {
        yield* cache.set(key, found.value, settings.searchTtl);
        return found.value.slice(0, limit);
      }

      if (looksLikeTicker(query)) {
        return yield* byTicker(query, timeout);
      }
      yield* Console.debug(`[search] "${query}": no matches`);
      return [];
    });

  return { search } satisfies SymbolSearchService;
});

export const SymbolSearchLive = Layer.effect(SymbolSearch, makeSymbolSearch);

// --- Live search ---

export interface LiveSearch {
  /** Start a debounced search, interrupting whichever one was pending. */
  readonly submit: (
    query: string,
  ) => Effect.Effect<Fiber.RuntimeFiber<ReadonlyArray<SymbolMatch>>>;
}

export const makeLiveSearch = (
  delay?: Duration.DurationInput,
): Effect.Effect<LiveSearch, never, SymbolSearch | Settings | Scope.Scope> =>
  Effect.gen(function* () {
    const { search } = yield* SymbolSearch;
    const settings = yield* Settings;
    const wait = delay ?? settings.searchDebounce;
    const handle = yield* FiberHandle.make<ReadonlyArray<SymbolMatch>>();

    return {
      submit: (query) =>
        FiberHandle.run(handle, Effect.sleep(wait).pipe(Effect.zipRight(search(query)))),
    };
  });
