// Keyed values with per-entry expiry.
//
// Expired entries are not deleted on write or read: `getFresh` ignores
// them, `get` still returns them (the resolver's last resort), and a
// background sweep deletes them.

import {
  Clock,
  Console,
  Context,
  Duration,
  Effect,
  HashMap,
  Layer,
  Option,
  Ref,
} from "effect";
import { Settings } from "./config.ts";
import type { Quote, SymbolMatch } from "./domain.ts";

export interface CacheEntry<A> {
  readonly value: A;
  readonly storedAt: number; // epoch ms
  readonly expiry: number; // ms
}

export function isExpired(entry: CacheEntry<unknown>, now: number): boolean {
  return now - entry.storedAt > entry.expiry;
}

export interface CacheInfo {
  readonly entries: number;
  readonly hits: number;
  readonly misses: number;
  readonly hitRate: number;
}

export interface CacheStore<A> {
  /** The stored entry, expired or not. */
  readonly get: (key: string) => Effect.Effect<Option.Option<CacheEntry<A>>>;
  /** The stored value if it has not expired. Counts towards hit rate. */
  readonly getFresh: (key: string) => Effect.Effect<Option.Option<A>>;
  readonly set: (
    key: string,
    value: A,
    expiry: Duration.DurationInput,
  ) => Effect.Effect<void>;
  readonly remove: (key: string) => Effect.Effect<void>;
  readonly clear: Effect.Effect<void>;
  /** Delete expired entries, returning their keys. */
  readonly sweepExpired: Effect.Effect<ReadonlyArray<string>>;
  readonly info: Effect.Effect<CacheInfo>;
}

interface CacheState<A> {
  readonly entries: HashMap.HashMap<string, CacheEntry<A>>;
  readonly hits: number;
  readonly misses: number;
}

export function makeCacheStore<A>(): Effect.Effect<CacheStore<A>> {
  return Effect.gen(function* () {
    const ref = yield* Ref.make<CacheState<A>>({
      entries: HashMap.empty(),
      hits: 0,
      misses: 0,
    });

    const get = (key: string) =>
      Ref.get(ref).pipe(Effect.map((s) => HashMap.get(s.entries, key)));

    const getFresh = (key: string) =>
      Effect.gen(function* () {
        const now = yield* Clock.currentTimeMillis;
        return yield* Ref.modify(ref, (s) => {
          const fresh = HashMap.get(s.entries, key).pipe(
            Option.filter((entry) => !isExpired(entry, now)),
            Option.map((entry) => entry.value),
          );
          return [
            fresh,
            Option.isSome(fresh)
              ? { ...s, hits: s.hits + 1 }
              : { ...s, misses: s.misses + 1 },
          ] as const;
        });
      });

    const set = (key: string, value: A, expiry: Duration.DurationInput) =>
      Effect.gen(function* () {
        const storedAt = yield* Clock.currentTimeMillis;
        const entry: CacheEntry<A> = {
          value,
          storedAt,
          expiry: Duration.toMillis(Duration.decode(expiry)),
        };
        yield* Ref.update(ref, (s) => ({
          ...s,
          entries: HashMap.set(s.entries, key, entry),
        }));
      });

    const sweepExpired = Effect.gen(function* () {
      const now = yield* Clock.currentTimeMillis;
      return yield* Ref.modify(ref, (s) => {
        const expired = Array.from(HashMap.keys(s.entries)).filter((key) =>
          HashMap.get(s.entries, key).pipe(
            Option.exists((entry) => isExpired(entry, now)),
          )
        );
        return [
          expired,
          { ...s, entries: HashMap.removeMany(s.entries, expired) },
        ] as const;
      });
    });

    const info = Ref.get(ref).pipe(
      Effect.map((s): CacheInfo => {
        const total = s.hits + s.misses;
        return {
          entries: HashMap.size(s.entries),
          hits: s.hits,
          misses: s.misses,
          hitRate: total > 0 ? s.hits / total : 0,
        };
      }),
    );

    return {
      get,
      getFresh,
      set,
      remove: (key) =>
        Ref.update(ref, (s) => ({ ...s, entries: HashMap.remove(s.entries, key) })),
      clear: Ref.set(ref, { entries: HashMap.empty(), hits: 0, misses: 0 }),
      sweepExpired,
      info,
    } satisfies CacheStore<A>;
  });
}

/** Sweep `store` every `interval` for as long as the enclosing scope lives. */
export function scheduleSweep<A>(
  name: string,
  store: CacheStore<A>,
  interval: Duration.DurationInput,
) {
  return Effect.sleep(interval).pipe(
    Effect.zipRight(store.sweepExpired),
    Effect.tap((removed) =>
      removed.length > 0
        ? Console.debug(`[cache:${name}] swept ${removed.length} expired entries`)
        : Effect.void
    ),
    Effect.forever,
    Effect.forkScoped,
  );
}

// --- Services ---

export class QuoteCache extends Context.Tag("QuoteCache")<
  QuoteCache,
  CacheStore<Quote>
>() {}

export class SearchCache extends Context.Tag("SearchCache")<
  SearchCache,
  CacheStore<ReadonlyArray<SymbolMatch>>
>() {}

export const QuoteCacheLive = Layer.scoped(
  QuoteCache,
  Effect.gen(function* () {
    const { sweepInterval } = yield* Settings;
    const store = yield* makeCacheStore<Quote>();
    yield* scheduleSweep("quotes", store, sweepInterval);
    return store;
  }),
);

export const SearchCacheLive = Layer.scoped(
  SearchCache,
  Effect.gen(function* () {
    const { sweepInterval } = yield* Settings;
    const store = yield* makeCacheStore<ReadonlyArray<SymbolMatch>>();
    yield* scheduleSweep("search", store, sweepInterval);
    return store;
  }),
);
