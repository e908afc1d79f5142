// Holdings priced through the quote resolver.

import {
  Context,
  Deferred,
  Effect,
  Either,
  Layer,
  Option,
  Ref,
} from "effect";
import {
  isFromCache,
  normalizeSymbol,
  type PortfolioHolding,
  PriceStatus,
} from "./domain.ts";
import { QuoteResolver, type RefreshResult } from "./quote-resolver.ts";

// --- Derived values ---

export function holdingValue(holding: PortfolioHolding): number {
  return (holding.currentPrice ?? 0) * holding.quantity;
}

/** Percent move since the previous close, when there is one. */
export function dailyChange(holding: PortfolioHolding): number | undefined {
  const { currentPrice, previousClose } = holding;
  if (currentPrice === undefined || previousClose === undefined || previousClose === 0) {
    return undefined;
  }
  return ((currentPrice - previousClose) / previousClose) * 100;
}

export function totalValue(holdings: ReadonlyArray<PortfolioHolding>): number {
  return holdings.reduce((sum, h) => sum + holdingValue(h), 0);
}

/** Cost basis of the holdings that have a purchase price. */
export function initialValue(holdings: ReadonlyArray<PortfolioHolding>): number {
  return holdings.reduce(
    (sum, h) => h.purchasePrice === undefined ? sum : sum + h.purchasePrice * h.quantity,
    0,
  );
}

export function earningsPercent(
  holdings: ReadonlyArray<PortfolioHolding>,
): number | undefined {
  const initial = initialValue(holdings);
  if (initial <= 0) return undefined;
  return ((totalValue(holdings) - initial) / initial) * 100;
}

export function totalDailyChange(holdings: ReadonlyArray<PortfolioHolding>): number {
  return holdings.reduce((sum, h) => {
    const { currentPrice, previousClose } = h;
    if (currentPrice === undefined || previousClose === undefined || previousClose <= 0) {
      return sum;
    }
    return sum + (currentPrice - previousClose) * h.quantity;
  }, 0);
}

// --- Applying refresh results ---

export function applyRefresh(
  holding: PortfolioHolding,
  results: RefreshResult,
): PortfolioHolding {
  const result = results.get(normalizeSymbol(holding.symbol));
  if (result === undefined) return holding;

  if (Either.isLeft(result)) {
    // Keep whatever price the holding already had.
    return {
      ...holding,
      price: PriceStatus.Failed({
        reason: `No price available for ${result.left.symbol}`,
      }),
    };
  }

  const quote = result.right;
  return {
    ...holding,
    currentPrice: quote.price,
    previousClose: quote.previousClose ?? holding.previousClose,
    lastUpdated: quote.timestamp,
    price: PriceStatus.Available({ quote, stale: isFromCache(quote) }),
  };
}

// --- Store ---

export interface NewHolding {
  readonly symbol: string;
  readonly quantity: number;
  readonly name?: string;
  readonly purchasePrice?: number;
}

export interface HoldingChanges {
  readonly quantity?: number;
  readonly purchasePrice?: number;
}

export interface PortfolioStore {
  readonly add: (holding: NewHolding) => Effect.Effect<PortfolioHolding>;
  /** Returns false when no holding has that id. */
  readonly remove: (id: string) => Effect.Effect<boolean>;
  readonly update: (
    id: string,
    changes: HoldingChanges,
  ) => Effect.Effect<Option.Option<PortfolioHolding>>;
  readonly holdings: Effect.Effect<ReadonlyArray<PortfolioHolding>>;
  /** Re-price every holding. A call made while one is running joins it. */
  readonly refreshAll: Effect.Effect<ReadonlyArray<PortfolioHolding>>;
}

export class Portfolio extends Context.Tag("Portfolio")<
  Portfolio,
  PortfolioStore
>() {}

export const makePortfolio: Effect.Effect<PortfolioStore, never, QuoteResolver> =
  Effect.gen(function* () {
    const resolver = yield* QuoteResolver;
    const ref = yield* Ref.make<ReadonlyArray<PortfolioHolding>>([]);
    const nextId = yield* Ref.make(1);
    const inFlight = yield* Ref.make(
      Option.none<Deferred.Deferred<ReadonlyArray<PortfolioHolding>>>(),
    );

    const add = (input: NewHolding) =>
      Effect.gen(function* () {
        const n = yield* Ref.getAndUpdate(nextId, (i) => i + 1);
        const holding: PortfolioHolding = {
          id: `holding-${n}`,
          symbol: normalizeSymbol(input.symbol),
          name: input.name,
          quantity: input.quantity,
          purchasePrice: input.purchasePrice,
          price: PriceStatus.Pending(),
        };
        yield* Ref.update(ref, (hs) => [...hs, holding]);
        return holding;
      });

    const remove = (id: string) =>
      Ref.modify(ref, (hs) => {
        const kept = hs.filter((h) => h.id !== id);
        return [kept.length !== hs.length, kept] as const;
      });

    const update = (id: string, changes: HoldingChanges) =>
      Ref.modify(ref, (hs) => {
        let updated = Option.none<PortfolioHolding>();
        const next = hs.map((h) => {
          if (h.id !== id) return h;
          const changed: PortfolioHolding = {
            ...h,
            quantity: changes.quantity ?? h.quantity,
            purchasePrice: changes.purchasePrice ?? h.purchasePrice,
          };
          updated = Option.some(changed);
          return changed;
        });
        return [updated, next] as const;
      });

    const runRefresh = Effect.gen(function* () {
      const symbols = (yield* Ref.get(ref)).map((h) => h.symbol);
      const results = yield* resolver.refresh(symbols).pipe(
        Effect.catchTag("NoSymbols", () => Effect.succeed<RefreshResult>(new Map())),
      );
      // Holdings may have changed while the refresh ran.
      return yield* Ref.updateAndGet(ref, (hs) => hs.map((h) => applyRefresh(h, results)));
    });

    const refreshAll = Effect.gen(function* () {
      const mine = yield* Deferred.make<ReadonlyArray<PortfolioHolding>>();
      const running = yield* Ref.modify(inFlight, (
        current,
      ): readonly [
        Option.Option<Deferred.Deferred<ReadonlyArray<PortfolioHolding>>>,
        Option.Option<Deferred.Deferred<ReadonlyArray<PortfolioHolding>>>,
      ] =>
        Option.isSome(current)
          ? [current, current] as const
          : [Option.none(), Option.some(mine)] as const
      );
      if (Option.isSome(running)) {
        return yield* Deferred.await(running.value);
      }
      return yield* runRefresh.pipe(
        Effect.onExit((exit) =>
          Deferred.done(mine, exit).pipe(
            Effect.zipRight(Ref.set(inFlight, Option.none())),
          )
        ),
      );
    });

    return {
      add,
      remove,
      update,
      holdings: Ref.get(ref),
      refreshAll,
    } satisfies PortfolioStore;
  });

export const PortfolioLive = Layer.effect(Portfolio, makePortfolio);
