// Fixtures — an in-process provider over a small fixed table, for offline
// runs (QUOTE_PROVIDERS=fixtures) and development.

import { Clock, Effect } from "effect";
import { normalizeSymbol, withDerivedChange } from "../domain.ts";
import type { Quote, SymbolMatch } from "../domain.ts";
import { NotFound, type QuoteProvider } from "../quote-provider.ts";

export const FIXTURES = "fixtures";

interface FixtureRow {
  readonly name: string;
  readonly exchange: string;
  readonly price: number;
  readonly previousClose: number;
}

const rows: Record<string, FixtureRow> = {
  AAPL: { name: "Apple Inc.", exchange: "NASDAQ", price: 225.3, previousClose: 221.85 },
  MSFT: { name: "Microsoft Corporation", exchange: "NASDAQ", price: 441.2, previousClose: 444.6 },
  GOOGL: { name: "Alphabet Inc.", exchange: "NASDAQ", price: 190.5, previousClose: 192.6 },
  TSLA: { name: "Tesla, Inc.", exchange: "NASDAQ", price: 385.2, previousClose: 372.6 },
};

function lookup(symbol: string): FixtureRow | undefined {
  return Object.hasOwn(rows, symbol) ? rows[symbol] : undefined;
}

export const fixtureProvider: QuoteProvider = {
  id: FIXTURES,
  tier: "delayed",
  fetchQuote: (symbol) =>
    Effect.gen(function* () {
      const wanted = normalizeSymbol(symbol);
      const row = lookup(wanted);
      if (row === undefined) {
        return yield* Effect.fail(new NotFound({ provider: FIXTURES, symbol }));
      }
      const now = yield* Clock.currentTimeMillis;
      const quote: Quote = {
        symbol: wanted,
        price: row.price,
        previousClose: row.previousClose,
        currency: "USD",
        source: FIXTURES,
        timestamp: now,
      };
      return withDerivedChange(quote);
    }),
  searchSymbols: (query) => {
    const needle = query.trim().toLowerCase();
    const matches = Object.entries(rows)
      .filter(([symbol, row]) =>
        symbol.toLowerCase().startsWith(needle) ||
        row.name.toLowerCase().includes(needle)
      )
      .map(([symbol, row]): SymbolMatch => ({
        symbol,
        name: row.name,
        exchange: row.exchange,
        currency: "USD",
        source: FIXTURES,
      }));
    return Effect.succeed(matches);
  },
};
