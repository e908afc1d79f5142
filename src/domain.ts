// Pure domain types — no framework dependency, no I/O.

import { Data } from "effect";

export type ProviderId = string;

/** Marks a quote served from the local cache instead of a provider. */
export const CACHE_SOURCE = "cache";

export type QuoteSource = ProviderId | typeof CACHE_SOURCE;

/** Faster feeds get shorter cache expiry than delayed ones. */
export type ProviderTier = "realtime" | "delayed";

export interface Quote {
  readonly symbol: string;
  readonly price: number;
  readonly previousClose?: number;
  readonly change?: number;
  readonly changePercent?: number;
  readonly currency?: string;
  readonly marketTime?: number; // epoch ms, as reported upstream
  readonly source: QuoteSource;
  readonly timestamp: number; // epoch ms, when obtained or cached
}

export interface SymbolMatch {
  readonly symbol: string;
  readonly name: string;
  readonly exchange?: string;
  readonly type?: string;
  readonly region?: string;
  readonly currency?: string;
  readonly source: ProviderId;
}

export function normalizeSymbol(symbol: string): string {
  return symbol.trim().toUpperCase();
}

export function isFromCache(quote: Quote): boolean {
  return quote.source === CACHE_SOURCE;
}

/** Fills in change fields from previousClose when the provider left them out. */
export function withDerivedChange(quote: Quote): Quote {
  const { previousClose } = quote;
  if (previousClose === undefined || previousClose === 0) return quote;
  const change = quote.change ?? quote.price - previousClose;
  const changePercent = quote.changePercent ?? (change / previousClose) * 100;
  return { ...quote, change, changePercent };
}

// --- Price status ---
// Pending until the first refresh, then Failed or Available.

export type PriceStatus = Data.TaggedEnum<{
  Pending: {};
  Failed: { readonly reason: string };
  Available: { readonly quote: Quote; readonly stale: boolean };
}>;

export const PriceStatus = Data.taggedEnum<PriceStatus>();

// --- Portfolio ---

export interface PortfolioHolding {
  readonly id: string;
  readonly symbol: string;
  readonly name?: string;
  readonly quantity: number;
  readonly purchasePrice?: number;
  readonly currentPrice?: number;
  readonly previousClose?: number;
  readonly lastUpdated?: number;
  readonly price: PriceStatus;
}
