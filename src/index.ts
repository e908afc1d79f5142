export * from "./domain.ts";
export * from "./quote-provider.ts";
export * from "./config.ts";
export * from "./secret-store.ts";
export * from "./cache-store.ts";
export * from "./provider-health.ts";
export * from "./quote-resolver.ts";
export * from "./symbol-search.ts";
export * from "./portfolio.ts";
export * from "./layers.ts";
export * from "./format.ts";
export { fixtureProvider, FIXTURES } from "./providers/fixtures.ts";
export { makeYahooFinanceProvider, YAHOO } from "./providers/yahoo-finance.ts";
export { ALPHA_VANTAGE, makeAlphaVantageProvider } from "./providers/alpha-vantage.ts";
export { makeRapidApiProvider, RAPIDAPI } from "./providers/rapidapi.ts";
