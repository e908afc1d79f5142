import { describe, expect, it } from "vitest";
import { describeAttempt, formatFailure, formatMatches, formatQuote } from "./format.ts";
import { AllSourcesFailed } from "./quote-resolver.ts";
import type { Quote } from "./domain.ts";

// --- Test data ---

const sampleQuote: Quote = {
  symbol: "GOOGL",
  price: 190.5,
  previousClose: 188,
  change: 2.5,
  changePercent: 1.33,
  currency: "USD",
  source: "yahoo",
  timestamp: Date.parse("2024-02-09T18:00:00Z"),
};

// --- formatQuote ---

describe("formatQuote", () => {
  it("contains symbol, price and currency", () => {
    const output = formatQuote(sampleQuote);
    expect(output).toContain("GOOGL");
    expect(output).toContain("190.50 USD");
  });

  it("shows an upward indicator for a positive change", () => {
    const output = formatQuote(sampleQuote);
    expect(output).toContain("▲ +2.50 (+1.33%)");
  });

  it("shows a downward indicator for a negative change", () => {
    const output = formatQuote({ ...sampleQuote, change: -3.2, changePercent: -1.68 });
    expect(output).toContain("▼ -3.20 (-1.68%)");
  });

  it("shows zero change as +0.00", () => {
    const output = formatQuote({ ...sampleQuote, change: 0, changePercent: 0 });
    expect(output).toContain("▲ +0.00 (+0.00%)");
  });

  it("omits the change line when the provider gave no previous close", () => {
    const { symbol, price, source, timestamp } = sampleQuote;
    const output = formatQuote({ symbol, price, source, timestamp });
    expect(output).not.toContain("▲");
    expect(output).not.toContain("▼");
  });

  it("names the provider for live quotes", () => {
    expect(formatQuote(sampleQuote)).toContain("via yahoo");
  });

  it("marks cached quotes", () => {
    const output = formatQuote({ ...sampleQuote, source: "cache" });
    expect(output).toContain("cached, stored");
    expect(output).not.toContain("via ");
  });
});

// --- formatFailure ---

describe("formatFailure", () => {
  it("lists what each provider reported", () => {
    const output = formatFailure(
      new AllSourcesFailed({
        symbol: "ZZZZ",
        attempts: [
          { provider: "rapidapi", outcome: "Disabled" },
          { provider: "yahoo", outcome: "NotFound" },
        ],
      }),
    );
    expect(output).toContain("No price for ZZZZ");
    expect(output).toContain("rapidapi: skipped, cooling down; yahoo: unknown symbol");
  });

  it("says so when no providers are configured", () => {
    const output = formatFailure(new AllSourcesFailed({ symbol: "AAPL", attempts: [] }));
    expect(output).toContain("No providers are configured.");
  });

  it("describes rate limits and credential problems", () => {
    expect(describeAttempt({ provider: "a", outcome: "RateLimited" })).toBe("rate limited");
    expect(describeAttempt({ provider: "a", outcome: "AuthError" })).toBe(
      "missing or rejected API key",
    );
  });
});

// --- formatMatches ---

describe("formatMatches", () => {
  it("prints one line per match", () => {
    const output = formatMatches("apple", [
      { symbol: "AAPL", name: "Apple Inc.", exchange: "NASDAQ", source: "yahoo" },
      { symbol: "APLE", name: "Apple Hospitality REIT", source: "yahoo" },
    ]);
    const lines = output.split("\n").filter((l) => l.length > 0);
    expect(lines.length).toBe(2);
    expect(lines[0]).toContain("Apple Inc.");
    expect(lines[0]).toContain("(NASDAQ)");
    expect(lines[1]).toContain("Apple Hospitality REIT");
  });

  it("reports an empty result", () => {
    expect(formatMatches("xyzzy", [])).toContain('No matches for "xyzzy"');
  });
});
