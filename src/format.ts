// Pure formatting functions — no I/O.

import { isFromCache, type Quote, type SymbolMatch } from "./domain.ts";
import type { AllSourcesFailed, ProviderAttempt } from "./quote-resolver.ts";

// --- ANSI escape codes ---

const GREEN = "\x1b[32m";
const RED = "\x1b[31m";
const YELLOW = "\x1b[33m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

// --- Quote formatting ---

function formatChange(change: number, changePercent: number | undefined): string {
  const direction = change >= 0 ? "▲" : "▼";
  const color = change >= 0 ? GREEN : RED;
  const sign = change >= 0 ? "+" : "";
  const percent = changePercent === undefined
    ? ""
    : ` (${sign}${changePercent.toFixed(2)}%)`;
  return `  ${color}${direction} ${sign}${change.toFixed(2)}${percent}${RESET}`;
}

export function formatQuote(quote: Quote): string {
  const currency = quote.currency === undefined ? "" : ` ${quote.currency}`;
  const origin = isFromCache(quote)
    ? `${YELLOW}cached, stored ${new Date(quote.timestamp).toLocaleString()}${RESET}`
    : `${DIM}via ${quote.source}, ${new Date(quote.timestamp).toLocaleString()}${RESET}`;

  const lines = [
    "",
    `${BOLD}  ${quote.symbol}${RESET}`,
    `  ${BOLD}${quote.price.toFixed(2)}${currency}${RESET}`,
    ...(quote.change === undefined
      ? []
      : [formatChange(quote.change, quote.changePercent)]),
    `  ${origin}`,
    "",
  ];

  return lines.join("\n");
}

// --- Failure formatting ---

export function describeAttempt(attempt: ProviderAttempt): string {
  switch (attempt.outcome) {
    case "Disabled":
      return "skipped, cooling down";
    case "InvalidRequest":
      return "rejected the request";
    case "Timeout":
      return "timed out";
    case "RateLimited":
      return "rate limited";
    case "NotFound":
      return "unknown symbol";
    case "MalformedResponse":
      return "unexpected response";
    case "AuthError":
      return "missing or rejected API key";
  }
}

export function formatFailure(error: AllSourcesFailed): string {
  const hint = error.attempts.length === 0
    ? "No providers are configured."
    : error.attempts
      .map((a) => `${a.provider}: ${describeAttempt(a)}`)
      .join("; ");
  return [
    "",
    `${RED}${BOLD}  ✗ No price for ${error.symbol}${RESET}`,
    `  ${DIM}${hint}${RESET}`,
    "",
  ].join("\n");
}

// --- Search formatting ---

export function formatMatch(match: SymbolMatch): string {
  const exchange = match.exchange === undefined ? "" : ` ${DIM}(${match.exchange})${RESET}`;
  return `  ${BOLD}${match.symbol.padEnd(8)}${RESET} ${match.name}${exchange}`;
}

export function formatMatches(
  query: string,
  matches: ReadonlyArray<SymbolMatch>,
): string {
  if (matches.length === 0) {
    return `\n  ${DIM}No matches for "${query}"${RESET}\n`;
  }
  return ["", ...matches.map(formatMatch), ""].join("\n");
}
