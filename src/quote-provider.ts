// Quote provider — capability every upstream adapter implements, and the
// errors adapters are allowed to fail with.

import { Context, Data, type Duration, type Effect } from "effect";
import type { ProviderId, ProviderTier, Quote, SymbolMatch } from "./domain.ts";

// --- Errors ---

/** Symbol or query could not be turned into a request. */
export class InvalidRequest extends Data.TaggedError("InvalidRequest")<{
  readonly provider: ProviderId;
  readonly message: string;
}> {}

export class Timeout extends Data.TaggedError("Timeout")<{
  readonly provider: ProviderId;
  readonly message: string;
}> {}

export class RateLimited extends Data.TaggedError("RateLimited")<{
  readonly provider: ProviderId;
  readonly message: string;
}> {}

/** The provider does not know the symbol. Never retried on the same provider. */
export class NotFound extends Data.TaggedError("NotFound")<{
  readonly provider: ProviderId;
  readonly symbol: string;
}> {}

/** Payload did not parse, or carried no usable price. */
export class MalformedResponse extends Data.TaggedError("MalformedResponse")<{
  readonly provider: ProviderId;
  readonly message: string;
}> {}

/** Missing or rejected credential. Disables the provider, not just the call. */
export class AuthError extends Data.TaggedError("AuthError")<{
  readonly provider: ProviderId;
  readonly message: string;
}> {}

export type ProviderError =
  | InvalidRequest
  | Timeout
  | RateLimited
  | NotFound
  | MalformedResponse
  | AuthError;

export type ProviderErrorTag = ProviderError["_tag"];

/** Worth another attempt against the same provider. */
export function isRetryable(e: ProviderError): boolean {
  switch (e._tag) {
    case "Timeout":
    case "MalformedResponse":
      return true;
    case "InvalidRequest":
    case "RateLimited":
    case "NotFound":
    case "AuthError":
      return false;
  }
}

/** Systemic signals that take the whole provider out of rotation. */
export function isSuppressing(e: ProviderError): e is RateLimited | AuthError {
  return e._tag === "RateLimited" || e._tag === "AuthError";
}

// --- Capability ---

export interface QuoteProvider {
  readonly id: ProviderId;
  readonly tier: ProviderTier;
  readonly fetchQuote: (
    symbol: string,
    timeout: Duration.DurationInput,
  ) => Effect.Effect<Quote, ProviderError>;
  readonly searchSymbols: (
    query: string,
    timeout: Duration.DurationInput,
  ) => Effect.Effect<ReadonlyArray<SymbolMatch>, ProviderError>;
}

/** Providers in descending priority. */
export class QuoteProviders extends Context.Tag("QuoteProviders")<
  QuoteProviders,
  ReadonlyArray<QuoteProvider>
>() {}
