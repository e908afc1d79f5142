// HTTP plumbing shared by the adapters: status classification, transport
// error mapping and per-call timeouts.

import type { HttpClient, HttpClientError } from "@effect/platform";
import { type Duration, Effect } from "effect";
import type { ProviderId } from "../domain.ts";
import {
  AuthError,
  InvalidRequest,
  MalformedResponse,
  NotFound,
  RateLimited,
  Timeout,
  type ProviderError,
} from "../quote-provider.ts";

/** Map a non-2xx status onto the provider error taxonomy. */
export function classifyStatus(
  provider: ProviderId,
  status: number,
  symbol: string,
): ProviderError {
  if (status === 400) {
    return new InvalidRequest({ provider, message: `HTTP 400 for ${symbol}` });
  }
  if (status === 401 || status === 403) {
    return new AuthError({ provider, message: `HTTP ${status}` });
  }
  if (status === 404) {
    return new NotFound({ provider, symbol });
  }
  if (status === 429) {
    return new RateLimited({ provider, message: "HTTP 429" });
  }
  return new MalformedResponse({ provider, message: `HTTP ${status}` });
}

export function fromHttpClientError(
  provider: ProviderId,
  symbol: string,
  e: HttpClientError.HttpClientError,
): ProviderError {
  switch (e._tag) {
    case "RequestError":
      // Transport faults are retried like garbled bodies.
      return e.reason === "Transport"
        ? new MalformedResponse({ provider, message: e.message })
        : new InvalidRequest({ provider, message: e.message });
    case "ResponseError":
      return e.reason === "StatusCode"
        ? classifyStatus(provider, e.response.status, symbol)
        : new MalformedResponse({
            provider,
            message: `JSON parse failed: ${e.message}`,
          });
  }
}

export interface GetJsonOptions {
  readonly headers?: Record<string, string>;
}

/** GET `url` and parse the body as JSON, failing with a ProviderError. */
export function getJson(
  client: HttpClient.HttpClient,
  provider: ProviderId,
  symbol: string,
  url: string,
  options: GetJsonOptions = {},
): Effect.Effect<unknown, ProviderError> {
  return client.get(url, { headers: options.headers ?? {} }).pipe(
    Effect.flatMap((response) => response.json),
    // The response body is bound to the request's scope.
    Effect.scoped,
    Effect.catchTags({
      RequestError: (e) => Effect.fail(fromHttpClientError(provider, symbol, e)),
      ResponseError: (e) =>
        Effect.fail(fromHttpClientError(provider, symbol, e)),
    }),
  );
}

export function withTimeout(
  provider: ProviderId,
  timeout: Duration.DurationInput,
) {
  return <A, E>(
    effect: Effect.Effect<A, E>,
  ): Effect.Effect<A, E | Timeout> =>
    effect.pipe(
      Effect.timeoutFail({
        duration: timeout,
        onTimeout: () =>
          new Timeout({ provider, message: `${provider}: request timed out` }),
      }),
    );
}

/**
 * Read a price-like field that may arrive as a number or a numeric string.
 * Zero, negative and unparseable values are "no usable price".
 */
export function parsePrice(value: unknown): number | undefined {
  const n = typeof value === "string"
    ? Number(value.trim())
    : typeof value === "number"
      ? value
      : Number.NaN;
  return Number.isFinite(n) && n > 0 ? n : undefined;
}

/** Like parsePrice, but zero and negative numbers are legitimate (changes). */
export function parseNumber(value: unknown): number | undefined {
  const raw = typeof value === "string" ? value.trim().replace("%", "") : value;
  if (raw === "") return undefined;
  const n = typeof raw === "string"
    ? Number(raw)
    : typeof raw === "number"
      ? raw
      : Number.NaN;
  return Number.isFinite(n) ? n : undefined;
}
