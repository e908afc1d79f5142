// In-process stand-in for fetch, so adapters run through the real HTTP client
// without touching the network.

import { FetchHttpClient } from "@effect/platform";
import { Layer } from "effect";

export interface FetchCall {
  readonly url: URL;
  readonly headers: Headers;
}

export interface StubResponse {
  readonly status?: number;
  readonly body: unknown;
}

/** Answer every request with `respond(url)` as a JSON body. */
export function stubFetch(respond: (url: URL) => StubResponse) {
  const calls: Array<FetchCall> = [];
  const fetch: typeof globalThis.fetch = (input, init) => {
    const url = new URL(input instanceof Request ? input.url : input);
    calls.push({ url, headers: new Headers(init?.headers) });
    const { status = 200, body } = respond(url);
    return Promise.resolve(
      new Response(JSON.stringify(body), {
        status,
        headers: { "content-type": "application/json" },
      }),
    );
  };
  return {
    calls,
    layer: Layer.merge(
      FetchHttpClient.layer,
      Layer.succeed(FetchHttpClient.Fetch, fetch),
    ),
  };
}
