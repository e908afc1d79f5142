import { describe, expect, it } from "vitest";
import { Effect, Either } from "effect";
import { classifyStatus, parseNumber, parsePrice, withTimeout } from "./http.ts";

describe("classifyStatus", () => {
  it("maps client and server statuses onto provider errors", () => {
    expect(classifyStatus("yahoo", 400, "AAPL")._tag).toBe("InvalidRequest");
    expect(classifyStatus("yahoo", 401, "AAPL")._tag).toBe("AuthError");
    expect(classifyStatus("yahoo", 403, "AAPL")._tag).toBe("AuthError");
    expect(classifyStatus("yahoo", 404, "AAPL")._tag).toBe("NotFound");
    expect(classifyStatus("yahoo", 429, "AAPL")._tag).toBe("RateLimited");
    expect(classifyStatus("yahoo", 500, "AAPL")._tag).toBe("MalformedResponse");
    expect(classifyStatus("yahoo", 503, "AAPL")._tag).toBe("MalformedResponse");
  });

  it("keeps the provider and symbol", () => {
    const error = classifyStatus("rapidapi", 404, "ZZZZ");
    expect(error).toMatchObject({ _tag: "NotFound", provider: "rapidapi", symbol: "ZZZZ" });
  });
});

describe("parsePrice", () => {
  it("accepts positive numbers and numeric strings", () => {
    expect(parsePrice(190.5)).toBe(190.5);
    expect(parsePrice(" 422.50 ")).toBe(422.5);
  });

  it("rejects zero, negatives and garbage", () => {
    expect(parsePrice(0)).toBeUndefined();
    expect(parsePrice("0.0000")).toBeUndefined();
    expect(parsePrice(-3)).toBeUndefined();
    expect(parsePrice("n/a")).toBeUndefined();
    expect(parsePrice(undefined)).toBeUndefined();
    expect(parsePrice(Number.POSITIVE_INFINITY)).toBeUndefined();
  });
});

describe("parseNumber", () => {
  it("accepts negative and zero values", () => {
    expect(parseNumber("-1.25")).toBe(-1.25);
    expect(parseNumber(0)).toBe(0);
  });

  it("strips a percent sign", () => {
    expect(parseNumber("-0.8354%")).toBe(-0.8354);
  });

  it("treats blank strings as absent", () => {
    expect(parseNumber("")).toBeUndefined();
    expect(parseNumber("  ")).toBeUndefined();
  });
});

describe("withTimeout", () => {
  it("fails with Timeout when the call outlives the duration", async () => {
    const result = await Effect.runPromise(
      Effect.either(Effect.never.pipe(withTimeout("yahoo", "10 millis"))),
    );
    expect(Either.isLeft(result) && result.left).toMatchObject({
      _tag: "Timeout",
      provider: "yahoo",
    });
  });

  it("passes fast results through", async () => {
    const result = await Effect.runPromise(Effect.succeed(42).pipe(withTimeout("yahoo", "1 second")));
    expect(result).toBe(42);
  });
});
