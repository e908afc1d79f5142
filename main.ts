import process from "node:process";
import { Cause, Console, Effect, Either, Exit } from "effect";
import { AppLive } from "./src/layers.ts";
import { formatFailure, formatMatches, formatQuote } from "./src/format.ts";
import { QuoteResolver } from "./src/quote-resolver.ts";
import { SymbolSearch } from "./src/symbol-search.ts";

// --- Commands ---
//   main.ts AAPL MSFT        quotes for each symbol
//   main.ts search <text>    symbol lookup

const USAGE = [
  "",
  "  usage: deepticker <SYMBOL>...",
  "         deepticker search <text>",
  "",
].join("\n");

const quotes = (symbols: ReadonlyArray<string>) =>
  Effect.gen(function* () {
    const resolver = yield* QuoteResolver;
    const results = yield* resolver.refresh(symbols);
    let failed = 0;
    for (const result of results.values()) {
      if (Either.isRight(result)) {
        yield* Console.log(formatQuote(result.right));
      } else {
        failed++;
        yield* Console.error(formatFailure(result.left));
      }
    }
    return failed === 0;
  }).pipe(
    Effect.catchTag("NoSymbols", () =>
      Console.error(USAGE).pipe(Effect.as(false))),
  );

const lookup = (query: string) =>
  Effect.gen(function* () {
    const { search } = yield* SymbolSearch;
    const matches = yield* search(query);
    yield* Console.log(formatMatches(query, matches));
    return matches.length > 0;
  });

// --- Run ---

const [command, ...rest] = process.argv.slice(2);
const program: Effect.Effect<boolean, never, QuoteResolver | SymbolSearch> =
  command === "search" ? lookup(rest.join(" ")) : quotes(process.argv.slice(2));

const exit = await Effect.runPromiseExit(program.pipe(Effect.provide(AppLive)));

if (Exit.isFailure(exit)) {
  // Only configuration errors get this far.
  console.error(Cause.pretty(exit.cause));
  process.exitCode = 1;
} else if (!exit.value) {
  process.exitCode = 1;
}
