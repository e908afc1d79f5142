// Provider health tracker — Effect shell.
//
// Wires the pure state machine (provider-health-state.ts) to Ref and Clock.
// One Ref holds every provider's entry, so concurrent resolutions update it
// atomically.

import {
  Clock,
  Console,
  Context,
  Duration,
  Effect,
  HashMap,
  Layer,
  Option,
  Ref,
} from "effect";
import { Settings } from "./config.ts";
import type { ProviderId } from "./domain.ts";
import {
  type HealthState,
  initialState,
  isEnabled,
  onFailure,
  reenableIfElapsed,
} from "./provider-health-state.ts";
import type { ProviderError } from "./quote-provider.ts";

export type { HealthState } from "./provider-health-state.ts";

export interface ProviderHealthSnapshot {
  readonly state: HealthState;
  /** Rate-limit and credential failures recorded so far. */
  readonly failures: number;
  readonly lastSuccessAt: Option.Option<number>;
}

const emptySnapshot: ProviderHealthSnapshot = {
  state: initialState,
  failures: 0,
  lastSuccessAt: Option.none(),
};

export interface HealthTracker {
  /** Current state, without the lazy re-enable check. */
  readonly isEnabled: (provider: ProviderId) => Effect.Effect<boolean>;
  /** Flip a disabled provider back once its cooldown passed; report whether it is enabled. */
  readonly checkAndMaybeReenable: (provider: ProviderId) => Effect.Effect<boolean>;
  readonly recordFailure: (
    provider: ProviderId,
    error: ProviderError,
  ) => Effect.Effect<void>;
  readonly recordSuccess: (provider: ProviderId) => Effect.Effect<void>;
  readonly snapshot: (provider: ProviderId) => Effect.Effect<ProviderHealthSnapshot>;
}

export class ProviderHealth extends Context.Tag("ProviderHealth")<
  ProviderHealth,
  HealthTracker
>() {}

export interface HealthTrackerConfig {
  readonly cooldown: Duration.DurationInput;
}

export function makeHealthTracker(
  config: HealthTrackerConfig,
): Effect.Effect<HealthTracker> {
  return Effect.gen(function* () {
    const cooldownMs = Duration.toMillis(Duration.decode(config.cooldown));
    const ref = yield* Ref.make(HashMap.empty<ProviderId, ProviderHealthSnapshot>());

    const current = (provider: ProviderId) =>
      Ref.get(ref).pipe(
        Effect.map((m) => Option.getOrElse(HashMap.get(m, provider), () => emptySnapshot)),
      );

    const update = <B>(
      provider: ProviderId,
      f: (s: ProviderHealthSnapshot) => readonly [B, ProviderHealthSnapshot],
    ): Effect.Effect<B> =>
      Ref.modify(ref, (m) => {
        const prev = Option.getOrElse(HashMap.get(m, provider), () => emptySnapshot);
        const [out, next] = f(prev);
        return [out, HashMap.set(m, provider, next)] as const;
      });

    const checkAndMaybeReenable = (provider: ProviderId) =>
      Effect.gen(function* () {
        const now = yield* Clock.currentTimeMillis;
        const [enabled, reenabled] = yield* update(provider, (s) => {
          const state = reenableIfElapsed(s.state, now);
          const flipped = state !== s.state;
          return [[isEnabled(state), flipped] as const, { ...s, state }] as const;
        });
        if (reenabled) {
          yield* Console.debug(`[health:${provider}] cooldown elapsed — re-enabled`);
        }
        return enabled;
      });

    const recordFailure = (provider: ProviderId, error: ProviderError) =>
      Effect.gen(function* () {
        const now = yield* Clock.currentTimeMillis;
        const changed = yield* update(provider, (s) => {
          const state = onFailure(s.state, error._tag, now, cooldownMs);
          if (state === s.state) return [Option.none<HealthState>(), s] as const;
          return [
            Option.some(state),
            { ...s, state, failures: s.failures + 1 },
          ] as const;
        });
        if (Option.isSome(changed) && changed.value._tag === "Disabled") {
          yield* Console.debug(
            `[health:${provider}] ${error._tag} — disabled until ${new Date(changed.value.until).toISOString()}`,
          );
        }
      });

    const recordSuccess = (provider: ProviderId) =>
      Effect.gen(function* () {
        const now = yield* Clock.currentTimeMillis;
        yield* update(provider, (s) =>
          [undefined, { ...s, lastSuccessAt: Option.some(now) }] as const
        );
      });

    return {
      isEnabled: (provider) =>
        current(provider).pipe(Effect.map((s) => isEnabled(s.state))),
      checkAndMaybeReenable,
      recordFailure,
      recordSuccess,
      snapshot: current,
    } satisfies HealthTracker;
  });
}

export const ProviderHealthLive = Layer.effect(
  ProviderHealth,
  Effect.flatMap(Settings, (s) =>
    makeHealthTracker({ cooldown: s.providerCooldown })),
);
