// Provider health — pure state machine.
//
// States:
//   Enabled  → the provider is consulted
//   Disabled → skipped until `until`; the first check at or after `until`
//              flips it back to Enabled (lazily, no timer)
//
// Only systemic failures (rate limiting, rejected credentials) disable a
// provider. A single timeout or garbled payload does not.

import type { ProviderErrorTag } from "./quote-provider.ts";

// --- State ---

export type SuppressionReason = "RateLimited" | "AuthError";

export type Enabled = { readonly _tag: "Enabled" };
export type Disabled = {
  readonly _tag: "Disabled";
  readonly until: number;
  readonly reason: SuppressionReason;
};

export type HealthState = Enabled | Disabled;

export const Enabled: Enabled = { _tag: "Enabled" };

export const Disabled = (until: number, reason: SuppressionReason): Disabled => ({
  _tag: "Disabled",
  until,
  reason,
});

export const initialState: HealthState = Enabled;

export function suppressionReason(
  tag: ProviderErrorTag,
): SuppressionReason | undefined {
  switch (tag) {
    case "RateLimited":
    case "AuthError":
      return tag;
    case "InvalidRequest":
    case "Timeout":
    case "NotFound":
    case "MalformedResponse":
      return undefined;
  }
}

// --- Transitions ---

/** Re-enable once the cooldown has passed. */
export function reenableIfElapsed(state: HealthState, now: number): HealthState {
  switch (state._tag) {
    case "Enabled":
      return state;
    case "Disabled":
      return now >= state.until ? Enabled : state;
  }
}

/** State after a failed call of the given kind. */
export function onFailure(
  state: HealthState,
  tag: ProviderErrorTag,
  now: number,
  cooldownMs: number,
): HealthState {
  const reason = suppressionReason(tag);
  if (reason === undefined) return state;
  // A fresh systemic failure restarts the cooldown.
  return Disabled(now + cooldownMs, reason);
}

export function isEnabled(state: HealthState): boolean {
  return state._tag === "Enabled";
}
