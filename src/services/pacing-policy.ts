/**
 * Pacing Policy
 *
 * Decides how long to wait after each member write. The fixed strategy waits
 * a constant delay per outcome; the exponential strategy grows the failure
 * delay with consecutive failures, capped at the configured maximum.
 *
 * @module services/pacing-policy
 */

import { Context, Duration, Effect, Layer } from "effect";
import { MigrationSettings, type MigrationSettingsValue } from "./migration-settings.js";

export type WriteOutcome = "success" | "failure";

export interface PacingPolicyService {
  /**
   * Delay to wait after a write. `attempt` counts consecutive writes with
   * the same outcome, this one included, starting at 1.
   */
  readonly delayFor: (outcome: WriteOutcome, attempt: number) => Duration.Duration;
}

export const fixedPacing = (
  settings: Pick<MigrationSettingsValue, "successDelayMs" | "failureDelayMs">
): PacingPolicyService => ({
  delayFor: (outcome) =>
    Duration.millis(outcome === "success" ? settings.successDelayMs : settings.failureDelayMs)
});

export const exponentialPacing = (
  settings: Pick<MigrationSettingsValue, "successDelayMs" | "failureDelayMs" | "maxDelayMs">
): PacingPolicyService => ({
  delayFor: (outcome, attempt) => {
    if (outcome === "success") {
      return Duration.millis(settings.successDelayMs);
    }
    const exponent = Math.max(attempt, 1) - 1;
    const delay = settings.failureDelayMs * 2 ** exponent;
    return Duration.millis(Math.min(delay, settings.maxDelayMs));
  }
});

export class PacingPolicy extends Context.Tag("@list-migrator/PacingPolicy")<
  PacingPolicy,
  PacingPolicyService
>() {
  static readonly layer = Layer.effect(
    PacingPolicy,
    Effect.map(MigrationSettings, (settings) =>
      PacingPolicy.of(
        settings.pacing === "exponential" ? exponentialPacing(settings) : fixedPacing(settings)
      )
    )
  );
}
