import { Config, Context, Effect, Layer } from "effect";
import { ConfigError } from "../domain/errors.js";
import { pickDefined, validateNonNegative, validatePositive } from "./shared.js";

export type PacingStrategy = "fixed" | "exponential";
export type ExistingMemberPolicy = "duplicate" | "skip";

export type MigrationSettingsValue = {
  readonly pageSize: number;
  readonly pageDelayMs: number;
  readonly successDelayMs: number;
  readonly failureDelayMs: number;
  readonly maxDelayMs: number;
  readonly pacing: PacingStrategy;
  readonly existingMembers: ExistingMemberPolicy;
};

export type MigrationSettingsOverridesValue = Partial<MigrationSettingsValue>;

export const maxPageSize = 100;

export class MigrationSettingsOverrides extends Context.Tag(
  "@list-migrator/MigrationSettingsOverrides"
)<MigrationSettingsOverrides, MigrationSettingsOverridesValue>() {
  static readonly layer = Layer.succeed(MigrationSettingsOverrides, {});
}

export class MigrationSettings extends Context.Tag("@list-migrator/MigrationSettings")<
  MigrationSettings,
  MigrationSettingsValue
>() {
  static readonly layer = Layer.effect(
    MigrationSettings,
    Effect.gen(function* () {
      const overrides = yield* MigrationSettingsOverrides;

      const env = yield* Config.all({
        pageSize: Config.integer("LIST_MIGRATOR_PAGE_SIZE").pipe(Config.withDefault(maxPageSize)),
        pageDelayMs: Config.integer("LIST_MIGRATOR_PAGE_DELAY_MS").pipe(Config.withDefault(100)),
        successDelayMs: Config.integer("LIST_MIGRATOR_SUCCESS_DELAY_MS").pipe(
          Config.withDefault(200)
        ),
        failureDelayMs: Config.integer("LIST_MIGRATOR_FAILURE_DELAY_MS").pipe(
          Config.withDefault(1000)
        ),
        maxDelayMs: Config.integer("LIST_MIGRATOR_MAX_DELAY_MS").pipe(Config.withDefault(30_000)),
        pacing: Config.literal("fixed", "exponential")("LIST_MIGRATOR_PACING").pipe(
          Config.withDefault<PacingStrategy>("fixed")
        ),
        existingMembers: Config.literal("duplicate", "skip")(
          "LIST_MIGRATOR_EXISTING_MEMBERS"
        ).pipe(Config.withDefault<ExistingMemberPolicy>("duplicate"))
      }).pipe(
        Effect.mapError((error) =>
          ConfigError.make({ message: `Invalid migration settings: ${String(error)}`, cause: error })
        )
      );

      const merged: MigrationSettingsValue = {
        ...env,
        ...pickDefined(overrides)
      };

      const pageSizeError = validatePositive("LIST_MIGRATOR_PAGE_SIZE", merged.pageSize);
      if (pageSizeError) {
        return yield* pageSizeError;
      }
      if (merged.pageSize > maxPageSize) {
        return yield* ConfigError.make({
          message: `LIST_MIGRATOR_PAGE_SIZE must be <= ${maxPageSize}.`
        });
      }
      const delays = [
        ["LIST_MIGRATOR_PAGE_DELAY_MS", merged.pageDelayMs],
        ["LIST_MIGRATOR_SUCCESS_DELAY_MS", merged.successDelayMs],
        ["LIST_MIGRATOR_FAILURE_DELAY_MS", merged.failureDelayMs],
        ["LIST_MIGRATOR_MAX_DELAY_MS", merged.maxDelayMs]
      ] as const;
      for (const [name, value] of delays) {
        const delayError = validateNonNegative(name, value);
        if (delayError) {
          return yield* delayError;
        }
      }

      return MigrationSettings.of(merged);
    })
  );

  /** Fixed settings, bypassing environment lookup. */
  static readonly make = (overrides: MigrationSettingsOverridesValue = {}) =>
    Layer.succeed(
      MigrationSettings,
      MigrationSettings.of({
        pageSize: maxPageSize,
        pageDelayMs: 0,
        successDelayMs: 0,
        failureDelayMs: 0,
        maxDelayMs: 30_000,
        pacing: "fixed",
        existingMembers: "duplicate",
        ...pickDefined(overrides)
      })
    );
}
