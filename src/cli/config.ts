import { Options } from "@effect/cli";
import { Option, Redacted } from "effect";
import type { AppConfig, LogFormat } from "../domain/config.js";
import type { RoleCredentialsOverride } from "../services/credential-resolver.js";
import { pickDefined } from "../services/shared.js";

/** Options accepted before any subcommand. */
export const configOptions = {
  service: Options.text("service").pipe(
    Options.optional,
    Options.withDescription("Bluesky service URL for both accounts (default: https://bsky.social)")
  ),
  logFormat: Options.choice("log-format", ["json", "human"]).pipe(
    Options.optional,
    Options.withDescription("Log line format on stderr (default: human on a TTY, json otherwise)")
  )
};

export type ConfigOptions = {
  readonly service: Option.Option<string>;
  readonly logFormat: Option.Option<LogFormat>;
};

export const toConfigOverrides = (options: ConfigOptions): Partial<AppConfig> =>
  pickDefined({
    service: Option.getOrUndefined(options.service),
    logFormat: Option.getOrUndefined(options.logFormat)
  });

export const toRoleCredentials = (
  identifier: Option.Option<string>,
  password: Option.Option<Redacted.Redacted<string>>
): RoleCredentialsOverride =>
  pickDefined({
    identifier: Option.getOrUndefined(identifier),
    password: Option.getOrUndefined(password)
  });
