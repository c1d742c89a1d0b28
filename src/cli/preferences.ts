import { Context } from "effect";
import type { LogFormat } from "../domain/config.js";

export type CliPreferencesValue = {
  readonly logFormat?: LogFormat;
};

export class CliPreferences extends Context.Tag("@list-migrator/CliPreferences")<
  CliPreferences,
  CliPreferencesValue
>() {}
