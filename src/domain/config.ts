import { Schema } from "effect";

export const LogFormat = Schema.Literal("json", "human");
export type LogFormat = typeof LogFormat.Type;

export class AppConfig extends Schema.Class<AppConfig>("AppConfig")({
  service: Schema.String,
  sourceService: Schema.optional(Schema.String),
  destinationService: Schema.optional(Schema.String),
  logFormat: Schema.optional(LogFormat)
}) {}
