import { Effect, Option } from "effect";

export const jsonNdjsonTableFormats = ["json", "ndjson", "table"] as const;
export type JsonNdjsonTableFormat = typeof jsonNdjsonTableFormats[number];

export const emitWithFormat = <T extends string, E, R>(
  format: Option.Option<T>,
  fallback: T,
  handlers: { readonly [K in T]: Effect.Effect<unknown, E, R> }
): Effect.Effect<unknown, E, R> => handlers[Option.getOrElse(format, () => fallback)];
