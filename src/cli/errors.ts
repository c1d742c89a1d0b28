import { Schema } from "effect";

/** Invalid command line input, detected after option parsing. */
export class CliInputError extends Schema.TaggedError<CliInputError>()(
  "CliInputError",
  {
    message: Schema.String,
    cause: Schema.optional(Schema.Defect)
  }
) {}
