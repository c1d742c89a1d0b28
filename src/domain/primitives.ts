import { Schema } from "effect";

const didPattern = /^did:[a-z]+:[a-zA-Z0-9._:%-]*[a-zA-Z0-9._-]$/;

export const Did = Schema.String.pipe(
  Schema.pattern(didPattern),
  Schema.brand("Did")
);
export type Did = typeof Did.Type;

/** A handle or a DID, as accepted by createSession. */
export const ActorId = Schema.String.pipe(
  Schema.transform(Schema.String, {
    strict: true,
    decode: (s) => {
      const trimmed = s.trim().replace(/^@/, "");
      return /^did:/i.test(trimmed) ? trimmed : trimmed.toLowerCase();
    },
    encode: (s) => s
  }),
  Schema.pattern(/^(did:\S+|[a-z0-9][a-z0-9.-]{1,251})$/i),
  Schema.brand("ActorId")
);
export type ActorId = typeof ActorId.Type;

// at://<did>/<nsid>/<record-key>
const listUriPattern =
  /^at:\/\/(did:[a-z]+:[a-zA-Z0-9._:%-]*[a-zA-Z0-9._-])\/([a-zA-Z][a-zA-Z0-9-]*(?:\.[a-zA-Z0-9-]+){2,})\/([a-zA-Z0-9._~:-]{1,512})$/;

export const ListUri = Schema.String.pipe(
  Schema.pattern(listUriPattern, {
    message: () => "Expected an AT URI of the form at://<did>/<collection>/<record-key>"
  }),
  Schema.filter((value) => {
    const rkey = value.slice(value.lastIndexOf("/") + 1);
    return rkey !== "." && rkey !== ".." ? true : "Record key cannot be . or ..";
  }),
  Schema.brand("ListUri")
);
export type ListUri = typeof ListUri.Type;

export const RecordCid = Schema.String.pipe(Schema.brand("RecordCid"));
export type RecordCid = typeof RecordCid.Type;

export const listCollection = "app.bsky.graph.list";
export const listItemCollection = "app.bsky.graph.listitem";

const webListUrlPattern =
  /^https?:\/\/(?:www\.)?bsky\.app\/profile\/(did:[a-z]+:[a-zA-Z0-9._:%-]+)\/lists\/([a-zA-Z0-9._~:-]+)\/?(?:[?#].*)?$/;

/**
 * Accepts either an AT URI or the list's bsky.app web address (when the
 * profile segment is a DID) and returns the AT URI string to validate.
 */
export const normalizeListReference = (input: string) => {
  const trimmed = input.trim();
  const match = webListUrlPattern.exec(trimmed);
  if (match) {
    return `at://${match[1]}/${listCollection}/${match[2]}`;
  }
  return trimmed;
};
