import { Schema } from "effect";
import { Did, ListUri, RecordCid } from "./primitives.js";

export const ListPurpose = Schema.Literal("curatelist", "modlist");
export type ListPurpose = typeof ListPurpose.Type;

const purposePrefix = "app.bsky.graph.defs#";

export const purposeToken = (purpose: ListPurpose) => `${purposePrefix}${purpose}`;

export const ListName = Schema.Trim.pipe(
  Schema.minLength(1, { message: () => "List name cannot be empty" }),
  Schema.maxLength(64, { message: () => "List name must be at most 64 characters" })
);

const graphemes = new Intl.Segmenter(undefined, { granularity: "grapheme" });

/** User-perceived characters, so an emoji sequence counts once. */
export const graphemeCount = (value: string) => Array.from(graphemes.segment(value)).length;

export const ListDescription = Schema.String.pipe(
  Schema.filter((value) => graphemeCount(value) <= 300, {
    message: () => "List description must be at most 300 characters"
  })
);

export class NewListSpec extends Schema.Class<NewListSpec>("NewListSpec")({
  name: ListName,
  purpose: ListPurpose,
  description: Schema.optional(ListDescription)
}) {}

export class ListRef extends Schema.Class<ListRef>("ListRef")({
  uri: ListUri,
  cid: RecordCid
}) {}

export class ListMember extends Schema.Class<ListMember>("ListMember")({
  subject: Did,
  handle: Schema.optional(Schema.String)
}) {}

export class ListPage extends Schema.Class<ListPage>("ListPage")({
  members: Schema.Array(ListMember),
  cursor: Schema.optional(Schema.String)
}) {}

export class RecordRef extends Schema.Class<RecordRef>("RecordRef")({
  uri: Schema.String,
  cid: Schema.String
}) {}
