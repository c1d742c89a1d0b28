import { Context, Effect, Layer, Schema } from "effect";
import type { Session } from "./session-manager.js";
import { formatSchemaError } from "./shared.js";
import { type BskyError, CreateError, type CreateErrorKind } from "../domain/errors.js";
import { ListRef, type NewListSpec, purposeToken } from "../domain/list.js";
import { listCollection } from "../domain/primitives.js";

export const classifyCreateFailure = (error: BskyError): CreateErrorKind =>
  error.status === 400 ? "Validation" : "Transient";

const listRecord = (spec: NewListSpec, createdAt: string): Record<string, unknown> => ({
  $type: listCollection,
  name: spec.name,
  purpose: purposeToken(spec.purpose),
  ...(spec.description !== undefined && spec.description.length > 0
    ? { description: spec.description }
    : {}),
  createdAt
});

export class ListCreator extends Context.Tag("@list-migrator/ListCreator")<
  ListCreator,
  {
    /** Write one list record to the session's repository. Never retried. */
    readonly createList: (
      session: Session,
      spec: NewListSpec
    ) => Effect.Effect<ListRef, CreateError>;
  }
>() {
  static readonly layer = Layer.succeed(
    ListCreator,
    ListCreator.of({
      createList: Effect.fn("ListCreator.createList")(function* (
        session: Session,
        spec: NewListSpec
      ) {
        const createdAt = new Date().toISOString();
        const created = yield* session
          .createRecord(listCollection, listRecord(spec, createdAt))
          .pipe(
            Effect.mapError((error) =>
              CreateError.make({
                kind: classifyCreateFailure(error),
                message: `Failed to create list "${spec.name}": ${error.message}`,
                status: error.status
              })
            )
          );
        return yield* Schema.decodeUnknown(ListRef)({ uri: created.uri, cid: created.cid }).pipe(
          Effect.mapError((error) =>
            CreateError.make({
              kind: "Transient",
              message: `Unexpected list reference from service: ${formatSchemaError(error)}`
            })
          )
        );
      })
    })
  );
}
