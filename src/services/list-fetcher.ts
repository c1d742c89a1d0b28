import { Chunk, Context, Duration, Effect, Layer, Option, Schema, Stream } from "effect";
import type { Session } from "./session-manager.js";
import { MigrationSettings } from "./migration-settings.js";
import { formatSchemaError } from "./shared.js";
import { type BskyError, FetchError, type FetchErrorKind } from "../domain/errors.js";
import type { ListMember } from "../domain/list.js";
import { ListUri } from "../domain/primitives.js";

const notFoundErrors = new Set(["NotFound", "ListNotFound", "RecordNotFound"]);

export const classifyFetchFailure = (error: BskyError): FetchErrorKind => {
  if (error.status === 404 || (error.error !== undefined && notFoundErrors.has(error.error))) {
    return "NotFound";
  }
  if (error.status === 400 || error.error === "InvalidRequest") {
    return "InvalidRef";
  }
  return "Transient";
};

/** Validate a list reference before any network call. */
export const decodeListUri = (list: string) =>
  Schema.decodeUnknown(ListUri)(list).pipe(
    Effect.mapError((error) =>
      FetchError.make({
        kind: "InvalidRef",
        list,
        message: `Invalid list reference: ${formatSchemaError(error)}`
      })
    )
  );

type PageState = {
  readonly cursor: string | undefined;
  readonly first: boolean;
};

export class ListFetcher extends Context.Tag("@list-migrator/ListFetcher")<
  ListFetcher,
  {
    /**
     * Lazily page through a list's members in server order. Each run starts
     * from the first page; a failure on any page fails the stream.
     */
    readonly fetchAllMembers: (
      session: Session,
      list: string
    ) => Stream.Stream<ListMember, FetchError>;
    /** Every member of the list, or a failure with nothing partial. */
    readonly fetchMembers: (
      session: Session,
      list: string
    ) => Effect.Effect<ReadonlyArray<ListMember>, FetchError>;
  }
>() {
  static readonly layer = Layer.effect(
    ListFetcher,
    Effect.gen(function* () {
      const settings = yield* MigrationSettings;
      const pageDelay = Duration.millis(settings.pageDelayMs);

      const fetchAllMembers = (session: Session, list: string) =>
        Stream.unwrap(
          Effect.map(decodeListUri(list), (uri) =>
            Stream.paginateChunkEffect<PageState, ListMember, FetchError, never>(
              { cursor: undefined, first: true },
              (state) =>
                Effect.gen(function* () {
                  if (!state.first) {
                    yield* Effect.sleep(pageDelay);
                  }
                  const page = yield* session
                    .getListPage(uri, { limit: settings.pageSize, cursor: state.cursor })
                    .pipe(
                      Effect.mapError((error) =>
                        FetchError.make({
                          kind: classifyFetchFailure(error),
                          list,
                          message: error.message,
                          status: error.status
                        })
                      )
                    );
                  const hasNext =
                    page.members.length > 0 &&
                    page.cursor !== undefined &&
                    page.cursor.length > 0 &&
                    page.cursor !== state.cursor;
                  return [
                    Chunk.fromIterable(page.members),
                    hasNext
                      ? Option.some<PageState>({ cursor: page.cursor, first: false })
                      : Option.none<PageState>()
                  ] as const;
                })
            )
          )
        );

      const fetchMembers = Effect.fn("ListFetcher.fetchMembers")(
        (session: Session, list: string) =>
          fetchAllMembers(session, list).pipe(
            Stream.runCollect,
            Effect.map(Chunk.toReadonlyArray)
          )
      );

      return ListFetcher.of({ fetchAllMembers, fetchMembers });
    })
  );
}
