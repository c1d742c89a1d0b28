/**
 * List Migrator
 *
 * Runs the copy pipeline strictly in order: authenticate the source account,
 * fetch every member of the source list, authenticate the destination
 * account, create the new list, then replicate the members into it.
 *
 * `events` is the pipeline itself, as an ordered stream of MigrationEvents.
 * `run` drains that stream and returns the final result. Setup failures
 * (auth, fetch, create) fail the stream before any member is written.
 *
 * @module services/list-migrator
 */

import { Context, Effect, Layer, Option, Ref, Stream } from "effect";
import { ListCreator } from "./list-creator.js";
import { ListFetcher } from "./list-fetcher.js";
import { MemberReplicator } from "./member-replicator.js";
import { type Session, SessionManager } from "./session-manager.js";
import type { MigrationError } from "../domain/errors.js";
import type { ListMember, ListRef } from "../domain/list.js";
import {
  emptyTally,
  MigrationCompleted,
  type MigrationEvent,
  type MigrationPhase,
  type MigrationRequest,
  type MigrationResult,
  PhaseCompleted,
  PhaseStarted,
  resultFromTally,
  tallyMember
} from "../domain/migration.js";

/**
 * Emit PhaseStarted, run the phase, emit PhaseCompleted, then continue with
 * the stages that need the phase's value.
 */
const phase = <A, E, E2>(
  name: MigrationPhase,
  effect: Effect.Effect<A, E>,
  detail: (value: A) => Record<string, unknown>,
  next: (value: A) => Stream.Stream<MigrationEvent, E2>
): Stream.Stream<MigrationEvent, E | E2> =>
  Stream.concat(
    Stream.make(PhaseStarted.make({ phase: name })),
    Stream.fromEffect(effect).pipe(
      Stream.flatMap((value) =>
        Stream.concat(
          Stream.make(PhaseCompleted.make({ phase: name, detail: detail(value) })),
          next(value)
        )
      )
    )
  );

export class ListMigrator extends Context.Tag("@list-migrator/ListMigrator")<
  ListMigrator,
  {
    readonly events: (request: MigrationRequest) => Stream.Stream<MigrationEvent, MigrationError>;
    readonly run: (
      request: MigrationRequest,
      onEvent?: (event: MigrationEvent) => Effect.Effect<void>
    ) => Effect.Effect<MigrationResult, MigrationError>;
  }
>() {
  static readonly layer = Layer.effect(
    ListMigrator,
    Effect.gen(function* () {
      const sessions = yield* SessionManager;
      const fetcher = yield* ListFetcher;
      const creator = yield* ListCreator;
      const replicator = yield* MemberReplicator;

      const replicateStage = (
        destination: Session,
        list: ListRef,
        members: ReadonlyArray<ListMember>
      ): Stream.Stream<MigrationEvent> =>
        Stream.unwrap(
          Effect.map(Ref.make(emptyTally), (tally) => {
            const processed = replicator
              .replicate(destination, list, members)
              .pipe(Stream.tap((event) => Ref.update(tally, (t) => tallyMember(t, event))));
            const completed = Stream.fromEffect(Ref.get(tally)).pipe(
              Stream.flatMap((final) => {
                const result = resultFromTally(list, members.length, final);
                return Stream.make(
                  PhaseCompleted.make({
                    phase: "replicate-members",
                    detail: {
                      added: result.membersAdded,
                      failed: result.membersFailed,
                      skipped: result.membersSkipped
                    }
                  }),
                  MigrationCompleted.make({ result })
                );
              })
            );
            return Stream.make(PhaseStarted.make({ phase: "replicate-members" })).pipe(
              Stream.concat(processed),
              Stream.concat(completed)
            );
          })
        );

      const events = (request: MigrationRequest): Stream.Stream<MigrationEvent, MigrationError> =>
        phase(
          "authenticate-source",
          sessions.authenticate("source", request.source),
          (source) => ({ did: source.did, handle: source.handle }),
          (source) =>
            phase(
              "fetch-members",
              fetcher.fetchMembers(source, request.sourceList),
              (members) => ({ list: request.sourceList, count: members.length }),
              (members) =>
                phase(
                  "authenticate-destination",
                  sessions.authenticate("destination", request.destination),
                  (destination) => ({ did: destination.did, handle: destination.handle }),
                  (destination) =>
                    phase(
                      "create-list",
                      creator.createList(destination, request.list),
                      (list) => ({ uri: list.uri, cid: list.cid }),
                      (list) => replicateStage(destination, list, members)
                    )
                )
            )
        );

      const run = Effect.fn("ListMigrator.run")(
        (request: MigrationRequest, onEvent?: (event: MigrationEvent) => Effect.Effect<void>) =>
          events(request).pipe(
            Stream.tap((event) => (onEvent ? onEvent(event) : Effect.void)),
            Stream.filterMap((event) =>
              event._tag === "MigrationCompleted" ? Option.some(event.result) : Option.none()
            ),
            Stream.runLast,
            Effect.flatMap(
              Option.match({
                onNone: () => Effect.dieMessage("Migration finished without a result"),
                onSome: Effect.succeed
              })
            )
          )
      );

      return ListMigrator.of({ events, run });
    })
  );
}
