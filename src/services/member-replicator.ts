/**
 * Member Replicator
 *
 * Writes one list item record per source member, in order, into the
 * destination list. Per-member failures are recorded and the loop moves on;
 * the replicator itself never fails.
 *
 * Writes are uninterruptible. Interruption is observed only while waiting
 * between writes, so a cancelled run has either issued a write completely or
 * not at all.
 *
 * @module services/member-replicator
 */

import { Context, Duration, Effect, Layer, Stream } from "effect";
import { MigrationSettings, type ExistingMemberPolicy } from "./migration-settings.js";
import { PacingPolicy, type PacingPolicyService, type WriteOutcome } from "./pacing-policy.js";
import type { Session } from "./session-manager.js";
import type { ListMember, ListRef } from "../domain/list.js";
import {
  emptyTally,
  MemberAdded,
  MemberFailed,
  MemberProcessed,
  MemberSkipped,
  type MemberOutcome,
  type MigrationResult,
  resultFromTally,
  tallyMember
} from "../domain/migration.js";
import { listItemCollection } from "../domain/primitives.js";

type ReplicationState = {
  readonly pending: Duration.Duration;
  readonly last: WriteOutcome | undefined;
  readonly streak: number;
};

const initialState: ReplicationState = {
  pending: Duration.zero,
  last: undefined,
  streak: 0
};

const writeMember = (session: Session, list: ListRef, member: ListMember) =>
  session
    .createRecord(listItemCollection, {
      $type: listItemCollection,
      subject: member.subject,
      list: list.uri,
      createdAt: new Date().toISOString()
    })
    .pipe(
      Effect.match({
        onSuccess: (created): MemberOutcome => MemberAdded.make({ uri: created.uri }),
        onFailure: (error): MemberOutcome =>
          MemberFailed.make({ reason: error.message, status: error.status })
      }),
      Effect.uninterruptible
    );

const advance = (
  pacing: PacingPolicyService,
  state: ReplicationState,
  outcome: WriteOutcome
): ReplicationState => {
  const streak = state.last === outcome ? state.streak + 1 : 1;
  return { pending: pacing.delayFor(outcome, streak), last: outcome, streak };
};

export class MemberReplicator extends Context.Tag("@list-migrator/MemberReplicator")<
  MemberReplicator,
  {
    /** One MemberProcessed per member, in source order. */
    readonly replicate: (
      session: Session,
      list: ListRef,
      members: ReadonlyArray<ListMember>
    ) => Stream.Stream<MemberProcessed>;
    readonly addMembers: (
      session: Session,
      list: ListRef,
      members: ReadonlyArray<ListMember>,
      onProgress?: (event: MemberProcessed) => Effect.Effect<void>
    ) => Effect.Effect<MigrationResult>;
  }
>() {
  static readonly layer = Layer.effect(
    MemberReplicator,
    Effect.gen(function* () {
      const pacing = yield* PacingPolicy;
      const settings = yield* MigrationSettings;
      const policy: ExistingMemberPolicy = settings.existingMembers;

      const replicate = (
        session: Session,
        list: ListRef,
        members: ReadonlyArray<ListMember>
      ) =>
        Stream.suspend(() => {
          const total = members.length;
          // Subjects written by this run; only consulted under the skip policy.
          const written = policy === "skip" ? new Set<string>() : undefined;
          return Stream.fromIterable(members.map((member, offset) => [member, offset + 1] as const)).pipe(
            Stream.mapAccumEffect(initialState, (state, [member, index]) =>
              Effect.gen(function* () {
                if (written?.has(member.subject)) {
                  const event = MemberProcessed.make({
                    index,
                    total,
                    subject: member.subject,
                    outcome: MemberSkipped.make({ reason: "AlreadyPresent" })
                  });
                  return [state, event] as const;
                }
                if (Duration.greaterThan(state.pending, Duration.zero)) {
                  yield* Effect.sleep(state.pending);
                }
                const outcome = yield* writeMember(session, list, member);
                if (outcome._tag === "Added") {
                  written?.add(member.subject);
                }
                const next = advance(pacing, state, outcome._tag === "Added" ? "success" : "failure");
                const event = MemberProcessed.make({
                  index,
                  total,
                  subject: member.subject,
                  outcome
                });
                return [next, event] as const;
              })
            )
          );
        });

      const addMembers = Effect.fn("MemberReplicator.addMembers")(
        (
          session: Session,
          list: ListRef,
          members: ReadonlyArray<ListMember>,
          onProgress?: (event: MemberProcessed) => Effect.Effect<void>
        ) =>
          replicate(session, list, members).pipe(
            Stream.tap((event) => (onProgress ? onProgress(event) : Effect.void)),
            Stream.runFold(emptyTally, tallyMember),
            Effect.map((tally) => resultFromTally(list, members.length, tally))
          )
      );

      return MemberReplicator.of({ replicate, addMembers });
    })
  );
}
