import { requireCapability, type Actor, type Capability } from "./capabilities";
import { ConflictError, notFound } from "./errors";
import type { RegisteredQuery } from "./functions";
import {
  getReviewStatus,
  type CandidateFilter,
  type ReviewAction,
  type ReviewStatusView,
} from "./reviewStatus";
import type { Doc } from "./schema";
import type { ActorClient, Backend } from "./runtime";
import type { ReviewSession, SessionNamespace, SessionStore } from "./sessionStore";

export type SessionFilter = CandidateFilter;

export type SkipReason = "superseded" | "archived";

export type SessionView =
  | {
      kind: "item";
      taggedVariable: Doc<"taggedVariables">;
      status: ReviewStatusView;
      /** 1-based position of the item in the snapshot. */
      position: number;
      total: number;
      /** Items resolved elsewhere that this call stepped over. */
      skipped: number[];
    }
  | { kind: "complete"; skipped: number[] }
  | { kind: "none" };

export type SubmitOutcome =
  | { kind: "submitted"; taggedVariableId: number; next: SessionView }
  | { kind: "skipped"; taggedVariableId: number; reason: SkipReason; next: SessionView };

export interface SessionDefinition<Submission> {
  namespace: SessionNamespace;
  /** Action a candidate still needs; items that no longer need it are stale. */
  action: ReviewAction;
  capability: Capability;
  listCandidates: RegisteredQuery<SessionFilter, SessionFilter, number[]>;
  submit(client: ActorClient, taggedVariableId: number, submission: Submission): Promise<unknown>;
}

export interface CoordinatorDeps {
  backend: Backend;
  store: SessionStore;
}

function isSkippable(error: unknown): error is ConflictError & { reason: SkipReason } {
  return (
    error instanceof ConflictError &&
    (error.reason === "superseded" || error.reason === "archived")
  );
}

/**
 * One-at-a-time loop over a snapshot of candidate tagged variables. The
 * snapshot is taken once at start; each step re-reads the live status of
 * the item under the cursor.
 */
export function createSessionCoordinator<Submission extends { taggedVariableId: number }>(
  deps: CoordinatorDeps,
  definition: SessionDefinition<Submission>,
) {
  const { backend, store } = deps;
  const { namespace } = definition;

  async function start(actor: Actor, filter: SessionFilter): Promise<SessionView> {
    requireCapability(actor, filter.studyId, definition.capability);
    const client = backend.withIdentity(actor);
    const candidateIds = await client.query(definition.listCandidates, filter);
    if (candidateIds.length === 0) {
      throw notFound(
        `${namespace} candidates`,
        `tag ${filter.tagId} in study ${filter.studyId}`,
      );
    }

    await store.set({
      namespace,
      actorId: actor.id,
      tagId: filter.tagId,
      studyId: filter.studyId,
      candidateIds,
      cursor: 0,
      startedAt: backend.now().toISOString(),
    });
    backend.logger.info(`${namespace} session started`, {
      actorId: actor.id,
      total: candidateIds.length,
    });
    return await current(actor);
  }

  async function viewOf(actor: Actor, session: ReviewSession): Promise<SessionView> {
    const client = backend.withIdentity(actor);
    const skipped: number[] = [];
    let cursor = session.cursor;

    while (cursor < session.candidateIds.length) {
      const taggedVariableId = session.candidateIds[cursor];
      const status = await client.query(getReviewStatus, { taggedVariableId });
      if (status && status.needs === definition.action) {
        if (cursor !== session.cursor) await store.set({ ...session, cursor });
        return {
          kind: "item",
          taggedVariable: status.taggedVariable,
          status,
          position: cursor + 1,
          total: session.candidateIds.length,
          skipped,
        };
      }
      skipped.push(taggedVariableId);
      cursor += 1;
    }

    // An exhausted session is reported once, then discarded.
    await store.delete(namespace, actor.id);
    backend.logger.info(`${namespace} session complete`, {
      actorId: actor.id,
      skipped,
    });
    return { kind: "complete", skipped };
  }

  async function current(actor: Actor): Promise<SessionView> {
    const session = await store.get(namespace, actor.id);
    if (!session) return { kind: "none" };
    return await viewOf(actor, session);
  }

  async function advance(actor: Actor): Promise<SessionView> {
    const session = await store.get(namespace, actor.id);
    if (!session) return { kind: "none" };
    const next = {
      ...session,
      cursor: Math.min(session.cursor + 1, session.candidateIds.length),
    };
    await store.set(next);
    return await viewOf(actor, next);
  }

  async function end(actor: Actor): Promise<void> {
    await store.delete(namespace, actor.id);
  }

  /**
   * Runs the terminal action for the item under the cursor. Items another
   * actor resolved first are skipped rather than failed; any other error
   * leaves the cursor where it is.
   */
  async function submit(actor: Actor, submission: Submission): Promise<SubmitOutcome> {
    const session = await store.get(namespace, actor.id);
    if (!session) throw notFound(`${namespace} session`, actor.id);

    if (session.cursor >= session.candidateIds.length) {
      await store.delete(namespace, actor.id);
      throw notFound(`${namespace} session`, actor.id);
    }
    const taggedVariableId = session.candidateIds[session.cursor];
    if (taggedVariableId !== submission.taggedVariableId) {
      throw new ConflictError({
        reason: "superseded",
        message: `Tagged variable ${submission.taggedVariableId} is not the current item of this ${namespace} session`,
      });
    }

    const moved = { ...session, cursor: session.cursor + 1 };
    try {
      await definition.submit(backend.withIdentity(actor), taggedVariableId, submission);
    } catch (error) {
      if (!isSkippable(error)) throw error;
      await store.set(moved);
      backend.logger.info(`${namespace} session skipped item`, {
        actorId: actor.id,
        taggedVariableId,
        reason: error.reason,
      });
      return {
        kind: "skipped",
        taggedVariableId,
        reason: error.reason,
        next: await viewOf(actor, moved),
      };
    }

    await store.set(moved);
    return { kind: "submitted", taggedVariableId, next: await viewOf(actor, moved) };
  }

  return { start, current, advance, end, submit };
}
