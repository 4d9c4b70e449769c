import { Capability, type Actor } from "./capabilities";
import { addDccDecision } from "./dccDecisions";
import { ConflictError } from "./errors";
import {
  ReviewAction,
  getReviewStatus,
  listDecisionCandidateIds,
} from "./reviewStatus";
import type { Decision } from "./schema";
import {
  createSessionCoordinator,
  type CoordinatorDeps,
  type SessionFilter,
} from "./sessionCoordinator";

export interface DecisionSubmission {
  taggedVariableId: number;
  decision: Decision;
  comment: string;
}

/**
 * Final-decision loop over flagged tags the study disagreed with. Kept in its
 * own session namespace so it can run beside a review loop.
 */
export function createDecisionSessions(deps: CoordinatorDeps) {
  const coordinator = createSessionCoordinator<DecisionSubmission>(deps, {
    namespace: "decision",
    action: ReviewAction.DccDecision,
    capability: Capability.DccDecide,
    listCandidates: listDecisionCandidateIds,
    submit: async (client, taggedVariableId, submission) => {
      const status = await client.query(getReviewStatus, { taggedVariableId });
      if (!status || status.dccReviewId === null) {
        throw new ConflictError({
          reason: "superseded",
          message: `Tagged variable ${taggedVariableId} no longer has a DCC review`,
        });
      }
      return await client.mutation(addDccDecision, {
        dccReviewId: status.dccReviewId,
        decision: submission.decision,
        comment: submission.comment,
      });
    },
  });

  return {
    startSession: (actor: Actor, filter: SessionFilter) => coordinator.start(actor, filter),
    current: (actor: Actor) => coordinator.current(actor),
    advance: (actor: Actor) => coordinator.advance(actor),
    endSession: (actor: Actor) => coordinator.end(actor),
    submitDecision: (actor: Actor, submission: DecisionSubmission) =>
      coordinator.submit(actor, submission),
  };
}

export type DecisionSessions = ReturnType<typeof createDecisionSessions>;
