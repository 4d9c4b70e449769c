import { Capability, type Actor } from "./capabilities";
import { addDccReview } from "./dccReviews";
import { ReviewAction, listReviewCandidateIds } from "./reviewStatus";
import type { ReviewStatus } from "./schema";
import {
  createSessionCoordinator,
  type CoordinatorDeps,
  type SessionFilter,
} from "./sessionCoordinator";

export interface ReviewSubmission {
  taggedVariableId: number;
  status: ReviewStatus;
  comment?: string;
}

export function createReviewSessions(deps: CoordinatorDeps) {
  const coordinator = createSessionCoordinator<ReviewSubmission>(deps, {
    namespace: "review",
    action: ReviewAction.DccReview,
    capability: Capability.DccReview,
    listCandidates: listReviewCandidateIds,
    submit: async (client, taggedVariableId, submission) =>
      await client.mutation(addDccReview, {
        taggedVariableId,
        status: submission.status,
        comment: submission.comment,
      }),
  });

  return {
    startSession: (actor: Actor, filter: SessionFilter) => coordinator.start(actor, filter),
    current: (actor: Actor) => coordinator.current(actor),
    advance: (actor: Actor) => coordinator.advance(actor),
    endSession: (actor: Actor) => coordinator.end(actor),
    submitReview: (actor: Actor, submission: ReviewSubmission) =>
      coordinator.submit(actor, submission),
  };
}

export type ReviewSessions = ReturnType<typeof createReviewSessions>;
