import { Schema } from "effect";
import type { DatabaseReader } from "./db";
import { notFound } from "./errors";
import { query } from "./functions";
import { EntityId, type Decision, type Doc } from "./schema";

export const ReviewState = {
  Unreviewed: "unreviewed",
  AwaitingResponse: "awaiting_response",
  AwaitingDecision: "awaiting_decision",
  Confirmed: "confirmed",
  Archived: "archived",
} as const;

export type ReviewState = (typeof ReviewState)[keyof typeof ReviewState];

export const ReviewAction = {
  DccReview: "dcc_review",
  StudyResponse: "study_response",
  DccDecision: "dcc_decision",
} as const;

export type ReviewAction = (typeof ReviewAction)[keyof typeof ReviewAction];

export interface ReviewRecords {
  taggedVariable: Doc<"taggedVariables">;
  review: Doc<"dccReviews"> | null;
  response: Doc<"studyResponses"> | null;
  decision: Doc<"dccDecisions"> | null;
}

export interface ReviewStatusView {
  taggedVariable: Doc<"taggedVariables">;
  state: ReviewState;
  /** Next step the pipeline is waiting on, or null once it is closed. */
  needs: ReviewAction | null;
  resolved: boolean;
  archived: boolean;
  dccReviewId: number | null;
  decision: Decision | null;
}

export async function findReview(
  db: DatabaseReader,
  taggedVariableId: number,
): Promise<Doc<"dccReviews"> | null> {
  return await db
    .query("dccReviews")
    .withIndex("by_tagged_variable", (q) => q.eq("taggedVariableId", taggedVariableId))
    .unique();
}

export async function findResponse(
  db: DatabaseReader,
  dccReviewId: number,
): Promise<Doc<"studyResponses"> | null> {
  return await db
    .query("studyResponses")
    .withIndex("by_dcc_review", (q) => q.eq("dccReviewId", dccReviewId))
    .unique();
}

export async function findDecision(
  db: DatabaseReader,
  dccReviewId: number,
): Promise<Doc<"dccDecisions"> | null> {
  return await db
    .query("dccDecisions")
    .withIndex("by_dcc_review", (q) => q.eq("dccReviewId", dccReviewId))
    .unique();
}

export async function requireTaggedVariable(
  db: DatabaseReader,
  taggedVariableId: number,
): Promise<Doc<"taggedVariables">> {
  const taggedVariable = await db.get("taggedVariables", taggedVariableId);
  if (!taggedVariable) throw notFound("taggedVariables", taggedVariableId);
  return taggedVariable;
}

export async function loadReviewRecords(
  db: DatabaseReader,
  taggedVariable: Doc<"taggedVariables">,
): Promise<ReviewRecords> {
  const review = await findReview(db, taggedVariable._id);
  if (!review) {
    return { taggedVariable, review: null, response: null, decision: null };
  }
  return {
    taggedVariable,
    review,
    response: await findResponse(db, review._id),
    decision: await findDecision(db, review._id),
  };
}

export function isResolved(records: ReviewRecords): boolean {
  const { taggedVariable, review, response, decision } = records;
  return (
    taggedVariable.archived ||
    review?.status === "confirmed" ||
    (review?.status === "flagged" && response?.status === "agree") ||
    decision !== null
  );
}

export function deriveReviewState(records: ReviewRecords): {
  state: ReviewState;
  needs: ReviewAction | null;
} {
  const { taggedVariable, review, response, decision } = records;

  if (taggedVariable.archived) return { state: ReviewState.Archived, needs: null };
  if (!review) {
    return { state: ReviewState.Unreviewed, needs: ReviewAction.DccReview };
  }
  if (review.status === "confirmed") {
    return { state: ReviewState.Confirmed, needs: null };
  }
  if (!response) {
    return { state: ReviewState.AwaitingResponse, needs: ReviewAction.StudyResponse };
  }
  if (response.status === "agree") {
    return { state: ReviewState.Archived, needs: null };
  }
  if (!decision) {
    return { state: ReviewState.AwaitingDecision, needs: ReviewAction.DccDecision };
  }
  return decision.decision === "remove"
    ? { state: ReviewState.Archived, needs: null }
    : { state: ReviewState.Confirmed, needs: null };
}

export function toStatusView(records: ReviewRecords): ReviewStatusView {
  return {
    taggedVariable: records.taggedVariable,
    ...deriveReviewState(records),
    resolved: isResolved(records),
    archived: records.taggedVariable.archived,
    dccReviewId: records.review?._id ?? null,
    decision: records.decision?.decision ?? null,
  };
}

async function listCandidateIds(
  db: DatabaseReader,
  tagId: number,
  studyId: number,
  action: ReviewAction,
): Promise<number[]> {
  const rows = await db
    .query("taggedVariables")
    .withIndex("by_tag_study", (q) => q.eq("tagId", tagId).eq("studyId", studyId))
    .filter((tv) => !tv.archived)
    .collect();

  const ids: number[] = [];
  for (const taggedVariable of rows) {
    const records = await loadReviewRecords(db, taggedVariable);
    if (deriveReviewState(records).needs === action) ids.push(taggedVariable._id);
  }
  return ids;
}

export const CandidateFilter = Schema.Struct({
  tagId: EntityId,
  studyId: EntityId,
});
export type CandidateFilter = typeof CandidateFilter.Type;

export const getReviewStatus = query({
  name: "reviewStatus:getReviewStatus",
  args: Schema.Struct({
    taggedVariableId: EntityId,
  }),
  handler: async (ctx, args) => {
    const taggedVariable = await ctx.db.get("taggedVariables", args.taggedVariableId);
    if (!taggedVariable) return null;
    return toStatusView(await loadReviewRecords(ctx.db, taggedVariable));
  },
});

/** Unreviewed, non-archived tagged variables for a tag in a study, by id. */
export const listReviewCandidateIds = query({
  name: "reviewStatus:listReviewCandidateIds",
  args: CandidateFilter,
  handler: async (ctx, args) => {
    return await listCandidateIds(ctx.db, args.tagId, args.studyId, ReviewAction.DccReview);
  },
});

/** Flagged reviews the study disagreed with that still lack a decision. */
export const listDecisionCandidateIds = query({
  name: "reviewStatus:listDecisionCandidateIds",
  args: CandidateFilter,
  handler: async (ctx, args) => {
    return await listCandidateIds(ctx.db, args.tagId, args.studyId, ReviewAction.DccDecision);
  },
});

export const countReviewCandidates = query({
  name: "reviewStatus:countReviewCandidates",
  args: CandidateFilter,
  handler: async (ctx, args) => {
    const ids = await listCandidateIds(ctx.db, args.tagId, args.studyId, ReviewAction.DccReview);
    return ids.length;
  },
});

export const countDecisionCandidates = query({
  name: "reviewStatus:countDecisionCandidates",
  args: CandidateFilter,
  handler: async (ctx, args) => {
    const ids = await listCandidateIds(ctx.db, args.tagId, args.studyId, ReviewAction.DccDecision);
    return ids.length;
  },
});

export interface TagCounts {
  taggedVariables: number;
  variables: number;
  tags: number;
}

function countRows(rows: Doc<"taggedVariables">[]): TagCounts {
  return {
    taggedVariables: rows.length,
    variables: new Set(rows.map((tv) => tv.variableId)).size,
    tags: new Set(rows.map((tv) => tv.tagId)).size,
  };
}

export const getStudyTagCounts = query({
  name: "reviewStatus:getStudyTagCounts",
  args: Schema.Struct({
    studyId: EntityId,
  }),
  handler: async (ctx, args) => {
    const rows = await ctx.db
      .query("taggedVariables")
      .withIndex("by_study", (q) => q.eq("studyId", args.studyId))
      .collect();
    return {
      studyId: args.studyId,
      active: countRows(rows.filter((tv) => !tv.archived)),
      archived: countRows(rows.filter((tv) => tv.archived)),
    };
  },
});
