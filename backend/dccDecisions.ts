import { Schema } from "effect";
import { Capability, requireCapability } from "./capabilities";
import { ConflictError, ValidationError, notFound } from "./errors";
import { mutation, timestamp, type MutationCtx } from "./functions";
import { findDecision, findResponse, requireTaggedVariable } from "./reviewStatus";
import { Decision, EntityId, type Doc } from "./schema";
import { findActiveTagging } from "./taggedVariables";

function decisionComment(raw: string): string {
  const comment = raw.trim();
  if (comment === "") {
    throw new ValidationError({
      field: "comment",
      message: "A comment is required for a DCC decision",
    });
  }
  return comment;
}

/** Sets the archived flag to match the decision. No-op when it already does. */
async function applyDecision(
  ctx: MutationCtx,
  taggedVariable: Doc<"taggedVariables">,
  decision: Decision,
): Promise<void> {
  const archived = decision === "remove";
  if (taggedVariable.archived === archived) return;

  if (!archived) {
    const active = await findActiveTagging(
      ctx.db,
      taggedVariable.variableId,
      taggedVariable.tagId,
    );
    if (active) {
      throw new ConflictError({
        reason: "already_tagged",
        message: `Variable ${taggedVariable.variableId} was tagged again as ${active._id}; ${taggedVariable._id} stays archived`,
      });
    }
  }
  await ctx.db.patch("taggedVariables", taggedVariable._id, {
    archived,
    modifiedAt: timestamp(ctx),
  });
}

export const addDccDecision = mutation({
  name: "dccDecisions:addDccDecision",
  args: Schema.Struct({
    dccReviewId: EntityId,
    decision: Decision,
    comment: Schema.String,
  }),
  handler: async (ctx, args) => {
    const review = await ctx.db.get("dccReviews", args.dccReviewId);
    if (!review) throw notFound("dccReviews", args.dccReviewId);
    const taggedVariable = await requireTaggedVariable(ctx.db, review.taggedVariableId);
    requireCapability(ctx.actor, taggedVariable.studyId, Capability.DccDecide);

    if (taggedVariable.archived) {
      throw new ConflictError({
        reason: "archived",
        message: `Tagged variable ${taggedVariable._id} is archived`,
      });
    }
    const response = await findResponse(ctx.db, review._id);
    if (response?.status !== "disagree") {
      throw new ConflictError({
        reason: "no_disagreement",
        message: `DCC review ${review._id} has no disagreeing study response`,
      });
    }
    if (await findDecision(ctx.db, review._id)) {
      throw new ConflictError({
        reason: "superseded",
        message: `DCC review ${review._id} already has a decision`,
      });
    }
    const comment = decisionComment(args.comment);

    const now = timestamp(ctx);
    const id = await ctx.db.insert("dccDecisions", {
      dccReviewId: review._id,
      decision: args.decision,
      comment,
      creatorId: ctx.actor.id,
      createdAt: now,
      modifiedAt: now,
    });
    await applyDecision(ctx, taggedVariable, args.decision);

    const created = await ctx.db.get("dccDecisions", id);
    if (!created) throw notFound("dccDecisions", id);
    return created;
  },
});

/**
 * Revises a decision in place. Prior decisions are not kept; the archived
 * flag is re-derived from the new decision on every call.
 */
export const updateDccDecision = mutation({
  name: "dccDecisions:updateDccDecision",
  args: Schema.Struct({
    dccDecisionId: EntityId,
    decision: Decision,
    comment: Schema.String,
  }),
  handler: async (ctx, args) => {
    const existing = await ctx.db.get("dccDecisions", args.dccDecisionId);
    if (!existing) throw notFound("dccDecisions", args.dccDecisionId);
    const review = await ctx.db.get("dccReviews", existing.dccReviewId);
    if (!review) throw notFound("dccReviews", existing.dccReviewId);
    const taggedVariable = await requireTaggedVariable(ctx.db, review.taggedVariableId);
    requireCapability(ctx.actor, taggedVariable.studyId, Capability.DccDecide);
    const comment = decisionComment(args.comment);

    await ctx.db.patch("dccDecisions", existing._id, {
      decision: args.decision,
      comment,
      modifiedAt: timestamp(ctx),
    });
    await applyDecision(ctx, taggedVariable, args.decision);

    const updated = await ctx.db.get("dccDecisions", existing._id);
    if (!updated) throw notFound("dccDecisions", existing._id);
    return updated;
  },
});
