import { Schema } from "effect";
import { Capability, requireCapability } from "./capabilities";
import { ConflictError, ValidationError, notFound } from "./errors";
import { mutation, timestamp } from "./functions";
import { findResponse, findReview, requireTaggedVariable } from "./reviewStatus";
import { EntityId, ReviewStatus } from "./schema";

const ReviewArgs = {
  status: ReviewStatus,
  comment: Schema.optionalWith(Schema.String, { default: () => "" }),
} as const;

function reviewComment(status: ReviewStatus, raw: string): string {
  const comment = raw.trim();
  if (status === "flagged" && comment === "") {
    throw new ValidationError({
      field: "comment",
      message: "A comment is required when flagging a tagged variable for removal",
    });
  }
  return comment;
}

export const addDccReview = mutation({
  name: "dccReviews:addDccReview",
  args: Schema.Struct({
    taggedVariableId: EntityId,
    ...ReviewArgs,
  }),
  handler: async (ctx, args) => {
    const taggedVariable = await requireTaggedVariable(ctx.db, args.taggedVariableId);
    requireCapability(ctx.actor, taggedVariable.studyId, Capability.DccReview);

    if (taggedVariable.archived) {
      throw new ConflictError({
        reason: "archived",
        message: `Tagged variable ${taggedVariable._id} is archived`,
      });
    }
    if (await findReview(ctx.db, taggedVariable._id)) {
      throw new ConflictError({
        reason: "superseded",
        message: `Tagged variable ${taggedVariable._id} has already been reviewed`,
      });
    }
    const comment = reviewComment(args.status, args.comment);

    const now = timestamp(ctx);
    const id = await ctx.db.insert("dccReviews", {
      taggedVariableId: taggedVariable._id,
      status: args.status,
      comment,
      creatorId: ctx.actor.id,
      createdAt: now,
      modifiedAt: now,
    });
    const review = await ctx.db.get("dccReviews", id);
    if (!review) throw notFound("dccReviews", id);
    return review;
  },
});

/** A review can be revised until the study responds to it. */
export const updateDccReview = mutation({
  name: "dccReviews:updateDccReview",
  args: Schema.Struct({
    dccReviewId: EntityId,
    ...ReviewArgs,
  }),
  handler: async (ctx, args) => {
    const review = await ctx.db.get("dccReviews", args.dccReviewId);
    if (!review) throw notFound("dccReviews", args.dccReviewId);
    const taggedVariable = await requireTaggedVariable(ctx.db, review.taggedVariableId);
    requireCapability(ctx.actor, taggedVariable.studyId, Capability.DccReview);

    if (await findResponse(ctx.db, review._id)) {
      throw new ConflictError({
        reason: "review_closed",
        message: `DCC review ${review._id} has a study response and can no longer change`,
      });
    }
    if (taggedVariable.archived) {
      throw new ConflictError({
        reason: "archived",
        message: `Tagged variable ${taggedVariable._id} is archived`,
      });
    }
    const comment = reviewComment(args.status, args.comment);

    await ctx.db.patch("dccReviews", review._id, {
      status: args.status,
      comment,
      modifiedAt: timestamp(ctx),
    });
    const updated = await ctx.db.get("dccReviews", review._id);
    if (!updated) throw notFound("dccReviews", review._id);
    return updated;
  },
});
