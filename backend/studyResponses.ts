import { Schema } from "effect";
import { Capability, requireCapability } from "./capabilities";
import { ConflictError, ValidationError, notFound } from "./errors";
import { mutation, timestamp } from "./functions";
import { findResponse, requireTaggedVariable } from "./reviewStatus";
import { EntityId, ResponseStatus } from "./schema";

/**
 * The study's answer to a flagged review. Agreeing archives the tagged
 * variable in the same transaction; disagreeing sends it to a DCC decision.
 */
export const addStudyResponse = mutation({
  name: "studyResponses:addStudyResponse",
  args: Schema.Struct({
    dccReviewId: EntityId,
    status: ResponseStatus,
    comment: Schema.optionalWith(Schema.String, { default: () => "" }),
  }),
  handler: async (ctx, args) => {
    const review = await ctx.db.get("dccReviews", args.dccReviewId);
    if (!review) throw notFound("dccReviews", args.dccReviewId);
    const taggedVariable = await requireTaggedVariable(ctx.db, review.taggedVariableId);
    requireCapability(ctx.actor, taggedVariable.studyId, Capability.StudyRespond);

    if (taggedVariable.archived) {
      throw new ConflictError({
        reason: "archived",
        message: `Tagged variable ${taggedVariable._id} is archived`,
      });
    }
    if (review.status !== "flagged") {
      throw new ConflictError({
        reason: "not_flagged",
        message: `DCC review ${review._id} is not flagged for removal`,
      });
    }
    if (await findResponse(ctx.db, review._id)) {
      throw new ConflictError({
        reason: "superseded",
        message: `DCC review ${review._id} already has a study response`,
      });
    }
    const comment = args.comment.trim();
    if (args.status === "disagree" && comment === "") {
      throw new ValidationError({
        field: "comment",
        message: "A comment is required when disagreeing with a removal",
      });
    }

    const now = timestamp(ctx);
    const id = await ctx.db.insert("studyResponses", {
      dccReviewId: review._id,
      status: args.status,
      comment,
      creatorId: ctx.actor.id,
      createdAt: now,
      modifiedAt: now,
    });
    if (args.status === "agree") {
      await ctx.db.patch("taggedVariables", taggedVariable._id, {
        archived: true,
        modifiedAt: now,
      });
    }

    const response = await ctx.db.get("studyResponses", id);
    if (!response) throw notFound("studyResponses", id);
    return response;
  },
});
