import { Schema } from "effect";
import { Capability, hasCapability, requireCapability } from "./capabilities";
import type { DatabaseReader } from "./db";
import {
  BulkTaggingError,
  ConflictError,
  PermissionError,
  notFound,
  type BulkTaggingFailure,
} from "./errors";
import { mutation, query, timestamp, type MutationCtx } from "./functions";
import { EntityId, type Doc } from "./schema";
import type { Tag } from "./tagCatalog";
import {
  formatStudyAccession,
  formatVariableAccession,
  type SourceVariable,
} from "./traitDirectory";

type TaggableCheck =
  | { ok: true; variable: SourceVariable }
  | { ok: false; failure: BulkTaggingFailure };

export async function findActiveTagging(
  db: DatabaseReader,
  variableId: number,
  tagId: number,
): Promise<Doc<"taggedVariables"> | null> {
  return await db
    .query("taggedVariables")
    .withIndex("by_variable_tag", (q) =>
      q.eq("variableId", variableId).eq("tagId", tagId),
    )
    .filter((tv) => !tv.archived)
    .first();
}

async function requireTag(ctx: MutationCtx, tagId: number): Promise<Tag> {
  const tag = await ctx.tags.getTag(tagId);
  if (!tag) throw notFound("tag", tagId);
  return tag;
}

async function checkTaggable(
  ctx: MutationCtx,
  variableId: number,
  tag: Tag,
): Promise<TaggableCheck> {
  const variable = await ctx.directory.getVariable(variableId);
  if (!variable) {
    return {
      ok: false,
      failure: {
        variableId,
        reason: "not_found",
        message: `variable not found: ${variableId}`,
      },
    };
  }
  if (!hasCapability(ctx.actor, variable.studyId, Capability.Tag)) {
    return {
      ok: false,
      failure: {
        variableId,
        reason: "permission_denied",
        message: `${ctx.actor.name} cannot tag variables in study ${formatStudyAccession(variable.studyId)}`,
      },
    };
  }
  if (await findActiveTagging(ctx.db, variableId, tag.id)) {
    return {
      ok: false,
      failure: {
        variableId,
        reason: "already_tagged",
        message: `${formatVariableAccession(variable)} is already tagged with "${tag.title}"`,
      },
    };
  }
  return { ok: true, variable };
}

function toError(failure: BulkTaggingFailure) {
  switch (failure.reason) {
    case "not_found":
      return notFound("variable", failure.variableId);
    case "permission_denied":
      return new PermissionError({ message: failure.message });
    case "already_tagged":
      return new ConflictError({
        reason: "already_tagged",
        message: failure.message,
      });
  }
}

async function insertTaggedVariable(
  ctx: MutationCtx,
  variable: SourceVariable,
  tagId: number,
): Promise<Doc<"taggedVariables">> {
  const now = timestamp(ctx);
  const id = await ctx.db.insert("taggedVariables", {
    variableId: variable.id,
    tagId,
    studyId: variable.studyId,
    archived: false,
    creatorId: ctx.actor.id,
    createdAt: now,
    modifiedAt: now,
  });
  const created = await ctx.db.get("taggedVariables", id);
  if (!created) throw notFound("taggedVariables", id);
  return created;
}

async function tagVariable(
  ctx: MutationCtx,
  variableId: number,
  tag: Tag,
): Promise<Doc<"taggedVariables">> {
  const check = await checkTaggable(ctx, variableId, tag);
  if (!check.ok) throw toError(check.failure);
  return await insertTaggedVariable(ctx, check.variable, tag.id);
}

export const createTaggedVariable = mutation({
  name: "taggedVariables:createTaggedVariable",
  args: Schema.Struct({
    variableId: EntityId,
    tagId: EntityId,
  }),
  handler: async (ctx, args) => {
    const tag = await requireTag(ctx, args.tagId);
    return await tagVariable(ctx, args.variableId, tag);
  },
});

export const createTaggedVariableByAccession = mutation({
  name: "taggedVariables:createTaggedVariableByAccession",
  args: Schema.Struct({
    accession: Schema.String,
    tagId: EntityId,
  }),
  handler: async (ctx, args) => {
    const tag = await requireTag(ctx, args.tagId);
    const variable = await ctx.directory.findVariableByAccession(args.accession);
    if (!variable) throw notFound("variable", args.accession);
    return await tagVariable(ctx, variable.id, tag);
  },
});

/**
 * Tags every listed variable or none of them. Each variable is checked before
 * anything is written, so the error reports every offending variable rather
 * than the first.
 */
export const createTaggedVariablesBulk = mutation({
  name: "taggedVariables:createTaggedVariablesBulk",
  args: Schema.Struct({
    variableIds: Schema.NonEmptyArray(EntityId),
    tagId: EntityId,
  }),
  handler: async (ctx, args) => {
    const tag = await requireTag(ctx, args.tagId);
    const variableIds = [...new Set(args.variableIds)];

    const checks: TaggableCheck[] = [];
    for (const variableId of variableIds) {
      checks.push(await checkTaggable(ctx, variableId, tag));
    }

    const failures = checks.flatMap((check) => (check.ok ? [] : [check.failure]));
    if (failures.length > 0) {
      throw new BulkTaggingError({
        failures,
        message: `${failures.length} of ${variableIds.length} variables could not be tagged with "${tag.title}"`,
      });
    }

    const created: Doc<"taggedVariables">[] = [];
    for (const check of checks) {
      if (check.ok) {
        created.push(await insertTaggedVariable(ctx, check.variable, tag.id));
      }
    }
    return created;
  },
});

export const deleteOwnTaggedVariable = mutation({
  name: "taggedVariables:deleteOwnTaggedVariable",
  args: Schema.Struct({
    taggedVariableId: EntityId,
  }),
  handler: async (ctx, args) => {
    const taggedVariable = await ctx.db.get("taggedVariables", args.taggedVariableId);
    if (!taggedVariable) throw notFound("taggedVariables", args.taggedVariableId);

    if (taggedVariable.creatorId !== ctx.actor.id) {
      throw new PermissionError({
        message: `${ctx.actor.name} can only remove tags they created`,
      });
    }

    const review = await ctx.db
      .query("dccReviews")
      .withIndex("by_tagged_variable", (q) =>
        q.eq("taggedVariableId", taggedVariable._id),
      )
      .unique();
    if (review) {
      throw new ConflictError({
        reason: "already_reviewed",
        message: `Tagged variable ${taggedVariable._id} has been reviewed and must be kept`,
      });
    }

    await ctx.db.delete("taggedVariables", taggedVariable._id);
  },
});

/**
 * Carries the active tags of the previous version of a variable over to this
 * version. Tags the variable already carries are left alone.
 */
export const applyPreviousVersionTags = mutation({
  name: "taggedVariables:applyPreviousVersionTags",
  args: Schema.Struct({
    variableId: EntityId,
  }),
  handler: async (ctx, args) => {
    const variable = await ctx.directory.getVariable(args.variableId);
    if (!variable) throw notFound("variable", args.variableId);
    requireCapability(ctx.actor, variable.studyId, Capability.Tag);

    const created: Doc<"taggedVariables">[] = [];
    const previous = await ctx.directory.getPreviousVersion(variable.id);
    if (!previous) return created;

    const previousTaggings = await ctx.db
      .query("taggedVariables")
      .withIndex("by_variable_tag", (q) => q.eq("variableId", previous.id))
      .filter((tv) => !tv.archived)
      .collect();

    for (const tagging of previousTaggings) {
      const tag = await ctx.tags.getTag(tagging.tagId);
      if (!tag) continue;
      if (await findActiveTagging(ctx.db, variable.id, tag.id)) continue;
      created.push(await insertTaggedVariable(ctx, variable, tag.id));
    }
    return created;
  },
});

export const getTaggedVariable = query({
  name: "taggedVariables:getTaggedVariable",
  args: Schema.Struct({
    taggedVariableId: EntityId,
  }),
  handler: async (ctx, args) => {
    return await ctx.db.get("taggedVariables", args.taggedVariableId);
  },
});

export const listTaggedVariables = query({
  name: "taggedVariables:listTaggedVariables",
  args: Schema.Struct({
    tagId: Schema.optional(EntityId),
    studyId: Schema.optional(EntityId),
    archived: Schema.optional(Schema.Boolean),
  }),
  handler: async (ctx, args) => {
    const { tagId, studyId, archived } = args;
    const table = ctx.db.query("taggedVariables");

    let rows: Doc<"taggedVariables">[];
    if (tagId !== undefined && studyId !== undefined) {
      rows = await table
        .withIndex("by_tag_study", (q) => q.eq("tagId", tagId).eq("studyId", studyId))
        .collect();
    } else if (tagId !== undefined) {
      rows = await table.withIndex("by_tag", (q) => q.eq("tagId", tagId)).collect();
    } else if (studyId !== undefined) {
      rows = await table.withIndex("by_study", (q) => q.eq("studyId", studyId)).collect();
    } else {
      rows = await table.collect();
    }

    if (archived !== undefined) {
      return rows.filter((tv) => tv.archived === archived);
    }
    return rows;
  },
});
