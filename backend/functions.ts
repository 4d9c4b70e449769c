import type { Schema } from "effect";
import type { Actor } from "./capabilities";
import type { DatabaseReader, DatabaseWriter } from "./db";
import type { TagCatalog } from "./tagCatalog";
import type { TraitDirectory } from "./traitDirectory";

export interface QueryCtx {
  db: DatabaseReader;
  actor: Actor;
  directory: TraitDirectory;
  tags: TagCatalog;
}

export interface MutationCtx {
  db: DatabaseWriter;
  actor: Actor;
  directory: TraitDirectory;
  tags: TagCatalog;
  now: () => Date;
}

interface FunctionDefinition<Ctx, Args, Encoded, Result> {
  /** Qualified name used in logs, e.g. "dccReviews:addDccReview". */
  name: string;
  args: Schema.Schema<Args, Encoded>;
  handler: (ctx: Ctx, args: Args) => Promise<Result>;
}

export interface RegisteredQuery<Args, Encoded, Result>
  extends FunctionDefinition<QueryCtx, Args, Encoded, Result> {
  kind: "query";
}

export interface RegisteredMutation<Args, Encoded, Result>
  extends FunctionDefinition<MutationCtx, Args, Encoded, Result> {
  kind: "mutation";
}

export function query<Args, Encoded, Result>(
  definition: FunctionDefinition<QueryCtx, Args, Encoded, Result>,
): RegisteredQuery<Args, Encoded, Result> {
  return { kind: "query", ...definition };
}

export function mutation<Args, Encoded, Result>(
  definition: FunctionDefinition<MutationCtx, Args, Encoded, Result>,
): RegisteredMutation<Args, Encoded, Result> {
  return { kind: "mutation", ...definition };
}

export function timestamp(ctx: MutationCtx): string {
  return ctx.now().toISOString();
}
