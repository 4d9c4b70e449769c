import { Schema } from "effect";

export const ConflictReason = Schema.Literal(
  "already_tagged",
  "already_reviewed",
  "archived",
  "superseded",
  "review_closed",
  "not_flagged",
  "no_disagreement",
  "duplicate",
);
export type ConflictReason = typeof ConflictReason.Type;

export class NotFoundError extends Schema.TaggedError<NotFoundError>()(
  "NotFoundError",
  { resource: Schema.String, id: Schema.String, message: Schema.String },
) {}

export class ConflictError extends Schema.TaggedError<ConflictError>()(
  "ConflictError",
  { reason: ConflictReason, message: Schema.String },
) {}

export class ValidationError extends Schema.TaggedError<ValidationError>()(
  "ValidationError",
  { field: Schema.String, message: Schema.String },
) {}

export class PermissionError extends Schema.TaggedError<PermissionError>()(
  "PermissionError",
  { message: Schema.String },
) {}

export const BulkTaggingFailure = Schema.Struct({
  variableId: Schema.Number,
  reason: Schema.Literal("not_found", "permission_denied", "already_tagged"),
  message: Schema.String,
});
export type BulkTaggingFailure = typeof BulkTaggingFailure.Type;

export class BulkTaggingError extends Schema.TaggedError<BulkTaggingError>()(
  "BulkTaggingError",
  { failures: Schema.Array(BulkTaggingFailure), message: Schema.String },
) {}

export class ConfigError extends Schema.TaggedError<ConfigError>()(
  "ConfigError",
  { message: Schema.String },
) {}

export type ReviewError =
  | NotFoundError
  | ConflictError
  | ValidationError
  | PermissionError
  | BulkTaggingError;

export function notFound(resource: string, id: number | string): NotFoundError {
  return new NotFoundError({
    resource,
    id: String(id),
    message: `${resource} not found: ${id}`,
  });
}

export function isReviewError(error: unknown): error is ReviewError {
  return (
    error instanceof NotFoundError ||
    error instanceof ConflictError ||
    error instanceof ValidationError ||
    error instanceof PermissionError ||
    error instanceof BulkTaggingError
  );
}
