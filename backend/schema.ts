import { Schema } from "effect";

export const EntityId = Schema.Int.pipe(Schema.positive());

export const ReviewStatus = Schema.Literal("confirmed", "flagged");
export type ReviewStatus = typeof ReviewStatus.Type;

export const ResponseStatus = Schema.Literal("agree", "disagree");
export type ResponseStatus = typeof ResponseStatus.Type;

export const Decision = Schema.Literal("confirm", "remove");
export type Decision = typeof Decision.Type;

const auditFields = {
  creatorId: EntityId,
  createdAt: Schema.String,
  modifiedAt: Schema.String,
} as const;

export const TaggedVariable = Schema.Struct({
  variableId: EntityId,
  tagId: EntityId,
  // Copied from the trait directory when tagged; review queues filter on it.
  studyId: EntityId,
  archived: Schema.Boolean,
  ...auditFields,
});
export type TaggedVariable = typeof TaggedVariable.Type;

export const DccReview = Schema.Struct({
  taggedVariableId: EntityId,
  status: ReviewStatus,
  comment: Schema.String,
  ...auditFields,
});
export type DccReview = typeof DccReview.Type;

export const StudyResponse = Schema.Struct({
  dccReviewId: EntityId,
  status: ResponseStatus,
  comment: Schema.String,
  ...auditFields,
});
export type StudyResponse = typeof StudyResponse.Type;

export const DccDecision = Schema.Struct({
  dccReviewId: EntityId,
  decision: Decision,
  comment: Schema.String,
  ...auditFields,
});
export type DccDecision = typeof DccDecision.Type;

export interface DataModel {
  taggedVariables: TaggedVariable;
  dccReviews: DccReview;
  studyResponses: StudyResponse;
  dccDecisions: DccDecision;
}

export type TableName = keyof DataModel;

export interface SystemFields {
  readonly _id: number;
  readonly _creationTime: number;
}

export type Doc<T extends TableName> = Readonly<DataModel[T]> & SystemFields;

export interface IndexDefinition<T> {
  readonly name: string;
  readonly fields: ReadonlyArray<keyof T & string>;
  readonly unique: boolean;
}

export class TableDefinition<T> {
  constructor(
    readonly document: Schema.Schema<T>,
    readonly indexes: ReadonlyArray<IndexDefinition<T>> = [],
  ) {}

  index(
    name: string,
    fields: ReadonlyArray<keyof T & string>,
    options: { unique?: boolean } = {},
  ): TableDefinition<T> {
    return new TableDefinition(this.document, [
      ...this.indexes,
      { name, fields, unique: options.unique ?? false },
    ]);
  }
}

export function defineTable<T>(document: Schema.Schema<T>): TableDefinition<T> {
  return new TableDefinition(document);
}

export const schema: { readonly [K in TableName]: TableDefinition<DataModel[K]> } = {
  taggedVariables: defineTable(TaggedVariable)
    .index("by_variable_tag", ["variableId", "tagId"])
    .index("by_tag_study", ["tagId", "studyId"])
    .index("by_study", ["studyId"])
    .index("by_tag", ["tagId"]),

  dccReviews: defineTable(DccReview).index(
    "by_tagged_variable",
    ["taggedVariableId"],
    { unique: true },
  ),

  studyResponses: defineTable(StudyResponse).index(
    "by_dcc_review",
    ["dccReviewId"],
    { unique: true },
  ),

  dccDecisions: defineTable(DccDecision).index(
    "by_dcc_review",
    ["dccReviewId"],
    { unique: true },
  ),
};
