import { Schema } from "effect";

export const ClauseKindSchema = Schema.Literal("index", "constraint");

// Column order is significant: prefix matching between constraints and
// indexes is positional.
export const ColumnListSchema = Schema.Array(Schema.String);

export const ClauseEntrySchema = Schema.Struct({
  kind: ClauseKindSchema,
  name: Schema.String,
  columns: ColumnListSchema,
  rawLine: Schema.String,
});

export const PreservedIndexSchema = Schema.Struct({
  indexName: Schema.String,
  columns: ColumnListSchema,
  rawLine: Schema.String,
  constraintName: Schema.String,
});

export const PreservationPlanSchema = Schema.Struct({
  deferred: Schema.Array(ClauseEntrySchema),
  preserved: Schema.Array(PreservedIndexSchema),
});

export type ClauseKind = Schema.Schema.Type<typeof ClauseKindSchema>;
export type ColumnList = Schema.Schema.Type<typeof ColumnListSchema>;
export type ClauseEntry = Schema.Schema.Type<typeof ClauseEntrySchema>;
export type PreservedIndex = Schema.Schema.Type<typeof PreservedIndexSchema>;
export type PreservationPlan = Schema.Schema.Type<typeof PreservationPlanSchema>;
