import { Schema } from "effect";

import { ClauseEntrySchema, PreservedIndexSchema } from "./clauses.js";

/**
 * Mutable handle over one table's chunk of a dump. `lines` keep their
 * original terminators and are replaced wholesale by `splitIndexes`.
 */
export interface Section {
  readonly database: string;
  readonly table: string;
  lines: Iterable<string>;
}

export const SectionSnapshotSchema = Schema.Struct({
  database: Schema.String,
  table: Schema.String,
  lines: Schema.Array(Schema.String),
});

export const DeferIndexesOptionsSchema = Schema.Struct({
  deferConstraints: Schema.optional(Schema.Boolean),
});

export const DeferralResultSchema = Schema.Struct({
  database: Schema.String,
  table: Schema.String,
  lines: Schema.Array(Schema.String),
  alterTable: Schema.String,
  deferred: Schema.Array(ClauseEntrySchema),
  preserved: Schema.Array(PreservedIndexSchema),
  skipped: Schema.Boolean,
});

export type SectionSnapshot = Schema.Schema.Type<typeof SectionSnapshotSchema>;
export type DeferIndexesOptions = Schema.Schema.Type<typeof DeferIndexesOptionsSchema>;
export type DeferralResult = Schema.Schema.Type<typeof DeferralResultSchema>;
