import { Effect } from "effect";

import type {
  DeferIndexesOptions,
  DeferralResult,
  Section,
  SectionSnapshot,
} from "../contracts/section.js";
import type { TableNameNotFoundError } from "../errors.js";
import { LoggerServiceTag, type LoggerService } from "../services/logger-service.js";
import { extractConstraints, extractCreateTable, extractIndexes } from "./extract.js";
import { formatAlterTable, formatCreateTable, replaceCreateTable } from "./format.js";
import { describePreservedIndex, resolvePreservation } from "./resolve.js";

const INNODB_ENGINE_MARKER = "ENGINE=InnoDB";

/**
 * Rewrite one section so that secondary indexes (and, when asked, foreign
 * keys) are created after the data load. Returns a new snapshot; the input is
 * left as it was.
 *
 * Running this over output it already produced is unsupported: the deferred
 * clauses are gone from the DDL by then.
 */
export const deferIndexes = (
  snapshot: SectionSnapshot,
  options: DeferIndexesOptions = {},
): Effect.Effect<DeferralResult, TableNameNotFoundError, LoggerService> =>
  Effect.gen(function* () {
    const logger = yield* LoggerServiceTag;
    const { database, table, lines } = snapshot;
    const tableDdl = extractCreateTable(lines);

    if (!tableDdl.includes(INNODB_ENGINE_MARKER)) {
      yield* logger.debug(`${database}.${table} is not an InnoDB table, skipping index rewrite`, {
        database,
        table,
      });
      return {
        database,
        table,
        lines,
        alterTable: "",
        deferred: [],
        preserved: [],
        skipped: true,
      };
    }

    const plan = resolvePreservation(
      extractIndexes(tableDdl),
      extractConstraints(tableDdl),
      options.deferConstraints ?? false,
    );

    for (const preserved of plan.preserved) {
      yield* logger.warn(describePreservedIndex(database, table, preserved), {
        database,
        table,
        index: preserved.indexName,
        constraint: preserved.constraintName,
      });
    }

    const alterTable = yield* formatAlterTable(tableDdl, plan.deferred, { database, table });
    const patchedDdl = formatCreateTable(tableDdl, plan.deferred);

    return {
      database,
      table,
      lines: replaceCreateTable(lines, tableDdl, patchedDdl),
      alterTable,
      deferred: plan.deferred,
      preserved: plan.preserved,
      skipped: false,
    };
  });

/**
 * Strip deferrable clauses from the section's `CREATE TABLE` in place and
 * return the `ALTER TABLE` statement that restores them. The section is only
 * touched once the statement has been built.
 */
export const splitIndexes = (
  section: Section,
  options: DeferIndexesOptions = {},
): Effect.Effect<string, TableNameNotFoundError, LoggerService> =>
  Effect.gen(function* () {
    const lines = Array.from(section.lines);
    section.lines = lines;

    const result = yield* deferIndexes(
      { database: section.database, table: section.table, lines },
      options,
    );
    if (!result.skipped) {
      section.lines = [...result.lines];
    }
    return result.alterTable;
  });
