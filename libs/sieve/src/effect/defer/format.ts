import { Effect } from "effect";

import type { ClauseEntry } from "../contracts/clauses.js";
import type { TableNameNotFoundError } from "../errors.js";
import { extractTableName, type TableIdentity } from "./extract.js";
import { splitLines } from "./lines.js";

const stripTrailingComma = (value: string): string => value.replace(/,+$/, "");

/**
 * Re-emit the DDL without the deferred clause lines. The body line left just
 * before the closing `)` loses its trailing comma.
 */
export const formatCreateTable = (tableDdl: string, deferred: readonly ClauseEntry[]): string => {
  const deferredLines = new Set(deferred.map((clause) => clause.rawLine));
  const result: string[] = [];

  for (const line of splitLines(tableDdl)) {
    const previous = result.at(-1);
    if (previous !== undefined && line.startsWith(")")) {
      result[result.length - 1] = `${stripTrailingComma(previous.trimEnd())}\n`;
    }
    if (!deferredLines.has(line)) {
      result.push(line);
    }
  }

  return result.join("");
};

/** Swap every occurrence of the original DDL in the section text. */
export const replaceCreateTable = (
  lines: readonly string[],
  tableDdl: string,
  patchedDdl: string,
): string[] => splitLines(lines.join("").split(tableDdl).join(patchedDdl));

export const ALTER_TABLE_BANNER = [
  "--",
  "-- InnoDB Fast Index Creation (generated by dumpsieve)",
  "--",
  "",
] as const;

export const formatAlterTable = (
  tableDdl: string,
  deferred: readonly ClauseEntry[],
  identity: TableIdentity,
): Effect.Effect<string, TableNameNotFoundError> => {
  if (deferred.length === 0) {
    return Effect.succeed("");
  }

  return extractTableName(tableDdl, identity).pipe(
    Effect.map((name) => {
      const clauses = deferred.map(
        (clause) => `  ADD ${stripTrailingComma(clause.rawLine.trim())}`,
      );
      const statement = [...ALTER_TABLE_BANNER, `ALTER TABLE \`${name}\``, clauses.join(",\n")];
      return `${statement.join("\n")};`;
    }),
  );
};
