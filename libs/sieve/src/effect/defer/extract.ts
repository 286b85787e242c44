import { Effect } from "effect";

import type { ClauseEntry, ClauseKind, ColumnList } from "../contracts/clauses.js";
import { TableNameNotFoundError } from "../errors.js";
import { splitLines, stripLineTerminator } from "./lines.js";

const CREATE_TABLE_PREFIX = "CREATE TABLE";

/**
 * Collect the `CREATE TABLE` statement: the opening line through the first
 * later line ending in `;`. Returns "" when the section has no such line.
 */
export const extractCreateTable = (lines: Iterable<string>): string => {
  const result: string[] = [];

  for (const line of lines) {
    if (line.startsWith(CREATE_TABLE_PREFIX)) {
      result.push(line);
    } else if (result.length > 0) {
      result.push(line);
      if (line.trimEnd().endsWith(";")) {
        break;
      }
    }
  }

  return result.join("");
};

const QUOTE = "`";
const DELIMITER = ",";

/**
 * Read a comma separated list of backtick quoted identifiers. A doubled
 * backtick inside a quoted field is a literal backtick, and spaces
 * following a delimiter are skipped.
 */
export const parseColumns = (value: string): ColumnList => {
  if (value.length === 0) {
    return [];
  }

  const fields: string[] = [];
  let field = "";
  let quoted = false;
  let atFieldStart = true;

  for (let index = 0; index < value.length; index += 1) {
    const char = value.charAt(index);

    if (quoted) {
      if (char !== QUOTE) {
        field += char;
      } else if (value.charAt(index + 1) === QUOTE) {
        field += QUOTE;
        index += 1;
      } else {
        quoted = false;
      }
      continue;
    }

    if (char === DELIMITER) {
      fields.push(field);
      field = "";
      atFieldStart = true;
      continue;
    }

    if (atFieldStart && char === " ") {
      continue;
    }

    if (atFieldStart && char === QUOTE) {
      quoted = true;
      atFieldStart = false;
      continue;
    }

    atFieldStart = false;
    field += char;
  }

  fields.push(field);
  return fields;
};

const KEY_PATTERN = /^\s*(?:UNIQUE )?KEY (`.+`) \((.+)\)(?: USING (?:BTREE|HASH))?,?$/;

const CONSTRAINT_PATTERN = /^\s*CONSTRAINT (`.+`) FOREIGN KEY \((.+)\) REFERENCES/;

const extractClauses = (
  tableDdl: string,
  kind: ClauseKind,
  pattern: RegExp,
  prepare: (line: string) => string,
): ClauseEntry[] => {
  const result: ClauseEntry[] = [];

  for (const line of splitLines(tableDdl)) {
    const match = pattern.exec(prepare(line));
    const name = match?.[1];
    const columns = match?.[2];
    if (name === undefined || columns === undefined) {
      continue;
    }

    result.push({
      kind,
      name: parseColumns(name)[0] ?? "",
      columns: parseColumns(columns),
      rawLine: line,
    });
  }

  return result;
};

/** Secondary `KEY` / `UNIQUE KEY` clauses, one per line. */
export const extractIndexes = (tableDdl: string): ClauseEntry[] =>
  extractClauses(tableDdl, "index", KEY_PATTERN, stripLineTerminator);

/** `CONSTRAINT ... FOREIGN KEY (...) REFERENCES ...` clauses, one per line. */
export const extractConstraints = (tableDdl: string): ClauseEntry[] =>
  extractClauses(tableDdl, "constraint", CONSTRAINT_PATTERN, (line) => line);

const TABLE_NAME_PATTERN = /^CREATE TABLE .*`(.+)` \($/;

export interface TableIdentity {
  readonly database: string;
  readonly table: string;
}

export const extractTableName = (
  tableDdl: string,
  identity: TableIdentity,
): Effect.Effect<string, TableNameNotFoundError> => {
  for (const line of tableDdl.split(/\r\n|\r|\n/)) {
    const name = TABLE_NAME_PATTERN.exec(line)?.[1];
    if (name !== undefined) {
      return Effect.succeed(name);
    }
  }

  return Effect.fail(
    new TableNameNotFoundError({
      database: identity.database,
      table: identity.table,
      ddl: tableDdl,
      message: `Failed to find table name from DDL for ${identity.database}.${identity.table}`,
    }),
  );
};
