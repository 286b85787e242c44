import type {
  ClauseEntry,
  ColumnList,
  PreservationPlan,
  PreservedIndex,
} from "../contracts/clauses.js";

const isColumnPrefix = (prefix: ColumnList, columns: ColumnList): boolean => {
  const head = columns.slice(0, prefix.length);
  return head.length === prefix.length && head.every((column, index) => column === prefix[index]);
};

/**
 * Decide which clauses move to the post-load `ALTER TABLE`.
 *
 * With `deferConstraints` every index and constraint is deferred. Otherwise
 * each foreign key keeps the narrowest index whose leading columns are exactly
 * the constraint's columns, and stays in place with it; a foreign key with no
 * such index is deferred along with the indexes.
 */
export const resolvePreservation = (
  indexes: readonly ClauseEntry[],
  constraints: readonly ClauseEntry[],
  deferConstraints: boolean,
): PreservationPlan => {
  if (deferConstraints) {
    return { deferred: [...indexes, ...constraints], preserved: [] };
  }

  const byWidth = [...indexes].sort((left, right) => left.columns.length - right.columns.length);
  const preserved: PreservedIndex[] = [];
  const keptLines = new Set<string>();
  const deferredConstraints: ClauseEntry[] = [];

  for (const constraint of constraints) {
    const index = byWidth.find((candidate) =>
      isColumnPrefix(constraint.columns, candidate.columns),
    );

    if (index === undefined) {
      deferredConstraints.push(constraint);
      continue;
    }

    keptLines.add(index.rawLine);
    preserved.push({
      indexName: index.name,
      columns: index.columns,
      rawLine: index.rawLine,
      constraintName: constraint.name,
    });
  }

  return {
    deferred: [...indexes.filter((index) => !keptLines.has(index.rawLine)), ...deferredConstraints],
    preserved,
  };
};

export const describePreservedIndex = (
  database: string,
  table: string,
  preserved: PreservedIndex,
): string =>
  `${database}.${table} index \`${preserved.indexName}\` not deferred - used by constraint \`${preserved.constraintName}\``;
