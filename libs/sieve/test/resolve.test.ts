import assert from "node:assert/strict";
import { test } from "node:test";

import type { ClauseEntry } from "../src/effect/contracts/clauses.js";
import { describePreservedIndex, resolvePreservation } from "../src/effect/defer/resolve.js";

const index = (name: string, ...columns: string[]): ClauseEntry => ({
  kind: "index",
  name,
  columns,
  rawLine: `  KEY \`${name}\` (${columns.map((column) => `\`${column}\``).join(",")}),\n`,
});

const constraint = (name: string, ...columns: string[]): ClauseEntry => ({
  kind: "constraint",
  name,
  columns,
  rawLine: `  CONSTRAINT \`${name}\` FOREIGN KEY (${columns.map((column) => `\`${column}\``).join(",")}) REFERENCES \`parent\` (\`id\`),\n`,
});

const names = (clauses: readonly ClauseEntry[]) => clauses.map((clause) => clause.name);

test("an index shorter than the constraint never satisfies it", () => {
  const plan = resolvePreservation(
    [index("idx_a", "a"), index("idx_abc", "a", "b", "c")],
    [constraint("fk_ab", "a", "b")],
    false,
  );

  assert.deepEqual(
    plan.preserved.map((preserved) => [preserved.indexName, preserved.constraintName]),
    [["idx_abc", "fk_ab"]],
  );
  assert.deepEqual(names(plan.deferred), ["idx_a"]);
});

test("an index of equal width is preferred over a wider one", () => {
  const plan = resolvePreservation(
    [index("idx_abc", "a", "b", "c"), index("idx_ab", "a", "b")],
    [constraint("fk_ab", "a", "b")],
    false,
  );

  assert.deepEqual(
    plan.preserved.map((preserved) => preserved.indexName),
    ["idx_ab"],
  );
  assert.deepEqual(names(plan.deferred), ["idx_abc"]);
});

test("columns must match in order, not as a set", () => {
  const plan = resolvePreservation(
    [index("idx_ba", "b", "a")],
    [constraint("fk_ab", "a", "b")],
    false,
  );

  assert.deepEqual(plan.preserved, []);
  assert.deepEqual(names(plan.deferred), ["idx_ba", "fk_ab"]);
});

test("ties on width keep source order", () => {
  const plan = resolvePreservation(
    [index("idx_first", "a", "x"), index("idx_second", "a", "y")],
    [constraint("fk_a", "a")],
    false,
  );

  assert.deepEqual(
    plan.preserved.map((preserved) => preserved.indexName),
    ["idx_first"],
  );
  assert.deepEqual(names(plan.deferred), ["idx_second"]);
});

test("a constraint without a supporting index is deferred after the indexes", () => {
  const plan = resolvePreservation(
    [index("idx_a", "a"), index("idx_c", "c")],
    [constraint("fk_b", "b"), constraint("fk_c", "c")],
    false,
  );

  assert.deepEqual(names(plan.deferred), ["idx_a", "fk_b"]);
  assert.deepEqual(
    plan.preserved.map((preserved) => [preserved.indexName, preserved.constraintName]),
    [["idx_c", "fk_c"]],
  );
});

test("two constraints may share one preserved index", () => {
  const plan = resolvePreservation(
    [index("idx_a", "a", "b")],
    [constraint("fk_a", "a"), constraint("fk_ab", "a", "b")],
    false,
  );

  assert.deepEqual(
    plan.preserved.map((preserved) => [preserved.indexName, preserved.constraintName]),
    [
      ["idx_a", "fk_a"],
      ["idx_a", "fk_ab"],
    ],
  );
  assert.deepEqual(plan.deferred, []);
});

test("deferring constraints defers everything and preserves nothing", () => {
  const plan = resolvePreservation(
    [index("idx_a", "a"), index("idx_ab", "a", "b")],
    [constraint("fk_a", "a")],
    true,
  );

  assert.deepEqual(names(plan.deferred), ["idx_a", "idx_ab", "fk_a"]);
  assert.deepEqual(plan.preserved, []);
});

test("describePreservedIndex names the table, index and constraint", () => {
  assert.equal(
    describePreservedIndex("shop", "orders", {
      indexName: "idx_customer",
      columns: ["customer_id"],
      rawLine: "  KEY `idx_customer` (`customer_id`),\n",
      constraintName: "fk_customer",
    }),
    "shop.orders index `idx_customer` not deferred - used by constraint `fk_customer`",
  );
});
