import assert from "node:assert/strict";
import { test } from "node:test";

import { joinLines, makeSection, splitLines, stripLineTerminator } from "../src/effect/defer/lines.js";

test("splitLines keeps each terminator on its line", () => {
  assert.deepEqual(splitLines("a\r\nb\rc\nd"), ["a\r\n", "b\r", "c\n", "d"]);
});

test("splitLines keeps blank lines and yields nothing for empty text", () => {
  assert.deepEqual(splitLines("\n\n"), ["\n", "\n"]);
  assert.deepEqual(splitLines(""), []);
});

test("stripLineTerminator only drops a final newline", () => {
  assert.equal(stripLineTerminator("KEY `a` (`a`),\n"), "KEY `a` (`a`),");
  assert.equal(stripLineTerminator("KEY `a` (`a`),\r\n"), "KEY `a` (`a`),\r");
  assert.equal(stripLineTerminator("no newline"), "no newline");
});

test("makeSection splits text and joinLines restores it", () => {
  const text = "DROP TABLE IF EXISTS `t`;\nCREATE TABLE `t` (\n  `a` int\n) ENGINE=InnoDB;\n";
  const section = makeSection("shop", "t", text);

  assert.equal(section.database, "shop");
  assert.equal(section.table, "t");
  assert.deepEqual(Array.from(section.lines), [
    "DROP TABLE IF EXISTS `t`;\n",
    "CREATE TABLE `t` (\n",
    "  `a` int\n",
    ") ENGINE=InnoDB;\n",
  ]);
  assert.equal(joinLines(section.lines), text);
});
