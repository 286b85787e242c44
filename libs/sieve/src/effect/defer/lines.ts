import type { Section } from "../contracts/section.js";

const LINE_PATTERN = /[^\r\n]*(?:\r\n|\r|\n)|[^\r\n]+/g;

/**
 * Split text into lines, each keeping its terminator. The last line may have
 * none; an empty text has no lines.
 */
export const splitLines = (text: string): string[] => text.match(LINE_PATTERN) ?? [];

export const stripLineTerminator = (line: string): string =>
  line.endsWith("\n") ? line.slice(0, -1) : line;

export const joinLines = (lines: Iterable<string>): string => Array.from(lines).join("");

export const makeSection = (database: string, table: string, text: string): Section => ({
  database,
  table,
  lines: splitLines(text),
});
