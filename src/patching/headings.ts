// src/patching/headings.ts
// Markdown ATX heading helpers shared by the expander and the hierarchical dedupe.

import type { HeadingInfo } from "./types";

/** `#`..`######` followed by whitespace or end of line. */
const HEADING_RE = /^(#{1,6})(?:[ \t]+(.*))?$/;
const CHAPTER_NUMBER_RE = /^(\d+(?:\.\d+)*)/;
const FENCE_RE = /^\s{0,3}(```|~~~)/;

/** First line of a text, without a trailing carriage return. */
export function firstLine(text: string): string {
  const nl = text.indexOf("\n");
  const line = nl === -1 ? text : text.slice(0, nl);
  return line.replace(/\r$/, "");
}

/** Heading level of a single line, or 0 when it is not a heading. */
export function headingLevel(line: string): number {
  const m = HEADING_RE.exec(line.replace(/\r$/, ""));
  return m ? m[1].length : 0;
}

/**
 * Parse a heading line. Returns null for non-heading lines.
 *
 * @example
 * parseHeading("## 3.1 Vision") // { level: 2, chapterNumber: "3.1" }
 */
export function parseHeading(line: string): HeadingInfo | null {
  const m = HEADING_RE.exec(line.trim());
  if (!m) return null;

  const title = (m[2] ?? "").trim();
  const num = CHAPTER_NUMBER_RE.exec(title);
  return num ? { level: m[1].length, chapterNumber: num[1] } : { level: m[1].length };
}

/** True for the opening or closing line of a fenced code block. */
export function isFenceLine(line: string): boolean {
  return FENCE_RE.test(line);
}
