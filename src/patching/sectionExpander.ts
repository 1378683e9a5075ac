// src/patching/sectionExpander.ts
// Section Scope Expander: a heading-only anchor stands for its whole section
//
// The section runs from the heading to the next heading of equal or higher rank
// (fewer or equal `#`), or to the end of the document. Lines inside fenced code
// blocks never end a section.

import { findExact } from "./exactLocator";
import { firstLine, headingLevel, isFenceLine } from "./headings";

export interface SectionExpansion {
  /** Section text, or the anchor unchanged when it could not be expanded */
  text: string;
  /** False when the anchor is not a heading or is absent from the document */
  found: boolean;
}

/** Character offset where scanning for the section end starts. */
function scanStartAfter(document: string, anchorEnd: number): number {
  if (anchorEnd > 0 && document[anchorEnd - 1] === "\n") return anchorEnd;
  const nl = document.indexOf("\n", anchorEnd);
  return nl === -1 ? document.length : nl + 1;
}

function sectionEnd(document: string, from: number, level: number): number {
  let lineStart = from;
  let inFence = false;

  while (lineStart < document.length) {
    const nl = document.indexOf("\n", lineStart);
    const lineEnd = nl === -1 ? document.length : nl;
    const line = document.slice(lineStart, lineEnd);

    if (isFenceLine(line)) {
      inFence = !inFence;
    } else if (!inFence) {
      const lvl = headingLevel(line);
      if (lvl > 0 && lvl <= level) return lineStart;
    }

    if (nl === -1) break;
    lineStart = nl + 1;
  }

  return document.length;
}

/**
 * Expand a heading anchor into its full section.
 * Best effort: never throws, returns the anchor when expansion is impossible.
 */
export function expandSection(document: string, headingAnchor: string): SectionExpansion {
  const level = headingLevel(firstLine(headingAnchor));
  if (level === 0) return { text: headingAnchor, found: false };

  const start = findExact(headingAnchor, document);
  if (start === null) return { text: headingAnchor, found: false };

  const from = scanStartAfter(document, start + headingAnchor.length);
  const end = sectionEnd(document, from, level);

  return { text: document.slice(start, end).trimEnd(), found: true };
}

/** Standalone form used by callers that build replacement text for a section. */
export function expandHeading(document: string, headingAnchor: string): string {
  return expandSection(document, headingAnchor).text;
}
