// src/patching/hierarchicalDedupe.ts
// Hierarchical Edit Deduplicator
//
// An edit on "# 3 Design" already covers "## 3.1 Vision"; applying both would rewrite
// the subsection twice. Child edits are dropped when an ancestor edit is present.

import { parseHeading } from "./headings";
import type { EditRequest, HeadingInfo } from "./types";

export interface SubsumedEdit<T> {
  edit: T;
  /** Position in the input list */
  index: number;
  /** Position of the ancestor edit that covers it */
  parentIndex: number;
}

export interface HierarchicalDedupeResult<T> {
  /** Surviving edits in input order, with their input positions */
  kept: Array<{ edit: T; index: number }>;
  subsumed: SubsumedEdit<T>[];
}

type NumberedHeading = Required<HeadingInfo>;

/** Only a single-line anchor counts as a heading edit; a heading followed by body text is ordinary text. */
function numberedHeadingOf(edit: Pick<EditRequest, "originalText">): NumberedHeading | null {
  const anchor = edit.originalText.trim();
  if (anchor.includes("\n")) return null;
  const info = parseHeading(anchor);
  if (!info || info.chapterNumber === undefined) return null;
  return { level: info.level, chapterNumber: info.chapterNumber };
}

/** True when `child` is a strict descendant of `parent`. */
export function isDescendant(child: NumberedHeading, parent: NumberedHeading): boolean {
  return (
    child.level > parent.level &&
    child.chapterNumber.startsWith(`${parent.chapterNumber}.`)
  );
}

/**
 * Remove edits whose heading is a strict descendant of another edit's heading.
 * Non-heading edits and unnumbered headings always survive.
 */
export function dedupeHierarchical<T extends Pick<EditRequest, "originalText">>(
  edits: readonly T[]
): HierarchicalDedupeResult<T> {
  const headings = edits.map(numberedHeadingOf);
  const kept: Array<{ edit: T; index: number }> = [];
  const subsumed: SubsumedEdit<T>[] = [];

  edits.forEach((edit, j) => {
    const child = headings[j];
    const parentIndex = child
      ? headings.findIndex((parent, i) => i !== j && parent !== null && isDescendant(child, parent))
      : -1;

    if (parentIndex === -1) kept.push({ edit, index: j });
    else subsumed.push({ edit, index: j, parentIndex });
  });

  return { kept, subsumed };
}
