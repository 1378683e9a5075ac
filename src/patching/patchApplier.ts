// src/patching/patchApplier.ts
// Patch Applier: sequential application of located edits to one working buffer
//
// Per edit, in list order:
//   1. Identical normalized anchors → only the first is processed
//   2. Normalized anchor == normalized replacement → no-op
//   3. Exact location, then fuzzy location at 0.8 / 0.7 / 0.5
//   4. Collision guard
//   5. Substitute the first occurrence of the located region
//
// Each substitution is visible to the search of every later edit. Overlapping but
// non-identical anchors are not reconciled beyond the collision guard.

import { findExact } from "./exactLocator";
import { FAILURE_REASONS } from "./errors";
import { locateFuzzy } from "./fuzzyLocator";
import { normalize, preview } from "./normalizer";
import { silentObserver } from "./observer";
import { PatchReportBuilder } from "./report";
import type {
  EditRequest,
  MatchResult,
  PatchObserver,
  PatchResult,
} from "./types";
import { replaceSpan, spanAt, textOutside, type Span } from "../text/spans";

/* ============= Constants ============= */

/** Replacements shorter than this (trimmed) are too generic for the collision guard. */
export const MIN_COLLISION_LENGTH = 20;

/* ============= Types ============= */

/** An edit together with its position in the caller's original list. */
export interface PlannedEdit {
  edit: EditRequest;
  index: number;
}

/**
 * Rewrites an edit against the buffer as it stands when the edit's turn comes,
 * after every earlier substitution.
 */
export type PrepareEdit = (edit: EditRequest, index: number, buffer: string) => EditRequest;

/* ============= Helpers ============= */

export function labelOf(edit: Pick<EditRequest, "location">, index: number): string {
  const loc = edit.location.trim();
  return loc || `edit #${index + 1}`;
}

/** Exact hit first, fuzzy tiers after. */
export function locateAnchor(anchor: string, document: string): MatchResult | null {
  const offset = findExact(anchor, document);
  if (offset !== null) {
    return { matchedText: anchor, startOffset: offset, confidenceTier: "exact", similarity: 1 };
  }
  return locateFuzzy(anchor, document);
}

/**
 * True when inserting `replacement` over `region` would most likely create a
 * second copy of text the document already holds elsewhere.
 */
export function wouldDuplicate(
  document: string,
  region: Span,
  replacement: string,
  anchor: string
): boolean {
  const needle = replacement.trim();
  if (needle.length < MIN_COLLISION_LENGTH) return false;
  if (anchor.includes(needle)) return false;
  if (document.slice(region.start, region.end).includes(needle)) return false;
  return textOutside(document, region).includes(needle);
}

/* ============= Application ============= */

/**
 * Apply planned edits and record one outcome per edit into `report`.
 * Returns the final buffer.
 */
export function applyPlanned(
  document: string,
  planned: readonly PlannedEdit[],
  report: PatchReportBuilder,
  observer: PatchObserver,
  prepare?: PrepareEdit
): string {
  let buffer = document;
  const seenAnchors = new Set<string>();

  for (const item of planned) {
    const { index } = item;
    const edit = prepare ? prepare(item.edit, index, buffer) : item.edit;
    const location = labelOf(edit, index);

    if (!edit.originalText.trim()) {
      report.record({ index, location, status: "failed", reason: FAILURE_REASONS.missingAnchor });
      continue;
    }

    const anchorKey = normalize(edit.originalText);
    if (seenAnchors.has(anchorKey)) {
      observer.notify({ type: "duplicate", location });
      report.record({ index, location, status: "skipped_duplicate" });
      continue;
    }
    seenAnchors.add(anchorKey);

    if (anchorKey === normalize(edit.modifiedText)) {
      observer.notify({ type: "noop", location });
      report.record({ index, location, status: "skipped_noop" });
      continue;
    }

    const match = locateAnchor(edit.originalText, buffer);
    if (!match) {
      observer.notify({ type: "not_found", location, anchorPreview: preview(edit.originalText) });
      report.record({
        index,
        location,
        status: "failed",
        tier: "not_found",
        reason: FAILURE_REASONS.anchorNotFound,
      });
      continue;
    }

    if (match.confidenceTier === "exact") {
      observer.notify({ type: "exact_match", location, offset: match.startOffset });
    } else {
      observer.notify({
        type: "fuzzy_match",
        location,
        tier: match.confidenceTier,
        similarity: match.similarity,
      });
    }

    // First occurrence of the region text; for fuzzy hits this may precede the scored region.
    const region = spanAt(buffer.indexOf(match.matchedText), match.matchedText);

    if (wouldDuplicate(buffer, region, edit.modifiedText, edit.originalText)) {
      observer.notify({
        type: "collision_guard",
        location,
        replacementPreview: preview(edit.modifiedText),
      });
      report.record({
        index,
        location,
        status: "failed",
        tier: match.confidenceTier,
        reason: FAILURE_REASONS.collisionGuard,
      });
      continue;
    }

    buffer = replaceSpan(buffer, region, edit.modifiedText);
    observer.notify({ type: "applied", location, tier: match.confidenceTier });
    report.record({ index, location, status: "applied", tier: match.confidenceTier });
  }

  return buffer;
}

/**
 * Apply `edits` in order to `document`. No dedupe across heading levels, no
 * section expansion and no sweep; see `patch` for the full pipeline.
 */
export function applyEdits(
  document: string,
  edits: readonly EditRequest[],
  observer: PatchObserver = silentObserver
): PatchResult {
  const report = new PatchReportBuilder();
  const planned = edits.map((edit, index) => ({ edit, index }));
  const patched = applyPlanned(document, planned, report, observer);
  return { document: patched, report: report.build() };
}
