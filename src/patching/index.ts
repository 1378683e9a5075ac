// src/patching/index.ts
// Patching: full pipeline for applying fuzzy-located edits to a Markdown document
//
// Flow of patch():
//   1. Validate the document (the only failure that aborts a run)
//   2. Hierarchical dedupe: drop edits covered by an ancestor chapter edit
//   3. Apply edits in order on one buffer (exact → fuzzy, collision guard); a
//      full-chapter heading anchor is expanded into its section against the
//      buffer at its turn, so earlier edits inside the section are included
//   4. Sweep duplicate paragraphs once

import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import { MalformedDocumentError } from "./errors";
import { dedupeHierarchical } from "./hierarchicalDedupe";
import { silentObserver } from "./observer";
import { sweepDuplicateParagraphs } from "./paragraphSweep";
import { applyPlanned, labelOf, type PlannedEdit } from "./patchApplier";
import { PatchReportBuilder } from "./report";
import { expandSection } from "./sectionExpander";
import type {
  EditRequest,
  PatchObserver,
  PatchOptions,
  PatchReport,
  PatchResult,
} from "./types";
import { isWellFormedText } from "../text/spans";
import { preview } from "./normalizer";

/* ============= Document Validation ============= */

export function assertPatchableDocument(document: unknown): asserts document is string {
  if (typeof document !== "string") {
    throw new MalformedDocumentError(`expected text, got ${typeof document}`);
  }
  if (!isWellFormedText(document)) {
    throw new MalformedDocumentError("contains unpaired surrogate code units");
  }
}

/* ============= Heading Expansion ============= */

function expandEdit(
  buffer: string,
  edit: EditRequest,
  index: number,
  observer: PatchObserver
): EditRequest {
  if (!edit.isFullChapter || !edit.originalText.startsWith("#")) return edit;

  const location = labelOf(edit, index);
  const expansion = expandSection(buffer, edit.originalText);

  if (!expansion.found) {
    observer.notify({
      type: "expansion_failed",
      location,
      anchorPreview: preview(edit.originalText),
    });
    return edit;
  }

  if (expansion.text === edit.originalText) return edit;

  observer.notify({
    type: "expanded",
    location,
    fromLength: edit.originalText.length,
    toLength: expansion.text.length,
  });
  return { ...edit, originalText: expansion.text };
}

/* ============= Main Entry Point ============= */

/**
 * Apply a batch of approximately-located edits to `document`.
 *
 * Individual edit failures never abort the run; they are listed in the report.
 * Throws MalformedDocumentError only when the document itself is unusable.
 */
export function patch(
  document: string,
  edits: readonly EditRequest[],
  options: PatchOptions = {}
): PatchResult {
  assertPatchableDocument(document);
  const observer = options.observer ?? silentObserver;
  const report = new PatchReportBuilder();

  const { kept, subsumed } = dedupeHierarchical(edits);

  for (const s of subsumed) {
    const location = labelOf(s.edit, s.index);
    const parentLocation = labelOf(edits[s.parentIndex], s.parentIndex);
    observer.notify({ type: "subsumed", location, parentLocation });
    report.record({
      index: s.index,
      location,
      status: "skipped_subsumed",
      reason: `covered by ${parentLocation}`,
    });
  }

  const planned: PlannedEdit[] = kept.map(({ edit, index }) => ({ edit, index }));

  let patched = applyPlanned(document, planned, report, observer, (edit, index, buffer) =>
    expandEdit(buffer, edit, index, observer)
  );

  if (options.sweep !== false) {
    const swept = sweepDuplicateParagraphs(patched);
    patched = swept.document;
    report.setSwept(swept.removed);
    observer.notify({ type: "swept", removed: swept.removed });
  }

  return { document: patched, report: report.build() };
}

/* ============= Independent Documents ============= */

export interface PatchJob {
  id: string;
  document: string;
  edits: readonly EditRequest[];
}

export type PatchJobResult =
  | { id: string; ok: true; document: string; report: PatchReport }
  | { id: string; ok: false; error: string };

/**
 * Patch several independent documents. Each job owns its buffer; results keep
 * input order. A malformed document fails its own job only.
 */
export async function patchMany(
  jobs: readonly PatchJob[],
  options: PatchOptions = {}
): Promise<PatchJobResult[]> {
  return Promise.all(
    jobs.map(async (job): Promise<PatchJobResult> => {
      await yieldToEventLoop();
      try {
        const { document, report } = patch(job.document, job.edits, options);
        return { id: job.id, ok: true, document, report };
      } catch (err) {
        if (err instanceof MalformedDocumentError) {
          return { id: job.id, ok: false, error: err.message };
        }
        throw err;
      }
    })
  );
}

/* ============= Re-exports ============= */

export { expandHeading, expandSection } from "./sectionExpander";
export { applyEdits, locateAnchor, wouldDuplicate } from "./patchApplier";
export { dedupeHierarchical } from "./hierarchicalDedupe";
export { findExact } from "./exactLocator";
export { findFuzzy, locateFuzzy } from "./fuzzyLocator";
export { normalize } from "./normalizer";
export { sweepDuplicateParagraphs } from "./paragraphSweep";
export { parseEditRequest, parseEditRequests } from "./editRequest";
export { summarizePatch, type PatchSummary } from "./diffSummary";
export { MalformedDocumentError } from "./errors";
export {
  combineObservers,
  createLoggingObserver,
  RecordingObserver,
  silentObserver,
} from "./observer";
export type {
  ConfidenceTier,
  EditOutcome,
  EditRequest,
  EditStatus,
  FailedEdit,
  HeadingInfo,
  MatchResult,
  PatchEvent,
  PatchObserver,
  PatchOptions,
  PatchReport,
  PatchResult,
} from "./types";
