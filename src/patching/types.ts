// src/patching/types.ts
// Patching: shared type definitions for the edit-application pipeline

/* ============= Edit Requests ============= */

/**
 * One edit proposed by the model layer.
 * The anchor (`originalText`) may be imprecise or a bare heading line.
 */
export interface EditRequest {
  /** Human label, e.g. a chapter name or "paragraph 3" */
  location: string;
  /** Text the proposer believes it is replacing */
  originalText: string;
  modifiedText: string;
  reason: string;
  modificationType: string;
  /** Anchor may be a heading line that stands for its whole section */
  isFullChapter: boolean;
}

/** Heading metadata derived from a Markdown heading line. */
export interface HeadingInfo {
  /** 1..6, the length of the leading `#` run */
  level: number;
  /** Leading dotted numeral, e.g. "3.1"; absent for unnumbered headings */
  chapterNumber?: string;
}

/* ============= Matching ============= */

export type ConfidenceTier =
  | "exact"
  | "fuzzy_high"
  | "fuzzy_mid"
  | "fuzzy_low"
  | "not_found";

export interface MatchResult {
  /** Region text exactly as it appears in the document */
  matchedText: string;
  /** UTF-16 offset of `matchedText` in the document */
  startOffset: number;
  confidenceTier: ConfidenceTier;
  /** Word-overlap score; 1 for exact hits */
  similarity: number;
}

/* ============= Reports ============= */

export type EditStatus =
  | "applied"
  | "skipped_noop"
  | "skipped_duplicate"
  | "skipped_subsumed"
  | "failed";

export interface EditOutcome {
  /** Position of the edit in the caller's list */
  index: number;
  location: string;
  status: EditStatus;
  tier?: ConfidenceTier;
  reason?: string;
}

export interface FailedEdit {
  location: string;
  reason: string;
}

export interface PatchReport {
  readonly applied: readonly string[];
  /** Identical anchors and hierarchically subsumed edits */
  readonly skippedDuplicate: readonly string[];
  readonly skippedNoop: readonly string[];
  readonly failed: readonly FailedEdit[];
  /** Applied through the 0.7 or 0.5 fuzzy tier */
  readonly lowConfidence: readonly string[];
  readonly outcomes: readonly EditOutcome[];
  /** Paragraphs removed by the duplicate sweep */
  readonly sweptParagraphs: number;
}

export interface PatchResult {
  document: string;
  report: PatchReport;
}

/* ============= Observer Events ============= */

export type PatchEvent =
  | { type: "exact_match"; location: string; offset: number }
  | { type: "fuzzy_match"; location: string; tier: ConfidenceTier; similarity: number }
  | { type: "collision_guard"; location: string; replacementPreview: string }
  | { type: "not_found"; location: string; anchorPreview: string }
  | { type: "noop"; location: string }
  | { type: "duplicate"; location: string }
  | { type: "subsumed"; location: string; parentLocation: string }
  | { type: "expanded"; location: string; fromLength: number; toLength: number }
  | { type: "expansion_failed"; location: string; anchorPreview: string }
  | { type: "applied"; location: string; tier: ConfidenceTier }
  | { type: "swept"; removed: number };

export type PatchEventType = PatchEvent["type"];

/**
 * Reporter the pipeline calls at fixed checkpoints.
 * Implementations must not throw; the pipeline does not guard calls.
 */
export interface PatchObserver {
  notify(event: PatchEvent): void;
}

export interface PatchOptions {
  observer?: PatchObserver;
  /** Run the duplicate-paragraph sweep after application (default true) */
  sweep?: boolean;
}
