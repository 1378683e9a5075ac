// src/patching/errors.ts

/** The input document is not usable text; the only failure that aborts a patch run. */
export class MalformedDocumentError extends Error {
  constructor(detail: string) {
    super(`Malformed document: ${detail}`);
    this.name = "MalformedDocumentError";
  }
}

/* Per-edit failure reasons recorded in PatchReport.failed */
export const FAILURE_REASONS = {
  missingAnchor: "missing original_text",
  anchorNotFound: "anchor not found",
  collisionGuard: "collision guard: replacement text already present",
} as const;

export type FailureReason = (typeof FAILURE_REASONS)[keyof typeof FAILURE_REASONS];
