// src/patching/diffSummary.ts
// Cheap before/after summary for a patched document: line counts and content hashes.

import { createHash } from "node:crypto";

export interface PatchSummary {
  originalLines: number;
  modifiedLines: number;
  lineDelta: number;
  /** sha256:<hex> of the input document */
  beforeHash: string;
  /** sha256:<hex> of the patched document */
  afterHash: string;
  /** e.g. "lines: +2 (10 → 12)" */
  text: string;
}

export function sha256Hex(text: string): string {
  return createHash("sha256").update(text, "utf8").digest("hex");
}

function signed(n: number): string {
  return n > 0 ? `+${n}` : String(n);
}

export function summarizePatch(before: string, after: string): PatchSummary {
  const originalLines = before.split("\n").length;
  const modifiedLines = after.split("\n").length;
  const lineDelta = modifiedLines - originalLines;

  return {
    originalLines,
    modifiedLines,
    lineDelta,
    beforeHash: `sha256:${sha256Hex(before)}`,
    afterHash: `sha256:${sha256Hex(after)}`,
    text: `lines: ${signed(lineDelta)} (${originalLines} → ${modifiedLines})`,
  };
}
