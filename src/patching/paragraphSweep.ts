// src/patching/paragraphSweep.ts
// Duplicate Paragraph Sweep: post-pass that drops later copies of a paragraph.
//
// Independent edits sometimes reintroduce text that already exists elsewhere. This is a
// safety net on top of the collision guard; the two overlap on purpose.

import { normalize } from "./normalizer";

/** Normalized characters compared per paragraph. */
export const SIGNATURE_LENGTH = 100;

const PARAGRAPH_SEPARATOR_RE = /(\n\s*\n)/;

export interface SweepResult {
  document: string;
  removed: number;
}

export function paragraphSignature(paragraph: string): string {
  return normalize(paragraph).slice(0, SIGNATURE_LENGTH);
}

/**
 * Remove every paragraph whose signature matches an earlier paragraph's.
 * The blank-line separator before a removed paragraph goes with it; everything
 * else is kept byte for byte.
 */
export function sweepDuplicateParagraphs(document: string): SweepResult {
  // split with a capture group: [para, sep, para, sep, ..., para]
  const parts = document.split(PARAGRAPH_SEPARATOR_RE);
  const seen = new Set<string>();
  let out = "";
  let removed = 0;

  for (let i = 0; i < parts.length; i += 2) {
    const paragraph = parts[i];
    const separator = i > 0 ? parts[i - 1] : "";
    const signature = paragraphSignature(paragraph);

    if (signature && seen.has(signature)) {
      removed++;
      continue;
    }
    if (signature) seen.add(signature);
    out += separator + paragraph;
  }

  if (removed === 0) return { document, removed };

  const trailing = document.slice(document.trimEnd().length);
  if (!out.endsWith(trailing)) out = out.trimEnd() + trailing;

  return { document: out, removed };
}
