// src/patching/normalizer.ts
// Canonical form of text for comparison only. Substitution always works on the raw document.

const ELLIPSIS_RE = /(?:\.{3,}|…+)/g;
const WHITESPACE_RE = /\s+/g;

/**
 * Replace ellipsis runs (`...`, `…`) with a space, collapse whitespace
 * runs (newlines included) to one space, trim.
 *
 * Idempotent: normalize(normalize(x)) === normalize(x).
 */
export function normalize(text: string): string {
  return text.replace(ELLIPSIS_RE, " ").replace(WHITESPACE_RE, " ").trim();
}

/** Whitespace-separated words of the normalized text. */
export function tokenize(text: string): string[] {
  const n = normalize(text);
  return n.length ? n.split(" ") : [];
}

/** Short single-line preview for logs and report reasons. */
export function preview(text: string, limit = 60): string {
  const n = normalize(text);
  return n.length <= limit ? n : `${n.slice(0, limit)}…`;
}
