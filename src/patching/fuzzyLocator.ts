// src/patching/fuzzyLocator.ts
// Fuzzy Region Locator: word-overlap matching when an anchor is not present verbatim
//
// Two granularities, tried in order:
//   1. Paragraphs (blank-line separated)
//   2. Lines ("sentences" in the model's sense: one per line once blank lines are collapsed)
//
// The first region at or above the threshold wins. There is no search for the *best*
// region; the edit source is too noisy for a ranking to mean much.

import { normalize, tokenize } from "./normalizer";
import type { ConfidenceTier, MatchResult } from "./types";

/* ============= Constants ============= */

/** Anchors shorter than this (normalized) are exact-only. */
export const MIN_FUZZY_ANCHOR_LENGTH = 20;

/** Thresholds tried by locateFuzzy, highest first. */
export const FUZZY_TIERS: ReadonlyArray<{ tier: ConfidenceTier; threshold: number }> = [
  { tier: "fuzzy_high", threshold: 0.8 },
  { tier: "fuzzy_mid", threshold: 0.7 },
  { tier: "fuzzy_low", threshold: 0.5 },
];

/* ============= Types ============= */

/** A trimmed slice of the document with its offset. */
export interface TextRegion {
  text: string;
  start: number;
}

/* ============= Region Splitting ============= */

function pushTrimmed(regions: TextRegion[], raw: string, start: number): void {
  const text = raw.trim();
  if (!text) return;
  const lead = raw.length - raw.trimStart().length;
  regions.push({ text, start: start + lead });
}

/** Paragraphs delimited by one or more blank lines. */
export function splitParagraphs(document: string): TextRegion[] {
  const regions: TextRegion[] = [];
  const re = /\n\s*\n/g;
  let lastEnd = 0;
  let m: RegExpExecArray | null;

  while ((m = re.exec(document)) !== null) {
    pushTrimmed(regions, document.slice(lastEnd, m.index), lastEnd);
    lastEnd = m.index + m[0].length;
  }
  pushTrimmed(regions, document.slice(lastEnd), lastEnd);

  return regions;
}

/** Non-empty lines. */
export function splitLines(document: string): TextRegion[] {
  const regions: TextRegion[] = [];
  let offset = 0;
  for (const line of document.split("\n")) {
    pushTrimmed(regions, line, offset);
    offset += line.length + 1;
  }
  return regions;
}

/* ============= Scoring ============= */

/**
 * Share of distinct anchor tokens that also occur in the region.
 * 0 when the anchor has no tokens.
 */
export function overlapSimilarity(anchor: string, region: string): number {
  const anchorTokens = new Set(tokenize(anchor));
  if (anchorTokens.size === 0) return 0;

  const regionTokens = new Set(tokenize(region));
  let hits = 0;
  for (const t of anchorTokens) {
    if (regionTokens.has(t)) hits++;
  }
  return hits / anchorTokens.size;
}

function firstQualifying(
  anchor: string,
  regions: TextRegion[],
  threshold: number
): { region: TextRegion; similarity: number } | null {
  for (const region of regions) {
    const similarity = overlapSimilarity(anchor, region.text);
    if (similarity >= threshold) return { region, similarity };
  }
  return null;
}

/* ============= Entry Points ============= */

/**
 * Find the first paragraph, then the first line, whose overlap with the
 * anchor reaches `threshold`. The returned tier is derived from the threshold.
 */
export function findFuzzy(
  anchor: string,
  document: string,
  threshold: number
): MatchResult | null {
  if (normalize(anchor).length < MIN_FUZZY_ANCHOR_LENGTH) return null;

  const hit =
    firstQualifying(anchor, splitParagraphs(document), threshold) ??
    firstQualifying(anchor, splitLines(document), threshold);

  if (!hit) return null;

  return {
    matchedText: hit.region.text,
    startOffset: hit.region.start,
    confidenceTier: tierForThreshold(threshold),
    similarity: hit.similarity,
  };
}

/** Try every tier from high to low; first hit wins. */
export function locateFuzzy(anchor: string, document: string): MatchResult | null {
  for (const { threshold } of FUZZY_TIERS) {
    const hit = findFuzzy(anchor, document, threshold);
    if (hit) return hit;
  }
  return null;
}

function tierForThreshold(threshold: number): ConfidenceTier {
  for (const t of FUZZY_TIERS) {
    if (threshold >= t.threshold) return t.tier;
  }
  return "fuzzy_low";
}
