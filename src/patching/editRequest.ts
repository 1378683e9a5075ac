// src/patching/editRequest.ts
// Decoding of edit requests from the wire (model output, HTTP bodies).
//
// The model emits snake_case (`original_text`, `is_full_chapter`); HTTP clients may
// send camelCase. Both are accepted; snake_case wins when both are present.

import type { EditRequest } from "./types";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function str(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function bool(value: unknown): boolean {
  if (typeof value === "boolean") return value;
  if (typeof value === "string") return value.trim().toLowerCase() === "true";
  return false;
}

/**
 * Validate one wire edit. Returns null when the entry is not an object or has
 * no string `original_text`/`modified_text`.
 */
export function parseEditRequest(wire: unknown): EditRequest | null {
  if (!isRecord(wire)) return null;

  const originalText = str(wire.original_text) ?? str(wire.originalText);
  const modifiedText = str(wire.modified_text) ?? str(wire.modifiedText);
  if (originalText === undefined || modifiedText === undefined) return null;

  return {
    location: str(wire.location) ?? "",
    originalText,
    modifiedText,
    reason: str(wire.reason) ?? "",
    modificationType: str(wire.modification_type) ?? str(wire.modificationType) ?? "",
    isFullChapter: bool(wire.is_full_chapter ?? wire.isFullChapter),
  };
}

export interface ParsedEditList {
  edits: EditRequest[];
  /** Positions of entries that could not be decoded */
  rejected: number[];
}

/** Decode a list, keeping the valid entries in order. */
export function parseEditRequests(raw: unknown): ParsedEditList {
  const edits: EditRequest[] = [];
  const rejected: number[] = [];
  if (!Array.isArray(raw)) return { edits, rejected };

  raw.forEach((entry: unknown, i) => {
    const edit = parseEditRequest(entry);
    if (edit) edits.push(edit);
    else rejected.push(i);
  });

  return { edits, rejected };
}
