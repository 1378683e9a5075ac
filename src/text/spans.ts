// src/text/spans.ts
// Offset spans over plain text. Offsets are UTF-16 indexes, end exclusive.

export interface Span {
  start: number;
  end: number; // exclusive
}

export function clampSpan(text: string, span: Span): Span {
  const len = text.length;
  const start = Math.max(0, Math.min(span.start, len));
  const end = Math.max(start, Math.min(span.end, len));
  return { start, end };
}

export function spanAt(start: number, matchedText: string): Span {
  return { start, end: start + matchedText.length };
}

export function sliceSpan(text: string, span: Span): string {
  const { start, end } = clampSpan(text, span);
  return text.slice(start, end);
}

export function replaceSpan(text: string, span: Span, replacement: string): string {
  const { start, end } = clampSpan(text, span);
  return `${text.slice(0, start)}${replacement}${text.slice(end)}`;
}

/**
 * The text with the span cut out. A NUL joins the halves so that a search
 * never matches across the cut.
 */
export function textOutside(text: string, span: Span): string {
  const { start, end } = clampSpan(text, span);
  return `${text.slice(0, start)}\u0000${text.slice(end)}`;
}

const LONE_SURROGATE_RE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/** False when the string holds an unpaired surrogate (not encodable as UTF-8). */
export function isWellFormedText(text: string): boolean {
  return !LONE_SURROGATE_RE.test(text);
}
