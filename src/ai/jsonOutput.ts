// src/ai/jsonOutput.ts
// Decoding JSON out of model replies. Models wrap JSON in ```json fences or
// add a sentence around it; both are tolerated.

const FENCED_JSON_RE = /```json\s*([\s\S]*?)```/i;
const FENCED_ANY_RE = /```[a-zA-Z]*\s*([\s\S]*?)```/;

function parses(text: string): boolean {
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}

/** Outermost `open`...`close` span, or null. */
function spanBetween(reply: string, open: string, close: string): { start: number; text: string } | null {
  const start = reply.indexOf(open);
  const end = reply.lastIndexOf(close);
  return start !== -1 && end > start ? { start, text: reply.slice(start, end + 1) } : null;
}

/**
 * The JSON-looking part of a reply: the first ```json fence, else the first
 * fence of any kind, else the reply itself when it parses, else the outermost
 * {...} or [...] span that parses (earliest opener first), else the whole reply.
 */
export function extractJsonText(reply: string): string {
  const json = FENCED_JSON_RE.exec(reply);
  if (json) return json[1].trim();

  const fenced = FENCED_ANY_RE.exec(reply);
  if (fenced) return fenced[1].trim();

  const trimmed = reply.trim();
  if (parses(trimmed)) return trimmed;

  const spans = [spanBetween(reply, '{', '}'), spanBetween(reply, '[', ']')]
    .filter((s): s is { start: number; text: string } => s !== null)
    .sort((a, b) => a.start - b.start);

  const parsed = spans.find((s) => parses(s.text));
  if (parsed) return parsed.text;
  if (spans.length) return spans[0].text;

  return trimmed;
}

/** Parse a model reply as JSON. Throws SyntaxError when nothing parses. */
export function parseModelJson(reply: string): unknown {
  return JSON.parse(extractJsonText(reply));
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((v): v is string => typeof v === 'string');
}
