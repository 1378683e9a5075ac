// src/patching/exactLocator.ts

/**
 * First UTF-16 offset of `anchor` in `document`, or null.
 * An empty anchor never matches.
 */
export function findExact(anchor: string, document: string): number | null {
  if (!anchor) return null;
  const at = document.indexOf(anchor);
  return at === -1 ? null : at;
}
