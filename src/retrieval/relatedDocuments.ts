// src/retrieval/relatedDocuments.ts
// Turns a retrieval result into "documents related to a modification point",
// with the retrieved chunks grouped per document.
//
// The index answers in two shapes:
//   { bundles: [{ conversations: [...], facts: [...] }, ...] }
//   { short_term_memory: { conversations: [...], facts: [...] } }   (older index)
// Conversations carry `text`, facts carry `content`.

import { searchIndex } from "./searchClient";
import { createLogger } from "../observability/logger";

const log = createLogger("retrieval/related");

/* ---------- Types ---------- */

export interface RetrievedChunk {
  content: string;
  score: number;
  metadata: Record<string, unknown>;
}

export interface RelatedDocuments {
  /** document identifier (URL) → its chunks, in retrieval order */
  relatedFiles: Record<string, RetrievedChunk[]>;
  totalFiles: number;
  /** All chunks returned, including those without a usable identifier */
  totalChunks: number;
}

export interface FindRelatedOptions {
  /** Excluded from the result (the document being edited) */
  currentFile?: string;
  topK?: number;
}

/** Metadata keys naming the source document, most specific first. */
export const FILE_IDENTIFIER_KEYS = ["file_path", "source_identifier", "minio_url", "source"] as const;

const FILE_CHUNK_FILTER = { content_type: "file_chunk" };

/* ---------- Shape Helpers ---------- */

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function records(value: unknown): Record<string, unknown>[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

function toChunk(entry: Record<string, unknown>, textKey: "text" | "content", keepScore: boolean): RetrievedChunk {
  const text = entry[textKey];
  const score = entry.score;
  return {
    content: typeof text === "string" ? text : "",
    score: keepScore && typeof score === "number" ? score : 1,
    metadata: isRecord(entry.metadata) ? entry.metadata : {},
  };
}

function chunksOf(group: Record<string, unknown>, keepScore: boolean): RetrievedChunk[] {
  return [
    ...records(group.conversations).map((c) => toChunk(c, "text", keepScore)),
    ...records(group.facts).map((f) => toChunk(f, "content", keepScore)),
  ];
}

/* ---------- Extraction ---------- */

/** Flatten either result shape into a chunk list; anything else yields []. */
export function extractChunks(data: unknown): RetrievedChunk[] {
  if (!isRecord(data)) return [];

  const bundles = records(data.bundles);
  if (bundles.length) {
    return bundles.flatMap((b) => chunksOf(b, true));
  }

  if (isRecord(data.short_term_memory)) {
    return chunksOf(data.short_term_memory, false);
  }

  return [];
}

/** First non-empty string among FILE_IDENTIFIER_KEYS. */
export function fileIdentifierOf(metadata: Record<string, unknown>): string | null {
  for (const key of FILE_IDENTIFIER_KEYS) {
    const value = metadata[key];
    if (typeof value === "string" && value) return value;
  }
  return null;
}

/**
 * Group chunks per document. Chunks whose identifier is missing or not an
 * http(s) URL are skipped, as are chunks of `currentFile`.
 */
export function groupChunksByFile(
  chunks: readonly RetrievedChunk[],
  currentFile?: string
): Record<string, RetrievedChunk[]> {
  const grouped: Record<string, RetrievedChunk[]> = {};

  for (const chunk of chunks) {
    const id = fileIdentifierOf(chunk.metadata);
    if (!id || !id.startsWith("http")) {
      log.warn({ identifier: id, keys: Object.keys(chunk.metadata) }, "skipping chunk without a document URL");
      continue;
    }
    if (currentFile && id === currentFile) continue;

    (grouped[id] ??= []).push(chunk);
  }

  return grouped;
}

/* ---------- Entry Point ---------- */

export async function findRelatedDocuments(
  modificationPoint: string,
  projectId: string,
  opts: FindRelatedOptions = {}
): Promise<RelatedDocuments> {
  const result = await searchIndex({
    query: modificationPoint,
    projectId,
    topK: opts.topK ?? 10,
    useRefine: false,
    metadataFilter: FILE_CHUNK_FILTER,
  });

  if (!result.success) {
    log.warn({ error: result.error }, "retrieval failed; no related documents");
    return { relatedFiles: {}, totalFiles: 0, totalChunks: 0 };
  }

  const chunks = extractChunks(result.data);
  const relatedFiles = groupChunksByFile(chunks, opts.currentFile);
  const totalFiles = Object.keys(relatedFiles).length;

  log.info({ totalFiles, totalChunks: chunks.length }, "related documents found");
  return { relatedFiles, totalFiles, totalChunks: chunks.length };
}
