// src/retrieval/searchClient.ts
// Client for the retrieval index (POST JSON to RAG_SEARCH_URL).
// Never throws: transport and HTTP failures come back as { success: false }.

import { config } from "../config";
import { createLogger } from "../observability/logger";

const log = createLogger("retrieval/search");

/* ---------- Types ---------- */

export interface SearchParams {
  query: string;
  projectId?: string;
  topK?: number;
  useRefine?: boolean;
  metadataFilter?: Record<string, string>;
}

export type SearchResult =
  | { success: true; query: string; data: unknown }
  | { success: false; query: string; error: string };

/* ---------- Request ---------- */

export function buildSearchPayload(params: SearchParams): Record<string, unknown> {
  const payload: Record<string, unknown> = {
    query: params.query,
    project_id: params.projectId || config.retrieval.projectId,
    top_k: params.topK || config.retrieval.topK,
    use_refine: params.useRefine ?? config.retrieval.useRefine,
  };
  if (params.metadataFilter && Object.keys(params.metadataFilter).length) {
    payload.metadata_filter = params.metadataFilter;
  }
  return payload;
}

export async function searchIndex(params: SearchParams): Promise<SearchResult> {
  const payload = buildSearchPayload(params);
  log.debug({ payload }, "search request");

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), config.retrieval.timeoutMs);

  try {
    const response = await fetch(config.retrieval.searchUrl, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(payload),
      signal: controller.signal,
    });

    if (!response.ok) {
      const error = `Search returned ${response.status}: ${response.statusText}`;
      log.error({ status: response.status }, "search failed");
      return { success: false, query: params.query, error };
    }

    const data: unknown = await response.json();
    log.debug({ query: params.query }, "search succeeded");
    return { success: true, query: params.query, data };
  } catch (err) {
    const error = controller.signal.aborted
      ? `Search timed out after ${config.retrieval.timeoutMs}ms`
      : err instanceof Error
        ? err.message
        : String(err);
    log.error({ err, query: params.query }, "search failed");
    return { success: false, query: params.query, error };
  } finally {
    clearTimeout(timeoutId);
  }
}
