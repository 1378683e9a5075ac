// src/retrieval/knowledgeBase.ts
// Client for the indexing endpoint (POST JSON to KB_PROCESS_URL). The indexer
// pulls the document from the store itself; only its URL is sent.
// Never throws: every failure comes back as { success: false, error }.

import { isRecord } from "../ai/jsonOutput";
import { config } from "../config";
import { createLogger } from "../observability/logger";

const log = createLogger("retrieval/knowledge-base");

/** How much of an upstream body is quoted in an error. */
const ERROR_BODY_CHARS = 200;

/* ---------- Types ---------- */

export interface UploadParams {
  fileUrl: string;
  projectId: string;
  /** Ask the indexer to run its vision model over images */
  enableVlm?: boolean;
}

export type UploadResult =
  | { success: true; fileUrl: string; filePath?: string; result: unknown }
  | { success: false; fileUrl: string; error: string };

export interface BatchUploadResult {
  successCount: number;
  total: number;
  results: UploadResult[];
}

/* ---------- Request ---------- */

export function buildUploadPayload(params: UploadParams): Record<string, unknown> {
  return {
    minio_url: params.fileUrl,
    project_id: params.projectId,
    enable_vlm: params.enableVlm ?? false,
  };
}

/** Local cache path the indexer reports, when it reports one. */
function cachedPathOf(result: unknown): string | undefined {
  if (!isRecord(result)) return undefined;
  const path = result.file_path ?? result.local_path;
  return typeof path === "string" && path ? path : undefined;
}

export async function uploadToKnowledgeBase(params: UploadParams): Promise<UploadResult> {
  const { fileUrl } = params;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), config.retrieval.uploadTimeoutMs);

  log.info({ fileUrl, projectId: params.projectId, processUrl: config.retrieval.processUrl }, "uploading to knowledge base");

  try {
    const response = await fetch(config.retrieval.processUrl, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(buildUploadPayload(params)),
      signal: controller.signal,
    });
    const text = await response.text();

    if (!response.ok) {
      log.error({ fileUrl, status: response.status }, "knowledge base upload failed");
      return {
        success: false,
        fileUrl,
        error: `Knowledge base returned ${response.status}: ${text.slice(0, ERROR_BODY_CHARS)}`,
      };
    }

    let result: unknown;
    try {
      result = JSON.parse(text);
    } catch {
      log.error({ fileUrl }, "knowledge base answered with non-JSON");
      return {
        success: false,
        fileUrl,
        error: `Knowledge base answered with non-JSON: ${text.slice(0, ERROR_BODY_CHARS)}`,
      };
    }

    const filePath = cachedPathOf(result);
    log.info({ fileUrl, filePath }, "knowledge base upload succeeded");
    return { success: true, fileUrl, ...(filePath ? { filePath } : {}), result };
  } catch (err) {
    const error = controller.signal.aborted
      ? `Upload timed out after ${config.retrieval.uploadTimeoutMs}ms`
      : `Knowledge base unreachable (${config.retrieval.processUrl}): ${err instanceof Error ? err.message : String(err)}`;
    log.error({ err, fileUrl }, "knowledge base upload failed");
    return { success: false, fileUrl, error };
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Upload several documents one after another; the indexer processes one
 * document at a time.
 */
export async function batchUploadToKnowledgeBase(
  fileUrls: readonly string[],
  projectId: string,
  enableVlm = false
): Promise<BatchUploadResult> {
  const results: UploadResult[] = [];

  for (const [i, fileUrl] of fileUrls.entries()) {
    log.debug({ progress: `${i + 1}/${fileUrls.length}` }, "batch upload");
    results.push(await uploadToKnowledgeBase({ fileUrl, projectId, enableVlm }));
  }

  const successCount = results.filter((r) => r.success).length;
  log.info({ successCount, total: fileUrls.length }, "batch upload finished");
  return { successCount, total: fileUrls.length, results };
}
