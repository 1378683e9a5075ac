// src/storage/documentFetcher.ts
// Reads raw document text from the object store over HTTP GET.

import { config } from "../config";
import { createLogger } from "../observability/logger";

const log = createLogger("storage/documents");

export class DocumentFetchError extends Error {
  constructor(
    message: string,
    public readonly identifier: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = "DocumentFetchError";
  }
}

/**
 * Fetch one document's text. Throws DocumentFetchError on a non-http
 * identifier, a non-2xx answer, a timeout, or a transport failure.
 */
export async function fetchDocument(identifier: string): Promise<string> {
  if (!/^https?:\/\//i.test(identifier)) {
    throw new DocumentFetchError(`Not a document URL: ${identifier}`, identifier);
  }

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), config.documents.fetchTimeoutMs);

  try {
    const response = await fetch(identifier, { signal: controller.signal });
    if (!response.ok) {
      throw new DocumentFetchError(
        `Document store returned ${response.status}: ${response.statusText}`,
        identifier,
        response.status
      );
    }

    const text = await response.text();
    log.debug({ identifier, chars: text.length }, "document fetched");
    return text;
  } catch (err) {
    if (err instanceof DocumentFetchError) throw err;
    const message = controller.signal.aborted
      ? `Document fetch timed out after ${config.documents.fetchTimeoutMs}ms`
      : `Document fetch failed: ${err instanceof Error ? err.message : String(err)}`;
    throw new DocumentFetchError(message, identifier);
  } finally {
    clearTimeout(timeoutId);
  }
}
