// src/routes/knowledgeBase.ts
// Indexing documents so the consistency check can find them
//
// Endpoints:
// - POST /api/upload-to-kb        index one document
// - POST /api/batch-upload-to-kb  index several documents, one after another
//
// An upload the indexer rejects answers 502 with the per-document results.

import type { FastifyPluginAsync } from "fastify";
import { batchUploadToKnowledgeBase, uploadToKnowledgeBase } from "../retrieval/knowledgeBase";
import { getRateLimitConfig } from "../middleware/rateLimit";
import { getRequestLogger } from "../observability/requestLogger";

/* ---------- Types ---------- */

interface UploadBody {
  fileUrl?: unknown;
  projectId?: unknown;
  enableVlm?: unknown;
}

interface BatchUploadBody {
  fileUrls?: unknown;
  projectId?: unknown;
  enableVlm?: unknown;
}

const MAX_BATCH_FILES = 100;

function nonEmpty(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

/* ---------- Routes ---------- */

export const knowledgeBaseRoutes: FastifyPluginAsync = async (fastify) => {
  /**
   * POST /api/upload-to-kb
   * Body: { fileUrl, projectId, enableVlm? }
   */
  fastify.post<{ Body: UploadBody }>(
    "/api/upload-to-kb",
    getRateLimitConfig("kbUpload"),
    async (req, reply) => {
      const body: UploadBody = req.body ?? {};

      if (!nonEmpty(body.fileUrl)) {
        return reply.code(400).send({ error: "file_url_required", message: "fileUrl must be a non-empty string" });
      }
      if (!nonEmpty(body.projectId)) {
        return reply.code(400).send({ error: "project_id_required", message: "projectId must be a non-empty string" });
      }
      if (body.enableVlm !== undefined && typeof body.enableVlm !== "boolean") {
        return reply.code(400).send({ error: "invalid_enable_vlm", message: "enableVlm must be a boolean" });
      }

      const result = await uploadToKnowledgeBase({
        fileUrl: body.fileUrl.trim(),
        projectId: body.projectId.trim(),
        enableVlm: body.enableVlm ?? false,
      });

      if (!result.success) {
        getRequestLogger(req).warn({ fileUrl: result.fileUrl, error: result.error }, "upload rejected");
      }

      return reply.code(result.success ? 200 : 502).send({
        success: result.success,
        message: result.success ? "uploaded" : result.error,
        successCount: result.success ? 1 : 0,
        total: 1,
        results: [result],
      });
    }
  );

  /**
   * POST /api/batch-upload-to-kb
   * Body: { fileUrls: string[], projectId, enableVlm? }
   * Succeeds when at least one document was indexed.
   */
  fastify.post<{ Body: BatchUploadBody }>(
    "/api/batch-upload-to-kb",
    getRateLimitConfig("kbUpload"),
    async (req, reply) => {
      const body: BatchUploadBody = req.body ?? {};
      const { fileUrls } = body;

      if (
        !Array.isArray(fileUrls) ||
        fileUrls.length === 0 ||
        fileUrls.length > MAX_BATCH_FILES ||
        !fileUrls.every(nonEmpty)
      ) {
        return reply.code(400).send({
          error: "invalid_file_urls",
          message: `fileUrls must hold 1 to ${MAX_BATCH_FILES} non-empty strings`,
        });
      }
      if (!nonEmpty(body.projectId)) {
        return reply.code(400).send({ error: "project_id_required", message: "projectId must be a non-empty string" });
      }
      if (body.enableVlm !== undefined && typeof body.enableVlm !== "boolean") {
        return reply.code(400).send({ error: "invalid_enable_vlm", message: "enableVlm must be a boolean" });
      }

      const batch = await batchUploadToKnowledgeBase(
        fileUrls.map((u) => u.trim()),
        body.projectId.trim(),
        body.enableVlm ?? false
      );

      getRequestLogger(req).info({ successCount: batch.successCount, total: batch.total }, "batch upload done");

      const success = batch.successCount > 0;
      return reply.code(success ? 200 : 502).send({
        success,
        message: `uploaded ${batch.successCount} of ${batch.total} documents`,
        successCount: batch.successCount,
        total: batch.total,
        results: batch.results,
      });
    }
  );
};
