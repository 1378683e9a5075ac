// src/routes/consistency.ts
// POST /api/check-consistency: propagate one modification request across the
// target document and the documents the retrieval index relates to it.

import type { FastifyPluginAsync } from "fastify";
import { runConsistencyCheck, type ConsistencyCheckRequest } from "../consistency/workflow";
import { getRateLimitConfig } from "../middleware/rateLimit";
import { getRequestLogger } from "../observability/requestLogger";

/* ---------- Types ---------- */

interface CheckConsistencyBody {
  modificationPoint?: unknown;
  modificationRequest?: unknown;
  projectId?: unknown;
  topK?: unknown;
  targetFile?: unknown;
  includeRelated?: unknown;
}

const DEFAULT_TOP_K = 15;
const MAX_TOP_K = 100;

/* ---------- Validation ---------- */

type Validated = { ok: true; request: ConsistencyCheckRequest } | { ok: false; error: string; message: string };

function nonEmpty(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

export function validateCheckBody(body: CheckConsistencyBody): Validated {
  if (!nonEmpty(body.modificationPoint)) {
    return { ok: false, error: "modification_point_required", message: "modificationPoint must be a non-empty string" };
  }
  if (!nonEmpty(body.modificationRequest)) {
    return { ok: false, error: "modification_request_required", message: "modificationRequest must be a non-empty string" };
  }
  if (!nonEmpty(body.projectId)) {
    return { ok: false, error: "project_id_required", message: "projectId must be a non-empty string" };
  }

  let topK = DEFAULT_TOP_K;
  if (body.topK !== undefined) {
    if (typeof body.topK !== "number" || !Number.isInteger(body.topK) || body.topK < 1 || body.topK > MAX_TOP_K) {
      return { ok: false, error: "invalid_top_k", message: `topK must be an integer between 1 and ${MAX_TOP_K}` };
    }
    topK = body.topK;
  }

  if (body.targetFile !== undefined && body.targetFile !== null && !nonEmpty(body.targetFile)) {
    return { ok: false, error: "invalid_target_file", message: "targetFile must be a non-empty string" };
  }

  if (body.includeRelated !== undefined && typeof body.includeRelated !== "boolean") {
    return { ok: false, error: "invalid_include_related", message: "includeRelated must be a boolean" };
  }

  return {
    ok: true,
    request: {
      modificationPoint: body.modificationPoint.trim(),
      modificationRequest: body.modificationRequest.trim(),
      projectId: body.projectId.trim(),
      topK,
      targetFile: nonEmpty(body.targetFile) ? body.targetFile.trim() : undefined,
      includeRelated: typeof body.includeRelated === "boolean" ? body.includeRelated : true,
    },
  };
}

/* ---------- Routes ---------- */

export const consistencyRoutes: FastifyPluginAsync = async (fastify) => {
  fastify.post<{ Body: CheckConsistencyBody }>(
    "/api/check-consistency",
    getRateLimitConfig("checkConsistency"),
    async (req, reply) => {
      const body: CheckConsistencyBody = req.body ?? {};
      const validated = validateCheckBody(body);
      if (!validated.ok) {
        return reply.code(400).send({ error: validated.error, message: validated.message });
      }

      const result = await runConsistencyCheck(validated.request, { log: getRequestLogger(req) });
      return reply.code(result.success ? 200 : 500).send(result);
    }
  );
};
