// src/routes/patch.ts
// Patch engine over HTTP
//
// Endpoints:
// - POST /api/patch           apply a list of edits to a document
// - POST /api/expand-heading  a heading anchor's full section

import type { FastifyPluginAsync } from "fastify";
import {
  assertPatchableDocument,
  combineObservers,
  createLoggingObserver,
  expandSection,
  MalformedDocumentError,
  parseEditRequests,
  patch,
  summarizePatch,
} from "../patching";
import { createMetricsObserver } from "../observability/metrics";
import { getRequestLogger } from "../observability/requestLogger";
import { config } from "../config";

/* ---------- Types ---------- */

interface PatchBody {
  document?: unknown;
  edits?: unknown;
  sweep?: unknown;
}

interface ExpandHeadingBody {
  document?: unknown;
  headingAnchor?: unknown;
}

/* ---------- Routes ---------- */

export const patchRoutes: FastifyPluginAsync = async (fastify) => {
  /**
   * POST /api/patch
   * Body: { document, edits: [{ location, original_text, modified_text, ... }], sweep? }
   * Individual edit failures are reported, not rejected; only a bad body or an
   * unusable document answers 400.
   */
  fastify.post<{ Body: PatchBody }>("/api/patch", async (req, reply) => {
    const body: PatchBody = req.body ?? {};

    if (typeof body.document !== "string") {
      return reply.code(400).send({
        error: "document_required",
        message: "document is required and must be a string",
      });
    }

    if (!Array.isArray(body.edits)) {
      return reply.code(400).send({
        error: "edits_required",
        message: "edits is required and must be an array",
      });
    }

    const { edits, rejected } = parseEditRequests(body.edits);
    if (rejected.length) {
      return reply.code(400).send({
        error: "invalid_edits",
        message: `edits at positions ${rejected.join(", ")} need string original_text and modified_text`,
        rejected,
      });
    }

    const sweep = typeof body.sweep === "boolean" ? body.sweep : config.patch.sweepDuplicates;
    const log = getRequestLogger(req);

    try {
      const result = patch(body.document, edits, {
        sweep,
        observer: combineObservers(createLoggingObserver(log), createMetricsObserver()),
      });

      log.info(
        {
          edits: edits.length,
          applied: result.report.applied.length,
          failed: result.report.failed.length,
        },
        "patch applied"
      );

      return reply.send({
        document: result.document,
        report: result.report,
        summary: summarizePatch(body.document, result.document),
      });
    } catch (err) {
      if (err instanceof MalformedDocumentError) {
        return reply.code(400).send({ error: "malformed_document", message: err.message });
      }
      throw err;
    }
  });

  /**
   * POST /api/expand-heading
   * Body: { document, headingAnchor }
   * `expanded: false` means the anchor is not a heading or is not in the document;
   * `section` is then the anchor unchanged.
   */
  fastify.post<{ Body: ExpandHeadingBody }>("/api/expand-heading", async (req, reply) => {
    const body: ExpandHeadingBody = req.body ?? {};
    const { document, headingAnchor } = body;

    if (typeof headingAnchor !== "string" || !headingAnchor.trim()) {
      return reply.code(400).send({
        error: "heading_anchor_required",
        message: "headingAnchor is required and must be a non-empty string",
      });
    }

    try {
      assertPatchableDocument(document);
      const expansion = expandSection(document, headingAnchor);
      return reply.send({ section: expansion.text, expanded: expansion.found });
    } catch (err) {
      if (err instanceof MalformedDocumentError) {
        return reply.code(400).send({ error: "malformed_document", message: err.message });
      }
      throw err;
    }
  });
};
