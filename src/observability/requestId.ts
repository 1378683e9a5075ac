// src/observability/requestId.ts
// Request ids for log correlation. An upstream X-Request-ID is passed through.

import { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import type { IncomingMessage } from "http";
import { nanoid } from "nanoid";

/* ---------- Constants ---------- */
export const REQUEST_ID_HEADER = "x-request-id";
export const REQUEST_ID_LENGTH = 21; // nanoid default

export function generateRequestId(): string {
  return nanoid(REQUEST_ID_LENGTH);
}

/**
 * Fastify `genReqId`: reuse the caller's X-Request-ID when present.
 * Receives the raw IncomingMessage, not a FastifyRequest.
 */
export function requestIdGenerator(req: IncomingMessage): string {
  const incomingId = req.headers[REQUEST_ID_HEADER];

  if (typeof incomingId === "string" && incomingId.length > 0 && incomingId.length <= 128) {
    return incomingId;
  }

  return generateRequestId();
}

/** Echo the request id on every response. */
export function registerRequestIdHook(app: FastifyInstance): void {
  app.addHook("onSend", async (req: FastifyRequest, reply: FastifyReply) => {
    reply.header(REQUEST_ID_HEADER, req.id);
  });
}
