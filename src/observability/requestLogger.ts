// src/observability/requestLogger.ts
// Request/response logging with timing. Handlers pick up a request-scoped
// logger through getRequestLogger(req).

import { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import type { Logger } from "pino";
import { createLogger, createChildLogger } from "./logger";

/* ---------- Types ---------- */
interface RequestContext {
  requestId: string;
  method: string;
  url: string;
  userId?: string;
  projectId?: string;
}

/* ---------- Context Extraction ---------- */

function header(req: FastifyRequest, name: string): string | undefined {
  const value = req.headers[name];
  return typeof value === "string" && value.length ? value : undefined;
}

function buildRequestContext(req: FastifyRequest): RequestContext {
  return {
    requestId: req.id,
    method: req.method,
    url: req.url,
    userId: header(req, "x-user-id"),
    projectId: header(req, "x-project-id"),
  };
}

/* ---------- Logger Factory ---------- */

const baseLogger = createLogger("http");
const requestLoggers = new WeakMap<FastifyRequest, Logger>();
const requestStartTimes = new WeakMap<FastifyRequest, number>();

/* ---------- Fastify Hook Registration ---------- */

/**
 * Logs request start (debug), completion (level by status) and errors.
 */
export function registerRequestLogger(app: FastifyInstance): void {
  app.addHook("onRequest", async (req: FastifyRequest) => {
    requestStartTimes.set(req, Date.now());

    const log = createChildLogger(baseLogger, { ...buildRequestContext(req) });
    requestLoggers.set(req, log);
    log.debug("request started");
  });

  app.addHook(
    "onResponse",
    async (req: FastifyRequest, reply: FastifyReply) => {
      const startTime = requestStartTimes.get(req);
      const duration = startTime ? Date.now() - startTime : 0;

      const log = createChildLogger(getRequestLogger(req), {
        statusCode: reply.statusCode,
        duration,
      });

      if (reply.statusCode >= 500) {
        log.error("request failed");
      } else if (reply.statusCode >= 400) {
        log.warn("request error");
      } else {
        log.info("request completed");
      }

      requestStartTimes.delete(req);
      requestLoggers.delete(req);
    }
  );

  app.addHook("onError", async (req: FastifyRequest, _reply, error) => {
    getRequestLogger(req).error(
      { err: { message: error.message, name: error.name, stack: error.stack } },
      "request error"
    );
  });
}

/* ---------- Request Logger Access ---------- */

/** Request-scoped logger; the base http logger outside a request. */
export function getRequestLogger(req: FastifyRequest): Logger {
  return requestLoggers.get(req) ?? baseLogger;
}
