// src/observability/index.ts
// Observability module exports and the one-call Fastify wiring.

import type { FastifyInstance } from "fastify";
import { registerRequestIdHook } from "./requestId";
import { registerRequestLogger } from "./requestLogger";
import { registerMetricsCollector } from "./metricsCollector";

/* ---------- Logger ---------- */
export {
  createLogger,
  createChildLogger,
  logger,
  getLogLevel,
  isPrettyEnabled,
  type LogLevel,
} from "./logger";

/* ---------- Request ID ---------- */
export {
  generateRequestId,
  registerRequestIdHook,
  requestIdGenerator,
  REQUEST_ID_HEADER,
  REQUEST_ID_LENGTH,
} from "./requestId";

/* ---------- Request Logger ---------- */
export { registerRequestLogger, getRequestLogger } from "./requestLogger";

/* ---------- Metrics ---------- */
export {
  registry,
  recordHttpRequest,
  recordAiRequest,
  createMetricsObserver,
  METRICS_ENABLED,
} from "./metrics";

export { registerMetricsCollector } from "./metricsCollector";

/* ---------- Health ---------- */
export { getHealthStatus, isReady, isAlive, type HealthStatus } from "./healthCheck";

/** Request ids, request logging and HTTP metrics, in that order. */
export function registerObservability(app: FastifyInstance): void {
  registerRequestIdHook(app);
  registerRequestLogger(app);
  registerMetricsCollector(app);
}
