// src/observability/metrics.ts
// Prometheus metrics (prom-client), exposed via GET /metrics.

import {
  Registry,
  Counter,
  Histogram,
  collectDefaultMetrics,
} from "prom-client";
import type { PatchEvent, PatchObserver } from "../patching/types";

/* ---------- Configuration ---------- */
const METRICS_PREFIX = process.env.METRICS_PREFIX || "patchsvc";
const METRICS_ENABLED = process.env.METRICS_ENABLED !== "false";

/* ---------- Registry ---------- */
export const registry = new Registry();

registry.setDefaultLabels({
  service: "consistency-patch-service",
});

if (METRICS_ENABLED && !process.env.VITEST) {
  collectDefaultMetrics({ register: registry, prefix: `${METRICS_PREFIX}_` });
}

/* ---------- HTTP Metrics ---------- */

export const httpRequestsTotal = new Counter({
  name: `${METRICS_PREFIX}_http_requests_total`,
  help: "Total number of HTTP requests",
  labelNames: ["method", "route", "status_code"] as const,
  registers: [registry],
});

export const httpRequestDuration = new Histogram({
  name: `${METRICS_PREFIX}_http_request_duration_seconds`,
  help: "HTTP request duration in seconds",
  labelNames: ["method", "route"] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [registry],
});

/* ---------- AI Metrics ---------- */

export const aiRequestsTotal = new Counter({
  name: `${METRICS_PREFIX}_ai_requests_total`,
  help: "Total number of model calls",
  labelNames: ["action", "provider", "status"] as const,
  registers: [registry],
});

export const aiRequestDuration = new Histogram({
  name: `${METRICS_PREFIX}_ai_request_duration_seconds`,
  help: "Model call duration in seconds",
  labelNames: ["action", "provider"] as const,
  buckets: [0.5, 1, 2.5, 5, 10, 30, 60, 120],
  registers: [registry],
});

/* ---------- Patch Metrics ---------- */

/**
 * Edit outcomes by kind of checkpoint
 * (applied, not_found, collision_guard, noop, duplicate, subsumed)
 */
export const patchEditsTotal = new Counter({
  name: `${METRICS_PREFIX}_patch_edits_total`,
  help: "Edits seen by the patch pipeline, by outcome",
  labelNames: ["outcome"] as const,
  registers: [registry],
});

export const patchMatchTierTotal = new Counter({
  name: `${METRICS_PREFIX}_patch_match_tier_total`,
  help: "Located anchors by confidence tier",
  labelNames: ["tier"] as const,
  registers: [registry],
});

export const patchSweptParagraphsTotal = new Counter({
  name: `${METRICS_PREFIX}_patch_swept_paragraphs_total`,
  help: "Paragraphs removed by the duplicate sweep",
  registers: [registry],
});

/* ---------- Helper Functions ---------- */

export function recordHttpRequest(
  method: string,
  route: string,
  statusCode: number,
  durationMs: number
): void {
  if (!METRICS_ENABLED) return;

  httpRequestsTotal.inc({
    method,
    route: normalizeRoute(route),
    status_code: statusCode.toString(),
  });

  httpRequestDuration.observe(
    { method, route: normalizeRoute(route) },
    durationMs / 1000
  );
}

export function recordAiRequest(
  action: string,
  provider: string,
  status: "success" | "error",
  durationMs: number
): void {
  if (!METRICS_ENABLED) return;

  aiRequestsTotal.inc({ action, provider, status });
  aiRequestDuration.observe({ action, provider }, durationMs / 1000);
}

/**
 * Patch observer feeding the counters above.
 * Combine with the logging observer via combineObservers().
 */
export function createMetricsObserver(): PatchObserver {
  return {
    notify(event: PatchEvent) {
      if (!METRICS_ENABLED) return;
      switch (event.type) {
        case "exact_match":
          patchMatchTierTotal.inc({ tier: "exact" });
          break;
        case "fuzzy_match":
          patchMatchTierTotal.inc({ tier: event.tier });
          break;
        case "applied":
        case "not_found":
        case "collision_guard":
        case "noop":
        case "duplicate":
        case "subsumed":
          patchEditsTotal.inc({ outcome: event.type });
          break;
        case "swept":
          patchSweptParagraphsTotal.inc(event.removed);
          break;
        default:
          break;
      }
    },
  };
}

/* ---------- Route Normalization ---------- */

/** Strip the query string and collapse id-like segments to keep label cardinality low. */
function normalizeRoute(route: string): string {
  const path = route.split("?")[0];

  return path
    .replace(/\/[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}/gi, "/:id")
    .replace(/\/[a-zA-Z0-9_-]{21}/g, "/:id") // nanoid
    .replace(/\/\d+/g, "/:id");
}

/* ---------- Exports ---------- */
export { METRICS_ENABLED };
