// src/observability/healthCheck.ts
// Health checks with readiness/liveness probes.
//
// The service owns no database; readiness means the patch engine works and the
// collaborators it calls are configured.

import { config } from "../config";
import { patch } from "../patching";
import { createLogger } from "./logger";

const log = createLogger("health");

/* ---------- Types ---------- */

export interface HealthCheckResult {
  status: "up" | "down";
  latency?: number;
  error?: string;
}

export interface HealthStatus {
  status: "healthy" | "degraded" | "unhealthy";
  timestamp: string;
  version: string;
  uptime: number;
  checks: {
    patchEngine: HealthCheckResult;
    retrieval: HealthCheckResult;
    aiProvider: HealthCheckResult;
  };
}

/* ---------- Configuration ---------- */

const SERVICE_VERSION = process.env.npm_package_version || "unknown";
const startTime = Date.now();

const PROBE_DOCUMENT = "# 1 Probe\n\nThe quick brown fox.";
const PROBE_EXPECTED = "# 1 Probe\n\nThe quick red fox.";

/* ---------- Individual Health Checks ---------- */

/**
 * Run a one-edit patch through the full pipeline
 */
function checkPatchEngine(): HealthCheckResult {
  const start = Date.now();

  try {
    const { document } = patch(PROBE_DOCUMENT, [
      {
        location: "probe",
        originalText: "brown",
        modifiedText: "red",
        reason: "",
        modificationType: "",
        isFullChapter: false,
      },
    ]);

    if (document === PROBE_EXPECTED) {
      return { status: "up", latency: Date.now() - start };
    }
    return { status: "down", latency: Date.now() - start, error: "Unexpected probe output" };
  } catch (err) {
    log.error({ err }, "Patch engine health check failed");
    return {
      status: "down",
      latency: Date.now() - start,
      error: err instanceof Error ? err.message : String(err),
    };
  }
}

function checkRetrievalConfig(): HealthCheckResult {
  try {
    new URL(config.retrieval.searchUrl);
    return { status: "up" };
  } catch {
    return { status: "down", error: `Invalid RAG_SEARCH_URL: ${config.retrieval.searchUrl}` };
  }
}

function checkAiProviderConfig(): HealthCheckResult {
  const { provider, openaiKey, anthropicKey } = config.ai;
  if (provider === "openai" && !openaiKey) {
    return { status: "down", error: "OPENAI_API_KEY is not set" };
  }
  if (provider === "anthropic" && !anthropicKey) {
    return { status: "down", error: "ANTHROPIC_API_KEY is not set" };
  }
  return { status: "up" };
}

/* ---------- Aggregate Health Status ---------- */

/**
 * Patch engine down → unhealthy; a misconfigured collaborator → degraded
 * (POST /api/patch still works without them).
 */
export async function getHealthStatus(): Promise<HealthStatus> {
  const patchEngine = checkPatchEngine();
  const retrieval = checkRetrievalConfig();
  const aiProvider = checkAiProviderConfig();

  let status: HealthStatus["status"] = "healthy";
  if (patchEngine.status === "down") {
    status = "unhealthy";
  } else if (retrieval.status === "down" || aiProvider.status === "down") {
    status = "degraded";
  }

  return {
    status,
    timestamp: new Date().toISOString(),
    version: SERVICE_VERSION,
    uptime: Math.floor((Date.now() - startTime) / 1000),
    checks: { patchEngine, retrieval, aiProvider },
  };
}

export async function isReady(): Promise<boolean> {
  return checkPatchEngine().status === "up";
}

export async function isAlive(): Promise<boolean> {
  return true;
}
