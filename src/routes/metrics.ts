// src/routes/metrics.ts
// GET /metrics: Prometheus text exposition of the registry

import { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { registry } from "../observability/metrics";
import { createLogger } from "../observability/logger";

const log = createLogger("routes/metrics");

/* ---------- Route Registration ---------- */
export default async function metricsRoutes(app: FastifyInstance) {
  app.get(
    "/metrics",
    async (_req: FastifyRequest, reply: FastifyReply) => {
      try {
        const metrics = await registry.metrics();
        reply
          .header("Content-Type", registry.contentType)
          .send(metrics);
      } catch (err) {
        log.error({ err }, "Failed to collect metrics");
        reply.code(500).send({ error: "Failed to collect metrics" });
      }
    }
  );
}
