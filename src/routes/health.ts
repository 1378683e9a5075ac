// src/routes/health.ts
// - GET /health        full status (patch engine self-check, collaborator config)
// - GET /health/ready  readiness probe
// - GET /health/live   liveness probe

import { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { getHealthStatus, isReady, isAlive } from "../observability/healthCheck";

/* ---------- Route Registration ---------- */
export default async function healthRoutes(app: FastifyInstance) {
  // degraded still answers 200: /api/patch works without the collaborators
  app.get(
    "/health",
    async (_req: FastifyRequest, reply: FastifyReply) => {
      const health = await getHealthStatus();

      const statusCode = health.status === "unhealthy" ? 503 : 200;

      return reply.code(statusCode).send(health);
    }
  );

  app.get(
    "/health/ready",
    async (_req: FastifyRequest, reply: FastifyReply) => {
      const ready = await isReady();

      if (ready) {
        return reply.code(200).send({ ready: true });
      }

      return reply.code(503).send({ ready: false });
    }
  );

  app.get(
    "/health/live",
    async (_req: FastifyRequest, reply: FastifyReply) => {
      const alive = await isAlive();

      if (alive) {
        return reply.code(200).send({ alive: true });
      }

      return reply.code(503).send({ alive: false });
    }
  );
}
