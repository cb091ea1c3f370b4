import type { FastifyInstance } from "fastify";
import type { ServiceStatusResponse } from "@accelfleet/shared";

export default async function statusRoutes(fastify: FastifyInstance) {
  const startedAt = Date.now();

  fastify.get("/api/status", async (_request, reply) => {
    return reply.send({
      ok: true,
      redis: fastify.redis !== null,
      pools: fastify.poolManager.count,
      uptimeS: Math.round((Date.now() - startedAt) / 1000),
    } satisfies ServiceStatusResponse);
  });
}
