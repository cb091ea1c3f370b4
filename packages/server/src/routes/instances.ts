import type { FastifyInstance } from "fastify";
import type { InstancesListResponse } from "@accelfleet/shared";
import { sendAcceleratorError } from "./errors.js";

export default async function instanceRoutes(fastify: FastifyInstance) {
  const store = fastify.instanceStore;

  // GET /api/instances: instances created by this service and not terminated
  fastify.get("/api/instances", async (_request, reply) => {
    try {
      const instances = await store.list();
      return reply.send({ instances } satisfies InstancesListResponse);
    } catch (err: unknown) {
      return sendAcceleratorError(reply, err);
    }
  });
}
