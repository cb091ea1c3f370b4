import fp from "fastify-plugin";
import { timingSafeEqual } from "node:crypto";
import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";

declare module "fastify" {
  interface FastifyRequest {
    authenticated?: boolean;
  }
  interface FastifyInstance {
    verifyAuth: (
      request: FastifyRequest,
      reply: FastifyReply,
    ) => Promise<void>;
  }
}

export default fp(async function authPlugin(fastify: FastifyInstance) {
  const configToken = fastify.serverConfig.authToken;

  async function verifyAuth(
    request: FastifyRequest,
    reply: FastifyReply,
  ): Promise<void> {
    if (configToken) {
      const header = request.headers.authorization;
      if (header?.startsWith("Bearer ")) {
        const provided = header.slice(7);
        const a = Buffer.from(provided, "utf-8");
        const b = Buffer.from(configToken, "utf-8");

        if (a.length === b.length && timingSafeEqual(a, b)) {
          request.authenticated = true;
          return;
        }
      }
    }

    reply
      .status(401)
      .send({ error: "Missing or invalid authentication credentials" });
  }

  fastify.decorate("verifyAuth", verifyAuth);
});
