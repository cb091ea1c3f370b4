import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import type { ServerConfig } from "./config.js";
import redisPlugin from "./plugins/redis.js";
import corsPlugin from "./plugins/cors.js";
import authPlugin from "./plugins/auth.js";
import poolsPlugin from "./plugins/pools.js";
import statusRoutes from "./routes/status.js";
import poolRoutes from "./routes/pools.js";
import instanceRoutes from "./routes/instances.js";

declare module "fastify" {
  interface FastifyInstance {
    serverConfig: ServerConfig;
  }
}

export async function buildServer(
  config: ServerConfig,
  options: FastifyServerOptions = {},
): Promise<FastifyInstance> {
  const fastify = Fastify({ bodyLimit: 5 * 1024 * 1024, ...options });

  fastify.decorate("serverConfig", config);

  // Plugins (redis before pools, all before routes)
  await fastify.register(corsPlugin);
  await fastify.register(redisPlugin, { url: config.redisUrl });
  await fastify.register(authPlugin);
  await fastify.register(poolsPlugin);

  // API routes
  await fastify.register(statusRoutes);
  await fastify.register(poolRoutes);
  await fastify.register(instanceRoutes);

  fastify.setNotFoundHandler(async (_request, reply) => {
    return reply.status(404).send({ error: "Not found" });
  });

  return fastify;
}
