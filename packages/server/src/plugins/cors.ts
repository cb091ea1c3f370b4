import fp from "fastify-plugin";
import cors from "@fastify/cors";
import type { FastifyInstance } from "fastify";

/** Reflects any origin unless `CORS_ORIGINS` lists the allowed ones. */
export default fp(async function corsPlugin(fastify: FastifyInstance) {
  const { corsOrigins } = fastify.serverConfig;
  await fastify.register(cors, {
    origin: corsOrigins.length > 0 ? corsOrigins : true,
    methods: ["GET", "POST"],
  });
});
