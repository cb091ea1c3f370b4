import fp from "fastify-plugin";
import type { FastifyInstance } from "fastify";
import { Configuration } from "../services/configuration.js";
import { InstanceStore } from "../services/instance-store.js";
import { PoolManager } from "../services/pool-manager.js";

declare module "fastify" {
  interface FastifyInstance {
    acceleratorConfig: Configuration;
    instanceStore: InstanceStore;
    poolManager: PoolManager;
  }
}

export default fp(async function poolsPlugin(fastify: FastifyInstance) {
  const config = fastify.serverConfig;

  const acceleratorConfig = await Configuration.load({
    path: config.acceleratorConfigPath,
    log: fastify.log,
  });
  const store = new InstanceStore(fastify.redis);
  const manager = new PoolManager({
    configuration: acceleratorConfig,
    store,
    log: fastify.log,
    maxPoolSize: config.maxPoolSize,
    maxRetainedTasks: config.maxRetainedTasks,
  });

  fastify.decorate("acceleratorConfig", acceleratorConfig);
  fastify.decorate("instanceStore", store);
  fastify.decorate("poolManager", manager);

  fastify.addHook("onClose", () => manager.stopAll());
});
