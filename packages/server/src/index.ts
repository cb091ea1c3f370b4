import { loadConfig, validateConfig } from "./config.js";
import { buildServer } from "./app.js";

async function main() {
  const config = loadConfig();

  // Validate config before constructing the server
  const issues = validateConfig(config);
  for (const issue of issues) {
    if (issue.level === "error") {
      console.error(`Config error: ${issue.message}`);
    } else {
      console.warn(`Config warning: ${issue.message}`);
    }
  }
  if (issues.some((i) => i.level === "error")) {
    process.exit(1);
  }

  const fastify = await buildServer(config, {
    logger: {
      level: process.env.LOG_LEVEL ?? "info",
      transport: {
        target: "pino-pretty",
        options: { translateTime: "HH:MM:ss Z", ignore: "pid,hostname" },
      },
    },
  });

  // Stop pools (and their instances, per stop policy) on shutdown
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      fastify.log.info({ signal }, "Shutting down");
      fastify.close().then(
        () => process.exit(0),
        (err: unknown) => {
          fastify.log.error({ err }, "Shutdown failed");
          process.exit(1);
        },
      );
    });
  }

  await fastify.listen({ port: config.port, host: config.host });
  fastify.log.info(
    `Accelerator pool server listening on http://localhost:${config.port}`,
  );
}

main().catch((err) => {
  console.error("Failed to start server:", err);
  process.exit(1);
});
