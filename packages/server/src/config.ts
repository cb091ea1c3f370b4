export interface ConfigWarning {
  level: "warn" | "error";
  message: string;
}

export interface ServerConfig {
  port: number;
  host: string;
  redisUrl: string;
  /** Accelerator YAML file; searched for in the working and home directories when null. */
  acceleratorConfigPath: string | null;
  authToken: string | null;
  maxPoolSize: number;
  /** Settled tasks kept per pool for lookup by id. */
  maxRetainedTasks: number;
  /** Allowed CORS origins; empty reflects the request origin. */
  corsOrigins: string[];
}

/**
 * Validate server config at startup. Returns a list of warnings/errors.
 * Callers should log warnings and throw on errors.
 */
export function validateConfig(config: ServerConfig): ConfigWarning[] {
  const issues: ConfigWarning[] = [];

  if (!config.authToken) {
    issues.push({
      level: "warn",
      message: "ACCELFLEET_AUTH_TOKEN is not set, pool and job endpoints will reject every request",
    });
  }

  if (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535) {
    issues.push({ level: "error", message: `PORT must be a valid TCP port, got ${config.port}` });
  }

  if (!Number.isInteger(config.maxPoolSize) || config.maxPoolSize < 1) {
    issues.push({
      level: "error",
      message: `MAX_POOL_SIZE must be a positive integer, got ${config.maxPoolSize}`,
    });
  }

  if (!Number.isInteger(config.maxRetainedTasks) || config.maxRetainedTasks < 1) {
    issues.push({
      level: "error",
      message: `MAX_RETAINED_TASKS must be a positive integer, got ${config.maxRetainedTasks}`,
    });
  }

  return issues;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: parseInt(env.PORT ?? "4500", 10),
    host: env.HOST ?? "0.0.0.0",
    redisUrl: env.REDIS_URL ?? "redis://localhost:6379",
    acceleratorConfigPath: env.ACCELFLEET_CONFIG ?? null,
    authToken: env.ACCELFLEET_AUTH_TOKEN ?? null,
    maxPoolSize: parseInt(env.MAX_POOL_SIZE ?? "16", 10),
    maxRetainedTasks: parseInt(env.MAX_RETAINED_TASKS ?? "1000", 10),
    corsOrigins: (env.CORS_ORIGINS ?? "")
      .split(",")
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
  };
}
