import type { FastifyReply } from "fastify";
import type { ZodError } from "zod";
import {
  AcceleratorError,
  ConfigurationError,
  PoolClosedError,
} from "../errors.js";

/** Maps accelerator errors to HTTP statuses; anything else is rethrown. */
export function sendAcceleratorError(reply: FastifyReply, err: unknown): FastifyReply {
  if (err instanceof ConfigurationError) {
    return reply.status(400).send({ error: err.message });
  }
  if (err instanceof PoolClosedError) {
    return reply.status(409).send({ error: err.message });
  }
  if (err instanceof AcceleratorError) {
    return reply.status(502).send({ error: err.message });
  }
  const message = err instanceof Error ? err.message : String(err);
  if (message.includes("Redis unavailable")) {
    return reply.status(503).send({ error: message });
  }
  throw err;
}

export function sendValidationError(reply: FastifyReply, error: ZodError): FastifyReply {
  const issue = error.issues[0];
  const where = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
  return reply.status(400).send({ error: `${where}${issue.message}` });
}
