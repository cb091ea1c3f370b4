import type { FastifyInstance } from "fastify";
import { z } from "zod";
import type {
  MapJobsResponse,
  PoolResponse,
  PoolsListResponse,
  StopPoolResponse,
  SubmitJobsResponse,
  TaskResponse,
} from "@accelfleet/shared";
import { HOST_TYPES } from "../services/host-provider.js";
import { sendAcceleratorError, sendValidationError } from "./errors.js";

const stopPolicySchema = z.enum(["terminate", "pause", "keep"]);

const jobSchema = z.object({
  parameters: z.record(z.string(), z.unknown()).optional(),
  fileIn: z.string().min(1).optional(),
  fileOut: z.string().min(1).optional(),
});

const createPoolSchema = z.object({
  accelerator: z.string().min(1),
  size: z.number().int().min(1),
  hostType: z.enum(HOST_TYPES).optional(),
  region: z.string().min(1).optional(),
  instanceType: z.string().min(1).optional(),
  stopPolicy: stopPolicySchema.optional(),
  strictness: z.enum(["strict", "partial"]).optional(),
  instanceIds: z.array(z.string().min(1)).optional(),
  addresses: z.array(z.string().min(1)).optional(),
  configuration: z
    .object({
      parameters: z.record(z.string(), z.unknown()).optional(),
      datafile: z.string().min(1).optional(),
    })
    .optional(),
});

const jobsSchema = z.object({
  jobs: z.array(jobSchema).min(1),
  timeoutMs: z.number().int().positive().optional(),
});

const stopSchema = z.object({
  policy: stopPolicySchema.optional(),
  cancel: z.boolean().optional(),
});

interface PoolParams {
  poolId: string;
}

interface TaskParams extends PoolParams {
  taskId: string;
}

export default async function poolRoutes(fastify: FastifyInstance) {
  const manager = fastify.poolManager;

  // GET /api/pools: list running pools
  fastify.get("/api/pools", async (_request, reply) => {
    return reply.send({ pools: manager.list() } satisfies PoolsListResponse);
  });

  // POST /api/pools: create and start a pool
  fastify.post("/api/pools", { preHandler: [fastify.verifyAuth] }, async (request, reply) => {
    const parsed = createPoolSchema.safeParse(request.body ?? {});
    if (!parsed.success) return sendValidationError(reply, parsed.error);

    try {
      const pool = await manager.create(parsed.data);
      return reply.status(201).send({ pool } satisfies PoolResponse);
    } catch (err: unknown) {
      return sendAcceleratorError(reply, err);
    }
  });

  // GET /api/pools/:poolId
  fastify.get<{ Params: PoolParams }>("/api/pools/:poolId", async (request, reply) => {
    const pool = manager.get(request.params.poolId);
    if (!pool) return reply.status(404).send({ error: "Pool not found" });
    return reply.send({ pool } satisfies PoolResponse);
  });

  // POST /api/pools/:poolId/jobs: submit without waiting
  fastify.post<{ Params: PoolParams }>(
    "/api/pools/:poolId/jobs",
    { preHandler: [fastify.verifyAuth] },
    async (request, reply) => {
      const parsed = jobsSchema.safeParse(request.body ?? {});
      if (!parsed.success) return sendValidationError(reply, parsed.error);

      try {
        const tasks = manager.submit(request.params.poolId, parsed.data.jobs, parsed.data.timeoutMs);
        if (!tasks) return reply.status(404).send({ error: "Pool not found" });
        return reply.status(202).send({ tasks } satisfies SubmitJobsResponse);
      } catch (err: unknown) {
        return sendAcceleratorError(reply, err);
      }
    },
  );

  // POST /api/pools/:poolId/map: run jobs and return outcomes in order
  fastify.post<{ Params: PoolParams }>(
    "/api/pools/:poolId/map",
    { preHandler: [fastify.verifyAuth] },
    async (request, reply) => {
      const parsed = jobsSchema.safeParse(request.body ?? {});
      if (!parsed.success) return sendValidationError(reply, parsed.error);

      try {
        const results = await manager.map(request.params.poolId, parsed.data.jobs, parsed.data.timeoutMs);
        if (!results) return reply.status(404).send({ error: "Pool not found" });
        return reply.send({ results } satisfies MapJobsResponse);
      } catch (err: unknown) {
        return sendAcceleratorError(reply, err);
      }
    },
  );

  // GET /api/pools/:poolId/tasks/:taskId
  fastify.get<{ Params: TaskParams }>("/api/pools/:poolId/tasks/:taskId", async (request, reply) => {
    const task = manager.getTask(request.params.poolId, request.params.taskId);
    if (!task) return reply.status(404).send({ error: "Task not found" });
    return reply.send({ task } satisfies TaskResponse);
  });

  // POST /api/pools/:poolId/tasks/:taskId/cancel
  fastify.post<{ Params: TaskParams }>(
    "/api/pools/:poolId/tasks/:taskId/cancel",
    { preHandler: [fastify.verifyAuth] },
    async (request, reply) => {
      const result = manager.cancelTask(request.params.poolId, request.params.taskId);
      if (!result) return reply.status(404).send({ error: "Task not found" });
      if (!result.cancelled) {
        return reply.status(409).send({ error: `Task already ${result.task.state}` });
      }
      return reply.send(result);
    },
  );

  // POST /api/pools/:poolId/stop: drain (or cancel) and stop every member
  fastify.post<{ Params: PoolParams }>(
    "/api/pools/:poolId/stop",
    { preHandler: [fastify.verifyAuth] },
    async (request, reply) => {
      const parsed = stopSchema.safeParse(request.body ?? {});
      if (!parsed.success) return sendValidationError(reply, parsed.error);

      const report = await manager.stop(request.params.poolId, parsed.data);
      if (!report) return reply.status(404).send({ error: "Pool not found" });
      return reply.send(report satisfies StopPoolResponse);
    },
  );
}
