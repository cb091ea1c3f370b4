import type { FastifyBaseLogger } from "fastify";
import { nanoid } from "nanoid";
import type {
  CreatePoolRequest,
  HostIdentity,
  HostType,
  PoolView,
  ProcessJob,
  StopPoolRequest,
  StopPoolResponse,
  TaskView,
} from "@accelfleet/shared";
import { ConfigurationError, errorMessage } from "../errors.js";
import { Accelerator } from "./accelerator.js";
import { RestAcceleratorSession, type AcceleratorSession } from "./accelerator-session.js";
import type { Configuration } from "./configuration.js";
import { Host } from "./host.js";
import type { HostProvider } from "./host-provider.js";
import type { InstanceStore } from "./instance-store.js";
import { AcceleratorPool, type TaskHandle, type TaskOutcome } from "./pool-executor.js";
import { createHostProvider } from "./provider-registry.js";
import type { ReachabilityProbe } from "./reachability.js";
import {
  resolveAcceleratorSettings,
  type AcceleratorOverrides,
  type AcceleratorSettings,
  type HostSettings,
} from "./settings.js";

export interface PoolManagerConfig {
  configuration: Configuration;
  store: InstanceStore;
  log: FastifyBaseLogger;
  maxPoolSize?: number;
  /** Settled tasks kept per pool for lookup; the oldest are dropped first. */
  maxRetainedTasks?: number;
  createProvider?: (settings: HostSettings, log: FastifyBaseLogger) => HostProvider;
  createSession?: (
    baseUrl: string,
    settings: AcceleratorSettings,
    log: FastifyBaseLogger,
  ) => AcceleratorSession;
  probe?: ReachabilityProbe;
}

interface ManagedPool {
  poolId: string;
  accelerator: string;
  hostType: HostType;
  createdAt: number;
  pool: AcceleratorPool<Accelerator>;
  tasks: Map<string, TaskHandle>;
  outcomes: Map<string, TaskOutcome>;
}

const DEFAULT_MAX_POOL_SIZE = 16;
const DEFAULT_MAX_RETAINED_TASKS = 1000;

/** Named pools behind the HTTP API. */
export class PoolManager {
  private configuration: Configuration;
  private store: InstanceStore;
  private log: FastifyBaseLogger;
  private maxPoolSize: number;
  private maxRetainedTasks: number;
  private createProvider: NonNullable<PoolManagerConfig["createProvider"]>;
  private createSession: NonNullable<PoolManagerConfig["createSession"]>;
  private probe: ReachabilityProbe | undefined;
  private pools = new Map<string, ManagedPool>();

  constructor(config: PoolManagerConfig) {
    this.configuration = config.configuration;
    this.store = config.store;
    this.log = config.log;
    this.maxPoolSize = config.maxPoolSize ?? DEFAULT_MAX_POOL_SIZE;
    this.maxRetainedTasks = config.maxRetainedTasks ?? DEFAULT_MAX_RETAINED_TASKS;
    this.createProvider = config.createProvider ?? createHostProvider;
    this.createSession =
      config.createSession ??
      ((baseUrl, settings, log) =>
        new RestAcceleratorSession({
          baseUrl,
          log,
          pollIntervalMs: settings.sessionPollIntervalMs,
        }));
    this.probe = config.probe;
  }

  get count(): number {
    return this.pools.size;
  }

  /** Builds and starts a pool; a pool that fails to start is not kept. */
  async create(request: CreatePoolRequest): Promise<PoolView> {
    const { size } = request;
    if (!Number.isInteger(size) || size < 1 || size > this.maxPoolSize) {
      throw new ConfigurationError(`Pool size must be between 1 and ${this.maxPoolSize}`);
    }
    for (const [field, list] of [
      ["instanceIds", request.instanceIds],
      ["addresses", request.addresses],
    ] as const) {
      if (list && list.length !== size) {
        throw new ConfigurationError(`${field} must list one entry per pool member (${size})`);
      }
    }

    const overrides: AcceleratorOverrides = {
      accelerator: request.accelerator,
      hostType: request.hostType,
      region: request.region,
      instanceType: request.instanceType,
      stopPolicy: request.stopPolicy,
    };
    const members = Array.from({ length: size }, (_, index) =>
      resolveAcceleratorSettings(this.configuration, {
        ...overrides,
        identity: memberIdentity(request, index),
      }),
    );

    const poolId = nanoid(12);
    const log = this.log.child({ poolId });
    const pool = new AcceleratorPool<Accelerator>({
      size,
      startStrictness: request.strictness,
      defaultTimeoutMs: members[0].jobTimeoutMs,
      log,
      createMember: (index) => this.buildAccelerator(members[index], index, log),
    });

    const managed: ManagedPool = {
      poolId,
      accelerator: members[0].accelerator,
      hostType: members[0].host.hostType,
      createdAt: Date.now(),
      pool,
      tasks: new Map(),
      outcomes: new Map(),
    };
    this.pools.set(poolId, managed);

    try {
      await pool.start(request.configuration ?? {});
    } catch (err) {
      this.pools.delete(poolId);
      throw err;
    }

    await this.recordInstances(managed);
    return this.view(managed);
  }

  list(): PoolView[] {
    return [...this.pools.values()].map((m) => this.view(m));
  }

  get(poolId: string): PoolView | null {
    const managed = this.pools.get(poolId);
    return managed ? this.view(managed) : null;
  }

  submit(poolId: string, jobs: ProcessJob[], timeoutMs?: number): TaskView[] | null {
    const managed = this.pools.get(poolId);
    if (!managed) return null;

    return jobs.map((job) => {
      const handle = managed.pool.submit(job, { timeoutMs });
      managed.tasks.set(handle.id, handle);
      handle.outcome
        .then((outcome) => {
          managed.outcomes.set(handle.id, outcome);
          this.pruneOutcomes(managed);
        })
        .catch((err: unknown) => {
          this.log.error({ err, taskId: handle.id }, "Failed to record task outcome");
        });
      return this.taskView(managed, handle);
    });
  }

  async map(poolId: string, jobs: ProcessJob[], timeoutMs?: number): Promise<TaskView[] | null> {
    const managed = this.pools.get(poolId);
    if (!managed) return null;
    const outcomes = await managed.pool.map(jobs, { timeoutMs });
    return outcomes.map(outcomeView);
  }

  getTask(poolId: string, taskId: string): TaskView | null {
    const managed = this.pools.get(poolId);
    const handle = managed?.tasks.get(taskId);
    if (!managed || !handle) return null;
    return this.taskView(managed, handle);
  }

  cancelTask(poolId: string, taskId: string): { cancelled: boolean; task: TaskView } | null {
    const managed = this.pools.get(poolId);
    const handle = managed?.tasks.get(taskId);
    if (!managed || !handle) return null;
    const cancelled = handle.cancel();
    return { cancelled, task: this.taskView(managed, handle) };
  }

  async stop(poolId: string, request: StopPoolRequest = {}): Promise<StopPoolResponse | null> {
    const managed = this.pools.get(poolId);
    if (!managed) return null;

    const report = await managed.pool.stop(request);
    this.pools.delete(poolId);

    for (const member of this.store.available ? report.members : []) {
      const { instanceId, action } = member.host;
      if (!instanceId || action !== "terminated") continue;
      try {
        await this.store.remove(instanceId);
      } catch (err) {
        this.log.warn({ instanceId, err: errorMessage(err) }, "Failed to remove instance record");
      }
    }

    return { poolId, members: report.members };
  }

  async stopAll(): Promise<void> {
    const ids = [...this.pools.keys()];
    await Promise.allSettled(ids.map((id) => this.stop(id)));
  }

  private buildAccelerator(
    settings: AcceleratorSettings,
    index: number,
    poolLog: FastifyBaseLogger,
  ): Accelerator {
    const log = poolLog.child({ member: index });
    const provider =
      settings.host.identity.kind === "address" ? null : this.createProvider(settings.host, log);
    const host = new Host({
      settings: settings.host,
      accelerator: settings.accelerator,
      provider,
      probe: this.probe,
      log,
    });
    return new Accelerator({
      name: `${settings.accelerator}#${index}`,
      host,
      createSession: (baseUrl) => this.createSession(baseUrl, settings, log),
      log,
    });
  }

  private async recordInstances(managed: ManagedPool): Promise<void> {
    if (!this.store.available) return;
    for (const member of managed.pool.members) {
      const { host } = member;
      if (host.identity.kind !== "create" || !host.instanceId) continue;
      try {
        await this.store.record({
          instanceId: host.instanceId,
          hostType: host.hostType,
          address: host.address,
          accelerator: managed.accelerator,
          poolId: managed.poolId,
          stopPolicy: host.stopPolicy,
          createdAt: Date.now(),
        });
      } catch (err) {
        this.log.warn(
          { instanceId: host.instanceId, err: errorMessage(err) },
          "Failed to record instance",
        );
      }
    }
  }

  private pruneOutcomes(managed: ManagedPool): void {
    for (const taskId of managed.outcomes.keys()) {
      if (managed.outcomes.size <= this.maxRetainedTasks) return;
      managed.outcomes.delete(taskId);
      managed.tasks.delete(taskId);
    }
  }

  private view(managed: ManagedPool): PoolView {
    return {
      poolId: managed.poolId,
      accelerator: managed.accelerator,
      hostType: managed.hostType,
      createdAt: managed.createdAt,
      ...managed.pool.snapshot(),
    };
  }

  private taskView(managed: ManagedPool, handle: TaskHandle): TaskView {
    const outcome = managed.outcomes.get(handle.id);
    if (outcome) return outcomeView(outcome);
    return { taskId: handle.id, seq: handle.seq, state: handle.state, member: handle.member };
  }
}

/**
 * Per-member identity from the request. A single-member pool without one
 * may reuse the configured `instance_id` or `host_ip`; larger pools create.
 */
function memberIdentity(request: CreatePoolRequest, index: number): HostIdentity | undefined {
  const instanceId = request.instanceIds?.[index];
  if (instanceId) return { kind: "instance", instanceId };
  const address = request.addresses?.[index];
  if (address) return { kind: "address", address };
  return request.size === 1 ? undefined : { kind: "create" };
}

export function outcomeView(outcome: TaskOutcome): TaskView {
  const base = { taskId: outcome.taskId, seq: outcome.seq, member: outcome.member };
  switch (outcome.status) {
    case "done":
      return { ...base, state: "done", result: outcome.result, diagnostics: outcome.diagnostics };
    case "failed":
      return {
        ...base,
        state: "failed",
        error: { name: outcome.error.name, message: outcome.error.message },
      };
    case "cancelled":
      return { ...base, state: "cancelled" };
  }
}
