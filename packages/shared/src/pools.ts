import type { AcceleratorResponse, AcceleratorStopReport, ConfigurationPayload, ProcessJob } from "./accelerators.js";
import type { HostType, StopPolicy } from "./hosts.js";

// ── Pool enums ───────────────────────────────────────────────────────

export type TaskState =
  | "queued"
  | "assigned"
  | "running"
  | "done"
  | "failed"
  | "cancelled";

/**
 * `strict` tears the whole pool down when any member fails to start;
 * `partial` keeps the members that started.
 */
export type StartStrictness = "strict" | "partial";

// ── Views ────────────────────────────────────────────────────────────

export interface TaskErrorView {
  name: string;
  message: string;
}

export interface TaskView {
  taskId: string;
  seq: number;
  state: TaskState;
  member: number | null;
  result?: Record<string, unknown>;
  diagnostics?: AcceleratorResponse;
  error?: TaskErrorView;
}

export interface PoolMemberView {
  index: number;
  name: string;
  active: boolean;
  busy: boolean;
  completed: number;
  failed: number;
}

export interface PoolSnapshot {
  size: number;
  started: boolean;
  closed: boolean;
  queued: number;
  running: number;
  members: PoolMemberView[];
}

export interface PoolView extends PoolSnapshot {
  poolId: string;
  accelerator: string;
  hostType: HostType;
  createdAt: number;
}

// ── API request/response types ───────────────────────────────────────

export interface CreatePoolRequest {
  accelerator: string;
  size: number;
  hostType?: HostType;
  region?: string;
  instanceType?: string;
  stopPolicy?: StopPolicy;
  strictness?: StartStrictness;
  /** One entry per member; reuses existing instances instead of creating. */
  instanceIds?: string[];
  addresses?: string[];
  configuration?: ConfigurationPayload;
}

export interface PoolResponse {
  pool: PoolView;
}

export interface PoolsListResponse {
  pools: PoolView[];
}

export interface SubmitJobsRequest {
  jobs: ProcessJob[];
  timeoutMs?: number;
}

export interface SubmitJobsResponse {
  tasks: TaskView[];
}

export interface MapJobsResponse {
  results: TaskView[];
}

export interface TaskResponse {
  task: TaskView;
}

export interface StopPoolRequest {
  policy?: StopPolicy;
  cancel?: boolean;
}

export interface StopPoolResponse {
  poolId: string;
  members: AcceleratorStopReport[];
}
