// ── Host enums ───────────────────────────────────────────────────────

export type HostType = "digitalocean" | "vastai";

/** Teardown applied to a host's instance when it is stopped. */
export type StopPolicy = "terminate" | "pause" | "keep";

export type HostState =
  | "created"
  | "provisioning"
  | "ready"
  | "failed"
  | "stopped";

/** Provider-neutral instance status reported by a host provider. */
export type InstanceStatus = "pending" | "ready" | "stopped" | "error";

export type HostStopAction =
  | "none"
  | "released"
  | "kept"
  | "paused"
  | "terminated"
  | "failed";

// ── Host identity ────────────────────────────────────────────────────

export type HostIdentity =
  | { kind: "create" }
  | { kind: "instance"; instanceId: string }
  | { kind: "address"; address: string };

// ── Instance record ──────────────────────────────────────────────────

export interface InstanceRecord {
  instanceId: string;
  hostType: HostType;
  address: string | null;
  accelerator: string;
  poolId: string | null;
  stopPolicy: StopPolicy;
  createdAt: number;
}

// ── API request/response types ───────────────────────────────────────

export interface InstancesListResponse {
  instances: InstanceRecord[];
}
