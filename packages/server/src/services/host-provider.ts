import type { HostType, InstanceStatus } from "@accelfleet/shared";

export const HOST_TYPES = ["digitalocean", "vastai"] as const satisfies readonly HostType[];

export function isHostType(value: string): value is HostType {
  return HOST_TYPES.some((t) => t === value);
}

/** Handle on a provider instance. `id` is the provider's own identifier. */
export interface InstanceRef {
  id: string;
  hostType: HostType;
  meta?: Record<string, unknown>;
}

/** Minimum machine for a hardware tier, used when no instance type is given. */
export interface HardwareTierSpec {
  /** Memory of the attached accelerator device. */
  minDeviceRamMb: number;
  minCpuCores: number;
}

export interface CreateInstanceSpec {
  /** Instance name, unique per host. */
  name: string;
  accelerator: string;
  region: string | null;
  /** Provider size/offer; chosen from `hardwareTier` when null. */
  instanceType: string | null;
  image: string | null;
  hardwareTier: string;
  tags: string[];
}

/**
 * Instance lifecycle calls for one cloud backend. Implementations throw on
 * transport or API failures; `find` returns null for an unknown id.
 */
export interface HostProvider {
  readonly type: HostType;
  /** False when the backend cannot stop an instance without destroying it. */
  readonly supportsPause: boolean;

  create(spec: CreateInstanceSpec): Promise<InstanceRef>;
  find(instanceId: string): Promise<InstanceRef | null>;
  status(ref: InstanceRef): Promise<InstanceStatus>;
  /** Public address, or null while the provider has not assigned one yet. */
  address(ref: InstanceRef): Promise<string | null>;
  terminate(ref: InstanceRef): Promise<void>;
  pause(ref: InstanceRef): Promise<void>;
  resume(ref: InstanceRef): Promise<void>;
}
