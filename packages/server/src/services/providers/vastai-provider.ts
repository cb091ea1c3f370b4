import type { FastifyBaseLogger } from "fastify";
import type { InstanceStatus } from "@accelfleet/shared";
import { z } from "zod";
import type {
  CreateInstanceSpec,
  HardwareTierSpec,
  HostProvider,
  InstanceRef,
} from "../host-provider.js";

const VASTAI_API = "https://console.vast.ai/api/v0";
const MIN_INET_DOWN_MBPS = 800;
const MIN_INET_UP_MBPS = 800;
const MIN_RELIABILITY = 0.99;
const MIN_DEVICE_RAM_MB = 48_000;
const MIN_CPU_CORES = 16;

const DEFAULT_DOCKER_IMAGE = "ubuntu:22.04";
const DEFAULT_HARDWARE_TIERS: Record<string, HardwareTierSpec> = {
  standard: { minDeviceRamMb: MIN_DEVICE_RAM_MB, minCpuCores: MIN_CPU_CORES },
};

const INSTANCE_STATUS: Record<string, InstanceStatus> = {
  running: "ready",
  created: "pending",
  loading: "pending",
  scheduling: "pending",
  exited: "stopped",
  stopped: "stopped",
  offline: "error",
  error: "error",
};

export interface VastAIProviderConfig {
  apiKey: string | null;
  log: FastifyBaseLogger;
  dockerImage?: string;
  diskGb?: number;
  hardwareTiers?: Record<string, HardwareTierSpec>;
}

const offerSchema = z.object({
  id: z.number(),
  gpu_name: z.string(),
  dph_total: z.number(),
  num_gpus: z.number(),
});

type VastOffer = z.infer<typeof offerSchema>;

const instanceSchema = z.object({
  id: z.number().optional(),
  actual_status: z.string().nullish(),
  public_ipaddr: z.string().nullish(),
  label: z.string().nullish(),
});

type VastInstance = z.infer<typeof instanceSchema>;

export class VastAIProvider implements HostProvider {
  readonly type = "vastai" as const;
  readonly supportsPause = true;

  private apiKey: string | null;
  private log: FastifyBaseLogger;
  private dockerImage: string;
  private diskGb: number;
  private hardwareTiers: Record<string, HardwareTierSpec>;

  constructor(config: VastAIProviderConfig) {
    this.apiKey = config.apiKey;
    this.log = config.log;
    this.dockerImage = config.dockerImage ?? DEFAULT_DOCKER_IMAGE;
    this.diskGb = config.diskGb ?? 20;
    this.hardwareTiers = config.hardwareTiers ?? DEFAULT_HARDWARE_TIERS;
  }

  async create(spec: CreateInstanceSpec): Promise<InstanceRef> {
    // An explicit instance type is an offer id.
    const offers: VastOffer[] = spec.instanceType
      ? [{ id: parseOfferId(spec.instanceType), gpu_name: "requested", dph_total: 0, num_gpus: 1 }]
      : await this.findOffers(spec.hardwareTier);
    if (offers.length === 0) {
      throw new Error("No suitable vast.ai accelerator offers found");
    }

    // Stale offers may vanish between search and create
    let lastError: Error | undefined;
    for (const offer of offers) {
      this.log.info(
        { offerId: offer.id, gpu: offer.gpu_name, cost: offer.dph_total },
        "Trying vast.ai offer",
      );

      try {
        const instanceId = await this.createInstance(offer.id, spec);
        return {
          id: String(instanceId),
          hostType: this.type,
          meta: { offerId: offer.id, gpuName: offer.gpu_name, costPerHour: offer.dph_total },
        };
      } catch (err) {
        lastError = err instanceof Error ? err : new Error(String(err));
        if (this.isRetryableOfferError(lastError)) {
          this.log.warn(
            { offerId: offer.id, err: lastError.message },
            "Offer unavailable, trying next",
          );
          continue;
        }
        throw lastError;
      }
    }

    throw lastError ?? new Error("All vast.ai offers exhausted");
  }

  async find(instanceId: string): Promise<InstanceRef | null> {
    const instance = await this.getInstance(instanceId);
    if (!instance) return null;
    return { id: instanceId, hostType: this.type, meta: { label: instance.label ?? null } };
  }

  async status(ref: InstanceRef): Promise<InstanceStatus> {
    const instance = await this.getInstance(ref.id);
    if (!instance) {
      throw new Error(`vast.ai instance ${ref.id} no longer exists`);
    }
    if (!instance.actual_status) return "pending";
    return INSTANCE_STATUS[instance.actual_status] ?? "pending";
  }

  async address(ref: InstanceRef): Promise<string | null> {
    const instance = await this.getInstance(ref.id);
    return instance?.public_ipaddr?.trim() || null;
  }

  async terminate(ref: InstanceRef): Promise<void> {
    const res = await this.request(`/instances/${ref.id}/`, { method: "DELETE" });
    if (res.status === 404) return;
    if (!res.ok) {
      const body = await res.text();
      throw new Error(`vast.ai destroy instance failed: ${res.status} ${body}`);
    }
  }

  async pause(ref: InstanceRef): Promise<void> {
    await this.setState(ref, "stopped");
  }

  async resume(ref: InstanceRef): Promise<void> {
    await this.setState(ref, "running");
  }

  private async setState(ref: InstanceRef, state: "stopped" | "running"): Promise<void> {
    const res = await this.request(`/instances/${ref.id}/`, {
      method: "PUT",
      body: JSON.stringify({ state }),
    });
    if (!res.ok) {
      const body = await res.text();
      throw new Error(`vast.ai set state ${state} failed: ${res.status} ${body}`);
    }
  }

  private async getInstance(instanceId: string): Promise<VastInstance | null> {
    const res = await this.request(`/instances/${instanceId}/`);
    if (res.status === 404) return null;
    if (!res.ok) {
      throw new Error(`vast.ai instance status check failed: ${res.status}`);
    }
    const data = z
      .object({ instances: instanceSchema.nullish() })
      .passthrough()
      .parse(await res.json());
    // The API answers with `{ instances: null }` for destroyed instances.
    return data.instances ?? null;
  }

  private async findOffers(tier: string): Promise<VastOffer[]> {
    const tierSpec = this.hardwareTiers[tier] ?? DEFAULT_HARDWARE_TIERS["standard"];
    const query = JSON.stringify({
      gpu_ram: { gte: tierSpec.minDeviceRamMb },
      cpu_cores_effective: { gte: tierSpec.minCpuCores },
      inet_down: { gte: MIN_INET_DOWN_MBPS },
      inet_up: { gte: MIN_INET_UP_MBPS },
      rentable: { eq: true },
      num_gpus: { eq: 1 },
      reliability2: { gte: MIN_RELIABILITY },
      order: [["dph_total", "asc"]],
      type: "on-demand",
      limit: 10,
    });

    const res = await this.request(`/bundles?q=${encodeURIComponent(query)}`);
    if (!res.ok) {
      throw new Error(`vast.ai search failed: ${res.status} ${res.statusText}`);
    }

    const data = z.object({ offers: z.array(offerSchema).default([]) }).parse(await res.json());
    return data.offers;
  }

  private async createInstance(offerId: number, spec: CreateInstanceSpec): Promise<number> {
    const res = await this.request(`/asks/${offerId}/`, {
      method: "PUT",
      body: JSON.stringify({
        client_id: "me",
        image: spec.image ?? this.dockerImage,
        disk: this.diskGb,
        label: spec.name,
      }),
    });

    if (!res.ok) {
      const body = await res.text();
      throw new Error(`vast.ai create instance failed: ${res.status} ${body}`);
    }

    const data = z.object({ new_contract: z.number().optional() }).parse(await res.json());
    if (!data.new_contract) {
      throw new Error("vast.ai did not return an instance ID");
    }

    return data.new_contract;
  }

  private isRetryableOfferError(err: Error): boolean {
    return err.message.includes("no_such_ask");
  }

  private async request(pathname: string, init: RequestInit = {}): Promise<Response> {
    if (!this.apiKey) {
      throw new Error("vast.ai API key not configured");
    }
    return fetch(`${VASTAI_API}${pathname}`, {
      ...init,
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        ...(init.body ? { "Content-Type": "application/json" } : {}),
      },
    });
  }
}

function parseOfferId(value: string): number {
  const id = Number(value);
  if (!Number.isInteger(id) || id <= 0) {
    throw new Error(`vast.ai instance type must be a numeric offer id, got "${value}"`);
  }
  return id;
}
