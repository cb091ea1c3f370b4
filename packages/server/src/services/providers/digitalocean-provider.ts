import type { FastifyBaseLogger } from "fastify";
import type { InstanceStatus } from "@accelfleet/shared";
import { z } from "zod";
import type {
  CreateInstanceSpec,
  HardwareTierSpec,
  HostProvider,
  InstanceRef,
} from "../host-provider.js";

const DO_API = "https://api.digitalocean.com";
const DEFAULT_REGION = "tor1";
const DEFAULT_IMAGE = "ubuntu-22-04-x64";

const DEFAULT_HARDWARE_TIERS: Record<string, HardwareTierSpec> = {
  standard: { minDeviceRamMb: 48_000, minCpuCores: 16 },
};

export interface DigitalOceanProviderConfig {
  apiKey: string | null;
  log: FastifyBaseLogger;
  region?: string | null;
  sshKey?: string | null;
  hardwareTiers?: Record<string, HardwareTierSpec>;
}

const sizeSchema = z.object({
  slug: z.string(),
  vcpus: z.number(),
  price_hourly: z.number(),
  regions: z.array(z.string()),
  available: z.boolean(),
  gpu_info: z
    .object({
      count: z.number(),
      vram: z.object({ amount: z.number(), unit: z.string() }),
      model: z.string(),
    })
    .optional(),
});

type DOSize = z.infer<typeof sizeSchema>;

const dropletSchema = z.object({
  id: z.number(),
  name: z.string().optional(),
  status: z.string(),
  networks: z
    .object({
      v4: z
        .array(z.object({ ip_address: z.string(), type: z.string() }))
        .default([]),
    })
    .optional(),
});

type Droplet = z.infer<typeof dropletSchema>;

const DROPLET_STATUS: Record<string, InstanceStatus> = {
  new: "pending",
  active: "ready",
  off: "stopped",
  archive: "error",
};

export class DigitalOceanProvider implements HostProvider {
  readonly type = "digitalocean" as const;
  readonly supportsPause = true;

  private apiKey: string | null;
  private log: FastifyBaseLogger;
  private region: string;
  private sshKey: string | null;
  private hardwareTiers: Record<string, HardwareTierSpec>;

  constructor(config: DigitalOceanProviderConfig) {
    this.apiKey = config.apiKey;
    this.log = config.log;
    this.region = config.region ?? DEFAULT_REGION;
    this.sshKey = config.sshKey ?? null;
    this.hardwareTiers = config.hardwareTiers ?? DEFAULT_HARDWARE_TIERS;
  }

  async create(spec: CreateInstanceSpec): Promise<InstanceRef> {
    const region = spec.region ?? this.region;
    let size = spec.instanceType;
    if (!size) {
      const sizes = await this.findSizes(spec.hardwareTier, region);
      if (sizes.length === 0) {
        throw new Error("No suitable DigitalOcean accelerator sizes found");
      }
      size = sizes[0].slug;
      this.log.info(
        { slug: sizes[0].slug, cost: sizes[0].price_hourly },
        "Selected DigitalOcean accelerator size",
      );
    }

    const res = await this.request("/v2/droplets", {
      method: "POST",
      body: JSON.stringify({
        name: spec.name,
        region,
        size,
        image: spec.image ?? DEFAULT_IMAGE,
        tags: spec.tags,
        ...(this.sshKey ? { ssh_keys: [this.sshKey] } : {}),
      }),
    });

    if (!res.ok) {
      const body = await res.text();
      throw new Error(`DigitalOcean create droplet failed: ${res.status} ${body}`);
    }

    const data = z.object({ droplet: z.object({ id: z.number() }).optional() }).parse(await res.json());
    if (!data.droplet) {
      throw new Error("DigitalOcean did not return a droplet ID");
    }

    this.log.info({ dropletId: data.droplet.id, size, region }, "Created DigitalOcean droplet");
    return {
      id: String(data.droplet.id),
      hostType: this.type,
      meta: { sizeSlug: size, region },
    };
  }

  async find(instanceId: string): Promise<InstanceRef | null> {
    const droplet = await this.getDroplet(instanceId);
    if (!droplet) return null;
    return { id: String(droplet.id), hostType: this.type, meta: { name: droplet.name ?? null } };
  }

  async status(ref: InstanceRef): Promise<InstanceStatus> {
    const droplet = await this.getDroplet(ref.id);
    if (!droplet) {
      throw new Error(`DigitalOcean droplet ${ref.id} no longer exists`);
    }
    return DROPLET_STATUS[droplet.status] ?? "pending";
  }

  async address(ref: InstanceRef): Promise<string | null> {
    const droplet = await this.getDroplet(ref.id);
    const publicNet = droplet?.networks?.v4.find((n) => n.type === "public");
    return publicNet?.ip_address ?? null;
  }

  async terminate(ref: InstanceRef): Promise<void> {
    const res = await this.request(`/v2/droplets/${ref.id}`, { method: "DELETE" });
    // Already gone counts as terminated.
    if (res.status === 404) return;
    if (!res.ok) {
      throw new Error(`DigitalOcean delete droplet failed: ${res.status}`);
    }
  }

  async pause(ref: InstanceRef): Promise<void> {
    await this.dropletAction(ref, "power_off");
  }

  async resume(ref: InstanceRef): Promise<void> {
    await this.dropletAction(ref, "power_on");
  }

  private async dropletAction(ref: InstanceRef, type: "power_off" | "power_on"): Promise<void> {
    const res = await this.request(`/v2/droplets/${ref.id}/actions`, {
      method: "POST",
      body: JSON.stringify({ type }),
    });
    if (!res.ok) {
      const body = await res.text();
      throw new Error(`DigitalOcean ${type} failed: ${res.status} ${body}`);
    }
  }

  private async getDroplet(dropletId: string): Promise<Droplet | null> {
    const res = await this.request(`/v2/droplets/${dropletId}`);
    if (res.status === 404) return null;
    if (!res.ok) {
      throw new Error(`DigitalOcean droplet status check failed: ${res.status}`);
    }
    const data = z.object({ droplet: dropletSchema.optional() }).parse(await res.json());
    if (!data.droplet) {
      throw new Error("DigitalOcean returned no droplet");
    }
    return data.droplet;
  }

  private async findSizes(tier: string, region: string): Promise<DOSize[]> {
    const tierSpec = this.hardwareTiers[tier] ?? DEFAULT_HARDWARE_TIERS["standard"];

    const res = await this.request("/v2/sizes?per_page=200");
    if (!res.ok) {
      throw new Error(`DigitalOcean sizes request failed: ${res.status} ${res.statusText}`);
    }

    const data = z.object({ sizes: z.array(sizeSchema).default([]) }).parse(await res.json());

    return data.sizes
      .filter((s) => {
        if (!s.available) return false;
        if (!s.regions.includes(region)) return false;
        if (!s.gpu_info) return false;
        // Attached accelerator memory is reported in GiB, tiers are in MiB
        const vramMb = s.gpu_info.vram.amount * 1024;
        if (vramMb < tierSpec.minDeviceRamMb) return false;
        if (s.vcpus < tierSpec.minCpuCores) return false;
        return true;
      })
      .sort((a, b) => a.price_hourly - b.price_hourly);
  }

  private async request(pathname: string, init: RequestInit = {}): Promise<Response> {
    if (!this.apiKey) {
      throw new Error("DigitalOcean API key not configured");
    }
    return fetch(`${DO_API}${pathname}`, {
      ...init,
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        ...(init.body ? { "Content-Type": "application/json" } : {}),
      },
    });
  }
}
