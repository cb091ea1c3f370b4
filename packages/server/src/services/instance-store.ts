import type Redis from "ioredis";
import type { InstanceRecord } from "@accelfleet/shared";
import { z } from "zod";

export interface InstanceStoreRedisKeys {
  instancesHash: string;
  updatesChannel: string;
}

const DEFAULT_REDIS_KEYS: InstanceStoreRedisKeys = {
  instancesHash: "accelfleet:instances",
  updatesChannel: "accelfleet:instances:updates",
};

const recordSchema = z.object({
  instanceId: z.string(),
  hostType: z.enum(["digitalocean", "vastai"]),
  address: z.string().nullable(),
  accelerator: z.string(),
  poolId: z.string().nullable(),
  stopPolicy: z.enum(["terminate", "pause", "keep"]),
  createdAt: z.number(),
});

/**
 * Instances created by this service and still alive (running or paused),
 * so they can be listed and reused by id after the pool that made them is
 * gone.
 */
export class InstanceStore {
  private keys: InstanceStoreRedisKeys;

  constructor(
    private redis: Redis | null,
    redisKeys?: InstanceStoreRedisKeys,
  ) {
    this.keys = redisKeys ?? DEFAULT_REDIS_KEYS;
  }

  get available(): boolean {
    return this.redis !== null;
  }

  private ensureRedis(): Redis {
    if (!this.redis) throw new Error("Redis unavailable");
    return this.redis;
  }

  async record(instance: InstanceRecord): Promise<void> {
    const r = this.ensureRedis();
    await r.hset(this.keys.instancesHash, instance.instanceId, JSON.stringify(instance));
    await r.publish(
      this.keys.updatesChannel,
      JSON.stringify({ type: "recorded", instanceId: instance.instanceId }),
    );
  }

  async get(instanceId: string): Promise<InstanceRecord | null> {
    const r = this.ensureRedis();
    const raw = await r.hget(this.keys.instancesHash, instanceId);
    return raw ? parseRecord(raw) : null;
  }

  async list(): Promise<InstanceRecord[]> {
    const r = this.ensureRedis();
    const all = await r.hgetall(this.keys.instancesHash);
    return Object.values(all)
      .map(parseRecord)
      .filter((rec): rec is InstanceRecord => rec !== null)
      .sort((a, b) => a.createdAt - b.createdAt);
  }

  async remove(instanceId: string): Promise<boolean> {
    const r = this.ensureRedis();
    const removed = await r.hdel(this.keys.instancesHash, instanceId);
    if (removed > 0) {
      await r.publish(
        this.keys.updatesChannel,
        JSON.stringify({ type: "removed", instanceId }),
      );
    }
    return removed > 0;
  }
}

function parseRecord(raw: string): InstanceRecord | null {
  try {
    const parsed = recordSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}
