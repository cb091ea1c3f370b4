import { describe, it } from "node:test";
import assert from "node:assert/strict";
import type Redis from "ioredis";
import type { InstanceRecord } from "@accelfleet/shared";
import { InstanceStore } from "../instance-store.js";
import { FakeRedis } from "./fakes.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeStore() {
  const redis = new FakeRedis();
  const store = new InstanceStore(redis as unknown as Redis);
  return { redis, store };
}

function makeRecord(overrides: Partial<InstanceRecord> = {}): InstanceRecord {
  return {
    instanceId: "4242",
    hostType: "digitalocean",
    address: "203.0.113.10",
    accelerator: "gzip",
    poolId: "pool-1",
    stopPolicy: "terminate",
    createdAt: 1_700_000_000_000,
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("InstanceStore", () => {
  it("records an instance and announces it", async () => {
    const { redis, store } = makeStore();

    await store.record(makeRecord());

    assert.deepEqual(await store.get("4242"), makeRecord());
    assert.deepEqual(redis.published, [
      ["accelfleet:instances:updates", '{"type":"recorded","instanceId":"4242"}'],
    ]);
  });

  it("lists records oldest first and skips unreadable entries", async () => {
    const { redis, store } = makeStore();
    await store.record(makeRecord({ instanceId: "b", createdAt: 2 }));
    await store.record(makeRecord({ instanceId: "a", createdAt: 1 }));
    await redis.hset("accelfleet:instances", "junk", "{not json");
    await redis.hset("accelfleet:instances", "wrong", '{"instanceId":"wrong"}');

    const records = await store.list();

    assert.deepEqual(
      records.map((r) => r.instanceId),
      ["a", "b"],
    );
  });

  it("returns null for an unknown instance", async () => {
    const { store } = makeStore();
    assert.equal(await store.get("missing"), null);
  });

  it("removes a record and reports whether it existed", async () => {
    const { redis, store } = makeStore();
    await store.record(makeRecord());

    assert.equal(await store.remove("4242"), true);
    assert.equal(await store.remove("4242"), false);
    assert.equal(await store.get("4242"), null);
    assert.deepEqual(redis.published[1], [
      "accelfleet:instances:updates",
      '{"type":"removed","instanceId":"4242"}',
    ]);
    assert.equal(redis.published.length, 2);
  });

  it("uses custom keys", async () => {
    const redis = new FakeRedis();
    const store = new InstanceStore(redis as unknown as Redis, {
      instancesHash: "test:instances",
      updatesChannel: "test:updates",
    });

    await store.record(makeRecord());

    assert.deepEqual([...redis.hashes.keys()], ["test:instances"]);
    assert.equal(redis.published[0][0], "test:updates");
  });

  it("fails every call without Redis", async () => {
    const store = new InstanceStore(null);

    assert.equal(store.available, false);
    await assert.rejects(store.list(), { message: "Redis unavailable" });
    await assert.rejects(store.record(makeRecord()), { message: "Redis unavailable" });
  });
});
