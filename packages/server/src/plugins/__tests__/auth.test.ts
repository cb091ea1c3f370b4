import { describe, it } from "node:test";
import assert from "node:assert/strict";
import Fastify from "fastify";
import type { FastifyInstance } from "fastify";
import type { ServerConfig } from "../../config.js";
import authPlugin from "../auth.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const TEST_TOKEN = "test-token";

async function buildApp(authToken: string | null): Promise<FastifyInstance> {
  const app = Fastify({ logger: false });

  app.decorate("serverConfig", { authToken } as unknown as ServerConfig);
  await app.register(authPlugin);

  app.get("/api/test", { preHandler: [app.verifyAuth] }, async (request) => {
    return { authenticated: request.authenticated ?? false };
  });

  return app;
}

const REJECTED = { error: "Missing or invalid authentication credentials" };

// ---------------------------------------------------------------------------
// Bearer token auth
// ---------------------------------------------------------------------------

describe("Auth plugin", () => {
  it("accepts the configured Bearer token", async () => {
    const app = await buildApp(TEST_TOKEN);

    const resp = await app.inject({
      method: "GET",
      url: "/api/test",
      headers: { authorization: `Bearer ${TEST_TOKEN}` },
    });

    assert.equal(resp.statusCode, 200);
    assert.deepEqual(resp.json(), { authenticated: true });

    await app.close();
  });

  it("rejects a wrong token", async () => {
    const app = await buildApp(TEST_TOKEN);

    const resp = await app.inject({
      method: "GET",
      url: "/api/test",
      headers: { authorization: "Bearer wrong-token" },
    });

    assert.equal(resp.statusCode, 401);
    assert.deepEqual(resp.json(), REJECTED);

    await app.close();
  });

  it("rejects a request without credentials", async () => {
    const app = await buildApp(TEST_TOKEN);

    const resp = await app.inject({ method: "GET", url: "/api/test" });

    assert.equal(resp.statusCode, 401);
    assert.deepEqual(resp.json(), REJECTED);

    await app.close();
  });

  it("rejects a non-Bearer scheme", async () => {
    const app = await buildApp(TEST_TOKEN);

    const resp = await app.inject({
      method: "GET",
      url: "/api/test",
      headers: { authorization: `Basic ${TEST_TOKEN}` },
    });

    assert.equal(resp.statusCode, 401);

    await app.close();
  });

  it("rejects everything when no token is configured", async () => {
    const app = await buildApp(null);

    const resp = await app.inject({
      method: "GET",
      url: "/api/test",
      headers: { authorization: "Bearer anything" },
    });

    assert.equal(resp.statusCode, 401);
    assert.deepEqual(resp.json(), REJECTED);

    await app.close();
  });
});
