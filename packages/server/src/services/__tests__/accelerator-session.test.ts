import { describe, it, before, after, afterEach } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { NotConfiguredError, RemoteExecutionError } from "../../errors.js";
import {
  RestAcceleratorSession,
  applicationFailure,
  decodeParametersResult,
} from "../accelerator-session.js";
import { silentLogger } from "./fakes.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const BASE_URL = "http://accel.test:8080";

interface RecordedCall {
  method: string;
  url: string;
  form: FormData | null;
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function parametersResult(app: Record<string, unknown>): string {
  return JSON.stringify({ app });
}

/** Fake `fetch` for the accelerator service; records every call. */
function installFakeFetch(handler: (call: RecordedCall) => Response) {
  const originalFetch = globalThis.fetch;
  const calls: RecordedCall[] = [];

  globalThis.fetch = async (
    input: string | URL | Request,
    init?: RequestInit,
  ): Promise<Response> => {
    const url =
      typeof input === "string"
        ? input
        : input instanceof URL
          ? input.href
          : input.url;
    const call = {
      method: init?.method ?? "GET",
      url,
      form: init?.body instanceof FormData ? init.body : null,
    };
    calls.push(call);
    return handler(call);
  };

  return {
    calls,
    restore: () => {
      globalThis.fetch = originalFetch;
    },
  };
}

const configurationOk = (call: RecordedCall): Response | null =>
  call.url === `${BASE_URL}/v1.0/configuration/`
    ? jsonResponse({
        id: 1,
        url: `${BASE_URL}/v1.0/configuration/1/`,
        parametersresult: parametersResult({ status: 0 }),
        inerror: false,
      })
    : null;

function makeSession(): RestAcceleratorSession {
  return new RestAcceleratorSession({ baseUrl: `${BASE_URL}/`, log: silentLogger(), pollIntervalMs: 1 });
}

function summary(calls: RecordedCall[]): string[] {
  return calls.map((c) => `${c.method} ${c.url.slice(BASE_URL.length)}`);
}

// ---------------------------------------------------------------------------
// Tests: configure
// ---------------------------------------------------------------------------

describe("RestAcceleratorSession.configure()", () => {
  let restoreFetch: (() => void) | undefined;
  let tmpDir: string;

  before(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "accelfleet-session-test-"));
  });

  after(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  afterEach(() => {
    restoreFetch?.();
    restoreFetch = undefined;
  });

  it("posts parameters and the data file as multipart form data", async () => {
    const datafile = path.join(tmpDir, "dictionary.bin");
    fs.writeFileSync(datafile, "dictionary");
    const fake = installFakeFetch((call) => configurationOk(call) ?? new Response(null, { status: 500 }));
    restoreFetch = fake.restore;

    const outcome = await makeSession().configure({ parameters: { level: 9 }, datafile });

    assert.deepEqual(outcome, { ok: true, message: null, diagnostics: { app: { status: 0 } } });
    assert.deepEqual(summary(fake.calls), ["POST /v1.0/configuration/"]);
    const form = fake.calls[0].form;
    assert.equal(form?.get("parameters"), '{"level":9}');
    const file = form?.get("datafile");
    assert.ok(file instanceof Blob);
    assert.equal(await file.text(), "dictionary");
  });

  it("reports an application failure without throwing", async () => {
    restoreFetch = installFakeFetch(() =>
      jsonResponse({
        id: 2,
        url: `${BASE_URL}/v1.0/configuration/2/`,
        parametersresult: parametersResult({ status: 1, msg: "license not found" }),
        inerror: true,
      }),
    ).restore;

    const outcome = await makeSession().configure({});

    assert.equal(outcome.ok, false);
    assert.equal(outcome.message, "license not found");
  });

  it("reports a configuration flagged in error", async () => {
    restoreFetch = installFakeFetch(() =>
      jsonResponse({ id: 3, url: `${BASE_URL}/v1.0/configuration/3/`, inerror: true }),
    ).restore;

    const outcome = await makeSession().configure({});

    assert.deepEqual(outcome, {
      ok: false,
      message: "Accelerator reported a configuration error",
      diagnostics: {},
    });
  });

  it("throws RemoteExecutionError on an HTTP error", async () => {
    restoreFetch = installFakeFetch(() => new Response("upstream down", { status: 503 })).restore;

    await assert.rejects(makeSession().configure({}), {
      name: "RemoteExecutionError",
      message: `POST ${BASE_URL}/v1.0/configuration/ failed: 503 upstream down`,
    });
  });
});

// ---------------------------------------------------------------------------
// Tests: execute
// ---------------------------------------------------------------------------

describe("RestAcceleratorSession.execute()", () => {
  let restoreFetch: (() => void) | undefined;

  afterEach(() => {
    restoreFetch?.();
    restoreFetch = undefined;
  });

  it("refuses to run before a configuration is accepted", async () => {
    await assert.rejects(makeSession().execute({}), NotConfiguredError);
  });

  it("polls until processed, returns the result and deletes the process", async () => {
    let polls = 0;
    const fake = installFakeFetch((call) => {
      const configured = configurationOk(call);
      if (configured) return configured;
      if (call.method === "POST") return jsonResponse({ id: 7, processed: false });
      if (call.method === "GET") {
        polls++;
        return polls < 2
          ? jsonResponse({ id: 7, processed: false })
          : jsonResponse({
              id: 7,
              processed: true,
              parametersresult: parametersResult({ status: 0, specific: { digest: "abc" } }),
            });
      }
      return new Response(null, { status: 204 });
    });
    restoreFetch = fake.restore;

    const session = makeSession();
    await session.configure({});
    const result = await session.execute({ parameters: { n: 1 } });

    assert.deepEqual(result, {
      result: { digest: "abc" },
      diagnostics: { app: { status: 0, specific: { digest: "abc" } } },
    });
    assert.deepEqual(summary(fake.calls), [
      "POST /v1.0/configuration/",
      "POST /v1.0/process/",
      "GET /v1.0/process/7/",
      "GET /v1.0/process/7/",
      "DELETE /v1.0/process/7/",
    ]);
    const form = fake.calls[1].form;
    assert.equal(form?.get("configuration"), `${BASE_URL}/v1.0/configuration/1/`);
    assert.equal(form?.get("parameters"), '{"n":1}');
  });

  it("fails on a non-zero status and still deletes the process", async () => {
    const fake = installFakeFetch((call) => {
      const configured = configurationOk(call);
      if (configured) return configured;
      if (call.method === "POST") {
        return jsonResponse({
          id: 8,
          processed: true,
          parametersresult: parametersResult({ status: 2, msg: "bad input" }),
        });
      }
      return new Response(null, { status: 204 });
    });
    restoreFetch = fake.restore;

    const session = makeSession();
    await session.configure({});

    await assert.rejects(session.execute({}), (err: unknown) => {
      assert.ok(err instanceof RemoteExecutionError);
      assert.equal(err.message, "bad input");
      return true;
    });
    assert.deepEqual(summary(fake.calls).slice(-1), ["DELETE /v1.0/process/8/"]);
  });

  it("stops polling when aborted", async () => {
    const fake = installFakeFetch((call) => {
      const configured = configurationOk(call);
      if (configured) return configured;
      if (call.method === "DELETE") return new Response(null, { status: 204 });
      return jsonResponse({ id: 9, processed: false });
    });
    restoreFetch = fake.restore;

    const session = makeSession();
    await session.configure({});
    const controller = new AbortController();
    const pending = session.execute({}, { signal: controller.signal });
    controller.abort();

    await assert.rejects(pending);
    assert.deepEqual(summary(fake.calls).slice(-1), ["DELETE /v1.0/process/9/"]);
  });

  it("teardown calls the stop endpoint", async () => {
    const fake = installFakeFetch((call) => configurationOk(call) ?? jsonResponse({}));
    restoreFetch = fake.restore;

    const session = makeSession();
    await session.configure({});
    await session.teardown();

    assert.deepEqual(summary(fake.calls), ["POST /v1.0/configuration/", "GET /v1.0/stop"]);
    await assert.rejects(session.execute({}), NotConfiguredError);
  });
});

// ---------------------------------------------------------------------------
// Tests: response decoding
// ---------------------------------------------------------------------------

describe("decodeParametersResult()", () => {
  it("decodes the embedded JSON document", () => {
    assert.deepEqual(decodeParametersResult('{"app":{"status":0,"specific":{"ratio":0.5}}}'), {
      app: { status: 0, specific: { ratio: 0.5 } },
    });
  });

  it("treats a missing result as empty", () => {
    assert.deepEqual(decodeParametersResult(null), {});
    assert.deepEqual(decodeParametersResult(""), {});
  });

  it("rejects unreadable and malformed results", () => {
    assert.throws(() => decodeParametersResult("{not json"), {
      message: "Accelerator returned an unreadable result",
    });
    assert.throws(() => decodeParametersResult('{"app":{"status":"zero"}}'), {
      message: "Accelerator returned a malformed result",
    });
  });
});

describe("applicationFailure()", () => {
  it("is null for a zero or missing status", () => {
    assert.equal(applicationFailure({}), null);
    assert.equal(applicationFailure({ app: { status: 0, msg: "ignored" } }), null);
  });

  it("prefers the accelerator's message", () => {
    assert.equal(applicationFailure({ app: { status: 3, msg: "overflow" } }), "overflow");
    assert.equal(applicationFailure({ app: { status: 3 } }), "Accelerator returned status 3");
  });
});
