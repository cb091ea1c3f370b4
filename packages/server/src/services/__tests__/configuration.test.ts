import { describe, it, before, after } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { ConfigurationError } from "../../errors.js";
import { Configuration } from "../configuration.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const YAML = `
accelerator:
  name: gzip
  job_timeout_ms: "30000"
host:
  host_type: digitalocean
  region: nyc1
  stop_policy: terminate
host.digitalocean:
  region: tor1
  api_key: test-key
  instance_id: null
`;

function sample(): Configuration {
  return Configuration.parse(YAML, "inline");
}

// ---------------------------------------------------------------------------
// Tests: parse
// ---------------------------------------------------------------------------

describe("Configuration.parse()", () => {
  it("reads sections and drops null values", () => {
    const config = sample();

    assert.deepEqual(config.sectionNames(), ["accelerator", "host", "host.digitalocean"]);
    assert.deepEqual(config.section("host.digitalocean"), {
      host_type: "digitalocean",
      region: "tor1",
      stop_policy: "terminate",
      api_key: "test-key",
    });
    assert.equal(config.source, "inline");
  });

  it("treats an empty document as no sections", () => {
    assert.deepEqual(Configuration.parse("").sectionNames(), []);
  });

  it("rejects malformed YAML", () => {
    assert.throws(() => Configuration.parse("host: [unclosed", "broken.yaml"), (err: unknown) => {
      assert.ok(err instanceof ConfigurationError);
      assert.match(err.message, /^Failed to parse configuration YAML \(broken\.yaml\)/);
      return true;
    });
  });

  it("rejects sections that are not key/value maps", () => {
    assert.throws(() => Configuration.parse("host:\n  - digitalocean\n"), ConfigurationError);
  });

  it("rejects nested values", () => {
    assert.throws(
      () => Configuration.parse("host:\n  tags:\n    a: 1\n"),
      (err: unknown) => {
        assert.ok(err instanceof ConfigurationError);
        assert.match(err.message, /^Invalid configuration: host\.tags /);
        return true;
      },
    );
  });

  it("returns frozen section views", () => {
    assert.ok(Object.isFrozen(sample().section("host")));
  });
});

// ---------------------------------------------------------------------------
// Tests: resolve
// ---------------------------------------------------------------------------

describe("Configuration.resolve()", () => {
  it("prefers the explicit value", () => {
    assert.equal(sample().resolve("host.digitalocean", "region", "ams3", "sfo3"), "ams3");
  });

  it("falls back from subsection to section to default", () => {
    const config = sample();
    assert.equal(config.resolve("host.digitalocean", "region"), "tor1");
    assert.equal(config.resolve("host.vastai", "region"), "nyc1");
    assert.equal(config.resolve("host.vastai", "image", null, "ubuntu:22.04"), "ubuntu:22.04");
    assert.equal(config.resolve("host.vastai", "image"), undefined);
  });

  it("ignores null and undefined explicit values", () => {
    const config = sample();
    assert.equal(config.resolve("host.digitalocean", "region", null), "tor1");
    assert.equal(config.resolve("host.digitalocean", "region", undefined), "tor1");
  });

  it("coerces numbers and booleans", () => {
    const config = new Configuration({
      accelerator: { job_timeout_ms: "30000", verbose: "yes", quiet: "off", bad: "maybe" },
    });

    assert.equal(config.getNumber("accelerator", "job_timeout_ms"), 30000);
    assert.equal(config.getBoolean("accelerator", "verbose"), true);
    assert.equal(config.getBoolean("accelerator", "quiet"), false);
    assert.throws(() => config.getBoolean("accelerator", "bad"), {
      message: 'accelerator.bad must be a boolean, got "maybe"',
    });
    assert.throws(() => config.getNumber("accelerator", "verbose"), {
      message: 'accelerator.verbose must be a number, got "yes"',
    });
  });
});

// ---------------------------------------------------------------------------
// Tests: environment overlay
// ---------------------------------------------------------------------------

describe("Configuration.withEnvironment()", () => {
  it("overrides file values and adds new sections", () => {
    const config = sample().withEnvironment({
      ACCELFLEET_HOST__DIGITALOCEAN__REGION: "sfo3",
      ACCELFLEET_HOST__VASTAI__API_KEY: "test-vast-key",
      ACCELFLEET_ACCELERATOR__NAME: "sha256",
    });

    assert.equal(config.getString("host.digitalocean", "region"), "sfo3");
    assert.equal(config.getString("host.vastai", "api_key"), "test-vast-key");
    assert.equal(config.getString("accelerator", "name"), "sha256");
  });

  it("ignores unrelated and sectionless variables", () => {
    const config = sample().withEnvironment({
      ACCELFLEET_AUTH_TOKEN: "test-token",
      ACCELFLEET_CONFIG: "/tmp/accelerator.yaml",
      ACCELFLEET___KEY: "x",
      PATH: "/usr/bin",
    });

    assert.deepEqual(config.sectionNames(), ["accelerator", "host", "host.digitalocean"]);
  });

  it("leaves the original untouched", () => {
    const original = sample();
    original.withEnvironment({ ACCELFLEET_HOST__REGION: "sfo3" });
    assert.equal(original.getString("host", "region"), "nyc1");
  });
});

// ---------------------------------------------------------------------------
// Tests: load
// ---------------------------------------------------------------------------

describe("Configuration.load()", () => {
  let tmpDir: string;

  before(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "accelfleet-config-test-"));
  });

  after(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("reads an explicit file and overlays the environment", async () => {
    const file = path.join(tmpDir, "accelerator.yaml");
    fs.writeFileSync(file, YAML);

    const config = await Configuration.load({
      path: file,
      env: { ACCELFLEET_HOST__DIGITALOCEAN__API_KEY: "test-env-key" },
    });

    assert.equal(config.source, file);
    assert.equal(config.getString("accelerator", "name"), "gzip");
    assert.equal(config.getString("host.digitalocean", "api_key"), "test-env-key");
  });

  it("fails when an explicit file is missing", async () => {
    await assert.rejects(
      Configuration.load({ path: path.join(tmpDir, "missing.yaml"), env: {} }),
      (err: unknown) => {
        assert.ok(err instanceof ConfigurationError);
        assert.match(err.message, /^Failed to read configuration file .*missing\.yaml/);
        return true;
      },
    );
  });
});
