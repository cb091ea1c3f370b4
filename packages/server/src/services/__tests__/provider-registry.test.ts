import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { ConfigurationError } from "../../errors.js";
import { createHostProvider, registeredHostTypes } from "../provider-registry.js";
import { DigitalOceanProvider } from "../providers/digitalocean-provider.js";
import { VastAIProvider } from "../providers/vastai-provider.js";
import { hostSettings, silentLogger } from "./fakes.js";

describe("provider registry", () => {
  it("registers one adapter per host type", () => {
    assert.deepEqual(registeredHostTypes(), ["digitalocean", "vastai"]);
  });

  it("builds the adapter for the configured host type", () => {
    const digitalocean = createHostProvider(hostSettings(), silentLogger());
    assert.ok(digitalocean instanceof DigitalOceanProvider);
    assert.equal(digitalocean.type, "digitalocean");
    assert.equal(digitalocean.supportsPause, true);

    const vastai = createHostProvider(hostSettings({ hostType: "vastai" }), silentLogger());
    assert.ok(vastai instanceof VastAIProvider);
    assert.equal(vastai.type, "vastai");
  });

  it("refuses to build an adapter without credentials", () => {
    assert.throws(
      () => createHostProvider(hostSettings({ hostType: "vastai", apiKey: null }), silentLogger()),
      (err: unknown) => {
        assert.ok(err instanceof ConfigurationError);
        assert.equal(err.message, "Missing credentials for vastai (host.vastai.api_key)");
        return true;
      },
    );
  });
});
