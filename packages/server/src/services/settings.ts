import type { HostIdentity, HostType, StopPolicy } from "@accelfleet/shared";
import { ConfigurationError } from "../errors.js";
import type { Configuration } from "./configuration.js";
import { isHostType } from "./host-provider.js";

const STOP_POLICIES: readonly StopPolicy[] = ["terminate", "pause", "keep"];

export const HOST_DEFAULTS = {
  hardwareTier: "standard",
  namePrefix: "accelfleet",
  readinessPort: 80,
  pollIntervalMs: 5_000,
  readyTimeoutMs: 360_000,
} as const;

export const ACCELERATOR_DEFAULTS = {
  sessionPollIntervalMs: 1_000,
} as const;

/** Fully resolved host parameters; built once, never mutated. */
export interface HostSettings {
  readonly hostType: HostType;
  readonly identity: HostIdentity;
  readonly stopPolicy: StopPolicy;
  readonly apiKey: string | null;
  readonly region: string | null;
  readonly instanceType: string | null;
  readonly image: string | null;
  readonly hardwareTier: string;
  readonly namePrefix: string;
  readonly readinessPort: number;
  readonly pollIntervalMs: number;
  readonly readyTimeoutMs: number;
}

export interface AcceleratorSettings {
  readonly accelerator: string;
  readonly host: HostSettings;
  readonly sessionPollIntervalMs: number;
  readonly jobTimeoutMs: number | null;
}

/** Call-site arguments; each wins over the configuration file. */
export interface AcceleratorOverrides {
  accelerator?: string;
  hostType?: string;
  /** Replaces the configured identity, including `instance_id` and `host_ip`. */
  identity?: HostIdentity;
  instanceId?: string | null;
  address?: string | null;
  stopPolicy?: StopPolicy;
  apiKey?: string;
  region?: string;
  instanceType?: string;
  image?: string;
  hardwareTier?: string;
  readyTimeoutMs?: number;
  jobTimeoutMs?: number;
}

export function parseStopPolicy(value: string): StopPolicy {
  const policy = STOP_POLICIES.find((p) => p === value);
  if (!policy) {
    throw new ConfigurationError(
      `Invalid stop policy "${value}", expected one of ${STOP_POLICIES.join(", ")}`,
    );
  }
  return policy;
}

/**
 * Resolve accelerator and host parameters. Host keys are looked up in
 * `host.<hostType>` then `host`; accelerator keys in `accelerator`.
 */
export function resolveAcceleratorSettings(
  config: Configuration,
  overrides: AcceleratorOverrides = {},
): AcceleratorSettings {
  const accelerator = config.getString("accelerator", "name", overrides.accelerator);
  if (!accelerator) {
    throw new ConfigurationError("Accelerator name is required (accelerator.name)");
  }

  const hostTypeName = config.getString("host", "host_type", overrides.hostType);
  if (!hostTypeName) {
    throw new ConfigurationError("Host type is required (host.host_type)");
  }
  if (!isHostType(hostTypeName)) {
    throw new ConfigurationError(`Unsupported host type "${hostTypeName}"`);
  }
  const section = `host.${hostTypeName}`;

  const identity = resolveIdentity(config, section, overrides);

  // Reused instances are kept by default; created ones are terminated.
  const defaultPolicy: StopPolicy = identity.kind === "create" ? "terminate" : "keep";
  const stopPolicy = parseStopPolicy(
    config.getString(section, "stop_policy", overrides.stopPolicy, defaultPolicy),
  );

  const host: HostSettings = Object.freeze({
    hostType: hostTypeName,
    identity: Object.freeze(identity),
    stopPolicy,
    apiKey: config.getString(section, "api_key", overrides.apiKey) ?? null,
    region: config.getString(section, "region", overrides.region) ?? null,
    instanceType: config.getString(section, "instance_type", overrides.instanceType) ?? null,
    image: config.getString(section, "image", overrides.image) ?? null,
    hardwareTier: config.getString(
      section,
      "hardware_tier",
      overrides.hardwareTier,
      HOST_DEFAULTS.hardwareTier,
    ),
    namePrefix: config.getString(section, "name_prefix", null, HOST_DEFAULTS.namePrefix),
    readinessPort: positive(
      config.getNumber(section, "readiness_port", null, HOST_DEFAULTS.readinessPort),
      `${section}.readiness_port`,
    ),
    pollIntervalMs: positive(
      config.getNumber(section, "poll_interval_ms", null, HOST_DEFAULTS.pollIntervalMs),
      `${section}.poll_interval_ms`,
    ),
    readyTimeoutMs: positive(
      config.getNumber(section, "ready_timeout_ms", overrides.readyTimeoutMs, HOST_DEFAULTS.readyTimeoutMs),
      `${section}.ready_timeout_ms`,
    ),
  });

  const jobTimeoutMs = config.getNumber("accelerator", "job_timeout_ms", overrides.jobTimeoutMs);

  return Object.freeze({
    accelerator,
    host,
    sessionPollIntervalMs: positive(
      config.getNumber(
        "accelerator",
        "poll_interval_ms",
        null,
        ACCELERATOR_DEFAULTS.sessionPollIntervalMs,
      ),
      "accelerator.poll_interval_ms",
    ),
    jobTimeoutMs: jobTimeoutMs === undefined ? null : positive(jobTimeoutMs, "accelerator.job_timeout_ms"),
  });
}

function resolveIdentity(
  config: Configuration,
  section: string,
  overrides: AcceleratorOverrides,
): HostIdentity {
  if (overrides.identity) return overrides.identity;

  // An explicit identity replaces the configured one entirely.
  const explicitGiven = overrides.instanceId != null || overrides.address != null;
  const instanceId = explicitGiven
    ? overrides.instanceId
    : config.getString(section, "instance_id");
  const address = explicitGiven ? overrides.address : config.getString(section, "host_ip");

  if (instanceId && address) {
    throw new ConfigurationError("Specify either an instance id or an address, not both");
  }
  if (instanceId) return { kind: "instance", instanceId };
  if (address) return { kind: "address", address };
  return { kind: "create" };
}

function positive(value: number, name: string): number {
  if (!(value > 0)) {
    throw new ConfigurationError(`${name} must be greater than zero`);
  }
  return value;
}
