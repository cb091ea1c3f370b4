import { setTimeout as sleep } from "node:timers/promises";
import type { FastifyBaseLogger } from "fastify";
import { customAlphabet } from "nanoid";
import type {
  HostIdentity,
  HostState,
  HostStopAction,
  HostType,
  StopPolicy,
} from "@accelfleet/shared";
import {
  ConfigurationError,
  NotFoundError,
  ProvisioningError,
  TeardownWarning,
  errorMessage,
} from "../errors.js";
import type { CreateInstanceSpec, HostProvider, InstanceRef } from "./host-provider.js";
import {
  TcpReachabilityProbe,
  formatUrl,
  probeTarget,
  type ReachabilityProbe,
} from "./reachability.js";
import type { HostSettings } from "./settings.js";

const instanceSuffix = customAlphabet("0123456789abcdefghijklmnopqrstuvwxyz", 8);

export interface HostStopResult {
  policy: StopPolicy;
  action: HostStopAction;
  instanceId: string | null;
  warning?: TeardownWarning;
}

export interface HostConfig {
  settings: HostSettings;
  /** Name of the accelerator the host serves; used for instance names and tags. */
  accelerator: string;
  /** Required unless the identity is an address. */
  provider?: HostProvider | null;
  probe?: ReachabilityProbe;
  log: FastifyBaseLogger;
}

/**
 * Lifecycle of one remote instance:
 *
 *   created → provisioning → ready → stopped
 *                 ↘ failed → stopped
 *
 * Address-only hosts never call the provider; the instance belongs to
 * someone else and `stop` only releases it.
 */
export class Host {
  readonly hostType: HostType;
  readonly identity: HostIdentity;
  readonly stopPolicy: StopPolicy;
  readonly ownsLifecycle: boolean;

  private settings: HostSettings;
  private accelerator: string;
  private provider: HostProvider | null;
  private probe: ReachabilityProbe;
  private log: FastifyBaseLogger;

  private _state: HostState = "created";
  private _address: string | null = null;
  private instance: InstanceRef | null = null;
  private failure: ProvisioningError | null = null;
  private provisioning: Promise<string> | null = null;
  private stopping: Promise<HostStopResult> | null = null;
  private readonly abort = new AbortController();

  constructor(config: HostConfig) {
    this.settings = config.settings;
    this.hostType = config.settings.hostType;
    this.identity = config.settings.identity;
    this.stopPolicy = config.settings.stopPolicy;
    this.ownsLifecycle = this.identity.kind !== "address";
    this.accelerator = config.accelerator;
    this.provider = config.provider ?? null;
    this.probe = config.probe ?? new TcpReachabilityProbe();
    this.log = config.log;

    if (this.ownsLifecycle && !this.provider) {
      throw new ConfigurationError(`A ${this.hostType} provider is required to manage instances`);
    }
  }

  get state(): HostState {
    return this._state;
  }

  get address(): string | null {
    return this._address;
  }

  get url(): string | null {
    return this._address ? formatUrl(this._address) : null;
  }

  get instanceId(): string | null {
    if (this.instance) return this.instance.id;
    return this.identity.kind === "instance" ? this.identity.instanceId : null;
  }

  /** Provisions (or reuses) the instance and resolves with its address. */
  async ensureReady(timeoutMs: number = this.settings.readyTimeoutMs): Promise<string> {
    if (this._state === "ready" && this._address) return this._address;
    if (this.stopping) {
      throw new ProvisioningError(`Host ${this.describe()} is stopped`);
    }
    if (this._state === "failed" && this.failure) throw this.failure;

    this.provisioning ??= this.provision(timeoutMs);
    return this.provisioning;
  }

  /**
   * Applies the stop policy (explicit, else the host's own). Every call
   * returns the first call's result; failures are reported, never thrown.
   */
  stop(policy?: StopPolicy): Promise<HostStopResult> {
    this.stopping ??= this.teardown(policy ?? this.stopPolicy);
    return this.stopping;
  }

  private async provision(timeoutMs: number): Promise<string> {
    this._state = "provisioning";
    const deadline = Date.now() + timeoutMs;
    this.log.info(
      { identity: this.identity.kind, instanceId: this.instanceId },
      "Provisioning host",
    );

    try {
      const address = await this.acquire(deadline, timeoutMs);
      this._address = address;
      this._state = "ready";
      this.log.info({ address, instanceId: this.instanceId }, "Host ready");
      return address;
    } catch (err) {
      const failure = this.abort.signal.aborted
        ? new ProvisioningError(`Host ${this.describe()} was stopped while provisioning`, { cause: err })
        : err instanceof ProvisioningError
          ? err
          : new ProvisioningError(
              `Host ${this.describe()} failed to provision: ${errorMessage(err)}`,
              { cause: err },
            );
      this.failure = failure;
      this._state = "failed";
      this.log.error({ err: failure, instanceId: this.instanceId }, "Host provisioning failed");
      throw failure;
    }
  }

  private async acquire(deadline: number, timeoutMs: number): Promise<string> {
    const identity = this.identity;
    if (identity.kind === "address") {
      return this.waitReachable(identity.address, deadline, timeoutMs);
    }

    const provider = this.requireProvider();
    let ref: InstanceRef;
    if (identity.kind === "create") {
      ref = await provider.create(this.createSpec());
      this.instance = ref;
      this.log.info({ instanceId: ref.id }, "Instance created");
    } else {
      const found = await provider.find(identity.instanceId);
      if (!found) throw new NotFoundError(identity.instanceId, this.hostType);
      ref = found;
      this.instance = ref;
      if ((await provider.status(ref)) === "stopped") {
        this.log.info({ instanceId: ref.id }, "Resuming stopped instance");
        await provider.resume(ref);
      }
    }

    return this.waitForInstance(provider, ref, deadline, timeoutMs);
  }

  private async waitForInstance(
    provider: HostProvider,
    ref: InstanceRef,
    deadline: number,
    timeoutMs: number,
  ): Promise<string> {
    for (;;) {
      const status = await provider.status(ref);
      if (status === "error") {
        throw new ProvisioningError(`Instance ${ref.id} entered error status`);
      }
      if (status === "ready") {
        const address = await provider.address(ref);
        if (address && (await this.reachable(address, deadline))) return address;
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new ProvisioningError(
          `Timed out after ${timeoutMs} ms waiting for instance ${ref.id} (last status "${status}")`,
        );
      }
      await sleep(Math.min(this.settings.pollIntervalMs, remaining), undefined, {
        signal: this.abort.signal,
      });
    }
  }

  private async waitReachable(address: string, deadline: number, timeoutMs: number): Promise<string> {
    for (;;) {
      if (await this.reachable(address, deadline)) return address;

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new ProvisioningError(`Host ${address} not reachable after ${timeoutMs} ms`);
      }
      await sleep(Math.min(this.settings.pollIntervalMs, remaining), undefined, {
        signal: this.abort.signal,
      });
    }
  }

  private reachable(address: string, deadline: number): Promise<boolean> {
    const { host, port } = probeTarget(address, this.settings.readinessPort);
    const timeoutMs = Math.max(1, Math.min(this.settings.pollIntervalMs, deadline - Date.now()));
    return this.probe.check(host, port, timeoutMs);
  }

  private async teardown(policy: StopPolicy): Promise<HostStopResult> {
    this.abort.abort();
    if (this.provisioning) await Promise.allSettled([this.provisioning]);
    const previous = this._state;
    this._state = "stopped";

    if (!this.ownsLifecycle) {
      this.log.debug({ address: this._address }, "Released host without provider calls");
      return { policy, action: "released", instanceId: null };
    }

    const ref = this.instance;
    if (!ref) {
      return { policy, action: "none", instanceId: null };
    }

    if (policy === "keep") {
      this.log.warn({ instanceId: ref.id, address: this._address }, "Instance is still running");
      return { policy, action: "kept", instanceId: ref.id };
    }

    const provider = this.requireProvider();
    try {
      if (policy === "pause") {
        if (provider.supportsPause) {
          await provider.pause(ref);
          this.log.info({ instanceId: ref.id }, "Instance paused");
          return { policy, action: "paused", instanceId: ref.id };
        }
        this.log.warn(
          { instanceId: ref.id, hostType: this.hostType },
          "Provider cannot pause instances, terminating instead",
        );
      }
      await provider.terminate(ref);
      this.log.info({ instanceId: ref.id }, "Instance terminated");
      return { policy, action: "terminated", instanceId: ref.id };
    } catch (err) {
      const warning = new TeardownWarning(
        `Failed to ${policy} instance ${ref.id}: ${errorMessage(err)}`,
        { cause: err },
      );
      this.log.warn(
        { err: warning, instanceId: ref.id, previousState: previous },
        "Host teardown failed",
      );
      return { policy, action: "failed", instanceId: ref.id, warning };
    }
  }

  private createSpec(): CreateInstanceSpec {
    const slug = this.accelerator.toLowerCase().replace(/[^a-z0-9-]+/g, "-");
    return {
      name: `${this.settings.namePrefix}-${slug}-${instanceSuffix()}`,
      accelerator: this.accelerator,
      region: this.settings.region,
      instanceType: this.settings.instanceType,
      image: this.settings.image,
      hardwareTier: this.settings.hardwareTier,
      tags: [this.settings.namePrefix, slug],
    };
  }

  private requireProvider(): HostProvider {
    if (!this.provider) {
      throw new ConfigurationError(`A ${this.hostType} provider is required to manage instances`);
    }
    return this.provider;
  }

  private describe(): string {
    const fallback = this.identity.kind === "address" ? this.identity.address : "new";
    return `${this.hostType}:${this.instanceId ?? this._address ?? fallback}`;
  }
}
