import type { FastifyBaseLogger } from "fastify";
import type {
  AcceleratorResponse,
  AcceleratorStopReport,
  ConfigurationPayload,
  ProcessJob,
  ProcessResult,
  SessionState,
  StopPolicy,
} from "@accelfleet/shared";
import {
  AcceleratorError,
  AcceleratorStoppedError,
  CancelledError,
  NotConfiguredError,
  RemoteExecutionError,
  TeardownWarning,
  errorMessage,
} from "../errors.js";
import type {
  AcceleratorSession,
  ConfigureOutcome,
  SessionFactory,
} from "./accelerator-session.js";
import type { Host } from "./host.js";
import { formatUrl } from "./reachability.js";

const MB = 1024 * 1024;

export interface ProcessOptions {
  /** Per-job limit; expiry fails the job with a RemoteExecutionError. */
  timeoutMs?: number | null;
  signal?: AbortSignal;
}

export interface AcceleratorConfig {
  name: string;
  host: Host;
  createSession: SessionFactory;
  log: FastifyBaseLogger;
}

export interface ProfilingSummary {
  wallClockS: number | null;
  fpgaElapsedS: number | null;
  serverMBps: number | null;
  fpgaMBps: number | null;
}

/**
 * A host paired with a remote processing session.
 *
 *   unconfigured ⇄ configured → stopped
 */
export class Accelerator {
  readonly name: string;
  readonly host: Host;

  private createSession: SessionFactory;
  private log: FastifyBaseLogger;
  private session: AcceleratorSession | null = null;
  private _state: SessionState = "unconfigured";
  private _lastConfiguration: ConfigurationPayload | null = null;
  private _runningCount = 0;
  private stopping: Promise<AcceleratorStopReport> | null = null;
  private sessionReleased = false;

  constructor(config: AcceleratorConfig) {
    this.name = config.name;
    this.host = config.host;
    this.createSession = config.createSession;
    this.log = config.log;
  }

  get state(): SessionState {
    return this._state;
  }

  get lastConfiguration(): ConfigurationPayload | null {
    return this._lastConfiguration;
  }

  get runningCount(): number {
    return this._runningCount;
  }

  /**
   * Brings the host up and sends `payload` as the whole configuration.
   * Calling again replaces the previous configuration.
   */
  async start(payload: ConfigurationPayload = {}): Promise<AcceleratorResponse> {
    if (this.stopping) throw new AcceleratorStoppedError(this.name);

    const address = await this.host.ensureReady();
    if (this.stopping) throw new AcceleratorStoppedError(this.name);
    const session = (this.session ??= this.createSession(formatUrl(address)));

    let outcome: ConfigureOutcome;
    try {
      outcome = await session.configure(payload);
    } catch (err) {
      if (this.stopping) throw new AcceleratorStoppedError(this.name);
      this._state = "unconfigured";
      throw asRemoteError(err, `Failed to configure accelerator "${this.name}"`);
    }

    // Stopped while configuring; the session may still hold this configuration.
    if (this.stopping) {
      if (outcome.ok) await this.releaseSession(session);
      throw new AcceleratorStoppedError(this.name);
    }

    if (!outcome.ok) {
      this._state = "unconfigured";
      throw new RemoteExecutionError(
        `Failed to configure accelerator "${this.name}": ${outcome.message ?? "unknown error"}`,
      );
    }

    this._lastConfiguration = payload;
    this._state = "configured";
    this.log.info({ accelerator: this.name, address }, "Accelerator configured");
    return outcome.diagnostics;
  }

  async process(job: ProcessJob, options: ProcessOptions = {}): Promise<ProcessResult> {
    const session = this.session;
    if (this._state !== "configured" || !session) {
      throw new NotConfiguredError(
        this._state === "stopped"
          ? `Accelerator "${this.name}" has been stopped`
          : undefined,
      );
    }

    const controller = new AbortController();
    const onAbort = () => controller.abort(options.signal?.reason);
    if (options.signal?.aborted) {
      throw new CancelledError();
    }
    options.signal?.addEventListener("abort", onAbort, { once: true });

    let timedOut = false;
    const timer = options.timeoutMs
      ? setTimeout(() => {
          timedOut = true;
          controller.abort();
        }, options.timeoutMs)
      : null;

    this._runningCount++;
    try {
      const result = await session.execute(job, { signal: controller.signal });
      this.logProfiling(result.diagnostics);
      return result;
    } catch (err) {
      if (timedOut) {
        throw new RemoteExecutionError(
          `Job on accelerator "${this.name}" timed out after ${options.timeoutMs} ms`,
          { cause: err },
        );
      }
      if (controller.signal.aborted) throw new CancelledError();
      throw asRemoteError(err, `Job on accelerator "${this.name}" failed`);
    } finally {
      this._runningCount--;
      if (timer) clearTimeout(timer);
      options.signal?.removeEventListener("abort", onAbort);
    }
  }

  /** Tears down the remote session (best effort), then stops the host. */
  stop(policy?: StopPolicy): Promise<AcceleratorStopReport> {
    this.stopping ??= this.shutdown(policy);
    return this.stopping;
  }

  private async shutdown(policy?: StopPolicy): Promise<AcceleratorStopReport> {
    const wasConfigured = this._state === "configured";
    this._state = "stopped";

    let session: AcceleratorStopReport["session"] = "none";
    if (this.session && wasConfigured) {
      session = (await this.releaseSession(this.session)) ? "stopped" : "failed";
    }

    const host = await this.host.stop(policy);
    return {
      accelerator: this.name,
      session,
      host: {
        policy: host.policy,
        action: host.action,
        instanceId: host.instanceId,
        ...(host.warning ? { warning: host.warning.message } : {}),
      },
    };
  }

  /** Best-effort session teardown, at most once; false when it failed. */
  private async releaseSession(session: AcceleratorSession): Promise<boolean> {
    if (this.sessionReleased) return true;
    this.sessionReleased = true;
    try {
      await session.teardown();
      return true;
    } catch (err) {
      const warning = new TeardownWarning(
        `Failed to stop session of accelerator "${this.name}": ${errorMessage(err)}`,
        { cause: err },
      );
      this.log.warn({ err: warning, accelerator: this.name }, "Session teardown failed");
      return false;
    }
  }

  private logProfiling(diagnostics: AcceleratorResponse): void {
    const profiling = diagnostics.app?.profiling;
    if (!profiling) return;
    const summary = summarizeProfiling(profiling);
    this.log.info({ accelerator: this.name, ...summary }, "Processing profile");
  }
}

export function summarizeProfiling(profiling: Record<string, number>): ProfilingSummary {
  const wall = profiling["wall-clock-time"] ?? 0;
  const fpga = profiling["fpga-elapsed-time"] ?? 0;
  const bytes = (profiling["total-bytes-written"] ?? 0) + (profiling["total-bytes-read"] ?? 0);

  return {
    wallClockS: wall > 0 ? wall : null,
    fpgaElapsedS: fpga > 0 ? fpga : null,
    serverMBps: bytes > 0 && wall > 0 ? bytes / wall / MB : null,
    fpgaMBps: bytes > 0 && fpga > 0 ? bytes / fpga / MB : null,
  };
}

function asRemoteError(err: unknown, context: string): AcceleratorError {
  if (err instanceof AcceleratorError) return err;
  return new RemoteExecutionError(`${context}: ${errorMessage(err)}`, { cause: err });
}
