import type { HostStopAction, StopPolicy } from "./hosts.js";

// ── Accelerator enums ────────────────────────────────────────────────

export type SessionState = "unconfigured" | "configured" | "stopped";

// ── Payloads ─────────────────────────────────────────────────────────

/** Parameters sent when configuring the remote accelerator. */
export interface ConfigurationPayload {
  parameters?: Record<string, unknown>;
  /** Local path of a data file uploaded with the configuration. */
  datafile?: string;
}

export interface ProcessJob {
  parameters?: Record<string, unknown>;
  /** Local path of the input file. */
  fileIn?: string;
  /** Local path the output file is written to. */
  fileOut?: string;
}

/**
 * Decoded `parametersresult` of the accelerator service. `app.status` is
 * zero on success; `app.specific` carries the accelerator's own result.
 */
export interface AcceleratorResponse {
  app?: {
    status?: number;
    msg?: string;
    specific?: Record<string, unknown>;
    profiling?: Record<string, number>;
  };
  [key: string]: unknown;
}

export interface ProcessResult {
  result: Record<string, unknown>;
  diagnostics: AcceleratorResponse;
}

export interface AcceleratorStopReport {
  accelerator: string;
  session: "none" | "stopped" | "failed";
  host: {
    policy: StopPolicy;
    action: HostStopAction;
    instanceId: string | null;
    warning?: string;
  };
}
