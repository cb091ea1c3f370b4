// ---------------------------------------------------------------------------
// Error taxonomy shared by hosts, accelerators and pools
// ---------------------------------------------------------------------------

export type AcceleratorErrorCode =
  | "CONFIGURATION"
  | "PROVISIONING"
  | "NOT_FOUND"
  | "NOT_CONFIGURED"
  | "STOPPED"
  | "REMOTE_EXECUTION"
  | "CANCELLED"
  | "POOL_START"
  | "POOL_CLOSED"
  | "TEARDOWN";

export class AcceleratorError extends Error {
  readonly code: AcceleratorErrorCode;

  constructor(message: string, code: AcceleratorErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AcceleratorError";
    this.code = code;
  }

  toJSON(): { name: string; code: AcceleratorErrorCode; message: string } {
    return { name: this.name, code: this.code, message: this.message };
  }
}

export class ConfigurationError extends AcceleratorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "CONFIGURATION", options);
    this.name = "ConfigurationError";
  }
}

/** The host never became reachable, or its provider reported an error. */
export class ProvisioningError extends AcceleratorError {
  constructor(message: string, options?: { cause?: unknown; code?: AcceleratorErrorCode }) {
    super(message, options?.code ?? "PROVISIONING", options);
    this.name = "ProvisioningError";
  }
}

/** A reused instance id is unknown to the provider. */
export class NotFoundError extends ProvisioningError {
  readonly instanceId: string;

  constructor(instanceId: string, hostType: string) {
    super(`Instance "${instanceId}" not found on ${hostType}`, { code: "NOT_FOUND" });
    this.name = "NotFoundError";
    this.instanceId = instanceId;
  }
}

export class NotConfiguredError extends AcceleratorError {
  constructor(message = "Accelerator is not configured, call start() first") {
    super(message, "NOT_CONFIGURED");
    this.name = "NotConfiguredError";
  }
}

export class AcceleratorStoppedError extends AcceleratorError {
  constructor(name: string) {
    super(`Accelerator "${name}" has been stopped`, "STOPPED");
    this.name = "AcceleratorStoppedError";
  }
}

export class RemoteExecutionError extends AcceleratorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "REMOTE_EXECUTION", options);
    this.name = "RemoteExecutionError";
  }
}

export class CancelledError extends AcceleratorError {
  constructor(message = "Task cancelled") {
    super(message, "CANCELLED");
    this.name = "CancelledError";
  }
}

export interface MemberFailure {
  index: number;
  error: Error;
}

export class PoolStartError extends AcceleratorError {
  readonly failures: MemberFailure[];

  constructor(failures: MemberFailure[], size: number) {
    const detail = failures
      .map((f) => `member ${f.index}: ${f.error.message}`)
      .join("; ");
    super(`${failures.length} of ${size} pool members failed to start (${detail})`, "POOL_START");
    this.name = "PoolStartError";
    this.failures = failures;
  }
}

export class PoolClosedError extends AcceleratorError {
  constructor() {
    super("Pool is stopped and accepts no new tasks", "POOL_CLOSED");
    this.name = "PoolClosedError";
  }
}

/** A teardown step that failed. Returned in stop results and logged, never thrown. */
export class TeardownWarning extends AcceleratorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "TEARDOWN", options);
    this.name = "TeardownWarning";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
