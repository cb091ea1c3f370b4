import { openAsBlob } from "node:fs";
import fsp from "node:fs/promises";
import path from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import type { FastifyBaseLogger } from "fastify";
import type {
  AcceleratorResponse,
  ConfigurationPayload,
  ProcessJob,
  ProcessResult,
} from "@accelfleet/shared";
import { z } from "zod";
import { NotConfiguredError, RemoteExecutionError, errorMessage } from "../errors.js";

export const API_VERSION = "v1.0";

export interface ConfigureOutcome {
  ok: boolean;
  message: string | null;
  diagnostics: AcceleratorResponse;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
}

/** Remote processing session on an accelerator host. */
export interface AcceleratorSession {
  configure(payload: ConfigurationPayload): Promise<ConfigureOutcome>;
  execute(job: ProcessJob, options?: ExecuteOptions): Promise<ProcessResult>;
  teardown(): Promise<void>;
}

export type SessionFactory = (baseUrl: string) => AcceleratorSession;

const responseSchema = z
  .object({
    app: z
      .object({
        status: z.number().optional(),
        msg: z.string().optional(),
        specific: z.record(z.string(), z.unknown()).optional(),
        profiling: z.record(z.string(), z.number()).optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

const configurationSchema = z
  .object({
    id: z.union([z.number(), z.string()]).optional(),
    url: z.string().optional(),
    parametersresult: z.string().nullish(),
    inerror: z.boolean().optional(),
  })
  .passthrough();

const processSchema = z
  .object({
    id: z.union([z.number(), z.string()]),
    processed: z.boolean().optional(),
    inerror: z.boolean().optional(),
    parametersresult: z.string().nullish(),
    datafileresult: z.string().nullish(),
  })
  .passthrough();

type ProcessResponse = z.infer<typeof processSchema>;

export interface RestAcceleratorSessionConfig {
  baseUrl: string;
  log: FastifyBaseLogger;
  pollIntervalMs?: number;
}

/**
 * REST client of the accelerator service: multipart posts to
 * `/v1.0/configuration/` and `/v1.0/process/`, polling until processed.
 */
export class RestAcceleratorSession implements AcceleratorSession {
  private baseUrl: string;
  private log: FastifyBaseLogger;
  private pollIntervalMs: number;
  private configurationUrl: string | null = null;

  constructor(config: RestAcceleratorSessionConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.log = config.log;
    this.pollIntervalMs = config.pollIntervalMs ?? 1_000;
  }

  async configure(payload: ConfigurationPayload): Promise<ConfigureOutcome> {
    const form = new FormData();
    form.set("parameters", JSON.stringify(payload.parameters ?? {}));
    if (payload.datafile) {
      form.set("datafile", await openAsBlob(payload.datafile), path.basename(payload.datafile));
    }

    const body = configurationSchema.parse(
      await this.request("POST", `/${API_VERSION}/configuration/`, { body: form }),
    );
    const diagnostics = decodeParametersResult(body.parametersresult);

    const failure =
      applicationFailure(diagnostics) ??
      (body.inerror ? "Accelerator reported a configuration error" : null);
    if (failure) {
      return { ok: false, message: failure, diagnostics };
    }
    if (!body.url) {
      return { ok: false, message: "Configuration response carried no url", diagnostics };
    }

    this.configurationUrl = body.url;
    return { ok: true, message: null, diagnostics };
  }

  async execute(job: ProcessJob, options: ExecuteOptions = {}): Promise<ProcessResult> {
    if (!this.configurationUrl) {
      throw new NotConfiguredError("Session has no accepted configuration");
    }
    const { signal } = options;

    const form = new FormData();
    form.set("configuration", this.configurationUrl);
    form.set("parameters", JSON.stringify(job.parameters ?? {}));
    if (job.fileIn) {
      form.set("datafile", await openAsBlob(job.fileIn), path.basename(job.fileIn));
    }

    let response: ProcessResponse = processSchema.parse(
      await this.request("POST", `/${API_VERSION}/process/`, { body: form, signal }),
    );
    const processId = String(response.id);

    try {
      while (!response.processed) {
        await sleep(this.pollIntervalMs, undefined, { signal });
        response = processSchema.parse(
          await this.request("GET", `/${API_VERSION}/process/${processId}/`, { signal }),
        );
      }

      const diagnostics = decodeParametersResult(response.parametersresult);
      const failure =
        applicationFailure(diagnostics) ??
        (response.inerror ? `Process ${processId} ended in error` : null);
      if (failure) {
        throw new RemoteExecutionError(failure);
      }

      if (job.fileOut && response.datafileresult) {
        await this.download(response.datafileresult, job.fileOut, signal);
      }

      return { result: diagnostics.app?.specific ?? {}, diagnostics };
    } finally {
      await this.deleteProcess(processId);
    }
  }

  async teardown(): Promise<void> {
    await this.request("GET", `/${API_VERSION}/stop`);
    this.configurationUrl = null;
  }

  private async deleteProcess(processId: string): Promise<void> {
    try {
      await this.request("DELETE", `/${API_VERSION}/process/${processId}/`, { expectJson: false });
    } catch (err) {
      this.log.warn({ err, processId }, "Failed to delete remote process");
    }
  }

  private async download(source: string, destination: string, signal?: AbortSignal): Promise<void> {
    const url = new URL(source, `${this.baseUrl}/`).href;
    let res: Response;
    try {
      res = await fetch(url, { signal });
    } catch (err) {
      throw new RemoteExecutionError(`Download of ${url} failed: ${errorMessage(err)}`, { cause: err });
    }
    if (!res.ok) {
      throw new RemoteExecutionError(`Download of ${url} failed: ${res.status}`);
    }
    await fsp.writeFile(destination, Buffer.from(await res.arrayBuffer()));
  }

  private async request(
    method: "GET" | "POST" | "DELETE",
    pathname: string,
    options: { body?: FormData; signal?: AbortSignal; expectJson?: boolean } = {},
  ): Promise<unknown> {
    const url = `${this.baseUrl}${pathname}`;
    let res: Response;
    try {
      res = await fetch(url, { method, body: options.body, signal: options.signal });
    } catch (err) {
      throw new RemoteExecutionError(`${method} ${url} failed: ${errorMessage(err)}`, { cause: err });
    }

    if (!res.ok) {
      const text = await res.text();
      throw new RemoteExecutionError(`${method} ${url} failed: ${res.status} ${text}`.trim());
    }
    if (options.expectJson === false) return null;

    const text = await res.text();
    if (!text) return {};
    try {
      return JSON.parse(text);
    } catch (err) {
      throw new RemoteExecutionError(`${method} ${url} returned invalid JSON`, { cause: err });
    }
  }
}

/** `parametersresult` is a JSON document embedded as a string. */
export function decodeParametersResult(raw: string | null | undefined): AcceleratorResponse {
  if (!raw) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new RemoteExecutionError("Accelerator returned an unreadable result", { cause: err });
  }
  const result = responseSchema.safeParse(parsed);
  if (!result.success) {
    throw new RemoteExecutionError("Accelerator returned a malformed result");
  }
  return result.data;
}

/** Message of a non-zero `app.status`, else null. */
export function applicationFailure(response: AcceleratorResponse): string | null {
  const status = response.app?.status;
  if (status === undefined || status === 0) return null;
  return response.app?.msg ?? `Accelerator returned status ${status}`;
}
