import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigurationError, errorMessage } from "../errors.js";

export type ConfigValue = string | number | boolean;
export type ConfigSection = Readonly<Record<string, ConfigValue>>;

export const DEFAULT_CONFIG_FILE = "accelerator.yaml";
export const ENV_PREFIX = "ACCELFLEET_";

const TRUE_VALUES = new Set(["true", "1", "yes", "on"]);
const FALSE_VALUES = new Set(["false", "0", "no", "off"]);

const sectionsSchema = z.record(
  z.string(),
  z
    .record(z.string(), z.union([z.string(), z.number(), z.boolean()]).nullable())
    .nullable(),
);

/** Minimal logger interface, compatible with Fastify's pino logger. */
export interface ConfigurationLogger {
  info(msg: string): void;
  warn(msg: string): void;
}

const nullLogger: ConfigurationLogger = { info() {}, warn() {} };

export interface LoadConfigurationOptions {
  /** Explicit file; must exist when given. */
  path?: string | null;
  env?: NodeJS.ProcessEnv;
  log?: ConfigurationLogger;
}

/**
 * Sectioned key/value settings. Section names may carry a dotted
 * subsection (`host.digitalocean`) that falls back to its parent section.
 *
 * Instances are immutable; overlays return a new Configuration.
 */
export class Configuration {
  readonly source: string | null;
  private readonly sections: ReadonlyMap<string, ConfigSection>;

  constructor(
    sections: Record<string, Record<string, ConfigValue>> = {},
    source: string | null = null,
  ) {
    const map = new Map<string, ConfigSection>();
    for (const [name, values] of Object.entries(sections)) {
      map.set(name, Object.freeze({ ...values }));
    }
    this.sections = map;
    this.source = source;
  }

  static parse(text: string, source: string | null = null): Configuration {
    let raw: unknown;
    try {
      raw = parseYaml(text) ?? {};
    } catch (err) {
      throw new ConfigurationError(
        `Failed to parse configuration YAML${source ? ` (${source})` : ""}: ${errorMessage(err)}`,
        { cause: err },
      );
    }

    const parsed = sectionsSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ConfigurationError(
        `Invalid configuration${source ? ` (${source})` : ""}: ${issue.path.join(".")} ${issue.message}`,
      );
    }

    const sections: Record<string, Record<string, ConfigValue>> = {};
    for (const [name, values] of Object.entries(parsed.data)) {
      const clean: Record<string, ConfigValue> = {};
      for (const [key, value] of Object.entries(values ?? {})) {
        if (value !== null) clean[key] = value;
      }
      sections[name] = clean;
    }
    return new Configuration(sections, source);
  }

  /**
   * Load the YAML file (explicit path, else `accelerator.yaml` in the
   * working directory, else in the home directory) and overlay the
   * environment.
   */
  static async load(options: LoadConfigurationOptions = {}): Promise<Configuration> {
    const log = options.log ?? nullLogger;
    const env = options.env ?? process.env;

    const candidates = options.path
      ? [path.resolve(options.path)]
      : [
          path.join(process.cwd(), DEFAULT_CONFIG_FILE),
          path.join(os.homedir(), DEFAULT_CONFIG_FILE),
        ];

    for (const candidate of candidates) {
      let text: string;
      try {
        text = await fsp.readFile(candidate, "utf-8");
      } catch (err) {
        if (options.path) {
          throw new ConfigurationError(
            `Failed to read configuration file ${candidate}: ${errorMessage(err)}`,
            { cause: err },
          );
        }
        continue;
      }
      log.info(`Loaded accelerator configuration from ${candidate}`);
      return Configuration.parse(text, candidate).withEnvironment(env);
    }

    log.warn(`No ${DEFAULT_CONFIG_FILE} found, using environment and defaults only`);
    return new Configuration().withEnvironment(env);
  }

  /**
   * Overlay `ACCELFLEET_<SECTION>__<KEY>` variables. Dots in section names
   * are written as `__`, so `ACCELFLEET_HOST__DIGITALOCEAN__API_KEY` sets
   * `api_key` in `host.digitalocean`.
   */
  withEnvironment(env: NodeJS.ProcessEnv): Configuration {
    const merged: Record<string, Record<string, ConfigValue>> = {};
    for (const [name, values] of this.sections) {
      merged[name] = { ...values };
    }

    for (const [name, value] of Object.entries(env)) {
      if (!name.startsWith(ENV_PREFIX) || value === undefined) continue;
      const parts = name.slice(ENV_PREFIX.length).split("__");
      if (parts.length < 2 || parts.some((p) => p.length === 0)) continue;

      const key = parts[parts.length - 1].toLowerCase();
      const section = parts.slice(0, -1).join(".").toLowerCase();
      merged[section] = { ...merged[section], [key]: value };
    }

    return new Configuration(merged, this.source);
  }

  has(section: string): boolean {
    return this.sections.has(section);
  }

  sectionNames(): string[] {
    return [...this.sections.keys()];
  }

  /** Values visible from `section`, parents first, subsections overriding. */
  section(name: string): ConfigSection {
    const merged: Record<string, ConfigValue> = {};
    for (const level of lineage(name).reverse()) {
      Object.assign(merged, this.sections.get(level));
    }
    return Object.freeze(merged);
  }

  /** Precedence: explicit > subsection > parent section > fallback. */
  resolve(
    section: string,
    key: string,
    explicit?: ConfigValue | null,
    fallback?: ConfigValue,
  ): ConfigValue | undefined {
    if (explicit !== undefined && explicit !== null) return explicit;
    for (const level of lineage(section)) {
      const value = this.sections.get(level)?.[key];
      if (value !== undefined) return value;
    }
    return fallback;
  }

  getString(section: string, key: string, explicit: string | null | undefined, fallback: string): string;
  getString(section: string, key: string, explicit?: string | null): string | undefined;
  getString(
    section: string,
    key: string,
    explicit?: string | null,
    fallback?: string,
  ): string | undefined {
    const value = this.resolve(section, key, explicit, fallback);
    return value === undefined ? undefined : String(value);
  }

  getNumber(section: string, key: string, explicit: number | null | undefined, fallback: number): number;
  getNumber(section: string, key: string, explicit?: number | null): number | undefined;
  getNumber(
    section: string,
    key: string,
    explicit?: number | null,
    fallback?: number,
  ): number | undefined {
    const value = this.resolve(section, key, explicit, fallback);
    if (value === undefined || typeof value === "number") return value;
    const parsed = typeof value === "string" && value.trim() !== "" ? Number(value) : NaN;
    if (!Number.isFinite(parsed)) {
      throw new ConfigurationError(`${section}.${key} must be a number, got "${value}"`);
    }
    return parsed;
  }

  getBoolean(section: string, key: string, explicit: boolean | null | undefined, fallback: boolean): boolean;
  getBoolean(section: string, key: string, explicit?: boolean | null): boolean | undefined;
  getBoolean(
    section: string,
    key: string,
    explicit?: boolean | null,
    fallback?: boolean,
  ): boolean | undefined {
    const value = this.resolve(section, key, explicit, fallback);
    if (value === undefined || typeof value === "boolean") return value;
    const text = String(value).toLowerCase();
    if (TRUE_VALUES.has(text)) return true;
    if (FALSE_VALUES.has(text)) return false;
    throw new ConfigurationError(`${section}.${key} must be a boolean, got "${value}"`);
  }
}

/** `host.digitalocean.gpu` → [`host.digitalocean.gpu`, `host.digitalocean`, `host`] */
function lineage(section: string): string[] {
  const parts = section.split(".");
  const levels: string[] = [];
  for (let i = parts.length; i > 0; i--) {
    levels.push(parts.slice(0, i).join("."));
  }
  return levels;
}
