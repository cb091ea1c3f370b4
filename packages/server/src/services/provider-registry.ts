import type { FastifyBaseLogger } from "fastify";
import type { HostType } from "@accelfleet/shared";
import { ConfigurationError } from "../errors.js";
import type { HostProvider } from "./host-provider.js";
import { isHostType } from "./host-provider.js";
import { DigitalOceanProvider } from "./providers/digitalocean-provider.js";
import { VastAIProvider } from "./providers/vastai-provider.js";
import type { HostSettings } from "./settings.js";

export type HostProviderFactory = (
  settings: HostSettings,
  log: FastifyBaseLogger,
) => HostProvider;

/** One adapter per host type. */
const PROVIDERS: Readonly<Record<HostType, HostProviderFactory>> = {
  digitalocean: (settings, log) =>
    new DigitalOceanProvider({
      apiKey: settings.apiKey,
      region: settings.region,
      log,
    }),
  vastai: (settings, log) =>
    new VastAIProvider({
      apiKey: settings.apiKey,
      log,
    }),
};

export function registeredHostTypes(): HostType[] {
  return Object.keys(PROVIDERS).filter(isHostType);
}

export function createHostProvider(
  settings: HostSettings,
  log: FastifyBaseLogger,
): HostProvider {
  const factory: HostProviderFactory | undefined = PROVIDERS[settings.hostType];
  if (!factory) {
    throw new ConfigurationError(`No provider registered for host type "${settings.hostType}"`);
  }
  if (!settings.apiKey) {
    throw new ConfigurationError(
      `Missing credentials for ${settings.hostType} (host.${settings.hostType}.api_key)`,
    );
  }
  return factory(settings, log.child({ hostType: settings.hostType }));
}
