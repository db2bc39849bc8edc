import { config } from "./config/index.js";
import { NetworkDriver } from "./switching/network-driver.js";
import type { NetworkLookup } from "./switching/types.js";
import { validateRequiredEnvVars } from "./validate-env.js";

export { type Config, config, parseConfig } from "./config/index.js";
export { HttpControllerClient, type HttpControllerClientOptions } from "./controller/controller-client.js";
export { ControllerApiError, MalformedControllerResponse } from "./controller/errors.js";
export { LogicalSwitchDraft } from "./controller/switch-draft.js";
export * from "./controller/types.js";
export * from "./switching/errors.js";
export { extractNetworkDetails, providerParamsFromDetails } from "./switching/network-details.js";
export { NetworkDriver, type NetworkDriverOptions } from "./switching/network-driver.js";
export { PortAllocator } from "./switching/port-allocator.js";
export {
  assertConfigured,
  isNetworkType,
  ProviderNetworkConfigurator,
  type TransportZoneTarget,
  validateProviderParams,
} from "./switching/provider-config.js";
export { portCount, type SwitchCapacityOptions, SwitchCapacityManager } from "./switching/switch-capacity.js";
export { networkTag, portTag, TAG_SCOPES } from "./switching/tags.js";
export { TransportZoneResolver } from "./switching/transport-zone-resolver.js";
export * from "./switching/types.js";

/** Validate the environment and build a driver from it. */
export function createDriverFromEnv(networks?: NetworkLookup): NetworkDriver {
  validateRequiredEnvVars();
  return NetworkDriver.fromConfig(config, networks);
}
