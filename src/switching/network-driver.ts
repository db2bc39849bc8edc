import type { Config } from "../config/index.js";
import { logger } from "../config/logger.js";
import { HttpControllerClient } from "../controller/controller-client.js";
import type { ControllerClient } from "../controller/types.js";
import { PortAllocator } from "./port-allocator.js";
import { ProviderNetworkConfigurator } from "./provider-config.js";
import { SwitchCapacityManager } from "./switch-capacity.js";
import { TransportZoneResolver } from "./transport-zone-resolver.js";
import type { CreatedPort, NetworkLookup, ProviderNetworkParams } from "./types.js";

export interface NetworkDriverOptions {
  maxPortsPerSwitch: number;
  networks?: NetworkLookup;
}

/**
 * Maps tenant networks and ports onto controller logical switches.
 *
 * Stateless: every call re-reads the controller, so one driver can serve
 * concurrent requests.
 */
export class NetworkDriver {
  readonly switches: SwitchCapacityManager;
  readonly ports: PortAllocator;

  constructor(controller: ControllerClient, options: NetworkDriverOptions) {
    const configurator = new ProviderNetworkConfigurator(new TransportZoneResolver(controller));
    this.switches = new SwitchCapacityManager(controller, configurator, options);
    this.ports = new PortAllocator(controller, this.switches);
  }

  static fromConfig(config: Config, networks?: NetworkLookup): NetworkDriver {
    const controller = new HttpControllerClient({
      baseUrl: config.controller.url,
      username: config.controller.username,
      password: config.controller.password,
    });
    logger.info("Network driver configured", {
      controller: config.controller.url,
      maxPortsPerSwitch: config.switching.maxPortsPerSwitch,
    });
    return new NetworkDriver(controller, { maxPortsPerSwitch: config.switching.maxPortsPerSwitch, networks });
  }

  /** Create the first logical switch of a network. Returns its uuid. */
  async createNetwork(networkId: string, networkName: string, provider: ProviderNetworkParams = {}): Promise<string> {
    return this.switches.createSwitch(networkId, networkName, provider);
  }

  async deleteNetwork(networkId: string): Promise<void> {
    await this.switches.deleteNetwork(networkId);
  }

  async createPort(networkId: string, portId: string, adminStatusEnabled = true): Promise<CreatedPort> {
    return this.ports.createPort(networkId, portId, adminStatusEnabled);
  }

  async deletePort(portUuid: string, switchUuid?: string): Promise<void> {
    await this.ports.deleteNetworkPort(portUuid, switchUuid);
  }
}
