import { logger } from "../config/logger.js";
import { isNotFound } from "../controller/errors.js";
import { LogicalSwitchDraft } from "../controller/switch-draft.js";
import type { ControllerClient, LogicalSwitchRecord, QueryHandle } from "../controller/types.js";
import { BadNVPState } from "./errors.js";
import { extractNetworkDetails, providerParamsFromDetails } from "./network-details.js";
import { assertConfigured, type ProviderNetworkConfigurator } from "./provider-config.js";
import { networkTag } from "./tags.js";
import { type NetworkLookup, type ProviderNetworkParams, type SwitchSelection, UNRESOLVED } from "./types.js";

export interface SwitchCapacityOptions {
  /** Ports per switch before another switch is spanned. 0 = unbounded. */
  maxPortsPerSwitch: number;
  /** When set, a network missing from the metadata store fails port creation with BadNVPState. */
  networks?: NetworkLookup;
}

/** Live port count reported by the controller. Switches queried without the status relation count as empty. */
export function portCount(record: LogicalSwitchRecord): number {
  return record._relations?.LogicalSwitchStatus?.lport_count ?? 0;
}

/**
 * Spreads a network's ports over one or more logical switches.
 *
 * Placement is first-fit: the first switch with spare capacity wins and a new
 * switch is only created when every existing one is saturated (or none
 * exist). Nothing is cached between calls; two concurrent callers may both
 * pick a switch with one free slot, and the controller arbitrates.
 */
export class SwitchCapacityManager {
  private readonly controller: ControllerClient;
  private readonly configurator: ProviderNetworkConfigurator;
  private readonly maxPortsPerSwitch: number;
  private readonly networks: NetworkLookup | undefined;

  constructor(controller: ControllerClient, configurator: ProviderNetworkConfigurator, options: SwitchCapacityOptions) {
    if (!Number.isInteger(options.maxPortsPerSwitch) || options.maxPortsPerSwitch < 0) {
      throw new RangeError(`maxPortsPerSwitch must be a non-negative integer, got ${options.maxPortsPerSwitch}`);
    }
    this.controller = controller;
    this.configurator = configurator;
    this.maxPortsPerSwitch = options.maxPortsPerSwitch;
    this.networks = options.networks;
  }

  /** Switches tagged with the network, with their live port counts. Lazy and restartable. */
  lswitchesForNetwork(networkId: string): QueryHandle<LogicalSwitchRecord> {
    return this.controller.switches.query({
      tags: [networkTag(networkId)],
      relations: ["LogicalSwitchStatus"],
    });
  }

  hasCapacity(record: LogicalSwitchRecord): boolean {
    return this.maxPortsPerSwitch === 0 || portCount(record) < this.maxPortsPerSwitch;
  }

  async selectOrCreateSwitch(networkId: string): Promise<SwitchSelection> {
    const { results } = await this.lswitchesForNetwork(networkId).results();
    const networkFound = this.networks ? await this.networks.exists(networkId) : true;

    const details = extractNetworkDetails(results, { networkFound });
    if (details === UNRESOLVED) {
      throw new BadNVPState(networkId);
    }

    const target = results.find((record) => this.hasCapacity(record));
    if (target) {
      return { switchUuid: target.uuid, created: false };
    }

    if (results.length > 0) {
      logger.info("All logical switches saturated, spanning network", {
        networkId,
        switchCount: results.length,
        maxPortsPerSwitch: this.maxPortsPerSwitch,
      });
    }
    const switchUuid = await this.createSwitch(
      networkId,
      details.networkName ?? networkId,
      providerParamsFromDetails(details),
    );
    return { switchUuid, created: true };
  }

  /**
   * Create a switch for the network. Provider attributes are validated and
   * resolved before the create call, so an invalid configuration never
   * reaches the controller.
   */
  async createSwitch(networkId: string, displayName: string, provider: ProviderNetworkParams = {}): Promise<string> {
    const draft = new LogicalSwitchDraft(displayName, [networkTag(networkId)]);
    const binding = assertConfigured(
      await this.configurator.configure(draft, provider.physNet, provider.netType, provider.segmentId),
    );

    const { uuid } = await this.controller.switches.create(draft.toAttrs());
    logger.info("Created logical switch", {
      networkId,
      switchUuid: uuid,
      displayName,
      zoneUuid: binding?.zoneUuid,
      transportType: binding?.transportType,
      vlanId: binding?.vlanId,
    });
    return uuid;
  }

  /** Delete every switch of the network. Returns how many were deleted; zero is not an error. */
  async deleteNetwork(networkId: string): Promise<number> {
    const { results } = await this.lswitchesForNetwork(networkId).results();

    let deleted = 0;
    for (const record of results) {
      try {
        await this.controller.switches.delete(record.uuid);
        deleted++;
      } catch (err: unknown) {
        if (!isNotFound(err)) throw err;
        logger.info("Logical switch already gone", { networkId, switchUuid: record.uuid });
      }
    }

    logger.info("Deleted network switches", { networkId, deleted });
    return deleted;
  }
}
