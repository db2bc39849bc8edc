import { logger } from "../config/logger.js";
import { isNotFound } from "../controller/errors.js";
import type { ControllerClient } from "../controller/types.js";
import { AmbiguousPortPlacement, PortNotFound } from "./errors.js";
import type { SwitchCapacityManager } from "./switch-capacity.js";
import { networkTag, portTag } from "./tags.js";
import type { CreatedPort } from "./types.js";

export class PortAllocator {
  private readonly controller: ControllerClient;
  private readonly switches: SwitchCapacityManager;

  constructor(controller: ControllerClient, switches: SwitchCapacityManager) {
    this.controller = controller;
    this.switches = switches;
  }

  /**
   * Attach a port to the network, spanning a new switch if needed.
   * If the port create fails after a switch was created, the switch is left
   * in place and reused by the next call.
   */
  async createPort(networkId: string, portId: string, adminStatusEnabled = true): Promise<CreatedPort> {
    const { switchUuid } = await this.switches.selectOrCreateSwitch(networkId);

    const { uuid } = await this.controller.ports.create(switchUuid, {
      display_name: portId,
      admin_status_enabled: adminStatusEnabled,
      tags: [networkTag(networkId), portTag(portId)],
    });
    logger.info("Created logical port", { networkId, portId, portUuid: uuid, switchUuid, adminStatusEnabled });

    return { uuid, switchUuid };
  }

  /**
   * Delete a logical port by its controller uuid. Without a switch uuid the
   * hosting switch is looked up, and must be unique. A port that is already
   * gone from the given switch counts as deleted.
   */
  async deleteNetworkPort(portUuid: string, switchUuid?: string): Promise<void> {
    const hostUuid = switchUuid ?? (await this.hostingSwitch(portUuid));
    try {
      await this.controller.ports.delete(hostUuid, portUuid);
    } catch (err: unknown) {
      if (!isNotFound(err)) throw err;
      logger.info("Logical port already gone", { portUuid, switchUuid: hostUuid });
      return;
    }
    logger.info("Deleted logical port", { portUuid, switchUuid: hostUuid });
  }

  private async hostingSwitch(portUuid: string): Promise<string> {
    const { results } = await this.controller.ports
      .query({ uuid: portUuid, relations: ["LogicalSwitchConfig"] })
      .results();

    const hosts = new Set<string>();
    for (const record of results) {
      const host = record._relations?.LogicalSwitchConfig?.uuid;
      if (host) hosts.add(host);
    }

    const [host, ...others] = hosts;
    if (host === undefined) {
      throw new PortNotFound(portUuid);
    }
    if (others.length > 0) {
      logger.error("Logical port placed on multiple switches", { portUuid, switchUuids: [...hosts] });
      throw new AmbiguousPortPlacement(portUuid, [...hosts]);
    }
    return host;
  }
}
