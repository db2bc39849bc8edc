import type { ControllerClient } from "../controller/types.js";

/** Live transport zone lookup. No caching: every call asks the controller. */
export class TransportZoneResolver {
  private readonly controller: ControllerClient;

  constructor(controller: ControllerClient) {
    this.controller = controller;
  }

  async resolve(zoneUuid: string): Promise<{ found: boolean }> {
    const { resultCount } = await this.controller.transportZones.query(zoneUuid);
    return { found: resultCount >= 1 };
  }
}
