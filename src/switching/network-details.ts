import type { LogicalSwitchRecord } from "../controller/types.js";
import {
  type NetworkDetails,
  type NetworkDetailsResult,
  type ProviderNetworkParams,
  UNRESOLVED,
} from "./types.js";

export interface ExtractOptions {
  /** false when the metadata store has no record of the network. */
  networkFound?: boolean;
}

/**
 * Derive a network's provider placement from its existing switches.
 *
 * Only the first switch and its first transport zone are consulted. Networks
 * whose switches disagree are not reconciled here.
 */
export function extractNetworkDetails(
  switches: readonly LogicalSwitchRecord[],
  options: ExtractOptions = {},
): NetworkDetailsResult {
  if (options.networkFound === false) {
    return UNRESOLVED;
  }

  const [first] = switches;
  if (!first) {
    return {};
  }

  const zone = first.transport_zones?.[0];
  if (!zone) {
    return { networkName: first.display_name, physNet: undefined };
  }

  const details: NetworkDetails = {
    networkName: first.display_name,
    physNet: zone.zone_uuid,
    physType: zone.transport_type,
  };
  const translation = zone.binding_config?.vlan_translation?.[0];
  if (translation) {
    details.segmentId = translation.transport;
  }
  return details;
}

/**
 * Turn extracted details back into provider params for a sibling switch.
 * A bridge zone carrying a VLAN id was created as a vlan network.
 */
export function providerParamsFromDetails(details: NetworkDetails): ProviderNetworkParams {
  const { physNet, physType, segmentId } = details;
  if (physNet === undefined) {
    return {};
  }
  if (physType === "bridge" && segmentId !== undefined) {
    return { physNet, netType: "vlan", segmentId };
  }
  return { physNet, netType: physType, segmentId };
}
