import type { ControllerTag } from "../controller/types.js";

/** Tag scopes linking controller objects back to tenant networks and ports. */
export const TAG_SCOPES = {
  networkId: "neutron_net_id",
  portId: "neutron_port_id",
} as const;

export function networkTag(networkId: string): ControllerTag {
  return { scope: TAG_SCOPES.networkId, tag: networkId };
}

export function portTag(portId: string): ControllerTag {
  return { scope: TAG_SCOPES.portId, tag: portId };
}
