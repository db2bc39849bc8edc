import type { TransportType, TransportZoneBinding } from "../controller/types.js";

/** Provider network types a caller may request. */
export const NETWORK_TYPES = ["flat", "vlan", "gre", "stt", "local", "bridge"] as const;

export type NetworkType = (typeof NETWORK_TYPES)[number];

/** How each network type is carried by the controller. VLANs ride a bridge zone tagged with the VLAN id. */
export const TRANSPORT_TYPE_FOR: Record<NetworkType, TransportType> = {
  flat: "bridge",
  bridge: "bridge",
  vlan: "bridge",
  gre: "gre",
  stt: "stt",
  local: "local",
};

/**
 * Caller-supplied provider placement. netType is a plain string because it
 * arrives unvalidated; validateProviderParams() narrows it.
 */
export interface ProviderNetworkParams {
  physNet?: string;
  netType?: string;
  segmentId?: number;
}

export type ProviderConfigFailure =
  | { kind: "ProvidernetParamError"; physNet?: string; netType?: string }
  | { kind: "InvalidPhysicalNetworkType"; netType: string }
  | { kind: "SegmentIdRequired"; netType: NetworkType }
  | { kind: "SegmentIdUnsupported"; netType: NetworkType; segmentId: number }
  | { kind: "InvalidSegmentId"; netType: NetworkType; segmentId: number }
  | { kind: "PhysicalNetworkNotFound"; physNet: string };

export type ProviderConfigErrorKind = ProviderConfigFailure["kind"];

/** binding is null when no provider attributes were given (private network). */
export type ProviderConfigResult =
  | { ok: true; binding: TransportZoneBinding | null }
  | { ok: false; error: ProviderConfigFailure };

/** Provider placement derived from a network's existing switches. */
export interface NetworkDetails {
  networkName?: string;
  physNet?: string;
  /** Transport type as the controller reports it on the zone. */
  physType?: string;
  segmentId?: number;
}

/** The network record itself could not be located, as opposed to a network with no switches yet. */
export const UNRESOLVED: unique symbol = Symbol("unresolved-network-details");

export type NetworkDetailsResult = NetworkDetails | typeof UNRESOLVED;

/** Metadata-store lookup used to tell a missing network from one with no switches. */
export interface NetworkLookup {
  exists(networkId: string): Promise<boolean>;
}

export interface SwitchSelection {
  switchUuid: string;
  /** True when the switch was created for this request. */
  created: boolean;
}

export interface CreatedPort {
  uuid: string;
  switchUuid: string;
}
