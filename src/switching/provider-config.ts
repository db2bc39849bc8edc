import { logger } from "../config/logger.js";
import type { TransportType, TransportZoneBinding } from "../controller/types.js";
import { providerConfigError } from "./errors.js";
import type { TransportZoneResolver } from "./transport-zone-resolver.js";
import {
  NETWORK_TYPES,
  type NetworkType,
  type ProviderConfigFailure,
  type ProviderConfigResult,
  type ProviderNetworkParams,
  TRANSPORT_TYPE_FOR,
} from "./types.js";

/** Anything a transport zone can be bound to, typically a LogicalSwitchDraft. */
export interface TransportZoneTarget {
  transportZone(zoneUuid: string, transportType: TransportType, vlanId?: number): unknown;
}

export function isNetworkType(value: string): value is NetworkType {
  return (NETWORK_TYPES as readonly string[]).includes(value);
}

function fail(error: ProviderConfigFailure): ProviderConfigResult {
  return { ok: false, error };
}

function isPresent(value: string | undefined): value is string {
  return value !== undefined && value !== "";
}

/**
 * Decision table for provider attributes. Pure: does not consult the
 * controller, so an unknown physical network still passes here.
 *
 * Checks run in a fixed order and the first failing one wins:
 * pairing, network type, segment id presence, segment id range.
 */
export function validateProviderParams(params: ProviderNetworkParams): ProviderConfigResult {
  const { physNet, netType, segmentId } = params;

  if (!isPresent(physNet) && !isPresent(netType)) {
    return { ok: true, binding: null };
  }
  if (!isPresent(physNet) || !isPresent(netType)) {
    return fail({ kind: "ProvidernetParamError", physNet, netType });
  }
  if (!isNetworkType(netType)) {
    return fail({ kind: "InvalidPhysicalNetworkType", netType });
  }
  if (netType === "vlan" && segmentId === undefined) {
    return fail({ kind: "SegmentIdRequired", netType });
  }
  if (netType !== "vlan" && segmentId !== undefined) {
    return fail({ kind: "SegmentIdUnsupported", netType, segmentId });
  }
  if (segmentId !== undefined && !(Number.isInteger(segmentId) && segmentId >= 0)) {
    return fail({ kind: "InvalidSegmentId", netType, segmentId });
  }

  const binding: TransportZoneBinding = { zoneUuid: physNet, transportType: TRANSPORT_TYPE_FOR[netType] };
  if (netType === "vlan") {
    binding.vlanId = segmentId;
  }
  return { ok: true, binding };
}

/**
 * Validates provider attributes, resolves the physical network against the
 * controller's transport zones and binds the zone to the target.
 *
 * The target receives exactly one transportZone() call on success and none
 * otherwise. Failures come back as values; use assertConfigured() to throw.
 */
export class ProviderNetworkConfigurator {
  private readonly zones: TransportZoneResolver;

  constructor(zones: TransportZoneResolver) {
    this.zones = zones;
  }

  async configure(
    target: TransportZoneTarget,
    physNet: string | undefined,
    netType: string | undefined,
    segmentId: number | undefined,
  ): Promise<ProviderConfigResult> {
    const checked = validateProviderParams({ physNet, netType, segmentId });
    if (!checked.ok || checked.binding === null) {
      return checked;
    }

    const binding = checked.binding;
    const { found } = await this.zones.resolve(binding.zoneUuid);
    if (!found) {
      return fail({ kind: "PhysicalNetworkNotFound", physNet: binding.zoneUuid });
    }

    target.transportZone(binding.zoneUuid, binding.transportType, binding.vlanId);
    logger.debug("Bound transport zone", { ...binding });
    return checked;
  }
}

/** Unwrap a configure() result, throwing the matching SwitchingError on failure. */
export function assertConfigured(result: ProviderConfigResult): TransportZoneBinding | null {
  if (!result.ok) {
    throw providerConfigError(result.error);
  }
  return result.binding;
}
