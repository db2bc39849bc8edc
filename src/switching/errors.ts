import type { ProviderConfigErrorKind, ProviderConfigFailure } from "./types.js";

export type SwitchingErrorKind = ProviderConfigErrorKind | "BadNVPState" | "PortNotFound" | "AmbiguousPortPlacement";

/** Base class for every failure raised by the switching layer. Controller faults are not wrapped. */
export class SwitchingError extends Error {
  readonly kind: SwitchingErrorKind;

  constructor(kind: SwitchingErrorKind, message: string) {
    super(message);
    this.kind = kind;
    this.name = kind;
  }
}

export class ProvidernetParamError extends SwitchingError {
  readonly physNet: string | undefined;
  readonly netType: string | undefined;

  constructor(physNet?: string, netType?: string) {
    super(
      "ProvidernetParamError",
      `physical_network and network_type must be supplied together (got physical_network=${physNet ?? "none"}, network_type=${netType ?? "none"})`,
    );
    this.physNet = physNet;
    this.netType = netType;
  }
}

export class InvalidPhysicalNetworkType extends SwitchingError {
  readonly netType: string;

  constructor(netType: string) {
    super("InvalidPhysicalNetworkType", `Invalid physical network type: ${netType}`);
    this.netType = netType;
  }
}

export class SegmentIdRequired extends SwitchingError {
  readonly netType: string;

  constructor(netType: string) {
    super("SegmentIdRequired", `Segment id is required for network type ${netType}`);
    this.netType = netType;
  }
}

export class SegmentIdUnsupported extends SwitchingError {
  readonly netType: string;

  constructor(netType: string) {
    super("SegmentIdUnsupported", `Segment id is not supported for network type ${netType}`);
    this.netType = netType;
  }
}

export class InvalidSegmentId extends SwitchingError {
  readonly segmentId: number;

  constructor(netType: string, segmentId: number) {
    super("InvalidSegmentId", `Segment id ${segmentId} is not a non-negative integer for network type ${netType}`);
    this.segmentId = segmentId;
  }
}

export class PhysicalNetworkNotFound extends SwitchingError {
  readonly physNet: string;

  constructor(physNet: string) {
    super("PhysicalNetworkNotFound", `Physical network ${physNet} not found`);
    this.physNet = physNet;
  }
}

/** The network's provider context can't be resolved, so no port may be attached to it. */
export class BadNVPState extends SwitchingError {
  readonly networkId: string;

  constructor(networkId: string) {
    super("BadNVPState", `Cannot resolve provider details for network ${networkId}`);
    this.networkId = networkId;
  }
}

export class PortNotFound extends SwitchingError {
  readonly portId: string;

  constructor(portId: string) {
    super("PortNotFound", `Logical port ${portId} is not attached to any switch`);
    this.portId = portId;
  }
}

export class AmbiguousPortPlacement extends SwitchingError {
  readonly portId: string;
  readonly switchUuids: readonly string[];

  constructor(portId: string, switchUuids: readonly string[]) {
    super("AmbiguousPortPlacement", `Logical port ${portId} found on ${switchUuids.length} switches: ${switchUuids.join(", ")}`);
    this.portId = portId;
    this.switchUuids = switchUuids;
  }
}

/** Map a provider validation failure to the error callers throw. */
export function providerConfigError(failure: ProviderConfigFailure): SwitchingError {
  switch (failure.kind) {
    case "ProvidernetParamError":
      return new ProvidernetParamError(failure.physNet, failure.netType);
    case "InvalidPhysicalNetworkType":
      return new InvalidPhysicalNetworkType(failure.netType);
    case "SegmentIdRequired":
      return new SegmentIdRequired(failure.netType);
    case "SegmentIdUnsupported":
      return new SegmentIdUnsupported(failure.netType);
    case "InvalidSegmentId":
      return new InvalidSegmentId(failure.netType, failure.segmentId);
    case "PhysicalNetworkNotFound":
      return new PhysicalNetworkNotFound(failure.physNet);
  }
}
