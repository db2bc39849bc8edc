import type { ControllerTag, LogicalPortRecord, LogicalSwitchRecord, TransportZoneRecord } from "./schemas.js";

export type { ControllerTag, LogicalPortRecord, LogicalSwitchRecord, TransportZoneRecord };

/** Transport types the controller accepts on a switch's zone binding. */
export const TRANSPORT_TYPES = ["bridge", "gre", "stt", "local"] as const;

export type TransportType = (typeof TRANSPORT_TYPES)[number];

/** A transport zone attached to a logical switch. Immutable once the switch exists. */
export interface TransportZoneBinding {
  zoneUuid: string;
  transportType: TransportType;
  /** Only set for VLAN provider networks. */
  vlanId?: number;
}

/** Body of a logical switch create call. */
export interface LogicalSwitchAttrs {
  display_name: string;
  tags: ControllerTag[];
  transport_zones?: TransportZoneRecord[];
}

/** Body of a logical port create call. */
export interface LogicalPortAttrs {
  display_name?: string;
  admin_status_enabled: boolean;
  tags: ControllerTag[];
}

/** Relations the controller can inline into query results. */
export type QueryRelation = "LogicalSwitchStatus" | "LogicalSwitchConfig";

export interface QueryFilter {
  /** Every tag must match. */
  tags?: ControllerTag[];
  uuid?: string;
  relations?: QueryRelation[];
}

export interface QueryResults<T> {
  results: T[];
  resultCount: number;
}

/**
 * A lazily executed collection query. Nothing is sent until results() is
 * called, and every call re-runs the query against the controller.
 */
export interface QueryHandle<T> {
  results(): Promise<QueryResults<T>>;
}

export interface LogicalSwitchCollection {
  create(attrs: LogicalSwitchAttrs): Promise<{ uuid: string }>;
  query(filter: QueryFilter): QueryHandle<LogicalSwitchRecord>;
  delete(uuid: string): Promise<void>;
}

export interface LogicalPortCollection {
  create(switchUuid: string, attrs: LogicalPortAttrs): Promise<{ uuid: string }>;
  /** Queries ports across every switch. */
  query(filter: QueryFilter): QueryHandle<LogicalPortRecord>;
  delete(switchUuid: string, uuid: string): Promise<void>;
}

export interface TransportZoneCollection {
  query(zoneUuid: string): Promise<{ resultCount: number }>;
}

/** Object-level primitives of the SDN controller. */
export interface ControllerClient {
  readonly switches: LogicalSwitchCollection;
  readonly ports: LogicalPortCollection;
  readonly transportZones: TransportZoneCollection;
}
