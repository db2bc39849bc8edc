import type { ControllerTag, LogicalSwitchAttrs, TransportType, TransportZoneBinding } from "./types.js";

/**
 * A logical switch that has not been sent to the controller yet.
 *
 * Zone bindings are collected on the draft so that provider validation can
 * finish before the create call goes out.
 */
export class LogicalSwitchDraft {
  readonly displayName: string;
  readonly tags: readonly ControllerTag[];
  private readonly zones: TransportZoneBinding[] = [];

  constructor(displayName: string, tags: readonly ControllerTag[]) {
    this.displayName = displayName;
    this.tags = tags;
  }

  transportZone(zoneUuid: string, transportType: TransportType, vlanId?: number): this {
    this.zones.push(vlanId === undefined ? { zoneUuid, transportType } : { zoneUuid, transportType, vlanId });
    return this;
  }

  get transportZones(): readonly TransportZoneBinding[] {
    return this.zones;
  }

  toAttrs(): LogicalSwitchAttrs {
    const attrs: LogicalSwitchAttrs = {
      display_name: this.displayName,
      tags: [...this.tags],
    };
    if (this.zones.length > 0) {
      attrs.transport_zones = this.zones.map((zone) => ({
        zone_uuid: zone.zoneUuid,
        transport_type: zone.transportType,
        ...(zone.vlanId === undefined ? {} : { binding_config: { vlan_translation: [{ transport: zone.vlanId }] } }),
      }));
    }
    return attrs;
  }
}
