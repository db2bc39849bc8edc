import { describe, expect, it } from "vitest";
import type { LogicalSwitchRecord } from "../controller/types.js";
import { extractNetworkDetails, providerParamsFromDetails } from "./network-details.js";
import { UNRESOLVED } from "./types.js";

function lswitch(overrides: Partial<LogicalSwitchRecord> = {}): LogicalSwitchRecord {
  return { uuid: "sw-1", display_name: "public", transport_zones: [], ...overrides };
}

describe("extractNetworkDetails", () => {
  it("returns empty details when the network has no switches", () => {
    expect(extractNetworkDetails([])).toStrictEqual({});
  });

  it("returns UNRESOLVED when the network record is missing", () => {
    expect(extractNetworkDetails([], { networkFound: false })).toBe(UNRESOLVED);
  });

  it("returns UNRESOLVED for a missing network even if switches still exist", () => {
    expect(extractNetworkDetails([lswitch()], { networkFound: false })).toBe(UNRESOLVED);
  });

  it("reads the name and a null physNet from a switch without transport zones", () => {
    const details = extractNetworkDetails([lswitch()]);
    expect(details).toStrictEqual({ networkName: "public", physNet: undefined });
    expect(details).not.toHaveProperty("physType");
  });

  it("treats a switch with no transport_zones field like one with none", () => {
    expect(extractNetworkDetails([{ uuid: "sw-1", display_name: "public" }])).toStrictEqual({
      networkName: "public",
      physNet: undefined,
    });
  });

  it("reads physNet and physType from the first transport zone", () => {
    const details = extractNetworkDetails([
      lswitch({ transport_zones: [{ zone_uuid: "zone_uuid", transport_type: "bridge" }] }),
    ]);
    expect(details).toStrictEqual({ networkName: "public", physNet: "zone_uuid", physType: "bridge" });
  });

  it("reads the segment id from the vlan translation binding", () => {
    const details = extractNetworkDetails([
      lswitch({
        transport_zones: [
          { zone_uuid: "zone_uuid", transport_type: "bridge", binding_config: { vlan_translation: [{ transport: 10 }] } },
        ],
      }),
    ]);
    expect(details).toStrictEqual({
      networkName: "public",
      physNet: "zone_uuid",
      physType: "bridge",
      segmentId: 10,
    });
  });

  it("ignores an empty vlan translation list", () => {
    const details = extractNetworkDetails([
      lswitch({
        transport_zones: [{ zone_uuid: "zone_uuid", transport_type: "bridge", binding_config: { vlan_translation: [] } }],
      }),
    ]);
    expect(details).toStrictEqual({ networkName: "public", physNet: "zone_uuid", physType: "bridge" });
  });

  it("only consults the first switch and its first zone", () => {
    const details = extractNetworkDetails([
      lswitch({
        display_name: "first",
        transport_zones: [
          { zone_uuid: "zone-a", transport_type: "gre" },
          { zone_uuid: "zone-b", transport_type: "stt" },
        ],
      }),
      lswitch({ uuid: "sw-2", display_name: "second", transport_zones: [{ zone_uuid: "zone-c", transport_type: "local" }] }),
    ]);
    expect(details).toStrictEqual({ networkName: "first", physNet: "zone-a", physType: "gre" });
  });
});

describe("providerParamsFromDetails", () => {
  it("returns no provider params for an unbound network", () => {
    expect(providerParamsFromDetails({})).toStrictEqual({});
    expect(providerParamsFromDetails({ networkName: "public", physNet: undefined })).toStrictEqual({});
  });

  it("restores a vlan network from a bridge zone with a segment id", () => {
    expect(
      providerParamsFromDetails({ networkName: "public", physNet: "zone_uuid", physType: "bridge", segmentId: 10 }),
    ).toStrictEqual({ physNet: "zone_uuid", netType: "vlan", segmentId: 10 });
  });

  it("keeps the transport type of other zones as the network type", () => {
    expect(providerParamsFromDetails({ physNet: "zone_uuid", physType: "gre" })).toStrictEqual({
      physNet: "zone_uuid",
      netType: "gre",
      segmentId: undefined,
    });
  });
});
