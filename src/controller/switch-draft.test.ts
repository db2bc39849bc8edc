import { describe, expect, it } from "vitest";
import { LogicalSwitchDraft } from "./switch-draft.js";

const TAGS = [{ scope: "neutron_net_id", tag: "net-1" }];

describe("LogicalSwitchDraft", () => {
  it("serializes an unbound switch without transport zones", () => {
    expect(new LogicalSwitchDraft("private", TAGS).toAttrs()).toStrictEqual({
      display_name: "private",
      tags: [{ scope: "neutron_net_id", tag: "net-1" }],
    });
  });

  it("serializes a vlan binding as a vlan translation", () => {
    const draft = new LogicalSwitchDraft("public", TAGS).transportZone("zone_uuid", "bridge", 10);
    expect(draft.toAttrs().transport_zones).toStrictEqual([
      { zone_uuid: "zone_uuid", transport_type: "bridge", binding_config: { vlan_translation: [{ transport: 10 }] } },
    ]);
  });

  it("omits the binding config when no vlan id is given", () => {
    const draft = new LogicalSwitchDraft("public", TAGS).transportZone("zone_uuid", "gre");
    expect(draft.transportZones).toStrictEqual([{ zoneUuid: "zone_uuid", transportType: "gre" }]);
    expect(draft.toAttrs().transport_zones).toStrictEqual([{ zone_uuid: "zone_uuid", transport_type: "gre" }]);
  });

  it("copies the tags so later edits to the attrs don't leak back", () => {
    const draft = new LogicalSwitchDraft("public", TAGS);
    draft.toAttrs().tags.push({ scope: "x", tag: "y" });
    expect(draft.toAttrs().tags).toHaveLength(1);
  });
});
