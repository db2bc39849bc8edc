import { describe, expect, it, vi } from "vitest";
import { FakeController } from "../test/fake-controller.js";
import { TransportZoneResolver } from "./transport-zone-resolver.js";

describe("TransportZoneResolver", () => {
  it("reports a known zone as found", async () => {
    const resolver = new TransportZoneResolver(new FakeController(["zone_uuid"]));
    expect(await resolver.resolve("zone_uuid")).toEqual({ found: true });
  });

  it("reports an unknown zone as not found", async () => {
    const resolver = new TransportZoneResolver(new FakeController(["zone_uuid"]));
    expect(await resolver.resolve("other_uuid")).toEqual({ found: false });
  });

  it("queries the controller on every call", async () => {
    const controller = new FakeController(["zone_uuid"]);
    const querySpy = vi.spyOn(controller.transportZones, "query");
    const resolver = new TransportZoneResolver(controller);

    await resolver.resolve("zone_uuid");
    controller.zones.delete("zone_uuid");

    expect(await resolver.resolve("zone_uuid")).toEqual({ found: false });
    expect(querySpy).toHaveBeenCalledTimes(2);
  });

  it("treats any positive result count as found", async () => {
    const controller = new FakeController();
    vi.spyOn(controller.transportZones, "query").mockResolvedValue({ resultCount: 2 });
    expect(await new TransportZoneResolver(controller).resolve("zone_uuid")).toEqual({ found: true });
  });
});
