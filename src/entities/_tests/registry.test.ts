import { describe, it, expect } from "vitest";
import { EntityRegistry, type AvailabilitySource, type EntitySnapshot } from "../../entities";
import { ZoneRouter } from "../../router";
import { buildCatalog } from "../../catalog/catalog";
import { DeviceUnreachableError, InvalidActionDataError } from "../../errors";
import { StatusPoller } from "../../polling/poller";
import { FakeMatrixTransport, deviceHandler, simulatedDevice } from "../../test-utils/fakeMatrix";

class FakeAvailability implements AvailabilitySource {
  isAvailable = true;
  private readonly listeners = new Set<(available: boolean) => void>();

  onAvailabilityChange(listener: (available: boolean) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  set(available: boolean): void {
    this.isAvailable = available;
    for (const l of this.listeners) l(available);
  }
}

function setup(zones = new Map([[1, "Main TV Source"], [2, "Kitchen"]])) {
  const transport = new FakeMatrixTransport(deviceHandler(simulatedDevice()));
  const catalog = buildCatalog({ zones, sources: new Map([[4, "Xbox 360"], [2, "Apple TV"]]) });
  const router = new ZoneRouter({ catalog, transport, powerSettleMs: 0 });
  const availability = new FakeAvailability();
  const registry = new EntityRegistry(router, availability);
  return { registry, router, transport, availability };
}

describe("entities/EntityRegistry", () => {
  it("derives unique ids from the host and entity ids from names", () => {
    const { registry } = setup();
    expect(registry.power.uniqueId).toBe("10.0.0.9-power-switch");
    expect(registry.power.entityId).toBe("switch.10_0_0_9_power");
    expect(registry.players.map((p) => p.entityId)).toEqual(["media_player.main_tv_source", "media_player.kitchen"]);
    expect(registry.players.map((p) => p.uniqueId)).toEqual(["10.0.0.9-output-1", "10.0.0.9-output-2"]);
  });

  it("keeps entity ids unique when zone names slug to the same id", () => {
    const { registry } = setup(new Map([[1, "TV"], [2, "tv"]]));
    expect(registry.players.map((p) => p.entityId)).toEqual(["media_player.tv", "media_player.tv_1"]);
  });

  it("starts unknown, then follows power and the routed source", async () => {
    const { registry, router } = setup();
    const main = registry.players[0];
    expect(main?.snapshot()).toMatchObject({ state: "unknown", source: null, mediaTitle: null, sourceList: ["Apple TV", "Xbox 360"] });

    await registry.power.turnOn();
    await main?.selectSource("Xbox 360");
    expect(main?.snapshot()).toMatchObject({ state: "on", source: "Xbox 360", mediaTitle: "Xbox 360 on Main TV Source" });
    expect(registry.power.snapshot().state).toBe("on");

    await router.setPower(false);
    expect(main?.snapshot()).toMatchObject({ state: "off", mediaTitle: "Powered Off" });
  });

  it("reports every entity unavailable while the matrix is unavailable", () => {
    const { registry, availability } = setup();
    availability.set(false);
    expect(registry.snapshots().map((s) => s.state)).toEqual(["unavailable", "unavailable", "unavailable"]);
  });

  it("emits only the entities whose snapshot changed", async () => {
    const { registry, router } = setup();
    registry.attach();
    const seen: EntitySnapshot[] = [];
    registry.subscribe((s) => seen.push(s));

    await router.route("Kitchen", "Apple TV");
    expect(seen.map((s) => s.entityId)).toEqual(["media_player.kitchen"]);

    await router.route("Kitchen", "Apple TV");
    expect(seen).toHaveLength(1);

    await router.setPower(true);
    expect(seen.slice(1).map((s) => s.entityId)).toEqual([
      "switch.10_0_0_9_power",
      "media_player.main_tv_source",
      "media_player.kitchen",
    ]);
    expect(seen[3]).toMatchObject({ state: "on", mediaTitle: "Apple TV on Kitchen" });
  });

  it("emits on availability changes and stops after detach", () => {
    const { registry, availability } = setup();
    registry.attach();
    const seen: EntitySnapshot[] = [];
    registry.subscribe((s) => seen.push(s));
    availability.set(false);
    expect(seen).toHaveLength(3);
    registry.detach();
    availability.set(true);
    expect(seen).toHaveLength(3);
  });
});

describe("entities availability", () => {
  it("becomes available again as soon as a command is acknowledged", async () => {
    const transport = new FakeMatrixTransport(() => {
      throw new DeviceUnreachableError("10.0.0.9", "pas de réponse après 3000ms");
    });
    const catalog = buildCatalog({ zones: new Map([[2, "Kitchen"]]), sources: new Map([[2, "Apple TV"]]) });
    const router = new ZoneRouter({ catalog, transport, powerSettleMs: 0 });
    const poller = new StatusPoller(router, { unavailableAfter: 1 });
    const registry = new EntityRegistry(router, poller);
    expect(await poller.tick()).toBe("unreachable");
    expect(registry.players[0]?.snapshot().state).toBe("unavailable");
    transport.handler = deviceHandler(simulatedDevice());
    expect((await router.route("Kitchen", "Apple TV")).ok).toBe(true);
    expect(registry.snapshots().map((s) => s.state)).toEqual(["unknown", "unknown"]);
  });
});

describe("entities set_zone", () => {
  it("routes the source to the targeted zone player", async () => {
    const { registry, transport } = setup();
    const outcomes = await registry.setZone({ entity_id: "media_player.kitchen", source: "Xbox 360" });
    expect(outcomes).toEqual([{ entityId: "media_player.kitchen", result: { ok: true, value: undefined } }]);
    expect(transport.sent.map((i) => i.source)).toEqual([[4, 2]]);
  });

  it("targets every zone player when entity_id is omitted", async () => {
    const { registry, transport } = setup();
    const outcomes = await registry.setZone({ source: "Apple TV" });
    expect(outcomes.map((o) => [o.entityId, o.result.ok])).toEqual([
      ["media_player.main_tv_source", true],
      ["media_player.kitchen", true],
    ]);
    expect(transport.sent.map((i) => i.source)).toEqual([[2, 1], [2, 2]]);
  });

  it("treats an empty entity_id list like an absent one", async () => {
    const { registry, transport } = setup();
    const outcomes = await registry.setZone({ entity_id: [], source: "Xbox 360" });
    expect(outcomes.map((o) => o.entityId)).toEqual(["media_player.main_tv_source", "media_player.kitchen"]);
    expect(transport.sent.map((i) => i.source)).toEqual([[4, 1], [4, 2]]);
  });

  it("reports unknown entities and unknown sources per entity", async () => {
    const { registry, transport } = setup();
    const outcomes = await registry.setZone({ entity_id: ["media_player.garage", "media_player.kitchen"], source: "VHS" });
    expect(outcomes.map((o) => (o.result.ok ? "ok" : o.result.error.kind))).toEqual(["UnknownEntity", "UnknownSource"]);
    expect(transport.sent).toHaveLength(0);
  });

  it("rejects data that does not match the action schema", async () => {
    const { registry } = setup();
    await expect(registry.setZone({})).rejects.toBeInstanceOf(InvalidActionDataError);
    await expect(registry.setZone({ source: "Apple TV", volume: 3 })).rejects.toThrow("set_zone");
    await expect(registry.setZone({ entity_id: 42, source: "Apple TV" })).rejects.toBeInstanceOf(InvalidActionDataError);
  });
});
