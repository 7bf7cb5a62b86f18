import { describe, it, expect } from "vitest";
import { buildRuntime, resolveCatalog, restartRequiredChanges } from "../bootstrap";
import { parseConfig } from "../../config";
import { DeviceUnreachableError } from "../../errors";
import { FakeMatrixTransport, deviceHandler, simulatedDevice } from "../../test-utils/fakeMatrix";

describe("app.resolveCatalog", () => {
  it("uses default names without contacting the matrix", async () => {
    const transport = new FakeMatrixTransport(deviceHandler(simulatedDevice()));
    const catalog = await resolveCatalog(parseConfig({}), transport);
    expect(catalog.zones.names()[0]).toBe("Output1");
    expect(catalog.sources.names()[7]).toBe("Input8");
    expect(transport.sent).toHaveLength(0);
  });

  it("reads missing tables from the matrix when names_from_device is set", async () => {
    const device = simulatedDevice({ inname: ["Xbox 360", "", "Apple TV", "Apple TV", "PC", "Cable", "DVD", "Chromecast"] });
    const transport = new FakeMatrixTransport(deviceHandler(device));
    const config = parseConfig({ names_from_device: true, zones: { "1": { name: "Main TV Source" } } });
    const catalog = await resolveCatalog(config, transport);
    expect(catalog.zones.names()).toEqual(["Main TV Source"]);
    expect(catalog.sources.names().slice(0, 4)).toEqual(["Xbox 360", "Input2", "Apple TV", "Apple TV_1"]);
    expect(transport.comheads()).toEqual(["get output status", "get input status"]);
  });

  it("falls back to default names when the matrix is unreachable", async () => {
    const transport = new FakeMatrixTransport(() => {
      throw new DeviceUnreachableError("10.0.0.9", "timeout");
    });
    const catalog = await resolveCatalog(parseConfig({ names_from_device: true }), transport);
    expect(catalog.zones.names()[1]).toBe("Output2");
    expect(catalog.sources.size).toBe(8);
  });
});

describe("app.buildRuntime", () => {
  it("wires router, poller and entities on the given transport", async () => {
    const transport = new FakeMatrixTransport(deviceHandler(simulatedDevice()));
    const config = parseConfig({
      zones: { "1": { name: "Kitchen" } },
      sources: { "2": { name: "Apple TV" } },
      polling: { interval_ms: 2000, max_backoff_ms: 8000 },
    });
    const { router, poller, entities } = await buildRuntime(config, { transport });
    expect(router.host).toBe("10.0.0.9");
    expect(poller.isRunning).toBe(false);
    expect(poller.nextDelayMs).toBe(2000);
    expect(entities.players.map((p) => p.entityId)).toEqual(["media_player.kitchen"]);
    const res = await router.route("Kitchen", "Apple TV");
    expect(res.ok).toBe(true);
  });
});

describe("app.restartRequiredChanges", () => {
  it("lists settings that need a restart", () => {
    const prev = parseConfig({ matrix: { host: "10.0.0.9" }, zones: { "1": { name: "Kitchen" } } });
    const next = parseConfig({
      matrix: { host: "10.0.0.10", wake_on_route: true },
      zones: { "1": { name: "Den" } },
      polling: { interval_ms: 5000 },
    });
    expect(restartRequiredChanges(prev, next)).toEqual(["matrix.host/port", "matrix", "zones"]);
  });

  it("ignores live settings", () => {
    const prev = parseConfig({});
    const next = parseConfig({ polling: { interval_ms: 5000 }, log_level: "debug" });
    expect(restartRequiredChanges(prev, next)).toEqual([]);
  });
});
