import { describe, it, expect } from "vitest";
import { commandKeys, interpolateContext, loadHelpSpec } from "../help";
import { suggestFromSpec } from "../helpSupport";
import { handlers } from "../commands";

describe("cli.help", () => {
  it("loads help.yaml and lists names with aliases", () => {
    const keys = commandKeys(loadHelpSpec());
    expect(keys).toContain("route");
    expect(keys).toContain("quit");
    expect(keys).toContain("--version");
  });

  it("documents every command handler", () => {
    const spec = loadHelpSpec();
    const documented = new Set(spec.categories.flatMap((c) => c.commands.map((cmd) => cmd.name)));
    expect(Object.keys(handlers).filter((h) => !documented.has(h))).toEqual([]);
  });

  it("suggests close commands", () => {
    const spec = loadHelpSpec();
    expect(suggestFromSpec(spec, "rout")).toEqual(["route"]);
    expect(suggestFromSpec(spec, "statsu")).toEqual(["status"]);
    expect(suggestFromSpec(spec, "ZONE")).toEqual(["zones"]);
    expect(suggestFromSpec(spec, "xyzzy")).toEqual([]);
  });

  it("interpolates the runtime context", () => {
    expect(interpolateContext("${matrix.host} ${matrix.power} ${log.level}", { host: "10.0.0.9", power: "ON" })).toBe(
      "10.0.0.9 ON info",
    );
  });
});
