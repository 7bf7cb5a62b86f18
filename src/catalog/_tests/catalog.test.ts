import { describe, it, expect } from "vitest";
import { NameTable, buildCatalog } from "../catalog";
import { CatalogError } from "../../errors";

describe("catalog/NameTable", () => {
  it("looks names up both ways, exact and case-sensitive", () => {
    const t = NameTable.from("zone", [[3, "Patio"], [1, "Main TV Source"]]);
    expect(t.idOf("Main TV Source")).toBe(1);
    expect(t.idOf("main tv source")).toBeUndefined();
    expect(t.nameOf(3)).toBe("Patio");
    expect(t.has(2)).toBe(false);
    expect(t.names()).toEqual(["Main TV Source", "Patio"]);
    expect(t.size).toBe(2);
  });

  it("is frozen after construction", () => {
    const t = NameTable.from("source", [[4, "Xbox 360"]]);
    expect(Object.isFrozen(t)).toBe(true);
    expect(Object.isFrozen(t.list())).toBe(true);
  });

  const invalid: Array<[Array<[number, string]>, string]> = [
    [[[0, "A"]], "hors plage"],
    [[[9, "A"]], "hors plage"],
    [[[1.5, "A"]], "hors plage"],
    [[[1, "A"], [1, "B"]], "défini plusieurs fois"],
    [[[1, "  "]], "nom vide"],
    [[[1, "A"], [2, "A"]], "utilisé plusieurs fois"],
  ];

  it.each(invalid)("rejects invalid entries %j", (entries, message) => {
    expect(() => NameTable.from("zone", entries)).toThrow(CatalogError);
    expect(() => NameTable.from("zone", entries)).toThrow(message);
  });

  it("fromList maps index 0 to id 1 and keeps at most 8 names", () => {
    const names = Array.from({ length: 10 }, (_, i) => `N${i}`);
    const t = NameTable.fromList("source", names);
    expect(t.size).toBe(8);
    expect(t.idOf("N0")).toBe(1);
    expect(t.nameOf(8)).toBe("N7");
  });
});

describe("catalog/buildCatalog", () => {
  it("falls back to Output1..8 / Input1..8 when a table is absent", () => {
    const cat = buildCatalog({ zones: new Map([[1, "Main TV Source"]]) });
    expect(cat.zones.names()).toEqual(["Main TV Source"]);
    expect(cat.sources.size).toBe(8);
    expect(cat.sources.idOf("Input4")).toBe(4);
  });

  it("uses default names for both tables when nothing is configured", () => {
    const cat = buildCatalog({});
    expect(cat.zones.nameOf(8)).toBe("Output8");
    expect(cat.sources.nameOf(1)).toBe("Input1");
  });
});
