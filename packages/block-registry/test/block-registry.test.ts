import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import {
  BlockTable,
  buildUnknownBlockReport,
  loadPalette,
  parseBlockState,
  parseOverrides,
  readOverridesFromYaml,
  UNKNOWN_COLOR
} from "../src/index.js";

const table = BlockTable.load();

describe("BlockTable.lookup", () => {
  it("resolves named blocks to a category and colour", () => {
    expect(table.lookup("minecraft:stone")).toEqual({ category: "cube", color: 71, known: true, name: "stone" });
    expect(table.lookup("oak_stairs").category).toBe("stairs");
    expect(table.lookup("oak_slab")).toMatchObject({ category: "slab", color: 70 });
    expect(table.lookup("white_carpet")).toMatchObject({ category: "carpet", color: 15 });
  });

  it("treats decorative blocks as known floor pieces", () => {
    expect(table.lookup("minecraft:torch")).toEqual({
      category: "decorative",
      color: UNKNOWN_COLOR,
      known: true,
      name: "torch"
    });
  });

  it("recognizes every air variant", () => {
    for (const name of ["air", "minecraft:cave_air", "void_air"]) {
      expect(table.lookup(name).category).toBe("air");
    }
    expect(table.lookup(0).category).toBe("air");
  });

  it("falls back to a gray cube for unknown identifiers", () => {
    expect(table.lookup("mymod:thing")).toEqual({ category: "cube", color: 7, known: false, name: "mymod:thing" });
    expect(table.lookup(999)).toEqual({ category: "cube", color: 7, known: false, name: "legacy:999" });
  });

  it("colours dyed legacy blocks from the data value", () => {
    expect(table.lookup(35, { data: 14 }).color).toBe(4);
    expect(table.lookup(35).color).toBe(15);
    expect(table.lookup(171, { data: 0 })).toMatchObject({ category: "carpet", color: 15 });
  });

  it("keeps legacy stained glass translucent for every dye", () => {
    const palette = loadPalette();
    expect(table.lookup(95, { data: 14 })).toEqual({ category: "cube", color: 36, known: true, name: "stained_glass" });
    expect(table.lookup(160, { data: 0 }).color).toBe(47);
    for (let data = 0; data < 16; data++) {
      expect(palette.isTranslucent(table.lookup(95, { data }).color)).toBe(true);
      expect(palette.isTranslucent(table.lookup(160, { data }).color)).toBe(true);
    }
  });

  it("treats legacy double slabs as cubes", () => {
    expect(table.lookup(43).category).toBe("cube");
    expect(table.lookup(44).category).toBe("slab");
  });
});

describe("legacy state decoding", () => {
  it("decodes stair facing and half bits", () => {
    expect(table.decodeLegacyState(53, 2)).toEqual({
      id: 53,
      properties: { facing: "south", half: "bottom", data: 2 }
    });
    expect(table.decodeLegacyState(53, 7).properties).toMatchObject({ facing: "north", half: "top" });
  });

  it("decodes the slab top bit", () => {
    expect(table.decodeLegacyState(44, 8).properties).toEqual({ type: "top", data: 8 });
    expect(table.decodeLegacyState(44, 0).properties).toEqual({ type: "bottom", data: 0 });
  });

  it("keeps plain blocks property-free", () => {
    expect(table.decodeLegacyState(1, 0)).toEqual({ id: 1, properties: {} });
    expect(table.decodeLegacyState(35, 5)).toEqual({ id: 35, properties: { data: 5 } });
  });
});

describe("parseBlockState", () => {
  it("keeps recognized properties and drops the rest", () => {
    expect(parseBlockState("minecraft:oak_stairs[facing=east,half=bottom,waterlogged=false]")).toEqual({
      id: "oak_stairs",
      properties: { facing: "east", half: "bottom" }
    });
  });

  it("drops invalid values", () => {
    expect(parseBlockState("stone[facing=up]")).toEqual({ id: "stone", properties: {} });
  });
});

describe("ColorPalette", () => {
  const palette = loadPalette();

  it("flags translucent codes", () => {
    expect(palette.isTranslucent(47)).toBe(true);
    expect(palette.isTranslucent(71)).toBe(false);
  });

  it("reads rgb and falls back to light gray", () => {
    expect(palette.colorRgb(4)).toEqual([180, 0, 0]);
    expect(palette.colorRgb(7)).toEqual([138, 146, 141]);
    expect(palette.colorRgb(9999)).toEqual([138, 146, 141]);
  });
});

describe("overrides", () => {
  it("loads overrides from yaml", () => {
    const dir = mkdtempSync(join(tmpdir(), "voxbrick-overrides-"));
    const file = join(dir, "overrides.yaml");
    writeFileSync(
      file,
      [
        "blocks:",
        "  mymod:marble: 15",
        "  oak_planks: { color: 19 }",
        "  mymod:marble_stairs: { color: 15, category: stairs }",
        "legacy:",
        '  "1": { name: stone, color: 72 }',
        ""
      ].join("\n")
    );

    const custom = BlockTable.load(readOverridesFromYaml(file));
    expect(custom.lookup("mymod:marble")).toEqual({ category: "cube", color: 15, known: true, name: "mymod:marble" });
    expect(custom.lookup("oak_planks").color).toBe(19);
    expect(custom.lookup("mymod:marble_stairs").category).toBe("stairs");
    expect(custom.lookup(1).color).toBe(72);
    expect(table.lookup(1).color).toBe(71);
  });

  it("normalizes override names", () => {
    const custom = BlockTable.load(parseOverrides({ blocks: { "Minecraft:Stone": 4 } }));
    expect(custom.lookup("stone").color).toBe(4);
  });

  it("rejects malformed override files", () => {
    expect(() => parseOverrides({ blocks: { stone: "red" } })).toThrow(/Invalid overrides/);
    expect(() => parseOverrides({ colours: {} })).toThrow(/Invalid overrides/);
    expect(parseOverrides(null)).toEqual({});
  });
});

describe("buildUnknownBlockReport", () => {
  it("counts and orders by occurrence", () => {
    expect(buildUnknownBlockReport(["mymod:b", "mymod:a", "mymod:b"])).toEqual({
      totalUnknown: 3,
      entries: [
        { source: "mymod:b", occurrences: 2 },
        { source: "mymod:a", occurrences: 1 }
      ]
    });
  });
});
