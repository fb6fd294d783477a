import { describe, expect, it } from "vitest";
import { BlockTable } from "@voxbrick/block-registry";
import { SparseVoxelGrid } from "@voxbrick/core";
import { convertGrid, type Primitive, type ShapeKind } from "@voxbrick/engine";
import { centerOffset, LdrawWriter, ldrawLine, partNumber, rotationMatrix, writeLdraw } from "../src/index.js";

function prim(shape: ShapeKind, x: number, y: number, z: number, rotation: Primitive["rotation"] = 0, color = 71): Primitive {
  return { shape, position: { x, y, z }, rotation, color };
}

describe("partNumber", () => {
  it("maps every shape to its catalog part", () => {
    const shapes: Array<[ShapeKind, string]> = [
      [{ kind: "cube", studs: 1 }, "3005"],
      [{ kind: "cube", studs: 2 }, "3003"],
      [{ kind: "plate", studs: 1 }, "3024"],
      [{ kind: "plate", studs: 2 }, "3022"],
      [{ kind: "slope" }, "54200"],
      [{ kind: "step-lower" }, "3003"],
      [{ kind: "step-upper" }, "3004"],
      [{ kind: "wide-brick", width: 1, depth: 3 }, "3622"],
      [{ kind: "wide-brick", width: 1, depth: 8 }, "3008"],
      [{ kind: "wide-brick", width: 2, depth: 6 }, "2456"]
    ];
    for (const [shape, part] of shapes) {
      expect(partNumber(shape)).toBe(part);
    }
  });

  it("rotates about the vertical axis only", () => {
    expect(rotationMatrix(90)).toEqual([0, 0, -1, 0, 1, 0, 1, 0, 0]);
    expect(rotationMatrix(270)).toEqual([0, 0, 1, 0, 1, 0, -1, 0, 0]);
  });
});

describe("ldrawLine", () => {
  it("places a 1x1 brick by the centre of its top face", () => {
    expect(ldrawLine(prim({ kind: "cube", studs: 1 }, 0, 0, 0))).toBe("1 71 10 0 10 1 0 0 0 1 0 0 0 1 3005.dat");
  });

  it("uses the rotated footprint for long bricks", () => {
    expect(ldrawLine(prim({ kind: "wide-brick", width: 1, depth: 4 }, 0, 0, 0, 0, 15))).toBe(
      "1 15 40 0 10 1 0 0 0 1 0 0 0 1 3010.dat"
    );
    expect(ldrawLine(prim({ kind: "wide-brick", width: 1, depth: 3 }, 2, -3, 1, 90, 4))).toBe(
      "1 4 50 -24 50 0 0 -1 0 1 0 1 0 0 3622.dat"
    );
  });

  it("applies a centring offset", () => {
    expect(ldrawLine(prim({ kind: "plate", studs: 1 }, 0, 2, 0), { x: -2, z: 0 })).toBe(
      "1 71 -30 16 10 1 0 0 0 1 0 0 0 1 3024.dat"
    );
  });
});

describe("centerOffset", () => {
  it("centres the footprint in whole studs", () => {
    const row = [0, 1, 2, 3].map((x) => prim({ kind: "cube", studs: 1 }, x, 0, 0));
    expect(centerOffset(row)).toEqual({ x: -2, z: 0 });
    expect(centerOffset([])).toEqual({ x: 0, z: 0 });
  });
});

describe("LdrawWriter", () => {
  it("writes the header and one line per part", () => {
    const text = writeLdraw([prim({ kind: "cube", studs: 1 }, 0, 0, 0)], {
      title: "castle",
      name: "castle.ldr",
      author: "test-author",
      optimized: true,
      scaleMode: "double"
    });
    expect(text).toBe(
      [
        "0 castle",
        "0 Name: castle.ldr",
        "0 Author: test-author",
        "0 Optimized: Yes (merged bricks)",
        "0 Scale: 2x (each block = 2 studs)",
        "",
        "1 71 10 0 10 1 0 0 0 1 0 0 0 1 3005.dat",
        ""
      ].join("\n")
    );
  });

  it("acts as the conversion sink", () => {
    const grid = new SparseVoxelGrid({ dx: 2, dy: 1, dz: 1 }, [
      { x: 0, y: 0, z: 0, block: { id: "stone", properties: {} } },
      { x: 1, y: 0, z: 0, block: { id: "oak_stairs", properties: { facing: "east", half: "bottom" } } }
    ]);
    const writer = new LdrawWriter();
    convertGrid(grid, BlockTable.load(), { scaleMode: "standard", optimize: true }, writer);
    expect(writer.partCount).toBe(2);
    expect(writer.toString().split("\n").slice(-3)).toEqual([
      "1 70 30 8 10 0 0 -1 0 1 0 1 0 0 54200.dat",
      "1 71 10 0 10 1 0 0 0 1 0 0 0 1 3005.dat",
      ""
    ]);
  });
});
