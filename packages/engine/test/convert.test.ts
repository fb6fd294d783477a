import { describe, expect, it } from "vitest";
import fc from "fast-check";
import { BlockTable } from "@voxbrick/block-registry";
import { buildVoxelGrid, SparseVoxelGrid, type Voxel } from "@voxbrick/core";
import {
  assemble,
  cellSize,
  collectSink,
  convertGrid,
  primitiveBox,
  shapeVolume,
  type Primitive,
  type ScaleMode
} from "../src/index.js";

const table = BlockTable.load();

function voxel(x: number, y: number, z: number, id: string | number = "stone", properties: Voxel["block"]["properties"] = {}): Voxel {
  return { x, y, z, block: { id, properties } };
}

describe("convertGrid", () => {
  it("converts a single stone block at the origin", () => {
    const grid = new SparseVoxelGrid({ dx: 1, dy: 1, dz: 1 }, [voxel(0, 0, 0)]);
    const sink = collectSink();
    const result = convertGrid(grid, table, { scaleMode: "standard", optimize: false }, sink);
    expect(result.primitives).toEqual([
      { shape: { kind: "cube", studs: 1 }, position: { x: 0, y: 0, z: 0 }, rotation: 0, color: 71 }
    ]);
    expect(sink.primitives).toEqual(result.primitives);
    expect(result.warnings).toEqual({ total: 0, entries: [] });
  });

  it("merges a row of white wool into one 1x4 brick", () => {
    const grid = new SparseVoxelGrid(
      { dx: 4, dy: 1, dz: 1 },
      [0, 1, 2, 3].map((x) => voxel(x, 0, 0, "minecraft:white_wool"))
    );
    const result = convertGrid(grid, table, { scaleMode: "standard", optimize: true });
    expect(result.primitives).toEqual([
      { shape: { kind: "wide-brick", width: 1, depth: 4 }, position: { x: 0, y: 0, z: 0 }, rotation: 0, color: 15 }
    ]);
    expect(result.stats).toEqual({ occupiedVoxels: 4, primitivesBeforeMerge: 4, primitives: 1, mergedAway: 3 });
  });

  it("leaves adjacent legacy stained glass as single bricks", () => {
    const grid = new SparseVoxelGrid({ dx: 2, dy: 1, dz: 1 }, [voxel(0, 0, 0, 95, { data: 14 }), voxel(1, 0, 0, 95, { data: 14 })]);
    const result = convertGrid(grid, table, { scaleMode: "standard", optimize: true });
    expect(result.primitives).toEqual([
      { shape: { kind: "cube", studs: 1 }, position: { x: 0, y: 0, z: 0 }, rotation: 0, color: 36 },
      { shape: { kind: "cube", studs: 1 }, position: { x: 1, y: 0, z: 0 }, rotation: 0, color: 36 }
    ]);
  });

  it("emits double-mode stairs bottom layer first", () => {
    const grid = new SparseVoxelGrid({ dx: 1, dy: 1, dz: 1 }, [
      voxel(0, 0, 0, "oak_stairs", { facing: "north", half: "bottom" })
    ]);
    const result = convertGrid(grid, table, { scaleMode: "double", optimize: false });
    expect(result.primitives.map((p) => [p.shape.kind, p.position.y])).toEqual([
      ["step-lower", 3],
      ["step-upper", 0]
    ]);
  });

  it("merges each double-mode layer separately", () => {
    const grid = new SparseVoxelGrid({ dx: 3, dy: 1, dz: 1 }, [0, 1, 2].map((x) => voxel(x, 0, 0)));
    const result = convertGrid(grid, table, { scaleMode: "double", optimize: true });
    expect(result.primitives).toEqual([
      { shape: { kind: "wide-brick", width: 2, depth: 6 }, position: { x: 0, y: 3, z: 0 }, rotation: 0, color: 71 },
      { shape: { kind: "wide-brick", width: 2, depth: 6 }, position: { x: 0, y: 0, z: 0 }, rotation: 0, color: 71 }
    ]);
  });

  it("aggregates warnings by code and source", () => {
    const grid = new SparseVoxelGrid({ dx: 3, dy: 1, dz: 1 }, [
      voxel(0, 0, 0, "mymod:thing"),
      voxel(1, 0, 0, "mymod:thing"),
      voxel(2, 0, 0, "oak_stairs")
    ]);
    const result = convertGrid(grid, table, { scaleMode: "standard", optimize: false });
    expect(result.warnings).toEqual({
      total: 3,
      entries: [
        { code: "UNKNOWN_BLOCK", source: "mymod:thing", occurrences: 2 },
        { code: "MALFORMED_PROPERTIES", source: "oak_stairs", occurrences: 1 }
      ]
    });
    expect(result.primitives).toHaveLength(3);
  });

  it("skips air and handles an empty grid", () => {
    const airOnly = new SparseVoxelGrid({ dx: 2, dy: 1, dz: 1 }, [voxel(0, 0, 0, "air"), voxel(1, 0, 0, 0)]);
    expect(convertGrid(airOnly, table).stats).toEqual({
      occupiedVoxels: 0,
      primitivesBeforeMerge: 0,
      primitives: 0,
      mergedAway: 0
    });
    const empty = buildVoxelGrid([]).grid;
    expect(convertGrid(empty, table, { scaleMode: "double", optimize: true }).primitives).toEqual([]);
  });

  const cubeGrids = fc
    .uniqueArray(
      fc.record({
        x: fc.integer({ min: 0, max: 6 }),
        y: fc.integer({ min: 0, max: 3 }),
        z: fc.integer({ min: 0, max: 6 }),
        id: fc.constantFrom("stone", "white_wool", "red_wool", "glass")
      }),
      { selector: (c) => `${c.x},${c.y},${c.z}`, minLength: 1, maxLength: 80 }
    )
    .map((cells) => buildVoxelGrid(cells.map((c) => voxel(c.x, c.y, c.z, c.id))).grid);

  const volume = (list: Primitive[]) => list.reduce((sum, p) => sum + shapeVolume(p.shape), 0);

  it("property: cube grids conserve volume in every mode", () => {
    fc.assert(
      fc.property(cubeGrids, fc.constantFrom<ScaleMode>("standard", "double"), fc.boolean(), (grid, scaleMode, optimize) => {
        const { studs, plates } = cellSize(scaleMode);
        const result = convertGrid(grid, table, { scaleMode, optimize });
        expect(volume(result.primitives)).toBe(result.stats.occupiedVoxels * studs * studs * plates);
        expect(result.stats.primitives).toBeLessThanOrEqual(result.stats.primitivesBeforeMerge);
      })
    );
  });

  it("property: double mode splits every cube into two brick layers", () => {
    fc.assert(
      fc.property(cubeGrids, (grid) => {
        const result = convertGrid(grid, table, { scaleMode: "double", optimize: false });
        expect(result.primitives).toHaveLength(result.stats.occupiedVoxels * 2);
        for (const p of result.primitives) {
          const box = primitiveBox(p);
          expect(box.maxY - box.minY).toBe(3);
          expect(((box.minY % 6) + 6) % 6 === 0 || ((box.minY % 6) + 6) % 6 === 3).toBe(true);
        }
      })
    );
  });

  it("property: conversion is deterministic", () => {
    fc.assert(
      fc.property(cubeGrids, (grid) => {
        const config = { scaleMode: "standard" as const, optimize: true };
        expect(convertGrid(grid, table, config)).toEqual(convertGrid(grid, table, config));
      })
    );
  });
});

describe("assemble", () => {
  it("orders by layer then row then column and emits each once", () => {
    const top: Primitive = { shape: { kind: "cube", studs: 1 }, position: { x: 0, y: -3, z: 0 }, rotation: 0, color: 1 };
    const b: Primitive = { shape: { kind: "cube", studs: 1 }, position: { x: 1, y: 0, z: 0 }, rotation: 0, color: 1 };
    const a: Primitive = { shape: { kind: "cube", studs: 1 }, position: { x: 0, y: 0, z: 1 }, rotation: 0, color: 1 };
    const plate: Primitive = { shape: { kind: "plate", studs: 1 }, position: { x: 0, y: 2, z: 0 }, rotation: 0, color: 1 };
    const sink = collectSink();
    const ordered = assemble([top, a, b, plate], sink);
    expect(ordered).toEqual([plate, b, a, top]);
    expect(sink.primitives).toEqual(ordered);
  });
});
