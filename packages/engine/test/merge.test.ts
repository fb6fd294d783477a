import { describe, expect, it } from "vitest";
import fc from "fast-check";
import { loadPalette } from "@voxbrick/block-registry";
import {
  assemble,
  footprint,
  optimizeBricks,
  shapeExtent,
  shapeVolume,
  type Primitive,
  type Studs
} from "../src/index.js";

const palette = loadPalette();
const options = { isTranslucent: (c: number) => palette.isTranslucent(c) };

function cube(x: number, z: number, color = 15, y = 0, studs: Studs = 1): Primitive {
  return { shape: { kind: "cube", studs }, position: { x, y, z }, rotation: 0, color };
}

function areaByColor(list: Primitive[]): Map<number, number> {
  const out = new Map<number, number>();
  for (const p of list) {
    const fp = footprint(p.shape, p.rotation);
    out.set(p.color, (out.get(p.color) ?? 0) + fp.x * fp.z * shapeExtent(p.shape).plates);
  }
  return out;
}

describe("optimizeBricks", () => {
  it("merges a row of four into a 1x4 brick", () => {
    expect(optimizeBricks([cube(0, 0), cube(1, 0), cube(2, 0), cube(3, 0)], options)).toEqual([
      { shape: { kind: "wide-brick", width: 1, depth: 4 }, position: { x: 0, y: 0, z: 0 }, rotation: 0, color: 15 }
    ]);
  });

  it("takes the largest catalogued length and leaves the rest", () => {
    const row = [0, 1, 2, 3, 4].map((x) => cube(x, 0));
    expect(optimizeBricks(row, options)).toEqual([
      { shape: { kind: "wide-brick", width: 1, depth: 4 }, position: { x: 0, y: 0, z: 0 }, rotation: 0, color: 15 },
      cube(4, 0)
    ]);
  });

  it("widens into a second row when it is free", () => {
    const square = [cube(0, 0), cube(1, 0), cube(0, 1), cube(1, 1)];
    expect(optimizeBricks(square, options)).toEqual([
      { shape: { kind: "wide-brick", width: 2, depth: 2 }, position: { x: 0, y: 0, z: 0 }, rotation: 0, color: 15 }
    ]);
  });

  it("runs along z when x has no neighbour", () => {
    const column = [cube(0, 0), cube(0, 1), cube(0, 2)];
    expect(optimizeBricks(column, options)).toEqual([
      { shape: { kind: "wide-brick", width: 1, depth: 3 }, position: { x: 0, y: 0, z: 0 }, rotation: 90, color: 15 }
    ]);
  });

  it("keeps different colours and layers apart", () => {
    const mixed = [cube(0, 0, 15), cube(1, 0, 4), cube(0, 0, 15, -3)];
    expect(optimizeBricks(mixed, options)).toEqual(mixed);
  });

  it("never merges translucent cubes", () => {
    const glass = [cube(0, 0, 47), cube(1, 0, 47)];
    expect(optimizeBricks(glass, options)).toEqual(glass);
  });

  it("passes non-cube primitives through", () => {
    const slope: Primitive = { shape: { kind: "slope" }, position: { x: 1, y: 1, z: 0 }, rotation: 90, color: 15 };
    expect(optimizeBricks([cube(0, 0), slope], options)).toEqual([cube(0, 0), slope]);
  });

  it("merges 2x2 cubes into 2-wide bricks", () => {
    const row = [0, 2, 4].map((x) => cube(x, 0, 71, 3, 2));
    expect(optimizeBricks(row, options)).toEqual([
      { shape: { kind: "wide-brick", width: 2, depth: 6 }, position: { x: 0, y: 3, z: 0 }, rotation: 0, color: 71 }
    ]);
    const column = [0, 2].map((z) => cube(0, z, 71, 3, 2));
    expect(optimizeBricks(column, options)).toEqual([
      { shape: { kind: "wide-brick", width: 2, depth: 4 }, position: { x: 0, y: 3, z: 0 }, rotation: 90, color: 71 }
    ]);
  });

  const cubeSets = fc.uniqueArray(
    fc.record({
      x: fc.integer({ min: 0, max: 9 }),
      z: fc.integer({ min: 0, max: 9 }),
      layer: fc.integer({ min: 0, max: 2 }),
      color: fc.constantFrom(15, 4, 47)
    }),
    { selector: (c) => `${c.x},${c.z},${c.layer}`, maxLength: 150 }
  );

  it("property: idempotent", () => {
    fc.assert(
      fc.property(cubeSets, (cells) => {
        const once = optimizeBricks(
          cells.map((c) => cube(c.x, c.z, c.color, -3 * c.layer)),
          options
        );
        expect(optimizeBricks(once, options)).toEqual(once);
      })
    );
  });

  it("property: conserves volume and colour per colour", () => {
    fc.assert(
      fc.property(cubeSets, (cells) => {
        const input = cells.map((c) => cube(c.x, c.z, c.color, -3 * c.layer));
        const out = optimizeBricks(input, options);
        expect(out.length).toBeLessThanOrEqual(input.length);
        expect(areaByColor(out)).toEqual(areaByColor(input));
        const total = (list: Primitive[]) => list.reduce((s, p) => s + shapeVolume(p.shape), 0);
        expect(total(out)).toBe(total(input));
      })
    );
  });

  it("property: merged bricks cover exactly the input cells", () => {
    fc.assert(
      fc.property(cubeSets, (cells) => {
        const input = cells.map((c) => cube(c.x, c.z, c.color, -3 * c.layer));
        const covered = new Set<string>();
        for (const p of optimizeBricks(input, options)) {
          const fp = footprint(p.shape, p.rotation);
          for (let dx = 0; dx < fp.x; dx++) {
            for (let dz = 0; dz < fp.z; dz++) {
              const key = `${p.position.x + dx},${p.position.y},${p.position.z + dz},${p.color}`;
              expect(covered.has(key)).toBe(false);
              covered.add(key);
            }
          }
        }
        expect(covered).toEqual(new Set(input.map((p) => `${p.position.x},${p.position.y},${p.position.z},${p.color}`)));
      })
    );
  });

  it("property: result does not depend on input order", () => {
    const withShuffle = cubeSets.chain((cells) =>
      fc.tuple(fc.constant(cells), fc.shuffledSubarray(cells, { minLength: cells.length, maxLength: cells.length }))
    );
    fc.assert(
      fc.property(withShuffle, ([cells, shuffled]) => {
        const toCubes = (list: typeof cells) => list.map((c) => cube(c.x, c.z, c.color, -3 * c.layer));
        expect(assemble(optimizeBricks(toCubes(shuffled), options))).toEqual(
          assemble(optimizeBricks(toCubes(cells), options))
        );
      })
    );
  });
});
