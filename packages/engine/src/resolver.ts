import type { Facing, Half } from "@voxbrick/core";
import type { ColorId } from "@voxbrick/block-registry";
import { assertNever, type ShapeKind } from "./shapes.js";
import { rotationForFacing, type Descriptor, type ScaleMode } from "./transform.js";

export type GeometryRequest =
  | { category: "cube" }
  | { category: "stairs"; facing: Facing; half: Half }
  | { category: "slab"; half: Half }
  | { category: "floor" };

// Where the 1x2 upper step sits inside a 2x2 cell.
const STEP_EDGE: Record<Facing, { x: number; z: number }> = {
  north: { x: 0, z: 0 },
  south: { x: 0, z: 1 },
  east: { x: 1, z: 0 },
  west: { x: 0, z: 0 }
};

// Double cells stack two brick layers: upper at y=0, lower at y=3.
const UPPER = 0;
const LOWER = 3;

function piece(shape: ShapeKind, color: ColorId, y: number, x = 0, z = 0): Descriptor {
  return { shape, offset: { x, y, z }, rotation: 0, color };
}

function resolveStandard(request: GeometryRequest, color: ColorId): Descriptor[] {
  switch (request.category) {
    case "cube":
      return [piece({ kind: "cube", studs: 1 }, color, 0)];
    case "stairs":
      // Upside-down stairs get the same slope as upright ones.
      return [{ ...piece({ kind: "slope" }, color, 1), rotation: rotationForFacing(request.facing) }];
    case "slab":
      return [piece({ kind: "plate", studs: 1 }, color, request.half === "top" ? 0 : 2)];
    case "floor":
      return [piece({ kind: "plate", studs: 1 }, color, 2)];
    default:
      return assertNever(request);
  }
}

function resolveDouble(request: GeometryRequest, color: ColorId): Descriptor[] {
  const cube: ShapeKind = { kind: "cube", studs: 2 };
  switch (request.category) {
    case "cube":
      return [piece(cube, color, UPPER), piece(cube, color, LOWER)];
    case "stairs": {
      const edge = STEP_EDGE[request.facing];
      const fullY = request.half === "bottom" ? LOWER : UPPER;
      const stepY = request.half === "bottom" ? UPPER : LOWER;
      return [
        piece({ kind: "step-lower" }, color, fullY),
        {
          ...piece({ kind: "step-upper" }, color, stepY, edge.x, edge.z),
          rotation: rotationForFacing(request.facing)
        }
      ];
    }
    case "slab":
      return [piece(cube, color, request.half === "top" ? UPPER : LOWER)];
    case "floor":
      return [piece({ kind: "plate", studs: 2 }, color, 5)];
    default:
      return assertNever(request);
  }
}

/** Cell-local pieces for one block under the given scale. */
export function resolveGeometry(request: GeometryRequest, mode: ScaleMode, color: ColorId): Descriptor[] {
  return mode === "double" ? resolveDouble(request, color) : resolveStandard(request, color);
}
