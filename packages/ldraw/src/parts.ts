import { assertNever, type Rotation, type ShapeKind } from "@voxbrick/engine";

/** LDraw units per stud horizontally and per plate vertically. */
export const LDU_PER_STUD = 20;
export const LDU_PER_PLATE = 8;

const WIDE_BRICK_PARTS: Record<string, string> = {
  "1x2": "3004",
  "1x3": "3622",
  "1x4": "3010",
  "1x6": "3009",
  "1x8": "3008",
  "2x2": "3003",
  "2x3": "3002",
  "2x4": "3001",
  "2x6": "2456",
  "2x8": "3007"
};

export function partNumber(shape: ShapeKind): string {
  switch (shape.kind) {
    case "cube":
      return shape.studs === 1 ? "3005" : "3003";
    case "plate":
      return shape.studs === 1 ? "3024" : "3022";
    case "slope":
      return "54200";
    case "step-lower":
      return "3003";
    case "step-upper":
      return "3004";
    case "wide-brick": {
      const part = WIDE_BRICK_PARTS[`${shape.width}x${shape.depth}`];
      if (!part) throw new Error(`No part for ${shape.width}x${shape.depth} brick`);
      return part;
    }
    default:
      return assertNever(shape);
  }
}

const MATRICES: Record<Rotation, readonly number[]> = {
  0: [1, 0, 0, 0, 1, 0, 0, 0, 1],
  90: [0, 0, -1, 0, 1, 0, 1, 0, 0],
  180: [-1, 0, 0, 0, 1, 0, 0, 0, -1],
  270: [0, 0, 1, 0, 1, 0, -1, 0, 0]
};

/** Row-major 3x3 rotation about the vertical axis. */
export function rotationMatrix(rotation: Rotation): readonly number[] {
  return MATRICES[rotation];
}
