import type { ColorId } from "@voxbrick/block-registry";

export type Studs = 1 | 2;
export type BrickWidth = 1 | 2;
export type BrickDepth = 2 | 3 | 4 | 6 | 8;
export type Rotation = 0 | 90 | 180 | 270;

export type ShapeKind =
  | { kind: "cube"; studs: Studs }
  | { kind: "slope" }
  | { kind: "plate"; studs: Studs }
  | { kind: "wide-brick"; width: BrickWidth; depth: BrickDepth }
  | { kind: "step-lower" }
  | { kind: "step-upper" };

export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

/**
 * One placed brick. `position` is the box's minimum corner: smallest x and z
 * (studs) and the topmost y (plates, increasing downward).
 */
export interface Primitive {
  readonly shape: ShapeKind;
  readonly position: Readonly<Vec3>;
  readonly rotation: Rotation;
  readonly color: ColorId;
}

/** Brick height in plates. */
export const BRICK_PLATES = 3;

export const BRICK_DEPTHS: readonly BrickDepth[] = [8, 6, 4, 3, 2];

const CATALOGUED_WIDE = new Set(["1x2", "1x3", "1x4", "1x6", "1x8", "2x2", "2x3", "2x4", "2x6", "2x8"]);

export function isCataloguedBrick(width: number, depth: number): boolean {
  return CATALOGUED_WIDE.has(`${width}x${depth}`);
}

export function isBrickDepth(value: number): value is BrickDepth {
  return BRICK_DEPTHS.some((d) => d === value);
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant ${JSON.stringify(value)}`);
}

export interface ShapeExtent {
  /** Studs along x at rotation 0. */
  x: number;
  /** Studs along z at rotation 0. */
  z: number;
  plates: number;
}

export function shapeExtent(shape: ShapeKind): ShapeExtent {
  switch (shape.kind) {
    case "cube":
      return { x: shape.studs, z: shape.studs, plates: BRICK_PLATES };
    case "slope":
      return { x: 1, z: 1, plates: 2 };
    case "plate":
      return { x: shape.studs, z: shape.studs, plates: 1 };
    case "wide-brick":
      return { x: shape.depth, z: shape.width, plates: BRICK_PLATES };
    case "step-lower":
      return { x: 2, z: 2, plates: BRICK_PLATES };
    case "step-upper":
      return { x: 2, z: 1, plates: BRICK_PLATES };
    default:
      return assertNever(shape);
  }
}

export function shapeVolume(shape: ShapeKind): number {
  const e = shapeExtent(shape);
  return e.x * e.z * e.plates;
}

/** Stable sort/grouping key, e.g. `cube:1`, `wide-brick:2x4`. */
export function shapeKey(shape: ShapeKind): string {
  switch (shape.kind) {
    case "cube":
    case "plate":
      return `${shape.kind}:${shape.studs}`;
    case "wide-brick":
      return `${shape.kind}:${shape.width}x${shape.depth}`;
    case "slope":
    case "step-lower":
    case "step-upper":
      return shape.kind;
    default:
      return assertNever(shape);
  }
}
