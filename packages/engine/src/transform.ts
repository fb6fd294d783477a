import type { Facing, Voxel } from "@voxbrick/core";
import type { ColorId } from "@voxbrick/block-registry";
import { shapeExtent, type Primitive, type Rotation, type ShapeKind, type Vec3 } from "./shapes.js";

export type ScaleMode = "standard" | "double";

export interface CellSize {
  studs: number;
  plates: number;
}

/**
 * Cell-local placement produced by the classifier. `offset` is measured from
 * the cell's minimum x/z corner and its top, in studs and plates.
 */
export interface Descriptor {
  shape: ShapeKind;
  offset: Vec3;
  rotation: Rotation;
  color: ColorId;
}

export interface Box {
  minX: number;
  maxX: number;
  /** Top of the box; y grows downward. */
  minY: number;
  maxY: number;
  minZ: number;
  maxZ: number;
}

const CELL_SIZES: Record<ScaleMode, CellSize> = {
  standard: { studs: 1, plates: 3 },
  double: { studs: 2, plates: 6 }
};

const FACING_ROTATION: Record<Facing, Rotation> = {
  north: 0,
  east: 90,
  south: 180,
  west: 270
};

export function cellSize(mode: ScaleMode): CellSize {
  return CELL_SIZES[mode];
}

export function rotationForFacing(facing: Facing): Rotation {
  return FACING_ROTATION[facing];
}

const FACINGS: readonly Facing[] = ["north", "east", "south", "west"];

export function facingForRotation(rotation: Rotation): Facing {
  return FACINGS.find((f) => FACING_ROTATION[f] === rotation) ?? "north";
}

/** Footprint in studs after rotation: 90 and 270 swap the x and z extents. */
export function footprint(shape: ShapeKind, rotation: Rotation): { x: number; z: number } {
  const e = shapeExtent(shape);
  return rotation === 90 || rotation === 270 ? { x: e.z, z: e.x } : { x: e.x, z: e.z };
}

export function primitiveBox(p: Primitive): Box {
  const fp = footprint(p.shape, p.rotation);
  return {
    minX: p.position.x,
    maxX: p.position.x + fp.x,
    minY: p.position.y,
    maxY: p.position.y + shapeExtent(p.shape).plates,
    minZ: p.position.z,
    maxZ: p.position.z + fp.z
  };
}

/** The output-space box a voxel's cell occupies. */
export function cellBox(voxel: Pick<Voxel, "x" | "y" | "z">, mode: ScaleMode): Box {
  const { studs, plates } = cellSize(mode);
  const top = 0 - voxel.y * plates;
  return {
    minX: voxel.x * studs,
    maxX: (voxel.x + 1) * studs,
    minY: top,
    maxY: top + plates,
    minZ: voxel.z * studs,
    maxZ: (voxel.z + 1) * studs
  };
}

export function placeDescriptor(
  voxel: Pick<Voxel, "x" | "y" | "z">,
  descriptor: Descriptor,
  mode: ScaleMode
): Primitive {
  const { studs, plates } = cellSize(mode);
  return Object.freeze({
    shape: descriptor.shape,
    position: Object.freeze({
      x: voxel.x * studs + descriptor.offset.x,
      y: descriptor.offset.y - voxel.y * plates,
      z: voxel.z * studs + descriptor.offset.z
    }),
    rotation: descriptor.rotation,
    color: descriptor.color
  });
}
