import type { Bounds, GridSize, Voxel } from "./types.js";

export function assertIntegerCoords(voxels: Voxel[]): void {
  for (const v of voxels) {
    if (!Number.isInteger(v.x) || !Number.isInteger(v.y) || !Number.isInteger(v.z)) {
      throw new Error(`Non-integer voxel coordinate detected: ${JSON.stringify({ x: v.x, y: v.y, z: v.z })}`);
    }
  }
}

export function computeBounds(voxels: Voxel[]): Bounds {
  const first = voxels[0];
  if (!first) {
    return {
      minX: 0,
      minY: 0,
      minZ: 0,
      maxX: -1,
      maxY: -1,
      maxZ: -1,
      dx: 0,
      dy: 0,
      dz: 0
    };
  }

  let minX = first.x;
  let minY = first.y;
  let minZ = first.z;
  let maxX = first.x;
  let maxY = first.y;
  let maxZ = first.z;

  for (const v of voxels) {
    if (v.x < minX) minX = v.x;
    if (v.y < minY) minY = v.y;
    if (v.z < minZ) minZ = v.z;
    if (v.x > maxX) maxX = v.x;
    if (v.y > maxY) maxY = v.y;
    if (v.z > maxZ) maxZ = v.z;
  }

  return {
    minX,
    minY,
    minZ,
    maxX,
    maxY,
    maxZ,
    dx: maxX - minX + 1,
    dy: maxY - minY + 1,
    dz: maxZ - minZ + 1
  };
}

export function isInside(size: GridSize, x: number, y: number, z: number): boolean {
  return (
    Number.isInteger(x) &&
    Number.isInteger(y) &&
    Number.isInteger(z) &&
    x >= 0 &&
    y >= 0 &&
    z >= 0 &&
    x < size.dx &&
    y < size.dy &&
    z < size.dz
  );
}

export function voxelCoordKey(x: number, y: number, z: number): string {
  return `${x},${y},${z}`;
}
