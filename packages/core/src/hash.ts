import { createHash } from "node:crypto";
import { Buffer } from "node:buffer";
import type { GridFingerprint, Voxel, VoxelGrid } from "./types.js";
import { blockSpecKey } from "./grid.js";

function encodeString(target: number[], value: string): void {
  const utf8 = Buffer.from(value, "utf8");
  writeU32LE(target, utf8.length);
  for (const byte of utf8) {
    target.push(byte);
  }
}

function writeU32LE(target: number[], value: number): void {
  target.push(value & 0xff, (value >>> 8) & 0xff, (value >>> 16) & 0xff, (value >>> 24) & 0xff);
}

function writeI32LE(target: number[], value: number): void {
  const u = value >>> 0;
  writeU32LE(target, u);
}

function encodeVoxel(target: number[], voxel: Voxel): void {
  writeI32LE(target, voxel.x);
  writeI32LE(target, voxel.y);
  writeI32LE(target, voxel.z);
  encodeString(target, blockSpecKey(voxel.block));
}

export function encodeGridBytes(grid: VoxelGrid): Uint8Array {
  const bytes: number[] = [];

  // Magic VB01
  bytes.push(0x56, 0x42, 0x30, 0x31);
  // Endianness marker (little-endian)
  bytes.push(0x01);

  writeU32LE(bytes, grid.size.dx);
  writeU32LE(bytes, grid.size.dy);
  writeU32LE(bytes, grid.size.dz);

  const voxels = [...grid.occupied()];
  writeU32LE(bytes, voxels.length);
  for (const voxel of voxels) {
    encodeVoxel(bytes, voxel);
  }

  return Uint8Array.from(bytes);
}

/** Content hash of a grid; independent of how the grid was assembled. */
export function fingerprintGrid(grid: VoxelGrid): GridFingerprint {
  const canonicalBytes = encodeGridBytes(grid);
  const sha256 = createHash("sha256").update(canonicalBytes).digest("hex");
  return { sha256, canonicalBytes };
}
