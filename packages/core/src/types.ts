export type Facing = "north" | "south" | "east" | "west";
export type Half = "top" | "bottom";
export type SlabType = "top" | "bottom" | "double";

/**
 * Block-state properties the converter understands. Anything else a source
 * format carries is dropped on the way in.
 */
export interface BlockProperties {
  facing?: Facing;
  half?: Half;
  type?: SlabType;
  /** Legacy data value (colour/variant index for dyed blocks). */
  data?: number;
}

export interface BlockSpec {
  /** Namespaced block name, or a legacy numeric id. */
  id: string | number;
  properties: BlockProperties;
}

export interface Voxel {
  x: number;
  y: number;
  z: number;
  block: BlockSpec;
}

export interface Bounds {
  minX: number;
  minY: number;
  minZ: number;
  maxX: number;
  maxY: number;
  maxZ: number;
  dx: number;
  dy: number;
  dz: number;
}

export interface GridSize {
  dx: number;
  dy: number;
  dz: number;
}

export interface VoxelGrid {
  readonly size: GridSize;
  /** Total over the declared size; throws RangeError outside it. */
  at(x: number, y: number, z: number): BlockSpec | undefined;
  /** Occupied cells in y, z, x order. */
  occupied(): Iterable<Voxel>;
}

export interface GridMetadata {
  originalOffset?: { x: number; y: number; z: number };
  sourcePath?: string;
  author?: string;
  description?: string;
  [key: string]: string | number | boolean | null | undefined | { x: number; y: number; z: number };
}

export interface GridFingerprint {
  sha256: string;
  canonicalBytes: Uint8Array;
}

export interface DuplicateResolutionResult {
  voxels: Voxel[];
  duplicateCount: number;
}

export interface Diagnostic {
  code: string;
  severity: "warning" | "error";
  message: string;
}
