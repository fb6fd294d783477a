import type {
  BlockProperties,
  BlockSpec,
  Bounds,
  DuplicateResolutionResult,
  GridMetadata,
  GridSize,
  Voxel,
  VoxelGrid
} from "./types.js";
import { assertIntegerCoords, computeBounds, isInside, voxelCoordKey } from "./bounds.js";

export type DuplicateStrategy = "last-write-wins" | "first-write-wins";

const PROPERTY_ORDER: Array<keyof BlockProperties> = ["facing", "half", "type", "data"];

/** Stable text form of a block, e.g. `oak_stairs[facing=east,half=top]` or `35[data=14]`. */
export function blockSpecKey(block: BlockSpec): string {
  const parts: string[] = [];
  for (const name of PROPERTY_ORDER) {
    const value = block.properties[name];
    if (value !== undefined) parts.push(`${name}=${value}`);
  }
  const id = String(block.id);
  return parts.length > 0 ? `${id}[${parts.join(",")}]` : id;
}

export function resolveDuplicates(
  voxels: Voxel[],
  strategy: DuplicateStrategy = "last-write-wins"
): DuplicateResolutionResult {
  if (voxels.length === 0) {
    return { voxels: [], duplicateCount: 0 };
  }

  const seen = new Map<string, Voxel>();
  let duplicateCount = 0;

  for (const voxel of voxels) {
    const key = voxelCoordKey(voxel.x, voxel.y, voxel.z);
    if (seen.has(key)) {
      duplicateCount++;
      if (strategy === "first-write-wins") continue;
    }
    seen.set(key, voxel);
  }

  return { voxels: [...seen.values()], duplicateCount };
}

export function gridVoxelCompare(a: Voxel, b: Voxel): number {
  // y-major (layer by layer), then z, then x
  if (a.y !== b.y) return a.y - b.y;
  if (a.z !== b.z) return a.z - b.z;
  return a.x - b.x;
}

export function sortGridVoxels(voxels: Voxel[]): Voxel[] {
  return [...voxels].sort(gridVoxelCompare);
}

export function normalizeVoxels(voxels: Voxel[]): { normalized: Voxel[]; offset: { x: number; y: number; z: number } } {
  const originalBounds = computeBounds(voxels);
  const offset = {
    x: originalBounds.minX,
    y: originalBounds.minY,
    z: originalBounds.minZ
  };

  const normalized = voxels.map((v) => ({
    x: v.x - offset.x,
    y: v.y - offset.y,
    z: v.z - offset.z,
    block: v.block
  }));

  return { normalized, offset };
}

/**
 * Immutable voxel grid backed by a coordinate map. Cells outside the declared
 * size are a caller bug, so `at` throws instead of answering "empty".
 */
export class SparseVoxelGrid implements VoxelGrid {
  public readonly size: GridSize;
  private readonly cells: Map<string, BlockSpec>;
  private readonly ordered: readonly Voxel[];

  public constructor(size: GridSize, voxels: Voxel[]) {
    if (size.dx < 0 || size.dy < 0 || size.dz < 0) {
      throw new RangeError(`Invalid grid size ${size.dx}x${size.dy}x${size.dz}`);
    }
    this.size = Object.freeze({ dx: size.dx, dy: size.dy, dz: size.dz });
    this.cells = new Map();
    for (const v of voxels) {
      if (!isInside(this.size, v.x, v.y, v.z)) {
        throw new RangeError(`Voxel (${v.x},${v.y},${v.z}) lies outside grid ${size.dx}x${size.dy}x${size.dz}`);
      }
      this.cells.set(voxelCoordKey(v.x, v.y, v.z), v.block);
    }
    this.ordered = Object.freeze(
      sortGridVoxels(
        [...this.cells.entries()].map(([key, block]) => {
          const [x = 0, y = 0, z = 0] = key.split(",").map(Number);
          return { x, y, z, block };
        })
      )
    );
  }

  public at(x: number, y: number, z: number): BlockSpec | undefined {
    if (!isInside(this.size, x, y, z)) {
      throw new RangeError(`Voxel access (${x},${y},${z}) outside grid ${this.size.dx}x${this.size.dy}x${this.size.dz}`);
    }
    return this.cells.get(voxelCoordKey(x, y, z));
  }

  public occupied(): Iterable<Voxel> {
    return this.ordered;
  }

  public get count(): number {
    return this.ordered.length;
  }
}

export interface GridBuildResult {
  grid: SparseVoxelGrid;
  boundsOriginal: Bounds;
  duplicateCount: number;
  metadata: GridMetadata;
}

/** Dedupe, shift the minimum corner to the origin and freeze into a grid. */
export function buildVoxelGrid(
  voxelsInput: Voxel[],
  metadata: GridMetadata = {},
  duplicateStrategy: DuplicateStrategy = "last-write-wins"
): GridBuildResult {
  assertIntegerCoords(voxelsInput);
  const deduped = resolveDuplicates(voxelsInput, duplicateStrategy);
  const boundsOriginal = computeBounds(deduped.voxels);
  const { normalized, offset } = normalizeVoxels(deduped.voxels);
  const grid = new SparseVoxelGrid(
    { dx: boundsOriginal.dx, dy: boundsOriginal.dy, dz: boundsOriginal.dz },
    normalized
  );

  return {
    grid,
    boundsOriginal,
    duplicateCount: deduped.duplicateCount,
    metadata: {
      ...metadata,
      originalOffset: offset
    }
  };
}
