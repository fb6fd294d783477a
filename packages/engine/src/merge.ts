import type { ColorId } from "@voxbrick/block-registry";
import {
  BRICK_DEPTHS,
  isBrickDepth,
  isCataloguedBrick,
  type BrickDepth,
  type BrickWidth,
  type Primitive,
  type Rotation,
  type Studs
} from "./shapes.js";

export interface MergeOptions {
  isTranslucent(color: ColorId): boolean;
}

interface CubeGroup {
  studs: Studs;
  /** Indices into the input list. */
  members: number[];
}

interface Merged {
  brick: Primitive;
  /** Arena slots absorbed into `brick`, anchor first. */
  slots: number[];
}

const MAX_RUN: Record<Studs, number> = { 1: 8, 2: 4 };

function coordKey(x: number, z: number): string {
  return `${x},${z}`;
}

function largestDepth(run: number): BrickDepth | undefined {
  return BRICK_DEPTHS.find((d) => d <= run);
}

function wideBrick(anchor: Primitive, width: BrickWidth, depth: BrickDepth, rotation: Rotation): Primitive {
  return Object.freeze<Primitive>({
    shape: { kind: "wide-brick", width, depth },
    position: anchor.position,
    rotation,
    color: anchor.color
  });
}

/**
 * Greedy rectangle packing over one (color, rotation, layer, studs) group.
 * The group lives in an arena sorted by (z, x); `consumed` marks cubes that
 * already belong to a larger brick.
 */
class GroupArena {
  private readonly cells: Primitive[];
  private readonly consumed: boolean[];
  private readonly slots = new Map<string, number>();

  public constructor(cells: Primitive[], private readonly studs: Studs) {
    this.cells = cells;
    this.consumed = cells.map(() => false);
    cells.forEach((cell, slot) => {
      const key = coordKey(cell.position.x, cell.position.z);
      if (!this.slots.has(key)) this.slots.set(key, slot);
    });
  }

  public get size(): number {
    return this.cells.length;
  }

  public isConsumed(slot: number): boolean {
    return this.consumed[slot] ?? true;
  }

  private free(x: number, z: number): number | undefined {
    const slot = this.slots.get(coordKey(x, z));
    return slot !== undefined && !this.isConsumed(slot) ? slot : undefined;
  }

  private run(anchor: number, stepX: number, stepZ: number): number[] {
    const origin = this.cells[anchor];
    const out = [anchor];
    if (!origin) return out;
    while (out.length < MAX_RUN[this.studs]) {
      const n = out.length;
      const slot = this.free(origin.position.x + n * stepX, origin.position.z + n * stepZ);
      if (slot === undefined) break;
      out.push(slot);
    }
    return out;
  }

  private rowBeside(slots: number[]): number[] | undefined {
    const row: number[] = [];
    for (const slot of slots) {
      const cell = this.cells[slot];
      const next = cell ? this.free(cell.position.x, cell.position.z + this.studs) : undefined;
      if (next === undefined) return undefined;
      row.push(next);
    }
    return row;
  }

  public take(anchor: number): Merged | undefined {
    const cell = this.cells[anchor];
    if (!cell || this.isConsumed(anchor)) return undefined;
    const merged = this.studs === 1 ? this.packSingle(cell, anchor) : this.packDouble(cell, anchor);
    if (merged) {
      for (const slot of merged.slots) this.consumed[slot] = true;
    } else {
      this.consumed[anchor] = true;
    }
    return merged;
  }

  private packSingle(cell: Primitive, anchor: number): Merged | undefined {
    const alongX = this.run(anchor, 1, 0);
    if (alongX.length >= 2) {
      const depth = largestDepth(alongX.length);
      if (depth === undefined) return undefined;
      const slots = alongX.slice(0, depth);
      const row = isCataloguedBrick(2, depth) ? this.rowBeside(slots) : undefined;
      if (row) {
        return { brick: wideBrick(cell, 2, depth, 0), slots: [...slots, ...row] };
      }
      return { brick: wideBrick(cell, 1, depth, 0), slots };
    }

    const alongZ = this.run(anchor, 0, 1);
    const depth = largestDepth(alongZ.length);
    if (depth === undefined) return undefined;
    return { brick: wideBrick(cell, 1, depth, 90), slots: alongZ.slice(0, depth) };
  }

  private packDouble(cell: Primitive, anchor: number): Merged | undefined {
    const alongX = this.run(anchor, 2, 0);
    const slots = alongX.length >= 2 ? alongX : this.run(anchor, 0, 2);
    const depth = slots.length * 2;
    if (slots.length < 2 || !isBrickDepth(depth)) return undefined;
    return { brick: wideBrick(cell, 2, depth, alongX.length >= 2 ? 0 : 90), slots };
  }
}

function groupCubes(primitives: readonly Primitive[], options: MergeOptions): Map<string, CubeGroup> {
  const groups = new Map<string, CubeGroup>();
  primitives.forEach((p, index) => {
    if (p.shape.kind !== "cube" || options.isTranslucent(p.color)) return;
    const key = `${p.color}|${p.rotation}|${p.position.y}|${p.shape.studs}`;
    const group = groups.get(key);
    if (group) {
      group.members.push(index);
    } else {
      groups.set(key, { studs: p.shape.studs, members: [index] });
    }
  });
  return groups;
}

/**
 * Replaces runs of identical opaque cubes with the largest catalogued bricks.
 * Non-cube and translucent primitives pass through untouched, and a merged
 * brick takes the list position of its first cube, so the pass is stable
 * and running it twice changes nothing.
 */
export function optimizeBricks(primitives: readonly Primitive[], options: MergeOptions): Primitive[] {
  // index -> replacement; null means absorbed into another brick
  const replaced = new Map<number, Primitive | null>();

  for (const group of groupCubes(primitives, options).values()) {
    const order = [...group.members].sort((a, b) => {
      const pa = primitives[a]?.position;
      const pb = primitives[b]?.position;
      if (!pa || !pb) return a - b;
      return pa.z - pb.z || pa.x - pb.x || a - b;
    });
    const cells: Primitive[] = [];
    for (const index of order) {
      const p = primitives[index];
      if (p) cells.push(p);
    }

    const arena = new GroupArena(cells, group.studs);
    for (let slot = 0; slot < arena.size; slot++) {
      const merged = arena.take(slot);
      if (!merged) continue;
      const [anchorSlot, ...absorbed] = merged.slots;
      const anchorIndex = anchorSlot === undefined ? undefined : order[anchorSlot];
      if (anchorIndex !== undefined) replaced.set(anchorIndex, merged.brick);
      for (const s of absorbed) {
        const index = order[s];
        if (index !== undefined) replaced.set(index, null);
      }
    }
  }

  const out: Primitive[] = [];
  primitives.forEach((p, index) => {
    const r = replaced.get(index);
    if (r === undefined) out.push(p);
    else if (r !== null) out.push(r);
  });
  return out;
}
