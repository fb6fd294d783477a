import { footprint, primitiveBox, type Primitive, type PrimitiveSink, type ScaleMode } from "@voxbrick/engine";
import { LDU_PER_PLATE, LDU_PER_STUD, partNumber, rotationMatrix } from "./parts.js";

export interface StudOffset {
  x: number;
  z: number;
}

export interface LdrawWriterOptions {
  title?: string;
  name?: string;
  author?: string;
  optimized?: boolean;
  scaleMode?: ScaleMode;
  /** Whole-stud shift applied to every part. */
  center?: StudOffset;
}

/** Type-1 line; the part origin is the centre of its top face. */
export function ldrawLine(p: Primitive, center: StudOffset = { x: 0, z: 0 }): string {
  const fp = footprint(p.shape, p.rotation);
  const x = (p.position.x + center.x + fp.x / 2) * LDU_PER_STUD;
  const z = (p.position.z + center.z + fp.z / 2) * LDU_PER_STUD;
  const y = p.position.y * LDU_PER_PLATE;
  const matrix = rotationMatrix(p.rotation).join(" ");
  return `1 ${p.color} ${x} ${y} ${z} ${matrix} ${partNumber(p.shape)}.dat`;
}

/** Offset that puts the middle of the model's footprint on the origin. */
export function centerOffset(primitives: readonly Primitive[]): StudOffset {
  if (primitives.length === 0) return { x: 0, z: 0 };
  let minX = Infinity;
  let maxX = -Infinity;
  let minZ = Infinity;
  let maxZ = -Infinity;
  for (const p of primitives) {
    const box = primitiveBox(p);
    minX = Math.min(minX, box.minX);
    maxX = Math.max(maxX, box.maxX);
    minZ = Math.min(minZ, box.minZ);
    maxZ = Math.max(maxZ, box.maxZ);
  }
  return { x: -Math.floor((minX + maxX) / 2) || 0, z: -Math.floor((minZ + maxZ) / 2) || 0 };
}

export class LdrawWriter implements PrimitiveSink {
  private readonly header: string[];
  private readonly body: string[] = [];
  private readonly center: StudOffset;

  public constructor(options: LdrawWriterOptions = {}) {
    const name = options.name ?? "model.ldr";
    this.header = [`0 ${options.title ?? "voxbrick model"}`, `0 Name: ${name}`, `0 Author: ${options.author ?? "voxbrick"}`];
    if (options.optimized) {
      this.header.push("0 Optimized: Yes (merged bricks)");
    }
    if (options.scaleMode === "double") {
      this.header.push("0 Scale: 2x (each block = 2 studs)");
    }
    this.center = options.center ?? { x: 0, z: 0 };
  }

  public emit(primitive: Primitive): void {
    this.body.push(ldrawLine(primitive, this.center));
  }

  public get partCount(): number {
    return this.body.length;
  }

  public toString(): string {
    return [...this.header, "", ...this.body, ""].join("\n");
  }
}

export function writeLdraw(primitives: readonly Primitive[], options: LdrawWriterOptions = {}): string {
  const writer = new LdrawWriter(options);
  for (const p of primitives) writer.emit(p);
  return writer.toString();
}
