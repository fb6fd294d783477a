import { shapeKey, type Primitive } from "./shapes.js";

export interface PrimitiveSink {
  emit(primitive: Primitive): void;
}

export interface CollectSink extends PrimitiveSink {
  readonly primitives: readonly Primitive[];
}

export function collectSink(): CollectSink {
  const primitives: Primitive[] = [];
  return {
    primitives,
    emit(primitive) {
      primitives.push(primitive);
    }
  };
}

/** Bottom layer first (largest y), then z, x, shape and colour. */
export function primitiveCompare(a: Primitive, b: Primitive): number {
  if (a.position.y !== b.position.y) return b.position.y - a.position.y;
  if (a.position.z !== b.position.z) return a.position.z - b.position.z;
  if (a.position.x !== b.position.x) return a.position.x - b.position.x;
  const ka = shapeKey(a.shape);
  const kb = shapeKey(b.shape);
  if (ka !== kb) return ka < kb ? -1 : 1;
  if (a.color !== b.color) return a.color - b.color;
  return a.rotation - b.rotation;
}

/** Orders primitives and emits each exactly once. */
export function assemble(primitives: readonly Primitive[], sink?: PrimitiveSink): Primitive[] {
  const ordered = [...primitives].sort(primitiveCompare);
  if (sink) {
    for (const p of ordered) sink.emit(p);
  }
  return ordered;
}
