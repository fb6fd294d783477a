import { createHash } from "node:crypto";
import { describe, expect, it } from "vitest";
import { PNG } from "pngjs";
import type { Primitive } from "@voxbrick/engine";
import { boxFaces, renderErrorPng, renderPreviewPng } from "../src/index.js";

const red: Primitive = { shape: { kind: "cube", studs: 1 }, position: { x: 0, y: 0, z: 0 }, rotation: 0, color: 4 };
const glass: Primitive = { shape: { kind: "cube", studs: 1 }, position: { x: 1, y: 0, z: 0 }, rotation: 0, color: 47 };

function pixel(png: Buffer, x: number, y: number): number[] {
  const image = PNG.sync.read(png);
  const idx = (y * image.width + x) * 4;
  return [...image.data.subarray(idx, idx + 4)];
}

describe("boxFaces", () => {
  it("emits six faces per primitive in a y-up world", () => {
    const faces = boxFaces([red]);
    expect(faces).toHaveLength(6);
    const top = faces.find((f) => f.axis === 1 && f.dir === 1);
    expect(top?.corners.map((c) => c.y)).toEqual([0, 0, 0, 0]);
    const bottom = faces.find((f) => f.axis === 1 && f.dir === -1);
    expect(bottom?.corners.map((c) => c.y)).toEqual([-1.2, -1.2, -1.2, -1.2]);
  });
});

describe("renderPreviewPng", () => {
  it("is deterministic for the same model", () => {
    const a = renderPreviewPng([red, glass]);
    const b = renderPreviewPng([red, glass]);
    expect(createHash("sha256").update(a).digest("hex")).toBe(createHash("sha256").update(b).digest("hex"));
  });

  it("writes a PNG of the requested size", () => {
    const png = renderPreviewPng([red], { width: 64, height: 48 });
    expect([...png.subarray(0, 8)]).toEqual([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
    const image = PNG.sync.read(png);
    expect([image.width, image.height]).toEqual([64, 48]);
  });

  it("draws the model over the background", () => {
    const png = renderPreviewPng([red], { width: 128, height: 128 });
    expect(pixel(png, 0, 0)).toEqual([238, 241, 246, 255]);
    expect(pixel(png, 64, 64)).not.toEqual([238, 241, 246, 255]);
  });

  it("renders an empty model as plain background", () => {
    const png = renderPreviewPng([], { width: 16, height: 16, background: { r: 1, g: 2, b: 3 } });
    expect(pixel(png, 8, 8)).toEqual([1, 2, 3, 255]);
  });
});

describe("renderErrorPng", () => {
  it("varies the stripe by error code", () => {
    const a = renderErrorPng("SCHEM_NBT_PARSE_FAILED", { width: 32, height: 32 });
    const b = renderErrorPng("SCHEM_LAYOUT_UNSUPPORTED", { width: 32, height: 32 });
    expect(pixel(a, 0, 0)).toEqual([120, 16, 24, 255]);
    expect(pixel(a, 0, 27)).not.toEqual(pixel(b, 0, 27));
  });
});
