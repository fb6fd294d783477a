import { PNG } from "pngjs";
import { Matrix4, PerspectiveCamera, Vector3 } from "three";
import { loadPalette, type ColorPalette } from "@voxbrick/block-registry";
import { primitiveBox, type Primitive } from "@voxbrick/engine";

export interface PreviewOptions {
  width?: number;
  height?: number;
  background?: { r: number; g: number; b: number; a?: number };
  yawDeg?: number;
  pitchDeg?: number;
  fovDeg?: number;
  palette?: ColorPalette;
}

interface Rgb {
  r: number;
  g: number;
  b: number;
}

type Quad = [Vector3, Vector3, Vector3, Vector3];

export interface BoxFace {
  axis: 0 | 1 | 2;
  dir: 1 | -1;
  corners: Quad;
  color: number;
}

interface Face2D {
  p: Quad;
  depth: number;
  color: Rgb;
  translucent: boolean;
}

const STUD_LDU = 20;
const PLATE_LDU = 8;
const TRANSLUCENT_ALPHA = 0.55;

function stableHash32(input: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    h ^= input.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

/** The six outward faces of every primitive's box, in a y-up world measured in studs. */
export function boxFaces(primitives: readonly Primitive[]): BoxFace[] {
  const faces: BoxFace[] = [];
  for (const p of primitives) {
    const box = primitiveBox(p);
    const x0 = box.minX;
    const x1 = box.maxX;
    // Plates grow downward; the world here is y-up and measured in studs.
    const y0 = 0 - (box.maxY * PLATE_LDU) / STUD_LDU;
    const y1 = 0 - (box.minY * PLATE_LDU) / STUD_LDU;
    const z0 = box.minZ;
    const z1 = box.maxZ;
    const v = (x: number, y: number, z: number) => new Vector3(x, y, z);
    faces.push(
      { axis: 0, dir: -1, color: p.color, corners: [v(x0, y0, z0), v(x0, y0, z1), v(x0, y1, z1), v(x0, y1, z0)] },
      { axis: 0, dir: 1, color: p.color, corners: [v(x1, y0, z0), v(x1, y1, z0), v(x1, y1, z1), v(x1, y0, z1)] },
      { axis: 1, dir: -1, color: p.color, corners: [v(x0, y0, z0), v(x1, y0, z0), v(x1, y0, z1), v(x0, y0, z1)] },
      { axis: 1, dir: 1, color: p.color, corners: [v(x0, y1, z0), v(x0, y1, z1), v(x1, y1, z1), v(x1, y1, z0)] },
      { axis: 2, dir: -1, color: p.color, corners: [v(x0, y0, z0), v(x0, y1, z0), v(x1, y1, z0), v(x1, y0, z0)] },
      { axis: 2, dir: 1, color: p.color, corners: [v(x0, y0, z1), v(x1, y0, z1), v(x1, y1, z1), v(x0, y1, z1)] }
    );
  }
  return faces;
}

function drawTriangle(
  pixels: Uint8Array,
  width: number,
  height: number,
  p0: Vector3,
  p1: Vector3,
  p2: Vector3,
  color: Rgb,
  alpha = 1
): void {
  const minX = Math.max(0, Math.floor(Math.min(p0.x, p1.x, p2.x)));
  const maxX = Math.min(width - 1, Math.ceil(Math.max(p0.x, p1.x, p2.x)));
  const minY = Math.max(0, Math.floor(Math.min(p0.y, p1.y, p2.y)));
  const maxY = Math.min(height - 1, Math.ceil(Math.max(p0.y, p1.y, p2.y)));

  const edge = (ax: number, ay: number, bx: number, by: number, cx: number, cy: number): number =>
    (cx - ax) * (by - ay) - (cy - ay) * (bx - ax);

  const area = edge(p0.x, p0.y, p1.x, p1.y, p2.x, p2.y);
  if (area === 0) return;

  for (let y = minY; y <= maxY; y++) {
    for (let x = minX; x <= maxX; x++) {
      const px = x + 0.5;
      const py = y + 0.5;
      const w0 = edge(p1.x, p1.y, p2.x, p2.y, px, py);
      const w1 = edge(p2.x, p2.y, p0.x, p0.y, px, py);
      const w2 = edge(p0.x, p0.y, p1.x, p1.y, px, py);
      const inside = area > 0 ? w0 >= 0 && w1 >= 0 && w2 >= 0 : w0 <= 0 && w1 <= 0 && w2 <= 0;
      if (!inside) continue;
      const idx = (y * width + x) * 4;
      // Blend over whatever is already there.
      pixels[idx] = Math.round(color.r * alpha + (pixels[idx] ?? 0) * (1 - alpha));
      pixels[idx + 1] = Math.round(color.g * alpha + (pixels[idx + 1] ?? 0) * (1 - alpha));
      pixels[idx + 2] = Math.round(color.b * alpha + (pixels[idx + 2] ?? 0) * (1 - alpha));
      pixels[idx + 3] = 255;
    }
  }
}

function toScreen(v: Vector3, width: number, height: number): Vector3 {
  return new Vector3((v.x * 0.5 + 0.5) * (width - 1), (1 - (v.y * 0.5 + 0.5)) * (height - 1), v.z);
}

function applyBrightness(color: Rgb, factor: number): Rgb {
  return {
    r: Math.max(0, Math.min(255, Math.round(color.r * factor))),
    g: Math.max(0, Math.min(255, Math.round(color.g * factor))),
    b: Math.max(0, Math.min(255, Math.round(color.b * factor)))
  };
}

function fill(width: number, height: number, color: Rgb, alpha = 255): Uint8Array {
  const pixels = new Uint8Array(width * height * 4);
  for (let i = 0; i < width * height; i++) {
    const idx = i * 4;
    pixels[idx] = color.r;
    pixels[idx + 1] = color.g;
    pixels[idx + 2] = color.b;
    pixels[idx + 3] = alpha;
  }
  return pixels;
}

function encodePng(pixels: Uint8Array, width: number, height: number): Buffer {
  const png = new PNG({ width, height });
  png.data = Buffer.from(pixels);
  return PNG.sync.write(png);
}

/**
 * Rasterizes the brick boxes with a painter's algorithm. Output depends only
 * on the primitives and options, so the same model always gives the same bytes.
 */
export function renderPreviewPng(primitives: readonly Primitive[], options: PreviewOptions = {}): Buffer {
  const width = options.width ?? 256;
  const height = options.height ?? 256;
  const bg = options.background ?? { r: 238, g: 241, b: 246, a: 255 };
  const palette = options.palette ?? loadPalette();
  const pixels = fill(width, height, bg, bg.a ?? 255);

  const boxFacesList = boxFaces(primitives);
  if (boxFacesList.length === 0) {
    return encodePng(pixels, width, height);
  }

  const min = new Vector3(Infinity, Infinity, Infinity);
  const max = new Vector3(-Infinity, -Infinity, -Infinity);
  for (const face of boxFacesList) {
    for (const corner of face.corners) {
      min.min(corner);
      max.max(corner);
    }
  }
  const center = min.clone().add(max).multiplyScalar(0.5);
  const size = max.clone().sub(min);
  const maxDim = Math.max(size.x, size.y, size.z);
  const yaw = ((options.yawDeg ?? 45) * Math.PI) / 180;
  const pitch = ((options.pitchDeg ?? 35.26438968) * Math.PI) / 180;
  const fov = options.fovDeg ?? 35;
  const radius = maxDim * 2.8 + 6;

  const camera = new PerspectiveCamera(fov, width / height, 0.1, 10000);
  const dir = new Vector3(Math.cos(pitch) * Math.cos(yaw), Math.sin(pitch), Math.cos(pitch) * Math.sin(yaw)).normalize();
  camera.position.copy(center.clone().addScaledVector(dir, radius));
  camera.up.set(0, 1, 0);
  camera.lookAt(center);
  camera.updateMatrixWorld(true);
  camera.updateProjectionMatrix();

  const worldToCamera = new Matrix4().copy(camera.matrixWorldInverse);
  const screen = (v: Vector3): Vector3 => toScreen(v.clone().project(camera), width, height);
  const faces: Face2D[] = [];
  for (const face of boxFacesList) {
    const [a, b, c, d] = face.corners;
    const depth = face.corners.reduce((sum, p) => sum + p.clone().applyMatrix4(worldToCamera).z, 0) / 4;
    const [r, g, bl] = palette.colorRgb(face.color);
    let light = 1;
    if (face.axis === 1) light = face.dir === 1 ? 1.12 : 0.7;
    if (face.axis === 0) light = 0.92;
    if (face.axis === 2) light = 0.82;
    faces.push({
      p: [screen(a), screen(b), screen(c), screen(d)],
      depth,
      color: applyBrightness({ r, g, b: bl }, light),
      translucent: palette.isTranslucent(face.color)
    });
  }

  // Farthest first; camera space looks down -z.
  faces.sort((a, b) => a.depth - b.depth);
  for (const face of faces) {
    const alpha = face.translucent ? TRANSLUCENT_ALPHA : 1;
    drawTriangle(pixels, width, height, face.p[0], face.p[1], face.p[2], face.color, alpha);
    drawTriangle(pixels, width, height, face.p[0], face.p[2], face.p[3], face.color, alpha);
  }

  return encodePng(pixels, width, height);
}

export function renderErrorPng(errorCode: string, options: Pick<PreviewOptions, "width" | "height"> = {}): Buffer {
  const width = options.width ?? 256;
  const height = options.height ?? 256;
  const pixels = fill(width, height, { r: 120, g: 16, b: 24 });

  const white = (x: number, y: number): void => {
    const idx = (y * width + x) * 4;
    pixels[idx] = 255;
    pixels[idx + 1] = 255;
    pixels[idx + 2] = 255;
    pixels[idx + 3] = 255;
  };
  const margin = Math.floor(width * 0.2);
  for (let i = margin; i < width - margin; i++) {
    const y1 = Math.floor(((i - margin) * (height - 2 * margin)) / (width - 2 * margin)) + margin;
    white(i, y1);
    white(i, height - y1 - 1);
  }

  // Stripe colour identifies the error code.
  const hash = stableHash32(errorCode);
  const stripeY = Math.floor(height * 0.86);
  for (let x = 0; x < width; x++) {
    const idx = (stripeY * width + x) * 4;
    pixels[idx] = (hash >>> 16) & 0xff;
    pixels[idx + 1] = (hash >>> 8) & 0xff;
    pixels[idx + 2] = hash & 0xff;
    pixels[idx + 3] = 255;
  }

  return encodePng(pixels, width, height);
}
