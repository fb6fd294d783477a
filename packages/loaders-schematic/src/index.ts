import { SparseVoxelGrid, type BlockSpec, type Diagnostic, type GridSize, type Voxel } from "@voxbrick/core";
import { buildUnknownBlockReport, parseBlockState, type BlockTable, type UnknownBlockReport } from "@voxbrick/block-registry";
import {
  asByteArray,
  asCompound,
  asInt,
  asString,
  isGzip,
  lowerKeys,
  maybeGunzip,
  parseNbt,
  TAG_COMPOUND,
  type NbtCompound
} from "./nbt.js";

export * from "./nbt.js";

export interface SchematicSniffResult {
  match: boolean;
  confidence: "high" | "medium" | "low";
  reasonCodes: string[];
}

export type SchematicParseMode = "strict" | "salvage" | "strict+salvage";
export type SchematicVariant = "mcedit" | "sponge" | "unknown";

export interface SchematicLoadOptions {
  mode?: SchematicParseMode;
  table: BlockTable;
  sourcePath?: string;
}

export interface SchematicLoadResult {
  format: "schematic";
  variant: SchematicVariant;
  valid: boolean;
  parseMode: "strict" | "salvage";
  grid?: SparseVoxelGrid;
  metadata: Record<string, string>;
  warnings: Diagnostic[];
  errors: Diagnostic[];
  unknownBlocks: UnknownBlockReport;
}

interface DecodeContext {
  table: BlockTable;
  salvage: boolean;
  warnings: Diagnostic[];
  errors: Diagnostic[];
  unknownSources: string[];
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Reports a truncation as an error in strict mode and a warning in salvage mode. */
function truncated(ctx: DecodeContext, code: string, message: string): void {
  const severity = ctx.salvage ? "warning" : "error";
  (ctx.salvage ? ctx.warnings : ctx.errors).push({ code, severity, message });
}

function decodeVarints(bytes: Uint8Array, expectedCount: number, ctx: DecodeContext): number[] {
  const out: number[] = [];
  let i = 0;
  while (i < bytes.length && out.length < expectedCount) {
    let num = 0;
    let shift = 0;
    let steps = 0;
    while (true) {
      const b = bytes[i++];
      if (b === undefined) {
        truncated(ctx, "SCHEM_BLOCKDATA_TRUNCATED", "Truncated varint stream.");
        return out;
      }
      num |= (b & 0x7f) << shift;
      shift += 7;
      steps++;
      if ((b & 0x80) === 0) break;
      if (steps >= 5) {
        truncated(ctx, "SCHEM_BLOCKDATA_VARINT_INVALID", "Invalid varint encountered.");
        return out;
      }
    }
    out.push(num >>> 0);
  }
  return out;
}

function sniffByMagic(input: Uint8Array): boolean {
  if (isGzip(input)) return true;
  return input.length >= 3 && input[0] === TAG_COMPOUND && input[1] === 0x00;
}

export function sniffSchematic(input: Uint8Array, pathHint = ""): SchematicSniffResult {
  const ext = pathHint.toLowerCase();
  if (ext.endsWith(".schematic") || ext.endsWith(".schem")) {
    return { match: true, confidence: "high", reasonCodes: ["EXTENSION_MATCH"] };
  }
  if (sniffByMagic(input)) {
    return { match: true, confidence: "medium", reasonCodes: ["NBT_MAGIC_LIKE"] };
  }
  return { match: false, confidence: "low", reasonCodes: ["NO_NBT_HINT"] };
}

function coordsOf(i: number, size: GridSize): { x: number; y: number; z: number } {
  // Index order: y, then z, then x.
  return {
    x: i % size.dx,
    z: Math.floor(i / size.dx) % size.dz,
    y: Math.floor(i / (size.dx * size.dz))
  };
}

/** Appends a voxel unless the block is air; unknown ids are noted for the report. */
function place(ctx: DecodeContext, voxels: Voxel[], i: number, size: GridSize, block: BlockSpec): void {
  const info = ctx.table.lookup(block.id, block.properties);
  if (info.category === "air") return;
  if (!info.known) ctx.unknownSources.push(info.name);
  voxels.push({ ...coordsOf(i, size), block });
}

function decodeMcedit(
  root: NbtCompound,
  blocks: Uint8Array,
  data: Uint8Array,
  size: GridSize,
  ctx: DecodeContext
): Voxel[] {
  const expected = size.dx * size.dy * size.dz;
  const addBlocks = asByteArray(root.addblocks);
  const available = Math.min(expected, blocks.length, data.length);
  if (available < expected) {
    truncated(
      ctx,
      "SCHEM_BLOCK_ARRAY_TRUNCATED",
      `Blocks/Data arrays too short. blocks=${blocks.length} data=${data.length} expected=${expected}`
    );
    if (!ctx.salvage) return [];
  }

  const cache = new Map<number, BlockSpec>();
  const voxels: Voxel[] = [];
  for (let i = 0; i < available; i++) {
    const low = blocks[i] ?? 0;
    const addByte = addBlocks ? (addBlocks[Math.floor(i / 2)] ?? 0) : 0;
    const highNibble = i % 2 === 0 ? addByte & 0x0f : (addByte >> 4) & 0x0f;
    const legacyId = low + (highNibble << 8);
    if (legacyId === 0) continue;
    const d = (data[i] ?? 0) & 0x0f;
    const key = (legacyId << 4) | d;
    let block = cache.get(key);
    if (!block) {
      block = ctx.table.decodeLegacyState(legacyId, d);
      cache.set(key, block);
    }
    place(ctx, voxels, i, size, block);
  }
  return voxels;
}

function decodeSponge(palette: NbtCompound, blockData: Uint8Array, size: GridSize, ctx: DecodeContext): Voxel[] {
  const expected = size.dx * size.dy * size.dz;
  const paletteMap = new Map<number, BlockSpec>();
  for (const [state, paletteValue] of Object.entries(palette)) {
    const idx = asInt(paletteValue);
    if (idx === undefined) continue;
    paletteMap.set(idx, parseBlockState(state));
  }

  const decoded = decodeVarints(blockData, expected, ctx);
  if (decoded.length < expected) {
    if (ctx.errors.length === 0 && ctx.warnings.length === 0) {
      truncated(ctx, "SCHEM_BLOCKDATA_TRUNCATED", `Decoded only ${decoded.length}/${expected} palette indices.`);
    }
    if (!ctx.salvage) return [];
  }

  const voxels: Voxel[] = [];
  for (let i = 0; i < decoded.length; i++) {
    const paletteIdx = decoded[i] ?? 0;
    const block = paletteMap.get(paletteIdx) ?? { id: `unknown:palette_${paletteIdx}`, properties: {} };
    place(ctx, voxels, i, size, block);
  }
  return voxels;
}

function parseSchematic(bytes: Uint8Array, options: SchematicLoadOptions, salvage: boolean): SchematicLoadResult {
  const ctx: DecodeContext = { table: options.table, salvage, warnings: [], errors: [], unknownSources: [] };
  const metadata: Record<string, string> = {};
  const parseMode = salvage ? "salvage" : "strict";
  let variant: SchematicVariant = "unknown";

  const failed = (): SchematicLoadResult => ({
    format: "schematic",
    variant,
    valid: false,
    parseMode,
    metadata,
    warnings: ctx.warnings,
    errors: ctx.errors,
    unknownBlocks: buildUnknownBlockReport(ctx.unknownSources)
  });

  let outer: NbtCompound;
  try {
    outer = lowerKeys(parseNbt(maybeGunzip(bytes)).root);
  } catch (error) {
    ctx.errors.push({
      code: "SCHEM_NBT_PARSE_FAILED",
      severity: "error",
      message: `NBT parse failed: ${errorMessage(error)}`
    });
    return failed();
  }

  // Sponge v3 nests everything under a `Schematic` compound.
  const wrapped = asCompound(outer.schematic);
  const root = wrapped ? lowerKeys(wrapped) : outer;

  const width = asInt(root.width);
  const height = asInt(root.height);
  const length = asInt(root.length);
  if (!width || !height || !length || width <= 0 || height <= 0 || length <= 0) {
    ctx.errors.push({
      code: "SCHEM_DIMENSIONS_INVALID",
      severity: "error",
      message: "Missing or invalid Width/Height/Length."
    });
    return failed();
  }
  const size: GridSize = { dx: width, dy: height, dz: length };

  const author = asString(root.author) ?? asString(asCompound(root.metadata)?.Author);
  const name = asString(asCompound(root.metadata)?.Name);
  const description = asString(root.description);
  if (author) metadata.author = author;
  if (name) metadata.name = name;
  if (description) metadata.description = description;
  if (options.sourcePath) metadata.sourcePath = options.sourcePath;

  const blocks = asByteArray(root.blocks);
  const data = asByteArray(root.data);
  const v3Blocks = asCompound(root.blocks);
  const v3 = v3Blocks ? lowerKeys(v3Blocks) : undefined;
  const palette = asCompound(root.palette) ?? asCompound(v3?.palette);
  const blockData = asByteArray(root.blockdata) ?? asByteArray(v3?.data);

  let voxels: Voxel[];
  if (blocks && data) {
    variant = "mcedit";
    voxels = decodeMcedit(root, blocks, data, size, ctx);
  } else if (palette && blockData) {
    variant = "sponge";
    voxels = decodeSponge(palette, blockData, size, ctx);
  } else {
    ctx.errors.push({
      code: "SCHEM_LAYOUT_UNSUPPORTED",
      severity: "error",
      message: "Missing (Blocks+Data) and missing (Palette+BlockData)."
    });
    return failed();
  }

  if (!salvage && ctx.errors.length > 0) {
    return failed();
  }

  return {
    format: "schematic",
    variant,
    valid: true,
    parseMode,
    grid: new SparseVoxelGrid(size, voxels),
    metadata,
    warnings: ctx.warnings,
    errors: ctx.errors,
    unknownBlocks: buildUnknownBlockReport(ctx.unknownSources)
  };
}

/**
 * Decodes an MCEdit `.schematic` or Sponge `.schem` (v1-v3) into a grid
 * whose size is the declared Width x Height x Length. Air is omitted.
 */
export function loadSchematic(input: Uint8Array, options: SchematicLoadOptions): SchematicLoadResult {
  const mode = options.mode ?? "strict+salvage";
  if (mode === "strict") {
    return parseSchematic(input, options, false);
  }
  if (mode === "salvage") {
    return parseSchematic(input, options, true);
  }
  const strict = parseSchematic(input, options, false);
  if (strict.valid) return strict;
  const salvage = parseSchematic(input, options, true);
  if (strict.errors.length > 0) {
    salvage.warnings.unshift(
      ...strict.errors.map((e) => ({
        code: `STRICT_FALLBACK_${e.code}`,
        severity: "warning" as const,
        message: e.message
      }))
    );
  }
  return salvage;
}
