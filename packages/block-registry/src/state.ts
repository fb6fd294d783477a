import type { BlockProperties, BlockSpec, Facing, Half, SlabType } from "@voxbrick/core";

const FACINGS: readonly Facing[] = ["north", "south", "east", "west"];
const HALVES: readonly Half[] = ["top", "bottom"];
const SLAB_TYPES: readonly SlabType[] = ["top", "bottom", "double"];

function pick<T extends string>(allowed: readonly T[], value: string | undefined): T | undefined {
  if (value === undefined) return undefined;
  return allowed.find((candidate) => candidate === value);
}

/** `minecraft:Oak_Stairs[facing=east]` -> `oak_stairs`; other namespaces are kept. */
export function normalizeBlockName(raw: string): string {
  let name = raw.trim().toLowerCase();
  const bracket = name.indexOf("[");
  if (bracket >= 0) name = name.slice(0, bracket);
  if (name.startsWith("minecraft:")) name = name.slice("minecraft:".length);
  return name;
}

export function parseProperties(raw: Record<string, string>): BlockProperties {
  const out: BlockProperties = {};
  const facing = pick(FACINGS, raw.facing);
  const half = pick(HALVES, raw.half);
  const type = pick(SLAB_TYPES, raw.type);
  if (facing) out.facing = facing;
  if (half) out.half = half;
  if (type) out.type = type;
  if (raw.data !== undefined && /^\d+$/.test(raw.data)) out.data = Number(raw.data);
  return out;
}

/**
 * Parses a palette entry such as `minecraft:oak_stairs[facing=east,half=bottom]`.
 * Unknown keys and values outside the known vocabulary are dropped.
 */
export function parseBlockState(raw: string): BlockSpec {
  const trimmed = raw.trim();
  const open = trimmed.indexOf("[");
  const id = normalizeBlockName(trimmed);
  if (open < 0) {
    return { id, properties: {} };
  }

  const close = trimmed.lastIndexOf("]");
  const body = trimmed.slice(open + 1, close > open ? close : undefined);
  const pairs: Record<string, string> = {};
  for (const part of body.split(",")) {
    const eq = part.indexOf("=");
    if (eq <= 0) continue;
    const key = part.slice(0, eq).trim().toLowerCase();
    const value = part.slice(eq + 1).trim().toLowerCase();
    pairs[key] = value;
  }
  return { id, properties: parseProperties(pairs) };
}

// MCEdit stair data: low two bits pick the ascending side, bit 2 flips it upside down.
const LEGACY_STAIR_FACING: readonly Facing[] = ["east", "west", "south", "north"];

export function decodeLegacyStairs(data: number): BlockProperties {
  return {
    facing: LEGACY_STAIR_FACING[data & 0x3] ?? "north",
    half: (data & 0x4) !== 0 ? "top" : "bottom",
    data
  };
}

export function decodeLegacySlab(data: number): BlockProperties {
  return {
    type: (data & 0x8) !== 0 ? "top" : "bottom",
    data
  };
}
