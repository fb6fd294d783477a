import type { BlockProperties, BlockSpec } from "@voxbrick/core";
import {
  readLegacyTable,
  readNamedTable,
  type BlockCategory,
  type LegacyEntry,
  type LegacyTableData,
  type NamedTableData
} from "./data.js";
import { decodeLegacySlab, decodeLegacyStairs, normalizeBlockName } from "./state.js";

export type ColorId = number;

/** LDraw "Light Gray": the neutral colour for blocks the table does not know. */
export const UNKNOWN_COLOR: ColorId = 7;

export interface BlockLookup {
  category: BlockCategory;
  color: ColorId;
  known: boolean;
  /** Normalized name, or `legacy:<id>` for numeric ids the table lacks. */
  name: string;
}

export interface NamedOverride {
  color?: ColorId;
  category?: BlockCategory;
}

export interface BlockTableOverrides {
  blocks?: Record<string, NamedOverride>;
  legacy?: Record<string, LegacyEntry>;
}

export interface BlockTableData {
  named: NamedTableData;
  legacy: LegacyTableData;
}

function categoryFromName(name: string): BlockCategory {
  if (name.endsWith("stairs")) return "stairs";
  if (name.endsWith("_slab")) return "slab";
  if (name.endsWith("carpet")) return "carpet";
  return "cube";
}

/**
 * Static block-id -> (category, colour) table. Built once, never mutated;
 * callers share one instance by reference.
 */
export class BlockTable {
  private readonly colors: ReadonlyMap<string, ColorId>;
  private readonly categories: ReadonlyMap<string, BlockCategory>;
  private readonly decorative: ReadonlySet<string>;
  private readonly air: ReadonlySet<string>;
  private readonly legacy: ReadonlyMap<number, LegacyEntry>;
  private readonly dyes: readonly ColorId[];
  private readonly glassDyes: readonly ColorId[];

  public constructor(data: BlockTableData, overrides: BlockTableOverrides = {}) {
    const colors = new Map(Object.entries(data.named.blocks));
    const categories = new Map(Object.entries(data.named.categories));
    for (const [rawName, override] of Object.entries(overrides.blocks ?? {})) {
      const name = normalizeBlockName(rawName);
      if (override.color !== undefined) colors.set(name, override.color);
      if (override.category !== undefined) categories.set(name, override.category);
    }

    const legacy = new Map<number, LegacyEntry>();
    for (const [id, entry] of Object.entries({ ...data.legacy.blocks, ...(overrides.legacy ?? {}) })) {
      legacy.set(Number(id), entry);
    }

    this.colors = colors;
    this.categories = categories;
    this.decorative = new Set(data.named.decorative);
    this.air = new Set(data.named.air);
    this.legacy = legacy;
    this.dyes = Object.freeze([...data.legacy.dyes]);
    this.glassDyes = Object.freeze([...data.legacy.glassDyes]);
    Object.freeze(this);
  }

  /** Table backed by the JSON shipped with this package. */
  public static load(overrides?: BlockTableOverrides): BlockTable {
    return new BlockTable({ named: readNamedTable(), legacy: readLegacyTable() }, overrides);
  }

  public lookup(id: string | number, properties: BlockProperties = {}): BlockLookup {
    if (typeof id === "number") {
      return this.lookupLegacy(id, properties);
    }

    const name = normalizeBlockName(id);
    if (name === "" || this.air.has(name)) {
      return { category: "air", color: UNKNOWN_COLOR, known: true, name: name || "air" };
    }

    const explicit = this.categories.get(name);
    const color = this.colors.get(name);
    if (this.decorative.has(name)) {
      return { category: explicit ?? "decorative", color: color ?? UNKNOWN_COLOR, known: true, name };
    }
    if (color === undefined && explicit === undefined) {
      return { category: "cube", color: UNKNOWN_COLOR, known: false, name };
    }
    return {
      category: explicit ?? categoryFromName(name),
      color: color ?? UNKNOWN_COLOR,
      known: true,
      name
    };
  }

  private lookupLegacy(id: number, properties: BlockProperties): BlockLookup {
    if (id === 0) {
      return { category: "air", color: UNKNOWN_COLOR, known: true, name: "air" };
    }
    const entry = this.legacy.get(id);
    if (!entry) {
      return { category: "cube", color: UNKNOWN_COLOR, known: false, name: `legacy:${id}` };
    }
    let color = entry.color;
    if (entry.dyed && properties.data !== undefined) {
      const dyes = entry.dyed === "glass" ? this.glassDyes : this.dyes;
      color = dyes[properties.data & 0x0f] ?? color;
    }
    return { category: entry.category ?? "cube", color, known: true, name: entry.name };
  }

  /** Builds the spec for an MCEdit (id, data) pair, decoding stair and slab bits. */
  public decodeLegacyState(id: number, data: number): BlockSpec {
    const category = this.legacy.get(id)?.category;
    if (category === "stairs") return { id, properties: decodeLegacyStairs(data) };
    if (category === "slab") return { id, properties: decodeLegacySlab(data) };
    return { id, properties: data !== 0 ? { data } : {} };
  }
}
