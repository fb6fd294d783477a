import type { VoxelGrid } from "@voxbrick/core";
import { loadPalette, type BlockTable, type ColorPalette } from "@voxbrick/block-registry";
import { assemble, type PrimitiveSink } from "./assembler.js";
import { classifyVoxel } from "./classifier.js";
import { optimizeBricks } from "./merge.js";
import type { Primitive } from "./shapes.js";
import { placeDescriptor, type ScaleMode } from "./transform.js";
import { WarningCollector, type WarningSummary } from "./warnings.js";

export interface RunConfig {
  scaleMode: ScaleMode;
  optimize: boolean;
  /** Translucency source for the merge pass; the packaged palette when omitted. */
  palette?: ColorPalette;
}

export interface ConversionStats {
  occupiedVoxels: number;
  primitivesBeforeMerge: number;
  primitives: number;
  mergedAway: number;
}

export interface ConversionResult {
  primitives: Primitive[];
  warnings: WarningSummary;
  stats: ConversionStats;
}

export const DEFAULT_RUN_CONFIG: RunConfig = { scaleMode: "standard", optimize: false };

/**
 * Single synchronous pass: classify and place every occupied voxel, merge
 * when asked, then order the result. Never aborts on bad blocks; they show
 * up in `warnings`.
 */
export function convertGrid(
  grid: VoxelGrid,
  table: BlockTable,
  config: RunConfig = DEFAULT_RUN_CONFIG,
  sink?: PrimitiveSink
): ConversionResult {
  const warnings = new WarningCollector();
  const placed: Primitive[] = [];
  let occupiedVoxels = 0;

  for (const voxel of grid.occupied()) {
    const descriptors = classifyVoxel(voxel.block, table, config.scaleMode, warnings);
    if (descriptors.length === 0) continue;
    occupiedVoxels++;
    for (const d of descriptors) {
      placed.push(placeDescriptor(voxel, d, config.scaleMode));
    }
  }

  let merged = placed;
  if (config.optimize) {
    const palette = config.palette ?? loadPalette();
    merged = optimizeBricks(placed, { isTranslucent: (c) => palette.isTranslucent(c) });
  }
  const primitives = assemble(merged, sink);

  return {
    primitives,
    warnings: warnings.summary(),
    stats: {
      occupiedVoxels,
      primitivesBeforeMerge: placed.length,
      primitives: primitives.length,
      mergedAway: placed.length - primitives.length
    }
  };
}
