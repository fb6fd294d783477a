import type { Diagnostic } from "@voxbrick/core";
import type { UnknownBlockReport } from "@voxbrick/block-registry";
import type { ConversionStats, ScaleMode } from "@voxbrick/engine";
import type { SchematicParseMode, SchematicSniffResult, SchematicVariant } from "@voxbrick/loaders-schematic";

export type ParseModeUsed = "strict" | "salvage" | "none";

/** One file's worth of work; plain data so it can cross a worker boundary. */
export interface ConvertTask {
  path: string;
  outPath: string;
  scaleMode: ScaleMode;
  optimize: boolean;
  mode: SchematicParseMode;
  overridesPath?: string;
  previewPath?: string;
  previewSize: number;
  reportsDir?: string;
  center: boolean;
}

export interface ConvertOutcome {
  path: string;
  /** Null when the source could not be decoded. */
  outPath: string | null;
  valid: boolean;
  partCount: number;
  diagnostics: Diagnostic[];
  reportPath: string | null;
}

export interface ConversionReport {
  path: string;
  sha256: string;
  detection: Omit<SchematicSniffResult, "match">;
  gridSha256: string | null;
  variant: SchematicVariant;
  parseMode: ParseModeUsed;
  valid: boolean;
  scaleMode: ScaleMode;
  optimized: boolean;
  stats: ConversionStats & {
    size: { dx: number; dy: number; dz: number };
    parts: number;
  };
  warnings: Diagnostic[];
  errors: Diagnostic[];
  unknownBlocks: UnknownBlockReport;
  timingMs: {
    read: number;
    parse: number;
    convert: number;
    write: number;
    preview: number;
    total: number;
  };
  toolVersions: Record<string, string>;
}
