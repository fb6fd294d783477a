import { createHash } from "node:crypto";
import { readFileSync, writeFileSync } from "node:fs";
import { basename, dirname, resolve } from "node:path";
import { fingerprintGrid, type Diagnostic } from "@voxbrick/core";
import { BlockTable, buildUnknownBlockReport, readOverridesFromYaml } from "@voxbrick/block-registry";
import { convertGrid, describeWarning, type ConversionResult } from "@voxbrick/engine";
import { centerOffset, LdrawWriter } from "@voxbrick/ldraw";
import { loadSchematic, sniffSchematic, type SchematicLoadResult } from "@voxbrick/loaders-schematic";
import { renderErrorPng, renderPreviewPng } from "@voxbrick/renderer";
import { ensureDir, withExtension } from "./fs.js";
import type { ConversionReport, ConvertOutcome, ConvertTask, ParseModeUsed } from "./types.js";

const TOOL_VERSION = "0.1.0";

function sha256(input: Uint8Array): string {
  return createHash("sha256").update(input).digest("hex");
}

function shortPathHash(path: string): string {
  return createHash("sha1").update(path).digest("hex").slice(0, 12);
}

function writePreview(task: ConvertTask, png: Buffer): void {
  if (!task.previewPath) return;
  ensureDir(dirname(task.previewPath));
  writeFileSync(task.previewPath, png);
}

function unrecognized(): SchematicLoadResult {
  return {
    format: "schematic",
    variant: "unknown",
    valid: false,
    parseMode: "strict",
    metadata: {},
    warnings: [],
    errors: [
      {
        code: "FORMAT_UNKNOWN",
        severity: "error",
        message: "Not a schematic: no .schematic/.schem extension and no NBT header."
      }
    ],
    unknownBlocks: buildUnknownBlockReport([])
  };
}

/**
 * Converts one schematic file to an `.ldr` model. Decoding failures never
 * throw; they come back as an invalid outcome with the loader's errors.
 */
export function convertFile(task: ConvertTask): ConvertOutcome {
  const t0 = Date.now();
  const timing: ConversionReport["timingMs"] = { read: 0, parse: 0, convert: 0, write: 0, preview: 0, total: 0 };

  const bytes = readFileSync(task.path);
  const rawSha = sha256(bytes);
  timing.read = Date.now() - t0;

  const overrides = task.overridesPath ? readOverridesFromYaml(task.overridesPath) : undefined;
  const table = BlockTable.load(overrides);

  const parseStart = Date.now();
  const detection = sniffSchematic(bytes, task.path);
  const loaded = detection.match
    ? loadSchematic(bytes, { mode: task.mode, table, sourcePath: task.path })
    : unrecognized();
  timing.parse = Date.now() - parseStart;
  const parseMode: ParseModeUsed = loaded.valid ? loaded.parseMode : "none";

  let conversion: ConversionResult | null = null;
  let outPath: string | null = null;
  let partCount = 0;

  if (loaded.valid && loaded.grid) {
    const convertStart = Date.now();
    const config = { scaleMode: task.scaleMode, optimize: task.optimize };
    conversion = convertGrid(loaded.grid, table, config);
    timing.convert = Date.now() - convertStart;

    const writeStart = Date.now();
    const writer = new LdrawWriter({
      title: withExtension(basename(task.path), ""),
      name: basename(task.outPath),
      author: loaded.metadata.author,
      optimized: task.optimize,
      scaleMode: task.scaleMode,
      center: task.center ? centerOffset(conversion.primitives) : undefined
    });
    for (const p of conversion.primitives) writer.emit(p);
    ensureDir(dirname(task.outPath));
    writeFileSync(task.outPath, writer.toString(), "utf8");
    outPath = task.outPath;
    partCount = writer.partCount;
    timing.write = Date.now() - writeStart;

    const previewStart = Date.now();
    if (task.previewPath) {
      writePreview(task, renderPreviewPng(conversion.primitives, { width: task.previewSize, height: task.previewSize }));
    }
    timing.preview = Date.now() - previewStart;
  } else if (task.previewPath) {
    const previewStart = Date.now();
    const code = loaded.errors[0]?.code ?? "INVALID_SCHEMATIC";
    writePreview(task, renderErrorPng(code, { width: task.previewSize, height: task.previewSize }));
    timing.preview = Date.now() - previewStart;
  }

  const engineWarnings = conversion ? conversion.warnings.entries.map(describeWarning) : [];
  const warnings: Diagnostic[] = [...loaded.warnings, ...engineWarnings];
  timing.total = Date.now() - t0;

  let reportPath: string | null = null;
  if (task.reportsDir) {
    const grid = loaded.grid;
    const report: ConversionReport = {
      path: task.path,
      sha256: rawSha,
      detection: { confidence: detection.confidence, reasonCodes: detection.reasonCodes },
      gridSha256: grid ? fingerprintGrid(grid).sha256 : null,
      variant: loaded.variant,
      parseMode,
      valid: loaded.valid,
      scaleMode: task.scaleMode,
      optimized: task.optimize,
      stats: {
        size: grid ? { ...grid.size } : { dx: 0, dy: 0, dz: 0 },
        occupiedVoxels: conversion?.stats.occupiedVoxels ?? 0,
        primitivesBeforeMerge: conversion?.stats.primitivesBeforeMerge ?? 0,
        primitives: conversion?.stats.primitives ?? 0,
        mergedAway: conversion?.stats.mergedAway ?? 0,
        parts: partCount
      },
      warnings,
      errors: loaded.errors,
      unknownBlocks: loaded.unknownBlocks,
      timingMs: timing,
      toolVersions: { voxbrick: TOOL_VERSION, node: process.version }
    };
    ensureDir(task.reportsDir);
    reportPath = resolve(task.reportsDir, `${rawSha}-${shortPathHash(task.path)}.json`);
    writeFileSync(reportPath, JSON.stringify(report, null, 2), "utf8");
  }

  return {
    path: task.path,
    outPath,
    valid: loaded.valid,
    partCount,
    diagnostics: [...warnings, ...loaded.errors],
    reportPath
  };
}
