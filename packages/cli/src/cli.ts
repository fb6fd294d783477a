#!/usr/bin/env node
import type { Diagnostic } from "@voxbrick/core";
import { runBatch } from "./batch.js";
import { convertFile } from "./convert.js";
import { parseCliArgs, taskForFile } from "./options.js";

function printHelp(): void {
  console.log(`voxbrick: schematic to LDraw brick converter

Usage:
  npm run voxbrick -- convert <file> [options]
  npm run voxbrick -- batch <folder> [options]

Options:
  --out <path>             Output .ldr file (convert; default: beside the source)
  --out-dir <dir>          Output directory (batch; default: models)
  --scale <1|2>            1 stud per block, or 2 studs per block (default: 1)
  --optimize               Merge adjacent bricks into larger parts
  --mode <mode>            strict | salvage | strict+salvage (default: strict+salvage)
  --overrides <file>       YAML block table overrides
  --preview <path>         PNG preview file (convert) or directory (batch)
  --preview-size <n>       Preview dimension in px (default: 256)
  --report <dir>           Write a JSON conversion report per file
  --no-center              Keep schematic coordinates instead of centring the model
  --workers <n>            Worker count for batch (default: CPU-1)
`);
}

function log(line: string): void {
  console.log(`[voxbrick] ${line}`);
}

function printDiagnostics(diagnostics: readonly Diagnostic[]): void {
  for (const d of diagnostics) {
    const line = `[voxbrick] ${d.severity} ${d.code}: ${d.message}`;
    if (d.severity === "error") {
      console.error(line);
    } else {
      console.warn(line);
    }
  }
}

async function run(): Promise<void> {
  const cli = parseCliArgs(process.argv.slice(2));

  if (cli.command === "help") {
    printHelp();
    return;
  }

  if (cli.command === "convert") {
    const outcome = convertFile(taskForFile(cli.file, cli.options));
    printDiagnostics(outcome.diagnostics);
    if (!outcome.valid || !outcome.outPath) {
      throw new Error(`Could not convert ${cli.file}.`);
    }
    log(`wrote ${outcome.outPath} (${outcome.partCount} parts)`);
    if (outcome.reportPath) log(`report ${outcome.reportPath}`);
    return;
  }

  const { summary, outcomes } = await runBatch(cli.folder, cli.options, log);
  for (const outcome of outcomes) {
    if (outcome.diagnostics.length === 0) continue;
    log(outcome.path);
    printDiagnostics(outcome.diagnostics);
  }
  console.log(JSON.stringify(summary, null, 2));
}

run().catch((error: unknown) => {
  console.error(`[voxbrick] ${error instanceof Error ? error.message : String(error)}`);
  if (error instanceof Error && error.stack?.trim()) {
    console.error(error.stack);
  }
  process.exit(1);
});
