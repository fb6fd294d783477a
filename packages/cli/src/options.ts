import { relative, resolve } from "node:path";
import minimist from "minimist";
import { z } from "zod";
import { parseWith } from "@voxbrick/block-registry";
import { withExtension } from "./fs.js";
import type { ConvertTask } from "./types.js";

const convertOptionsSchema = z.object({
  out: z.string().min(1).optional(),
  scale: z.enum(["1", "2"]).default("1"),
  optimize: z.boolean().default(false),
  mode: z.enum(["strict", "salvage", "strict+salvage"]).default("strict+salvage"),
  overrides: z.string().min(1).optional(),
  preview: z.string().min(1).optional(),
  "preview-size": z.coerce.number().int().min(16).max(4096).default(256),
  report: z.string().min(1).optional(),
  center: z.boolean().default(true),
  "out-dir": z.string().min(1).default("models"),
  workers: z.coerce.number().int().nonnegative().default(0)
});

export type ConvertOptions = z.infer<typeof convertOptionsSchema>;

export type CliCommand =
  | { command: "help" }
  | { command: "convert"; file: string; options: ConvertOptions }
  | { command: "batch"; folder: string; options: ConvertOptions };

export function parseCliArgs(args: string[]): CliCommand {
  const argv = minimist(args, {
    boolean: ["optimize", "center", "help"],
    string: ["out", "scale", "mode", "overrides", "preview", "report", "out-dir"],
    alias: { h: "help" },
    default: { center: true }
  });

  const command = argv._[0];
  if (command === undefined || command === "help" || argv.help === true) {
    return { command: "help" };
  }
  if (command !== "convert" && command !== "batch") {
    throw new Error(`Unknown command: ${String(command)}`);
  }

  const target = argv._[1];
  if (target === undefined) {
    throw new Error(command === "convert" ? "Missing file argument." : "Missing folder argument.");
  }
  const options = parseWith(convertOptionsSchema, argv, "options");
  return command === "convert"
    ? { command, file: resolve(String(target)), options }
    : { command, folder: resolve(String(target)), options };
}

function baseTask(path: string, outPath: string, options: ConvertOptions): ConvertTask {
  return {
    path,
    outPath,
    scaleMode: options.scale === "2" ? "double" : "standard",
    optimize: options.optimize,
    mode: options.mode,
    overridesPath: options.overrides ? resolve(options.overrides) : undefined,
    previewSize: options["preview-size"],
    reportsDir: options.report ? resolve(options.report) : undefined,
    center: options.center
  };
}

/** Single-file conversion: the model lands beside the source unless `--out` says otherwise. */
export function taskForFile(file: string, options: ConvertOptions): ConvertTask {
  const task = baseTask(file, resolve(options.out ?? withExtension(file, ".ldr")), options);
  if (options.preview) task.previewPath = resolve(options.preview);
  return task;
}

/** Batch conversion mirrors the folder layout under `--out-dir`; `--preview` names a directory. */
export function taskForBatchFile(folder: string, file: string, options: ConvertOptions): ConvertTask {
  const rel = relative(folder, file);
  const task = baseTask(file, resolve(options["out-dir"], withExtension(rel, ".ldr")), options);
  if (options.preview) task.previewPath = resolve(options.preview, withExtension(rel, ".png"));
  return task;
}
