import { cpus } from "node:os";
import { resolve } from "node:path";
import { convertFile } from "./convert.js";
import { scanSchematics } from "./fs.js";
import { taskForBatchFile, type ConvertOptions } from "./options.js";
import type { ConvertOutcome, ConvertTask } from "./types.js";
import { ConvertWorkerPool } from "./worker-pool.js";

export interface BatchSummary {
  scanned: number;
  converted: number;
  invalid: number;
  parts: number;
  warnings: number;
}

export interface BatchResult {
  summary: BatchSummary;
  outcomes: ConvertOutcome[];
}

export type LogLine = (line: string) => void;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function openPool(workerCount: number, log: LogLine): ConvertWorkerPool | null {
  try {
    return new ConvertWorkerPool(workerCount);
  } catch (error) {
    log(`worker pool unavailable (${errorMessage(error)}); converting in-process`);
    return null;
  }
}

async function runPooled(tasks: ConvertTask[], workerCount: number, log: LogLine): Promise<ConvertOutcome[]> {
  const pool = openPool(workerCount, log);
  if (!pool) return tasks.map(convertFile);
  try {
    return await Promise.all(
      tasks.map(async (task) => {
        try {
          return await pool.run(task);
        } catch (error) {
          log(`worker failed on ${task.path} (${errorMessage(error)}); converting in-process`);
          return convertFile(task);
        }
      })
    );
  } finally {
    await pool.close();
  }
}

/**
 * Converts every schematic under `folder`. Files are independent, so they
 * spread over a worker pool when more than one worker is asked for.
 */
export async function runBatch(folder: string, options: ConvertOptions, log: LogLine = () => {}): Promise<BatchResult> {
  const root = resolve(folder);
  const files = scanSchematics(root);
  const tasks = files.map((f) => taskForBatchFile(root, f.path, options));

  const requested = options.workers > 0 ? options.workers : Math.max(1, cpus().length - 1);
  const workerCount = Math.min(requested, tasks.length);

  const outcomes = workerCount <= 1 ? tasks.map(convertFile) : await runPooled(tasks, workerCount, log);

  const summary: BatchSummary = {
    scanned: files.length,
    converted: outcomes.filter((o) => o.valid).length,
    invalid: outcomes.filter((o) => !o.valid).length,
    parts: outcomes.reduce((sum, o) => sum + o.partCount, 0),
    warnings: outcomes.reduce((sum, o) => sum + o.diagnostics.filter((d) => d.severity === "warning").length, 0)
  };
  return { summary, outcomes };
}
