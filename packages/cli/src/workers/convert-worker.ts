import { parentPort } from "node:worker_threads";
import { convertFile } from "../convert.js";
import type { ConvertTask } from "../types.js";
import type { WorkerMessage } from "../worker-pool.js";

if (!parentPort) {
  throw new Error("convert-worker must run in worker context");
}

parentPort.on("message", (task: ConvertTask) => {
  let message: WorkerMessage;
  try {
    message = { ok: true, outcome: convertFile(task) };
  } catch (error) {
    message = { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
  parentPort?.postMessage(message);
});
