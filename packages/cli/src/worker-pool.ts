import { fileURLToPath } from "node:url";
import { Worker } from "node:worker_threads";
import type { ConvertOutcome, ConvertTask } from "./types.js";

interface PendingTask {
  task: ConvertTask;
  resolve: (value: ConvertOutcome) => void;
  reject: (error: unknown) => void;
}

interface WorkerState {
  worker: Worker;
  busy: boolean;
  current?: PendingTask;
}

export type WorkerMessage = { ok: true; outcome: ConvertOutcome } | { ok: false; error: string };

/** Fixed set of worker threads, each converting one file at a time. */
export class ConvertWorkerPool {
  private readonly workers: WorkerState[] = [];
  private readonly queue: PendingTask[] = [];

  public constructor(size: number) {
    const n = Math.max(1, size);
    const herePath = fileURLToPath(import.meta.url);
    const tsRuntime = herePath.endsWith(".ts");
    const workerModule = tsRuntime ? "./workers/convert-worker.ts" : "./workers/convert-worker.js";
    const workerUrl = new URL(workerModule, import.meta.url);

    for (let i = 0; i < n; i++) {
      const execArgv = tsRuntime ? [...process.execArgv, "--import", "tsx"] : process.execArgv;
      const worker = new Worker(workerUrl, { execArgv });
      const state: WorkerState = { worker, busy: false };

      worker.on("message", (message: WorkerMessage) => {
        const current = state.current;
        state.current = undefined;
        state.busy = false;
        if (!current) return;
        if (message.ok) {
          current.resolve(message.outcome);
        } else {
          current.reject(new Error(message.error));
        }
        this.pump();
      });

      // An uncaught error ends the thread; the slot stays busy until `exit` removes it.
      worker.on("error", (err) => {
        const current = state.current;
        state.current = undefined;
        if (current) {
          current.reject(err);
        }
      });

      // A dead thread never answers; drop it so nothing else is posted to it.
      worker.on("exit", (code) => {
        const current = state.current;
        state.current = undefined;
        const index = this.workers.indexOf(state);
        if (index >= 0) this.workers.splice(index, 1);
        if (current) {
          current.reject(new Error(`Worker exited with code ${code}`));
        }
        this.pump();
      });

      this.workers.push(state);
    }
  }

  /** Live worker threads. */
  public get size(): number {
    return this.workers.length;
  }

  public run(task: ConvertTask): Promise<ConvertOutcome> {
    return new Promise<ConvertOutcome>((resolve, reject) => {
      this.queue.push({ task, resolve, reject });
      this.pump();
    });
  }

  private pump(): void {
    if (this.workers.length === 0) {
      for (const pending of this.queue.splice(0)) {
        pending.reject(new Error("Worker pool has no live workers"));
      }
      return;
    }
    for (const state of this.workers) {
      if (state.busy) continue;
      const next = this.queue.shift();
      if (!next) return;
      state.current = next;
      state.busy = true;
      state.worker.postMessage(next.task);
    }
  }

  public async close(): Promise<void> {
    await Promise.all(this.workers.map((w) => w.worker.terminate()));
  }
}
