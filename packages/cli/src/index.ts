export * from "./types.js";
export * from "./fs.js";
export * from "./options.js";
export * from "./convert.js";
export * from "./batch.js";
export { ConvertWorkerPool } from "./worker-pool.js";
