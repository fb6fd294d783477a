export * from "./shapes.js";
export * from "./transform.js";
export * from "./warnings.js";
export * from "./resolver.js";
export * from "./classifier.js";
export * from "./merge.js";
export * from "./assembler.js";
export * from "./convert.js";
