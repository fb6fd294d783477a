export * from "./parts.js";
export * from "./writer.js";
