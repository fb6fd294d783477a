export * from "./types.js";
export * from "./bounds.js";
export * from "./grid.js";
export * from "./hash.js";
