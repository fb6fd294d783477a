export * from "./data.js";
export * from "./state.js";
export * from "./table.js";
export * from "./palette.js";
export * from "./overrides.js";
export * from "./report.js";
