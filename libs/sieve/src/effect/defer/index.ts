export * from "./extract.js";
export * from "./format.js";
export * from "./lines.js";
export * from "./resolve.js";
export * from "./split-indexes.js";
