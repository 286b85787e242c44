export * from "./clauses.js";
export * from "./section.js";
export * from "./validators.js";
