export * from "./contracts/index.js";
export * from "./defer/index.js";
export * from "./errors.js";
export * from "./runtime-layer.js";
export * from "./services/config-service.js";
export * from "./services/defer-service.js";
export * from "./services/logger-service.js";
