export * from "./bmc/index.js";
export type { CliIo, CliStatus, Clients } from "./cli.js";
export * from "./config/index.js";
export { toComponentError } from "./http/client.js";
export * from "./ledger/index.js";
export * from "./lifecycle/index.js";
export { type CreateLoggerOpts, createLogger, type Logger, silentLogger } from "./logger.js";
export * from "./objects/index.js";
export * from "./orchestrator/index.js";
export * from "./renderers/workflow-report.js";
export { Runtime, type RuntimeOpts } from "./runtime.js";
export * from "./schemas/index.js";
export * from "./secrets/index.js";
export * from "./storage/index.js";
export * from "./workflows/index.js";
