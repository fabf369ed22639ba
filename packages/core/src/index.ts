export * from "./format/index";
export * from "./ingest/index";
export * from "./convert/index";
export * from "./errors";
export { loadConfig, uploadLimitFor } from "./config";
export type { ServiceConfig } from "./config";
export { getLogger } from "./logger";
export type { Logger, LogCtx, Level } from "./logger";
export { runCommand } from "./utils/process";
export type { CommandRunner, CommandOptions, CommandResult } from "./utils/process";
