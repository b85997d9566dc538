export * as Batch from "./batch_resolver";
export * as Config from "./config_manager";
export * as Git from "./git";
export * as Logger from "./logger";
export * as Process from "./process_runner";
export * as Resolver from "./require_resolver";
export * as Version from "./version_resolver";
export * as Workspace from "./workspace";

export { ModreqError } from "./errors";
