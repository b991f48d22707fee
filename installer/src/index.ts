export { runInstaller, nodeHost } from "./pipeline.js";
export type { HostCapabilities, InstallReport } from "./pipeline.js";
export { defaultInstallerOptions, defaultInstallPaths, parseArgs } from "./lib.js";
export type { CliArgs, InstallerOptions, InstallPaths } from "./lib.js";
export { InstallerError, InstallerErrorCode } from "./errors.js";
export { createConsoleLogger } from "./log.js";
export type { Logger } from "./log.js";
export { buildLinks, decodeUserInfo } from "./links.js";
export { buildServiceConfig } from "./config.js";
export { formatSummary } from "./summary.js";
export type * from "./types.js";
