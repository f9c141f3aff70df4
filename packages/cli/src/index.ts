/**
 * @hd-funder/cli
 *
 * Command-line surface: argument parsing, configuration and runtime wiring.
 */

export { USAGE, parseCliArgs } from "./args.js";
export type { ParsedArgs } from "./args.js";

export {
  ConfigSchema,
  confirmRetry,
  fundingPolicy,
  loadConfig,
  redactConfig,
  sendRetry,
} from "./config.js";
export type { AppConfig } from "./config.js";

export { createLogger } from "./logger.js";

export { EXIT_FATAL, EXIT_OK, EXIT_USAGE, formatSnapshot, runMode } from "./run.js";
export type { ModeRunner, Output } from "./run.js";

export { createRuntime } from "./runtime.js";
export type { Runtime } from "./runtime.js";
