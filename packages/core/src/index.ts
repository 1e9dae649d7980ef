/**
 * @handlekit/core: Shared infrastructure for handlekit packages.
 *
 * Unified configuration, scoped logging, the error taxonomy and the
 * `Result` type.
 *
 * @packageDocumentation
 */

export { config, defineConfig } from "./config.js";
export type { HandlekitConfig, LogConfig, LogLevel } from "./config.js";

export { createLogger, setLogWriter, resetLogWriter, currentLogLevel } from "./logger.js";
export type { Logger, LogWriter } from "./logger.js";

export {
  HandleError,
  NullHandleError,
  NativeStatusError,
  DowncastError,
  UnboundNativeSystemError,
} from "./errors.js";
export type { HandleErrorCode, StatusOperation } from "./errors.js";

export { ok, err, isOk, isErr, unwrap } from "./result.js";
export type { Result } from "./result.js";
