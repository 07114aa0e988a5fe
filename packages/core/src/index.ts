/**
 * @lockstep/core: Shared errors, argument checks, configuration and logging
 *
 * @example
 * ```typescript
 * import { throwIfNull, createLogger, config } from "@lockstep/core";
 *
 * throwIfNull(source, "source");
 * config.set({ logLevel: "debug" });
 * createLogger("zip").debug("started");
 * ```
 */

export {
  LockstepError,
  ArgumentNullError,
  ArgumentTypeError,
  SequenceLengthMismatchError,
  isLockstepError,
} from "./errors.js";
export type { LockstepErrorCode, SequenceSide } from "./errors.js";

export {
  throwIfNull,
  throwIfNotIterable,
  throwIfNotAnyIterable,
  throwIfNotFunction,
} from "./validation.js";

export {
  config,
  defineConfig,
  loadConfigFromFiles,
  loadConfigFromEnv,
  normalizeConfig,
  LOG_LEVELS,
} from "./config.js";
export type { LockstepConfig, LogLevel, LoadOptions, FileConfigResult } from "./config.js";

export { createLogger, formatLogLine } from "./logger.js";
export type { Logger, LoggerOptions, LogContext, WritableLevel } from "./logger.js";
