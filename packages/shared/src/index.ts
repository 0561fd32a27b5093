/**
 * @murmur/shared - cross-package utilities
 */

export {
  coerceOptionalBoolean,
  coerceOptionalNumber,
  isNonEmptyString,
  isRecord,
  isStringArray,
  isValidNumber,
  normalizeOptionalString,
} from "./typeGuards";

export {
  createLogger,
  createRuntimeLogger,
  getLogger,
  wrapLogger,
  type LoggerConfig,
  type LogLevel,
  type RuntimeLogger,
} from "./logger";
