/**
 * circular-array public API barrel.
 * @module
 */

export type { LogLevelName, StructuredLoggerOptions } from "./adapters/structured-logger.js";
export { LogLevel, StructuredLogger } from "./adapters/structured-logger.js";
export { capacitySchema, MAX_CAPACITY, ringBufferOptionsSchema } from "./config/config-schema.js";
export { RingBuffer } from "./core/ring-buffer.js";
export { RingBufferIterator } from "./core/ring-buffer-iterator.js";
export {
  CircularArrayError,
  IndexOutOfRangeError,
  InvalidCapacityError,
  InvalidOptionsError,
} from "./errors.js";
export type { LogContext, Logger } from "./interfaces/logger.js";
export { isLogger } from "./interfaces/logger.js";
export type { ResolvedRingBufferOptions, RingBufferOptions } from "./types/config.js";
export { resolveOptions } from "./types/config.js";
export { NoopLogger, noopLogger } from "./utils/noop-logger.js";
