import { capacitySchema, ringBufferOptionsSchema } from "../config/config-schema.js";
import { InvalidCapacityError, InvalidOptionsError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import { noopLogger } from "../utils/noop-logger.js";

/** Construction options for a RingBuffer. */
export interface RingBufferOptions<T> {
  /** Value held by slots that have never been written. default: undefined */
  fill?: T;
  /** default: a logger that discards everything */
  logger?: Logger;
}

/** Fully resolved options with defaults applied. */
export interface ResolvedRingBufferOptions<T> {
  capacity: number;
  fill: T | undefined;
  logger: Logger;
}

export function resolveOptions<T>(
  capacity: number,
  options: RingBufferOptions<T> = {},
): ResolvedRingBufferOptions<T> {
  const capacityResult = capacitySchema.safeParse(capacity);
  if (!capacityResult.success) {
    throw new InvalidCapacityError(capacity, { cause: capacityResult.error });
  }

  const optionsResult = ringBufferOptionsSchema.safeParse(options);
  if (!optionsResult.success) {
    const issue = optionsResult.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new InvalidOptionsError(
      `Invalid ring buffer options: ${where}${issue?.message ?? "unknown issue"}`,
      { cause: optionsResult.error },
    );
  }

  return {
    capacity: capacityResult.data,
    fill: options.fill,
    logger: options.logger ?? noopLogger,
  };
}
