import type { Logger } from "../interfaces/logger.js";

/** `resolveOptions` default: a RingBuffer built without `options.logger` emits nothing. */
export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

export const noopLogger: Logger = new NoopLogger();
