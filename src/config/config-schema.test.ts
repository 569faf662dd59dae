import { describe, expect, it } from "vitest";
import { InvalidCapacityError, InvalidOptionsError } from "../errors.js";
import { resolveOptions } from "../types/config.js";
import { noopLogger } from "../utils/noop-logger.js";
import { capacitySchema, MAX_CAPACITY } from "./config-schema.js";

describe("capacity validation", () => {
  it("accepts positive integers up to MAX_CAPACITY", () => {
    expect(capacitySchema.safeParse(1).success).toBe(true);
    expect(capacitySchema.safeParse(MAX_CAPACITY).success).toBe(true);
    expect(MAX_CAPACITY).toBe(16_777_216);
  });

  it("rejects capacities past MAX_CAPACITY before allocating storage", () => {
    expect(() => resolveOptions(MAX_CAPACITY + 1)).toThrow(InvalidCapacityError);
    expect(() => resolveOptions(2 ** 28)).toThrow(InvalidCapacityError);
    expect(() => resolveOptions(2 ** 32 - 1)).toThrow("Invalid capacity: 4294967295");
  });

  it("rejects zero, negatives, fractions and non-finite values", () => {
    for (const bad of [0, -3, 2.5, NaN, Infinity, MAX_CAPACITY + 1]) {
      expect(capacitySchema.safeParse(bad).success).toBe(false);
    }
  });

  it("resolveOptions throws InvalidCapacityError carrying the value", () => {
    try {
      resolveOptions(0);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidCapacityError);
      if (err instanceof InvalidCapacityError) {
        expect(err.capacity).toBe(0);
        expect(err.code).toBe("INVALID_CAPACITY");
        expect(err.cause).toBeDefined();
      }
    }
  });
});

describe("options resolution", () => {
  it("applies defaults for omitted fields", () => {
    const resolved = resolveOptions<number>(8);
    expect(resolved.capacity).toBe(8);
    expect(resolved.fill).toBeUndefined();
    expect(resolved.logger).toBe(noopLogger);
  });

  it("keeps the supplied fill value and logger", () => {
    const logger = { info: () => {}, warn: () => {}, error: () => {} };
    const resolved = resolveOptions(2, { fill: "-", logger });
    expect(resolved.fill).toBe("-");
    expect(resolved.logger).toBe(logger);
  });

  it("names the offending field when the logger is malformed", () => {
    // @ts-expect-error validating runtime guard
    expect(() => resolveOptions(2, { logger: { info: "nope" } })).toThrow(
      "Invalid ring buffer options: logger: must implement Logger",
    );
  });

  it("rejects unknown option keys", () => {
    // @ts-expect-error validating runtime guard
    expect(() => resolveOptions(2, { capacity: 4 })).toThrow(InvalidOptionsError);
  });
});
