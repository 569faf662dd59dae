import { describe, expect, it } from "vitest";
import { StructuredLogger } from "../adapters/structured-logger.js";
import { noopLogger } from "../utils/noop-logger.js";
import { isLogger } from "./logger.js";

describe("isLogger", () => {
  it("accepts the bundled loggers", () => {
    expect(isLogger(noopLogger)).toBe(true);
    expect(isLogger(new StructuredLogger({ writer: () => {} }))).toBe(true);
  });

  it("accepts a plain object without debug", () => {
    expect(isLogger({ info() {}, warn() {}, error() {} })).toBe(true);
  });

  it("rejects missing or non-function methods", () => {
    expect(isLogger(null)).toBe(false);
    expect(isLogger("logger")).toBe(false);
    expect(isLogger({ info() {}, warn() {} })).toBe(false);
    expect(isLogger({ info() {}, warn() {}, error() {}, debug: true })).toBe(false);
  });
});
