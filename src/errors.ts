export class CircularArrayError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "CircularArrayError";
    this.code = code;
  }
}

// ── Domain errors ──

export class InvalidCapacityError extends CircularArrayError {
  readonly capacity: unknown;

  constructor(capacity: unknown, options?: ErrorOptions) {
    super(`Invalid capacity: ${String(capacity)}`, "INVALID_CAPACITY", options);
    this.name = "InvalidCapacityError";
    this.capacity = capacity;
  }
}

export class IndexOutOfRangeError extends CircularArrayError {
  readonly index: number;
  /** Number of live elements when the access was rejected. */
  readonly size: number;

  constructor(index: number, size: number, options?: ErrorOptions) {
    super(`Index ${index} out of range for ${size} live element(s)`, "INDEX_OUT_OF_RANGE", options);
    this.name = "IndexOutOfRangeError";
    this.index = index;
    this.size = size;
  }
}

export class InvalidOptionsError extends CircularArrayError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "INVALID_OPTIONS", options);
    this.name = "InvalidOptionsError";
  }
}
