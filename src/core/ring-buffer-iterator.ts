import type { RingBuffer } from "./ring-buffer.js";

/**
 * Single-pass cursor over a RingBuffer's live elements, oldest first.
 * Once exhausted it stays exhausted; call `buffer.iter()` again to re-walk.
 */
export class RingBufferIterator<T> implements IterableIterator<T> {
  private index = 0;

  constructor(private readonly buffer: RingBuffer<T>) {}

  next(): IteratorResult<T, undefined> {
    if (this.index >= this.buffer.size) {
      // Pin the cursor so a later push cannot revive a finished iterator.
      this.index = Number.POSITIVE_INFINITY;
      return { done: true, value: undefined };
    }
    const value = this.buffer.get(this.index);
    this.index++;
    return { done: false, value };
  }

  [Symbol.iterator](): this {
    return this;
  }
}
