import { IndexOutOfRangeError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import { type RingBufferOptions, resolveOptions } from "../types/config.js";
import { RingBufferIterator } from "./ring-buffer-iterator.js";

/**
 * Fixed-capacity circular array.
 *
 * Pushes never fail: once `capacity` elements are held, each push overwrites
 * the oldest one. Reads address the *logical* order (oldest first, newest at
 * `size - 1`), which is translated to the physical slot on every access.
 *
 * Not safe to mutate while an iterator over it is still being consumed.
 */
export class RingBuffer<T> implements Iterable<T> {
  readonly capacity: number;
  private readonly storage: (T | undefined)[];
  private readonly logger: Logger;
  private nextWrite = 0; // physical slot of the next push; the oldest element once full
  private count = 0; // cumulative pushes

  constructor(capacity: number, options?: RingBufferOptions<T>) {
    const resolved = resolveOptions(capacity, options);
    this.capacity = resolved.capacity;
    this.logger = resolved.logger;
    this.storage = new Array<T | undefined>(this.capacity).fill(resolved.fill);
    this.logger.debug?.("ring buffer created", { capacity: this.capacity });
  }

  /** Build a buffer by pushing every item of `items` in order. */
  static from<T>(
    capacity: number,
    items: Iterable<T>,
    options?: RingBufferOptions<T>,
  ): RingBuffer<T> {
    const buf = new RingBuffer<T>(capacity, options);
    for (const item of items) buf.push(item);
    return buf;
  }

  push(item: T): void {
    if (this.count === this.capacity) {
      this.logger.debug?.("ring buffer wrapped", { capacity: this.capacity });
    }
    this.storage[this.nextWrite] = item;
    this.nextWrite = (this.nextWrite + 1) % this.capacity;
    this.count++;
  }

  /** Read a live element by logical index. Throws IndexOutOfRangeError outside `[0, size)`. */
  get(index: number): T {
    return this.slot(this.physicalIndex(index));
  }

  /** Overwrite a live element in place. Does not count as a push. */
  set(index: number, item: T): void {
    this.storage[this.physicalIndex(index)] = item;
  }

  /**
   * Non-throwing read. Negative indices count back from the newest element,
   * so `at(-1)` is the last push.
   */
  at(index: number): T | undefined {
    const size = this.size;
    const logical = index < 0 ? size + index : index;
    if (!Number.isInteger(logical) || logical < 0 || logical >= size) return undefined;
    return this.slot(this.toPhysical(logical));
  }

  /** Most recently pushed element, or undefined when nothing has been pushed. */
  last(): T | undefined {
    if (this.count === 0) return undefined;
    return this.slot(this.toPhysical(this.size - 1));
  }

  /**
   * Every physical slot, reordered oldest first. Always `capacity` long: while
   * the buffer is still filling, positions from `size` on hold the fill value
   * and are not data.
   */
  toArray(): (T | undefined)[] {
    if (this.isFull && this.nextWrite > 0) {
      return this.storage.slice(this.nextWrite).concat(this.storage.slice(0, this.nextWrite));
    }
    return this.storage.slice();
  }

  /** Only the live elements, oldest first. */
  toLiveArray(): T[] {
    return Array.from(this);
  }

  /**
   * Cumulative number of pushes. Keeps counting past `capacity`; use `size`
   * for the number of elements actually held.
   */
  len(): number {
    return this.count;
  }

  get size(): number {
    return Math.min(this.count, this.capacity);
  }

  get isFull(): boolean {
    return this.count >= this.capacity;
  }

  iter(): RingBufferIterator<T> {
    return new RingBufferIterator(this);
  }

  [Symbol.iterator](): RingBufferIterator<T> {
    return this.iter();
  }

  private physicalIndex(index: number): number {
    const size = this.size;
    if (!Number.isInteger(index) || index < 0 || index >= size) {
      throw new IndexOutOfRangeError(index, size);
    }
    return this.toPhysical(index);
  }

  private toPhysical(logical: number): number {
    return this.isFull ? (this.nextWrite + logical) % this.capacity : logical;
  }

  // Callers only pass slots inside the live range, which always hold a pushed T.
  private slot(physical: number): T {
    return this.storage[physical] as T;
  }
}
