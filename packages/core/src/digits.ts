/**
 * Persistent little-endian sequence of base-2^32 digits.
 *
 * A vector is a `[start, end)` view over a shared store that keeps spare room
 * on both sides. Pushing writes in place only when the view sits on the
 * store's frontier for that side; the frontier then moves, so the new slot
 * lies outside every existing view. Anything else copies into a fresh store.
 */

import { ensureNonNegativeInteger } from './utils/validate';
import { ensureDigit } from './utils/word';

interface DigitStore {
  readonly data: Uint32Array;
  /** Lowest slot any view may read. */
  head: number;
  /** One past the highest slot any view may read. */
  tail: number;
}

const MIN_CAPACITY = 8;

function allocate(source: Uint32Array, extra: number): DigitStore {
  const capacity = Math.max(MIN_CAPACITY, source.length * 2 + extra);
  const data = new Uint32Array(capacity);
  const head = (capacity - source.length) >> 1;
  data.set(source, head);
  return { data, head, tail: head + source.length };
}

export class DigitVector implements Iterable<number> {
  private readonly store: DigitStore;
  private readonly start: number;
  private readonly end: number;

  private constructor(store: DigitStore, start: number, end: number) {
    this.store = store;
    this.start = start;
    this.end = end;
  }

  static readonly empty: DigitVector = new DigitVector({ data: new Uint32Array(0), head: 0, tail: 0 }, 0, 0);

  static of(...digits: number[]): DigitVector {
    return DigitVector.from(digits);
  }

  static from(digits: Iterable<number>): DigitVector {
    if (digits instanceof DigitVector) return digits;
    const values = Array.from(digits, (d, i) => ensureDigit(d, `digits[${i}]`));
    if (values.length === 0) return DigitVector.empty;
    const store = allocate(Uint32Array.from(values), 0);
    return new DigitVector(store, store.head, store.tail);
  }

  /** @internal Wraps a buffer the caller hands over and never touches again. */
  static adopt(data: Uint32Array, length: number): DigitVector {
    if (length === 0) return DigitVector.empty;
    return new DigitVector({ data, head: 0, tail: length }, 0, length);
  }

  get length(): number {
    return this.end - this.start;
  }

  get isEmpty(): boolean {
    return this.end === this.start;
  }

  at(index: number): number {
    if (!Number.isInteger(index) || index < 0 || index >= this.length) {
      throw new RangeError(`Digit index ${index} is out of range [0, ${this.length}).`);
    }
    return this.store.data[this.start + index];
  }

  /** Digit at `index`, or 0 past the high end. */
  digit(index: number): number {
    if (index >= this.length) return 0;
    return this.at(index);
  }

  /** Most significant digit, or 0 when empty. */
  get high(): number {
    return this.isEmpty ? 0 : this.store.data[this.end - 1];
  }

  pushBack(d: number): DigitVector {
    ensureDigit(d);
    let store = this.store;
    let start = this.start;
    let end = this.end;
    if (end !== store.tail || end >= store.data.length) {
      store = allocate(store.data.subarray(start, end), 1);
      start = store.head;
      end = store.tail;
    }
    store.data[end] = d;
    store.tail = end + 1;
    return new DigitVector(store, start, end + 1);
  }

  pushFront(d: number): DigitVector {
    ensureDigit(d);
    let store = this.store;
    let start = this.start;
    let end = this.end;
    if (start !== store.head || start === 0) {
      store = allocate(store.data.subarray(start, end), 1);
      start = store.head;
      end = store.tail;
    }
    store.data[start - 1] = d;
    store.head = start - 1;
    return new DigitVector(store, start - 1, end);
  }

  /** Drops the first `k` digits (all of them when `k >= length`). */
  drop(k: number): DigitVector {
    const n = Math.min(ensureNonNegativeInteger(k, 'drop count'), this.length);
    if (n === 0) return this;
    return new DigitVector(this.store, this.start + n, this.end);
  }

  /** Keeps the digits at index `< k`. */
  take(k: number): DigitVector {
    const n = Math.min(ensureNonNegativeInteger(k, 'take count'), this.length);
    if (n === this.length) return this;
    return new DigitVector(this.store, this.start, this.start + n);
  }

  /** Drops zero digits from the high-order end. */
  trimHigh(): DigitVector {
    const data = this.store.data;
    let end = this.end;
    while (end > this.start && data[end - 1] === 0) end -= 1;
    return end === this.end ? this : new DigitVector(this.store, this.start, end);
  }

  equals(other: DigitVector): boolean {
    if (this === other) return true;
    if (this.length !== other.length) return false;
    for (let i = 0; i < this.length; i++) {
      if (this.at(i) !== other.at(i)) return false;
    }
    return true;
  }

  toArray(): number[] {
    return Array.from(this.store.data.subarray(this.start, this.end));
  }

  *[Symbol.iterator](): Iterator<number> {
    for (let i = this.start; i < this.end; i++) {
      yield this.store.data[i];
    }
  }
}

/**
 * Transient form of a DigitVector. Kernels push their output digits here and
 * freeze the result with `build()`.
 */
export class DigitVectorBuilder {
  private data: Uint32Array;
  private size = 0;
  private built = false;

  constructor(capacity = MIN_CAPACITY) {
    this.data = new Uint32Array(Math.max(MIN_CAPACITY, capacity));
  }

  get length(): number {
    return this.size;
  }

  push(d: number): this {
    this.assertOpen();
    ensureDigit(d);
    if (this.size === this.data.length) {
      const grown = new Uint32Array(this.data.length * 2);
      grown.set(this.data);
      this.data = grown;
    }
    this.data[this.size] = d;
    this.size += 1;
    return this;
  }

  /** Last pushed digit, or undefined when nothing was pushed. */
  last(): number | undefined {
    return this.size === 0 ? undefined : this.data[this.size - 1];
  }

  pop(): number | undefined {
    this.assertOpen();
    if (this.size === 0) return undefined;
    this.size -= 1;
    return this.data[this.size];
  }

  build(): DigitVector {
    this.assertOpen();
    this.built = true;
    return DigitVector.adopt(this.data, this.size);
  }

  private assertOpen(): void {
    if (this.built) {
      throw new Error('DigitVectorBuilder was already built.');
    }
  }
}
