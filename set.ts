import type { AllocationFailure, RangeViolation, Result } from './result';
import { describeFailure, err, ok } from './result';

export type Equality<T> = (a: T, b: T) => boolean;

/**
 * Hands out a fresh buffer of `capacity` slots. Throwing means the buffer
 * could not be obtained.
 */
export type Allocator = <T>(capacity: number) => T[];

export type Logger = Pick<Console, 'error' | 'warn' | 'info'>;

export type SetOptions<T> = {
  allocator?: Allocator,
  format?: (element: T) => string,
  logger?: Logger
};

const defaultAllocator: Allocator = <T>(capacity: number) => new Array<T>(capacity);

/**
 * Duplicate-free collection whose membership is decided by a caller
 * supplied equality function.
 *
 * Elements live in slots `[0, count)` of a buffer that doubles when an
 * insertion finds it full and halves once a removal leaves it a quarter
 * full or less. Lookups are linear scans; removal moves the last element
 * into the vacated slot, so iteration order is insertion order only until
 * the first removal.
 *
 * Not safe for concurrent mutation. Cursors are invalidated by any
 * mutation made after they were taken.
 */
export class CustomSet<T> {
  readonly equalityFunction: Equality<T>;
  readonly options: SetOptions<T>;
  private allocator: Allocator;
  private format: (element: T) => string;
  private logger: Logger;

  private buffer: T[];
  private size: number;
  private numElements: number;
  private mutations: number;

  constructor(equalityFunction: Equality<T>, options: SetOptions<T> = {}) {
    this.equalityFunction = equalityFunction;
    this.options = options;
    this.allocator = options.allocator ?? defaultAllocator;
    this.format = options.format ?? String;
    this.logger = options.logger ?? console;
    this.buffer = [];
    this.size = 0;
    this.numElements = 0;
    this.mutations = 0;
  }

  /**
   * Builds a set by adding every element of `elements` in order. If the
   * buffer cannot grow midway, the partial set is cleared and the failure
   * returned.
   */
  static from<T>(
    elements: Iterable<T>,
    equalityFunction: Equality<T>,
    options: SetOptions<T> = {}
  ): Result<CustomSet<T>, AllocationFailure> {
    const set = new CustomSet<T>(equalityFunction, options);
    for (const element of elements) {
      const added = set.add(element);
      if (!added.ok) {
        set.clear();
        return added;
      }
    }
    return ok(set);
  }

  get count(): number {
    return this.numElements;
  }

  get capacity(): number {
    return this.size;
  }

  /** Bumped by every mutation; cursors taken under an older value are stale. */
  get generation(): number {
    return this.mutations;
  }

  contains(value: T): boolean {
    for (let i = 0; i < this.numElements; i++) {
      if (this.equalityFunction(this.buffer[i], value)) {
        return true;
      }
    }
    return false;
  }

  /**
   * Appends `value` unless an equal element is already present.
   * Resolves to `false` for a duplicate. When the buffer is full and a
   * larger one cannot be allocated, the set is left exactly as it was.
   */
  add(value: T): Result<boolean, AllocationFailure> {
    if (this.contains(value)) {
      return ok(false);
    }
    if (this.numElements === this.size) {
      const grown = this._resize(true);
      if (!grown.ok) {
        return grown;
      }
    }
    this.buffer[this.numElements] = value;
    this.numElements++;
    this.mutations++;
    return ok(true);
  }

  /**
   * Removes the first element equal to `value`, backfilling its slot with
   * the last element. A failed shrink afterwards is logged and leaves the
   * buffer oversized; the removal still stands.
   */
  remove(value: T): boolean {
    for (let i = 0; i < this.numElements; i++) {
      if (this.equalityFunction(this.buffer[i], value)) {
        const last = this.numElements - 1;
        this.buffer[i] = this.buffer[last];
        delete this.buffer[last];
        this.numElements = last;
        this.mutations++;
        if (this.numElements <= Math.floor(this.size / 4)) {
          const shrunk = this._resize(false);
          if (!shrunk.ok) {
            this.logger.warn(`Keeping ${this.size} slots after removal: ${describeFailure(shrunk.error)}`);
          }
        }
        return true;
      }
    }
    return false;
  }

  at(index: number): Result<T, RangeViolation> {
    if (!Number.isInteger(index) || index < 0 || index >= this.numElements) {
      return err({ kind: 'range', index, count: this.numElements });
    }
    return ok(this.buffer[index]);
  }

  /** Releases the buffer; the set is then indistinguishable from a new one. */
  clear(): void {
    this.buffer = [];
    this.size = 0;
    this.numElements = 0;
    this.mutations++;
  }

  swap(other: CustomSet<T>): void {
    const buffer = this.buffer;
    const size = this.size;
    const numElements = this.numElements;
    this.buffer = other.buffer;
    this.size = other.size;
    this.numElements = other.numElements;
    other.buffer = buffer;
    other.size = size;
    other.numElements = numElements;
    this.mutations++;
    other.mutations++;
  }

  /** Deep copy with the same capacity, comparator and options. */
  clone(): Result<CustomSet<T>, AllocationFailure> {
    const copy = new CustomSet<T>(this.equalityFunction, this.options);
    if (this.size === 0) {
      return ok(copy);
    }
    const allocated = this._allocate(this.size);
    if (!allocated.ok) {
      return allocated;
    }
    const buffer = allocated.value;
    for (let i = 0; i < this.numElements; i++) {
      buffer[i] = this.buffer[i];
    }
    copy.buffer = buffer;
    copy.size = this.size;
    copy.numElements = this.numElements;
    return ok(copy);
  }

  /** Replaces this set's contents with a copy of `other`; untouched on failure. */
  assign(other: CustomSet<T>): Result<void, AllocationFailure> {
    if (other === this) {
      return ok(undefined);
    }
    const copy = other.clone();
    if (!copy.ok) {
      return copy;
    }
    this.swap(copy.value);
    copy.value.clear();
    return ok(undefined);
  }

  /**
   * Same count, and every element of `other` is found here. Only
   * meaningful when both sets use the same notion of equality.
   */
  equals(other: CustomSet<T>): boolean {
    if (this.numElements !== other.numElements) {
      return false;
    }
    for (const element of other) {
      if (!this.contains(element)) {
        return false;
      }
    }
    return true;
  }

  begin(): SetCursor<T> {
    return new SetCursor(this, 0);
  }

  end(): SetCursor<T> {
    return new SetCursor(this, this.numElements);
  }

  *values(): Generator<T, void, undefined> {
    const end = this.end();
    for (const cursor = this.begin(); !cursor.equals(end); cursor.next()) {
      yield cursor.value;
    }
  }

  [Symbol.iterator](): Iterator<T> {
    return this.values();
  }

  forEach(callback: (value: T, index: number) => void) {
    let index = 0;
    for (const value of this) {
      callback(value, index++);
    }
  }

  toString(): string {
    let output = String(this.numElements);
    for (const element of this) {
      output += ` (${this.format(element)})`;
    }
    return output;
  }

  [Symbol.for('nodejs.util.inspect.custom')]() {
    return this.toString();
  }

  private _allocate(capacity: number): Result<T[], AllocationFailure> {
    try {
      return ok(this.allocator<T>(capacity));
    } catch (cause) {
      return err({ kind: 'allocation', requested: capacity, cause });
    }
  }

  private _resize(increase: boolean): Result<void, AllocationFailure> {
    const newSize = increase ? (this.size > 0 ? this.size * 2 : 1) : Math.floor(this.size / 2);
    if (newSize === 0) {
      this.buffer = [];
      this.size = 0;
      return ok(undefined);
    }
    const allocated = this._allocate(newSize);
    if (!allocated.ok) {
      return allocated;
    }
    const buffer = allocated.value;
    for (let i = 0; i < this.numElements; i++) {
      buffer[i] = this.buffer[i];
    }
    this.buffer = buffer;
    this.size = newSize;
    return ok(undefined);
  }
}

/**
 * Forward, read-only position inside a set. Two cursors are equal when
 * they point at the same slot of the same set and neither has been
 * outlived by a mutation.
 */
export class SetCursor<T> {
  private readonly set: CustomSet<T>;
  private readonly generation: number;
  private index: number;

  constructor(set: CustomSet<T>, index: number) {
    this.set = set;
    this.generation = set.generation;
    this.index = index;
  }

  get valid(): boolean {
    return this.generation === this.set.generation;
  }

  get done(): boolean {
    return this.index >= this.set.count;
  }

  get value(): T {
    this._checkValid('dereference');
    const slot = this.set.at(this.index);
    if (!slot.ok) {
      throw new Error('Cannot dereference the end of a set');
    }
    return slot.value;
  }

  next(): this {
    this._checkValid('advance');
    if (this.done) {
      throw new Error('Cannot advance past the end of a set');
    }
    this.index++;
    return this;
  }

  equals(other: SetCursor<T>): boolean {
    return this.set === other.set
      && this.generation === other.generation
      && this.index === other.index;
  }

  private _checkValid(op: string) {
    if (!this.valid) {
      throw new Error(`Cannot ${op} a cursor taken before the set was modified`);
    }
  }
}
