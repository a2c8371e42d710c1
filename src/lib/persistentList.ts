import { EmptyListError, IndexOutOfRangeError } from "../errors";

export type Predicate<T> = (value: T) => boolean;
export type ElementEquality<T, U = T> = (a: T, b: U) => boolean;

class Node<T> {
  readonly value: T;
  readonly next: PersistentList<T>;

  constructor(value: T, next: PersistentList<T>) {
    this.value = value;
    this.next = next;
    Object.freeze(this);
  }
}

// Nested lists compare element-wise, everything else with ===.
const sameElement = (a: unknown, b: unknown): boolean =>
  a instanceof PersistentList && b instanceof PersistentList
    ? a.equals(b)
    : a === b;

/**
 * Immutable singly-linked list. Every list value is either the shared empty
 * list or a cell holding a head and a reference to an existing tail, which is
 * never copied.
 */
export class PersistentList<T> implements Iterable<T> {
  // One sentinel serves every element type.
  private static readonly EMPTY = new PersistentList<never>(null, 0);

  private readonly node: Node<T> | null;
  readonly length: number;

  private constructor(node: Node<T> | null, length: number) {
    this.node = node;
    this.length = length;
    Object.freeze(this);
  }

  static empty<T>(): PersistentList<T> {
    return PersistentList.EMPTY;
  }

  static of<T>(...values: T[]): PersistentList<T> {
    return PersistentList.prependAll(values, PersistentList.empty());
  }

  static from<T>(values: Iterable<T>): PersistentList<T> {
    return PersistentList.prependAll(Array.from(values), PersistentList.empty());
  }

  private static prependAll<T>(
    values: readonly T[],
    suffix: PersistentList<T>
  ): PersistentList<T> {
    let result = suffix;
    for (let i = values.length - 1; i >= 0; i--) {
      result = result.prepend(values[i]);
    }
    return result;
  }

  prepend(value: T): PersistentList<T> {
    return new PersistentList(new Node(value, this), this.length + 1);
  }

  /** Copies every node; prefer `prepend` when order allows it. */
  append(value: T): PersistentList<T> {
    return PersistentList.prependAll([...this, value], PersistentList.empty());
  }

  isEmpty(): boolean {
    return this.node === null;
  }

  head(): T {
    if (!this.node) {
      throw new EmptyListError("head");
    }
    return this.node.value;
  }

  headOption(): T | undefined {
    return this.node?.value;
  }

  /** The exact list this one was prepended onto. */
  tail(): PersistentList<T> {
    if (!this.node) {
      throw new EmptyListError("tail");
    }
    return this.node.next;
  }

  at(index: number): T {
    if (!Number.isInteger(index) || index < 0 || index >= this.length) {
      throw new IndexOutOfRangeError(index, this.length);
    }

    let current: PersistentList<T> = this;
    for (let i = 0; i < index; i++) {
      current = current.tail();
    }
    return current.head();
  }

  reverse(): PersistentList<T> {
    let result = PersistentList.empty<T>();
    for (const value of this) {
      result = result.prepend(value);
    }
    return result;
  }

  map<U>(f: (value: T) => U): PersistentList<U> {
    const mapped: U[] = [];
    for (const value of this) {
      mapped.push(f(value));
    }
    return PersistentList.prependAll(mapped, PersistentList.empty());
  }

  filter(predicate: Predicate<T>): PersistentList<T> {
    const kept: T[] = [];
    for (const value of this) {
      if (predicate(value)) {
        kept.push(value);
      }
    }
    return PersistentList.prependAll(kept, PersistentList.empty());
  }

  filterNot(predicate: Predicate<T>): PersistentList<T> {
    return this.filter((value) => !predicate(value));
  }

  reduceLeft(op: (acc: T, value: T) => T): T {
    if (!this.node) {
      throw new EmptyListError("reduceLeft");
    }
    return this.node.next.foldLeft(this.node.value, op);
  }

  foldLeft<A>(seed: A, op: (acc: A, value: T) => A): A {
    let acc = seed;
    for (const value of this) {
      acc = op(acc, value);
    }
    return acc;
  }

  /** Copies this list's nodes in front of `other`, which is kept as is. */
  concat(other: PersistentList<T>): PersistentList<T> {
    if (other.isEmpty()) {
      return this;
    }

    if (this.isEmpty()) {
      return other;
    }

    return PersistentList.prependAll(this.toArray(), other);
  }

  equals<U>(
    other: PersistentList<U>,
    eq: ElementEquality<T, U> = sameElement
  ): boolean {
    if (this.sameAs(other)) return true;
    if (this.length !== other.length) return false;

    let left = this.node;
    let right = other.node;
    while (left && right) {
      if (!eq(left.value, right.value)) return false;
      left = left.next.node;
      right = right.next.node;
    }
    return true;
  }

  /** Reference identity, as opposed to `equals`. */
  sameAs(other: PersistentList<unknown>): boolean {
    return this === other;
  }

  toArray(): T[] {
    return [...this];
  }

  toString(): string {
    return `List(${this.toArray().map(String).join(", ")})`;
  }

  *[Symbol.iterator](): Iterator<T> {
    let current = this.node;
    while (current) {
      yield current.value;
      current = current.next.node;
    }
  }
}

export const empty = <T>(): PersistentList<T> => PersistentList.empty();

export const cons = <T>(value: T, list: PersistentList<T>): PersistentList<T> =>
  list.prepend(value);

export const list = <T>(...values: T[]): PersistentList<T> =>
  PersistentList.of(...values);

export const fromIterable = <T>(values: Iterable<T>): PersistentList<T> =>
  PersistentList.from(values);

/** Consecutive integers from `lo` to `hi`, both included. */
export function fromRange(lo: number, hi: number): PersistentList<number> {
  let result = PersistentList.empty<number>();
  for (let n = hi; n >= lo; n--) {
    result = result.prepend(n);
  }
  return result;
}
