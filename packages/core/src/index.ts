/**
 * sharelist – persistent singly-linked List with structural sharing
 *
 * - List.of(1, 2, 3)   → immutable list; every "update" returns a new list
 * - xs.tail(), xs.drop(n), xs.dropWhile(p) → share the suffix node-for-node
 * - xs.prepend(x), List.cons(x, xs)       → O(1), share the whole chain
 * - combinators buffer once, then rebuild right-to-left onto a fresh Nil
 */

// Internal modules
import {
  NIL,
  LIST_STATE,
  createCons,
  nodeFromBuffer,
  nodeIter,
  nodeForEach,
  nodeDrop,
  nodeTake,
  nodeToArray,
  defaultLessThan,
  stableSort,
  unstableSort,
  ListCursor,
  EmptyCollectionError,
  IndexOutOfRangeError,
  type Cons,
  type Node,
  type LessThan,
  type Equality,
} from './internal';

export { LIST_STATE, ListCursor };
export { ListError, EmptyCollectionError, IndexOutOfRangeError } from './internal';
export type { Nil, Cons, Node, LessThan, Equality } from './internal';

// =====================================================
// Helpers
// =====================================================

export interface ListState<T> {
  size: number;
  root: Node<T>;
}

export interface SortOptions<T> {
  /** Strict less-than; defaults to natural `<` on numbers, bigints and strings */
  lt?: LessThan<T>;
  /** Preserve source order of equal elements (default false) */
  stable?: boolean;
}

// Counts below zero behave as zero; fractions truncate toward zero
function toCount(n: number): number {
  if (Number.isNaN(n) || n <= 0) return 0;
  return Math.trunc(n);
}

/**
 * Default element equality: nested lists compare structurally, everything
 * else by SameValueZero.
 */
export function elementEquals(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (a instanceof List && b instanceof List) return a.equals(b);
  return typeof a === 'number' && typeof b === 'number' && Number.isNaN(a) && Number.isNaN(b);
}

// =====================================================
// List
// =====================================================

export class List<T> implements Iterable<T> {
  private readonly _size: number;
  private readonly _root: Node<T>;

  private constructor(size: number, root: Node<T>) {
    this._size = size;
    this._root = root;
  }

  // Canonical build: prepend `buf` last-to-first onto `tail`
  private static fromBuffer<T>(buf: readonly T[], tail: List<T> = List.empty<T>()): List<T> {
    return new List(buf.length + tail._size, nodeFromBuffer(buf, tail._root));
  }

  // ===== Construction =====

  static empty<T>(): List<T> {
    return new List<T>(0, NIL);
  }

  static single<T>(value: T): List<T> {
    return new List(1, createCons(value, NIL));
  }

  static cons<T>(head: T, tail: List<T>): List<T> {
    return new List(tail._size + 1, createCons(head, tail._root));
  }

  static of<T>(...values: T[]): List<T> {
    return List.fromBuffer(values);
  }

  /**
   * Build a list from any iterable, read once front to back.
   * A List source is returned as-is.
   */
  static from<T>(source: Iterable<T>): List<T> {
    if (source instanceof List) return source;
    return List.fromBuffer(Array.from(source));
  }

  // ===== Accessors =====

  get size(): number {
    return this._size;
  }

  /** @internal Node chain access, used to observe structural sharing */
  get [LIST_STATE](): ListState<T> {
    return { size: this._size, root: this._root };
  }

  get [Symbol.toStringTag](): string {
    return 'List';
  }

  isEmpty(): boolean {
    return this._size === 0;
  }

  nonEmpty(): boolean {
    return this._size > 0;
  }

  /** @throws EmptyCollectionError */
  head(): T {
    const node = this._root;
    if (node.kind === 'nil') throw new EmptyCollectionError('head');
    return node.head;
  }

  headOption(): T | undefined {
    const node = this._root;
    return node.kind === 'cons' ? node.head : undefined;
  }

  /**
   * O(1). The result shares every node of this list after the first.
   * @throws EmptyCollectionError
   */
  tail(): List<T> {
    const node = this._root;
    if (node.kind === 'nil') throw new EmptyCollectionError('tail');
    return new List(this._size - 1, node.tail);
  }

  /** @throws EmptyCollectionError */
  uncons(): [T, List<T>] {
    const node = this._root;
    if (node.kind === 'nil') throw new EmptyCollectionError('uncons');
    return [node.head, new List(this._size - 1, node.tail)];
  }

  /** O(n). @throws EmptyCollectionError */
  last(): T {
    const node = this._root;
    if (node.kind === 'nil') throw new EmptyCollectionError('last');
    let cur: Cons<T> = node;
    for (let next = cur.tail; next.kind === 'cons'; next = next.tail) {
      cur = next;
    }
    return cur.head;
  }

  /** All elements but the last; O(n), shares nothing. @throws EmptyCollectionError */
  init(): List<T> {
    if (this._size === 0) throw new EmptyCollectionError('init');
    return this.take(this._size - 1);
  }

  /** O(index). @throws IndexOutOfRangeError */
  get(index: number): T {
    let i = 0;
    for (let node = this._root; node.kind === 'cons'; node = node.tail, i++) {
      if (i === index) return node.head;
    }
    throw new IndexOutOfRangeError(index, this._size);
  }

  // ===== Traversal =====

  foreach(f: (value: T) => void): void {
    nodeForEach(this._root, f);
  }

  [Symbol.iterator](): Iterator<T> {
    return nodeIter(this._root);
  }

  begin(): ListCursor<T> {
    return new ListCursor(this._root);
  }

  end(): ListCursor<T> {
    return ListCursor.end<T>();
  }

  // ===== Transformations =====

  /** `f` is applied to every element exactly once, head to tail. */
  map<B>(f: (value: T) => B): List<B> {
    const buf: B[] = [];
    nodeForEach(this._root, v => buf.push(f(v)));
    return List.fromBuffer(buf);
  }

  filter<S extends T>(p: (value: T) => value is S): List<S>;
  filter(p: (value: T) => boolean): List<T>;
  filter(p: (value: T) => boolean): List<T> {
    const buf: T[] = [];
    nodeForEach(this._root, v => {
      if (p(v)) buf.push(v);
    });
    return List.fromBuffer(buf);
  }

  filterNot(p: (value: T) => boolean): List<T> {
    return this.filter(v => !p(v));
  }

  reverse(): List<T> {
    let node: Node<T> = NIL;
    for (let cur = this._root; cur.kind === 'cons'; cur = cur.tail) {
      node = createCons(cur.head, node);
    }
    return new List<T>(this._size, node);
  }

  flatMap<B>(f: (value: T) => List<B>): List<B> {
    const buf: B[] = [];
    nodeForEach(this._root, v => {
      nodeForEach(f(v)._root, w => buf.push(w));
    });
    return List.fromBuffer(buf);
  }

  flatten<B>(this: List<List<B>>): List<B> {
    return this.flatMap(sub => sub);
  }

  // ===== Positional =====

  /** First min(n, size) elements; a fresh chain unless that is the whole list. */
  take(n: number): List<T> {
    const count = Math.min(toCount(n), this._size);
    if (count === this._size) return this;
    return List.fromBuffer(nodeTake(this._root, count));
  }

  takeRight(n: number): List<T> {
    return this.drop(this._size - Math.min(toCount(n), this._size));
  }

  takeWhile(p: (value: T) => boolean): List<T> {
    const buf: T[] = [];
    for (let node = this._root; node.kind === 'cons' && p(node.head); node = node.tail) {
      buf.push(node.head);
    }
    return List.fromBuffer(buf);
  }

  /** Shares the remaining suffix node-for-node. */
  drop(n: number): List<T> {
    const count = toCount(n);
    if (count >= this._size) return List.empty<T>();
    return new List(this._size - count, nodeDrop(this._root, count));
  }

  dropRight(n: number): List<T> {
    return this.take(this._size - Math.min(toCount(n), this._size));
  }

  /** Shares the suffix starting at the first element failing `p`. */
  dropWhile(p: (value: T) => boolean): List<T> {
    let size = this._size;
    let node = this._root;
    while (node.kind === 'cons' && p(node.head)) {
      node = node.tail;
      size--;
    }
    return new List(size, node);
  }

  slice(from: number, until: number): List<T> {
    const start = toCount(from);
    const end = toCount(until);
    if (start >= end || start >= this._size) return List.empty<T>();
    return this.drop(start).take(end - start);
  }

  /**
   * Replace the element at `index`. Rebuilds the prefix up to and including
   * `index`; the suffix after it is shared.
   * @throws IndexOutOfRangeError
   */
  updated(index: number, value: T): List<T> {
    const prefix: T[] = [];
    for (let node = this._root; node.kind === 'cons'; node = node.tail) {
      if (prefix.length === index) {
        prefix.push(value);
        return new List(this._size, nodeFromBuffer(prefix, node.tail));
      }
      prefix.push(node.head);
    }
    throw new IndexOutOfRangeError(index, this._size);
  }

  /** O(1); shares this whole chain. */
  prepend(value: T): List<T> {
    return List.cons(value, this);
  }

  /** Copies this list's elements in front of `that`, whose chain is shared. */
  concat(that: List<T>): List<T> {
    if (this._size === 0) return that;
    if (that._size === 0) return this;
    return List.fromBuffer(nodeToArray(this._root), that);
  }

  // ===== Folds, scans, reductions =====

  /**
   * Evaluation order is unspecified: `op` must be associative and `z` neutral
   * for it. Currently a left fold.
   */
  fold(z: T, op: (a: T, b: T) => T): T {
    return this.foldLeft(z, op);
  }

  foldLeft<B>(z: B, op: (acc: B, value: T) => B): B {
    let acc = z;
    nodeForEach(this._root, v => {
      acc = op(acc, v);
    });
    return acc;
  }

  foldRight<B>(z: B, op: (value: T, acc: B) => B): B {
    const buf = nodeToArray(this._root);
    let acc = z;
    for (let i = buf.length - 1; i >= 0; i--) {
      acc = op(buf[i], acc);
    }
    return acc;
  }

  sum(this: List<number>): number {
    return this.foldLeft(0, (a, b) => a + b);
  }

  product(this: List<number>): number {
    return this.foldLeft(1, (a, b) => a * b);
  }

  /** Prefix scan with an associative `op` and neutral `z`. */
  scan(z: T, op: (a: T, b: T) => T): List<T> {
    return this.scanLeft(z, op);
  }

  /** size + 1 results, `z` first. */
  scanLeft<B>(z: B, op: (acc: B, value: T) => B): List<B> {
    const buf: B[] = [z];
    let acc = z;
    nodeForEach(this._root, v => {
      acc = op(acc, v);
      buf.push(acc);
    });
    return List.fromBuffer(buf);
  }

  /** size + 1 results, `z` last. */
  scanRight<B>(z: B, op: (value: T, acc: B) => B): List<B> {
    const buf = nodeToArray(this._root);
    let acc = z;
    let node: Node<B> = createCons(z, NIL);
    for (let i = buf.length - 1; i >= 0; i--) {
      acc = op(buf[i], acc);
      node = createCons(acc, node);
    }
    return new List(this._size + 1, node);
  }

  /** @throws EmptyCollectionError */
  reduce(op: (a: T, b: T) => T): T {
    if (this._size === 0) throw new EmptyCollectionError('reduce');
    return this.reduceLeft(op);
  }

  /** @throws EmptyCollectionError */
  reduceLeft(op: (acc: T, value: T) => T): T {
    const node = this._root;
    if (node.kind === 'nil') throw new EmptyCollectionError('reduceLeft');
    return new List(this._size - 1, node.tail).foldLeft(node.head, op);
  }

  /** @throws EmptyCollectionError */
  reduceRight(op: (value: T, acc: T) => T): T {
    if (this._size === 0) throw new EmptyCollectionError('reduceRight');
    const buf = nodeToArray(this._root);
    let acc = buf[buf.length - 1];
    for (let i = buf.length - 2; i >= 0; i--) {
      acc = op(buf[i], acc);
    }
    return acc;
  }

  // ===== Queries =====

  /** Stops at the first element satisfying `p`. */
  exists(p: (value: T) => boolean): boolean {
    for (let node = this._root; node.kind === 'cons'; node = node.tail) {
      if (p(node.head)) return true;
    }
    return false;
  }

  /** Stops at the first element violating `p`. */
  forall(p: (value: T) => boolean): boolean {
    for (let node = this._root; node.kind === 'cons'; node = node.tail) {
      if (!p(node.head)) return false;
    }
    return true;
  }

  contains(value: T): boolean {
    return this.exists(v => elementEquals(v, value));
  }

  count(p: (value: T) => boolean): number {
    let n = 0;
    nodeForEach(this._root, v => {
      if (p(v)) n++;
    });
    return n;
  }

  countOf(value: T): number {
    return this.count(v => elementEquals(v, value));
  }

  // ===== Ordering =====

  /** O(n log n). Equal elements keep their source order when `stable` is set. */
  sorted(options: SortOptions<T> = {}): List<T> {
    const lt: LessThan<T> = options.lt ?? defaultLessThan;
    const buf = nodeToArray(this._root);
    if (options.stable) {
      stableSort(buf, lt);
    } else {
      unstableSort(buf, lt);
    }
    return List.fromBuffer(buf);
  }

  // ===== Pairing =====

  /** Pairs of corresponding elements, truncated to the shorter list. */
  zip<B>(that: List<B>): List<[T, B]> {
    const buf: [T, B][] = [];
    let a = this._root;
    let b = that._root;
    while (a.kind === 'cons' && b.kind === 'cons') {
      buf.push([a.head, b.head]);
      a = a.tail;
      b = b.tail;
    }
    return List.fromBuffer(buf);
  }

  // ===== Equality & conversion =====

  /**
   * Element-wise equality. With the default `eq`, a node shared by both
   * chains at the same position ends the walk; a custom `eq` sees every pair.
   */
  equals(that: List<T>, eq: Equality<T> = elementEquals): boolean {
    if (this === that) return true;
    if (this._size !== that._size) return false;
    let a = this._root;
    let b = that._root;
    while (a.kind === 'cons' && b.kind === 'cons') {
      if (a === b && eq === elementEquals) return true;
      if (!eq(a.head, b.head)) return false;
      a = a.tail;
      b = b.tail;
    }
    return true;
  }

  toArray(): T[] {
    return nodeToArray(this._root);
  }

  toJSON(): T[] {
    return this.toArray();
  }

  toString(): string {
    return `List(${this.toArray().map(String).join(', ')})`;
  }
}

// =====================================================
// Public helpers
// =====================================================

/**
 * Create a List from the given values, in order.
 */
export function list<T>(...values: T[]): List<T> {
  return List.of(...values);
}

export function isList(value: unknown): value is List<unknown> {
  return value instanceof List;
}
