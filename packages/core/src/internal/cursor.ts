/**
 * Forward, read-only cursor over a node chain.
 * Two cursors are equal when they point at the same node; every chain ends
 * in the canonical NIL, which doubles as the end position.
 */

import { MSG_END_CURSOR, NIL } from './constants';
import { IndexOutOfRangeError } from './errors';
import type { Node } from './types';

export class ListCursor<T> {
  readonly node: Node<T>;

  constructor(node: Node<T>) {
    this.node = node;
  }

  static end<T>(): ListCursor<T> {
    return new ListCursor<T>(NIL);
  }

  get done(): boolean {
    return this.node.kind === 'nil';
  }

  get value(): T {
    const { node } = this;
    if (node.kind === 'nil') throw new IndexOutOfRangeError(0, 0, MSG_END_CURSOR);
    return node.head;
  }

  next(): ListCursor<T> {
    const { node } = this;
    if (node.kind === 'nil') throw new IndexOutOfRangeError(0, 0, MSG_END_CURSOR);
    return new ListCursor(node.tail);
  }

  equals(other: ListCursor<T>): boolean {
    return this.node === other.node;
  }
}
