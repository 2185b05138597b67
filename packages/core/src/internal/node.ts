/**
 * Node chain - persistent singly-linked nodes
 * Nodes are never mutated; chains share common suffixes.
 */

import { NIL } from './constants';
import type { Cons, Nil, Node } from './types';

export function createNil(): Nil {
  return NIL;
}

export function createCons<T>(head: T, tail: Node<T>): Cons<T> {
  return { kind: 'cons', head, tail };
}

export function isCons<T>(node: Node<T>): node is Cons<T> {
  return node.kind === 'cons';
}

/**
 * Build a chain from a buffer by prepending its elements last to first onto
 * `tail`, so that `buf[0]` ends up at the head.
 */
export function nodeFromBuffer<T>(buf: readonly T[], tail: Node<T> = NIL): Node<T> {
  let node = tail;
  for (let i = buf.length - 1; i >= 0; i--) {
    node = createCons(buf[i], node);
  }
  return node;
}

export function* nodeIter<T>(node: Node<T>): IterableIterator<T> {
  let n = node;
  while (n.kind === 'cons') {
    yield n.head;
    n = n.tail;
  }
}

export function nodeForEach<T>(node: Node<T>, f: (value: T) => void): void {
  for (let n = node; n.kind === 'cons'; n = n.tail) {
    f(n.head);
  }
}

// Shared suffix after skipping up to `n` nodes
export function nodeDrop<T>(node: Node<T>, n: number): Node<T> {
  let cur = node;
  for (let i = 0; i < n && cur.kind === 'cons'; i++) {
    cur = cur.tail;
  }
  return cur;
}

// Heads of the first `n` nodes (fewer if the chain is shorter)
export function nodeTake<T>(node: Node<T>, n: number): T[] {
  const buf: T[] = [];
  for (let cur = node; buf.length < n && cur.kind === 'cons'; cur = cur.tail) {
    buf.push(cur.head);
  }
  return buf;
}

export function nodeToArray<T>(node: Node<T>): T[] {
  const out: T[] = [];
  nodeForEach(node, v => out.push(v));
  return out;
}
