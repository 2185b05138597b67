/**
 * Structural sharing - which operations reuse existing nodes
 */

import { List, LIST_STATE, type Node } from '../packages/core/src/index';

function rootOf<T>(xs: List<T>): Node<T> {
  return xs[LIST_STATE].root;
}

console.log('=== Structural sharing ===\n');

const base = List.of('b', 'c', 'd');

// ===== prepend shares everything =====
const withA = base.prepend('a');
console.log('prepend:', withA.toString());
console.log('withA.tail() shares base:', rootOf(withA.tail()) === rootOf(base));

// ===== drop shares the suffix =====
const dropped = withA.drop(2);
console.log('\ndrop(2):', dropped.toString());
console.log('shares base.tail():', rootOf(dropped) === rootOf(base.tail()));

// ===== updated rebuilds only the prefix =====
const changed = withA.updated(1, 'B');
console.log('\nupdated(1, "B"):', changed.toString());
console.log('shares suffix after index 1:', rootOf(changed.drop(2)) === rootOf(base.tail()));

// ===== take cannot share =====
const taken = withA.take(2);
console.log('\ntake(2):', taken.toString());
console.log('shares with withA:', rootOf(taken) === rootOf(withA));

console.log('\nEqual by value regardless of sharing:', List.of('a', 'b').equals(taken));
