/**
 * Core constants for sharelist data structures
 */

import type { Nil } from './types';

// Canonical terminal node, shared by every list regardless of element type
export const NIL: Nil = Object.freeze({ kind: 'nil' as const });

// Symbol for internal state access
export const LIST_STATE = Symbol('LIST_STATE');

// Error messages
export const MSG_INDEX_OUT_OF_RANGE = 'index out of range';
export const MSG_END_CURSOR = 'dereference of end cursor';

export function emptyMessage(operation: string): string {
  return operation === 'head' || operation === 'tail' || operation === 'last' || operation === 'init'
    ? `${operation} of empty list`
    : `${operation} on empty list`;
}
