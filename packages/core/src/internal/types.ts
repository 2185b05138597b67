/**
 * Core type definitions
 */

// Terminal node; every chain ends in exactly one
export interface Nil {
  readonly kind: 'nil';
}

// Element node; `tail` may be shared by any number of chains
export interface Cons<T> {
  readonly kind: 'cons';
  readonly head: T;
  readonly tail: Node<T>;
}

export type Node<T> = Nil | Cons<T>;

// Less-than comparator used by sorting
export type LessThan<T> = (a: T, b: T) => boolean;

// Element equality used by equals / contains / countOf
export type Equality<T> = (a: T, b: T) => boolean;
