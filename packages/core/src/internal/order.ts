/**
 * Buffer sorting for List.sorted()
 * Stable mode relies on Array.prototype.sort (stable since ES2019);
 * unstable mode is an in-place three-way quicksort that falls back to heap
 * sort past a depth limit.
 */

import type { LessThan } from './types';

// Below this range length quicksort hands over to insertion sort
const INSERTION_THRESHOLD = 12;

type Numeric = number | bigint;

function isNumeric(v: unknown): v is Numeric {
  return typeof v === 'number' || typeof v === 'bigint';
}

/**
 * Natural `<` for numbers, bigints and strings; other values compare by
 * their string form, as Array.prototype.sort does by default.
 */
export function defaultLessThan(a: unknown, b: unknown): boolean {
  if (isNumeric(a) && isNumeric(b)) return a < b;
  if (typeof a === 'string' && typeof b === 'string') return a < b;
  return String(a) < String(b);
}

export function stableSort<T>(buf: T[], lt: LessThan<T>): T[] {
  return buf.sort((a, b) => (lt(a, b) ? -1 : lt(b, a) ? 1 : 0));
}

export function unstableSort<T>(buf: T[], lt: LessThan<T>): T[] {
  if (buf.length < 2) return buf;
  // Past this partition depth a range is heap sorted instead
  const depthLimit = 2 * Math.floor(Math.log2(buf.length));
  // Pending inclusive [lo, hi, depth] ranges
  const stack: Array<[number, number, number]> = [[0, buf.length - 1, 0]];

  for (let range = stack.pop(); range !== undefined; range = stack.pop()) {
    const [lo, hi, depth] = range;
    if (hi - lo < INSERTION_THRESHOLD) {
      insertionSort(buf, lo, hi, lt);
      continue;
    }
    if (depth >= depthLimit) {
      heapSort(buf, lo, hi, lt);
      continue;
    }

    // Elements equal to the pivot end up in [eqLo, eqHi] and are not revisited
    const [eqLo, eqHi] = partition(buf, lo, hi, lt);
    // Smaller side pushed last so it is popped first
    if (eqLo - lo < hi - eqHi) {
      stack.push([eqHi + 1, hi, depth + 1], [lo, eqLo - 1, depth + 1]);
    } else {
      stack.push([lo, eqLo - 1, depth + 1], [eqHi + 1, hi, depth + 1]);
    }
  }

  return buf;
}

function swap<T>(buf: T[], i: number, j: number): void {
  const t = buf[i];
  buf[i] = buf[j];
  buf[j] = t;
}

function insertionSort<T>(buf: T[], lo: number, hi: number, lt: LessThan<T>): void {
  for (let i = lo + 1; i <= hi; i++) {
    const v = buf[i];
    let j = i - 1;
    while (j >= lo && lt(v, buf[j])) {
      buf[j + 1] = buf[j];
      j--;
    }
    buf[j + 1] = v;
  }
}

function siftDown<T>(buf: T[], lo: number, root: number, count: number, lt: LessThan<T>): void {
  let parent = root;
  for (let child = 2 * parent + 1; child < count; child = 2 * parent + 1) {
    if (child + 1 < count && lt(buf[lo + child], buf[lo + child + 1])) child++;
    if (!lt(buf[lo + parent], buf[lo + child])) return;
    swap(buf, lo + parent, lo + child);
    parent = child;
  }
}

function heapSort<T>(buf: T[], lo: number, hi: number, lt: LessThan<T>): void {
  const count = hi - lo + 1;
  for (let i = (count >> 1) - 1; i >= 0; i--) {
    siftDown(buf, lo, i, count, lt);
  }
  for (let end = count - 1; end > 0; end--) {
    swap(buf, lo, lo + end);
    siftDown(buf, lo, 0, end, lt);
  }
}

// Three-way partition around the median of lo / mid / hi; returns the bounds
// of the band equal to the pivot
function partition<T>(buf: T[], lo: number, hi: number, lt: LessThan<T>): [number, number] {
  const mid = lo + ((hi - lo) >> 1);
  if (lt(buf[mid], buf[lo])) swap(buf, mid, lo);
  if (lt(buf[hi], buf[lo])) swap(buf, hi, lo);
  if (lt(buf[hi], buf[mid])) swap(buf, hi, mid);

  const pivot = buf[mid];
  let less = lo;
  let greater = hi;
  let i = lo;
  while (i <= greater) {
    if (lt(buf[i], pivot)) {
      swap(buf, i, less);
      less++;
      i++;
    } else if (lt(pivot, buf[i])) {
      swap(buf, i, greater);
      greater--;
    } else {
      i++;
    }
  }
  return [less, greater];
}
