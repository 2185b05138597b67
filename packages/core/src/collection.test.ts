/**
 * Tests for sorting, zipping, equality and cursors
 */

import { describe, it, expect } from 'vitest';
import { List, ListCursor, IndexOutOfRangeError } from './index';

describe('sorted', () => {
  it('should sort with the default comparator', () => {
    expect(List.of(3, 1, 2).sorted().equals(List.of(1, 2, 3))).toBe(true);
    expect([...List.of('pear', 'fig', 'apple').sorted()]).toEqual(['apple', 'fig', 'pear']);
    expect(List.empty<number>().sorted().isEmpty()).toBe(true);
  });

  it('should sort with a custom comparator', () => {
    const desc = List.of(3, 1, 2).sorted({ lt: (a, b) => a > b });
    expect([...desc]).toEqual([3, 2, 1]);
  });

  it('should keep equal elements in source order when stable', () => {
    const people = List.of(
      { name: 'ann', age: 30 },
      { name: 'bob', age: 25 },
      { name: 'cat', age: 30 },
      { name: 'dan', age: 25 },
      { name: 'eve', age: 20 },
    );
    const byAge = people.sorted({ lt: (a, b) => a.age < b.age, stable: true });
    expect(byAge.map(p => p.name).toArray()).toEqual(['eve', 'bob', 'dan', 'ann', 'cat']);
  });

  it('should sort lists of repeated keys in n log n comparisons', () => {
    const n = 10000;
    let calls = 0;
    const lt = (a: number, b: number) => {
      calls++;
      return a < b;
    };
    const sevens = List.from(Array.from({ length: n }, () => 7));
    const statuses = List.from(Array.from({ length: n }, (_, i) => (i * 31) % 3));

    expect(sevens.sorted({ lt }).forall(x => x === 7)).toBe(true);
    const sorted = statuses.sorted({ lt });
    expect(sorted.countOf(0)).toBe(3334);
    expect(sorted.take(3334).forall(x => x === 0)).toBe(true);
    expect(sorted.drop(6667).forall(x => x === 2)).toBe(true);
    expect(calls).toBeLessThan(2 * 8 * n * Math.log2(n));
  });

  it('should sort long lists in both modes', () => {
    const xs = List.from(Array.from({ length: 300 }, (_, i) => (i * 7) % 300));
    const expected = Array.from({ length: 300 }, (_, i) => i);
    expect(xs.sorted().toArray()).toEqual(expected);
    expect(xs.sorted({ stable: true }).toArray()).toEqual(expected);
    expect(xs.sorted().size).toBe(300);
  });
});

describe('zip', () => {
  it('should pair elements and truncate to the shorter list', () => {
    const zipped = List.of(1, 2).zip(List.of('a', 'b', 'c'));
    expect(zipped.equals(List.of<[number, string]>([1, 'a'], [2, 'b']), (x, y) => x[0] === y[0] && x[1] === y[1])).toBe(
      true,
    );
    expect(zipped.toArray()).toEqual([
      [1, 'a'],
      [2, 'b'],
    ]);
  });

  it('should zip with an empty list to an empty list', () => {
    expect(List.of(1, 2).zip(List.empty<string>()).isEmpty()).toBe(true);
    expect(List.empty<number>().zip(List.of('a')).size).toBe(0);
  });
});

describe('equality', () => {
  it('should compare element sequences, not nodes', () => {
    const a = List.of(1, 2, 3);
    const b = List.cons(1, List.of(2, 3));
    expect(a.equals(b)).toBe(true);
    expect(a.equals(a)).toBe(true);
  });

  it('should reject lists of different size or content', () => {
    expect(List.of(1, 2).equals(List.of(1, 2, 3))).toBe(false);
    expect(List.of(1, 2, 3).equals(List.of(1, 2, 4))).toBe(false);
    expect(List.empty<number>().equals(List.empty<number>())).toBe(true);
  });

  it('should compare nested lists structurally', () => {
    const a = List.of(List.of(1), List.of(2, 3));
    const b = List.of(List.of(1), List.of(2, 3));
    expect(a.equals(b)).toBe(true);
  });

  it('should accept a custom element equality', () => {
    const a = List.of('A', 'b');
    const b = List.of('a', 'B');
    expect(a.equals(b)).toBe(false);
    expect(a.equals(b, (x, y) => x.toLowerCase() === y.toLowerCase())).toBe(true);
  });

  it('should compare lists sharing a suffix', () => {
    const shared = List.of(3, 4);
    const a = shared.prepend(2).prepend(1);
    const b = List.cons(1, List.cons(2, shared));
    expect(a.equals(b)).toBe(true);
    expect(a.equals(shared.prepend(9).prepend(1))).toBe(false);
  });

  it('should hand every pair to a custom equality, shared nodes included', () => {
    const shared = List.of(3, 4);
    const a = shared.prepend(2).prepend(1);
    const b = List.cons(1, List.cons(2, shared));
    const pairs: [number, number][] = [];
    expect(
      a.equals(b, (x, y) => {
        pairs.push([x, y]);
        return x === y;
      }),
    ).toBe(true);
    expect(pairs).toEqual([
      [1, 1],
      [2, 2],
      [3, 3],
      [4, 4],
    ]);
  });
});

describe('iteration and cursors', () => {
  it('should iterate head to tail', () => {
    const xs = List.of('x', 'y', 'z');
    const seen: string[] = [];
    xs.foreach(v => seen.push(v));
    expect(seen).toEqual(['x', 'y', 'z']);

    const viaFor: string[] = [];
    for (const v of xs) viaFor.push(v);
    expect(viaFor).toEqual(['x', 'y', 'z']);
  });

  it('should walk from begin to end', () => {
    const xs = List.of(1, 2, 3);
    const out: number[] = [];
    for (let c = xs.begin(); !c.equals(xs.end()); c = c.next()) {
      out.push(c.value);
    }
    expect(out).toEqual([1, 2, 3]);
  });

  it('should start at end for an empty list', () => {
    const xs = List.empty<number>();
    expect(xs.begin().equals(xs.end())).toBe(true);
    expect(xs.begin().done).toBe(true);
  });

  it('should compare cursors by node identity', () => {
    const xs = List.of(1, 2);
    const ys = List.of(1, 2);
    expect(xs.begin().equals(xs.begin())).toBe(true);
    expect(xs.begin().equals(ys.begin())).toBe(false);
    expect(xs.tail().begin().equals(xs.begin().next())).toBe(true);
    expect(xs.end().equals(ListCursor.end())).toBe(true);
  });

  it('should refuse to dereference or advance the end cursor', () => {
    const end = List.of(1).end();
    expect(() => end.value).toThrow(IndexOutOfRangeError);
    expect(() => end.next()).toThrow('dereference of end cursor');
  });
});
