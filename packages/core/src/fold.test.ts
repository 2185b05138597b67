/**
 * Tests for folds, scans, reductions and queries
 */

import { describe, it, expect } from 'vitest';
import { List } from './index';

const add = (a: number, b: number) => a + b;

describe('folds', () => {
  it('should fold left', () => {
    expect(List.of(1, 2, 3).foldLeft(0, add)).toBe(6);
    expect(List.empty<number>().foldLeft(0, add)).toBe(0);
  });

  it('should fold left and right in opposite orders', () => {
    const xs = List.of('a', 'b', 'c');
    expect(xs.foldLeft('', (acc, x) => acc + x)).toBe('abc');
    expect(xs.foldRight('', (x, acc) => acc + x)).toBe('cba');
    expect(xs.foldRight('z', (x, acc) => `(${x}${acc})`)).toBe('(a(b(cz)))');
  });

  it('should fold with an associative operator', () => {
    expect(List.of(2, 3, 4).fold(1, (a, b) => a * b)).toBe(24);
  });

  it('should sum and multiply', () => {
    expect(List.of(1, 2, 3, 4).sum()).toBe(10);
    expect(List.of(1, 2, 3, 4).product()).toBe(24);
    expect(List.empty<number>().sum()).toBe(0);
    expect(List.empty<number>().product()).toBe(1);
  });
});

describe('scans', () => {
  it('should scan left with the seed first', () => {
    const xs = List.of(1, 2, 3).scanLeft(0, add);
    expect([...xs]).toEqual([0, 1, 3, 6]);
    expect(xs.size).toBe(4);
  });

  it('should scan right with the seed last', () => {
    const xs = List.of(1, 2, 3).scanRight(0, add);
    expect([...xs]).toEqual([6, 5, 3, 0]);
    expect(xs.size).toBe(4);
  });

  it('should scan an empty list to just the seed', () => {
    expect([...List.empty<number>().scanLeft(7, add)]).toEqual([7]);
    expect([...List.empty<number>().scanRight(7, add)]).toEqual([7]);
  });

  it('should scan with an associative operator', () => {
    expect([...List.of(1, 2, 3).scan(0, add)]).toEqual([0, 1, 3, 6]);
  });

  it('should scan into a different result type', () => {
    const lengths = List.of('ab', 'c').scanLeft(0, (n, s) => n + s.length);
    expect([...lengths]).toEqual([0, 2, 3]);
  });
});

describe('reductions', () => {
  const sub = (a: number, b: number) => a - b;

  it('should reduce from the left', () => {
    expect(List.of(10, 2, 3).reduceLeft(sub)).toBe(5);
    expect(List.of(10, 2, 3).reduce(add)).toBe(15);
  });

  it('should reduce from the right', () => {
    // 10 - (2 - 3)
    expect(List.of(10, 2, 3).reduceRight(sub)).toBe(11);
  });

  it('should return the only element of a singleton', () => {
    expect(List.single(4).reduceLeft(sub)).toBe(4);
    expect(List.single(4).reduceRight(sub)).toBe(4);
  });
});

describe('queries', () => {
  const xs = List.of(1, 2, 3, 2);

  it('should stop exists at the first match', () => {
    const seen: number[] = [];
    const found = xs.exists(x => {
      seen.push(x);
      return x === 2;
    });
    expect(found).toBe(true);
    expect(seen).toEqual([1, 2]);
    expect(xs.exists(x => x > 5)).toBe(false);
    expect(List.empty<number>().exists(() => true)).toBe(false);
  });

  it('should stop forall at the first violation', () => {
    const seen: number[] = [];
    const all = xs.forall(x => {
      seen.push(x);
      return x < 2;
    });
    expect(all).toBe(false);
    expect(seen).toEqual([1, 2]);
    expect(xs.forall(x => x > 0)).toBe(true);
    expect(List.empty<number>().forall(() => false)).toBe(true);
  });

  it('should check membership', () => {
    expect(xs.contains(3)).toBe(true);
    expect(xs.contains(7)).toBe(false);
    expect(List.of(NaN).contains(NaN)).toBe(true);
  });

  it('should count by value and by predicate without short-circuiting', () => {
    const seen: number[] = [];
    expect(
      xs.count(x => {
        seen.push(x);
        return x === 2;
      }),
    ).toBe(2);
    expect(seen).toEqual([1, 2, 3, 2]);
    expect(xs.countOf(2)).toBe(2);
    expect(xs.countOf(9)).toBe(0);
  });

  it('should compare nested lists by value', () => {
    const nested = List.of(List.of(1, 2), List.of(3));
    expect(nested.contains(List.of(3))).toBe(true);
    expect(nested.countOf(List.of(1, 2))).toBe(1);
  });
});
