/**
 * Benchmark: traversal combinators - List vs Native
 */

import { bench, describe } from 'vitest';
import { List } from '../packages/core/src/index';

// ===== Setup =====
const LARGE = 10000;

function createArray(size: number): number[] {
  return Array.from({ length: size }, (_, i) => (i * 7919) % size);
}

const nativeLarge = createArray(LARGE);
const listLarge = List.from(nativeLarge);

describe('Large list (10000 items) - map', () => {
  bench('Native', () => {
    nativeLarge.map(x => x * 2);
  });

  bench('List', () => {
    listLarge.map(x => x * 2);
  });
});

describe('Large list (10000 items) - filter', () => {
  bench('Native', () => {
    nativeLarge.filter(x => x % 3 === 0);
  });

  bench('List', () => {
    listLarge.filter(x => x % 3 === 0);
  });
});

describe('Large list (10000 items) - foldLeft', () => {
  bench('Native reduce', () => {
    nativeLarge.reduce((a, b) => a + b, 0);
  });

  bench('List', () => {
    listLarge.foldLeft(0, (a, b) => a + b);
  });
});

describe('Large list (10000 items) - sorted', () => {
  bench('Native (copy + sort)', () => {
    nativeLarge.slice().sort((a, b) => a - b);
  });

  bench('List unstable', () => {
    listLarge.sorted();
  });

  bench('List stable', () => {
    listLarge.sorted({ stable: true });
  });
});

describe('Large list (10000 items) - reverse', () => {
  bench('Native (copy + reverse)', () => {
    nativeLarge.slice().reverse();
  });

  bench('List', () => {
    listLarge.reverse();
  });
});
