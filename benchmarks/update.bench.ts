/**
 * Benchmark: persistent updates - List vs Native copy vs Immer
 */

import { bench, describe } from 'vitest';
import { produce as immerProduce } from 'immer';
import { List } from '../packages/core/src/index';

// ===== Setup =====
const SIZE = 1000;
const nativeArr = Array.from({ length: SIZE }, (_, i) => i);
const list = List.from(nativeArr);

describe('Add one item at the front', () => {
  bench('Native (copy)', () => {
    [-1, ...nativeArr];
  });

  bench('List prepend()', () => {
    list.prepend(-1);
  });

  bench('Immer produce()', () => {
    immerProduce(nativeArr, draft => {
      draft.unshift(-1);
    });
  });
});

describe('Single update at index 10', () => {
  bench('Native (copy)', () => {
    const copy = nativeArr.slice();
    copy[10] = 999;
    copy;
  });

  bench('List updated()', () => {
    list.updated(10, 999);
  });

  bench('Immer produce()', () => {
    immerProduce(nativeArr, draft => {
      draft[10] = 999;
    });
  });
});

// ===== Suffix access =====
describe('Drop the first 500 items', () => {
  bench('Native', () => {
    nativeArr.slice(500);
  });

  bench('List drop()', () => {
    list.drop(500);
  });
});

describe('Concat two halves', () => {
  const left = nativeArr.slice(0, 500);
  const right = nativeArr.slice(500);
  const leftList = List.from(left);
  const rightList = List.from(right);

  bench('Native', () => {
    left.concat(right);
  });

  bench('List concat()', () => {
    leftList.concat(rightList);
  });
});
