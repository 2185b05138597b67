/**
 * Simple usage - building and transforming persistent lists
 */

import { List, EmptyCollectionError } from '../packages/core/src/index';

console.log('=== sharelist: persistent lists ===\n');

// ===== Construction =====
console.log('1️⃣ Create lists');
const xs = List.of(1, 2, 4, 5, 6);
console.log('List.of(1, 2, 4, 5, 6):', xs.toString());
console.log('List.from(new Set([3, 1, 2])):', List.from(new Set([3, 1, 2])).toString());
console.log('size:', xs.size);

// ===== Transformations =====
console.log('\n2️⃣ Every operation returns a new list');
const odds = xs.filterNot(x => x % 2 === 0);
const squares = xs.map(x => x * x);
console.log('filterNot(even):', odds.toString());
console.log('map(x => x * x):', squares.toString());
console.log('original:', xs.toString());
console.log('✅ Original unchanged');

// ===== Folds =====
console.log('\n3️⃣ Folds and scans');
console.log('foldLeft(0, +):', xs.foldLeft(0, (a, b) => a + b));
console.log('scanLeft(0, +):', xs.scanLeft(0, (a, b) => a + b).toString());
console.log('sum / product:', xs.sum(), xs.product());

// ===== Ordering & pairing =====
console.log('\n4️⃣ Sorting and zipping');
console.log('List.of(3, 1, 2).sorted():', List.of(3, 1, 2).sorted().toString());
console.log('zip:', JSON.stringify(List.of(1, 2).zip(List.of('a', 'b', 'c'))));

// ===== Errors =====
console.log('\n5️⃣ Contract violations throw');
try {
  List.empty<number>().head();
} catch (err) {
  if (!(err instanceof EmptyCollectionError)) throw err;
  console.log(`${err.name}: ${err.message}`);
}
