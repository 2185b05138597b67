/**
 * Internal modules barrel export
 */

// Constants
export {
  NIL,
  LIST_STATE,
  MSG_INDEX_OUT_OF_RANGE,
  MSG_END_CURSOR,
  emptyMessage,
} from './constants';

// Node chain
export {
  createNil,
  createCons,
  isCons,
  nodeFromBuffer,
  nodeIter,
  nodeForEach,
  nodeDrop,
  nodeTake,
  nodeToArray,
} from './node';

// Sorting
export { defaultLessThan, stableSort, unstableSort } from './order';

// Cursor
export { ListCursor } from './cursor';

// Errors
export { ListError, EmptyCollectionError, IndexOutOfRangeError } from './errors';

// Types
export type { Nil, Cons, Node, LessThan, Equality } from './types';
