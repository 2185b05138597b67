/**
 * Contract violations raised by list operations
 */

import { MSG_INDEX_OUT_OF_RANGE, emptyMessage } from './constants';

export class ListError extends RangeError {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Raised by head / tail / uncons / last / init / reduce* on an empty list.
 */
export class EmptyCollectionError extends ListError {
  readonly operation: string;

  constructor(operation: string) {
    super(emptyMessage(operation));
    this.operation = operation;
  }
}

/**
 * Raised by get / updated for an index outside [0, size), and by cursors
 * dereferenced or advanced at their end.
 */
export class IndexOutOfRangeError extends ListError {
  readonly index: number;
  readonly size: number;

  constructor(index: number, size: number, message = MSG_INDEX_OUT_OF_RANGE) {
    super(message);
    this.index = index;
    this.size = size;
  }
}
