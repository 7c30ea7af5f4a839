/**
 * Tree-specific error classes
 *
 * Contract violations (bad indices, malformed bulk input) and detected
 * corruption of the storage invariants.
 */

import { FlatTreeError } from './base.js';

/**
 * Base class for errors raised by the tree engine
 */
export abstract class TreeError extends FlatTreeError {
  constructor(
    message: string,
    component: string,
    operation?: string,
    context?: Record<string, unknown>
  ) {
    super(message, `tree.${component}`, operation, context);
  }
}

/**
 * Thrown when a caller breaks a precondition: an index that is not a
 * position in the tree, or construction input that does not describe a tree.
 */
export class InvalidArgumentError extends TreeError {
  constructor(
    message: string,
    operation: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'storage', operation, context);
  }
}

/**
 * Thrown when an index is outside `0..size-1`
 */
export class IndexOutOfRangeError extends InvalidArgumentError {
  constructor(
    public readonly index: number,
    public readonly size: number,
    operation: string,
    context?: Record<string, unknown>
  ) {
    super(`Node index ${index} is out of range (size ${size})`, operation, {
      ...context,
      index,
      size,
    });
  }
}

/**
 * Thrown when the two backing sequences disagree in length or the root
 * no longer points at itself. Only reachable after an earlier invariant
 * breach (e.g. a misused `resize`/`setParentIndex`).
 */
export class StructuralIntegrityError extends TreeError {
  constructor(
    message: string,
    operation: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'storage', operation, context);
  }
}
