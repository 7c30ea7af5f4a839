/**
 * Centralized error handling for FlatTree
 */

// Base error classes and utilities
export {
  FlatTreeError,
  wrapError,
  isFlatTreeError,
  extractErrorDetails,
} from './base.js';

// Tree engine errors
export {
  TreeError,
  InvalidArgumentError,
  IndexOutOfRangeError,
  StructuralIntegrityError,
} from './tree.js';
