/**
 * @fileoverview Entities module - flat tree storage
 *
 * The positional engine (`FlatTree`), its stable-id variant
 * (`StableFlatTree`) and structural validation over raw columns.
 *
 * @module entities
 */

export {
  FlatTree,
  assertSequences,
  type FlatTreeOptions,
  type IndexSink,
  type SequentialVisitor,
  type ConcurrentVisitor,
} from './FlatTree.js';
export { StableFlatTree, ROOT_ID, type NodeId } from './StableFlatTree.js';
export {
  validateFlatTree,
  validateSequences,
  validateFlatTreeData,
  type ValidationResult,
  type ValidationError,
  type ValidationWarning,
  type ValidationOptions,
} from './FlatTreeValidation.js';
export { TREE_INDICES, STORAGE_CONFIG, type ExecutionMode } from './FlatTreeConstants.js';
