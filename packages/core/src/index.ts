/**
 * FlatTree Core - a single-parent tree stored as two contiguous columns
 *
 * Entry point for library consumers. Error classes are also available from
 * `@flat-tree/core/errors`.
 */

// Storage engine
export {
  FlatTree,
  StableFlatTree,
  ROOT_ID,
  TREE_INDICES,
  type FlatTreeOptions,
  type IndexSink,
  type SequentialVisitor,
  type ConcurrentVisitor,
  type ExecutionMode,
  type NodeId,
} from './entities/index.js';

// Validation
export {
  validateFlatTree,
  validateSequences,
  validateFlatTreeData,
  type ValidationResult,
  type ValidationError,
  type ValidationWarning,
  type ValidationOptions,
} from './entities/index.js';

export {
  createFlatTreeDataSchema,
  parentIndex,
  parentIndexes,
  type FlatTreeData,
} from './schemas/flatTree.js';

// Diagnostics
export { renderFlat, renderGrouped, type ValueFormatter } from './utils/render.js';

// Errors
export {
  FlatTreeError,
  TreeError,
  InvalidArgumentError,
  IndexOutOfRangeError,
  StructuralIntegrityError,
  wrapError,
  isFlatTreeError,
  extractErrorDetails,
} from './errors/index.js';

// Configuration and logging
export { cfg, configSchema, type AppConfig } from './utils/config.js';
export {
  logger,
  createModuleLogger,
  createLoggerFactory,
  LoggerFactory,
  startTimer,
  logError,
  type Logger,
} from './utils/logger.js';
