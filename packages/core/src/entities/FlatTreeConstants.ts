/**
 * Configuration constants for FlatTree operations
 *
 * Values that do not vary per deployment live here; tunables read from the
 * environment live in `utils/config.ts`.
 */

/**
 * Special node positions and parent-link values
 */
export const TREE_INDICES = {
  /** Position of the root node; the root's parent link always holds this value */
  ROOT: 0,

  /** Parent link written into slots created by `resize` until they are wired */
  UNASSIGNED_PARENT: 0xffffffff,

  /** Largest position a parent link can address */
  MAX_INDEX: 0xfffffffe,
} as const;

/**
 * Storage growth constants
 */
export const STORAGE_CONFIG = {
  /** Smallest parent-index buffer ever allocated */
  MIN_CAPACITY: 2,
} as const;

/**
 * How `traverse` applies its callback: one after another, or all started
 * before any is awaited
 */
export type ExecutionMode = 'sequential' | 'concurrent';
