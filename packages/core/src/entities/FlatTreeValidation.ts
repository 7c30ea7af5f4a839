import { z } from 'zod';
import type { FlatTreeData } from '../schemas/flatTree.js';
import { createFlatTreeDataSchema } from '../schemas/flatTree.js';
import { cfg } from '../utils/config.js';
import type { FlatTree } from './FlatTree.js';
import { TREE_INDICES } from './FlatTreeConstants.js';

/**
 * FlatTreeValidation - structural checks over the two storage columns
 *
 * Works on plain `{ values, parents }` data so that it can diagnose trees the
 * engine itself refuses to operate on.
 */

export interface ValidationResult {
  isValid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

export interface ValidationError {
  type: 'length_mismatch' | 'invalid_root' | 'dangling_parent' | 'cycle';
  index: number;
  message: string;
  details?: Record<string, unknown>;
}

export interface ValidationWarning {
  type: 'unassigned_slot' | 'deep_nesting';
  index: number;
  message: string;
  details?: Record<string, unknown>;
}

export interface ValidationOptions {
  maxDepth?: number;
}

const UNKNOWN = -1;
const BROKEN = -2;

export function validateFlatTree<T>(
  tree: FlatTree<T>,
  options: ValidationOptions = {}
): ValidationResult {
  return validateSequences(tree.toPlainObject(), options);
}

/**
 * Validates raw columns.
 *
 * Errors make the data unusable as a tree; warnings flag slots that exist but
 * are not reachable from the root yet, and suspiciously deep chains.
 *
 * @complexity O(n): each node's ancestor chain is walked once and memoised
 */
export function validateSequences(
  data: FlatTreeData<unknown>,
  options: ValidationOptions = {}
): ValidationResult {
  const maxDepth = options.maxDepth ?? cfg.FLAT_TREE_MAX_DEPTH;
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];
  const { values, parents } = data;

  if (values.length !== parents.length) {
    errors.push({
      type: 'length_mismatch',
      index: TREE_INDICES.ROOT,
      message: `Value column has ${values.length} entries but parent column has ${parents.length}`,
      details: { valueCount: values.length, parentCount: parents.length },
    });
  }

  const n = Math.min(values.length, parents.length);
  if (n === 0) {
    errors.push({
      type: 'invalid_root',
      index: TREE_INDICES.ROOT,
      message: 'Tree has no root node',
    });
    return { isValid: false, errors, warnings };
  }

  if (parents[TREE_INDICES.ROOT] !== TREE_INDICES.ROOT) {
    errors.push({
      type: 'invalid_root',
      index: TREE_INDICES.ROOT,
      message: `Root parent link is ${parents[TREE_INDICES.ROOT]}, expected 0`,
      details: { rootParent: parents[TREE_INDICES.ROOT] },
    });
  }

  for (let i = 1; i < n; i++) {
    const parent = parents[i];
    if (parent === TREE_INDICES.UNASSIGNED_PARENT) {
      warnings.push({
        type: 'unassigned_slot',
        index: i,
        message: `Node ${i} has not been attached to a parent`,
      });
    } else if (parent >= n) {
      errors.push({
        type: 'dangling_parent',
        index: i,
        message: `Node ${i} points at missing parent ${parent}`,
        details: { parent, size: n },
      });
    }
  }

  const depths = computeDepths(parents, n, errors);

  for (let i = 1; i < n; i++) {
    if (depths[i] > maxDepth) {
      warnings.push({
        type: 'deep_nesting',
        index: i,
        message: `Node exceeds maximum depth of ${maxDepth} (current: ${depths[i]})`,
        details: { maxDepth, currentDepth: depths[i] },
      });
    }
  }

  return {
    isValid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Depth of every node that reaches the root; BROKEN for nodes that end in a
 * missing parent or a cycle. Each cycle is reported once, at the first node
 * found to repeat.
 */
function computeDepths(
  parents: readonly number[],
  n: number,
  errors: ValidationError[]
): Int32Array {
  const depths = new Int32Array(n).fill(UNKNOWN);
  depths[TREE_INDICES.ROOT] = 0;

  for (let i = 1; i < n; i++) {
    if (depths[i] !== UNKNOWN) continue;

    const path: number[] = [];
    const onPath = new Set<number>();
    let current = i;
    let base = BROKEN;

    for (;;) {
      if (depths[current] !== UNKNOWN) {
        base = depths[current];
        break;
      }
      if (onPath.has(current)) {
        const cycle = path.slice(path.indexOf(current));
        errors.push({
          type: 'cycle',
          index: current,
          message: `Cycle detected involving node ${current}`,
          details: { cyclePath: cycle },
        });
        break;
      }
      path.push(current);
      onPath.add(current);

      const parent = parents[current];
      if (parent >= n) break;
      current = parent;
    }

    for (let k = path.length - 1, depth = base + 1; k >= 0; k--, depth++) {
      depths[path[k]] = base === BROKEN ? BROKEN : depth;
    }
  }

  return depths;
}

/**
 * Validation helper for `{ values, parents }` input
 */
export function validateFlatTreeData(data: unknown): data is FlatTreeData<unknown> {
  return createFlatTreeDataSchema(z.unknown()).safeParse(data).success;
}
