import { z } from 'zod';
import { TREE_INDICES } from '../entities/FlatTreeConstants.js';

// A parent link: any 32-bit unsigned position, including the
// UNASSIGNED_PARENT sentinel written by resize
export const parentIndex = z
  .number()
  .int('Parent links must be integers')
  .min(0, 'Parent links cannot be negative')
  .max(TREE_INDICES.UNASSIGNED_PARENT, 'Parent link exceeds 32 bits');

export const parentIndexes = z.array(parentIndex).min(1, 'A tree needs at least a root node');

/**
 * Schema for `{ values, parents }` with the column invariants checked:
 * equal lengths and a self-linked root.
 */
export function createFlatTreeDataSchema<T>(valueSchema: z.ZodType<T>) {
  return z
    .object({
      values: z.array(valueSchema).min(1, 'A tree needs at least a root node'),
      parents: parentIndexes,
    })
    .refine((data) => data.values.length === data.parents.length, {
      message: 'Value and parent sequences differ in length',
      path: ['parents'],
    })
    .refine((data) => data.parents[TREE_INDICES.ROOT] === TREE_INDICES.ROOT, {
      message: 'The root node must be its own parent',
      path: ['parents', TREE_INDICES.ROOT],
    });
}

export type FlatTreeData<T> = {
  values: T[];
  parents: number[];
};
