import { describe, expect, it } from 'vitest';
import { validateFlatTree } from '../src/entities/FlatTreeValidation.js';
import {
  ascending,
  bruteForceDescendants,
  buildRandomTree,
  createRandom,
  parentLabels,
  randomInt,
} from './testUtils.js';

describe('FlatTree properties', () => {
  it('keeps both columns consistent across random inserts and removals', () => {
    const random = createRandom(42);
    const tree = buildRandomTree(40, 1);
    let nextLabel = 40;

    for (let step = 0; step < 400; step++) {
      const size = tree.size();

      if (size < 3 || random() < 0.6) {
        const parent = randomInt(random, size);
        expect(tree.insert(parent, `n${nextLabel++}`)).toBe(true);
        expect(tree.size()).toBe(size + 1);
        expect(tree.getParentIndex(size)).toBe(parent);
      } else {
        const target = randomInt(random, size);
        const doomed = bruteForceDescendants(tree, target);
        if (target !== 0) doomed.push(target);
        const doomedLabels = new Set(doomed.map((index) => tree.get(index)));
        const before = parentLabels(tree);

        const removed = tree.remove(target);

        if (doomed.length === (target === 0 ? 0 : 1)) {
          expect(removed).toBe(false);
          expect(tree.size()).toBe(size);
        } else {
          expect(removed).toBe(true);
          expect(tree.size()).toBe(size - doomedLabels.size);

          // Survivors keep their parent even though slots moved
          const after = parentLabels(tree);
          expect(after.size).toBe(before.size - doomedLabels.size);
          for (const [label, parent] of after) {
            expect(doomedLabels.has(label)).toBe(false);
            expect(before.get(label)).toBe(parent);
          }
        }
      }

      const data = tree.toPlainObject();
      expect(data.values.length).toBe(data.parents.length);
      expect(data.parents[0]).toBe(0);
      expect(validateFlatTree(tree).errors).toEqual([]);
    }
  });

  it('finds exactly the transitive descendants of every node', () => {
    const tree = buildRandomTree(200, 7);

    for (let parent = 0; parent < tree.size(); parent++) {
      const out: number[] = [];
      const found = tree.getAllDescendants(parent, out);
      const expected = bruteForceDescendants(tree, parent);

      expect(found).toBe(expected.length > 0);
      expect(new Set(out).size).toBe(out.length);
      expect(ascending(out)).toEqual(expected);

      // Every node is listed after its own parent
      const position = new Map(out.map((index, k) => [index, k]));
      for (const index of out) {
        const own = tree.getParentIndex(index);
        if (own !== parent) {
          expect(position.get(own)).toBeLessThan(position.get(index) ?? -1);
        }
      }
    }
  });

  it('visits each descendant exactly once in both traversal modes', async () => {
    const tree = buildRandomTree(120, 3);

    for (const start of [0, 1, 5, 17]) {
      const expected = bruteForceDescendants(tree, start);

      const sequential: number[] = [];
      tree.traverse(start, 'sequential', (value, index) => {
        sequential.push(index);
        return value;
      });
      expect(ascending(sequential)).toEqual(expected);

      const concurrent: number[] = [];
      await tree.traverse(start, 'concurrent', async (value, index) => {
        concurrent.push(index);
        return value;
      });
      expect(ascending(concurrent)).toEqual(expected);
    }
  });

  it('agrees between counting, lookup and child listing', () => {
    const tree = buildRandomTree(150, 11);

    for (let index = 0; index < tree.size(); index++) {
      const childCount = tree.getChildren(index).length;
      expect(tree.getNumOfDescendants(index)).toBe(childCount);
      expect(tree.doesIndexExist(index)).toBe(index === 0 || childCount > 0);
    }
  });

  it('returns identical answers from the linear and chunked scans', () => {
    const chunked = buildRandomTree(3000, 9, { scanThreshold: 0, scanChunkSize: 64 });
    const linear = buildRandomTree(3000, 9, { scanThreshold: Number.POSITIVE_INFINITY });

    expect(chunked.toPlainObject()).toEqual(linear.toPlainObject());

    let total = 0;
    for (let index = 0; index <= 3000; index++) {
      const count = chunked.getNumOfDescendants(index);
      expect(count).toBe(linear.getNumOfDescendants(index));
      expect(chunked.doesIndexExist(index)).toBe(linear.doesIndexExist(index));
      total += count;
    }
    expect(total).toBe(2999);
  });
});
