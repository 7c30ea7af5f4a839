import { describe, expect, it } from 'vitest';
import { FlatTree } from '../src/entities/FlatTree.js';
import { renderFlat, renderGrouped } from '../src/utils/render.js';
import { buildSampleTree } from './testUtils.js';

describe('render', () => {
  describe('renderFlat', () => {
    it('lists every slot with its parent link', () => {
      expect(renderFlat(buildSampleTree())).toBe(
        'root {0}, child1 {0}, child2 {0}, gc0 {1}, gc1 {1}, gc2 {1}, gc3 {2}, gc4 {2}'
      );
    });

    it('applies a value formatter', () => {
      const tree = FlatTree.fromSequences(['r', 'a'], [0, 0]);

      expect(renderFlat(tree, (value) => value.toUpperCase())).toBe('R {0}, A {0}');
    });

    it('shows unassigned links as raw numbers', () => {
      const tree = new FlatTree('r');
      tree.resize(2, () => 'x');

      expect(renderFlat(tree)).toBe('r {0}, x {4294967295}');
    });
  });

  describe('renderGrouped', () => {
    it('groups children under each parent', () => {
      expect(renderGrouped(buildSampleTree())).toBe('root:\nchild1: gc0,gc1,gc2\nchild2: gc3,gc4');
    });

    it('renders non-string values', () => {
      const tree = FlatTree.fromSequences([10, 20, 30], [0, 0, 1]);

      expect(renderGrouped(tree)).toBe('10:\n20: 30');
      expect(renderGrouped(tree, (value) => `#${value}`)).toBe('#10:\n#20: #30');
    });

    it('skips links that do not name a slot', () => {
      const tree = new FlatTree('r');
      tree.resize(2, () => 'x');

      expect(renderGrouped(tree)).toBe('r:');
    });
  });
});
