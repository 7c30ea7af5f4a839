import { describe, expect, it } from 'vitest';
import { ROOT_ID, StableFlatTree } from '../src/entities/StableFlatTree.js';

/**
 *   root(0)
 *   ├─ a(1)
 *   │   └─ a1(3)
 *   └─ b(2)
 *       ├─ b1(4)
 *       └─ b2(5)
 */
function buildIdTree(): StableFlatTree<string> {
  const tree = new StableFlatTree('root');
  tree.insertById(ROOT_ID, 'a');
  tree.insertById(ROOT_ID, 'b');
  tree.insertById(1, 'a1');
  tree.insertById(2, 'b1');
  tree.insertById(2, 'b2');
  return tree;
}

describe('StableFlatTree', () => {
  it('hands out increasing ids on insertion', () => {
    const tree = new StableFlatTree('root');

    expect(tree.insertById(ROOT_ID, 'a')).toBe(1);
    expect(tree.insertById(ROOT_ID, 'b')).toBe(2);
    expect(tree.insertById(1, 'a1')).toBe(3);
    expect(tree.insertById(99, 'x')).toBeNull();
    expect(tree.size()).toBe(4);
  });

  it('keeps ids attached to nodes moved by a removal', () => {
    const tree = buildIdTree();

    expect(tree.removeById(1)).toBe(true);
    expect(tree.size()).toBe(4);
    expect(tree.getById(4)).toBe('b1');
    expect(tree.getById(5)).toBe('b2');
    expect(tree.hasId(1)).toBe(false);
    expect(tree.hasId(3)).toBe(false);
    expect(tree.getById(1)).toBeUndefined();
    expect(tree.childrenOf(2)).toEqual([4, 5]);
    expect(tree.parentOf(5)).toBe(2);
    expect(tree.slotOf(4)).toBe(1);
    expect(tree.idAt(3)).toBe(5);
  });

  it('removes leaves by id', () => {
    const tree = buildIdTree();
    tree.removeById(1);

    expect(tree.removeById(5)).toBe(false);
    expect(tree.removeLeafById(5)).toBe(true);
    expect(tree.childrenOf(2)).toEqual([4]);
    expect(tree.hasId(5)).toBe(false);
    expect(tree.removeLeafById(5)).toBe(false);
  });

  it('reads and writes values through ids', () => {
    const tree = buildIdTree();

    expect(tree.setById(4, 'B1')).toBe(true);
    expect(tree.getById(4)).toBe('B1');
    expect(tree.setById(42, 'nope')).toBe(false);
    expect(tree.parentOf(ROOT_ID)).toBeNull();
    expect(tree.parentOf(42)).toBeNull();
    expect(tree.childrenOf(42)).toEqual([]);
    expect(tree.slotOf(42)).toBeNull();
  });

  it('does not reuse ids after clear', () => {
    const tree = buildIdTree();

    tree.clear();
    expect(tree.hasId(ROOT_ID)).toBe(true);
    expect(tree.hasId(2)).toBe(false);
    expect(tree.insertById(ROOT_ID, 'c')).toBe(6);
    expect(tree.idAt(1)).toBe(6);
  });

  it('assigns ids to slots created by bulk construction and resize', () => {
    const tree = StableFlatTree.fromSequences(['r', 'a', 'b'], [0, 0, 1]);

    expect(tree).toBeInstanceOf(StableFlatTree);
    expect(tree.idAt(2)).toBe(2);
    expect(tree.parentOf(2)).toBe(1);

    tree.resize(4, () => 'spare');
    expect(tree.idAt(3)).toBe(3);
    expect(tree.parentOf(3)).toBeNull();

    tree.resize(2);
    expect(tree.hasId(2)).toBe(false);
    expect(tree.hasId(3)).toBe(false);
    expect(tree.insertById(1, 'c')).toBe(4);
  });
});
