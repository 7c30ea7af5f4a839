import { TREE_INDICES } from './FlatTreeConstants.js';
import { assertSequences, FlatTree, type FlatTreeOptions } from './FlatTree.js';

/**
 * Identity of a node that survives removals. The root is always 0.
 */
export type NodeId = number;

export const ROOT_ID: NodeId = 0;

/**
 * FlatTree with an id layer on top of the positional one.
 *
 * Keeps a dense slot -> id column next to the storage columns and an
 * id -> slot map, both patched whenever a node is appended, relocated by a
 * swap-remove or dropped. Ids are handed out in increasing order and never
 * reused.
 */
export class StableFlatTree<T> extends FlatTree<T> {
  private slotToId: NodeId[] = [ROOT_ID];
  private readonly idToSlot = new Map<NodeId, number>([[ROOT_ID, TREE_INDICES.ROOT]]);
  private nextId: NodeId = ROOT_ID + 1;

  static override fromSequences<T>(
    values: readonly T[],
    parents: readonly number[],
    options: FlatTreeOptions = {}
  ): StableFlatTree<T> {
    assertSequences(values, parents, 'fromSequences');
    const tree = new StableFlatTree<T>(values[TREE_INDICES.ROOT], options);
    tree.loadSequences(values, parents);
    return tree;
  }

  idAt(slot: number): NodeId {
    this.assertIndex(slot, 'idAt');
    return this.slotToId[slot];
  }

  slotOf(id: NodeId): number | null {
    return this.idToSlot.get(id) ?? null;
  }

  hasId(id: NodeId): boolean {
    return this.idToSlot.has(id);
  }

  getById(id: NodeId): T | undefined {
    const slot = this.slotOf(id);
    return slot === null ? undefined : this.get(slot);
  }

  setById(id: NodeId, value: T): boolean {
    const slot = this.slotOf(id);
    if (slot === null) return false;
    this.set(slot, value);
    return true;
  }

  parentOf(id: NodeId): NodeId | null {
    const slot = this.slotOf(id);
    if (slot === null || slot === TREE_INDICES.ROOT) return null;
    const parentSlot = this.getParentIndex(slot);
    return parentSlot < this.size() ? this.slotToId[parentSlot] : null;
  }

  childrenOf(id: NodeId): NodeId[] {
    const slot = this.slotOf(id);
    if (slot === null) return [];
    return this.getChildren(slot).map((child) => this.slotToId[child]);
  }

  /**
   * @returns id of the new node, or null when `parentId` is unknown
   */
  insertById(parentId: NodeId, value: T): NodeId | null {
    const slot = this.slotOf(parentId);
    if (slot === null || !this.insert(slot, value)) return null;
    return this.slotToId[this.size() - 1];
  }

  /**
   * Same contract as `remove`: the node must have descendants.
   */
  removeById(id: NodeId): boolean {
    const slot = this.slotOf(id);
    return slot !== null && this.remove(slot);
  }

  removeLeafById(id: NodeId): boolean {
    const slot = this.slotOf(id);
    return slot !== null && this.removeLeaf(slot);
  }

  protected override onAppend(index: number): void {
    const id = this.nextId++;
    this.slotToId[index] = id;
    this.idToSlot.set(id, index);
  }

  protected override onSwapRemove(removed: number, movedFrom: number): void {
    this.idToSlot.delete(this.slotToId[removed]);
    if (movedFrom !== removed) {
      const movedId = this.slotToId[movedFrom];
      this.slotToId[removed] = movedId;
      this.idToSlot.set(movedId, removed);
    }
    this.slotToId.pop();
  }

  protected override onTruncate(newSize: number): void {
    for (let slot = newSize; slot < this.slotToId.length; slot++) {
      this.idToSlot.delete(this.slotToId[slot]);
    }
    this.slotToId.length = Math.min(this.slotToId.length, newSize);
  }
}
