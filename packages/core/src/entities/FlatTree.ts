import type { z } from 'zod';
import { IndexOutOfRangeError, InvalidArgumentError, StructuralIntegrityError } from '../errors/tree.js';
import { createFlatTreeDataSchema, type FlatTreeData } from '../schemas/flatTree.js';
import { cfg } from '../utils/config.js';
import { createModuleLogger, startTimer, type Logger } from '../utils/logger.js';
import { containsChunked, containsLinear, countChunked, countLinear } from '../utils/scan.js';
import { type ExecutionMode, STORAGE_CONFIG, TREE_INDICES } from './FlatTreeConstants.js';

const moduleLogger = createModuleLogger('FlatTree');

export const GROW = (n: number) => Math.max(STORAGE_CONFIG.MIN_CAPACITY, n * 2);

/**
 * Anything indices can be appended to. Plain arrays qualify.
 */
export interface IndexSink {
  push(index: number): unknown;
}

export interface FlatTreeOptions {
  /** Node count at which counting and lookup switch to the chunked scan */
  scanThreshold?: number;
  /** Window size for the chunked scan */
  scanChunkSize?: number;
  /** Parent-index slots allocated up front */
  initialCapacity?: number;
  logger?: Logger;
}

export type SequentialVisitor<T> = (value: T, index: number) => T;
export type ConcurrentVisitor<T> = (value: T, index: number) => T | Promise<T>;

type TraverseArgs<T> =
  | [mode: Extract<ExecutionMode, 'sequential'>, fn: SequentialVisitor<T>]
  | [mode: Extract<ExecutionMode, 'concurrent'>, fn: ConcurrentVisitor<T>];

function isUint32(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= TREE_INDICES.UNASSIGNED_PARENT;
}

/**
 * General purpose flat tree.
 *
 * Every node has exactly one parent and all nodes live contiguously in two
 * parallel columns: the node values and the parent index of each node. The
 * root sits at position 0 and its parent link points at itself. A tree
 * always holds its root.
 *
 * Positions are transient handles, not identities: `remove` fills each
 * vacated slot with the node from the last slot, so any position held
 * across a removal may now name a different node. Use `StableFlatTree`
 * when callers need identities that survive removals.
 *
 * Mutations assume a single writer.
 */
export class FlatTree<T> implements Iterable<T> {
  protected values: T[];
  protected parents: Uint32Array;
  protected parentCount: number;
  protected readonly logger: Logger;

  private readonly scanThreshold: number;
  private readonly scanChunkSize: number;

  constructor(rootValue: T, options: FlatTreeOptions = {}) {
    this.scanThreshold = options.scanThreshold ?? cfg.FLAT_TREE_SCAN_THRESHOLD;
    this.scanChunkSize = options.scanChunkSize ?? cfg.FLAT_TREE_SCAN_CHUNK_SIZE;
    this.logger = options.logger ?? moduleLogger;

    const capacity = Math.max(
      STORAGE_CONFIG.MIN_CAPACITY,
      options.initialCapacity ?? cfg.FLAT_TREE_INITIAL_CAPACITY
    );
    this.parents = new Uint32Array(capacity);
    this.parents[TREE_INDICES.ROOT] = TREE_INDICES.ROOT;
    this.parentCount = 1;
    this.values = [rootValue];
  }

  // Factory methods

  /**
   * Build a tree from a value column and a parent column of equal length.
   * `parents[0]` must be 0. Other parent links are taken as given.
   */
  static fromSequences<T>(
    values: readonly T[],
    parents: readonly number[],
    options: FlatTreeOptions = {}
  ): FlatTree<T> {
    assertSequences(values, parents, 'fromSequences');
    const tree = new FlatTree<T>(values[TREE_INDICES.ROOT], options);
    tree.loadSequences(values, parents);
    return tree;
  }

  /**
   * Build a tree from any two iterables (sets, generators, typed arrays...).
   */
  static from<T>(
    values: Iterable<T>,
    parents: Iterable<number>,
    options: FlatTreeOptions = {}
  ): FlatTree<T> {
    return this.fromSequences(Array.from(values), Array.from(parents), options);
  }

  /**
   * Build a tree from untrusted `{ values, parents }` data, validating each
   * value against `valueSchema`.
   */
  static fromPlainObject<T>(
    data: unknown,
    valueSchema: z.ZodType<T>,
    options: FlatTreeOptions = {}
  ): FlatTree<T> {
    const parsed = createFlatTreeDataSchema(valueSchema).safeParse(data);
    if (!parsed.success) {
      throw new InvalidArgumentError('Malformed flat tree data', 'fromPlainObject', {
        issues: parsed.error.issues,
      });
    }
    return this.fromSequences(parsed.data.values, parsed.data.parents, options);
  }

  /**
   * Replace the whole layout with the given columns. Inputs must already
   * have passed `assertSequences`.
   */
  protected loadSequences(values: readonly T[], parents: readonly number[]): void {
    this.onTruncate(1);
    this.values = values.slice();
    if (parents.length > this.parents.length) {
      this.reallocate(parents.length);
    }
    this.parents.fill(0);
    this.parents.set(parents);
    this.parentCount = parents.length;
    for (let i = 1; i < this.parentCount; i++) {
      this.onAppend(i);
    }
  }

  // Capacity

  size(): number {
    return this.values.length;
  }

  /**
   * True when only the root remains
   */
  isEmpty(): boolean {
    return this.values.length === 1;
  }

  capacity(): number {
    return this.parents.length;
  }

  maxSize(): number {
    return TREE_INDICES.MAX_INDEX + 1;
  }

  reserve(newCapacity: number): void {
    if (!Number.isInteger(newCapacity) || newCapacity < 0 || newCapacity > this.maxSize()) {
      throw new InvalidArgumentError(`Cannot reserve ${newCapacity} slots`, 'reserve', {
        newCapacity,
      });
    }
    if (newCapacity > this.parents.length) {
      this.reallocate(newCapacity);
    }
  }

  shrinkToFit(): void {
    if (this.parents.length > this.parentCount) {
      this.reallocate(this.parentCount);
    }
  }

  // Modifiers

  /**
   * Drop every node except the root. The root keeps its current value.
   */
  clear(): void {
    const root = this.values[TREE_INDICES.ROOT];
    this.onTruncate(1);
    this.values = [root];
    this.parents.fill(0, 0, this.parentCount);
    this.parentCount = 1;
    this.logger.debug('tree cleared');
  }

  /**
   * Truncate or extend both columns to `count` nodes.
   *
   * Extension needs `createValue` and leaves each new slot's parent link set
   * to `UNASSIGNED_PARENT`: such slots are not part of the tree until
   * `setParentIndex` wires them. Truncation does not repair links that
   * pointed at dropped slots.
   */
  resize(count: number, createValue?: (index: number) => T): void {
    if (!Number.isInteger(count) || count < 1 || count > this.maxSize()) {
      throw new InvalidArgumentError(`Cannot resize tree to ${count} nodes`, 'resize', { count });
    }

    const size = this.size();
    if (count < size) {
      this.onTruncate(count);
      this.values.length = count;
      this.parents.fill(0, count, this.parentCount);
      this.parentCount = count;
    } else if (count > size) {
      if (!createValue) {
        throw new InvalidArgumentError('Extending a tree requires a value factory', 'resize', {
          count,
          size,
        });
      }
      this.ensureCapacity(count);
      for (let i = size; i < count; i++) {
        this.values.push(createValue(i));
        this.parents[this.parentCount++] = TREE_INDICES.UNASSIGNED_PARENT;
        this.onAppend(i);
      }
    }

    this.logger.debug({ from: size, to: count }, 'tree resized');
  }

  // Queries

  /**
   * True iff some node, the root included, names `index` as its parent.
   * This is not a bounds check.
   */
  doesIndexExist(index: number): boolean {
    if (!isUint32(index)) return false;
    const view = this.parentView();
    return this.useChunkedScan()
      ? containsChunked(view, index, { chunkSize: this.scanChunkSize })
      : containsLinear(view, index);
  }

  isLeaf(index: number): boolean {
    this.assertIndex(index, 'isLeaf');
    return this.getNumOfDescendants(index) === 0;
  }

  /**
   * Number of immediate children of `parentIndex`. The root's link to
   * itself does not count.
   */
  getNumOfDescendants(parentIndex: number): number {
    if (!isUint32(parentIndex)) return 0;
    const view = this.parentView();
    return this.useChunkedScan()
      ? countChunked(view, parentIndex, { from: 1, chunkSize: this.scanChunkSize })
      : countLinear(view, parentIndex, { from: 1 });
  }

  /**
   * Append the immediate children of `parentIndex`, ascending, to `out`.
   *
   * Returns false for the root (use `getAllDescendants(0)` or
   * `getChildren(0)`), for a structurally invalid tree, and when nothing was
   * found.
   */
  getDescendants(parentIndex: number, out: IndexSink = []): boolean {
    if (parentIndex === TREE_INDICES.ROOT) return false;
    if (!this.checkStructure('getDescendants')) return false;

    let found = false;
    for (let i = 1; i < this.parentCount; i++) {
      if (this.parents[i] !== parentIndex) continue;
      out.push(i);
      found = true;
    }
    return found;
  }

  /**
   * Immediate children of any node, root included, ascending by position.
   */
  getChildren(parentIndex: number): number[] {
    this.assertIndex(parentIndex, 'getChildren');
    const children: number[] = [];
    for (let i = 1; i < this.parentCount; i++) {
      if (this.parents[i] === parentIndex) children.push(i);
    }
    return children;
  }

  getParentIndex(index: number): number {
    if (!this.isStructurallyValid()) {
      throw new StructuralIntegrityError('Tree structure is invalid', 'getParentIndex', {
        valueCount: this.values.length,
        parentCount: this.parentCount,
      });
    }
    this.assertIndex(index, 'getParentIndex');
    return index === TREE_INDICES.ROOT ? TREE_INDICES.ROOT : this.parents[index];
  }

  /**
   * Append every transitive descendant of `parentIndex` to `out`.
   *
   * For the root this is simply positions `1..size()-1`. For any other node
   * the immediate children come first, then the children of each newly found
   * node in turn; a node always precedes its own descendants and nothing is
   * appended twice. No stricter order is promised.
   *
   * Returns false when nothing was appended.
   */
  getAllDescendants(parentIndex: number, out: IndexSink = []): boolean {
    if (!this.checkStructure('getAllDescendants')) return false;

    if (parentIndex === TREE_INDICES.ROOT) {
      for (let i = 1; i < this.parentCount; i++) {
        out.push(i);
      }
      return this.parentCount > 1;
    }

    if (!this.isIndex(parentIndex)) return false;

    const found = this.collectDescendants(parentIndex);
    for (const index of found) {
      out.push(index);
    }
    return found.length > 0;
  }

  /**
   * Positions from the root down to `index`, both ends included.
   */
  getPath(index: number): number[] {
    this.assertIndex(index, 'getPath');
    const path: number[] = [index];
    let current = index;

    while (current !== TREE_INDICES.ROOT) {
      const parent = this.parents[current];
      if (parent >= this.parentCount) {
        throw new StructuralIntegrityError(`Node ${current} has no parent in the tree`, 'getPath', {
          index: current,
          parent,
        });
      }
      if (path.length > this.parentCount) {
        throw new StructuralIntegrityError(`Cycle detected above node ${index}`, 'getPath', {
          index,
        });
      }
      path.push(parent);
      current = parent;
    }

    return path.reverse();
  }

  getDepth(index: number): number {
    return this.getPath(index).length - 1;
  }

  /**
   * True when `ancestor` lies strictly above `node`.
   */
  isAncestorOf(ancestor: number, node: number): boolean {
    this.assertIndex(ancestor, 'isAncestorOf');
    this.assertIndex(node, 'isAncestorOf');
    if (ancestor === node) return false;

    let current = node;
    for (let hops = 0; hops <= this.parentCount; hops++) {
      if (current === TREE_INDICES.ROOT) return false;
      const parent = this.parents[current];
      if (parent >= this.parentCount) return false;
      if (parent === ancestor) return true;
      current = parent;
    }

    throw new StructuralIntegrityError(`Cycle detected above node ${node}`, 'isAncestorOf', {
      node,
    });
  }

  // Insertion

  /**
   * Append `value` as a new child of `parentId`. The new node takes position
   * `size()`. Returns false, leaving the tree untouched, when `parentId` is
   * not a position in the tree.
   */
  insert(parentId: number, value: T): boolean {
    if (!this.isIndex(parentId)) return false;
    if (!this.checkStructure('insert')) return false;

    this.ensureCapacity(this.parentCount + 1);
    this.appendSlot(parentId, value);
    return true;
  }

  /**
   * Append every value as a child of `parentId`, in iteration order.
   */
  insertMany(parentId: number, values: Iterable<T>): boolean {
    if (!this.isIndex(parentId)) return false;
    if (!this.checkStructure('insertMany')) return false;

    const batch = Array.from(values);
    this.ensureCapacity(this.parentCount + batch.length);
    for (const value of batch) {
      this.appendSlot(parentId, value);
    }
    return true;
  }

  // Removal

  /**
   * Remove `nodeIndex` together with all of its descendants.
   *
   * Only nodes that have at least one descendant can be removed this way: a
   * bare leaf yields false and the tree is unchanged (see `removeLeaf`). The
   * root itself is never removed; `remove(0)` drops every other node.
   *
   * Vacated slots are refilled from the end of storage, so positions held by
   * the caller are stale afterwards.
   */
  remove(nodeIndex: number): boolean {
    if (!this.isIndex(nodeIndex)) return false;
    if (!this.checkStructure('remove')) return false;

    const doomed: number[] = [];
    if (!this.getAllDescendants(nodeIndex, doomed)) return false;
    if (nodeIndex !== TREE_INDICES.ROOT) doomed.push(nodeIndex);

    const done = startTimer(this.logger, 'remove');

    // Highest slot first: every node pulled down from the end is then a survivor.
    doomed.sort((a, b) => b - a);
    const originOf = new Map<number, number>();
    for (const slot of doomed) {
      this.swapRemove(slot, originOf);
    }
    this.relinkMoved(originOf);

    done({ nodeIndex, removed: doomed.length, size: this.size() });
    return true;
  }

  /**
   * Remove a childless, non-root node.
   */
  removeLeaf(nodeIndex: number): boolean {
    if (!this.isIndex(nodeIndex) || nodeIndex === TREE_INDICES.ROOT) return false;
    if (!this.checkStructure('removeLeaf')) return false;
    if (this.getNumOfDescendants(nodeIndex) > 0) return false;

    const originOf = new Map<number, number>();
    this.swapRemove(nodeIndex, originOf);
    this.relinkMoved(originOf);
    return true;
  }

  // Re-parenting

  /**
   * Overwrite a parent link without any checks beyond bounds. Meant for
   * wiring slots created by `resize`.
   */
  setParentIndex(index: number, parentIndex: number): void {
    this.assertIndex(index, 'setParentIndex');
    if (index === TREE_INDICES.ROOT) {
      throw new InvalidArgumentError('The root parent link is fixed', 'setParentIndex', {
        index,
        parentIndex,
      });
    }
    this.assertIndex(parentIndex, 'setParentIndex');
    this.parents[index] = parentIndex;
  }

  /**
   * Move `index` (and its subtree) under `parentIndex`. Refuses to move the
   * root or to create a cycle.
   */
  setParent(index: number, parentIndex: number): boolean {
    if (!this.isIndex(index) || !this.isIndex(parentIndex)) return false;
    if (index === TREE_INDICES.ROOT) return false;
    if (!this.checkStructure('setParent')) return false;
    if (index === parentIndex || this.isAncestorOf(index, parentIndex)) return false;

    this.parents[index] = parentIndex;
    return true;
  }

  // Traversal

  /**
   * Replace the value of every transitive descendant of `startIndex` with
   * `fn(value, index)`.
   *
   * Descendants are resolved once, up front, with `getAllDescendants`; when
   * there are none `fn` is never called. In `'concurrent'` mode every call is
   * started before any result is awaited, so `fn` must not depend on the
   * order of calls. Each call receives a different slot.
   *
   * @returns number of nodes visited
   */
  traverse(startIndex: number, mode: 'sequential', fn: SequentialVisitor<T>): number;
  traverse(startIndex: number, mode: 'concurrent', fn: ConcurrentVisitor<T>): Promise<number>;
  traverse(startIndex: number, ...[mode, fn]: TraverseArgs<T>): number | Promise<number> {
    const targets: number[] = [];
    const hasTargets = this.getAllDescendants(startIndex, targets);

    if (mode === 'concurrent') {
      return hasTargets ? this.applyConcurrently(targets, fn) : Promise.resolve(0);
    }

    // Written back only after the last call, so a throwing callback changes nothing.
    const visit: SequentialVisitor<T> = fn;
    const results = targets.map((index) => visit(this.values[index], index));
    targets.forEach((index, k) => {
      this.values[index] = results[k];
    });
    return targets.length;
  }

  private async applyConcurrently(targets: number[], fn: ConcurrentVisitor<T>): Promise<number> {
    const results = new Array<T>(targets.length);

    // Executors run synchronously: every call is dispatched before the first await.
    const pending = targets.map((index, k) =>
      new Promise<T>((resolve) => resolve(fn(this.values[index], index))).then((next) => {
        results[k] = next;
      })
    );
    await Promise.all(pending);

    // Written back only once every call has settled, so a rejection changes nothing.
    targets.forEach((index, k) => {
      if (index < this.values.length) this.values[index] = results[k];
    });
    return targets.length;
  }

  // Element access

  get(index: number): T {
    this.assertIndex(index, 'get');
    return this.values[index];
  }

  set(index: number, value: T): void {
    this.assertIndex(index, 'set');
    this.values[index] = value;
  }

  *[Symbol.iterator](): IterableIterator<T> {
    for (let i = 0; i < this.values.length; i++) {
      yield this.values[i];
    }
  }

  /**
   * `[position, value, parent link]` for every slot, in position order
   */
  *entries(): IterableIterator<[number, T, number]> {
    for (let i = 0; i < this.values.length; i++) {
      yield [i, this.values[i], this.parents[i]];
    }
  }

  // Serialization

  toPlainObject(): FlatTreeData<T> {
    return {
      values: this.values.slice(),
      parents: Array.from(this.parentView()),
    };
  }

  /**
   * Both columns agree in length and the root still points at itself
   */
  isStructurallyValid(): boolean {
    return (
      this.values.length === this.parentCount &&
      this.parentCount > 0 &&
      this.parents[TREE_INDICES.ROOT] === TREE_INDICES.ROOT
    );
  }

  // Hooks for subclasses that track slot movement

  /** A node now occupies `index`, which was previously past the end */
  protected onAppend(_index: number): void {}

  /**
   * The node at `removed` is gone and the node at `movedFrom` (the old last
   * slot) now occupies `removed`. Both are equal when the last slot itself
   * was removed.
   */
  protected onSwapRemove(_removed: number, _movedFrom: number): void {}

  /** Every slot at or above `newSize` is about to be dropped */
  protected onTruncate(_newSize: number): void {}

  // Internals

  protected isIndex(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.values.length;
  }

  protected assertIndex(index: number, operation: string): void {
    if (!this.isIndex(index)) {
      throw new IndexOutOfRangeError(index, this.values.length, operation);
    }
  }

  private checkStructure(operation: string): boolean {
    if (this.isStructurallyValid()) return true;
    this.logger.warn(
      { operation, valueCount: this.values.length, parentCount: this.parentCount },
      'refusing to operate on a structurally invalid tree'
    );
    return false;
  }

  private useChunkedScan(): boolean {
    return this.parentCount >= this.scanThreshold;
  }

  private parentView(): Uint32Array {
    return this.parents.subarray(0, this.parentCount);
  }

  private appendSlot(parentId: number, value: T): void {
    const index = this.parentCount;
    this.values.push(value);
    this.parents[index] = parentId;
    this.parentCount++;
    this.onAppend(index);
  }

  /**
   * Worklist expansion from `start`. Children are grouped by parent in one
   * pass so each node's children come out in ascending position order.
   */
  private collectDescendants(start: number): number[] {
    const childrenOf = new Map<number, number[]>();
    for (let i = 1; i < this.parentCount; i++) {
      const parent = this.parents[i];
      const siblings = childrenOf.get(parent);
      if (siblings) {
        siblings.push(i);
      } else {
        childrenOf.set(parent, [i]);
      }
    }

    const seen = new Uint8Array(this.parentCount);
    seen[start] = 1;
    const found: number[] = [];

    const expand = (index: number) => {
      for (const child of childrenOf.get(index) ?? []) {
        if (seen[child]) continue;
        seen[child] = 1;
        found.push(child);
      }
    };

    expand(start);
    for (let cursor = 0; cursor < found.length; cursor++) {
      expand(found[cursor]);
    }

    return found;
  }

  /**
   * O(1) slot removal. Parent links are left alone; the node pulled down
   * from the last slot is recorded in `originOf` (current slot -> slot it
   * held before the batch) for `relinkMoved`.
   */
  protected swapRemove(slot: number, originOf: Map<number, number>): void {
    if (slot === TREE_INDICES.ROOT) return;

    const last = this.parentCount - 1;
    if (slot !== last) {
      this.values[slot] = this.values[last];
      this.parents[slot] = this.parents[last];
      originOf.set(slot, originOf.get(last) ?? last);
    }
    originOf.delete(last);

    this.values.pop();
    this.parents[last] = 0;
    this.parentCount--;
    this.onSwapRemove(slot, last);
  }

  /**
   * One pass re-pointing every link that still names a relocated node's
   * old slot. Old slots of moved nodes all lie past the new end, so they
   * cannot be confused with a survivor that stayed put.
   */
  private relinkMoved(originOf: Map<number, number>): void {
    if (originOf.size === 0) return;

    const movedTo = new Map<number, number>();
    for (const [current, origin] of originOf) {
      movedTo.set(origin, current);
    }
    for (let i = 1; i < this.parentCount; i++) {
      const target = movedTo.get(this.parents[i]);
      if (target !== undefined) this.parents[i] = target;
    }
  }

  private ensureCapacity(required: number): void {
    if (required <= this.parents.length) return;
    let next = this.parents.length;
    while (next < required) next = GROW(next);
    this.reallocate(Math.min(next, this.maxSize()));
  }

  private reallocate(capacity: number): void {
    const next = new Uint32Array(capacity);
    next.set(this.parents.subarray(0, Math.min(this.parentCount, capacity)));
    this.parents = next;
  }
}

/**
 * Precondition check shared by every bulk constructor
 */
export function assertSequences<T>(
  values: readonly T[],
  parents: readonly number[],
  operation: string
): void {
  if (values.length === 0 || parents.length === 0) {
    throw new InvalidArgumentError('A tree needs at least a root node', operation);
  }
  if (values.length !== parents.length) {
    throw new InvalidArgumentError('Value and parent sequences differ in length', operation, {
      valueCount: values.length,
      parentCount: parents.length,
    });
  }
  if (parents[TREE_INDICES.ROOT] !== TREE_INDICES.ROOT) {
    throw new InvalidArgumentError('The root node must be its own parent', operation, {
      rootParent: parents[TREE_INDICES.ROOT],
    });
  }
  parents.forEach((parent, index) => {
    if (!isUint32(parent)) {
      throw new InvalidArgumentError(`Parent link ${parent} at ${index} is not an index`, operation, {
        index,
        parent,
      });
    }
  });
}
