import { buildTree } from "./build";
import { FlatRecord } from "./flat_record";
import { flattenTree } from "./flatten";
import { TreeNode } from "./nodes";
import { rebuild } from "./rebuild";
import { renderTree } from "./render";
import { loadRecords, SavedPartitionTree, saveRecords } from "./saved_tree";
import {
  elementsOf,
  equalsTree,
  foldTree,
  leaves,
  TreeStats,
  treeStats,
} from "./traverse";

/**
 * A balanced binary partition tree over an ordered sequence of elements,
 * as an immutable data structure.
 *
 * The tree splits its input at the midpoint until every leaf holds at most
 * `maxElems` elements. Elements are opaque: the tree never compares or inspects them,
 * and it never reorders them, so reading the leaves from left to right gives back
 * the original sequence.
 *
 * A PartitionTree converts to and from a flat list of {@link FlatRecord}s
 * ({@link toRecords}, {@link fromRecords}), which describes the tree through
 * parent ids instead of nested children. That list is also what {@link save} stores.
 * Both directions run without recursion, so they handle arbitrarily deep trees.
 */
export class PartitionTree<T> {
  private _stats: TreeStats | null = null;

  /**
   * Internal - construct a PartitionTree using a static method (e.g. `PartitionTree.build`).
   */
  private constructor(readonly root: TreeNode<T>) {}

  /**
   * Builds the partition tree of `elements` with the given splitting threshold.
   *
   * @throws InvalidConfigurationError If maxElems is not a positive integer.
   */
  static build<T>(elements: readonly T[], maxElems?: number): PartitionTree<T> {
    return new this(buildTree(elements, maxElems));
  }

  /**
   * Wraps an existing root, e.g., one you assembled from {@link Leaf} and {@link InnerNode}.
   */
  static fromRoot<T>(root: TreeNode<T>): PartitionTree<T> {
    return new this(root);
  }

  /**
   * Rebuilds a tree from its FlatRecords, e.g., from {@link toRecords} or {@link flatten}.
   *
   * @throws StructuralIntegrityError If the records do not describe exactly one tree.
   */
  static fromRecords<T>(records: readonly FlatRecord<T>[]): PartitionTree<T> {
    return new this(rebuild(records));
  }

  /**
   * Returns this tree's FlatRecords, with the same ids and order as {@link flatten}.
   */
  toRecords(): FlatRecord<T>[] {
    return flattenTree(this.root);
  }

  /**
   * Returns a JSON representation of this tree. Load with {@link load}.
   *
   * See {@link SavedPartitionTree} for a description of the save format.
   */
  save(): SavedPartitionTree<T> {
    return saveRecords(this.toRecords());
  }

  /**
   * Loads a saved state returned by {@link save}.
   *
   * @throws StructuralIntegrityError If the saved state is malformed.
   */
  static load<T>(savedState: SavedPartitionTree<T>): PartitionTree<T> {
    return this.fromRecords(loadRecords(savedState));
  }

  /**
   * Iterates over the leaves, from left to right.
   */
  leaves() {
    return leaves(this.root);
  }

  /**
   * Iterates over the elements, in their original order.
   */
  values() {
    return elementsOf(this.root);
  }

  [Symbol.iterator]() {
    return this.values();
  }

  /**
   * The total number of elements.
   */
  get length(): number {
    return this.stats.elementCount;
  }

  get leafCount(): number {
    return this.stats.leafCount;
  }

  /**
   * The number of nodes, inner and leaf.
   */
  get nodeCount(): number {
    return this.stats.nodeCount;
  }

  /**
   * The number of edges on the longest root-to-leaf path.
   */
  get depth(): number {
    return this.stats.depth;
  }

  private get stats(): TreeStats {
    if (this._stats === null) this._stats = treeStats(this.root);
    return this._stats;
  }

  /**
   * Computes an aggregate bottom-up. See {@link foldTree}.
   */
  fold<A>(
    leafValue: (elements: readonly T[]) => A,
    join: (left: A, right: A) => A
  ): A {
    return foldTree(this.root, leafValue, join);
  }

  /**
   * Returns whether other has the same shape and the same leaf contents.
   */
  equals(
    other: PartitionTree<T>,
    equalsElement?: (x: T, y: T) => boolean
  ): boolean {
    return equalsTree(this.root, other.root, equalsElement);
  }

  /**
   * Renders the tree for debugging. See {@link renderTree}.
   */
  toString(formatElement?: (element: T) => string): string {
    return renderTree(this.root, formatElement);
  }
}
