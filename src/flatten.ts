import { FlatRecord, Side } from "./flat_record";
import {
  checkMaxElems,
  DEFAULT_MAX_ELEMS,
  splitMidpoint,
} from "./internal/misc";
import { InnerNode, TreeNode } from "./nodes";

/*
 Both flatteners share one loop (flattenWith), which only needs to know how to
 split a pending source: a slice of elements for flatten, an existing node for flattenTree.

 The pending collection is an explicit LIFO stack. We push the right child before the
 left child so that the left subtree is emitted first, and we emit each entry as soon as
 it is popped. So the output interleaves parents with their descendants, e.g., for
 [1..11] with maxElems = 2, the ids come out as 0, 1, 3, 4, 5, 6, 2, 7, 9, 10, 8, 11, 12.
 Consumers must rely on id/parentId/side, not on list position.
*/

interface PendingEntry<S> {
  readonly id: number;
  readonly side: Side;
  readonly parentId: number | null;
  readonly source: S;
}

/**
 * How flattenWith takes apart a pending source.
 */
interface Splitter<S, T> {
  /**
   * Returns the two halves of source, or null if source is a leaf.
   */
  split(source: S): [left: S, right: S] | null;
  /**
   * The elements of a source for which split returned null.
   */
  payload(source: S): readonly T[];
}

/**
 * Flattens the partition tree of `elements` into a list of {@link FlatRecord}s,
 * without recursion.
 *
 * The records describe exactly the tree that {@link buildTree} would build
 * (same split points, same leaf contents). Ids are assigned as follows:
 * the root gets 0, and whenever a node is split, its left and right children get
 * the next two unused ids, in that order.
 *
 * If the whole input fits in one leaf, a single root leaf record is returned.
 *
 * @throws InvalidConfigurationError If maxElems is not a positive integer.
 */
export function flatten<T>(
  elements: readonly T[],
  maxElems = DEFAULT_MAX_ELEMS
): FlatRecord<T>[] {
  checkMaxElems(maxElems);
  return flattenWith<readonly T[], T>(elements, {
    split: (slice) => splitMidpoint(slice, maxElems),
    // Copy so that later changes to the caller's array do not leak into the records.
    payload: (slice) => slice.slice(),
  });
}

/**
 * Flattens an existing tree into a list of {@link FlatRecord}s, without recursion.
 *
 * Ids and record order follow the same rules as {@link flatten}, so
 * `flattenTree(buildTree(elements, m))` equals `flatten(elements, m)`.
 */
export function flattenTree<T>(root: TreeNode<T>): FlatRecord<T>[] {
  return flattenWith<TreeNode<T>, T>(root, {
    split: (node) =>
      node instanceof InnerNode ? [node.left, node.right] : null,
    payload: (node) => (node instanceof InnerNode ? [] : node.elements),
  });
}

function flattenWith<S, T>(
  rootSource: S,
  splitter: Splitter<S, T>
): FlatRecord<T>[] {
  const records: FlatRecord<T>[] = [];
  const pending: PendingEntry<S>[] = [
    // The root's side is not meaningful.
    { id: 0, side: "left", parentId: null, source: rootSource },
  ];
  let nextId = 1;

  while (pending.length !== 0) {
    const current = pending.pop()!;
    const halves = splitter.split(current.source);
    if (halves === null) {
      records.push({
        id: current.id,
        kind: "leaf",
        side: current.side,
        parentId: current.parentId,
        payload: splitter.payload(current.source),
      });
    } else {
      records.push({
        id: current.id,
        kind: "node",
        side: current.side,
        parentId: current.parentId,
        payload: null,
      });
      const leftId = nextId;
      const rightId = nextId + 1;
      nextId += 2;
      pending.push(
        { id: rightId, side: "right", parentId: current.id, source: halves[1] },
        { id: leftId, side: "left", parentId: current.id, source: halves[0] }
      );
    }
  }

  return records;
}
