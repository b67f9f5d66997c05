import { Side } from "./flat_record";
import { InnerNode, Leaf, TreeNode } from "./nodes";

export interface VisitedNode<T> {
  readonly node: TreeNode<T>;
  /**
   * Distance from the root (0 for the root itself).
   */
  readonly level: number;
  /**
   * Which child of its parent this node is, or null for the root.
   */
  readonly side: Side | null;
}

/**
 * Iterates over all nodes in preorder (parent, then left subtree, then right subtree),
 * using an explicit stack.
 */
export function* preorder<T>(
  root: TreeNode<T>
): IterableIterator<VisitedNode<T>> {
  const stack: VisitedNode<T>[] = [{ node: root, level: 0, side: null }];
  while (stack.length !== 0) {
    const current = stack.pop()!;
    yield current;
    const node = current.node;
    if (node instanceof InnerNode) {
      const level = current.level + 1;
      stack.push(
        { node: node.right, level, side: "right" },
        { node: node.left, level, side: "left" }
      );
    }
  }
}

/**
 * Iterates over the leaves, from left to right.
 */
export function* leaves<T>(root: TreeNode<T>): IterableIterator<Leaf<T>> {
  for (const { node } of preorder(root)) {
    if (node instanceof Leaf) yield node;
  }
}

/**
 * Iterates over the elements of all leaves, from left to right.
 *
 * For a tree built from `elements`, this yields exactly `elements`.
 */
export function* elementsOf<T>(root: TreeNode<T>): IterableIterator<T> {
  for (const leaf of leaves(root)) {
    yield* leaf.elements;
  }
}

/**
 * Computes a value for every node bottom-up and returns the root's value.
 *
 * Use this to attach derived data (counts, bounding boxes, ...) without the tree
 * interpreting its elements. E.g., with `leafValue` returning a leaf's bounding box
 * and `join` merging two boxes, the result is the bounding box of the whole tree.
 *
 * Runs without recursion.
 */
export function foldTree<T, A>(
  root: TreeNode<T>,
  leafValue: (elements: readonly T[]) => A,
  join: (left: A, right: A) => A
): A {
  // Postorder via two stacks: nodes to expand, and values of finished subtrees.
  const work: { node: TreeNode<T>; expanded: boolean }[] = [
    { node: root, expanded: false },
  ];
  const values: A[] = [];
  while (work.length !== 0) {
    const current = work.pop()!;
    const node = current.node;
    if (node instanceof Leaf) {
      values.push(leafValue(node.elements));
    } else if (current.expanded) {
      const right = values.pop()!;
      const left = values.pop()!;
      values.push(join(left, right));
    } else {
      work.push(
        { node, expanded: true },
        { node: node.right, expanded: false },
        { node: node.left, expanded: false }
      );
    }
  }
  return values[0];
}

/**
 * Returns whether a and b have the same shape and the same leaf contents.
 */
export function equalsTree<T>(
  a: TreeNode<T>,
  b: TreeNode<T>,
  equalsElement: (x: T, y: T) => boolean = Object.is
): boolean {
  const stack: [TreeNode<T>, TreeNode<T>][] = [[a, b]];
  while (stack.length !== 0) {
    const [x, y] = stack.pop()!;
    if (x instanceof InnerNode) {
      if (!(y instanceof InnerNode)) return false;
      stack.push([x.right, y.right], [x.left, y.left]);
    } else {
      if (!(y instanceof Leaf)) return false;
      if (x.elements.length !== y.elements.length) return false;
      for (let i = 0; i < x.elements.length; i++) {
        if (!equalsElement(x.elements[i], y.elements[i])) return false;
      }
    }
  }
  return true;
}

export interface TreeStats {
  readonly nodeCount: number;
  readonly leafCount: number;
  /**
   * The greatest level of any node (0 for a lone root leaf).
   */
  readonly depth: number;
  readonly elementCount: number;
}

export function treeStats<T>(root: TreeNode<T>): TreeStats {
  let nodeCount = 0;
  let leafCount = 0;
  let depth = 0;
  let elementCount = 0;
  for (const { node, level } of preorder(root)) {
    nodeCount++;
    depth = Math.max(depth, level);
    if (node instanceof Leaf) {
      leafCount++;
      elementCount += node.elements.length;
    }
  }
  return { nodeCount, leafCount, depth, elementCount };
}
