/**
 * A terminal node, holding a contiguous slice of the original element sequence.
 *
 * Leaves produced by a split hold between 1 and `maxElems` elements.
 * A tree whose input was never split has a single root leaf holding the
 * whole input, which may be empty.
 */
export class Leaf<T> {
  constructor(readonly elements: readonly T[]) {}
}

/**
 * An internal node with exactly two children.
 *
 * Inner nodes never hold elements directly.
 */
export class InnerNode<T> {
  constructor(readonly left: TreeNode<T>, readonly right: TreeNode<T>) {}
}

export type TreeNode<T> = Leaf<T> | InnerNode<T>;
