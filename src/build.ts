import {
  checkMaxElems,
  DEFAULT_MAX_ELEMS,
  splitMidpoint,
} from "./internal/misc";
import { InnerNode, Leaf, TreeNode } from "./nodes";

/**
 * Builds a partition tree directly from `elements`, by recursive midpoint splitting.
 *
 * Any slice longer than `maxElems` is split at `floor(length / 2)` into a left half
 * `[0, mid)` and a right half `[mid, length)`; each half is built the same way.
 * Slices that fit become leaves, in their original order.
 *
 * This is the reference construction: {@link flatten} followed by {@link rebuild}
 * produces an equal tree without recursing.
 *
 * @throws InvalidConfigurationError If maxElems is not a positive integer.
 */
export function buildTree<T>(
  elements: readonly T[],
  maxElems = DEFAULT_MAX_ELEMS
): TreeNode<T> {
  checkMaxElems(maxElems);
  return buildNode(elements, maxElems);
}

function buildNode<T>(elements: readonly T[], maxElems: number): TreeNode<T> {
  const halves = splitMidpoint(elements, maxElems);
  if (halves === null) return new Leaf(elements.slice());
  return new InnerNode(
    buildNode(halves[0], maxElems),
    buildNode(halves[1], maxElems)
  );
}
