import { Leaf, TreeNode } from "./nodes";
import { preorder } from "./traverse";

/**
 * Returns a human-readable, indentation-based rendering of a tree, one line per node.
 *
 * Each non-root line starts with `L(level)` or `R(level)`. For example,
 * `buildTree([1, 2, 3], 1)` renders as:
 * ```
 * Node
 *   L(1) [1]
 *   R(1) Node
 *     L(2) [2]
 *     R(2) [3]
 * ```
 *
 * @param formatElement Formats one element. Defaults to `String`.
 */
export function renderTree<T>(
  root: TreeNode<T>,
  formatElement: (element: T) => string = String
): string {
  let ans = "";
  for (const { node, level, side } of preorder(root)) {
    ans += "  ".repeat(level);
    if (side !== null) ans += `${side === "left" ? "L" : "R"}(${level}) `;
    if (node instanceof Leaf) {
      const formatted = node.elements.map((element) => formatElement(element));
      ans += `[${formatted.join(", ")}]`;
    } else {
      ans += "Node";
    }
    ans += "\n";
  }
  return ans;
}
