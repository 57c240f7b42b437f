import { type LayoutRect, emptyRect } from "../types.js";
import type { LayoutTreeNode } from "./types.js";

/** Number of rects a layout of `node` produces: the node plus every descendant. */
export function countSubtree(node: LayoutTreeNode): number {
  let count = 0;
  const stack: LayoutTreeNode[] = [node];
  while (stack.length > 0) {
    const cur = stack.pop();
    if (!cur) continue;
    count++;
    for (const child of cur.children) stack.push(child);
  }
  return count;
}

/**
 * Allocate a rect buffer sized for `node`'s subtree.
 *
 * Placeholders are laid out in the same postorder a layout pass writes, so
 * each slot already carries the id of the node that will land there. The
 * buffer can be reused across passes while the tree's node count is unchanged.
 */
export function allocRectBuffer(node: LayoutTreeNode): LayoutRect[] {
  // Node-then-children-right-to-left order, reversed, is postorder.
  const out: LayoutRect[] = [];
  const stack: LayoutTreeNode[] = [node];
  while (stack.length > 0) {
    const cur = stack.pop();
    if (!cur) continue;
    out.push(emptyRect(cur.id));
    for (const child of cur.children) stack.push(child);
  }
  return out.reverse();
}
