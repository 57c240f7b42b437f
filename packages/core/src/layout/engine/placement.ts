/**
 * packages/core/src/layout/engine/placement.ts — Recursive child placement.
 *
 * Two passes share the same arithmetic:
 *   - checkSubtree walks the subtree computing every extent without writing,
 *     and returns the first fatal in placement order.
 *   - writeSubtree repeats the walk and writes rects in postorder. It assumes
 *     a clean check for the same arguments and cannot fail.
 *
 * Both recurse once per tree level, so checkSubtree rejects trees deeper than
 * MAX_LAYOUT_DEPTH before the call stack runs out.
 *
 * Children are packed contiguously from the container origin along the main
 * axis, in declaration order, and span the full cross extent.
 */

import { StrataError } from "../../errors.js";
import type { LayoutRect } from "../types.js";
import { emptyRect } from "../types.js";
import type { LayoutFatal } from "../validate.js";
import { childMainLength, isMainAxisPlan, mainExtent, planMainAxis } from "./distribute.js";
import type { LayoutTreeNode } from "./types.js";

/** Deepest tree level a layout call accepts; the root is level 0. */
export const MAX_LAYOUT_DEPTH = 1024;

export function checkSubtree(
  node: LayoutTreeNode,
  w: number,
  h: number,
  depth = 0,
): LayoutFatal | null {
  if (depth > MAX_LAYOUT_DEPTH) {
    return {
      code: "STRATA_TREE_TOO_DEEP",
      detail: `node ${String(node.id)}: tree depth exceeds ${String(MAX_LAYOUT_DEPTH)} levels`,
      nodeId: node.id,
    };
  }
  if (node.children.length === 0) return null;
  const plan = planMainAxis(node, mainExtent(node.childrenAxis, w, h));
  if (!isMainAxisPlan(plan)) return plan;

  const horizontal = node.childrenAxis === "horizontal";
  for (const child of node.children) {
    const len = childMainLength(child.size, plan);
    const fatal = horizontal
      ? checkSubtree(child, len, h, depth + 1)
      : checkSubtree(child, w, len, depth + 1);
    if (fatal) return fatal;
  }
  return null;
}

function writeRect(
  buffer: LayoutRect[],
  index: number,
  node: LayoutTreeNode,
  x: number,
  y: number,
  w: number,
  h: number,
  layer: number,
): void {
  let slot = buffer[index];
  if (!slot) {
    slot = emptyRect(node.id);
    buffer[index] = slot;
  }
  slot.id = node.id;
  slot.pos[0] = x;
  slot.pos[1] = y;
  slot.size[0] = w;
  slot.size[1] = h;
  slot.layer = layer;
}

/**
 * Write `node`'s subtree into `buffer` starting at `start`.
 * Returns the number of rects written (subtree node count).
 */
export function writeSubtree(
  node: LayoutTreeNode,
  buffer: LayoutRect[],
  start: number,
  x: number,
  y: number,
  w: number,
  h: number,
  layer: number,
): number {
  let cursor = start;
  if (node.children.length > 0) {
    const plan = planMainAxis(node, mainExtent(node.childrenAxis, w, h));
    // Only reachable when called without a clean checkSubtree for the same extents.
    if (!isMainAxisPlan(plan)) throw new StrataError(plan.code, plan.detail, plan.nodeId);
    const horizontal = node.childrenAxis === "horizontal";
    let used = 0;
    for (const child of node.children) {
      const len = childMainLength(child.size, plan);
      used += len;
      if (horizontal) {
        cursor += writeSubtree(child, buffer, cursor, x + used - len, y, len, h, layer + 1);
      } else {
        cursor += writeSubtree(child, buffer, cursor, x, y + used - len, w, len, layer + 1);
      }
    }
  }
  writeRect(buffer, cursor, node, x, y, w, h, layer);
  return cursor - start + 1;
}
