/**
 * packages/core/src/layout/engine/layoutEngine.ts — Layout entry points.
 *
 * Why: Resolves a node tree into absolute rects inside a caller-owned buffer.
 * A call either writes every rect of the subtree and reports the count, or
 * fails before touching the buffer.
 *
 * Order of checks:
 *   1. origin, extents and layer are finite (extents >= 0)
 *   2. the buffer region holds the subtree's node count
 *   3. the tree is at most MAX_LAYOUT_DEPTH levels deep and every container's
 *      children fit its main extent (checkSubtree)
 *
 * Output order is postorder: each node's rect follows all its descendants'.
 */

import type { LayoutRect } from "../types.js";
import type { LayoutResult } from "../validate.js";
import { unwrapLayoutResult, validateLayoutArgs } from "../validate.js";
import { countSubtree } from "./bufferSize.js";
import { checkSubtree, writeSubtree } from "./placement.js";
import { fail, ok } from "./result.js";
import type { LayoutTreeNode } from "./types.js";

/**
 * Lay out `node` at `(x, y)` with extents `(w, h)` into
 * `buffer[start .. start + countSubtree(node))`.
 *
 * @param layer - Layer of `node`'s own rect; each tree level below adds 1.
 * @returns the number of rects written.
 */
export function layoutInto(
  node: LayoutTreeNode,
  buffer: LayoutRect[],
  x: number,
  y: number,
  w: number,
  h: number,
  layer: number,
  start = 0,
): LayoutResult<number> {
  const badArgs = validateLayoutArgs(node.id, x, y, w, h, layer);
  if (badArgs) return fail(badArgs);

  const needed = countSubtree(node);
  const available = Number.isInteger(start) && start >= 0 ? buffer.length - start : -1;
  if (available < needed) {
    return fail({
      code: "STRATA_BUFFER_TOO_SMALL",
      detail: `node ${String(node.id)}: subtree needs ${String(needed)} rects but buffer has ${String(
        Math.max(0, available),
      )} from offset ${String(start)}`,
      nodeId: node.id,
    });
  }

  const fatal = checkSubtree(node, w, h);
  if (fatal) return fail(fatal);

  return ok(writeSubtree(node, buffer, start, x, y, w, h, layer));
}

/** `layoutInto` that throws `StrataError` on failure. */
export function layoutOrThrow(
  node: LayoutTreeNode,
  buffer: LayoutRect[],
  x: number,
  y: number,
  w: number,
  h: number,
  layer: number,
  start = 0,
): number {
  return unwrapLayoutResult(layoutInto(node, buffer, x, y, w, h, layer, start));
}
