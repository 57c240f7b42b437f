/**
 * packages/core/src/layout/node.ts — Owned layout node tree.
 *
 * Why: The harness builds the tree once, pre-sizes a rect buffer from it and
 * then re-runs layout on every resize. A node owns its children exclusively;
 * there is no removal or re-parenting, so a node can be appended at most once.
 */

import { StrataError } from "../errors.js";
import { allocRectBuffer, countSubtree } from "./engine/bufferSize.js";
import { layoutInto, layoutOrThrow } from "./engine/layoutEngine.js";
import type { LayoutTreeNode } from "./engine/types.js";
import type { Axis, LayoutRect, NodeId, SizePolicy } from "./types.js";
import type { LayoutResult } from "./validate.js";

export class LayoutNode implements LayoutTreeNode {
  private readonly ownChildren: LayoutNode[] = [];
  private parent: LayoutNode | null = null;

  constructor(
    readonly id: NodeId,
    readonly childrenAxis: Axis,
    readonly size: SizePolicy,
  ) {}

  get children(): readonly LayoutNode[] {
    return this.ownChildren;
  }

  addChild(child: LayoutNode): void {
    this.assertAdoptable(child);
    child.parent = this;
    this.ownChildren.push(child);
  }

  /** Append `children` in order. Nothing is appended if any of them is rejected. */
  addChildren(children: readonly LayoutNode[]): void {
    const batch = new Set<LayoutNode>();
    for (const child of children) {
      this.assertAdoptable(child);
      if (batch.has(child)) {
        throw new StrataError(
          "STRATA_INVALID_TREE",
          `node ${String(child.id)} appears more than once in addChildren`,
          child.id,
        );
      }
      batch.add(child);
    }
    for (const child of children) {
      child.parent = this;
      this.ownChildren.push(child);
    }
  }

  /** Node count of this subtree: the number of rects a layout of it produces. */
  countRects(): number {
    return countSubtree(this);
  }

  /** Buffer of placeholder rects sized for this subtree, reusable across passes. */
  allocRectBuffer(): LayoutRect[] {
    return allocRectBuffer(this);
  }

  /**
   * Lay out this subtree into `buffer` (see `layoutInto`).
   * Throws `StrataError` on failure, leaving the buffer untouched.
   *
   * @returns the number of rects written.
   */
  layout(buffer: LayoutRect[], x: number, y: number, w: number, h: number, layer = 0): number {
    return layoutOrThrow(this, buffer, x, y, w, h, layer);
  }

  /** Non-throwing variant of `layout`. */
  tryLayout(
    buffer: LayoutRect[],
    x: number,
    y: number,
    w: number,
    h: number,
    layer = 0,
  ): LayoutResult<number> {
    return layoutInto(this, buffer, x, y, w, h, layer);
  }

  private assertAdoptable(child: LayoutNode): void {
    if (child.parent !== null) {
      throw new StrataError(
        "STRATA_INVALID_TREE",
        `node ${String(child.id)} already belongs to node ${String(child.parent.id)}`,
        child.id,
      );
    }
    for (let cur: LayoutNode | null = this; cur !== null; cur = cur.parent) {
      if (cur === child) {
        throw new StrataError(
          "STRATA_INVALID_TREE",
          `node ${String(child.id)} cannot be appended to its own subtree`,
          child.id,
        );
      }
    }
  }
}
