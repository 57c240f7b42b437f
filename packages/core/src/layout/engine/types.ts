import type { Axis, NodeId, SizePolicy } from "../types.js";

/**
 * Read-only view of a tree node as the engine sees it.
 * `LayoutNode` implements this; tests and callers may pass plain objects.
 */
export type LayoutTreeNode = Readonly<{
  id: NodeId;
  childrenAxis: Axis;
  size: SizePolicy;
  children: readonly LayoutTreeNode[];
}>;
