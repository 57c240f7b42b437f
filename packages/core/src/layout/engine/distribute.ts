import type { Axis, SizePolicy } from "../types.js";
import type { LayoutFatal } from "../validate.js";
import { validateSizePolicy } from "../validate.js";
import type { LayoutTreeNode } from "./types.js";

/** Main-axis budget of one container: room left for relative children and their weight sum. */
export type MainAxisPlan = Readonly<{ freeSpace: number; totalWeight: number }>;

export function mainExtent(axis: Axis, w: number, h: number): number {
  return axis === "horizontal" ? w : h;
}

/**
 * Sum the fixed lengths and relative weights of `node`'s children against
 * `extent`, reporting the first child policy or budget violation.
 */
export function planMainAxis(node: LayoutTreeNode, extent: number): MainAxisPlan | LayoutFatal {
  let freeSpace = extent;
  let absoluteSum = 0;
  let totalWeight = 0;
  let relativeCount = 0;
  for (const child of node.children) {
    const invalid = validateSizePolicy(child.id, child.size);
    if (invalid) return invalid;
    if (child.size.kind === "absolute") {
      freeSpace -= child.size.length;
      absoluteSum += child.size.length;
    } else {
      totalWeight += child.size.weight;
      relativeCount++;
    }
  }

  if (!Number.isFinite(absoluteSum) || !Number.isFinite(totalWeight)) {
    const what = Number.isFinite(absoluteSum) ? "relative weights" : "absolute lengths";
    return {
      code: "STRATA_INVALID_SIZE",
      detail: `node ${String(node.id)}: sum of child ${what} overflows to Infinity`,
      nodeId: node.id,
    };
  }
  if (node.children.length > 0 && freeSpace <= 0) {
    return {
      code: "STRATA_INSUFFICIENT_SPACE",
      detail: `node ${String(node.id)}: absolute children need ${String(absoluteSum)} along the ${
        node.childrenAxis
      } axis but only ${String(extent)} is available`,
      nodeId: node.id,
    };
  }
  if (relativeCount > 0 && totalWeight <= 0) {
    return {
      code: "STRATA_ZERO_WEIGHT",
      detail: `node ${String(node.id)}: ${String(relativeCount)} relative ${
        relativeCount === 1 ? "child has" : "children have"
      } a total weight of 0`,
      nodeId: node.id,
    };
  }
  return { freeSpace, totalWeight };
}

export function isMainAxisPlan(v: MainAxisPlan | LayoutFatal): v is MainAxisPlan {
  return !("code" in v);
}

/** Resolved main-axis length of one child under `plan`. */
export function childMainLength(size: SizePolicy, plan: MainAxisPlan): number {
  if (size.kind === "absolute") return size.length;
  // Ratio first: weight / totalWeight <= 1, so the product cannot overflow.
  return plan.freeSpace * (size.weight / plan.totalWeight);
}
