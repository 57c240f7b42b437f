/**
 * packages/core/src/layout/types.ts — Layout primitive type definitions.
 *
 * Why: Defines the size policies, axes and output rectangles shared by the
 * node tree, the placement engine and consumers. All lengths are in the same
 * unit as the viewport extents handed to a layout call (pixels by convention).
 */

import { StrataError } from "../errors.js";

/** Externally assigned node identifier, copied verbatim into output rects. */
export type NodeId = number;

/** Two-component vector: `[x, y]` for positions, `[w, h]` for sizes. */
export type Vec2 = [number, number];

/** Child stacking direction: horizontal (main axis = width) or vertical (main axis = height). */
export type Axis = "horizontal" | "vertical";

/**
 * How a node's length along its parent's main axis is determined.
 *
 * - `absolute`: fixed length, independent of siblings and parent.
 * - `relative`: share of the parent's free space, proportional to `weight`
 *   among all relative siblings. Weights 1, 2, 1 over 400 of free space
 *   resolve to 100, 200 and 100.
 */
export type SizePolicy =
  | Readonly<{ kind: "absolute"; length: number }>
  | Readonly<{ kind: "relative"; weight: number }>;

/**
 * One resolved node. Slots are mutable so a buffer can be rewritten in place
 * on every pass.
 */
export type LayoutRect = {
  id: NodeId;
  pos: Vec2;
  size: Vec2;
  /** Stacking depth: base layer of the call plus tree depth. */
  layer: number;
};

/** Viewport handed to a layout pass. Origin defaults to (0, 0). */
export type LayoutViewport = Readonly<{
  x?: number;
  y?: number;
  w: number;
  h: number;
  layer?: number;
}>;

function isNonNegativeFinite(v: number): boolean {
  return Number.isFinite(v) && v >= 0;
}

/** Fixed main-axis length. Throws on negative or non-finite input. */
export function absolute(length: number): SizePolicy {
  if (!isNonNegativeFinite(length)) {
    throw new StrataError(
      "STRATA_INVALID_SIZE",
      `absolute: length must be a finite number >= 0 (got ${String(length)})`,
    );
  }
  return Object.freeze({ kind: "absolute", length });
}

/** Proportional share of free space. Throws on negative or non-finite input. */
export function relative(weight: number): SizePolicy {
  if (!isNonNegativeFinite(weight)) {
    throw new StrataError(
      "STRATA_INVALID_SIZE",
      `relative: weight must be a finite number >= 0 (got ${String(weight)})`,
    );
  }
  return Object.freeze({ kind: "relative", weight });
}

/** Fresh zeroed rect slot for `id`. */
export function emptyRect(id: NodeId): LayoutRect {
  return { id, pos: [0, 0], size: [0, 0], layer: 0 };
}
