/**
 * packages/core/src/layout/validate.ts — Argument and size-policy validation.
 *
 * Why: Size policies are plain data and can be built without the checked
 * constructors, and layout extents arrive from the harness each frame. Both
 * are checked before any geometry is computed so that invalid input produces
 * a structured fatal instead of NaN rectangles.
 */

import type { StrataErrorCode } from "../errors.js";
import { StrataError } from "../errors.js";
import type { NodeId, SizePolicy } from "./types.js";

/** Structured failure carried by `LayoutResult`. */
export type LayoutFatal = Readonly<{ code: StrataErrorCode; detail: string; nodeId: NodeId }>;

/**
 * Layout operation result: success with value, or failure with fatal error.
 * Used throughout the engine to propagate failures upward without throwing.
 */
export type LayoutResult<T> =
  | Readonly<{ ok: true; value: T }>
  | Readonly<{ ok: false; fatal: LayoutFatal }>;

export function validateSizePolicy(nodeId: NodeId, size: SizePolicy): LayoutFatal | null {
  const raw = size.kind === "absolute" ? size.length : size.weight;
  if (typeof raw === "number" && Number.isFinite(raw) && raw >= 0) return null;
  const field = size.kind === "absolute" ? "length" : "weight";
  return {
    code: "STRATA_INVALID_SIZE",
    detail: `node ${String(nodeId)}: ${size.kind} ${field} must be a finite number >= 0 (got ${String(
      raw,
    )})`,
    nodeId,
  };
}

export function validateLayoutArgs(
  nodeId: NodeId,
  x: number,
  y: number,
  w: number,
  h: number,
  layer: number,
): LayoutFatal | null {
  const bad = (detail: string): LayoutFatal => ({
    code: "STRATA_INVALID_EXTENT",
    detail: `node ${String(nodeId)}: ${detail}`,
    nodeId,
  });
  if (!Number.isFinite(x) || !Number.isFinite(y)) {
    return bad(`origin must be finite (got ${String(x)}, ${String(y)})`);
  }
  if (!Number.isFinite(w) || !Number.isFinite(h) || w < 0 || h < 0) {
    return bad(`extents must be finite and >= 0 (got ${String(w)}x${String(h)})`);
  }
  if (!Number.isFinite(layer)) {
    return bad(`layer must be finite (got ${String(layer)})`);
  }
  return null;
}

/** Unwrap a result, converting a fatal into a thrown `StrataError`. */
export function unwrapLayoutResult<T>(res: LayoutResult<T>): T {
  if (res.ok) return res.value;
  throw new StrataError(res.fatal.code, res.fatal.detail, res.fatal.nodeId);
}
