/**
 * packages/core/src/errors.ts — Error codes and the public error class.
 *
 * Why: Layout failures are configuration errors, not transient conditions.
 * Engine functions report them as `LayoutResult` values; the throwing entry
 * points convert those into `StrataError` so callers get one catchable type
 * that names the code and the offending node.
 */

import type { NodeId } from "./layout/types.js";

/**
 * Deterministic error codes for layout and tree-construction violations.
 */
export type StrataErrorCode =
  | "STRATA_INSUFFICIENT_SPACE"
  | "STRATA_ZERO_WEIGHT"
  | "STRATA_BUFFER_TOO_SMALL"
  | "STRATA_INVALID_SIZE"
  | "STRATA_INVALID_EXTENT"
  | "STRATA_INVALID_TREE"
  | "STRATA_TREE_TOO_DEEP";

/**
 * Error class for all layout violations.
 * `nodeId` is the node whose children (or own arguments) could not be resolved.
 */
export class StrataError extends Error {
  override readonly name = "StrataError";
  readonly code: StrataErrorCode;
  readonly nodeId: NodeId | null;

  constructor(code: StrataErrorCode, message?: string, nodeId: NodeId | null = null) {
    super(message ?? code);
    this.code = code;
    this.nodeId = nodeId;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, StrataError);
    }
  }
}
