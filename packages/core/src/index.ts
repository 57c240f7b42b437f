/**
 * @strata/core
 *
 * Runtime-agnostic layout engine: resolves a tree of absolutely and
 * relatively sized nodes into flat, reusable buffers of rectangles.
 * This package MUST NOT use Node-specific APIs (Buffer, worker_threads, node:* imports).
 */

// =============================================================================
// Errors
// =============================================================================

export { StrataError, type StrataErrorCode } from "./errors.js";

// =============================================================================
// Tree model and size policies
// =============================================================================

export {
  absolute,
  relative,
  emptyRect,
  type Axis,
  type LayoutRect,
  type LayoutViewport,
  type NodeId,
  type SizePolicy,
  type Vec2,
} from "./layout/types.js";
export { LayoutNode } from "./layout/node.js";
export type { LayoutTreeNode } from "./layout/engine/types.js";

// =============================================================================
// Engine
// =============================================================================

export { allocRectBuffer, countSubtree } from "./layout/engine/bufferSize.js";
export { layoutInto, layoutOrThrow } from "./layout/engine/layoutEngine.js";
export { MAX_LAYOUT_DEPTH } from "./layout/engine/placement.js";
export {
  unwrapLayoutResult,
  type LayoutFatal,
  type LayoutResult,
} from "./layout/validate.js";

// =============================================================================
// Sessions and dev warnings
// =============================================================================

export {
  createLayoutSession,
  type LayoutSession,
  type LayoutSessionOptions,
} from "./layout/session.js";
export { emitDevLayoutWarnings, type WarnLayoutIssueContext } from "./layout/devWarnings.js";
