/**
 * packages/core/src/layout/session.ts — Buffer-owning layout loop helper.
 *
 * Why: Harnesses re-run layout on every paint and resize. The session keeps one
 * rect buffer per tree shape so those passes never allocate, and reallocates
 * only when the node count changed since the last pass.
 */

import { DEV_MODE, defaultWarn, emitDevLayoutWarnings } from "./devWarnings.js";
import { allocRectBuffer, countSubtree } from "./engine/bufferSize.js";
import { layoutInto } from "./engine/layoutEngine.js";
import type { LayoutTreeNode } from "./engine/types.js";
import type { LayoutRect, LayoutViewport, NodeId } from "./types.js";
import { unwrapLayoutResult } from "./validate.js";

export type LayoutSessionOptions = Readonly<{
  /** Layer of the root rect when a viewport does not set one. Default 0. */
  baseLayer?: number;
  /** Emit dev warnings. Defaults to `NODE_ENV !== "production"`. */
  devMode?: boolean;
  /** Warning sink. Defaults to `console.warn`. */
  warn?: (message: string) => void;
}>;

export type LayoutSession = Readonly<{
  root: LayoutTreeNode;
  /** Rects of the latest successful pass, in postorder (root last). */
  rects: readonly LayoutRect[];
  /** Run a pass for `viewport`. Throws `StrataError` on failure. */
  layout: (viewport: LayoutViewport) => readonly LayoutRect[];
  /** Rect of the first node carrying `id` in the latest successful pass, or null. */
  findRect: (id: NodeId) => LayoutRect | null;
}>;

export function createLayoutSession(
  root: LayoutTreeNode,
  opts: LayoutSessionOptions = {},
): LayoutSession {
  const baseLayer = opts.baseLayer ?? 0;
  const warnCtx = {
    devMode: opts.devMode ?? DEV_MODE,
    warnedLayoutIssues: new Set<string>(),
    warn: opts.warn ?? defaultWarn,
  };
  let buffer = allocRectBuffer(root);
  let laidOut = false;

  const layout = (viewport: LayoutViewport): readonly LayoutRect[] => {
    const needed = countSubtree(root);
    if (needed !== buffer.length) {
      if (warnCtx.devMode) {
        warnCtx.warn(
          `[strata][layout] node count changed from ${String(buffer.length)} to ${String(
            needed,
          )}; reallocating rect buffer`,
        );
      }
      buffer = allocRectBuffer(root);
      laidOut = false;
    }

    unwrapLayoutResult(
      layoutInto(
        root,
        buffer,
        viewport.x ?? 0,
        viewport.y ?? 0,
        viewport.w,
        viewport.h,
        viewport.layer ?? baseLayer,
      ),
    );
    laidOut = true;
    emitDevLayoutWarnings(warnCtx, root, buffer);
    return buffer;
  };

  const findRect = (id: NodeId): LayoutRect | null => {
    if (!laidOut) return null;
    for (const rect of buffer) {
      if (rect.id === id) return rect;
    }
    return null;
  };

  return Object.freeze({
    root,
    get rects(): readonly LayoutRect[] {
      return buffer;
    },
    layout,
    findRect,
  });
}
