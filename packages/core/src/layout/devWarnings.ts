import type { LayoutTreeNode } from "./engine/types.js";
import type { LayoutRect } from "./types.js";

export type WarnLayoutIssueContext = Readonly<{
  devMode: boolean;
  warnedLayoutIssues: Set<string>;
  warn: (message: string) => void;
}>;

const NODE_ENV =
  (globalThis as { process?: { env?: { NODE_ENV?: string } } }).process?.env?.NODE_ENV ??
  "development";
export const DEV_MODE = NODE_ENV !== "production";

export function defaultWarn(message: string): void {
  const c = (globalThis as { console?: { warn?: (msg: string) => void } }).console;
  c?.warn?.(message);
}

export function warnLayoutIssue(ctx: WarnLayoutIssueContext, key: string, detail: string): void {
  if (!ctx.devMode) return;
  if (ctx.warnedLayoutIssues.has(key)) return;
  ctx.warnedLayoutIssues.add(key);
  ctx.warn(`[strata][layout] ${detail}`);
}

function absoluteOnlyLeftover(node: LayoutTreeNode, rect: LayoutRect): number {
  if (node.children.length === 0) return 0;
  let left = node.childrenAxis === "horizontal" ? rect.size[0] : rect.size[1];
  for (const child of node.children) {
    if (child.size.kind === "relative") return 0;
    left -= child.size.length;
  }
  return left;
}

/**
 * Walk `root` alongside its postorder rects (starting at `start`) and warn about
 * legal but suspicious geometry: containers whose absolute children leave
 * main-axis space unassigned, and nodes that resolved to zero area.
 *
 * @returns the index following `root`'s subtree.
 */
export function emitDevLayoutWarnings(
  ctx: WarnLayoutIssueContext,
  root: LayoutTreeNode,
  rects: readonly LayoutRect[],
  start = 0,
): number {
  if (!ctx.devMode) return start;

  let cursor = start;
  for (const child of root.children) {
    cursor = emitDevLayoutWarnings(ctx, child, rects, cursor);
  }
  const rect = rects[cursor];
  if (!rect) return cursor + 1;

  const leftover = absoluteOnlyLeftover(root, rect);
  if (leftover > 0) {
    warnLayoutIssue(
      ctx,
      `unassigned:${String(root.id)}`,
      `node ${String(root.id)}: ${String(leftover)} along the ${
        root.childrenAxis
      } axis is not assigned to any child (all children are absolute)`,
    );
  }
  if (rect.size[0] === 0 || rect.size[1] === 0) {
    warnLayoutIssue(
      ctx,
      `zero:${String(root.id)}`,
      `node ${String(root.id)}: resolved to zero area (${String(rect.size[0])}x${String(
        rect.size[1],
      )})`,
    );
  }
  return cursor + 1;
}
