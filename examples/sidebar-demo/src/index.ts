import { parseArgs } from "node:util";
import {
  LayoutNode,
  type LayoutRect,
  StrataError,
  absolute,
  createLayoutSession,
  relative,
} from "@strata/core";

const SIDEBAR_WIDTH = 200;
const SIDEBAR_ITEM_HEIGHT = 40;
const SIDEBAR_ITEMS = 4;

function buildTree(): LayoutNode {
  let nextId = 0;
  const id = (): number => ++nextId;

  const sidebar = new LayoutNode(id(), "vertical", absolute(SIDEBAR_WIDTH));
  const items: LayoutNode[] = [];
  for (let i = 0; i < SIDEBAR_ITEMS; i++) {
    items.push(new LayoutNode(id(), "vertical", absolute(SIDEBAR_ITEM_HEIGHT)));
  }
  sidebar.addChildren(items);

  const body = new LayoutNode(id(), "vertical", relative(1));
  const wrapper = new LayoutNode(id(), "horizontal", relative(1));
  wrapper.addChild(sidebar);
  wrapper.addChild(body);
  return wrapper;
}

function parseSize(raw: string): Readonly<{ w: number; h: number }> {
  const m = /^(\d+(?:\.\d+)?)x(\d+(?:\.\d+)?)$/u.exec(raw.trim());
  if (!m?.[1] || !m[2]) {
    throw new Error(`invalid size "${raw}" (expected WIDTHxHEIGHT, e.g. 800x600)`);
  }
  return { w: Number(m[1]), h: Number(m[2]) };
}

function formatRect(r: LayoutRect): string {
  const [x, y] = r.pos;
  const [w, h] = r.size;
  return `  #${String(r.id).padEnd(3)} layer=${String(r.layer)}  pos=(${String(x)}, ${String(
    y,
  )})  size=${String(w)}x${String(h)}`;
}

const { values } = parseArgs({
  options: { size: { type: "string", multiple: true } },
});
const sizes = (values.size ?? ["800x600", "1280x720", "240x400"]).map(parseSize);

const session = createLayoutSession(buildTree());
for (const { w, h } of sizes) {
  console.log(`viewport ${String(w)}x${String(h)}`);
  try {
    for (const rect of session.layout({ w, h })) {
      console.log(formatRect(rect));
    }
  } catch (err) {
    if (!(err instanceof StrataError)) throw err;
    console.log(`  layout failed: ${err.code} (node ${String(err.nodeId)}): ${err.message}`);
    process.exitCode = 1;
  }
}
