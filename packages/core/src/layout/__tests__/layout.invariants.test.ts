import { assert, createRng, describe, test } from "@strata/testkit";
import { allocRectBuffer, countSubtree } from "../engine/bufferSize.js";
import { layoutInto } from "../engine/layoutEngine.js";
import type { LayoutTreeNode } from "../engine/types.js";
import type { Axis, LayoutRect, SizePolicy } from "../types.js";
import { absolute, relative } from "../types.js";

const ITERATIONS = 256;
const EPSILON = 1e-6;

type Rng = ReturnType<typeof createRng>;
type TreeProfile = Readonly<{
  maxDepth: number;
  maxChildren: number;
  absoluteChance: number;
}>;

function randomInt(rng: Rng, min: number, max: number): number {
  return min + (rng.u32() % (max - min + 1));
}

function randomAxis(rng: Rng): Axis {
  return (rng.u32() & 1) === 0 ? "horizontal" : "vertical";
}

function randomTree(rng: Rng, profile: TreeProfile): LayoutTreeNode {
  let nextId = 0;
  const build = (depth: number, size: SizePolicy): LayoutTreeNode => {
    const id = nextId++;
    const children: LayoutTreeNode[] = [];
    const childCount = depth >= profile.maxDepth ? 0 : randomInt(rng, 0, profile.maxChildren);
    for (let i = 0; i < childCount; i++) {
      const useAbsolute = rng.u32() % 100 < profile.absoluteChance;
      const childSize = useAbsolute
        ? absolute(randomInt(rng, 1, 8))
        : relative(randomInt(rng, 1, 4));
      children.push(build(depth + 1, childSize));
    }
    return { id, childrenAxis: randomAxis(rng), size, children };
  };
  return build(0, relative(1));
}

function byId(rects: readonly LayoutRect[]): Map<number, LayoutRect> {
  const out = new Map<number, LayoutRect>();
  for (const r of rects) out.set(r.id, r);
  return out;
}

function mustRect(rects: ReadonlyMap<number, LayoutRect>, id: number): LayoutRect {
  const r = rects.get(id);
  if (!r) throw new Error(`missing rect for node ${String(id)}`);
  return r;
}

function close(actual: number, expected: number, what: string): void {
  const tol = EPSILON * Math.max(1, Math.abs(expected));
  assert.ok(
    Math.abs(actual - expected) <= tol,
    `${what}: ${String(actual)} != ${String(expected)}`,
  );
}

function copyRects(buf: readonly LayoutRect[]): LayoutRect[] {
  return buf.map((r) => ({
    id: r.id,
    pos: [r.pos[0], r.pos[1]],
    size: [r.size[0], r.size[1]],
    layer: r.layer,
  }));
}

function checkGeometry(
  node: LayoutTreeNode,
  rects: ReadonlyMap<number, LayoutRect>,
  depth: number,
  baseLayer: number,
  requireFill: boolean,
): void {
  const self = mustRect(rects, node.id);
  assert.equal(self.layer, baseLayer + depth, `layer of node ${String(node.id)}`);
  if (node.children.length === 0) return;

  const mainIdx = node.childrenAxis === "horizontal" ? 0 : 1;
  const crossIdx = mainIdx === 0 ? 1 : 0;
  let cursor = self.pos[mainIdx];
  let mainSum = 0;
  for (const child of node.children) {
    const r = mustRect(rects, child.id);
    close(r.pos[mainIdx], cursor, `main position of node ${String(child.id)}`);
    assert.equal(r.pos[crossIdx], self.pos[crossIdx], `cross position of node ${String(child.id)}`);
    assert.equal(r.size[crossIdx], self.size[crossIdx], `cross extent of node ${String(child.id)}`);
    if (child.size.kind === "absolute") {
      assert.equal(r.size[mainIdx], child.size.length);
    }
    cursor += r.size[mainIdx];
    mainSum += r.size[mainIdx];
    checkGeometry(child, rects, depth + 1, baseLayer, requireFill);
  }
  const hasRelative = node.children.some((c) => c.size.kind === "relative");
  if (requireFill || hasRelative) {
    close(mainSum, self.size[mainIdx], `children of node ${String(node.id)} fill the main axis`);
  }
}

describe("layout invariants (seeded random trees)", () => {
  test("relative-only trees always resolve and partition their parents", () => {
    const rng = createRng(0x5eed_0001);
    for (let iter = 0; iter < ITERATIONS; iter++) {
      const tree = randomTree(rng, { maxDepth: 5, maxChildren: 4, absoluteChance: 0 });
      const w = randomInt(rng, 1, 4000);
      const h = randomInt(rng, 1, 4000);
      const baseLayer = randomInt(rng, 0, 3);
      const buf = allocRectBuffer(tree);
      const n = countSubtree(tree);
      assert.equal(buf.length, n);

      const res = layoutInto(tree, buf, 0, 0, w, h, baseLayer);
      assert.deepEqual(res, { ok: true, value: n }, `iter=${String(iter)}`);
      const root = buf[n - 1];
      assert.deepEqual(root, { id: tree.id, pos: [0, 0], size: [w, h], layer: baseLayer });
      checkGeometry(tree, byId(buf), 0, baseLayer, true);
    }
  });

  test("mixed trees either resolve consistently or leave the buffer untouched", () => {
    const rng = createRng(0x5eed_0002);
    let resolved = 0;
    for (let iter = 0; iter < ITERATIONS; iter++) {
      const tree = randomTree(rng, { maxDepth: 4, maxChildren: 4, absoluteChance: 40 });
      const w = randomInt(rng, 1, 400);
      const h = randomInt(rng, 1, 400);
      const buf = allocRectBuffer(tree);
      const before = copyRects(buf);

      const res = layoutInto(tree, buf, 0, 0, w, h, 0);
      if (!res.ok) {
        assert.equal(res.fatal.code, "STRATA_INSUFFICIENT_SPACE", `iter=${String(iter)}`);
        assert.deepEqual(buf, before, `iter=${String(iter)}`);
        continue;
      }
      resolved++;
      assert.equal(res.value, countSubtree(tree));
      checkGeometry(tree, byId(buf), 0, 0, false);
    }
    assert.ok(resolved > 0, "at least one mixed tree should resolve");
  });

  test("identical calls produce identical rects", () => {
    const rng = createRng(0x5eed_0003);
    for (let iter = 0; iter < 32; iter++) {
      const tree = randomTree(rng, { maxDepth: 4, maxChildren: 5, absoluteChance: 0 });
      const a = allocRectBuffer(tree);
      const b = allocRectBuffer(tree);
      layoutInto(tree, a, 3, 7, 1920, 1080, 0);
      layoutInto(tree, b, 3, 7, 1920, 1080, 0);
      assert.deepEqual(a, b);
    }
  });

  test("reusing a buffer overwrites every slot", () => {
    const rng = createRng(0x5eed_0004);
    for (let iter = 0; iter < 32; iter++) {
      const tree = randomTree(rng, { maxDepth: 4, maxChildren: 4, absoluteChance: 0 });
      const reused = allocRectBuffer(tree);
      for (const slot of reused) {
        slot.id = -1;
        slot.pos = [Number.NaN, Number.NaN];
        slot.size = [-1, -1];
        slot.layer = 99;
      }
      layoutInto(tree, reused, 0, 0, 640, 480, 0);
      layoutInto(tree, reused, 0, 0, 800, 600, 0);

      const fresh = allocRectBuffer(tree);
      layoutInto(tree, fresh, 0, 0, 800, 600, 0);
      assert.deepEqual(reused, fresh);
    }
  });

  test("a subtree can be laid out into an offset region of a shared buffer", () => {
    const rng = createRng(0x5eed_0005);
    const tree = randomTree(rng, { maxDepth: 3, maxChildren: 3, absoluteChance: 0 });
    const n = countSubtree(tree);
    const shared = [...allocRectBuffer(tree), ...allocRectBuffer(tree)];
    const res = layoutInto(tree, shared, 0, 0, 300, 200, 0, n);
    assert.deepEqual(res, { ok: true, value: n });

    const alone = allocRectBuffer(tree);
    layoutInto(tree, alone, 0, 0, 300, 200, 0);
    assert.deepEqual(shared.slice(n), alone);
    assert.deepEqual(shared.slice(0, n), allocRectBuffer(tree));
  });
});
