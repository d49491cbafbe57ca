import { describe, expect, it } from "vitest";
import { PLAN_FIXTURE_INDENTED } from "./fixtures";
import {
  CARD_HEIGHT,
  cardHeight,
  keepCardInPlace,
  layoutPlanTree,
  linkKey,
  linkPath,
} from "./layoutPlanTree";
import { mergeRuntimeMetrics } from "./mergeRuntimeMetrics";
import { parsePlanTree } from "./parsePlan";

describe("layoutPlanTree", () => {
  const tree = parsePlanTree(PLAN_FIXTURE_INDENTED);

  it("puts sources at the top by default", () => {
    const layout = layoutPlanTree(tree);
    expect(layout.orientation).toBe("sourcesAtTop");
    expect(layout.nodes.map((n) => [n.key, n.x, n.y])).toEqual([
      ["n0", 170, 284],
      ["n1", 170, 152],
      ["n2", 170, 20],
    ]);
    expect(layout.bbox).toEqual({ minX: 20, minY: 20, maxX: 320, maxY: 372 });
    expect(layout.byKey.get("n2")).toEqual({ x: 20, y: 20, width: 300, height: CARD_HEIGHT });
  });

  it("points links from the child to its parent", () => {
    const layout = layoutPlanTree(tree);
    expect(layout.links).toEqual([
      { key: "n1->n0", sourceKey: "n1", targetKey: "n0", sourceX: 170, sourceY: 240, targetX: 170, targetY: 284 },
      { key: "n2->n1", sourceKey: "n2", targetKey: "n1", sourceX: 170, sourceY: 108, targetX: 170, targetY: 152 },
    ]);
    expect(linkPath(layout.links[1])).toBe("M170,108 C170,130 170,130 170,152");
  });

  it("puts the result at the top when asked", () => {
    const layout = layoutPlanTree(tree, { orientation: "resultAtTop" });
    expect(layout.nodes.map((n) => n.y)).toEqual([20, 152, 284]);
    expect(layout.links[0]).toMatchObject({ sourceY: 152, targetY: 108 });
  });

  it("hides the subtree under a collapsed node", () => {
    const layout = layoutPlanTree(tree, { collapsedKeys: new Set(["n1"]) });
    expect(layout.nodes.map((n) => n.key)).toEqual(["n0", "n1"]);
    expect(layout.nodes[1]).toMatchObject({ hasChildren: true, collapsedChildCount: 1, y: 20 });
    expect(layout.links.map((l) => l.key)).toEqual([linkKey("n1", "n0")]);
  });

  it("makes room for the metrics row", () => {
    const merged = mergeRuntimeMetrics(tree, { keyBy: "traversalOrder", metrics: [{ rows: 1 }] });
    expect(cardHeight(merged.nodes[0])).toBe(116);
    expect(cardHeight(merged.nodes[1])).toBe(CARD_HEIGHT);
    expect(layoutPlanTree(merged).bbox.maxY).toBe(400);
  });

  it("keeps a collapsed card at the same screen position", () => {
    const before = layoutPlanTree(tree);
    const after = layoutPlanTree(tree, { collapsedKeys: new Set(["n1"]) });
    const t = { x: 5, y: -40, k: 0.5 };

    const next = keepCardInPlace(before, after, "n1", t);
    expect(next).toEqual({ x: 5, y: 26, k: 0.5 });

    const screenY = (layout: typeof before, view: typeof t) =>
      view.y + (layout.byKey.get("n1")?.y ?? Number.NaN) * view.k;
    expect(screenY(before, t)).toBe(36);
    expect(screenY(after, next)).toBe(36);
  });

  it("leaves the transform alone when the card is not in both layouts", () => {
    const before = layoutPlanTree(tree);
    const after = layoutPlanTree(tree, { collapsedKeys: new Set(["n1"]) });
    const t = { x: 5, y: -40, k: 0.5 };
    expect(keepCardInPlace(before, after, "n2", t)).toBe(t);
  });
});
