import { describe, expect, it } from "vitest";
import { buildPlanTree, nodeKey } from "./buildPlanTree";
import { MalformedPlanError } from "./errors";
import { PLAN_FIXTURE_INDENTED } from "./fixtures";
import { normalizePlanText } from "./normalizePlanText";

function build(text: string, textOrder?: "parentFirst" | "childrenFirst") {
  return buildPlanTree(normalizePlanText(text), { textOrder });
}

function shape(text: string, textOrder?: "parentFirst" | "childrenFirst") {
  return build(text, textOrder).nodes.map((n) => [n.id, n.operator, n.parentId, n.depth]);
}

describe("buildPlanTree", () => {
  it("links each line to the nearest shallower line above it", () => {
    const tree = build(PLAN_FIXTURE_INDENTED);
    expect(tree.root.operator).toBe("Project");
    expect(tree.nodes.map((n) => n.key)).toEqual(["n0", "n1", "n2"]);
    expect(tree.nodes.map((n) => n.parentId)).toEqual([null, 0, 1]);
    expect(tree.root.children.map((c) => c.id)).toEqual([1]);
    expect(tree.byId.get(2)?.kind).toBe("Scan");
    expect(tree.edges).toEqual([
      { parentId: 0, childId: 1, sourceId: 1, targetId: 0 },
      { parentId: 1, childId: 2, sourceId: 2, targetId: 1 },
    ]);
  });

  it("keeps siblings in text order", () => {
    const tree = build("Union\n  Scan a\n  Scan b\n    Filter x\n  Scan c");
    expect(tree.root.children.map((c) => c.text)).toEqual(["Scan a", "Scan b", "Scan c"]);
    expect(tree.byId.get(3)?.parentId).toBe(2);
    expect(tree.byId.get(4)?.parentId).toBe(0);
  });

  it("reads children-first text into the same tree", () => {
    const childrenFirst = "    Scan parquet orders\n  Filter [amount > 50]\nProject";
    expect(shape(childrenFirst, "childrenFirst")).toEqual(shape(PLAN_FIXTURE_INDENTED));
    expect(build(childrenFirst, "childrenFirst").textOrder).toBe("childrenFirst");
  });

  it("keeps sibling order when reading children-first text", () => {
    const parentFirst = build("Union\n  Scan a\n  Scan b\n    Filter x\n  Scan c");
    const childrenFirst = build("  Scan a\n    Filter x\n  Scan b\n  Scan c\nUnion", "childrenFirst");
    const outline = (tree: typeof parentFirst) => tree.nodes.map((n) => [n.id, n.text, n.parentId]);
    expect(outline(childrenFirst)).toEqual([
      [0, "Union", null],
      [1, "Scan a", 0],
      [2, "Scan b", 0],
      [3, "Filter x", 2],
      [4, "Scan c", 0],
    ]);
    expect(outline(childrenFirst)).toEqual(outline(parentFirst));
    expect(childrenFirst.edges).toEqual(parentFirst.edges);
  });

  it("rejects a jump of more than one level", () => {
    try {
      build("A\n  B\n      C");
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(MalformedPlanError);
      if (!(e instanceof MalformedPlanError)) return;
      expect(e.reason).toBe("depthJump");
      expect(e.lineNumber).toBe(3);
      expect(e.message).toBe("Depth jumps from 1 to 3 (line 3)");
    }
  });

  it("rejects a second root", () => {
    expect(() => build("A\n  B\nC")).toThrowError("Plan has more than one root operator (line 3)");
  });

  it("rejects a first line below the root level", () => {
    expect(() => build("  A\nB")).toThrowError(/First operator must be at depth 0/);
  });

  it("copies normalization warnings", () => {
    const normalized = normalizePlanText(PLAN_FIXTURE_INDENTED);
    normalized.warnings.push("note");
    const tree = buildPlanTree(normalized);
    expect(tree.warnings).toEqual(["note"]);
    expect(tree.warnings).not.toBe(normalized.warnings);
  });

  it("derives keys from ids", () => {
    expect(nodeKey(12)).toBe("n12");
  });
});
