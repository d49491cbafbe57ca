import { describe, expect, it } from "vitest";
import { parsePlanTree } from "./parsePlan";
import { ancestorKeys, buildOutlineRows } from "./outline";
import { buildParentByKey, collectInnerKeys, countDescendants, toggleKey } from "./utils";

const tree = parsePlanTree("Union\n  Filter a\n    Scan a\n  Scan b");

describe("buildOutlineRows", () => {
  it("lists every node in text order when nothing is collapsed", () => {
    const rows = buildOutlineRows(tree, new Set());
    expect(rows.map((r) => [r.node.key, r.depth, r.hasChildren])).toEqual([
      ["n0", 0, true],
      ["n1", 1, true],
      ["n2", 2, false],
      ["n3", 1, false],
    ]);
  });

  it("skips the subtree of a collapsed node", () => {
    const rows = buildOutlineRows(tree, new Set(["n1", "n3"]));
    expect(rows.map((r) => r.node.key)).toEqual(["n0", "n1", "n3"]);
    expect(rows[1]).toMatchObject({ collapsed: true, descendantCount: 1 });
    expect(rows[2].collapsed).toBe(false);
  });
});

describe("tree helpers", () => {
  it("walks ancestors from the nearest parent", () => {
    expect(ancestorKeys(tree, "n2")).toEqual(["n1", "n0"]);
    expect(ancestorKeys(tree, "n0")).toEqual([]);
  });

  it("maps keys to parent keys", () => {
    expect([...buildParentByKey(tree)]).toEqual([
      ["n0", null],
      ["n1", "n0"],
      ["n2", "n1"],
      ["n3", "n0"],
    ]);
  });

  it("collects nodes with children", () => {
    expect([...collectInnerKeys(tree)]).toEqual(["n0", "n1"]);
  });

  it("counts descendants", () => {
    expect(countDescendants(tree, 0)).toBe(3);
    expect(countDescendants(tree, 99)).toBe(0);
  });

  it("toggles keys without touching the input set", () => {
    const before = new Set(["n1"]);
    expect([...toggleKey(before, "n1")]).toEqual([]);
    expect([...toggleKey(before, "n2")]).toEqual(["n1", "n2"]);
    expect([...before]).toEqual(["n1"]);
  });
});
