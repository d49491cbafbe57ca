import { describe, expect, it } from "vitest";
import { createInitialPlanViewSnapshot, reducePlanViewSnapshot } from "./usePlanViewState";

describe("reducePlanViewSnapshot", () => {
  it("opens a node and expands its collapsed ancestors", () => {
    const start = { ...createInitialPlanViewSnapshot(), collapsedKeys: new Set(["n0", "n5"]) };
    const next = reducePlanViewSnapshot(start, { type: "openNode", key: "n2", ancestorKeys: ["n1", "n0"] });
    expect(next.selectedKey).toBe("n2");
    expect(next.drawerOpen).toBe(true);
    expect(next.focusToken).toBe(1);
    expect([...next.collapsedKeys]).toEqual(["n5"]);
  });

  it("keeps the collapsed set when no ancestor was collapsed", () => {
    const start = { ...createInitialPlanViewSnapshot(), collapsedKeys: new Set(["n5"]) };
    const next = reducePlanViewSnapshot(start, { type: "openNode", key: "n2", ancestorKeys: ["n1"] });
    expect(next.collapsedKeys).toBe(start.collapsedKeys);
  });

  it("selects without opening the drawer", () => {
    const next = reducePlanViewSnapshot(createInitialPlanViewSnapshot(), { type: "select", key: "n3" });
    expect(next.selectedKey).toBe("n3");
    expect(next.drawerOpen).toBe(false);
    expect(next.focusToken).toBe(0);
  });

  it("closes the drawer but keeps the selection", () => {
    let s = reducePlanViewSnapshot(createInitialPlanViewSnapshot(), { type: "openNode", key: "n1" });
    s = reducePlanViewSnapshot(s, { type: "closeDrawer" });
    expect(s.drawerOpen).toBe(false);
    expect(s.selectedKey).toBe("n1");
    s = reducePlanViewSnapshot(s, { type: "clearSelection" });
    expect(s.selectedKey).toBeNull();
  });

  it("toggles, collapses and expands keys", () => {
    let s = reducePlanViewSnapshot(createInitialPlanViewSnapshot(), { type: "toggleCollapsed", key: "n1" });
    expect([...s.collapsedKeys]).toEqual(["n1"]);
    s = reducePlanViewSnapshot(s, { type: "collapseAll", keys: ["n0", "n2"] });
    expect([...s.collapsedKeys]).toEqual(["n0", "n2"]);
    s = reducePlanViewSnapshot(s, { type: "expandAll" });
    expect(s.collapsedKeys.size).toBe(0);
  });

  it("resets everything but the view mode", () => {
    let s = reducePlanViewSnapshot(createInitialPlanViewSnapshot(), { type: "setViewMode", mode: "outline" });
    s = reducePlanViewSnapshot(s, { type: "openNode", key: "n1" });
    s = reducePlanViewSnapshot(s, { type: "reset" });
    expect(s).toEqual(createInitialPlanViewSnapshot("outline"));
  });
});
