import { describe, expect, it } from "vitest";
import { PLAN_FIXTURE_FORMATTED, PLAN_FIXTURE_INDENTED } from "./fixtures";
import { buildNodeDetailRows, formatFieldValue } from "./nodeDetails";
import { parsePlanTree } from "./parsePlan";

describe("formatFieldValue", () => {
  it("formats each field type", () => {
    expect(formatFieldValue(null)).toBe("-");
    expect(formatFieldValue(true)).toBe("yes");
    expect(formatFieldValue(false)).toBe("no");
    expect(formatFieldValue(1234)).toBe("1,234");
    expect(formatFieldValue([])).toBe("-");
    expect(formatFieldValue(["a", "b"])).toBe("a, b");
  });
});

describe("buildNodeDetailRows", () => {
  it("lists identity rows then fields", () => {
    const node = parsePlanTree(PLAN_FIXTURE_INDENTED).nodes[1];
    expect(buildNodeDetailRows(node)).toEqual([
      { label: "Operator", value: "Filter" },
      { label: "Kind", value: "Filter" },
      { label: "Node", value: "1" },
      { label: "Depth", value: "1" },
      { label: "Condition", value: "amount > 50" },
    ]);
  });

  it("adds engine ids and metrics", () => {
    const tree = parsePlanTree(PLAN_FIXTURE_FORMATTED, {
      metrics: { keyBy: "engineId", metrics: { "4": { "number of output rows": 1024, "spill size": "10 MiB" } } },
    });
    const rows = buildNodeDetailRows(tree.nodes[1]);
    expect(rows.slice(0, 5)).toEqual([
      { label: "Operator", value: "Exchange" },
      { label: "Kind", value: "Exchange" },
      { label: "Node", value: "1" },
      { label: "Depth", value: "1" },
      { label: "Engine id", value: "4" },
    ]);
    expect(rows).toContainEqual({ label: "Is shuffle", value: "yes" });
    expect(rows).toContainEqual({ label: "Plan id", value: "15" });
    expect(rows.slice(-5)).toEqual([
      { label: "Rows output", value: "1,024" },
      { label: "Spill size", value: "10.0 MB" },
      { label: "Duration", value: "-" },
      { label: "Metric: number of output rows", value: "1,024" },
      { label: "Metric: spill size", value: "10,485,760" },
    ]);
  });
});
